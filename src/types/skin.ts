// straight RGBA floats, row-major, top row first
export interface ISpriteTexture {
    width: number;
    height: number;
    pixels: Float32Array;
}

// sprite size relative to the nominal 128px (256px for @2x) circle
export interface ISkinScaleMeta {
    hit_circle: number;
    hit_circle_overlay: number;
    slider_start_circle: number;
    slider_start_circle_overlay: number;
    slider_end_circle: number;
    slider_end_circle_overlay: number;
    reverse_arrow: number;
    approach_circle: number;
}

export type UvTransform = [scale_x: number, scale_y: number, offset_x: number, offset_y: number];

export interface IDigitAtlasMeta {
    // uv' = uv * scale + offset, one per digit layer
    uv_xform: UvTransform[];
    // width / height of each digit glyph
    aspect: number[];
}

export interface ISkinAssets {
    hit_circle: ISpriteTexture;
    hit_circle_overlay: ISpriteTexture;
    slider_start_circle: ISpriteTexture;
    slider_start_circle_overlay: ISpriteTexture;
    slider_end_circle: ISpriteTexture;
    slider_end_circle_overlay: ISpriteTexture;
    approach_circle: ISpriteTexture;
    reverse_arrow: ISpriteTexture;
    digits: ISpriteTexture[];
    scale: ISkinScaleMeta;
    digit_atlas: IDigitAtlasMeta;
}
