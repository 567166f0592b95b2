import type { ISkinAssets, ISkinScaleMeta, ISpriteTexture, UvTransform } from "../types/skin";
import { create_texture } from "./sprite";
import { glyph_bit, GLYPH_COLUMNS, GLYPH_ROWS } from "../renderer/glyphs";
import { saturate } from "../math/vector2";

export const DEFAULT_SPRITE_SIZE = 128;
// pixels per glyph bit in the generated digit layers
export const DEFAULT_DIGIT_PIXEL = 4;
const DIGIT_PADDING = 2;

const radial = (size: number, x: number, y: number): number => {
    const half = size / 2;
    return Math.hypot(x + 0.5 - half, y + 0.5 - half) / half;
};

// white disc covering radius_fraction of the half-size, with a one pixel soft edge
export const create_disc_texture = (size: number, radius_fraction: number): ISpriteTexture => {
    const half = size / 2;
    return create_texture(size, size, (x, y) => {
        const d = radial(size, x, y);
        return [1, 1, 1, saturate((radius_fraction - d) * half + 0.5)];
    });
};

export const create_ring_texture = (size: number, inner_fraction: number, outer_fraction: number): ISpriteTexture => {
    const half = size / 2;
    return create_texture(size, size, (x, y) => {
        const d = radial(size, x, y);
        const outer = saturate((outer_fraction - d) * half + 0.5);
        const inner = saturate((d - inner_fraction) * half + 0.5);
        return [1, 1, 1, outer * inner];
    });
};

// chevron pointing toward +x
export const create_arrow_texture = (size: number): ISpriteTexture =>
    create_texture(size, size, (x, y) => {
        const u = (x + 0.5) / size - 0.5;
        const v = Math.abs((y + 0.5) / size - 0.5);
        const head = u > 0 && u < 0.3 && v < 0.3 - u;
        const shaft = u >= -0.3 && u <= 0 && v < 0.08;
        return [1, 1, 1, head || shaft ? 1 : 0];
    });

export const create_digit_texture = (digit: number, pixel: number = DEFAULT_DIGIT_PIXEL): ISpriteTexture => {
    const width = GLYPH_COLUMNS * pixel + DIGIT_PADDING * 2;
    const height = GLYPH_ROWS * pixel + DIGIT_PADDING * 2;
    const code = 48 + digit;

    return create_texture(width, height, (x, y) => {
        const column = Math.floor((x - DIGIT_PADDING) / pixel);
        const row = Math.floor((y - DIGIT_PADDING) / pixel);
        const on = x >= DIGIT_PADDING && y >= DIGIT_PADDING && glyph_bit(code, column, row);
        return [1, 1, 1, on ? 1 : 0];
    });
};

export const DEFAULT_SKIN_SCALE: ISkinScaleMeta = {
    hit_circle: 1,
    hit_circle_overlay: 1,
    slider_start_circle: 1,
    slider_start_circle_overlay: 1,
    slider_end_circle: 1,
    slider_end_circle_overlay: 1,
    reverse_arrow: 1,
    approach_circle: 1
};

// procedural stand-in used when no skin has been loaded
export const build_default_skin = (size: number = DEFAULT_SPRITE_SIZE): ISkinAssets => {
    const body = create_disc_texture(size, 0.92);
    const overlay = create_ring_texture(size, 0.84, 0.96);
    const digits: ISpriteTexture[] = [];
    const uv_xform: UvTransform[] = [];
    const aspect: number[] = [];

    for (let d = 0; d < 10; d++) {
        const texture = create_digit_texture(d);
        digits.push(texture);
        uv_xform.push([1, 1, 0, 0]);
        aspect.push(texture.width / texture.height);
    }

    return {
        hit_circle: body,
        hit_circle_overlay: overlay,
        slider_start_circle: body,
        slider_start_circle_overlay: overlay,
        slider_end_circle: body,
        slider_end_circle_overlay: overlay,
        approach_circle: create_ring_texture(size, 0.88, 0.98),
        reverse_arrow: create_arrow_texture(size),
        digits,
        scale: { ...DEFAULT_SKIN_SCALE },
        digit_atlas: {
            uv_xform,
            aspect
        }
    };
};
