import type { Vec2 } from "../../math/vector2";
import type { Rect } from "../../math/coordinates";
import type { PremultipliedRGBA } from "../../types/color";
import type { IFrameContext } from "../frame_context";

export interface IStageInstance {
    // screen-space quad, pixels outside it are never shaded
    quad: Rect;
}

// vertex stage (prepare) + fragment stage (shade), both pure over the frame context
export interface IRenderStage<I extends IStageInstance> {
    readonly name: string;
    prepare(ctx: IFrameContext): I[];
    shade(pixel: Vec2, instance: I, ctx: IFrameContext): PremultipliedRGBA | null;
}

// one stage instance bound to its stage, in composite order
export interface IDrawItem {
    quad: Rect;
    shade(pixel: Vec2): PremultipliedRGBA | null;
}

export const bind_instance = <I extends IStageInstance>(stage: IRenderStage<I>, instance: I, ctx: IFrameContext): IDrawItem => ({
    quad: instance.quad,
    shade: (pixel: Vec2) => stage.shade(pixel, instance, ctx)
});

export interface IRenderBackend {
    get width(): number;
    get height(): number;
    get tile_size(): number;
    get tile_count(): number;

    resize(width: number, height: number): void;
    set_tile_size(size: number): void;
    clear(): void;
    dispose(): void;

    // composites the items over tiles [first, first + count) in item order
    rasterize_tiles(items: readonly IDrawItem[], first: number, count: number): void;

    pixel(x: number, y: number): PremultipliedRGBA;
    to_rgba8(): Uint8ClampedArray;
}
