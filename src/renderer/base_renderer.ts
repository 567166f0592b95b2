import type { Vec2 } from "../math/vector2";
import type { PremultipliedRGBA } from "../types/color";
import type { IRenderStage, IStageInstance } from "./backend/render_backend";
import type { IFrameContext } from "./frame_context";

export interface IRendererConfig {
    // square tile edge in pixels
    tile_size: number;
    // tiles rasterized before yielding back to the event loop
    tiles_per_batch: number;

    // upper bound of the per-pixel segment scan of one slider box
    max_segments_per_box: number;
    // composited alpha at or below this is "no contribution"
    alpha_epsilon: number;
    // slider edge smoothing, screen pixels on each side of an edge
    aa_half_width_px: number;
}

export const DEFAULT_RENDERER_CONFIG: IRendererConfig = {
    tile_size: 32,
    tiles_per_batch: 16,

    max_segments_per_box: 1024,
    alpha_epsilon: 1e-5,
    aa_half_width_px: 1
};

export const merge_renderer_config = (config?: Partial<IRendererConfig>): IRendererConfig => {
    return { ...DEFAULT_RENDERER_CONFIG, ...config };
};

export abstract class BaseStage<I extends IStageInstance> implements IRenderStage<I> {
    abstract readonly name: string;

    abstract prepare(ctx: IFrameContext): I[];
    abstract shade(pixel: Vec2, instance: I, ctx: IFrameContext): PremultipliedRGBA | null;

    protected warn(message: string): void {
        console.warn(`[${this.name}] ${message}`);
    }
}
