import { beatfield_pixel_scale } from "../math/coordinates";
import type { IFrameInput, IFrameState } from "../types/frame";
import type { IHudStyle } from "../skin/skin_config";
import type { IRendererConfig } from "./base_renderer";

// everything one frame reads; built once per frame, never mutated
export interface IFrameContext {
    readonly input: IFrameInput;
    readonly frame: IFrameState;
    readonly config: IRendererConfig;
    readonly style: IHudStyle;
    readonly now: number;
    // screen pixels per beatmap unit
    readonly pixel_scale: number;
}

export const build_frame_context = (input: IFrameInput, config: IRendererConfig, style: IHudStyle): IFrameContext =>
    Object.freeze({
        input,
        frame: input.frame,
        config,
        style,
        now: input.frame.time_ms,
        pixel_scale: beatfield_pixel_scale(input.frame.playfield_rect)
    });
