import type { Vec2 } from "../../math/vector2";
import { rect_contains } from "../../math/coordinates";
import type { PremultipliedRGBA, RGBA } from "../../types/color";
import type { IFrameState } from "../../types/frame";
import { ColorAccumulator } from "../compositor";
import { BaseStage } from "../base_renderer";
import type { IStageInstance } from "../backend/render_backend";
import type { IFrameContext } from "../frame_context";
import { in_border } from "../hud/panel";

export interface IBackgroundInstance extends IStageInstance {
    lightness: number;
}

// moves rgb toward white, alpha untouched
export const lighten = (color: RGBA, amount: number): RGBA => [
    color[0] + (1 - color[0]) * amount,
    color[1] + (1 - color[1]) * amount,
    color[2] + (1 - color[2]) * amount,
    color[3]
];

export const break_lightness = (frame: IFrameState): number => (frame.is_break_time ? frame.break_time_lightness : 0);

export class BackgroundRenderer extends BaseStage<IBackgroundInstance> {
    readonly name = "BackgroundRenderer";

    prepare(ctx: IFrameContext): IBackgroundInstance[] {
        const [w, h] = ctx.frame.screen_size;
        return [{ quad: [0, 0, w, h], lightness: break_lightness(ctx.frame) }];
    }

    shade(pixel: Vec2, inst: IBackgroundInstance, ctx: IFrameContext): PremultipliedRGBA | null {
        const { frame } = ctx;
        const colors = frame.colors;
        const acc = new ColorAccumulator();

        acc.over(lighten(colors.outer_rgba, inst.lightness));

        if (rect_contains(frame.osu_rect, pixel)) {
            acc.over(lighten(in_border(pixel, frame.osu_rect) ? colors.gameplay_border_rgba : colors.gameplay_rgba, inst.lightness));
        }

        if (rect_contains(frame.playfield_rect, pixel)) {
            acc.over(lighten(in_border(pixel, frame.playfield_rect) ? colors.playfield_border_rgba : colors.playfield_rgba, inst.lightness));
        }

        return acc.result(ctx.config.alpha_epsilon);
    }
}
