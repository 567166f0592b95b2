import type { Vec2 } from "../../math/vector2";
import { vec2_rotate_inverse, vec2_sub } from "../../math/vector2";
import { beatfield_to_screen, type Rect } from "../../math/coordinates";
import type { PremultipliedRGBA, RGB } from "../../types/color";
import type { IHitObjectRecord, ISliderAttributes } from "../../types/frame";
import { SelectedSide } from "../../types/frame";
import type { ISkinAssets } from "../../types/skin";
import { sample_sprite, sample_sprite_tinted } from "../../skin/sprite";
import { evaluate_animation, type IObjectAnimation } from "../animation";
import { ColorAccumulator } from "../compositor";
import { BaseStage } from "../base_renderer";
import type { IStageInstance } from "../backend/render_backend";
import type { IFrameContext } from "../frame_context";
import { offscreen_tint } from "./offscreen";

export type SlideEndpoint = "start" | "end";

export interface ISlideEnd {
    endpoint: SlideEndpoint;
    // beatmap space
    position: Vec2;
    color: RGB;
}

export interface IReverseArrow {
    // screen space
    position: Vec2;
    // (cos, sin) of the travel direction
    rotation: Vec2;
}

export interface ISliderCapInstance extends IStageInstance {
    object_index: number;
    object: IHitObjectRecord;
    end: ISlideEnd;
    end_screen: Vec2;
    radius_px: number;
    animation: IObjectAnimation;
    arrows: IReverseArrow[];
}

// odd slide counts finish at the tail, even ones back at the head
export const resolve_slide_end = (slides: number): SlideEndpoint => (slides % 2 === 1 ? "end" : "start");

export const resolve_slide_target = (object: IHitObjectRecord, slider: ISliderAttributes): ISlideEnd => {
    const endpoint = resolve_slide_end(slider.slides);
    return endpoint === "end"
        ? { endpoint, position: slider.end_center, color: slider.end_border_color }
        : { endpoint, position: object.center, color: slider.start_border_color };
};

export const has_end_arrow = (slides: number): boolean => slides >= 2;
export const has_start_arrow = (slides: number): boolean => slides >= 3;

// sprite space: [0, 1]^2 over a sprite of half extent `half` centred on `center`
const local_uv = (pixel: Vec2, center: Vec2, half: number): Vec2 => [(pixel[0] - center[0]) / (2 * half) + 0.5, (pixel[1] - center[1]) / (2 * half) + 0.5];

// sampling coordinates turn by the inverse angle so the sprite turns forward
export const arrow_uv = (pixel: Vec2, arrow: IReverseArrow, half: number): Vec2 => {
    const local = vec2_rotate_inverse(vec2_sub(pixel, arrow.position), arrow.rotation);
    return [local[0] / (2 * half) + 0.5, local[1] / (2 * half) + 0.5];
};

const cap_extent = (radius_px: number, growth: number, skin: ISkinAssets): number =>
    Math.max(radius_px * Math.max(skin.scale.slider_end_circle, skin.scale.slider_end_circle_overlay) * growth, radius_px * skin.scale.reverse_arrow);

export class SliderCapRenderer extends BaseStage<ISliderCapInstance> {
    readonly name = "SliderCapRenderer";

    prepare(ctx: IFrameContext): ISliderCapInstance[] {
        const { input, frame, config, now } = ctx;
        const instances: ISliderCapInstance[] = [];

        for (const object_index of input.slider_draw_indices) {
            const object = input.objects[object_index];
            const slider = object.slider;
            if (!slider) continue;

            const animation = evaluate_animation({ start_time: object.time, preempt: object.preempt, end_time: slider.end_time }, now, "cap", {
                selected: object.selected_side !== SelectedSide.None,
                fade_in_cap: frame.selected_fade_in_opacity_cap,
                fade_out_cap: frame.selected_fade_out_opacity_cap
            });
            if (animation.alpha <= config.alpha_epsilon) continue;

            const head = beatfield_to_screen(object.center, frame.playfield_rect);
            const tail = beatfield_to_screen(slider.end_center, frame.playfield_rect);
            const end = resolve_slide_target(object, slider);
            const radius_px = object.radius * ctx.pixel_scale;

            // arrows stop once the slider has been completed
            const arrows: IReverseArrow[] = [];
            if (now <= slider.end_time) {
                if (has_end_arrow(slider.slides)) arrows.push({ position: tail, rotation: slider.end_rotation });
                if (has_start_arrow(slider.slides)) arrows.push({ position: head, rotation: slider.head_rotation });
            }

            const extent = cap_extent(radius_px, animation.growth, input.skin);
            const quad: Rect = [
                Math.min(head[0], tail[0]) - extent,
                Math.min(head[1], tail[1]) - extent,
                Math.max(head[0], tail[0]) + extent,
                Math.max(head[1], tail[1]) + extent
            ];

            instances.push({
                quad,
                object_index,
                object,
                end,
                end_screen: end.endpoint === "end" ? tail : head,
                radius_px,
                animation,
                arrows
            });
        }

        return instances;
    }

    shade(pixel: Vec2, inst: ISliderCapInstance, ctx: IFrameContext): PremultipliedRGBA | null {
        const skin = ctx.input.skin;
        const grown = inst.radius_px * inst.animation.growth;

        const acc = new ColorAccumulator();
        acc.over(sample_sprite_tinted(skin.slider_end_circle, local_uv(pixel, inst.end_screen, grown * skin.scale.slider_end_circle), inst.end.color));
        acc.over(sample_sprite(skin.slider_end_circle_overlay, local_uv(pixel, inst.end_screen, grown * skin.scale.slider_end_circle_overlay)));

        // arrows keep their size while the cap grows
        const arrow_half = inst.radius_px * skin.scale.reverse_arrow;
        for (const arrow of inst.arrows) {
            acc.over(sample_sprite(skin.reverse_arrow, arrow_uv(pixel, arrow, arrow_half)));
        }

        acc.multiply_alpha(inst.animation.alpha);

        const tint = offscreen_tint(pixel, inst.end_screen, ctx.frame);
        if (tint) acc.tint(tint);

        return acc.result(ctx.config.alpha_epsilon);
    }
}
