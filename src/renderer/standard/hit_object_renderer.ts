import type { Vec2 } from "../../math/vector2";
import { EPSILON, lerp, saturate } from "../../math/vector2";
import { beatfield_to_screen, rect_around, type Rect } from "../../math/coordinates";
import type { PremultipliedRGBA, RGB } from "../../types/color";
import { mix_rgb, rgba_to_rgb } from "../../types/color";
import type { IHitObjectRecord } from "../../types/frame";
import { SelectedSide, selection_index } from "../../types/frame";
import type { ISkinAssets, ISpriteTexture } from "../../types/skin";
import { apply_uv_transform, sample_sprite, sample_sprite_tinted } from "../../skin/sprite";
import { evaluate_animation, fade_in_alpha, fade_out_alpha, type IObjectAnimation } from "../animation";
import { ColorAccumulator } from "../compositor";
import { BaseStage } from "../base_renderer";
import type { IStageInstance } from "../backend/render_backend";
import type { IFrameContext } from "../frame_context";
import { offscreen_tint } from "./offscreen";

// digit cell height as a fraction of the radius
export const DIGIT_HEIGHT = 0.8;
// neighbouring digits overlap by this fraction of the cell height
export const DIGIT_OVERLAP = 0.1;
export const MAX_COMBO_DIGITS = 3;

export interface IDigitCell {
    digit: number;
    // left edge and width in radius units, centred on the object
    x0: number;
    width: number;
}

export interface IHitObjectInstance extends IStageInstance {
    index: number;
    object: IHitObjectRecord;
    center: Vec2;
    radius_px: number;
    max_scale: number;
    animation: IObjectAnimation;
    approach_alpha: number;
    approach_scale: number;
    body: ISpriteTexture;
    overlay: ISpriteTexture;
    body_scale: number;
    overlay_scale: number;
    tint: RGB;
    digits: IDigitCell[];
}

// combo numbers past 999 keep their last three digits
export const combo_digits = (combo: number): number[] => {
    const text = String(Math.max(0, Math.floor(combo))).slice(-MAX_COMBO_DIGITS);
    return Array.from(text, (c) => c.charCodeAt(0) - 48);
};

export const layout_digits = (combo: number, aspect: readonly number[]): IDigitCell[] => {
    const digits = combo_digits(combo);
    const widths = digits.map((d) => DIGIT_HEIGHT * (aspect[d] ?? 1));
    const overlap = DIGIT_OVERLAP * DIGIT_HEIGHT;
    const total = widths.reduce((sum, w) => sum + w, 0) - overlap * (digits.length - 1);

    const cells: IDigitCell[] = [];
    let x = -total / 2;

    for (let i = 0; i < digits.length; i++) {
        cells.push({ digit: digits[i], x0: x, width: widths[i] });
        x += widths[i] - overlap;
    }

    return cells;
};

export const quad_uv = (pixel: Vec2, quad: Rect): Vec2 => [
    (pixel[0] - quad[0]) / Math.max(quad[2] - quad[0], EPSILON),
    (pixel[1] - quad[1]) / Math.max(quad[3] - quad[1], EPSILON)
];

// a sprite authored at skin_scale occupies the centre skin_scale / max_scale of the quad
export const sprite_uv = (uv: Vec2, max_scale: number, skin_scale: number): Vec2 => {
    const k = max_scale / Math.max(skin_scale, EPSILON);
    return [(uv[0] - 0.5) * k + 0.5, (uv[1] - 0.5) * k + 0.5];
};

// linear over the preempt window, frozen at the end scale from the hit time on
export const approach_scale_at = (obj: IHitObjectRecord, now: number): number => {
    const t = saturate((now - (obj.time - obj.preempt)) / Math.max(obj.preempt, EPSILON));
    return lerp(obj.approach_circle_start_scale, obj.approach_circle_end_scale, t);
};

export const hit_object_max_scale = (obj: IHitObjectRecord, skin: ISkinAssets): number => {
    const head = obj.slider
        ? Math.max(skin.scale.slider_start_circle, skin.scale.slider_start_circle_overlay)
        : Math.max(skin.scale.hit_circle, skin.scale.hit_circle_overlay);
    const approach = Math.max(obj.approach_circle_start_scale, obj.approach_circle_end_scale) * skin.scale.approach_circle;
    return Math.max(1, head, approach);
};

export class HitObjectRenderer extends BaseStage<IHitObjectInstance> {
    readonly name = "HitObjectRenderer";

    prepare(ctx: IFrameContext): IHitObjectInstance[] {
        const { input, frame, now } = ctx;
        const skin = input.skin;
        const instances: IHitObjectInstance[] = [];

        for (let i = 0; i < input.objects.length; i++) {
            const obj = input.objects[i];
            const selected = obj.selected_side !== SelectedSide.None;

            // a slider head stays until the slider itself starts fading
            const end_time = obj.slider ? obj.slider.end_time : obj.time;
            const animation = evaluate_animation({ start_time: obj.time, preempt: obj.preempt, end_time }, now, "circle", {
                selected,
                fade_in_cap: frame.selected_fade_in_opacity_cap,
                fade_out_cap: frame.selected_fade_out_opacity_cap
            });

            const approach_alpha = fade_in_alpha(now, obj.time, obj.preempt) * fade_out_alpha(now, obj.time, "circle");
            if (animation.alpha <= ctx.config.alpha_epsilon && approach_alpha <= ctx.config.alpha_epsilon) continue;

            const center = beatfield_to_screen(obj.center, frame.playfield_rect);
            const radius_px = obj.radius * ctx.pixel_scale;
            const max_scale = hit_object_max_scale(obj, skin);
            const side = selection_index(obj.selected_side);

            instances.push({
                quad: rect_around(center, radius_px * max_scale * animation.growth),
                index: i,
                object: obj,
                center,
                radius_px,
                max_scale,
                animation,
                approach_alpha,
                approach_scale: approach_scale_at(obj, now),
                body: obj.slider ? skin.slider_start_circle : skin.hit_circle,
                overlay: obj.slider ? skin.slider_start_circle_overlay : skin.hit_circle_overlay,
                body_scale: obj.slider ? skin.scale.slider_start_circle : skin.scale.hit_circle,
                overlay_scale: obj.slider ? skin.scale.slider_start_circle_overlay : skin.scale.hit_circle_overlay,
                tint:
                    side === null
                        ? obj.color
                        : mix_rgb(obj.color, rgba_to_rgb(input.palette[side].selection_combo_color), frame.selection_color_mix_strength),
                digits: layout_digits(obj.combo, skin.digit_atlas.aspect)
            });
        }

        return instances;
    }

    shade(pixel: Vec2, inst: IHitObjectInstance, ctx: IFrameContext): PremultipliedRGBA | null {
        const skin = ctx.input.skin;
        const uv = quad_uv(pixel, inst.quad);
        const growth = inst.animation.growth;

        const body = new ColorAccumulator();
        body.over(sample_sprite_tinted(inst.body, sprite_uv(uv, inst.max_scale, inst.body_scale), inst.tint));
        body.over(sample_sprite(inst.overlay, sprite_uv(uv, inst.max_scale, inst.overlay_scale)));

        // digits live in un-grown radius units around the centre
        const local: Vec2 = [(uv[0] - 0.5) * 2 * inst.max_scale * growth, (uv[1] - 0.5) * 2 * inst.max_scale * growth];
        this.shade_digits(local, inst, skin, body);
        body.multiply_alpha(inst.animation.alpha);

        const out = new ColorAccumulator();

        if (inst.approach_alpha > 0) {
            // the approach circle does not grow, so undo the growth baked into the quad
            const approach_uv = sprite_uv(uv, inst.max_scale * growth, inst.approach_scale * skin.scale.approach_circle);
            const ring = sample_sprite_tinted(skin.approach_circle, approach_uv, inst.object.color);
            out.over([ring[0], ring[1], ring[2], ring[3] * inst.approach_alpha]);
        }

        out.over_premultiplied(body.to_premultiplied());

        const tint = offscreen_tint(pixel, inst.center, ctx.frame);
        if (tint) out.tint(tint);

        return out.result(ctx.config.alpha_epsilon);
    }

    private shade_digits(local: Vec2, inst: IHitObjectInstance, skin: ISkinAssets, acc: ColorAccumulator): void {
        const half_h = DIGIT_HEIGHT / 2;
        if (local[1] < -half_h || local[1] >= half_h) return;

        for (const cell of inst.digits) {
            if (local[0] < cell.x0 || local[0] >= cell.x0 + cell.width) continue;

            const texture = skin.digits[cell.digit];
            const uv = apply_uv_transform([(local[0] - cell.x0) / cell.width, (local[1] + half_h) / DIGIT_HEIGHT], skin.digit_atlas.uv_xform[cell.digit]);
            acc.over(sample_sprite(texture, uv));
        }
    }
}
