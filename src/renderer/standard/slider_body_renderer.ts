import type { Vec2 } from "../../math/vector2";
import { EPSILON, saturate, smoothstep } from "../../math/vector2";
import { beatfield_rect_to_screen, beatfield_to_screen, rect_expand, screen_to_beatfield } from "../../math/coordinates";
import { scan_segments } from "../../math/distance";
import type { PremultipliedRGBA, RGB, RGBA } from "../../types/color";
import { mix_rgb, mix_rgba, rgb_to_rgba } from "../../types/color";
import type { IFrameState, IHitObjectRecord, ISliderAttributes, ISliderBoxRecord, ISliderSegmentRecord } from "../../types/frame";
import { SelectedSide } from "../../types/frame";
import { evaluate_animation, type IObjectAnimation } from "../animation";
import { ColorAccumulator } from "../compositor";
import { BaseStage } from "../base_renderer";
import type { IStageInstance } from "../backend/render_backend";
import type { IFrameContext } from "../frame_context";
import { offscreen_tint } from "./offscreen";

export interface ISliderRadii {
    // fill ends, inner border starts
    inner: number;
    // object radius, outer border starts
    base: number;
    outer: number;
}

export interface ISliderBands {
    fill: number;
    inner_border: number;
    outer_border: number;
}

// a box's segment run, capped to the scan limit
export interface ISliderBoxRun {
    box_index: number;
    segment_start: number;
    segment_count: number;
}

export interface ISliderBodyInstance extends IStageInstance {
    box: ISliderBoxRecord;
    box_index: number;
    // every box of the same slider, this one included
    runs: ISliderBoxRun[];
    object: IHitObjectRecord;
    slider: ISliderAttributes;
    radii: ISliderRadii;
    // smoothing half width in beatmap units
    aa: number;
    segment_count: number;
    animation: IObjectAnimation;
    // screen-space centre of all the slider's boxes, used for the off-bounds test
    center: Vec2;
}

export const slider_radii = (radius: number, frame: IFrameState): ISliderRadii => ({
    inner: radius * (1 - frame.slider_border_thickness),
    base: radius,
    outer: radius * (1 + frame.slider_border_outer_thickness)
});

// coverage of each band for a pixel at distance d from the ridge
export const slider_band = (d: number, radii: ISliderRadii, aa: number): ISliderBands => {
    const past_inner = smoothstep(radii.inner - aa, radii.inner + aa, d);
    const past_base = smoothstep(radii.base - aa, radii.base + aa, d);

    if (radii.outer - radii.base <= EPSILON) {
        return { fill: 1 - past_inner, inner_border: past_inner * (1 - past_base), outer_border: 0 };
    }

    const past_outer = smoothstep(radii.outer - aa, radii.outer + aa, d);
    return {
        fill: 1 - past_inner,
        inner_border: past_inner * (1 - past_base),
        outer_border: past_base * (1 - past_outer)
    };
};

// ridge colour on the centre line, body colour at the inner border
export const slider_fill_color = (d: number, inner: number, ridge: RGBA, body: RGBA): RGBA => mix_rgba(ridge, body, saturate(d / Math.max(inner, EPSILON)));

export const slider_border_color = (progress: number, slider: ISliderAttributes): RGB =>
    mix_rgb(slider.start_border_color, slider.end_border_color, saturate(progress));

interface ISliderBoxGroup {
    runs: ISliderBoxRun[];
    min: Vec2;
    max: Vec2;
}

const group_boxes = (boxes: readonly ISliderBoxRecord[], max_segments: number): Map<number, ISliderBoxGroup> => {
    const groups = new Map<number, ISliderBoxGroup>();

    boxes.forEach((box, box_index) => {
        const run: ISliderBoxRun = { box_index, segment_start: box.segment_start, segment_count: Math.min(box.segment_count, max_segments) };
        const group = groups.get(box.object_index);

        if (!group) {
            groups.set(box.object_index, { runs: [run], min: box.min, max: box.max });
            return;
        }

        group.runs.push(run);
        group.min = [Math.min(group.min[0], box.min[0]), Math.min(group.min[1], box.min[1])];
        group.max = [Math.max(group.max[0], box.max[0]), Math.max(group.max[1], box.max[1])];
    });

    return groups;
};

// a pixel belongs to the box holding the slider's nearest segment, the lower box index on ties,
// so overlapping boxes of one slider never composite the same pixel twice
const owns_pixel = (p: Vec2, inst: ISliderBodyInstance, distance: number, segments: readonly ISliderSegmentRecord[]): boolean => {
    for (const run of inst.runs) {
        if (run.box_index === inst.box_index) continue;

        const other = scan_segments(p, segments, run.segment_start, run.segment_count).distance;
        if (other < distance || (other === distance && run.box_index < inst.box_index)) return false;
    }

    return true;
};

export class SliderBodyRenderer extends BaseStage<ISliderBodyInstance> {
    readonly name = "SliderBodyRenderer";

    prepare(ctx: IFrameContext): ISliderBodyInstance[] {
        const { input, frame, config, now } = ctx;
        const instances: ISliderBodyInstance[] = [];
        const aa = config.aa_half_width_px / Math.max(ctx.pixel_scale, EPSILON);
        const groups = group_boxes(input.slider_boxes, config.max_segments_per_box);

        input.slider_boxes.forEach((box, box_index) => {
            const object = input.objects[box.object_index];
            const group = groups.get(box.object_index);
            const slider = object.slider;
            if (!slider || !group) return;

            const animation = evaluate_animation({ start_time: object.time, preempt: object.preempt, end_time: slider.end_time }, now, "slider", {
                selected: object.selected_side !== SelectedSide.None,
                fade_in_cap: frame.selected_fade_in_opacity_cap,
                fade_out_cap: frame.selected_fade_out_opacity_cap
            });
            if (animation.alpha <= config.alpha_epsilon) return;

            if (box.segment_count > config.max_segments_per_box) {
                this.warn(`box of object ${box.object_index} has ${box.segment_count} segments, scanning the first ${config.max_segments_per_box}`);
            }

            const quad = beatfield_rect_to_screen(box.min, box.max, frame.playfield_rect);
            const center = beatfield_to_screen([(group.min[0] + group.max[0]) / 2, (group.min[1] + group.max[1]) / 2], frame.playfield_rect);

            instances.push({
                quad: rect_expand(quad, config.aa_half_width_px),
                box,
                box_index,
                runs: group.runs,
                object,
                slider,
                radii: slider_radii(object.radius, frame),
                aa,
                segment_count: Math.min(box.segment_count, config.max_segments_per_box),
                animation,
                center
            });
        });

        return instances;
    }

    shade(pixel: Vec2, inst: ISliderBodyInstance, ctx: IFrameContext): PremultipliedRGBA | null {
        const { frame, input } = ctx;
        const p = screen_to_beatfield(pixel, frame.playfield_rect);
        const scan = scan_segments(p, input.slider_segments, inst.box.segment_start, inst.segment_count);

        if (scan.index < 0 || scan.distance > inst.radii.outer + inst.aa) return null;
        if (!owns_pixel(p, inst, scan.distance, input.slider_segments)) return null;

        const bands = slider_band(scan.distance, inst.radii, inst.aa);
        const fill = slider_fill_color(scan.distance, inst.radii.inner, frame.colors.slider_ridge_rgba, frame.colors.slider_body_rgba);

        const acc = new ColorAccumulator();
        acc.over([fill[0], fill[1], fill[2], fill[3] * bands.fill]);
        acc.over(rgb_to_rgba(slider_border_color(scan.progress, inst.slider), bands.inner_border));
        acc.over(rgb_to_rgba(inst.slider.start_border_color, bands.outer_border));
        acc.multiply_alpha(inst.animation.alpha);

        const tint = offscreen_tint(pixel, inst.center, frame);
        if (tint) acc.tint(tint);

        return acc.result(ctx.config.alpha_epsilon);
    }
}
