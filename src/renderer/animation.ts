import { clamp, EPSILON } from "../math/vector2";
import { Easing, ease_between } from "./easing";

export const FADE_OUT_DURATION = 250;
// fraction of preempt spent fading in
export const FADE_IN_FRACTION = 2 / 3;

export const CIRCLE_GROWTH_SCALE = 1.2;
export const CAP_GROWTH_SCALE = 1.25;
// applied to (scale - 1) of objects that are not selected
export const UNSELECTED_GROWTH_BOOST = 1.2;

export type AnimationKind = "circle" | "slider" | "cap";

export interface IObjectTiming {
    // hit time, the object appears at start_time - preempt
    start_time: number;
    preempt: number;
    // when the fade-out window opens
    end_time: number;
}

export interface ISelectionOpacity {
    selected: boolean;
    fade_in_cap: number;
    fade_out_cap: number;
}

export interface IObjectAnimation {
    fade_in: number;
    fade_out: number;
    alpha: number;
    growth: number;
}

export const appear_time = (timing: IObjectTiming): number => timing.start_time - timing.preempt;

export const fade_in_alpha = (now: number, start_time: number, preempt: number): number => {
    const appear = start_time - preempt;
    return clamp((now - appear) / Math.max(preempt * FADE_IN_FRACTION, EPSILON), 0, 1);
};

export const fade_out_progress = (now: number, end_time: number): number => clamp((now - end_time) / FADE_OUT_DURATION, 0, 1);

// circles ease out with a squared falloff, slider bodies and caps fade linearly
export const fade_out_alpha = (now: number, end_time: number, kind: AnimationKind): number => {
    const t = fade_out_progress(now, end_time);
    return kind === "circle" ? Easing.OutFalloff(t) : 1 - t;
};

export const selected_opacity_floor = (now: number, end_time: number, fade_in_cap: number, fade_out_cap: number): number =>
    now <= end_time ? fade_in_cap : fade_out_cap;

export const growth_max_scale = (kind: AnimationKind): number => {
    switch (kind) {
        case "circle":
            return CIRCLE_GROWTH_SCALE;
        case "cap":
            return CAP_GROWTH_SCALE;
        default:
            return 1;
    }
};

export const growth_factor = (now: number, end_time: number, max_scale: number, selected: boolean): number => {
    if (selected) return 1;
    const raw = ease_between(1, max_scale, fade_out_progress(now, end_time), Easing.Out);
    return 1 + (raw - 1) * UNSELECTED_GROWTH_BOOST;
};

// evaluated once per object per frame; both the quad and the shading read the same growth
export const evaluate_animation = (timing: IObjectTiming, now: number, kind: AnimationKind, selection: ISelectionOpacity): IObjectAnimation => {
    const fade_in = fade_in_alpha(now, timing.start_time, timing.preempt);
    const fade_out = fade_out_alpha(now, timing.end_time, kind);

    let alpha = fade_in * fade_out;
    if (selection.selected) {
        alpha = Math.max(alpha, selected_opacity_floor(now, timing.end_time, selection.fade_in_cap, selection.fade_out_cap));
    }

    return {
        fade_in,
        fade_out,
        alpha: clamp(alpha, 0, 1),
        growth: growth_factor(now, timing.end_time, growth_max_scale(kind), selection.selected)
    };
};
