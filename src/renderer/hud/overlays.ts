import type { Vec2 } from "../../math/vector2";
import { EPSILON, saturate } from "../../math/vector2";
import { rect_around, rect_contains, type Rect } from "../../math/coordinates";
import type { ColorAccumulator } from "../compositor";
import type { IFrameContext } from "../frame_context";
import { format_fixed, text_alpha_centered } from "../text";
import { paint } from "./panel";
import type { IHudRegion } from "./region";

const TAU = Math.PI * 2;

export const ARC_THICKNESS_PX = 4;
// one loading spinner revolution
export const SPINNER_PERIOD_MS = 1000;
export const LOADING_ARC_SWEEP = TAU * 0.75;
export const BREAK_BAR_HEIGHT_PX = 6;
export const BREAK_BAR_OFFSET_PX = 24;

// angle measured clockwise (screen space) from 12 o'clock, in [0, 2pi)
export const clock_angle = (p: Vec2, center: Vec2): number => {
    const angle = Math.atan2(p[0] - center[0], -(p[1] - center[1]));
    return angle < 0 ? angle + TAU : angle;
};

// coverage of a ring arc starting at `start` and sweeping clockwise by `sweep`
export const arc_alpha = (p: Vec2, center: Vec2, radius: number, thickness: number, start: number, sweep: number): number => {
    if (sweep <= 0) return 0;
    const d = Math.hypot(p[0] - center[0], p[1] - center[1]);
    const band = saturate(thickness / 2 - Math.abs(d - radius) + 0.5);
    if (band <= 0) return 0;
    if (sweep >= TAU) return band;

    const rel = (((clock_angle(p, center) - start) % TAU) + TAU) % TAU;
    return rel <= sweep ? band : 0;
};

export const break_remaining = (now: number, break_time: Vec2): number => saturate((break_time[1] - now) / Math.max(break_time[1] - break_time[0], EPSILON));

export const spinner_progress = (now: number, spinner_time: Vec2): number => saturate((now - spinner_time[0]) / Math.max(spinner_time[1] - spinner_time[0], EPSILON));

export const loading_region = (ctx: IFrameContext): IHudRegion | null => {
    const { frame, style } = ctx;
    if (!frame.loading) return null;

    const center: Vec2 = [frame.screen_size[0] / 2, frame.screen_size[1] / 2];
    const radius = style.loading_spinner_radius;
    const start = ((frame.time_ms % SPINNER_PERIOD_MS) / SPINNER_PERIOD_MS) * TAU;

    return {
        name: "loading",
        rect: rect_around(center, radius + ARC_THICKNESS_PX),
        hitbox: null,
        paint: (p: Vec2, acc: ColorAccumulator) => {
            paint(acc, style.colors.loading, arc_alpha(p, center, radius, ARC_THICKNESS_PX, start, LOADING_ARC_SWEEP));
        }
    };
};

// shrinking bar over the playfield with the seconds left in the break
export const break_region = (ctx: IFrameContext): IHudRegion | null => {
    const { frame, style, now } = ctx;
    if (!frame.is_break_time) return null;

    const pf = frame.playfield_rect;
    const center_x = (pf[0] + pf[2]) / 2;
    const full_half_w = (pf[2] - pf[0]) / 4;
    const remaining = break_remaining(now, frame.break_time);
    const half_w = full_half_w * remaining;
    const bar_y = pf[1] + BREAK_BAR_OFFSET_PX;
    const bar: Rect = [center_x - half_w, bar_y, center_x + half_w, bar_y + BREAK_BAR_HEIGHT_PX];
    const label = `BREAK ${format_fixed(Math.max(0, frame.break_time[1] - now) / 1000, 1, "S")}`;
    const label_center: Vec2 = [center_x, bar_y - style.text_height];

    return {
        name: "break_indicator",
        rect: [center_x - full_half_w, label_center[1] - style.text_height, center_x + full_half_w, bar[3]],
        hitbox: null,
        paint: (p: Vec2, acc: ColorAccumulator) => {
            if (half_w > 0 && rect_contains(bar, p)) paint(acc, style.colors.break_bar);
            paint(acc, style.colors.text, text_alpha_centered(p, label_center, style.text_height, label));
        }
    };
};

// progress arc around the playfield centre while a spinner is active
export const spinner_region = (ctx: IFrameContext): IHudRegion | null => {
    const { frame, style, now } = ctx;
    const span = frame.spinner_time;
    if (!span || now < span[0] || now > span[1]) return null;

    const pf = frame.playfield_rect;
    const center: Vec2 = [(pf[0] + pf[2]) / 2, (pf[1] + pf[3]) / 2];
    const radius = style.spinner_indicator_radius;
    const sweep = spinner_progress(now, span) * TAU;

    return {
        name: "spinner_indicator",
        rect: rect_around(center, radius + ARC_THICKNESS_PX),
        hitbox: null,
        paint: (p: Vec2, acc: ColorAccumulator) => {
            paint(acc, style.colors.spinner_indicator, arc_alpha(p, center, radius, ARC_THICKNESS_PX, 0, sweep));
        }
    };
};
