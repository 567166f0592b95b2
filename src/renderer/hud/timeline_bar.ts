import type { Vec2 } from "../../math/vector2";
import { EPSILON, saturate } from "../../math/vector2";
import { rect_contains, type Rect } from "../../math/coordinates";
import type { RGBA } from "../../types/color";
import type { ITimelineMarkRecord } from "../../types/frame";
import { ColorAccumulator } from "../compositor";
import type { IFrameContext } from "../frame_context";
import { format_duration, text_alpha, text_alpha_right } from "../text";
import { is_hovered, paint, PANEL_PADDING } from "./panel";
import type { IHudRegion } from "./region";

export const CURSOR_WIDTH_PX = 2;
// brightening of the track while the pointer is over the hitbox
export const HOVER_LIGHTEN = 0.08;

export type TimeToX = (time: number) => number;

export const make_time_to_x = (rect: Rect, t0: number, t1: number): TimeToX => {
    const span = Math.max(t1 - t0, EPSILON);
    return (time: number) => rect[0] + ((time - t0) / span) * (rect[2] - rect[0]);
};

export const in_column = (x: number, column_x: number, width: number = 1): boolean => x >= column_x - width / 2 && x < column_x + width / 2;

// tints [start, end] intervals; zero-length intervals draw nothing
export const paint_intervals = (acc: ColorAccumulator, x: number, marks: readonly ITimelineMarkRecord[], time_to_x: TimeToX, color: RGBA): void => {
    for (const mark of marks) {
        if (x >= time_to_x(mark.start) && x < time_to_x(mark.end)) {
            paint(acc, color);
            return;
        }
    }
};

// one pixel wide ticks at each mark's start time
export const paint_ticks = (acc: ColorAccumulator, x: number, marks: readonly ITimelineMarkRecord[], time_to_x: TimeToX, color: RGBA): void => {
    for (const mark of marks) {
        if (Math.floor(x) === Math.floor(time_to_x(mark.start))) {
            paint(acc, color);
            return;
        }
    }
};

export const apply_past_tint = (acc: ColorAccumulator, grayscale: number, tint: RGBA): void => {
    acc.desaturate(saturate(grayscale));
    acc.tint(tint);
};

export const song_progress = (time_ms: number, total_ms: number): number => saturate(time_ms / Math.max(total_ms, EPSILON));

export const timeline_bar_region = (ctx: IFrameContext): IHudRegion => {
    const { frame, style, input } = ctx;
    const layout = frame.timeline;
    const rect = layout.bar_rect;
    const time_to_x = make_time_to_x(rect, 0, frame.song_total_ms);
    const cursor_x = rect[0] + (rect[2] - rect[0]) * song_progress(frame.time_ms, frame.song_total_ms);
    const hovered = is_hovered(frame.cursor_pos, layout.bar_hitbox_rect);
    const text_y = (rect[1] + rect[3]) / 2 - style.text_height / 2;
    const elapsed = format_duration(frame.time_ms);
    const total = format_duration(frame.song_total_ms);

    const paint_bar = (p: Vec2, acc: ColorAccumulator): void => {
        if (!rect_contains(rect, p)) return;

        const bar = new ColorAccumulator();
        const track = style.colors.timeline_track;
        paint(bar, hovered ? [track[0] + (1 - track[0]) * HOVER_LIGHTEN, track[1] + (1 - track[1]) * HOVER_LIGHTEN, track[2] + (1 - track[2]) * HOVER_LIGHTEN, track[3]] : track);

        if (p[0] < cursor_x) paint(bar, style.colors.timeline_progress);

        paint_intervals(bar, p[0], input.timeline_marks.kiai, time_to_x, style.colors.timeline_kiai);
        paint_intervals(bar, p[0], input.timeline_marks.breaks, time_to_x, style.colors.timeline_break);
        paint_ticks(bar, p[0], input.timeline_marks.bookmarks, time_to_x, style.colors.timeline_bookmark);
        paint_ticks(bar, p[0], input.timeline_marks.red_lines, time_to_x, style.colors.timeline_red_line);

        if (p[0] < cursor_x) apply_past_tint(bar, layout.past_grayscale_strength, frame.colors.timeline_past_tint_rgba);

        paint(bar, style.colors.text, text_alpha(p, [rect[0] + PANEL_PADDING, text_y], style.text_height, elapsed));
        paint(bar, style.colors.text_dim, text_alpha_right(p, [rect[2] - PANEL_PADDING, text_y], style.text_height, total));

        if (in_column(p[0], cursor_x, CURSOR_WIDTH_PX)) paint(bar, style.colors.timeline_cursor);

        acc.over_premultiplied(bar.to_premultiplied());
    };

    return { name: "timeline_bar", rect, hitbox: layout.bar_hitbox_rect, paint: paint_bar };
};
