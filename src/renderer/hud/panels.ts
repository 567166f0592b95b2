import type { Vec2 } from "../../math/vector2";
import { rect_contains, rect_expand, type Rect } from "../../math/coordinates";
import type { IHistoryEntry, IHistoryState, IHudStats, ISelectionSide } from "../../types/frame";
import type { IHudStyle } from "../../skin/skin_config";
import type { ColorAccumulator } from "../compositor";
import type { IFrameContext } from "../frame_context";
import { format_age, format_duration, format_fixed, format_signed_fixed } from "../text";
import { draw_panel, draw_rows, fill_bar, is_hovered, paint, PANEL_PADDING, region_text, row_height, type IPanelRow } from "./panel";
import type { IHudRegion } from "./region";

export const stats_rows = (stats: IHudStats, time_ms: number, playback_rate: number): IPanelRow[] => [
    { label: "FPS", value: format_fixed(stats.fps, 0) },
    { label: "1% LOW", value: format_fixed(stats.fps_low, 0) },
    { label: "CPU", value: format_fixed(stats.cpu_ms, 1, "MS") },
    { label: "GPU", value: format_fixed(stats.gpu_ms, 1, "MS") },
    { label: "TIME", value: format_duration(time_ms) },
    { label: "RATE", value: format_fixed(playback_rate, 2, "X") },
    { label: "OBJECTS", value: String(stats.object_count) }
];

export const stats_region = (ctx: IFrameContext): IHudRegion => {
    const { frame, style } = ctx;
    const rect = frame.hud.stats_rect;
    const rows = stats_rows(frame.stats, frame.time_ms, frame.playback_rate);

    return {
        name: "stats",
        rect,
        hitbox: rect,
        paint: (p: Vec2, acc: ColorAccumulator) => {
            if (!rect_contains(rect, p)) return;
            draw_panel(acc, p, rect, style);
            draw_rows(acc, p, rect, rows, style);
        }
    };
};

export const percent_text = (value: number): string => format_fixed(value * 100, 0, "%");

// label and value over a bar filled to `value` (0..1)
export const value_slider_region = (ctx: IFrameContext, name: string, label: string, rect: Rect, value: number): IHudRegion => {
    const { frame, style } = ctx;
    const hovered = is_hovered(frame.cursor_pos, rect);
    const inner = rect_expand(rect, -2);
    const row_y = (rect[1] + rect[3]) / 2 - style.text_height / 2;
    const value_text = percent_text(value);

    return {
        name,
        rect,
        hitbox: rect,
        paint: (p: Vec2, acc: ColorAccumulator) => {
            if (!rect_contains(rect, p)) return;
            draw_panel(acc, p, rect, style, hovered);

            if (rect_contains(inner, p)) {
                paint(acc, style.colors.bar_track);
                const fill = fill_bar(p, inner, value, style.colors.bar_fill);
                if (fill) paint(acc, fill);
            }

            const text = region_text(p, rect, row_y, label, value_text, style);
            paint(acc, style.colors.label, text.label);
            paint(acc, style.colors.text, text.value);
        }
    };
};

export const status_text = (ctx: IFrameContext): IPanelRow => {
    const { frame } = ctx;
    const state = frame.loading ? "LOADING" : frame.is_playing ? "PLAYING" : "PAUSED";
    const flags = [frame.is_kiai_time ? "KIAI" : "", frame.is_break_time ? "BREAK" : ""].filter((f) => f.length > 0).join(" ");
    return { label: state, value: flags };
};

export const status_region = (ctx: IFrameContext): IHudRegion => {
    const { frame, style } = ctx;
    const rect = frame.hud.status_rect;
    const row = status_text(ctx);
    const row_y = (rect[1] + rect[3]) / 2 - style.text_height / 2;

    return {
        name: "status",
        rect,
        hitbox: rect,
        paint: (p: Vec2, acc: ColorAccumulator) => {
            if (!rect_contains(rect, p)) return;
            draw_panel(acc, p, rect, style);
            const text = region_text(p, rect, row_y, row.label, row.value, style);
            paint(acc, style.colors.text, text.label);
            paint(acc, style.colors.timeline_kiai, text.value);
        }
    };
};

export type HistoryRowKind = "undo" | "current" | "redo";

export interface IHistoryRow {
    kind: HistoryRowKind;
    entry: IHistoryEntry;
}

// oldest visible undo at the top, then the current state, then upcoming redos
export const history_rows = (history: IHistoryState, style: IHudStyle): IHistoryRow[] => {
    const rows: IHistoryRow[] = [];
    const undo = history.undo.slice(-style.history_undo_rows);

    for (const entry of undo) rows.push({ kind: "undo", entry });
    if (history.current) rows.push({ kind: "current", entry: history.current });
    for (const entry of history.redo.slice(0, style.history_redo_rows)) rows.push({ kind: "redo", entry });

    return rows;
};

export const history_row_rect = (rect: Rect, index: number, style: IHudStyle): Rect => {
    const step = row_height(style);
    const y0 = rect[1] + PANEL_PADDING / 2 + index * step;
    return [rect[0] + 1, y0, rect[2] - 1, y0 + step];
};

export const history_region = (ctx: IFrameContext): IHudRegion => {
    const { frame, style } = ctx;
    const rect = frame.hud.history_rect;
    const rows = history_rows(frame.history, style);
    const step = row_height(style);

    return {
        name: "history",
        rect,
        hitbox: rect,
        paint: (p: Vec2, acc: ColorAccumulator) => {
            if (!rect_contains(rect, p)) return;
            draw_panel(acc, p, rect, style);

            const index = Math.floor((p[1] - rect[1] - PANEL_PADDING / 2) / step);
            if (index < 0 || index >= rows.length) return;

            const row = rows[index];
            const row_rect = history_row_rect(rect, index, style);
            if (!rect_contains(row_rect, p)) return;

            if (row.kind === "current") paint(acc, style.colors.history_current);
            else if (is_hovered(frame.cursor_pos, row_rect)) paint(acc, style.colors.panel_fill_hovered);

            const text = region_text(p, rect, row_rect[1] + (step - style.text_height) / 2, row.entry.name.toUpperCase(), format_age(row.entry.age_seconds), style);
            const color = row.kind === "redo" ? style.colors.history_redo : style.colors.text;
            paint(acc, color, text.label);
            paint(acc, style.colors.text_dim, text.value);
        }
    };
};

export const selection_detail_rows = (side: ISelectionSide): IPanelRow[] => [
    { label: "OBJECTS", value: String(side.object_count) },
    { label: "SCALE", value: format_fixed(side.scale, 2, "X") },
    { label: "ROTATE", value: format_signed_fixed(side.rotation_degrees, 1, "DEG") },
    { label: "ORIGIN", value: `${format_fixed(side.origin_playfield[0], 0)},${format_fixed(side.origin_playfield[1], 0)}` },
    { label: "MOVED", value: `${format_signed_fixed(side.moved_playfield[0], 0)},${format_signed_fixed(side.moved_playfield[1], 0)}` }
];

export const selection_detail_region = (ctx: IFrameContext, index: 0 | 1): IHudRegion | null => {
    const { frame, style, input } = ctx;
    const side = frame.selections[index];
    if (!side.exists || side.object_count <= 0) return null;

    const rect = frame.hud.selection_detail_rects[index];
    const rows = selection_detail_rows(side);
    const border = input.palette[index].selection_border;

    return {
        name: index === 0 ? "selection_detail_left" : "selection_detail_right",
        rect,
        hitbox: rect,
        paint: (p: Vec2, acc: ColorAccumulator) => {
            if (!rect_contains(rect, p)) return;
            draw_panel(acc, p, rect, style, false, border);
            draw_rows(acc, p, rect, rows, style);
        }
    };
};
