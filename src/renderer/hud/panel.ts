import type { Vec2 } from "../../math/vector2";
import { saturate } from "../../math/vector2";
import { rect_contains, rect_expand, type Rect } from "../../math/coordinates";
import type { RGBA } from "../../types/color";
import type { IHudStyle } from "../../skin/skin_config";
import type { ColorAccumulator } from "../compositor";
import { text_alpha, text_alpha_right } from "../text";

export const PANEL_PADDING = 8;
// extra vertical space between text rows
export const ROW_GAP = 6;

export const row_height = (style: IHudStyle): number => style.text_height + ROW_GAP;

export const paint = (acc: ColorAccumulator, color: RGBA, coverage: number = 1): void => {
    if (coverage <= 0) return;
    acc.over([color[0], color[1], color[2], color[3] * saturate(coverage)]);
};

export const in_border = (p: Vec2, rect: Rect, width: number = 1): boolean => rect_contains(rect, p) && !rect_contains(rect_expand(rect, -width), p);

export const is_hovered = (cursor: Vec2 | null, rect: Rect): boolean => cursor !== null && rect_contains(rect, cursor);

// two-tone panel: fill inside, 1px border on the edge; null outside the rect
export const panel_color = (p: Vec2, rect: Rect, fill: RGBA, border: RGBA): RGBA | null => {
    if (!rect_contains(rect, p)) return null;
    return in_border(p, rect) ? border : fill;
};

export const draw_panel = (acc: ColorAccumulator, p: Vec2, rect: Rect, style: IHudStyle, hovered: boolean = false, border?: RGBA): void => {
    const fill = hovered ? style.colors.panel_fill_hovered : style.colors.panel_fill;
    const edge = border ?? (hovered ? style.colors.panel_border_hovered : style.colors.panel_border);
    const color = panel_color(p, rect, fill, edge);
    if (color) paint(acc, color);
};

// left `fraction` of the rect interior
export const fill_bar = (p: Vec2, rect: Rect, fraction: number, color: RGBA): RGBA | null => {
    const x1 = rect[0] + (rect[2] - rect[0]) * saturate(fraction);
    if (p[0] < rect[0] || p[0] >= x1 || p[1] < rect[1] || p[1] >= rect[3]) return null;
    return color;
};

// label on the left, value right-aligned, vertically centred on the row
export const region_text = (p: Vec2, rect: Rect, row_y: number, label: string, value: string, style: IHudStyle): { label: number; value: number } => {
    const h = style.text_height;
    return {
        label: text_alpha(p, [rect[0] + PANEL_PADDING, row_y], h, label),
        value: text_alpha_right(p, [rect[2] - PANEL_PADDING, row_y], h, value)
    };
};

export interface IPanelRow {
    label: string;
    value: string;
}

// rows of label/value pairs starting one padding below the top edge
export const draw_rows = (acc: ColorAccumulator, p: Vec2, rect: Rect, rows: readonly IPanelRow[], style: IHudStyle, value_color?: RGBA): void => {
    const step = row_height(style);
    const index = Math.floor((p[1] - rect[1] - PANEL_PADDING) / step);
    if (index < 0 || index >= rows.length) return;

    const row = rows[index];
    const text = region_text(p, rect, rect[1] + PANEL_PADDING + index * step, row.label, row.value, style);
    paint(acc, style.colors.label, text.label);
    paint(acc, value_color ?? style.colors.text, text.value);
};
