import type { Vec2 } from "../../math/vector2";
import { saturate } from "../../math/vector2";
import { rect_contains, rect_expand, type Rect } from "../../math/coordinates";
import { quad_signed_distance } from "../../math/distance";
import type { RGBA } from "../../types/color";
import type { ISelectionColors, ISelectionSide } from "../../types/frame";
import type { ColorAccumulator } from "../compositor";
import type { IFrameContext } from "../frame_context";
import { in_border, paint } from "./panel";
import type { IHudRegion } from "./region";

// marquee interior opacity relative to its border
export const DRAG_FILL_OPACITY = 0.2;
// glow reaches this multiple of the origin ring radius
export const ORIGIN_GLOW_EXTENT = 1.8;
export const ORIGIN_DOT_RADIUS = 2.5;

export const border_color = (side: ISelectionSide, colors: ISelectionColors): RGBA => {
    if (side.dragging) return colors.selection_border_dragging;
    if (side.hovered) return colors.selection_border_hovered;
    return colors.selection_border;
};

export const tint_color = (side: ISelectionSide, colors: ISelectionColors): RGBA => {
    if (side.dragging) return colors.selection_tint_dragging;
    if (side.hovered) return colors.selection_tint_hovered;
    return colors.selection_tint;
};

export const origin_color = (side: ISelectionSide, colors: ISelectionColors): RGBA => {
    if (side.locked) return colors.selection_origin_locked;
    if (side.origin_dragging) return colors.selection_origin_clicked;
    if (side.origin_hovered) return colors.selection_origin_hovered;
    return colors.selection_origin;
};

// stroke straddling the quad edges, width in pixels
export const quad_stroke_alpha = (sd: number, width: number): number => saturate(width / 2 - Math.abs(sd) + 0.5);

export const selection_bounds = (side: ISelectionSide, ring_radius: number): Rect => {
    const xs = side.quad.map((c) => c[0]).concat([side.origin[0] - ring_radius, side.origin[0] + ring_radius]);
    const ys = side.quad.map((c) => c[1]).concat([side.origin[1] - ring_radius, side.origin[1] + ring_radius]);

    if (side.drag_rect) {
        xs.push(side.drag_rect[0], side.drag_rect[2]);
        ys.push(side.drag_rect[1], side.drag_rect[3]);
    }

    return rect_expand([Math.min(...xs), Math.min(...ys), Math.max(...xs), Math.max(...ys)], ring_radius * ORIGIN_GLOW_EXTENT);
};

export const paint_origin = (acc: ColorAccumulator, p: Vec2, origin: Vec2, radius: number, color: RGBA): void => {
    const d = Math.hypot(p[0] - origin[0], p[1] - origin[1]);
    const glow_radius = radius * ORIGIN_GLOW_EXTENT;

    // glow, ring, then the centre dot
    if (d < glow_radius) paint(acc, color, 0.35 * (1 - d / glow_radius));
    paint(acc, color, saturate(1 - Math.abs(d - radius) + 0.5));
    paint(acc, color, saturate(ORIGIN_DOT_RADIUS - d + 0.5));
};

export const selection_overlay_region = (ctx: IFrameContext, index: 0 | 1): IHudRegion | null => {
    const { frame, style, input } = ctx;
    const side = frame.selections[index];
    if (!side.exists) return null;

    const colors = input.palette[index];
    const ring_radius = style.origin_ring_radius;
    const has_objects = side.object_count > 0;

    return {
        name: index === 0 ? "selection_left" : "selection_right",
        rect: selection_bounds(side, ring_radius),
        hitbox: null,
        paint: (p: Vec2, acc: ColorAccumulator) => {
            if (has_objects) {
                const sd = quad_signed_distance(p, side.quad);
                if (sd < 0) paint(acc, tint_color(side, colors));
                paint(acc, border_color(side, colors), quad_stroke_alpha(sd, style.selection_border_px));
            }

            if (side.drag_rect && rect_contains(side.drag_rect, p)) {
                const drag = colors.drag_rectangle;
                paint(acc, drag, in_border(p, side.drag_rect) ? 1 : DRAG_FILL_OPACITY);
            }

            if (has_objects) paint_origin(acc, p, side.origin, ring_radius, origin_color(side, colors));
        }
    };
};
