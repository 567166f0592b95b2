import type { Vec2 } from "../../math/vector2";
import { saturate } from "../../math/vector2";
import { point_segment_distance } from "../../math/distance";
import type { RGBA } from "../../types/color";
import type { ITimelinePointRecord, SelectionPalette } from "../../types/frame";
import { TimelinePointFlag } from "../../types/frame";
import type { IHudStyle } from "../../skin/skin_config";
import type { ColorAccumulator } from "../compositor";
import { paint } from "./panel";

// slide end and repeat markers are drawn smaller than the head
export const TAIL_MARKER_SCALE = 0.6;

export interface ITimelineGroup {
    // inclusive range into the point array
    start_index: number;
    end_index: number;
    selected: boolean;
    // 0 left, 1 right, null when unselected
    side: 0 | 1 | null;
    // draws a body between the first and the last point
    has_body: boolean;
}

export interface ITimelineGroupShading {
    points: readonly ITimelinePointRecord[];
    groups: readonly ITimelineGroup[];
    time_to_x: (time: number) => number;
    circle_radius_px: number;
    outline_px: number;
    palette: SelectionPalette;
    style: IHudStyle;
}

const SELECTION_MASK = TimelinePointFlag.Selected | TimelinePointFlag.SelectedRight;

const has_flag = (point: ITimelinePointRecord, flag: TimelinePointFlag): boolean => (point.flags & flag) !== 0;

const same_selection = (a: ITimelinePointRecord, b: ITimelinePointRecord): boolean => (a.flags & SELECTION_MASK) === (b.flags & SELECTION_MASK);

const point_side = (point: ITimelinePointRecord): 0 | 1 | null => {
    if (!has_flag(point, TimelinePointFlag.Selected)) return null;
    return has_flag(point, TimelinePointFlag.SelectedRight) ? 1 : 0;
};

const make_group = (points: readonly ITimelinePointRecord[], start: number, end: number): ITimelineGroup => {
    const head = points[start];
    return {
        start_index: start,
        end_index: end,
        selected: has_flag(head, TimelinePointFlag.Selected),
        side: point_side(head),
        has_body: end > start && has_flag(head, TimelinePointFlag.SliderOrSpinner)
    };
};

// start -> repeat* -> end chains that keep one selection state; anything that
// breaks a chain closes the group at the last point that still fit
export const group_timeline_points = (points: readonly ITimelinePointRecord[]): ITimelineGroup[] => {
    const groups: ITimelineGroup[] = [];
    let i = 0;

    while (i < points.length) {
        const start = i;
        i++;

        if (has_flag(points[start], TimelinePointFlag.SlideStart)) {
            while (i < points.length && same_selection(points[start], points[i])) {
                const p = points[i];
                if (has_flag(p, TimelinePointFlag.SlideEnd)) {
                    i++;
                    break;
                }
                if (!has_flag(p, TimelinePointFlag.SlideRepeat)) break;
                i++;
            }
        }

        groups.push(make_group(points, start, i - 1));
    }

    return groups;
};

const disc = (d: number, radius: number): number => saturate(radius - d + 0.5);

const ring = (d: number, radius: number, width: number): number => saturate(width / 2 - Math.abs(d - radius) + 0.5);

const marker_colors = (point: ITimelinePointRecord, style: IHudStyle): { body: RGBA; overlay: RGBA } => {
    if (has_flag(point, TimelinePointFlag.SliderOrSpinner)) {
        return { body: style.colors.timeline_slider_head_body, overlay: style.colors.timeline_slider_head_overlay };
    }
    return { body: style.colors.timeline_circle_head_body, overlay: style.colors.timeline_circle_head_overlay };
};

const shade_marker = (acc: ColorAccumulator, pixel: Vec2, point: ITimelinePointRecord, shading: ITimelineGroupShading, head: boolean): void => {
    const center: Vec2 = [shading.time_to_x(point.time), point.center_y];
    const scale = head ? 1 : TAIL_MARKER_SCALE;
    const radius = shading.circle_radius_px * point.radius_mult * scale;
    const d = Math.hypot(pixel[0] - center[0], pixel[1] - center[1]);
    if (d > radius + shading.outline_px + 1) return;

    const colors = marker_colors(point, shading.style);
    if (head) {
        // the head body is tinted by the combo colour, the overlay ring is not
        const body: RGBA = [colors.body[0] * point.color[0], colors.body[1] * point.color[1], colors.body[2] * point.color[2], colors.body[3] * point.color[3]];
        paint(acc, body, disc(d, radius));
        paint(acc, colors.overlay, ring(d, radius, shading.outline_px));
    } else {
        paint(acc, colors.body, disc(d, radius));
    }
};

const shade_group = (acc: ColorAccumulator, pixel: Vec2, group: ITimelineGroup, shading: ITimelineGroupShading): void => {
    const { points, style } = shading;
    const head = points[group.start_index];
    const tail = points[group.end_index];
    const radius = shading.circle_radius_px * head.radius_mult;
    const outline = shading.outline_px;

    const a: Vec2 = [shading.time_to_x(head.time), head.center_y];
    const b: Vec2 = [shading.time_to_x(tail.time), head.center_y];
    const d = point_segment_distance(pixel, a, b).distance;

    // skip pixels beyond the selection ring
    if (d > radius + outline * 2 + 1) return;

    if (group.side !== null) {
        paint(acc, shading.palette[group.side].selection_border, ring(d, radius + outline, outline * 2));
    }

    if (group.has_body) {
        paint(acc, head.color, disc(d, radius - outline));
        paint(acc, style.colors.timeline_slider_outline, ring(d, radius - outline / 2, outline));
    }

    // back to front: ends, then repeats, then the head
    for (let i = group.end_index; i > group.start_index; i--) {
        const p = points[i];
        if (has_flag(p, TimelinePointFlag.SlideEnd) && group.has_body) shade_marker(acc, pixel, p, shading, false);
    }
    for (let i = group.end_index; i > group.start_index; i--) {
        const p = points[i];
        if (has_flag(p, TimelinePointFlag.SlideRepeat)) shade_marker(acc, pixel, p, shading, false);
    }
    shade_marker(acc, pixel, head, shading, true);
};

// later groups first so the earliest (most current) group lands on top
export const shade_timeline_groups = (acc: ColorAccumulator, pixel: Vec2, shading: ITimelineGroupShading): void => {
    for (let g = shading.groups.length - 1; g >= 0; g--) {
        shade_group(acc, pixel, shading.groups[g], shading);
    }
};
