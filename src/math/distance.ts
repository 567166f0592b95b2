import type { Vec2 } from "./vector2";
import { clamp, lerp, vec2_cross, vec2_dot, vec2_len, vec2_len_sq, vec2_sub, EPSILON } from "./vector2";

export interface ISegmentHit {
    distance: number;
    // projection parameter along the segment, 0 at the first point
    t: number;
}

export const point_segment_distance = (p: Vec2, a: Vec2, b: Vec2): ISegmentHit => {
    const ab = vec2_sub(b, a);
    const ap = vec2_sub(p, a);
    const len_sq = vec2_len_sq(ab);

    if (len_sq < EPSILON * EPSILON) {
        return { distance: vec2_len(ap), t: 0 };
    }

    const t = clamp(vec2_dot(ap, ab) / len_sq, 0, 1);
    const closest: Vec2 = [a[0] + ab[0] * t, a[1] + ab[1] * t];
    return { distance: vec2_len(vec2_sub(p, closest)), t };
};

export interface ISegmentLike {
    p0: Vec2;
    p1: Vec2;
    progress0: number;
    progress1: number;
}

export interface ISegmentScan {
    distance: number;
    progress: number;
    // index of the closest segment, -1 when nothing was scanned
    index: number;
}

// minimum distance over segments[start, start + count) with the path progress at the closest point
export const scan_segments = (p: Vec2, segments: readonly ISegmentLike[], start: number, count: number): ISegmentScan => {
    let best: ISegmentScan = { distance: Infinity, progress: 0, index: -1 };
    const end = Math.min(start + count, segments.length);

    for (let i = start; i < end; i++) {
        const seg = segments[i];
        const hit = point_segment_distance(p, seg.p0, seg.p1);
        if (hit.distance < best.distance) {
            best = { distance: hit.distance, progress: lerp(seg.progress0, seg.progress1, hit.t), index: i };
        }
    }

    return best;
};

// positive outside, negative inside; corners are expected in winding order
export const quad_signed_distance = (p: Vec2, corners: readonly [Vec2, Vec2, Vec2, Vec2]): number => {
    let min_edge = Infinity;
    let has_pos = false;
    let has_neg = false;

    for (let i = 0; i < 4; i++) {
        const a = corners[i];
        const b = corners[(i + 1) % 4];
        min_edge = Math.min(min_edge, point_segment_distance(p, a, b).distance);

        const cross = vec2_cross(vec2_sub(b, a), vec2_sub(p, a));
        if (cross > 1e-9) has_pos = true;
        else if (cross < -1e-9) has_neg = true;
    }

    const inside = !(has_pos && has_neg);
    return inside ? -min_edge : min_edge;
};
