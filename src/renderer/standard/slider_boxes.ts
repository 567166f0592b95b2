import type { Vec2 } from "../../math/vector2";
import type { ISliderBoxRecord, ISliderSegmentRecord } from "../../types/frame";

export interface IPathPoint {
    position: Vec2;
    // 0 at the head, 1 at the tail
    progress: number;
}

export interface IPackedSlider {
    segments: ISliderSegmentRecord[];
    boxes: ISliderBoxRecord[];
}

export const expected_box_count = (segment_count: number, max_per_box: number): number => Math.ceil(segment_count / Math.max(1, max_per_box));

const path_to_segments = (path: readonly IPathPoint[]): ISliderSegmentRecord[] => {
    if (path.length === 0) return [];

    // a single point still needs one (degenerate) segment to draw a capsule around
    if (path.length === 1) {
        const p = path[0];
        return [{ p0: p.position, p1: p.position, progress0: p.progress, progress1: p.progress }];
    }

    const segments: ISliderSegmentRecord[] = [];
    for (let i = 1; i < path.length; i++) {
        segments.push({
            p0: path[i - 1].position,
            p1: path[i].position,
            progress0: path[i - 1].progress,
            progress1: path[i].progress
        });
    }
    return segments;
};

const segment_bounds = (segments: readonly ISliderSegmentRecord[], margin: number): [Vec2, Vec2] => {
    let min: Vec2 = [Infinity, Infinity];
    let max: Vec2 = [-Infinity, -Infinity];

    for (const s of segments) {
        min = [Math.min(min[0], s.p0[0], s.p1[0]), Math.min(min[1], s.p0[1], s.p1[1])];
        max = [Math.max(max[0], s.p0[0], s.p1[0]), Math.max(max[1], s.p0[1], s.p1[1])];
    }

    return [
        [min[0] - margin, min[1] - margin],
        [max[0] + margin, max[1] + margin]
    ];
};

// splits a progress-annotated polyline into runs of at most max_per_box segments,
// each box covering its run plus the stroke margin. segment_offset is where the
// returned segments will start in the shared segment array.
export const pack_slider_boxes = (
    path: readonly IPathPoint[],
    margin: number,
    object_index: number,
    segment_offset: number,
    max_per_box: number
): IPackedSlider => {
    const segments = path_to_segments(path);
    const per_box = Math.max(1, Math.floor(max_per_box));
    const boxes: ISliderBoxRecord[] = [];

    for (let start = 0; start < segments.length; start += per_box) {
        const run = segments.slice(start, start + per_box);
        const [min, max] = segment_bounds(run, margin);
        boxes.push({
            min,
            max,
            segment_start: segment_offset + start,
            segment_count: run.length,
            object_index
        });
    }

    return { segments, boxes };
};
