import type { IFrameInput } from "../types/frame";
import { TimelinePointFlag } from "../types/frame";
import { ErrorCode, err, ok, type Result } from "../types/result";
import type { IRendererConfig } from "./base_renderer";
import { expected_box_count } from "./standard/slider_boxes";

const is_time = (value: number): boolean => Number.isFinite(value) && value >= 0;

const is_unit_color = (c: readonly number[]): boolean => c.every((v) => Number.isFinite(v) && v >= 0 && v <= 1);

// producer-side contract of one frame; any failure is a producer bug, not a runtime condition
export const validate_frame_input = (input: IFrameInput, config: IRendererConfig): Result<IFrameInput> => {
    const { objects, slider_segments, slider_boxes, slider_draw_indices, timeline_points, skin } = input;

    if (!is_time(input.frame.time_ms)) {
        return err(ErrorCode.NegativeTime, `frame time ${input.frame.time_ms} is not a non-negative time`);
    }

    for (let i = 0; i < objects.length; i++) {
        const obj = objects[i];

        if (!is_time(obj.time) || !is_time(obj.preempt)) {
            return err(ErrorCode.NegativeTime, `object ${i} has time ${obj.time} / preempt ${obj.preempt}`);
        }
        if (!(obj.radius >= 0)) {
            return err(ErrorCode.NegativeRadius, `object ${i} has radius ${obj.radius}`);
        }
        if (!is_unit_color(obj.color)) {
            return err(ErrorCode.InvalidColor, `object ${i} has colour channels outside [0, 1]`);
        }

        if (obj.slider) {
            if (!Number.isInteger(obj.slider.slides) || obj.slider.slides < 1) {
                return err(ErrorCode.InvalidSlides, `slider ${i} has ${obj.slider.slides} slides`);
            }
            if (!is_time(obj.slider.end_time)) {
                return err(ErrorCode.NegativeTime, `slider ${i} ends at ${obj.slider.end_time}`);
            }
        }
    }

    const segments_per_object = new Map<number, number>();
    const boxes_per_object = new Map<number, number>();

    for (let b = 0; b < slider_boxes.length; b++) {
        const box = slider_boxes[b];

        if (!Number.isInteger(box.object_index) || box.object_index < 0 || box.object_index >= objects.length) {
            return err(ErrorCode.ObjectIndexOutOfBounds, `slider box ${b} points at object ${box.object_index}`);
        }
        if (!objects[box.object_index].slider) {
            return err(ErrorCode.DrawIndexNotSlider, `slider box ${b} belongs to object ${box.object_index}, which is not a slider`);
        }
        if (box.segment_start < 0 || box.segment_count < 0 || box.segment_start + box.segment_count > slider_segments.length) {
            return err(
                ErrorCode.SegmentRangeOutOfBounds,
                `slider box ${b} covers segments [${box.segment_start}, ${box.segment_start + box.segment_count}) of ${slider_segments.length}`
            );
        }

        segments_per_object.set(box.object_index, (segments_per_object.get(box.object_index) ?? 0) + box.segment_count);
        boxes_per_object.set(box.object_index, (boxes_per_object.get(box.object_index) ?? 0) + 1);
    }

    for (const [object_index, segment_count] of segments_per_object) {
        const expected = expected_box_count(segment_count, config.max_segments_per_box);
        const actual = boxes_per_object.get(object_index) ?? 0;
        if (actual !== expected) {
            return err(ErrorCode.BoxCountMismatch, `slider ${object_index} has ${actual} boxes for ${segment_count} segments, expected ${expected}`);
        }
    }

    for (let d = 0; d < slider_draw_indices.length; d++) {
        const index = slider_draw_indices[d];
        if (!Number.isInteger(index) || index < 0 || index >= objects.length) {
            return err(ErrorCode.ObjectIndexOutOfBounds, `slider draw ${d} points at object ${index}`);
        }
        if (!objects[index].slider) {
            return err(ErrorCode.DrawIndexNotSlider, `slider draw ${d} points at object ${index}, which is not a slider`);
        }
    }

    // points come per object (start, repeats, end), so only object starts are ordered globally
    let last_start = -Infinity;
    for (let i = 0; i < timeline_points.length; i++) {
        const point = timeline_points[i];
        if (!is_time(point.time)) {
            return err(ErrorCode.NegativeTime, `timeline point ${i} has time ${point.time}`);
        }
        if ((point.flags & TimelinePointFlag.SlideStart) !== 0) {
            if (point.time < last_start) {
                return err(ErrorCode.TimelineNotSorted, `timeline point ${i} starts at ${point.time}, before ${last_start}`);
            }
            last_start = point.time;
        }
    }

    if (skin.digits.length < 10 || skin.digit_atlas.uv_xform.length < 10 || skin.digit_atlas.aspect.length < 10) {
        return err(ErrorCode.DigitAtlasIncomplete, `digit atlas holds ${skin.digits.length} layers, ${skin.digit_atlas.uv_xform.length} transforms and ${skin.digit_atlas.aspect.length} aspects`);
    }

    return ok(input);
};
