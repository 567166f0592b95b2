import type { Vec2 } from "../../math/vector2";
import { rect_contains } from "../../math/coordinates";
import { ColorAccumulator } from "../compositor";
import type { IFrameContext } from "../frame_context";
import { draw_panel, is_hovered, paint } from "./panel";
import type { IHudRegion } from "./region";
import { apply_past_tint, CURSOR_WIDTH_PX, in_column, make_time_to_x, paint_intervals, paint_ticks } from "./timeline_bar";
import { group_timeline_points, shade_timeline_groups, type ITimelineGroupShading } from "./timeline_groups";

// scrolling timeline above the playfield: marks and object groups around the current time
export const object_timeline_region = (ctx: IFrameContext): IHudRegion => {
    const { frame, style, input } = ctx;
    const layout = frame.timeline;
    const rect = layout.object_rect;
    const time_to_x = make_time_to_x(rect, layout.window_ms[0], layout.window_ms[1]);
    const cursor_x = time_to_x(frame.time_ms);
    const hovered = is_hovered(frame.cursor_pos, layout.object_hitbox_rect);

    const shading: ITimelineGroupShading = {
        points: input.timeline_points,
        groups: group_timeline_points(input.timeline_points),
        time_to_x,
        circle_radius_px: layout.circle_radius_px,
        outline_px: layout.outline_px,
        palette: input.palette,
        style
    };

    const paint_timeline = (p: Vec2, acc: ColorAccumulator): void => {
        if (!rect_contains(rect, p)) return;
        const past = p[0] < cursor_x;

        const background = new ColorAccumulator();
        draw_panel(background, p, rect, style, hovered);
        paint_intervals(background, p[0], input.timeline_marks.kiai, time_to_x, style.colors.timeline_kiai);
        paint_intervals(background, p[0], input.timeline_marks.breaks, time_to_x, style.colors.timeline_break);
        paint_ticks(background, p[0], input.timeline_marks.bookmarks, time_to_x, style.colors.timeline_bookmark);
        paint_ticks(background, p[0], input.timeline_marks.red_lines, time_to_x, style.colors.timeline_red_line);
        if (past) apply_past_tint(background, layout.past_grayscale_strength, frame.colors.timeline_past_tint_rgba);

        const objects = new ColorAccumulator();
        shade_timeline_groups(objects, p, shading);
        if (past) apply_past_tint(objects, layout.past_grayscale_strength, frame.colors.timeline_past_object_tint_rgba);

        acc.over_premultiplied(background.to_premultiplied());
        acc.over_premultiplied(objects.to_premultiplied());

        if (in_column(p[0], cursor_x, CURSOR_WIDTH_PX)) paint(acc, style.colors.timeline_cursor);
    };

    return { name: "object_timeline", rect, hitbox: layout.object_hitbox_rect, paint: paint_timeline };
};
