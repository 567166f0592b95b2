import type { Vec2 } from "../../math/vector2";
import { saturate, vec2_cross, vec2_sub } from "../../math/vector2";
import { rect_contains, type Rect } from "../../math/coordinates";
import type { ColorAccumulator } from "../compositor";
import type { IFrameContext } from "../frame_context";
import { paint } from "./panel";
import type { IHudRegion } from "./region";

export type PlayIcon = "play" | "pause";

export const button_circle = (rect: Rect): { center: Vec2; radius: number } => ({
    center: [(rect[0] + rect[2]) / 2, (rect[1] + rect[3]) / 2],
    radius: Math.max(0, Math.min(rect[2] - rect[0], rect[3] - rect[1]) / 2 - 2)
});

export const triangle_contains = (p: Vec2, a: Vec2, b: Vec2, c: Vec2): boolean => {
    const d1 = vec2_cross(vec2_sub(b, a), vec2_sub(p, a));
    const d2 = vec2_cross(vec2_sub(c, b), vec2_sub(p, b));
    const d3 = vec2_cross(vec2_sub(a, c), vec2_sub(p, c));
    const has_neg = d1 < 0 || d2 < 0 || d3 < 0;
    const has_pos = d1 > 0 || d2 > 0 || d3 > 0;
    return !(has_neg && has_pos);
};

// the icon shows the action a click performs
export const play_icon = (is_playing: boolean): PlayIcon => (is_playing ? "pause" : "play");

// icon coverage in a circle of `radius` around `center`
export const icon_alpha = (p: Vec2, center: Vec2, radius: number, icon: PlayIcon): number => {
    const [cx, cy] = center;

    if (icon === "play") {
        const a: Vec2 = [cx - radius * 0.3, cy - radius * 0.4];
        const b: Vec2 = [cx + radius * 0.45, cy];
        const c: Vec2 = [cx - radius * 0.3, cy + radius * 0.4];
        return triangle_contains(p, a, b, c) ? 1 : 0;
    }

    const half_w = radius * 0.1;
    const half_h = radius * 0.4;
    for (const offset of [-0.25, 0.25]) {
        const bx = cx + radius * offset;
        if (Math.abs(p[0] - bx) <= half_w && Math.abs(p[1] - cy) <= half_h) return 1;
    }
    return 0;
};

export const play_button_region = (ctx: IFrameContext): IHudRegion => {
    const { frame, style } = ctx;
    const rect = frame.hud.play_pause_rect;
    const { center, radius } = button_circle(rect);
    const hovered = frame.cursor_pos !== null && Math.hypot(frame.cursor_pos[0] - center[0], frame.cursor_pos[1] - center[1]) <= radius;
    const icon = play_icon(frame.is_playing);

    return {
        name: "play_pause",
        rect,
        hitbox: rect,
        paint: (p: Vec2, acc: ColorAccumulator) => {
            if (!rect_contains(rect, p)) return;

            const d = Math.hypot(p[0] - center[0], p[1] - center[1]);
            paint(acc, hovered ? style.colors.button_fill_hovered : style.colors.button_fill, saturate(radius - d + 0.5));
            paint(acc, style.colors.button_icon, icon_alpha(p, center, radius, icon));
        }
    };
};
