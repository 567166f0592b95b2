import type { Vec2 } from "../../math/vector2";
import { rect_contains } from "../../math/coordinates";
import type { RGBA } from "../../types/color";
import type { IFrameState } from "../../types/frame";

// recolours only when the pixel AND the object centre share the outside region,
// so the edges of objects that are mostly on screen keep their colour
export const offscreen_tint = (pixel: Vec2, center: Vec2, frame: IFrameState): RGBA | null => {
    if (!rect_contains(frame.osu_rect, pixel) && !rect_contains(frame.osu_rect, center)) {
        return frame.colors.offscreen_osu_tint_rgba;
    }

    if (!rect_contains(frame.playfield_rect, pixel) && !rect_contains(frame.playfield_rect, center)) {
        return frame.colors.offscreen_playfield_tint_rgba;
    }

    return null;
};
