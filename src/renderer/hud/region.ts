import type { Vec2 } from "../../math/vector2";
import type { Rect } from "../../math/coordinates";
import type { ColorAccumulator } from "../compositor";

export interface IHudRegion {
    name: string;
    // drawn area
    rect: Rect;
    // pointer area, null for regions that never take input
    hitbox: Rect | null;
    paint(pixel: Vec2, acc: ColorAccumulator): void;
}
