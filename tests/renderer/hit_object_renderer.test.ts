import { describe, it, expect } from "@jest/globals";
import type { Vec2 } from "../../src/math/vector2";
import type { PremultipliedRGBA } from "../../src/types/color";
import { SelectedSide, type IHitObjectRecord } from "../../src/types/frame";
import {
    approach_scale_at,
    combo_digits,
    HitObjectRenderer,
    layout_digits,
    sprite_uv,
    type IHitObjectInstance
} from "../../src/renderer/standard/hit_object_renderer";
import type { IFrameContext } from "../../src/renderer/frame_context";
import { make_context, make_frame_state, make_input, make_object, to_screen } from "../helpers/fixtures";

const expect_close = (actual: PremultipliedRGBA | null, expected: readonly number[]): void => {
    expect(actual).not.toBeNull();
    (actual ?? []).forEach((v, i) => expect(v).toBeCloseTo(expected[i], 4));
};

const renderer = new HitObjectRenderer();

const prepare_one = (object: IHitObjectRecord, time_ms: number = 1000): { inst: IHitObjectInstance; ctx: IFrameContext } => {
    const ctx = make_context(make_input({ frame: make_frame_state({ time_ms }), objects: [object] }));
    const [inst] = renderer.prepare(ctx);
    return { inst, ctx };
};

// screen pixel offset from the object's centre, in radius units
const at = (object: IHitObjectRecord, dx: number, dy: number): Vec2 => {
    const c = to_screen(object.center);
    return [c[0] + dx * object.radius, c[1] + dy * object.radius];
};

describe("combo digits", () => {
    it("keeps the last three digits", () => {
        expect(combo_digits(7)).toEqual([7]);
        expect(combo_digits(1234)).toEqual([2, 3, 4]);
        expect(combo_digits(1005)).toEqual([0, 0, 5]);
    });

    it("centres overlapping cells on the object", () => {
        const aspect = new Array<number>(10).fill(0.75);
        const cells = layout_digits(12, aspect);

        expect(cells).toHaveLength(2);
        expect(cells[0].width).toBeCloseTo(0.6);
        expect(cells[0].x0).toBeCloseTo(-0.56);
        expect(cells[1].x0).toBeCloseTo(-0.04);
        expect(cells[1].x0 + cells[1].width).toBeCloseTo(0.56);
    });
});

describe("sprite mapping", () => {
    it("shrinks a sprite into the centre of a larger quad", () => {
        expect(sprite_uv([0.5, 0.5], 3, 1)).toEqual([0.5, 0.5]);
        expect(sprite_uv([0.75, 0.5], 3, 1)).toEqual([1.25, 0.5]);
    });

    it("moves the approach circle linearly across the preempt", () => {
        const obj = make_object();
        expect(approach_scale_at(obj, 400)).toBe(3);
        expect(approach_scale_at(obj, 700)).toBe(2);
        expect(approach_scale_at(obj, 1000)).toBe(1);
        expect(approach_scale_at(obj, 1500)).toBe(1);
    });
});

describe("HitObjectRenderer", () => {
    it("skips objects that have not appeared yet", () => {
        const ctx = make_context(make_input({ frame: make_frame_state({ time_ms: 100 }), objects: [make_object()] }));
        expect(renderer.prepare(ctx)).toHaveLength(0);
    });

    it("tints the body with the combo colour", () => {
        const obj = make_object();
        const { inst, ctx } = prepare_one(obj);
        expect_close(renderer.shade(at(obj, 0, 0.6), inst, ctx), [1, 0, 0, 1]);
    });

    it("draws the combo number over the body", () => {
        const obj = make_object();
        const { inst, ctx } = prepare_one(obj);
        expect_close(renderer.shade(at(obj, 0, 0), inst, ctx), [1, 1, 1, 1]);
    });

    it("mixes selected objects toward the selection colour", () => {
        const obj = make_object({ selected_side: SelectedSide.Left });
        const { inst, ctx } = prepare_one(obj);
        expect_close(renderer.shade(at(obj, 0, 0.6), inst, ctx), [0.5, 0, 0.5, 1]);
    });

    it("draws the approach ring behind the body while approaching", () => {
        const obj = make_object();
        const { inst, ctx } = prepare_one(obj, 700);
        // approach scale 2, ring centred on 0.93 of the sprite: 1.86 radii out
        expect_close(renderer.shade(at(obj, 1.86, 0), inst, ctx), [0.75, 0, 0, 0.75]);
    });

    it("tints objects that sit outside the playfield", () => {
        const obj = make_object({ center: [-40, 192] });
        const { inst, ctx } = prepare_one(obj);
        expect_close(renderer.shade(at(obj, 0, 0.6), inst, ctx), [0.25, 0, 0, 0.5]);
    });

    it("uses the outer tint for objects beyond the screen bounds", () => {
        // centre lands on screen x = -36, outside both the playfield and the osu rect
        const obj = make_object({ center: [-100, 192] });
        const { inst, ctx } = prepare_one(obj);
        expect_close(renderer.shade(at(obj, 0, 0.6), inst, ctx), [0.0625, 0, 0, 0.25]);
    });

    it("leaves the off-playfield edge of an on-playfield object alone", () => {
        const obj = make_object({ center: [10, 192] });
        const { inst, ctx } = prepare_one(obj);
        // 24.6px left of x = 74 lands outside the playfield at x = 49.4
        expect_close(renderer.shade(at(obj, -24.6 / 32, 0), inst, ctx), [1, 0, 0, 1]);
    });

    it("returns nothing outside every sprite", () => {
        const obj = make_object();
        const { inst, ctx } = prepare_one(obj);
        expect(renderer.shade(at(obj, 2.5, 0), inst, ctx)).toBeNull();
    });
});
