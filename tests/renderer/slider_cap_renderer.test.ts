import { describe, it, expect } from "@jest/globals";
import type { PremultipliedRGBA } from "../../src/types/color";
import type { ISliderAttributes } from "../../src/types/frame";
import {
    arrow_uv,
    has_end_arrow,
    has_start_arrow,
    resolve_slide_end,
    resolve_slide_target,
    SliderCapRenderer
} from "../../src/renderer/standard/slider_cap_renderer";
import { make_context, make_frame_state, make_input, make_object, make_slider_attributes } from "../helpers/fixtures";

const expect_close = (actual: PremultipliedRGBA | null, expected: readonly number[]): void => {
    expect(actual).not.toBeNull();
    (actual ?? []).forEach((v, i) => expect(v).toBeCloseTo(expected[i], 6));
};

const cap_context = (slider: Partial<ISliderAttributes>, time_ms: number = 1500) =>
    make_context(
        make_input({
            frame: make_frame_state({ time_ms }),
            objects: [make_object({ center: [100, 100], slider: make_slider_attributes(slider) })],
            slider_draw_indices: [0]
        })
    );

describe("slide parity", () => {
    it("ends odd slide counts at the tail and even ones at the head", () => {
        expect([1, 2, 3, 4].map(resolve_slide_end)).toEqual(["end", "start", "end", "start"]);
    });

    it("takes the colour of the endpoint it lands on", () => {
        const object = make_object({ center: [100, 100] });
        const once = make_slider_attributes({ slides: 1 });
        const twice = make_slider_attributes({ slides: 2 });

        expect(resolve_slide_target(object, once)).toEqual({ endpoint: "end", position: [200, 200], color: [0, 0, 1] });
        expect(resolve_slide_target(object, twice)).toEqual({ endpoint: "start", position: [100, 100], color: [1, 0, 0] });
    });

    it("adds reverse arrows with each repeat", () => {
        expect([1, 2, 3].map(has_end_arrow)).toEqual([false, true, true]);
        expect([1, 2, 3].map(has_start_arrow)).toEqual([false, false, true]);
    });
});

describe("arrow_uv", () => {
    it("turns the sprite forward by the arrow's rotation", () => {
        // a quarter turn: the sprite's +x (the arrow head) points down the screen
        const uv = arrow_uv([0, 10], { position: [0, 0], rotation: [0, 1] }, 10);
        expect(uv[0]).toBeCloseTo(1);
        expect(uv[1]).toBeCloseTo(0.5);
    });
});

describe("SliderCapRenderer", () => {
    const renderer = new SliderCapRenderer();

    it("places arrows by slide count while the slider is running", () => {
        expect(renderer.prepare(cap_context({ slides: 1 }))[0].arrows).toHaveLength(0);
        expect(renderer.prepare(cap_context({ slides: 2 }))[0].arrows).toHaveLength(1);
        expect(renderer.prepare(cap_context({ slides: 3 }))[0].arrows).toHaveLength(2);
    });

    it("drops the arrows once the slider is over", () => {
        expect(renderer.prepare(cap_context({ slides: 3 }, 2100))[0].arrows).toHaveLength(0);
    });

    it("draws the end cap at the tail for a single slide", () => {
        const ctx = cap_context({ slides: 1 });
        const [inst] = renderer.prepare(ctx);
        // tail (200, 200) on screen is (264, 256); 0.6 radii below it
        expect_close(renderer.shade([264, 256 + 19.2], inst, ctx), [0, 0, 1, 1]);
    });

    it("draws the end cap back at the head after a repeat", () => {
        const ctx = cap_context({ slides: 2 });
        const [inst] = renderer.prepare(ctx);
        expect(inst.end_screen).toEqual([164, 156]);
        expect_close(renderer.shade([164, 156 + 19.2], inst, ctx), [1, 0, 0, 1]);
    });

    it("tints a cap that lands off screen", () => {
        // tail (-100, 200) is screen (-36, 256), beyond the osu rect
        const ctx = make_context(
            make_input({
                frame: make_frame_state({ time_ms: 1500 }),
                objects: [make_object({ center: [-100, 100], slider: make_slider_attributes({ end_center: [-100, 200] }) })],
                slider_draw_indices: [0]
            })
        );
        const [inst] = renderer.prepare(ctx);
        expect_close(renderer.shade([-36, 256 + 19.2], inst, ctx), [0, 0, 0.0625, 0.25]);
    });

    it("covers both ends with its quad", () => {
        const [inst] = renderer.prepare(cap_context({ slides: 1 }));
        expect(inst.quad).toEqual([164 - 32, 156 - 32, 264 + 32, 256 + 32]);
    });
});
