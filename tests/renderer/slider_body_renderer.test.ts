import { describe, it, expect, jest, afterEach } from "@jest/globals";
import type { PremultipliedRGBA } from "../../src/types/color";
import { over_premultiplied } from "../../src/renderer/compositor";
import type { IFrameInput } from "../../src/types/frame";
import { expected_box_count, pack_slider_boxes, type IPathPoint } from "../../src/renderer/standard/slider_boxes";
import { slider_band, slider_border_color, slider_radii, SliderBodyRenderer } from "../../src/renderer/standard/slider_body_renderer";
import { make_context, make_frame_state, make_input, make_object, make_slider_attributes } from "../helpers/fixtures";

const expect_close = (actual: PremultipliedRGBA | null, expected: readonly number[]): void => {
    expect(actual).not.toBeNull();
    (actual ?? []).forEach((v, i) => expect(v).toBeCloseTo(expected[i], 6));
};

// L-shaped slider: right along y = 100, then down along x = 200
const L_PATH: IPathPoint[] = [
    { position: [100, 100], progress: 0 },
    { position: [200, 100], progress: 0.5 },
    { position: [200, 200], progress: 1 }
];

const make_l_slider = (time_ms: number, max_per_box: number = 1024): IFrameInput => {
    // outer radius 40 plus one unit of smoothing
    const packed = pack_slider_boxes(L_PATH, 41, 0, 0, max_per_box);
    return make_input({
        frame: make_frame_state({ time_ms }),
        objects: [make_object({ center: [100, 100], slider: make_slider_attributes() })],
        slider_segments: packed.segments,
        slider_boxes: packed.boxes,
        slider_draw_indices: [0]
    });
};

describe("pack_slider_boxes", () => {
    const path: IPathPoint[] = [0, 1, 2, 3, 4].map((i) => ({ position: [i * 10, 0], progress: i / 4 }));

    it("splits long paths into runs of at most max segments", () => {
        const packed = pack_slider_boxes(path, 5, 2, 7, 3);

        expect(packed.segments).toHaveLength(4);
        expect(packed.boxes.map((b) => [b.segment_start, b.segment_count])).toEqual([
            [7, 3],
            [10, 1]
        ]);
        expect(packed.boxes.every((b) => b.object_index === 2)).toBe(true);
    });

    it("pads each box by the margin", () => {
        const packed = pack_slider_boxes(path, 5, 0, 0, 3);
        expect(packed.boxes[0].min).toEqual([-5, -5]);
        expect(packed.boxes[0].max).toEqual([35, 5]);
        expect(packed.boxes[1].min).toEqual([25, -5]);
        expect(packed.boxes[1].max).toEqual([45, 5]);
    });

    it("keeps a single point as one degenerate segment", () => {
        const packed = pack_slider_boxes([{ position: [3, 4], progress: 0 }], 1, 0, 0, 8);
        expect(packed.segments).toEqual([{ p0: [3, 4], p1: [3, 4], progress0: 0, progress1: 0 }]);
        expect(packed.boxes).toHaveLength(1);
    });

    it("agrees with the expected box count", () => {
        expect(expected_box_count(0, 1024)).toBe(0);
        expect(expected_box_count(1024, 1024)).toBe(1);
        expect(expected_box_count(1025, 1024)).toBe(2);
        expect(expected_box_count(4, 3)).toBe(pack_slider_boxes(path, 5, 0, 0, 3).boxes.length);
    });
});

describe("slider bands", () => {
    const radii = slider_radii(32, make_frame_state());

    it("derives radii from the border thicknesses", () => {
        expect(radii).toEqual({ inner: 28, base: 32, outer: 40 });
    });

    it("fills the centre and borders the edge", () => {
        expect(slider_band(0, radii, 1)).toEqual({ fill: 1, inner_border: 0, outer_border: 0 });
        expect(slider_band(30, radii, 1)).toEqual({ fill: 0, inner_border: 1, outer_border: 0 });
        expect(slider_band(36, radii, 1)).toEqual({ fill: 0, inner_border: 0, outer_border: 1 });
        expect(slider_band(50, radii, 1)).toEqual({ fill: 0, inner_border: 0, outer_border: 0 });
    });

    it("splits the base edge evenly without an outer border", () => {
        const flat = slider_radii(32, make_frame_state({ slider_border_outer_thickness: 0 }));
        expect(slider_band(32, flat, 1)).toEqual({ fill: 0, inner_border: 0.5, outer_border: 0 });
    });

    it("blends the border colour by path progress", () => {
        const [r, g, b] = slider_border_color(0.75, make_slider_attributes());
        expect(r).toBeCloseTo(0.25);
        expect(g).toBe(0);
        expect(b).toBeCloseTo(0.75);
    });
});

describe("SliderBodyRenderer", () => {
    const renderer = new SliderBodyRenderer();

    afterEach(() => {
        jest.restoreAllMocks();
    });

    it("fills the corner of an L with the ridge colour", () => {
        const ctx = make_context(make_l_slider(1500));
        const [inst] = renderer.prepare(ctx);
        // beatmap (200, 100)
        expect_close(renderer.shade([264, 156], inst, ctx), [0.8, 0.8, 0.8, 1]);
    });

    it("colours the inner border by progress", () => {
        const ctx = make_context(make_l_slider(1500));
        const [inst] = renderer.prepare(ctx);
        // beatmap (230, 150): 30 units right of the second leg's midpoint
        expect_close(renderer.shade([294, 206], inst, ctx), [0.25, 0, 0.75, 1]);
    });

    it("fades linearly after the slider ends", () => {
        const ctx = make_context(make_l_slider(2125));
        const [inst] = renderer.prepare(ctx);
        expect_close(renderer.shade([294, 206], inst, ctx), [0.125, 0, 0.375, 0.5]);
    });

    it("returns nothing beyond the outer border", () => {
        const ctx = make_context(make_l_slider(1500));
        const [inst] = renderer.prepare(ctx);
        // beatmap (150, 150): 50 units from both legs
        expect(renderer.shade([214, 206], inst, ctx)).toBeNull();
    });

    it("expands the box quad by the smoothing width", () => {
        const ctx = make_context(make_l_slider(1500));
        const [inst] = renderer.prepare(ctx);
        expect(inst.quad).toEqual([64 + 59 - 1, 56 + 59 - 1, 64 + 241 + 1, 56 + 241 + 1]);
    });

    it("warns and clamps boxes over the segment limit", () => {
        const warn = jest.spyOn(console, "warn").mockImplementation(() => undefined);
        const ctx = make_context(make_l_slider(1500), { max_segments_per_box: 1 });
        const [inst] = renderer.prepare(ctx);

        expect(inst.segment_count).toBe(1);
        expect(warn).toHaveBeenCalledWith(expect.stringContaining("[SliderBodyRenderer]"));
    });

    it("skips sliders that have faded out", () => {
        expect(renderer.prepare(make_context(make_l_slider(3000)))).toHaveLength(0);
    });
});

describe("SliderBodyRenderer with several boxes", () => {
    const renderer = new SliderBodyRenderer();

    // every prepared box composited over one pixel, in order
    const composite = (input: IFrameInput, pixel: [number, number], max_per_box: number): PremultipliedRGBA => {
        const ctx = make_context(input, { max_segments_per_box: max_per_box });
        return renderer.prepare(ctx).reduce<PremultipliedRGBA>((dst, inst) => {
            const src = renderer.shade(pixel, inst, ctx);
            return src ? over_premultiplied(dst, src) : dst;
        }, [0, 0, 0, 0]);
    };

    it("shades a shared vertex once while fading", () => {
        // half way through the fade-out, at the corner of the L
        const single = composite(make_l_slider(2125), [264, 156], 1024);
        const split = composite(make_l_slider(2125, 1), [264, 156], 1);

        expect_close(single, [0.4, 0.4, 0.4, 0.5]);
        expect_close(split, [0.4, 0.4, 0.4, 0.5]);
    });

    it("leaves a tied pixel to the lower box and a nearer one to its owner", () => {
        const ctx = make_context(make_l_slider(2125, 1), { max_segments_per_box: 1 });
        const [first, second] = renderer.prepare(ctx);

        expect(renderer.shade([264, 156], first, ctx)).not.toBeNull();
        expect(renderer.shade([264, 156], second, ctx)).toBeNull();

        // beatmap (190, 120): 20 units from the first leg, 10 from the second
        expect(renderer.shade([254, 176], first, ctx)).toBeNull();
        expect(renderer.shade([254, 176], second, ctx)).not.toBeNull();
        expect(composite(make_l_slider(2125, 1), [254, 176], 1)[3]).toBeCloseTo(0.5, 6);
    });

    it("tests every box of a slider against the same off-bounds reference", () => {
        // long first leg off the left of the screen, short second leg on the playfield
        const path: IPathPoint[] = [
            { position: [-250, 100], progress: 0 },
            { position: [-50, 100], progress: 0.5 },
            { position: [100, 100], progress: 1 }
        ];
        const packed = pack_slider_boxes(path, 41, 0, 0, 1);
        const input = make_input({
            frame: make_frame_state({ time_ms: 1500 }),
            objects: [make_object({ center: [-250, 100], slider: make_slider_attributes() })],
            slider_segments: packed.segments,
            slider_boxes: packed.boxes,
            slider_draw_indices: [0]
        });
        const ctx = make_context(input, { max_segments_per_box: 1 });
        const [first, second] = renderer.prepare(ctx);

        // union of both boxes is x in [-291, 141], centred on beatmap x = -75
        expect(first.center).toEqual([-11, 156]);
        expect(second.center).toEqual([-11, 156]);

        // beatmap (-45, 100) is on the second leg's ridge, just left of the playfield
        expect_close(renderer.shade([19, 156], second, ctx), [0.2, 0.2, 0.2, 0.5]);
    });
});
