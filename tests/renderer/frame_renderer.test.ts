import { describe, it, expect, jest, afterEach } from "@jest/globals";
import type { PremultipliedRGBA } from "../../src/types/color";
import type { IFrameInput, IFrameState } from "../../src/types/frame";
import { RasterBackend } from "../../src/renderer/backend/raster_backend";
import { FrameRenderer } from "../../src/renderer/frame_renderer";
import { GREEN, make_frame_state, make_input, make_object } from "../helpers/fixtures";

const expect_close = (actual: PremultipliedRGBA, expected: readonly number[]): void => {
    actual.forEach((v, i) => expect(v).toBeCloseTo(expected[i], 5));
};

// quarter-scale screen: beatmap (x, y) lands on (16 + x / 4, 14 + y / 4), radius 32 is 8px
const small_frame = (overrides: Partial<IFrameState> = {}): IFrameState =>
    make_frame_state({
        screen_size: [160, 120],
        playfield_rect: [16, 14, 144, 110],
        osu_rect: [0, 0, 160, 120],
        hud_opacity: 0,
        ...overrides
    });

const small_input = (overrides: Partial<IFrameInput> = {}): IFrameInput => make_input({ frame: small_frame(), ...overrides });

describe("FrameRenderer", () => {
    afterEach(() => {
        jest.restoreAllMocks();
    });

    it("resizes the backend to the frame and draws the background", () => {
        const backend = new RasterBackend(1, 1);
        new FrameRenderer(backend).render_sync(small_input());

        expect([backend.width, backend.height]).toEqual([160, 120]);
        expect_close(backend.pixel(80, 60), [0.1, 0.1, 0.1, 1]);
        expect_close(backend.pixel(4, 60), [0.05, 0.05, 0.05, 1]);
    });

    it("draws hit objects over the background", () => {
        const backend = new RasterBackend(160, 120);
        new FrameRenderer(backend).render_sync(small_input({ objects: [make_object()] }));
        // object centre is (80, 62); this pixel sits on the body below the combo number
        expect_close(backend.pixel(80, 66), [1, 0, 0, 1]);
    });

    it("puts earlier objects on top of later ones", () => {
        const backend = new RasterBackend(160, 120);
        const objects = [make_object(), make_object({ color: [GREEN[0], GREEN[1], GREEN[2]], time: 1100 })];
        new FrameRenderer(backend).render_sync(small_input({ objects }));
        expect_close(backend.pixel(80, 66), [1, 0, 0, 1]);
    });

    it("throws on input that breaks the frame contract", () => {
        const renderer = new FrameRenderer(new RasterBackend(160, 120));
        expect(() => renderer.render_sync(small_input({ objects: [make_object({ radius: -1 })] }))).toThrow(/NEGATIVE_RADIUS/);
    });

    it("writes straight 8-bit colour", () => {
        const backend = new RasterBackend(160, 120);
        const frame = small_frame({ colors: { ...small_frame().colors, playfield_rgba: [0.2, 0.4, 0.6, 1] } });
        new FrameRenderer(backend).render_sync(small_input({ frame }));

        const i = (60 * 160 + 80) * 4;
        expect(Array.from(backend.to_rgba8().slice(i, i + 4))).toEqual([51, 102, 153, 255]);
    });

    it("renders in batches and resolves with the backend", async () => {
        const backend = new RasterBackend(160, 120);
        const renderer = new FrameRenderer(backend, { tiles_per_batch: 3 });

        await expect(renderer.render(small_input())).resolves.toBe(backend);
        expect_close(backend.pixel(80, 60), [0.1, 0.1, 0.1, 1]);
        expect(renderer.last_frame_ms).toBeGreaterThanOrEqual(0);
    });

    it("abandons a frame once a newer one is requested", async () => {
        const debug = jest.spyOn(console, "debug").mockImplementation(() => undefined);
        const backend = new RasterBackend(160, 120);
        const renderer = new FrameRenderer(backend, { tiles_per_batch: 4 });

        const first = renderer.render(small_input());
        const second = renderer.render(small_input());

        await expect(first).resolves.toBeNull();
        await expect(second).resolves.toBe(backend);
        expect(debug).toHaveBeenCalledWith(expect.stringContaining("[FrameRenderer]"));
    });

    it("lets a synchronous frame supersede one still rendering", async () => {
        jest.spyOn(console, "debug").mockImplementation(() => undefined);
        const backend = new RasterBackend(160, 120);
        const renderer = new FrameRenderer(backend, { tiles_per_batch: 1 });
        const red = small_frame({ colors: { ...small_frame().colors, playfield_rgba: [1, 0, 0, 1] } });
        const blue = small_frame({ colors: { ...small_frame().colors, playfield_rgba: [0, 0, 1, 1] } });

        const pending = renderer.render(small_input({ frame: red }));
        renderer.render_sync(small_input({ frame: blue }));

        await expect(pending).resolves.toBeNull();
        expect_close(backend.pixel(80, 60), [0, 0, 1, 1]);
    });

    it("splits the framebuffer by the configured tile size", () => {
        const backend = new RasterBackend(160, 120);
        new FrameRenderer(backend, { tile_size: 16 }).render_sync(small_input());

        expect(backend.tile_size).toBe(16);
        expect(backend.tile_count).toBe(80);
        expect_close(backend.pixel(80, 60), [0.1, 0.1, 0.1, 1]);
    });

    it("hit tests the HUD through the renderer", () => {
        const renderer = new FrameRenderer(new RasterBackend(640, 480));
        expect(renderer.hit_test(make_input(), [50, 380])).toBe("play_pause");
        expect(renderer.hit_test(make_input(), [320, 300])).toBeNull();
    });
});
