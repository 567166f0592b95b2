import { describe, it, expect } from "@jest/globals";
import type { PremultipliedRGBA } from "../../src/types/color";
import type { Rect } from "../../src/math/coordinates";
import type { IDrawItem } from "../../src/renderer/backend/render_backend";
import { RasterBackend } from "../../src/renderer/backend/raster_backend";

const solid = (quad: Rect, color: PremultipliedRGBA | null): IDrawItem => ({ quad, shade: () => color });

describe("RasterBackend", () => {
    it("splits the framebuffer into tiles, clipping the last row and column", () => {
        const backend = new RasterBackend(70, 40, 32);
        expect(backend.tile_count).toBe(6);
        expect(backend.tile_rect(2)).toEqual([64, 0, 70, 32]);
        expect(backend.tile_rect(5)).toEqual([64, 32, 70, 40]);
    });

    it("composites items in order with premultiplied source-over", () => {
        const backend = new RasterBackend(8, 8, 4);
        backend.rasterize_tiles([solid([0, 0, 8, 8], [1, 0, 0, 1]), solid([0, 0, 8, 8], [0, 0, 0.5, 0.5])], 0, backend.tile_count);
        expect(backend.pixel(3, 3)).toEqual([0.5, 0, 0.5, 1]);
    });

    it("skips items that return nothing and pixels outside an item's quad", () => {
        const backend = new RasterBackend(8, 8, 4);
        backend.rasterize_tiles([solid([0, 0, 8, 8], null), solid([0, 0, 2, 2], [1, 1, 1, 1])], 0, backend.tile_count);
        expect(backend.pixel(1, 1)).toEqual([1, 1, 1, 1]);
        expect(backend.pixel(5, 5)).toEqual([0, 0, 0, 0]);
    });

    it("only touches the requested tile range", () => {
        const backend = new RasterBackend(8, 8, 4);
        backend.rasterize_tiles([solid([0, 0, 8, 8], [1, 1, 1, 1])], 0, 1);
        expect(backend.pixel(1, 1)).toEqual([1, 1, 1, 1]);
        expect(backend.pixel(5, 1)).toEqual([0, 0, 0, 0]);
    });

    it("shades at pixel centres", () => {
        const backend = new RasterBackend(4, 4, 4);
        const seen: [number, number][] = [];
        const probe: IDrawItem = {
            quad: [0, 0, 1, 1],
            shade: (p) => {
                seen.push(p);
                return null;
            }
        };
        backend.rasterize_tiles([probe], 0, 1);
        expect(seen).toEqual([[0.5, 0.5]]);
    });

    it("clears and resizes", () => {
        const backend = new RasterBackend(4, 4);
        backend.rasterize_tiles([solid([0, 0, 4, 4], [1, 1, 1, 1])], 0, backend.tile_count);
        backend.clear();
        expect(backend.pixel(0, 0)).toEqual([0, 0, 0, 0]);

        backend.resize(10.7, 3);
        expect([backend.width, backend.height]).toEqual([10, 3]);
        expect(backend.pixel(20, 0)).toEqual([0, 0, 0, 0]);
    });

    it("un-premultiplies into 8-bit RGBA", () => {
        const backend = new RasterBackend(1, 1);
        backend.rasterize_tiles([solid([0, 0, 1, 1], [0.25, 0, 0, 0.5])], 0, 1);
        expect(Array.from(backend.to_rgba8())).toEqual([128, 0, 0, 128]);
    });
});
