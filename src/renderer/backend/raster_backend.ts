import type { Vec2 } from "../../math/vector2";
import { rect_overlaps, type Rect } from "../../math/coordinates";
import type { PremultipliedRGBA } from "../../types/color";
import { ALPHA_EPSILON } from "../compositor";
import type { IDrawItem, IRenderBackend } from "./render_backend";

// software stand-in for the fragment stage: premultiplied float framebuffer shaded tile by tile
export class RasterBackend implements IRenderBackend {
    private pixels: Float32Array = new Float32Array(0);
    private _width: number = 0;
    private _height: number = 0;
    private _tile_size: number;
    private alpha_epsilon: number;

    constructor(width: number, height: number, tile_size: number = 32, alpha_epsilon: number = ALPHA_EPSILON) {
        this._tile_size = Math.max(1, Math.floor(tile_size));
        this.alpha_epsilon = alpha_epsilon;
        this.resize(width, height);
    }

    get width(): number {
        return this._width;
    }
    get height(): number {
        return this._height;
    }
    get tile_size(): number {
        return this._tile_size;
    }

    get tiles_x(): number {
        return Math.ceil(this._width / this._tile_size);
    }
    get tiles_y(): number {
        return Math.ceil(this._height / this._tile_size);
    }
    get tile_count(): number {
        return this.tiles_x * this.tiles_y;
    }

    resize(width: number, height: number): void {
        this._width = Math.max(0, Math.floor(width));
        this._height = Math.max(0, Math.floor(height));
        this.pixels = new Float32Array(this._width * this._height * 4);
    }

    // the framebuffer keeps its contents, only the tile split changes
    set_tile_size(size: number): void {
        this._tile_size = Math.max(1, Math.floor(size));
    }

    clear(): void {
        this.pixels.fill(0);
    }

    dispose(): void {
        this.pixels = new Float32Array(0);
        this._width = 0;
        this._height = 0;
    }

    tile_rect(index: number): Rect {
        const tx = index % this.tiles_x;
        const ty = Math.floor(index / this.tiles_x);
        const x0 = tx * this._tile_size;
        const y0 = ty * this._tile_size;
        return [x0, y0, Math.min(x0 + this._tile_size, this._width), Math.min(y0 + this._tile_size, this._height)];
    }

    rasterize_tiles(items: readonly IDrawItem[], first: number, count: number): void {
        const last = Math.min(first + count, this.tile_count);

        for (let t = Math.max(0, first); t < last; t++) {
            const tile = this.tile_rect(t);
            const visible = items.filter((item) => rect_overlaps(item.quad, tile));
            if (visible.length > 0) this.rasterize_tile(tile, visible);
        }
    }

    private rasterize_tile(tile: Rect, items: readonly IDrawItem[]): void {
        for (let y = tile[1]; y < tile[3]; y++) {
            for (let x = tile[0]; x < tile[2]; x++) {
                // pixel centres sit at +0.5
                const p: Vec2 = [x + 0.5, y + 0.5];
                const i = (y * this._width + x) * 4;

                for (const item of items) {
                    const q = item.quad;
                    if (p[0] < q[0] || p[0] > q[2] || p[1] < q[1] || p[1] > q[3]) continue;

                    const src = item.shade(p);
                    if (!src || src[3] <= this.alpha_epsilon) continue;

                    const inv = 1 - src[3];
                    this.pixels[i] = src[0] + this.pixels[i] * inv;
                    this.pixels[i + 1] = src[1] + this.pixels[i + 1] * inv;
                    this.pixels[i + 2] = src[2] + this.pixels[i + 2] * inv;
                    this.pixels[i + 3] = src[3] + this.pixels[i + 3] * inv;
                }
            }
        }
    }

    pixel(x: number, y: number): PremultipliedRGBA {
        if (x < 0 || y < 0 || x >= this._width || y >= this._height) return [0, 0, 0, 0];
        const i = (Math.floor(y) * this._width + Math.floor(x)) * 4;
        return [this.pixels[i], this.pixels[i + 1], this.pixels[i + 2], this.pixels[i + 3]];
    }

    // straight 8-bit RGBA, e.g. for writing an image file
    to_rgba8(): Uint8ClampedArray {
        const out = new Uint8ClampedArray(this._width * this._height * 4);

        for (let i = 0; i < out.length; i += 4) {
            const a = this.pixels[i + 3];
            if (a <= this.alpha_epsilon) continue;
            out[i] = Math.round((this.pixels[i] / a) * 255);
            out[i + 1] = Math.round((this.pixels[i + 1] / a) * 255);
            out[i + 2] = Math.round((this.pixels[i + 2] / a) * 255);
            out[i + 3] = Math.round(a * 255);
        }

        return out;
    }
}
