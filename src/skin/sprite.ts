import type { Vec2 } from "../math/vector2";
import type { RGB, RGBA } from "../types/color";
import type { ISpriteTexture, UvTransform } from "../types/skin";

export const create_texture = (width: number, height: number, fill?: (x: number, y: number) => RGBA): ISpriteTexture => {
    const pixels = new Float32Array(width * height * 4);

    if (fill) {
        for (let y = 0; y < height; y++) {
            for (let x = 0; x < width; x++) {
                const c = fill(x, y);
                const i = (y * width + x) * 4;
                pixels[i] = c[0];
                pixels[i + 1] = c[1];
                pixels[i + 2] = c[2];
                pixels[i + 3] = c[3];
            }
        }
    }

    return { width, height, pixels };
};

const texel_premultiplied = (texture: ISpriteTexture, x: number, y: number): RGBA => {
    const cx = Math.min(texture.width - 1, Math.max(0, x));
    const cy = Math.min(texture.height - 1, Math.max(0, y));
    const i = (cy * texture.width + cx) * 4;
    const a = texture.pixels[i + 3];
    return [texture.pixels[i] * a, texture.pixels[i + 1] * a, texture.pixels[i + 2] * a, a];
};

// bilinear, filtered in premultiplied space; transparent outside [0, 1]^2
export const sample_sprite = (texture: ISpriteTexture, uv: Vec2): RGBA => {
    if (uv[0] < 0 || uv[0] > 1 || uv[1] < 0 || uv[1] > 1 || texture.width <= 0 || texture.height <= 0) {
        return [0, 0, 0, 0];
    }

    const fx = uv[0] * texture.width - 0.5;
    const fy = uv[1] * texture.height - 0.5;
    const x0 = Math.floor(fx);
    const y0 = Math.floor(fy);
    const tx = fx - x0;
    const ty = fy - y0;

    const c00 = texel_premultiplied(texture, x0, y0);
    const c10 = texel_premultiplied(texture, x0 + 1, y0);
    const c01 = texel_premultiplied(texture, x0, y0 + 1);
    const c11 = texel_premultiplied(texture, x0 + 1, y0 + 1);

    const out: RGBA = [0, 0, 0, 0];
    for (let k = 0; k < 4; k++) {
        const top = c00[k] + (c10[k] - c00[k]) * tx;
        const bottom = c01[k] + (c11[k] - c01[k]) * tx;
        out[k] = top + (bottom - top) * ty;
    }

    const a = out[3];
    if (a <= 0) return [0, 0, 0, 0];
    return [out[0] / a, out[1] / a, out[2] / a, a];
};

export const sample_sprite_tinted = (texture: ISpriteTexture, uv: Vec2, tint: RGB): RGBA => {
    const c = sample_sprite(texture, uv);
    return [c[0] * tint[0], c[1] * tint[1], c[2] * tint[2], c[3]];
};

export const apply_uv_transform = (uv: Vec2, xform: UvTransform): Vec2 => [uv[0] * xform[0] + xform[2], uv[1] * xform[1] + xform[3]];
