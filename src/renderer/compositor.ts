import type { RGB, RGBA, PremultipliedRGBA } from "../types/color";

export const ALPHA_EPSILON = 1e-5;

export interface IPremultiplied {
    rgb: RGB;
    a: number;
}

export const premultiply = (src: RGBA): PremultipliedRGBA => [src[0] * src[3], src[1] * src[3], src[2] * src[3], src[3]];

export const unpremultiply = (src: PremultipliedRGBA): RGBA => {
    if (src[3] <= 0) return [0, 0, 0, 0];
    return [src[0] / src[3], src[1] / src[3], src[2] / src[3], src[3]];
};

// source-over with a straight source onto a premultiplied destination
export const over = (dst_rgb: RGB, dst_a: number, src: RGBA): IPremultiplied => {
    const inv = 1 - src[3];
    return {
        rgb: [src[0] * src[3] + dst_rgb[0] * inv, src[1] * src[3] + dst_rgb[1] * inv, src[2] * src[3] + dst_rgb[2] * inv],
        a: src[3] + dst_a * inv
    };
};

export const over_premultiplied = (dst: PremultipliedRGBA, src: PremultipliedRGBA): PremultipliedRGBA => {
    const inv = 1 - src[3];
    return [src[0] + dst[0] * inv, src[1] + dst[1] * inv, src[2] + dst[2] * inv, src[3] + dst[3] * inv];
};

export const scale_premultiplied = (c: PremultipliedRGBA, k: number): PremultipliedRGBA => [c[0] * k, c[1] * k, c[2] * k, c[3] * k];

// mutable accumulator for one pixel; layers are pushed bottom first
export class ColorAccumulator {
    r = 0;
    g = 0;
    b = 0;
    a = 0;

    over(src: RGBA): this {
        const result = over([this.r, this.g, this.b], this.a, src);
        this.r = result.rgb[0];
        this.g = result.rgb[1];
        this.b = result.rgb[2];
        this.a = result.a;
        return this;
    }

    over_premultiplied(src: PremultipliedRGBA): this {
        const inv = 1 - src[3];
        this.r = src[0] + this.r * inv;
        this.g = src[1] + this.g * inv;
        this.b = src[2] + this.b * inv;
        this.a = src[3] + this.a * inv;
        return this;
    }

    multiply_alpha(k: number): this {
        this.r *= k;
        this.g *= k;
        this.b *= k;
        this.a *= k;
        return this;
    }

    // straight rgb multiplier plus alpha multiplier, keeps the value premultiplied
    tint(tint: RGBA): this {
        this.r *= tint[0] * tint[3];
        this.g *= tint[1] * tint[3];
        this.b *= tint[2] * tint[3];
        this.a *= tint[3];
        return this;
    }

    desaturate(strength: number): this {
        const lum = this.r * 0.299 + this.g * 0.587 + this.b * 0.114;
        this.r += (lum - this.r) * strength;
        this.g += (lum - this.g) * strength;
        this.b += (lum - this.b) * strength;
        return this;
    }

    is_transparent(epsilon: number = ALPHA_EPSILON): boolean {
        return this.a <= epsilon;
    }

    to_premultiplied(): PremultipliedRGBA {
        return [this.r, this.g, this.b, this.a];
    }

    // null when the pixel contributes nothing
    result(epsilon: number = ALPHA_EPSILON): PremultipliedRGBA | null {
        return this.is_transparent(epsilon) ? null : this.to_premultiplied();
    }
}
