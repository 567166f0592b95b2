export type RGB = [number, number, number];

// straight (non-premultiplied) colour, channels in [0, 1]
export type RGBA = [number, number, number, number];

// premultiplied colour: rgb <= a componentwise
export type PremultipliedRGBA = [number, number, number, number];

export const TRANSPARENT: PremultipliedRGBA = [0, 0, 0, 0];
export const WHITE: RGBA = [1, 1, 1, 1];

export const rgb_to_rgba = (rgb: RGB, a: number = 1): RGBA => [rgb[0], rgb[1], rgb[2], a];

export const rgba_to_rgb = (c: RGBA): RGB => [c[0], c[1], c[2]];

export const with_alpha = (color: RGBA, a: number): RGBA => [color[0], color[1], color[2], a];

export const mix_rgba = (a: RGBA, b: RGBA, t: number): RGBA => [
    a[0] + (b[0] - a[0]) * t,
    a[1] + (b[1] - a[1]) * t,
    a[2] + (b[2] - a[2]) * t,
    a[3] + (b[3] - a[3]) * t
];

export const mix_rgb = (a: RGB, b: RGB, t: number): RGB => [a[0] + (b[0] - a[0]) * t, a[1] + (b[1] - a[1]) * t, a[2] + (b[2] - a[2]) * t];

