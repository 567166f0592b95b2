import type { Vec2 } from "../math/vector2";
import { glyph_alpha, GLYPH_ROWS } from "./glyphs";

// 5 glyph columns plus one column of spacing
export const GLYPH_ADVANCE_COLUMNS = 6;

export const glyph_advance = (cell_height: number): number => (cell_height / GLYPH_ROWS) * GLYPH_ADVANCE_COLUMNS;

export const text_width = (text: string, cell_height: number): number => text.length * glyph_advance(cell_height);

export const text_alpha = (pixel: Vec2, top_left: Vec2, cell_height: number, text: string): number => {
    if (pixel[1] < top_left[1] || pixel[1] >= top_left[1] + cell_height) return 0;

    const advance = glyph_advance(cell_height);
    const index = Math.floor((pixel[0] - top_left[0]) / advance);
    if (index < 0 || index >= text.length) return 0;

    return glyph_alpha(pixel, [top_left[0] + index * advance, top_left[1]], cell_height, text.charCodeAt(index));
};

export const text_alpha_right = (pixel: Vec2, top_right: Vec2, cell_height: number, text: string): number =>
    text_alpha(pixel, [top_right[0] - text_width(text, cell_height), top_right[1]], cell_height, text);

export const text_alpha_centered = (pixel: Vec2, center: Vec2, cell_height: number, text: string): number =>
    text_alpha(pixel, [center[0] - text_width(text, cell_height) / 2, center[1] - cell_height / 2], cell_height, text);

export const count_digits = (value: number): number => {
    let n = Math.floor(Math.abs(value));
    let digits = 1;
    while (n >= 10) {
        n = Math.floor(n / 10);
        digits++;
    }
    return digits;
};

interface IFixedParts {
    negative: boolean;
    int_part: number;
    frac_part: number;
}

const split_fixed = (value: number, decimals: number): IFixedParts => {
    const unit = Math.pow(10, decimals);
    const scaled = Math.round(Math.abs(value) * unit);
    return {
        negative: value < 0 && scaled > 0,
        int_part: Math.floor(scaled / unit),
        frac_part: scaled % unit
    };
};

const fixed_body = (parts: IFixedParts, decimals: number): string => {
    if (decimals <= 0) return String(parts.int_part);
    return `${parts.int_part}.${String(parts.frac_part).padStart(decimals, "0")}`;
};

export const format_fixed = (value: number, decimals: number, unit: string = ""): string => {
    const parts = split_fixed(value, decimals);
    return `${parts.negative ? "-" : ""}${fixed_body(parts, decimals)}${unit}`;
};

// always carries a sign so columns of deltas line up
export const format_signed_fixed = (value: number, decimals: number, unit: string = ""): string => {
    const parts = split_fixed(value, decimals);
    return `${parts.negative ? "-" : "+"}${fixed_body(parts, decimals)}${unit}`;
};

export const fixed_char_count = (value: number, decimals: number, unit: string = ""): number => {
    const parts = split_fixed(value, decimals);
    const point = decimals > 0 ? 1 + decimals : 0;
    return (parts.negative ? 1 : 0) + count_digits(parts.int_part) + point + unit.length;
};

export const signed_fixed_char_count = (value: number, decimals: number, unit: string = ""): number => {
    const parts = split_fixed(value, decimals);
    const point = decimals > 0 ? 1 + decimals : 0;
    return 1 + count_digits(parts.int_part) + point + unit.length;
};

// m:ss.mmm
export const format_duration = (ms: number): string => {
    const total = Math.max(0, Math.floor(ms));
    const minutes = Math.floor(total / 60000);
    const seconds = Math.floor(total / 1000) % 60;
    const millis = total % 1000;
    return `${minutes}:${String(seconds).padStart(2, "0")}.${String(millis).padStart(3, "0")}`;
};

export const format_age = (seconds: number): string => {
    const s = Math.max(0, Math.floor(seconds));
    if (s < 60) return `${s}S`;
    if (s < 3600) return `${Math.floor(s / 60)}M`;
    return `${Math.floor(s / 3600)}H`;
};
