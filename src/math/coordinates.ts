import type { Vec2 } from "./vector2";
import { EPSILON } from "./vector2";

// beatmap (playfield) space is 512x384, game (osu) space is 640x480
export const PLAYFIELD_WIDTH = 512;
export const PLAYFIELD_HEIGHT = 384;
export const OSU_WIDTH = 640;
export const OSU_HEIGHT = 480;

// the playfield sits centred in osu space, pushed down by the legacy 8 unit padding
export const PLAYFIELD_LEGACY_PADDING = 8;
export const PLAYFIELD_OFFSET_IN_OSU: Vec2 = [(OSU_WIDTH - PLAYFIELD_WIDTH) / 2, (OSU_HEIGHT - PLAYFIELD_HEIGHT) / 2 + PLAYFIELD_LEGACY_PADDING];

// (x0, y0, x1, y1) in screen pixels
export type Rect = [number, number, number, number];

export const rect_size = (rect: Rect): Vec2 => [rect[2] - rect[0], rect[3] - rect[1]];

export const rect_contains = (rect: Rect, p: Vec2): boolean => p[0] >= rect[0] && p[0] <= rect[2] && p[1] >= rect[1] && p[1] <= rect[3];

export const rect_overlaps = (a: Rect, b: Rect): boolean => a[0] < b[2] && a[2] > b[0] && a[1] < b[3] && a[3] > b[1];

export const rect_expand = (rect: Rect, amount: number): Rect => [rect[0] - amount, rect[1] - amount, rect[2] + amount, rect[3] + amount];

export const rect_around = (center: Vec2, half_w: number, half_h: number = half_w): Rect => [
    center[0] - half_w,
    center[1] - half_h,
    center[0] + half_w,
    center[1] + half_h
];

const map_to_rect = (p: Vec2, rect: Rect, w: number, h: number): Vec2 => [rect[0] + (p[0] * (rect[2] - rect[0])) / w, rect[1] + (p[1] * (rect[3] - rect[1])) / h];

const map_from_rect = (p: Vec2, rect: Rect, w: number, h: number): Vec2 => [
    ((p[0] - rect[0]) * w) / Math.max(rect[2] - rect[0], EPSILON),
    ((p[1] - rect[1]) * h) / Math.max(rect[3] - rect[1], EPSILON)
];

// both axes are expected to share one scale; diverging scales are not corrected
export const beatfield_to_screen = (p: Vec2, playfield_rect: Rect): Vec2 => map_to_rect(p, playfield_rect, PLAYFIELD_WIDTH, PLAYFIELD_HEIGHT);
export const screen_to_beatfield = (p: Vec2, playfield_rect: Rect): Vec2 => map_from_rect(p, playfield_rect, PLAYFIELD_WIDTH, PLAYFIELD_HEIGHT);

export const osu_to_screen = (p: Vec2, osu_rect: Rect): Vec2 => map_to_rect(p, osu_rect, OSU_WIDTH, OSU_HEIGHT);
export const screen_to_osu = (p: Vec2, osu_rect: Rect): Vec2 => map_from_rect(p, osu_rect, OSU_WIDTH, OSU_HEIGHT);

export const beatfield_to_osu = (p: Vec2): Vec2 => [p[0] + PLAYFIELD_OFFSET_IN_OSU[0], p[1] + PLAYFIELD_OFFSET_IN_OSU[1]];
export const osu_to_beatfield = (p: Vec2): Vec2 => [p[0] - PLAYFIELD_OFFSET_IN_OSU[0], p[1] - PLAYFIELD_OFFSET_IN_OSU[1]];

// screen pixels per beatmap unit
export const beatfield_pixel_scale = (playfield_rect: Rect): number => (playfield_rect[2] - playfield_rect[0]) / PLAYFIELD_WIDTH;

export const beatfield_rect_to_screen = (min: Vec2, max: Vec2, playfield_rect: Rect): Rect => {
    const a = beatfield_to_screen(min, playfield_rect);
    const b = beatfield_to_screen(max, playfield_rect);
    return [Math.min(a[0], b[0]), Math.min(a[1], b[1]), Math.max(a[0], b[0]), Math.max(a[1], b[1])];
};
