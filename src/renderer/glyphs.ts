import type { Vec2 } from "../math/vector2";
import glyph_data from "../assets/glyphs_5x7.json";

export const GLYPH_COLUMNS = 5;
export const GLYPH_ROWS = 7;

const TABLE_SIZE = 128;

export type GlyphRows = readonly number[];

// one entry per character code; each row is 5 bits, the highest bit is the leftmost column
const build_glyph_table = (): (GlyphRows | null)[] => {
    const glyphs: Record<string, number[]> = glyph_data.glyphs;
    const table: (GlyphRows | null)[] = new Array<GlyphRows | null>(TABLE_SIZE).fill(null);

    for (const [code, rows] of Object.entries(glyphs)) {
        table[Number(code)] = rows;
    }

    // letters are upper-case only
    for (let code = 97; code <= 122; code++) {
        table[code] = table[code - 32];
    }

    return table;
};

export const GLYPH_TABLE: readonly (GlyphRows | null)[] = build_glyph_table();

export const glyph_rows = (code: number): GlyphRows | null => {
    if (!Number.isInteger(code) || code < 0 || code >= TABLE_SIZE) return null;
    return GLYPH_TABLE[code];
};

export const glyph_bit = (code: number, column: number, row: number): boolean => {
    const rows = glyph_rows(code);
    if (!rows || column < 0 || column >= GLYPH_COLUMNS || row < 0 || row >= GLYPH_ROWS) return false;
    return ((rows[row] >> (GLYPH_COLUMNS - 1 - column)) & 1) === 1;
};

// hard-edged coverage of one glyph cell whose height is cell_height pixels
export const glyph_alpha = (pixel: Vec2, top_left: Vec2, cell_height: number, code: number): number => {
    const unit = cell_height / GLYPH_ROWS;
    if (unit <= 0) return 0;

    const column = Math.floor((pixel[0] - top_left[0]) / unit);
    const row = Math.floor((pixel[1] - top_left[1]) / unit);
    return glyph_bit(code, column, row) ? 1 : 0;
};
