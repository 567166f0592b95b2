import { clamp } from "../../math/vector2";
import { OSU_HEIGHT, OSU_WIDTH, PLAYFIELD_HEIGHT, PLAYFIELD_LEGACY_PADDING, PLAYFIELD_WIDTH, type Rect } from "../../math/coordinates";
import { glyph_advance } from "../text";

export const LAYOUT_MARGIN = 8;
export const TIMELINE_BAR_HEIGHT = 32;
export const TIMELINE_HITBOX_HEIGHT = 64;
export const PLAY_BUTTON_SIZE = 96;
export const PLAY_BUTTON_GAP = 4;
export const STATS_TEXT_HEIGHT = 14;
export const STATS_HEIGHT = 156;
export const VALUE_BOX_WIDTH = 236;
export const VALUE_BOX_HEIGHT = 28;
export const SELECTION_DETAIL_HEIGHT = 116;
export const HISTORY_ROWS = 8;

export interface ILayoutOptions {
    // 0..1 of the full fit
    playfield_scale: number;
    // fractions of the screen
    timeline_height_percent: number;
    timeline_second_box_width_percent: number;
    timeline_third_box_width_percent: number;
}

export const DEFAULT_LAYOUT_OPTIONS: ILayoutOptions = {
    playfield_scale: 0.85,
    timeline_height_percent: 0.1,
    timeline_second_box_width_percent: 0,
    timeline_third_box_width_percent: 0
};

export interface IScreenLayout {
    object_timeline_rect: Rect;
    object_timeline_second_rect: Rect;
    object_timeline_third_rect: Rect;
    timeline_rect: Rect;
    timeline_hitbox_rect: Rect;
    play_pause_rect: Rect;
    stats_rect: Rect;
    music_volume_rect: Rect;
    hitsound_volume_rect: Rect;
    playfield_scale_rect: Rect;
    status_rect: Rect;
    history_rect: Rect;
    selection_detail_rects: [left: Rect, right: Rect];
    left_half_rect: Rect;
    right_half_rect: Rect;
    playfield_rect: Rect;
    osu_rect: Rect;
}

const top_timeline_rects = (screen_w: number, height: number, second_pct: number, third_pct: number): [Rect, Rect, Rect] => {
    const second_w = Math.max(0, screen_w * clamp(second_pct, 0, 1));
    const third_w = Math.max(0, screen_w * clamp(third_pct, 0, 1));
    const available = Math.max(0, screen_w - LAYOUT_MARGIN * 4 - second_w - third_w);

    const first_x1 = LAYOUT_MARGIN + available;
    const second_x0 = first_x1 + LAYOUT_MARGIN;
    const third_x0 = second_x0 + second_w + LAYOUT_MARGIN;

    return [
        [LAYOUT_MARGIN, 0, first_x1, height],
        [second_x0, 0, second_x0 + second_w, height],
        [third_x0, 0, third_x0 + third_w, height]
    ];
};

const stats_rect = (timeline_height: number): Rect => {
    const adv = glyph_advance(STATS_TEXT_HEIGHT);
    // 9 label columns, 1 gap column, 8 value columns
    const width = LAYOUT_MARGIN * 2 + adv * (9 + 1 + 8) - 2;
    const y0 = Math.max(0, timeline_height) + LAYOUT_MARGIN;
    return [LAYOUT_MARGIN, y0, LAYOUT_MARGIN + width, y0 + STATS_HEIGHT];
};

const stacked_boxes = (x0: number, y0: number, count: number): Rect[] => {
    const boxes: Rect[] = [];
    let y = y0;
    for (let i = 0; i < count; i++) {
        boxes.push([x0, y, x0 + VALUE_BOX_WIDTH, y + VALUE_BOX_HEIGHT]);
        y += VALUE_BOX_HEIGHT + LAYOUT_MARGIN;
    }
    return boxes;
};

export const playfield_rects = (screen_w: number, screen_h: number, playfield_scale: number): { playfield_rect: Rect; osu_rect: Rect } => {
    const cx = screen_w / 2;
    const cy = screen_h / 2;
    const scale = Math.min(screen_w / OSU_WIDTH, screen_h / OSU_HEIGHT) * clamp(playfield_scale, 0.01, 1);
    const half_w = PLAYFIELD_WIDTH / 2;
    const half_h = PLAYFIELD_HEIGHT / 2;

    return {
        playfield_rect: [cx - half_w * scale, cy + (-half_h + PLAYFIELD_LEGACY_PADDING) * scale, cx + half_w * scale, cy + (half_h + PLAYFIELD_LEGACY_PADDING) * scale],
        osu_rect: [cx - (OSU_WIDTH / 2) * scale, cy - (OSU_HEIGHT / 2) * scale, cx + (OSU_WIDTH / 2) * scale, cy + (OSU_HEIGHT / 2) * scale]
    };
};

export const compute_layout = (screen_w: number, screen_h: number, options: Partial<ILayoutOptions> = {}): IScreenLayout => {
    const opts = { ...DEFAULT_LAYOUT_OPTIONS, ...options };
    const timeline_h = Math.max(0, screen_h * clamp(opts.timeline_height_percent, 0, 1));
    const [first, second, third] = top_timeline_rects(screen_w, timeline_h, opts.timeline_second_box_width_percent, opts.timeline_third_box_width_percent);

    const bar_y0 = Math.max(0, screen_h - TIMELINE_BAR_HEIGHT);
    const button_y0 = Math.max(0, bar_y0 - PLAY_BUTTON_GAP - PLAY_BUTTON_SIZE);

    const stats = stats_rect(timeline_h);
    const [music, hitsound, scale, status] = stacked_boxes(stats[2] + LAYOUT_MARGIN, stats[1], 4);

    const right_x1 = screen_w - LAYOUT_MARGIN;
    const right_x0 = right_x1 - VALUE_BOX_WIDTH;
    const history_h = HISTORY_ROWS * (STATS_TEXT_HEIGHT + 6) + LAYOUT_MARGIN;
    const history: Rect = [right_x0, stats[1], right_x1, stats[1] + history_h];

    const left_detail: Rect = [stats[0], stats[3] + LAYOUT_MARGIN, stats[2], stats[3] + LAYOUT_MARGIN + SELECTION_DETAIL_HEIGHT];
    const right_detail: Rect = [right_x0, history[3] + LAYOUT_MARGIN, right_x1, history[3] + LAYOUT_MARGIN + SELECTION_DETAIL_HEIGHT];

    const half = screen_w / 2;

    return {
        object_timeline_rect: first,
        object_timeline_second_rect: second,
        object_timeline_third_rect: third,
        timeline_rect: [0, bar_y0, screen_w, screen_h],
        timeline_hitbox_rect: [0, Math.max(0, screen_h - TIMELINE_HITBOX_HEIGHT), screen_w, screen_h],
        play_pause_rect: [PLAY_BUTTON_GAP, button_y0, PLAY_BUTTON_GAP + PLAY_BUTTON_SIZE, button_y0 + PLAY_BUTTON_SIZE],
        stats_rect: stats,
        music_volume_rect: music,
        hitsound_volume_rect: hitsound,
        playfield_scale_rect: scale,
        status_rect: status,
        history_rect: history,
        selection_detail_rects: [left_detail, right_detail],
        left_half_rect: [0, 0, half, screen_h],
        right_half_rect: [half, 0, screen_w, screen_h],
        ...playfield_rects(screen_w, screen_h, opts.playfield_scale)
    };
};
