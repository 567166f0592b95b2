import type { Vec2 } from "../math/vector2";
import type { Rect } from "../math/coordinates";
import type { RGB, RGBA } from "./color";
import type { ISkinAssets } from "./skin";

export enum SelectedSide {
    None = 0,
    Left = 1,
    Right = 2
}

export interface ISliderAttributes {
    end_center: Vec2;
    // direction reversals + 1
    slides: number;
    start_border_color: RGB;
    end_border_color: RGB;
    end_time: number;
    // (cos, sin) of the local path tangent at the head and at the end
    head_rotation: Vec2;
    end_rotation: Vec2;
}

// all positions in beatmap space, times in ms
export interface IHitObjectRecord {
    center: Vec2;
    radius: number;
    time: number;
    preempt: number;
    color: RGB;
    combo: number;
    approach_circle_start_scale: number;
    approach_circle_end_scale: number;
    selected_side: SelectedSide;
    slider: ISliderAttributes | null;
}

export interface ISliderSegmentRecord {
    p0: Vec2;
    p1: Vec2;
    progress0: number;
    progress1: number;
}

export interface ISliderBoxRecord {
    min: Vec2;
    max: Vec2;
    segment_start: number;
    segment_count: number;
    object_index: number;
}

export enum TimelinePointFlag {
    SlideStart = 1 << 0,
    SlideRepeat = 1 << 1,
    SlideEnd = 1 << 2,
    Selected = 1 << 3,
    // set together with Selected when the right selection owns the point
    SelectedRight = 1 << 4,
    SliderOrSpinner = 1 << 5
}

export interface ITimelinePointRecord {
    time: number;
    // screen pixels
    center_y: number;
    radius_mult: number;
    flags: number;
    color: RGBA;
}

// point markers (bookmarks, red lines) have start === end
export interface ITimelineMarkRecord {
    start: number;
    end: number;
}

export interface ITimelineMarks {
    kiai: ITimelineMarkRecord[];
    breaks: ITimelineMarkRecord[];
    bookmarks: ITimelineMarkRecord[];
    red_lines: ITimelineMarkRecord[];
}

export interface ISelectionColors {
    drag_rectangle: RGBA;
    selection_border: RGBA;
    selection_border_hovered: RGBA;
    selection_border_dragging: RGBA;
    selection_tint: RGBA;
    selection_tint_hovered: RGBA;
    selection_tint_dragging: RGBA;
    selection_origin: RGBA;
    selection_origin_hovered: RGBA;
    selection_origin_clicked: RGBA;
    selection_origin_locked: RGBA;
    selection_combo_color: RGBA;
}

export type SelectionPalette = [left: ISelectionColors, right: ISelectionColors];

export interface ISelectionSide {
    exists: boolean;
    // screen pixels, in winding order; rotated selections are not axis aligned
    quad: [Vec2, Vec2, Vec2, Vec2];
    origin: Vec2;
    drag_rect: Rect | null;
    hovered: boolean;
    dragging: boolean;
    origin_hovered: boolean;
    origin_dragging: boolean;
    locked: boolean;
    object_count: number;
    scale: number;
    rotation_degrees: number;
    origin_playfield: Vec2;
    moved_playfield: Vec2;
}

export type SelectionPair = [left: ISelectionSide, right: ISelectionSide];

export interface IFrameColors {
    playfield_rgba: RGBA;
    gameplay_rgba: RGBA;
    outer_rgba: RGBA;
    playfield_border_rgba: RGBA;
    gameplay_border_rgba: RGBA;
    slider_ridge_rgba: RGBA;
    slider_body_rgba: RGBA;
    // rgb multiplier + alpha multiplier
    offscreen_playfield_tint_rgba: RGBA;
    offscreen_osu_tint_rgba: RGBA;
    timeline_past_tint_rgba: RGBA;
    timeline_past_object_tint_rgba: RGBA;
}

export interface ITimelineLayout {
    bar_rect: Rect;
    bar_hitbox_rect: Rect;
    object_rect: Rect;
    object_hitbox_rect: Rect;
    // visible time range of the object timeline
    window_ms: Vec2;
    circle_radius_px: number;
    outline_px: number;
    past_grayscale_strength: number;
}

export interface IHudLayout {
    stats_rect: Rect;
    music_volume_rect: Rect;
    hitsound_volume_rect: Rect;
    playfield_scale_rect: Rect;
    status_rect: Rect;
    history_rect: Rect;
    selection_detail_rects: [left: Rect, right: Rect];
    play_pause_rect: Rect;
}

export interface IHudStats {
    fps: number;
    fps_low: number;
    cpu_ms: number;
    gpu_ms: number;
    object_count: number;
}

export interface IHistoryEntry {
    name: string;
    age_seconds: number;
}

export interface IHistoryState {
    undo: IHistoryEntry[];
    current: IHistoryEntry | null;
    redo: IHistoryEntry[];
}

export interface IFrameState {
    screen_size: Vec2;
    time_ms: number;
    song_total_ms: number;
    playback_rate: number;
    is_playing: boolean;
    loading: boolean;

    // screen pixels of the 512x384 playfield and of the 640x480 osu space
    playfield_rect: Rect;
    osu_rect: Rect;
    hud_opacity: number;

    is_kiai_time: boolean;
    is_break_time: boolean;
    break_time: Vec2;
    break_time_lightness: number;
    spinner_time: Vec2 | null;

    // fractions of the object radius
    slider_border_thickness: number;
    slider_border_outer_thickness: number;

    selected_fade_in_opacity_cap: number;
    selected_fade_out_opacity_cap: number;
    selection_color_mix_strength: number;

    audio_volume: number;
    hitsound_volume: number;
    playfield_scale: number;
    cursor_pos: Vec2 | null;

    colors: IFrameColors;
    timeline: ITimelineLayout;
    hud: IHudLayout;
    stats: IHudStats;
    history: IHistoryState;
    selections: SelectionPair;
}

export interface IFrameInput {
    frame: IFrameState;
    objects: IHitObjectRecord[];
    slider_segments: ISliderSegmentRecord[];
    slider_boxes: ISliderBoxRecord[];
    // cap-render instance -> hit object index
    slider_draw_indices: number[];
    timeline_points: ITimelinePointRecord[];
    timeline_marks: ITimelineMarks;
    palette: SelectionPalette;
    skin: ISkinAssets;
}

export const is_slider = (obj: IHitObjectRecord): obj is IHitObjectRecord & { slider: ISliderAttributes } => obj.slider !== null;

export const selection_index = (side: SelectedSide): 0 | 1 | null => {
    if (side === SelectedSide.Left) return 0;
    if (side === SelectedSide.Right) return 1;
    return null;
};
