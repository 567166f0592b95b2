import type { Vec2 } from "../../src/math/vector2";
import type { RGBA } from "../../src/types/color";
import {
    SelectedSide,
    type IFrameInput,
    type IFrameState,
    type IHitObjectRecord,
    type ISelectionColors,
    type ISelectionSide,
    type ISliderAttributes,
    type SelectionPalette
} from "../../src/types/frame";
import type { ISkinAssets } from "../../src/types/skin";
import { build_default_skin } from "../../src/skin/default_skin";
import { DEFAULT_SKIN, resolve_hud_style } from "../../src/skin/skin_config";
import { merge_renderer_config, type IRendererConfig } from "../../src/renderer/base_renderer";
import { build_frame_context, type IFrameContext } from "../../src/renderer/frame_context";

// 128px sprites keep the ring bands several texels wide, so bilinear samples inside them are exact
export const TEST_SKIN: ISkinAssets = build_default_skin(128);

export const RED: RGBA = [1, 0, 0, 1];
export const GREEN: RGBA = [0, 1, 0, 1];
export const BLUE: RGBA = [0, 0, 1, 1];

export const make_selection_colors = (overrides: Partial<ISelectionColors> = {}): ISelectionColors => ({
    drag_rectangle: [1, 1, 1, 1],
    selection_border: [1, 1, 0, 1],
    selection_border_hovered: [1, 0.5, 0, 1],
    selection_border_dragging: [1, 0, 1, 1],
    selection_tint: [1, 1, 0, 0.1],
    selection_tint_hovered: [1, 0.5, 0, 0.1],
    selection_tint_dragging: [1, 0, 1, 0.1],
    selection_origin: [0, 1, 1, 1],
    selection_origin_hovered: [0, 0.5, 1, 1],
    selection_origin_clicked: [0, 0, 1, 1],
    selection_origin_locked: [0.5, 0.5, 0.5, 1],
    selection_combo_color: [0, 0, 1, 1],
    ...overrides
});

export const make_palette = (): SelectionPalette => [make_selection_colors(), make_selection_colors({ selection_combo_color: [0, 1, 0, 1] })];

export const make_selection_side = (overrides: Partial<ISelectionSide> = {}): ISelectionSide => ({
    exists: false,
    quad: [
        [100, 100],
        [200, 100],
        [200, 200],
        [100, 200]
    ],
    origin: [150, 150],
    drag_rect: null,
    hovered: false,
    dragging: false,
    origin_hovered: false,
    origin_dragging: false,
    locked: false,
    object_count: 0,
    scale: 1,
    rotation_degrees: 0,
    origin_playfield: [256, 192],
    moved_playfield: [0, 0],
    ...overrides
});

// 640x480 screen where osu space maps 1:1 and beatmap (x, y) lands on screen (x + 64, y + 56)
export const make_frame_state = (overrides: Partial<IFrameState> = {}): IFrameState => ({
    screen_size: [640, 480],
    time_ms: 1000,
    song_total_ms: 10000,
    playback_rate: 1,
    is_playing: false,
    loading: false,

    playfield_rect: [64, 56, 576, 440],
    osu_rect: [0, 0, 640, 480],
    hud_opacity: 1,

    is_kiai_time: false,
    is_break_time: false,
    break_time: [0, 0],
    break_time_lightness: 0,
    spinner_time: null,

    slider_border_thickness: 0.125,
    slider_border_outer_thickness: 0.25,

    selected_fade_in_opacity_cap: 0.5,
    selected_fade_out_opacity_cap: 0.25,
    selection_color_mix_strength: 0.5,

    audio_volume: 0.5,
    hitsound_volume: 0.25,
    playfield_scale: 1,
    cursor_pos: null,

    colors: {
        playfield_rgba: [0.1, 0.1, 0.1, 1],
        gameplay_rgba: [0.05, 0.05, 0.05, 1],
        outer_rgba: [0, 0, 0, 1],
        playfield_border_rgba: [0.5, 0.5, 0.5, 1],
        gameplay_border_rgba: [0.25, 0.25, 0.25, 1],
        slider_ridge_rgba: [0.8, 0.8, 0.8, 1],
        slider_body_rgba: [0.2, 0.2, 0.2, 1],
        offscreen_playfield_tint_rgba: [0.5, 0.5, 0.5, 0.5],
        offscreen_osu_tint_rgba: [0.25, 0.25, 0.25, 0.25],
        timeline_past_tint_rgba: [0.5, 0.5, 0.5, 1],
        timeline_past_object_tint_rgba: [0.75, 0.75, 0.75, 1]
    },
    timeline: {
        bar_rect: [0, 448, 640, 480],
        bar_hitbox_rect: [0, 416, 640, 480],
        object_rect: [8, 0, 632, 48],
        object_hitbox_rect: [8, 0, 632, 48],
        window_ms: [0, 2000],
        circle_radius_px: 10,
        outline_px: 2,
        past_grayscale_strength: 0.5
    },
    hud: {
        stats_rect: [8, 56, 238, 212],
        music_volume_rect: [246, 56, 482, 84],
        hitsound_volume_rect: [246, 92, 482, 120],
        playfield_scale_rect: [246, 128, 482, 156],
        status_rect: [246, 164, 482, 192],
        history_rect: [396, 220, 632, 388],
        selection_detail_rects: [
            [8, 220, 238, 336],
            [396, 396, 632, 440]
        ],
        play_pause_rect: [4, 340, 100, 436]
    },
    stats: { fps: 60, fps_low: 55, cpu_ms: 2.5, gpu_ms: 1.5, object_count: 0 },
    history: { undo: [], current: null, redo: [] },
    selections: [make_selection_side(), make_selection_side()],
    ...overrides
});

export const make_object = (overrides: Partial<IHitObjectRecord> = {}): IHitObjectRecord => ({
    center: [256, 192],
    radius: 32,
    time: 1000,
    preempt: 600,
    color: [1, 0, 0],
    combo: 1,
    approach_circle_start_scale: 3,
    approach_circle_end_scale: 1,
    selected_side: SelectedSide.None,
    slider: null,
    ...overrides
});

export const make_slider_attributes = (overrides: Partial<ISliderAttributes> = {}): ISliderAttributes => ({
    end_center: [200, 200],
    slides: 1,
    start_border_color: [1, 0, 0],
    end_border_color: [0, 0, 1],
    end_time: 2000,
    head_rotation: [1, 0],
    end_rotation: [0, 1],
    ...overrides
});

export const make_input = (overrides: Partial<IFrameInput> = {}): IFrameInput => ({
    frame: make_frame_state(),
    objects: [],
    slider_segments: [],
    slider_boxes: [],
    slider_draw_indices: [],
    timeline_points: [],
    timeline_marks: { kiai: [], breaks: [], bookmarks: [], red_lines: [] },
    palette: make_palette(),
    skin: TEST_SKIN,
    ...overrides
});

export const make_context = (input: IFrameInput, config: Partial<IRendererConfig> = {}): IFrameContext =>
    build_frame_context(input, merge_renderer_config(config), resolve_hud_style(DEFAULT_SKIN));

// beatmap point -> screen point under make_frame_state's playfield
export const to_screen = (p: Vec2): Vec2 => [p[0] + 64, p[1] + 56];
