import type { RGBA } from "../types/color";
import { ErrorCode, err, ok, unwrap, type Result } from "../types/result";

export const HUD_COLOR_KEYS = [
    "panel_fill",
    "panel_border",
    "panel_fill_hovered",
    "panel_border_hovered",
    "text",
    "text_dim",
    "label",
    "bar_track",
    "bar_fill",
    "button_fill",
    "button_fill_hovered",
    "button_icon",
    "history_current",
    "history_redo",
    "timeline_track",
    "timeline_progress",
    "timeline_kiai",
    "timeline_break",
    "timeline_bookmark",
    "timeline_red_line",
    "timeline_cursor",
    "timeline_slider_outline",
    "timeline_slider_head_body",
    "timeline_slider_head_overlay",
    "timeline_circle_head_body",
    "timeline_circle_head_overlay",
    "loading",
    "break_bar",
    "spinner_indicator"
] as const;

export type HudColorKey = (typeof HUD_COLOR_KEYS)[number];

export interface ISkinConfig {
    // "r,g,b", "r,g,b,a" (a in 0..1), "rgba(r,g,b,a)" or #rrggbb[aa]
    colors: Record<HudColorKey, string>;

    // glyph cell height of HUD text in pixels
    text_height: number;
    // undo entries listed above the current state
    history_undo_rows: number;
    history_redo_rows: number;

    loading_spinner_radius: number;
    spinner_indicator_radius: number;
    selection_border_px: number;
    origin_ring_radius: number;
}

export interface IHudStyle {
    colors: Record<HudColorKey, RGBA>;
    text_height: number;
    history_undo_rows: number;
    history_redo_rows: number;
    loading_spinner_radius: number;
    spinner_indicator_radius: number;
    selection_border_px: number;
    origin_ring_radius: number;
}

export const DEFAULT_SKIN: ISkinConfig = {
    colors: {
        panel_fill: "18,18,24,0.85",
        panel_border: "90,90,110,1",
        panel_fill_hovered: "28,28,38,0.9",
        panel_border_hovered: "160,160,190,1",
        text: "235,235,240,1",
        text_dim: "150,150,165,1",
        label: "180,180,200,1",
        bar_track: "50,50,62,1",
        bar_fill: "102,153,255,1",
        button_fill: "30,30,40,0.85",
        button_fill_hovered: "55,55,75,0.95",
        button_icon: "#ffffff",
        history_current: "102,153,255,0.35",
        history_redo: "150,150,165,0.6",
        timeline_track: "24,24,30,0.9",
        timeline_progress: "60,60,80,0.9",
        timeline_kiai: "255,150,40,0.35",
        timeline_break: "200,200,200,0.25",
        timeline_bookmark: "#3399ff",
        timeline_red_line: "#ff3333",
        timeline_cursor: "#ffffff",
        timeline_slider_outline: "255,255,255,1",
        timeline_slider_head_body: "255,255,255,1",
        timeline_slider_head_overlay: "255,255,255,1",
        timeline_circle_head_body: "255,255,255,1",
        timeline_circle_head_overlay: "255,255,255,1",
        loading: "255,255,255,0.9",
        break_bar: "255,255,255,0.6",
        spinner_indicator: "255,255,255,0.8"
    },

    text_height: 14,
    history_undo_rows: 4,
    history_redo_rows: 3,

    loading_spinner_radius: 24,
    spinner_indicator_radius: 48,
    selection_border_px: 1.5,
    origin_ring_radius: 9
};

export const merge_skin = (partial?: Partial<ISkinConfig>): ISkinConfig => {
    if (!partial) return { ...DEFAULT_SKIN, colors: { ...DEFAULT_SKIN.colors } };

    return {
        ...DEFAULT_SKIN,
        ...partial,
        colors: partial.colors ? { ...DEFAULT_SKIN.colors, ...partial.colors } : { ...DEFAULT_SKIN.colors }
    };
};

const parse_channel = (raw: string, scale: number): number | null => {
    const value = Number(raw.trim());
    if (raw.trim() === "" || !Number.isFinite(value)) return null;
    return Math.min(1, Math.max(0, value / scale));
};

export const parse_color = (input: string): Result<RGBA> => {
    const text = input.trim().toLowerCase();

    if (text.startsWith("#")) {
        const hex = text.slice(1);
        if (!/^[0-9a-f]{6}([0-9a-f]{2})?$/.test(hex)) {
            return err(ErrorCode.InvalidColor, `bad hex colour "${input}"`);
        }
        const byte = (i: number) => parseInt(hex.slice(i, i + 2), 16) / 255;
        return ok([byte(0), byte(2), byte(4), hex.length === 8 ? byte(6) : 1]);
    }

    const body = text.startsWith("rgba(") || text.startsWith("rgb(") ? text.slice(text.indexOf("(") + 1, text.lastIndexOf(")")) : text;
    const parts = body.split(",");

    if (parts.length !== 3 && parts.length !== 4) {
        return err(ErrorCode.InvalidColor, `expected 3 or 4 channels in "${input}"`);
    }

    const r = parse_channel(parts[0], 255);
    const g = parse_channel(parts[1], 255);
    const b = parse_channel(parts[2], 255);
    const a = parts.length === 4 ? parse_channel(parts[3], 1) : 1;

    if (r === null || g === null || b === null || a === null) {
        return err(ErrorCode.InvalidColor, `non-numeric channel in "${input}"`);
    }

    return ok([r, g, b, a]);
};

// throws on malformed colours: the style is resolved once, up front
export const resolve_hud_style = (skin: ISkinConfig): IHudStyle => {
    const color = (key: HudColorKey): RGBA => unwrap(parse_color(skin.colors[key]));

    return {
        colors: {
            panel_fill: color("panel_fill"),
            panel_border: color("panel_border"),
            panel_fill_hovered: color("panel_fill_hovered"),
            panel_border_hovered: color("panel_border_hovered"),
            text: color("text"),
            text_dim: color("text_dim"),
            label: color("label"),
            bar_track: color("bar_track"),
            bar_fill: color("bar_fill"),
            button_fill: color("button_fill"),
            button_fill_hovered: color("button_fill_hovered"),
            button_icon: color("button_icon"),
            history_current: color("history_current"),
            history_redo: color("history_redo"),
            timeline_track: color("timeline_track"),
            timeline_progress: color("timeline_progress"),
            timeline_kiai: color("timeline_kiai"),
            timeline_break: color("timeline_break"),
            timeline_bookmark: color("timeline_bookmark"),
            timeline_red_line: color("timeline_red_line"),
            timeline_cursor: color("timeline_cursor"),
            timeline_slider_outline: color("timeline_slider_outline"),
            timeline_slider_head_body: color("timeline_slider_head_body"),
            timeline_slider_head_overlay: color("timeline_slider_head_overlay"),
            timeline_circle_head_body: color("timeline_circle_head_body"),
            timeline_circle_head_overlay: color("timeline_circle_head_overlay"),
            loading: color("loading"),
            break_bar: color("break_bar"),
            spinner_indicator: color("spinner_indicator")
        },
        text_height: skin.text_height,
        history_undo_rows: skin.history_undo_rows,
        history_redo_rows: skin.history_redo_rows,
        loading_spinner_radius: skin.loading_spinner_radius,
        spinner_indicator_radius: skin.spinner_indicator_radius,
        selection_border_px: skin.selection_border_px,
        origin_ring_radius: skin.origin_ring_radius
    };
};
