// types
export * from "./types/color";
export * from "./types/frame";
export * from "./types/skin";
export * from "./types/result";

// skin
export { type ISkinConfig, type IHudStyle, type HudColorKey, HUD_COLOR_KEYS, DEFAULT_SKIN, merge_skin, parse_color, resolve_hud_style } from "./skin/skin_config";
export { create_texture, sample_sprite, sample_sprite_tinted, apply_uv_transform } from "./skin/sprite";
export { build_default_skin, DEFAULT_SKIN_SCALE, DEFAULT_SPRITE_SIZE } from "./skin/default_skin";

// renderer
export { type IRenderBackend, type IRenderStage, type IStageInstance, type IDrawItem, bind_instance } from "./renderer/backend/render_backend";
export { RasterBackend } from "./renderer/backend/raster_backend";
export { BaseStage, type IRendererConfig, DEFAULT_RENDERER_CONFIG, merge_renderer_config } from "./renderer/base_renderer";
export { type IFrameContext, build_frame_context } from "./renderer/frame_context";
export { FrameRenderer } from "./renderer/frame_renderer";
export { validate_frame_input } from "./renderer/validation";
export * from "./renderer/compositor";
export * from "./renderer/animation";
export * from "./renderer/easing";
export * from "./renderer/glyphs";
export * from "./renderer/text";
export { HitObjectRenderer } from "./renderer/standard/hit_object_renderer";
export { SliderBodyRenderer, slider_radii, slider_band } from "./renderer/standard/slider_body_renderer";
export { SliderCapRenderer, resolve_slide_end, resolve_slide_target } from "./renderer/standard/slider_cap_renderer";
export { BackgroundRenderer } from "./renderer/standard/background_renderer";
export { pack_slider_boxes, expected_box_count, type IPathPoint, type IPackedSlider } from "./renderer/standard/slider_boxes";
export { HudCompositor, build_hud_regions, hit_test } from "./renderer/hud/hud_compositor";
export { group_timeline_points, type ITimelineGroup } from "./renderer/hud/timeline_groups";
export { compute_layout, type ILayoutOptions, type IScreenLayout, DEFAULT_LAYOUT_OPTIONS } from "./renderer/hud/layout";

// math
export * from "./math/vector2";
export * from "./math/coordinates";
export * from "./math/distance";
