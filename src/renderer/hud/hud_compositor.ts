import type { Vec2 } from "../../math/vector2";
import { rect_contains } from "../../math/coordinates";
import type { PremultipliedRGBA } from "../../types/color";
import { ColorAccumulator } from "../compositor";
import { BaseStage } from "../base_renderer";
import type { IStageInstance } from "../backend/render_backend";
import type { IFrameContext } from "../frame_context";
import { object_timeline_region } from "./object_timeline";
import { break_region, loading_region, spinner_region } from "./overlays";
import { history_region, selection_detail_region, stats_region, status_region, value_slider_region } from "./panels";
import { play_button_region } from "./play_button";
import type { IHudRegion } from "./region";
import { selection_overlay_region } from "./selection_overlay";
import { timeline_bar_region } from "./timeline_bar";

export interface IHudInstance extends IStageInstance {
    region: IHudRegion;
}

// declaration order is composite order: later regions draw over earlier ones
export const build_hud_regions = (ctx: IFrameContext): IHudRegion[] => {
    const { frame } = ctx;
    const hud = frame.hud;

    const regions: (IHudRegion | null)[] = [
        object_timeline_region(ctx),
        timeline_bar_region(ctx),
        stats_region(ctx),
        value_slider_region(ctx, "music_volume", "MUSIC", hud.music_volume_rect, frame.audio_volume),
        value_slider_region(ctx, "hitsound_volume", "HITSOUNDS", hud.hitsound_volume_rect, frame.hitsound_volume),
        value_slider_region(ctx, "playfield_scale", "PLAYFIELD", hud.playfield_scale_rect, frame.playfield_scale),
        status_region(ctx),
        history_region(ctx),
        selection_detail_region(ctx, 0),
        selection_detail_region(ctx, 1),
        play_button_region(ctx),
        selection_overlay_region(ctx, 0),
        selection_overlay_region(ctx, 1),
        break_region(ctx),
        spinner_region(ctx),
        loading_region(ctx)
    ];

    return regions.filter((region): region is IHudRegion => region !== null);
};

// name of the topmost region whose hitbox contains the point
export const hit_test = (regions: readonly IHudRegion[], point: Vec2): string | null => {
    for (let i = regions.length - 1; i >= 0; i--) {
        const hitbox = regions[i].hitbox;
        if (hitbox && rect_contains(hitbox, point)) return regions[i].name;
    }
    return null;
};

export class HudCompositor extends BaseStage<IHudInstance> {
    readonly name = "HudCompositor";

    prepare(ctx: IFrameContext): IHudInstance[] {
        if (ctx.frame.hud_opacity <= ctx.config.alpha_epsilon) return [];
        return build_hud_regions(ctx).map((region) => ({ quad: region.rect, region }));
    }

    hit_test(ctx: IFrameContext, point: Vec2): string | null {
        return hit_test(build_hud_regions(ctx), point);
    }

    shade(pixel: Vec2, inst: IHudInstance, ctx: IFrameContext): PremultipliedRGBA | null {
        const acc = new ColorAccumulator();
        inst.region.paint(pixel, acc);
        acc.multiply_alpha(ctx.frame.hud_opacity);
        return acc.result(ctx.config.alpha_epsilon);
    }
}
