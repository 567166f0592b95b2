import type { Vec2 } from "../math/vector2";
import type { IFrameInput } from "../types/frame";
import { unwrap } from "../types/result";
import { DEFAULT_SKIN, resolve_hud_style, type IHudStyle, type ISkinConfig } from "../skin/skin_config";
import { DEFAULT_RENDERER_CONFIG, merge_renderer_config, type IRendererConfig } from "./base_renderer";
import { bind_instance, type IDrawItem, type IRenderBackend } from "./backend/render_backend";
import { build_frame_context, type IFrameContext } from "./frame_context";
import { validate_frame_input } from "./validation";
import { HitObjectRenderer } from "./standard/hit_object_renderer";
import { SliderBodyRenderer } from "./standard/slider_body_renderer";
import { SliderCapRenderer } from "./standard/slider_cap_renderer";
import { BackgroundRenderer } from "./standard/background_renderer";
import { HudCompositor } from "./hud/hud_compositor";

const yield_to_event_loop = (): Promise<void> => new Promise((resolve) => setImmediate(resolve));

export class FrameRenderer {
    readonly circles = new HitObjectRenderer();
    readonly slider_bodies = new SliderBodyRenderer();
    readonly slider_caps = new SliderCapRenderer();
    readonly background = new BackgroundRenderer();
    readonly hud = new HudCompositor();

    private backend: IRenderBackend;
    private config: IRendererConfig;
    private style: IHudStyle;
    private generation: number = 0;
    private _last_frame_ms: number = 0;

    constructor(backend: IRenderBackend, config: Partial<IRendererConfig> = DEFAULT_RENDERER_CONFIG, skin: ISkinConfig = DEFAULT_SKIN) {
        this.backend = backend;
        this.config = merge_renderer_config(config);
        this.style = resolve_hud_style(skin);
    }

    get last_frame_ms(): number {
        return this._last_frame_ms;
    }

    update_config(config: Partial<IRendererConfig>): void {
        this.config = { ...this.config, ...config };
    }

    set_skin(skin: ISkinConfig): void {
        this.style = resolve_hud_style(skin);
    }

    // throws when the producer broke the input contract
    build_context(input: IFrameInput): IFrameContext {
        return build_frame_context(unwrap(validate_frame_input(input, this.config)), this.config, this.style);
    }

    // stages are prepared circles -> slider bodies -> slider caps -> background -> hud, all against one context;
    // layers go background, then objects back to front (body, caps, head per slider), then the hud
    build_draw_list(ctx: IFrameContext): IDrawItem[] {
        const circles = this.circles.prepare(ctx);
        const bodies = this.slider_bodies.prepare(ctx);
        const caps = this.slider_caps.prepare(ctx);
        const background = this.background.prepare(ctx);
        const hud = this.hud.prepare(ctx);

        const per_object: IDrawItem[][] = ctx.input.objects.map(() => []);

        for (const body of bodies) per_object[body.box.object_index].push(bind_instance(this.slider_bodies, body, ctx));
        for (const cap of caps) per_object[cap.object_index].push(bind_instance(this.slider_caps, cap, ctx));
        for (const circle of circles) per_object[circle.index].push(bind_instance(this.circles, circle, ctx));

        const items: IDrawItem[] = background.map((inst) => bind_instance(this.background, inst, ctx));

        // earlier objects end up on top
        for (let i = per_object.length - 1; i >= 0; i--) {
            items.push(...per_object[i]);
        }

        for (const inst of hud) items.push(bind_instance(this.hud, inst, ctx));
        return items;
    }

    hit_test(input: IFrameInput, point: Vec2): string | null {
        return this.hud.hit_test(this.build_context(input), point);
    }

    // whole frame in one go; any frame still rendering asynchronously is superseded
    render_sync(input: IFrameInput): IRenderBackend {
        ++this.generation;
        const start = performance.now();
        const items = this.prepare_frame(input);
        this.backend.rasterize_tiles(items, 0, this.backend.tile_count);
        this._last_frame_ms = performance.now() - start;
        return this.backend;
    }

    // rasterizes in tile batches, yielding in between; resolves null when a newer
    // frame was requested meanwhile, leaving the framebuffer to that frame
    async render(input: IFrameInput): Promise<IRenderBackend | null> {
        const generation = ++this.generation;
        const start = performance.now();
        const items = this.prepare_frame(input);
        const batch = Math.max(1, this.config.tiles_per_batch);

        for (let first = 0; first < this.backend.tile_count; first += batch) {
            if (generation !== this.generation) {
                console.debug(`[FrameRenderer] frame ${generation} superseded by ${this.generation}`);
                return null;
            }

            this.backend.rasterize_tiles(items, first, batch);
            await yield_to_event_loop();
        }

        if (generation !== this.generation) {
            console.debug(`[FrameRenderer] frame ${generation} superseded by ${this.generation}`);
            return null;
        }

        this._last_frame_ms = performance.now() - start;
        return this.backend;
    }

    private prepare_frame(input: IFrameInput): IDrawItem[] {
        const ctx = this.build_context(input);
        const [w, h] = input.frame.screen_size;

        if (this.backend.tile_size !== Math.max(1, Math.floor(this.config.tile_size))) {
            this.backend.set_tile_size(this.config.tile_size);
        }

        if (this.backend.width !== Math.floor(w) || this.backend.height !== Math.floor(h)) {
            this.backend.resize(w, h);
        }

        this.backend.clear();
        return this.build_draw_list(ctx);
    }
}
