import * as PIXI from 'pixi.js';
import type { Color, Font, Rectangle, RenderSurface, Size, Texture } from './types';

export interface SurfaceAssets {
    textures: readonly string[];
    fonts: readonly string[];
}

// Family name a font file is registered under, e.g. 'assets/belligerent.ttf' -> 'belligerent'
export function fontFamilyFor(path: string): string {
    const file = path.slice(path.lastIndexOf('/') + 1);
    const dot = file.lastIndexOf('.');
    return dot > 0 ? file.slice(0, dot) : file;
}

function isPixiTexture(texture: Texture): texture is PIXI.Texture {
    return texture instanceof PIXI.Texture;
}

/**
 * Immediate-mode drawing on top of pixi.js: every draw call adds a display
 * object to the frame container, `present` renders it, `clear` empties it.
 * Assets are loaded up front by `create`, so lookups during a frame never wait.
 */
export class PixiSurface implements RenderSurface {
    private readonly frame = new PIXI.Container();
    // Sub-textures per sheet, keyed by source rectangle
    private readonly regions = new Map<PIXI.Texture, Map<string, PIXI.Texture>>();
    // `resizeTo` only follows the parent on the next animation frame
    private resizePending = false;
    private readonly onResize = () => { this.resizePending = true; };

    private constructor(readonly app: PIXI.Application) {
        window.addEventListener('resize', this.onResize);
    }

    static async create(parent: HTMLElement, assets: SurfaceAssets): Promise<PixiSurface> {
        const app = new PIXI.Application();
        await app.init({ resizeTo: parent, background: '#000000', antialias: true, autoStart: false });
        parent.appendChild(app.canvas);
        await PIXI.Assets.load([...assets.textures]);
        await Promise.all(assets.fonts.map(src => PIXI.Assets.load({ alias: src, src, data: { family: fontFamilyFor(src) } })));
        return new PixiSurface(app);
    }

    outputSize(): Size {
        if (this.resizePending) {
            this.resizePending = false;
            this.app.resize();
        }
        return [this.app.screen.width, this.app.screen.height];
    }

    clear(color: Color): void {
        this.app.renderer.background.color = color;
        for (const child of this.frame.removeChildren()) child.destroy();
    }

    fillRect(rect: Rectangle, color: Color): void {
        this.frame.addChild(new PIXI.Graphics().rect(rect.x, rect.y, rect.w, rect.h).fill({ color }));
    }

    blit(texture: Texture, src: Rectangle, dest: Rectangle): void {
        if (!isPixiTexture(texture)) throw new Error('PixiSurface can only draw textures it loaded');
        const sprite = new PIXI.Sprite(this.regionOf(texture, src));
        sprite.x = dest.x; sprite.y = dest.y;
        sprite.width = dest.w; sprite.height = dest.h;
        this.frame.addChild(sprite);
    }

    present(): void {
        this.app.renderer.render({ container: this.frame });
    }

    loadTexture(path: string): Texture | undefined {
        if (!PIXI.Assets.cache.has(path)) return undefined;
        const texture: unknown = PIXI.Assets.get(path);
        return texture instanceof PIXI.Texture ? texture : undefined;
    }

    loadFont(path: string, size: number): Font | undefined {
        if (!PIXI.Assets.cache.has(path)) return undefined;
        return { family: fontFamilyFor(path), size };
    }

    renderText(font: Font, text: string, color: Color): Texture | undefined {
        const label = new PIXI.Text({ text, style: { fontFamily: font.family, fontSize: font.size, fill: color } });
        const texture = this.app.renderer.generateTexture(label);
        label.destroy();
        return texture;
    }

    releaseTexture(texture: Texture): void {
        if (!isPixiTexture(texture)) throw new Error('PixiSurface can only release textures it created');
        for (const region of this.regions.get(texture)?.values() ?? []) region.destroy(false);
        this.regions.delete(texture);
        texture.destroy(true);
    }

    get cachedRegionCount(): number {
        let count = 0;
        for (const cache of this.regions.values()) count += cache.size;
        return count;
    }

    destroy(): void {
        window.removeEventListener('resize', this.onResize);
        for (const cache of this.regions.values()) for (const region of cache.values()) region.destroy(false);
        this.regions.clear();
        this.frame.destroy({ children: true });
        this.app.destroy(true);
    }

    private regionOf(texture: PIXI.Texture, src: Rectangle): PIXI.Texture {
        let cache = this.regions.get(texture);
        if (!cache) { cache = new Map(); this.regions.set(texture, cache); }
        const key = `${src.x},${src.y},${src.w},${src.h}`;
        let region = cache.get(key);
        if (!region) {
            const frame = new PIXI.Rectangle(texture.frame.x + src.x, texture.frame.y + src.y, src.w, src.h);
            region = new PIXI.Texture({ source: texture.source, frame });
            cache.set(key, region);
        }
        return region;
    }
}
