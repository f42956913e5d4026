import type { Color, Font, RenderSurface, Size } from './types';
import type { Events } from './game/input';
import { Sprite } from './sprites/sprite';

/**
 * Everything a view can reach during a frame: the drawing surface, this
 * frame's input and the fonts loaded so far.
 */
export class Context {
    // "<path>@<size>" -> font. Menu labels use a handful of fonts, so nothing is evicted.
    private readonly fonts = new Map<string, Font>();

    constructor(readonly surface: RenderSurface, readonly events: Events) { }

    outputSize(): Size { return this.surface.outputSize(); }

    // Only the font is cached; the text itself is rasterized on every call.
    textSprite(text: string, fontPath: string, size: number, color: Color): Sprite | undefined {
        const key = `${fontPath}@${size}`;
        let font = this.fonts.get(key);
        if (!font) {
            font = this.surface.loadFont(fontPath, size);
            if (!font) return undefined;
            this.fonts.set(key, font);
        }
        const texture = this.surface.renderText(font, text, color);
        return texture ? Sprite.fromTexture(texture) : undefined;
    }

    get cachedFontCount(): number { return this.fonts.size; }
}
