import type { RenderSurface } from '../types';
import { Sprite } from '../sprites/sprite';
import { requireAsset, ASSETS } from '../assets';
import { BACKGROUND_VEL } from '../constants/tuning';

/**
 * One horizontally tiling star layer scrolling to the left.
 * The scroll position is measured in sprite pixels, independent of the window size.
 */
export class Background {
    constructor(readonly sprite: Sprite, readonly vel: number, public pos = 0) { }

    static load(surface: RenderSurface, path: string, vel: number): Background {
        return new Background(requireAsset(Sprite.load(surface, path), path), vel);
    }

    // Sprites are shared; only the scroll position is copied.
    clone(): Background { return new Background(this.sprite, this.vel, this.pos); }

    advance(elapsed: number): void {
        const [spriteW] = this.sprite.size();
        this.pos = (this.pos + this.vel * elapsed) % spriteW;
    }

    // Scrolls by `elapsed` seconds, then tiles the layer scaled to the window height.
    render(surface: RenderSurface, elapsed: number): void {
        this.advance(elapsed);
        const [spriteW, spriteH] = this.sprite.size();
        const [winW, winH] = surface.outputSize();
        const scale = winH / spriteH;
        const tileW = spriteW * scale;
        if (!(tileW > 0)) return;
        for (let left = -this.pos * scale; left < winW; left += tileW) {
            this.sprite.render(surface, { x: left, y: 0, w: tileW, h: winH });
        }
    }
}

// Back, middle and front layers; views pass these to each other so the starfield keeps scrolling across transitions.
export class Backgrounds {
    constructor(readonly back: Background, readonly middle: Background, readonly front: Background) { }

    static load(surface: RenderSurface): Backgrounds {
        return new Backgrounds(
            Background.load(surface, ASSETS.STAR_BG, BACKGROUND_VEL.BACK),
            Background.load(surface, ASSETS.STAR_MG, BACKGROUND_VEL.MIDDLE),
            Background.load(surface, ASSETS.STAR_FG, BACKGROUND_VEL.FRONT),
        );
    }

    clone(): Backgrounds { return new Backgrounds(this.back.clone(), this.middle.clone(), this.front.clone()); }
}
