import type { Rectangle, RenderSurface } from '../types';
import type { Context } from '../context';
import { AnimatedSprite, Sprite } from '../sprites/sprite';
import { sliceGrid } from '../sprites/grid';
import { rangeOf, type Rng } from '../rng';
import { requireAsset, ASSETS } from '../assets';
import { ASTEROID_FPS, ASTEROID_SIDE, ASTEROID_VEL, ASTEROIDS_HIGH, ASTEROIDS_TOTAL, ASTEROIDS_WIDE } from '../constants/tuning';

export function loadAsteroidFrames(surface: RenderSurface): Sprite[] {
    const sheet = requireAsset(Sprite.load(surface, ASSETS.ASTEROID), ASSETS.ASTEROID);
    return sliceGrid(sheet, { cols: ASTEROIDS_WIDE, rows: ASTEROIDS_HIGH, cellW: ASTEROID_SIDE, cellH: ASTEROID_SIDE, frameCount: ASTEROIDS_TOTAL });
}

/**
 * A single spinning asteroid drifting right to left. Once it has left the
 * screen it comes back from the right edge at a new height, speed and spin.
 */
export class Asteroid {
    readonly sprite: AnimatedSprite;
    rect: Rectangle = { x: 0, y: 0, w: ASTEROID_SIDE, h: ASTEROID_SIDE };
    vel = 0; // px/s, leftwards

    constructor(context: Context, frames: readonly Sprite[], private readonly rng: Rng) {
        this.sprite = AnimatedSprite.withFps(frames, 1);
        this.reset(context);
    }

    reset(context: Context): void {
        const [w, h] = context.outputSize();
        this.sprite.setFps(rangeOf(this.rng, ASTEROID_FPS.MIN, ASTEROID_FPS.MAX));
        this.rect = { x: w, y: this.rng() * Math.max(0, h - ASTEROID_SIDE), w: ASTEROID_SIDE, h: ASTEROID_SIDE };
        this.vel = rangeOf(this.rng, ASTEROID_VEL.MIN, ASTEROID_VEL.MAX);
    }

    update(context: Context, dt: number): void {
        this.rect.x -= dt * this.vel;
        this.sprite.addTime(dt);
        if (this.rect.x < -ASTEROID_SIDE) this.reset(context);
    }

    render(surface: RenderSurface): void {
        this.sprite.render(surface, this.rect);
    }
}
