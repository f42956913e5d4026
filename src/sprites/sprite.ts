import type { Rectangle, RenderSurface, Texture } from '../types';
import { rectContains } from '../math';

// Anything that can draw itself into an area of the current frame
export interface Renderable {
    render(surface: RenderSurface, dest: Rectangle): void;
}

/**
 * A region of a texture. Sprites are immutable; regions derived from the same
 * sheet share its texture handle.
 */
export class Sprite implements Renderable {
    private constructor(private readonly texture: Texture, readonly source: Rectangle) { }

    static fromTexture(texture: Texture): Sprite {
        return new Sprite(texture, { x: 0, y: 0, w: texture.width, h: texture.height });
    }

    static load(surface: RenderSurface, path: string): Sprite | undefined {
        const texture = surface.loadTexture(path);
        return texture ? Sprite.fromTexture(texture) : undefined;
    }

    // `rect` is relative to this sprite's own origin.
    region(rect: Rectangle): Sprite | undefined {
        const src = { x: rect.x + this.source.x, y: rect.y + this.source.y, w: rect.w, h: rect.h };
        if (!rectContains(this.source, src)) return undefined;
        return new Sprite(this.texture, src);
    }

    size(): [number, number] { return [this.source.w, this.source.h]; }

    render(surface: RenderSurface, dest: Rectangle): void {
        surface.blit(this.texture, this.source, dest);
    }

    // Frees the underlying texture, invalidating every sprite cut from it.
    release(surface: RenderSurface): void {
        surface.releaseTexture(this.texture);
    }
}

function checkDelay(frameDelay: number): number {
    if (frameDelay === 0 || !Number.isFinite(frameDelay)) throw new Error(`Invalid frame delay: ${frameDelay}`);
    return frameDelay;
}

function checkFps(fps: number): number {
    if (fps === 0) throw new Error('FPS of 0 is invalid');
    return checkDelay(1 / fps);
}

/**
 * Cycles through `frames`, one every `frameDelay` seconds. A negative delay
 * plays the frames backwards.
 */
export class AnimatedSprite implements Renderable {
    private frameDelay: number;
    // Seconds into the cycle, kept within [0, frameCount * |frameDelay|)
    private currentTime = 0;

    constructor(private readonly frames: readonly Sprite[], frameDelay: number) {
        if (frames.length === 0) throw new Error('AnimatedSprite needs at least one frame');
        this.frameDelay = checkDelay(frameDelay);
    }

    static withFps(frames: readonly Sprite[], fps: number): AnimatedSprite {
        return new AnimatedSprite(frames, checkFps(fps));
    }

    get frameCount(): number { return this.frames.length; }

    setFrameDelay(frameDelay: number): void { this.frameDelay = checkDelay(frameDelay); }

    setFps(fps: number): void { this.frameDelay = checkFps(fps); }

    addTime(dt: number): void {
        const step = Math.abs(this.frameDelay);
        const period = this.frameCount * step;
        this.currentTime += this.frameDelay < 0 ? -dt : dt;
        if (this.currentTime < 0) {
            // rewinding past the first frame loops to the last one
            this.currentTime = (this.frameCount - 1) * step;
        } else if (this.currentTime >= period) {
            this.currentTime %= period;
        }
    }

    currentFrame(): number {
        return Math.floor(this.currentTime / Math.abs(this.frameDelay)) % this.frameCount;
    }

    render(surface: RenderSurface, dest: Rectangle): void {
        this.frames[this.currentFrame()].render(surface, dest);
    }
}
