import type { Rectangle, RenderSurface } from '../types';
import type { Context } from '../context';
import {
    BULLET_H, BULLET_SPEED, BULLET_W, CANNON_BOTTOM_Y, CANNON_OFFSET_X, CANNON_TOP_Y, COLORS,
} from '../constants/tuning';

export type CannonType =
    | { kind: 'rect' }
    | { kind: 'sine'; amplitude: number; angularVel: number }
    | { kind: 'divergent'; a: number; b: number };

export interface RectBullet { kind: 'rect'; rect: Rectangle; }

// The bounding box of the curved bullets is derived from their elapsed time.
export interface SineBullet { kind: 'sine'; posX: number; originY: number; amplitude: number; angularVel: number; totalTime: number; }

// Vertical offset follows a * ((t / b)^3 - (t / b)^2): `a` sets the height, `b` the width of the curve.
export interface DivergentBullet { kind: 'divergent'; posX: number; originY: number; a: number; b: number; totalTime: number; }

export type Bullet = RectBullet | SineBullet | DivergentBullet;

export function bulletRect(bullet: Bullet): Rectangle {
    switch (bullet.kind) {
        case 'rect':
            return bullet.rect;
        case 'sine': {
            const dy = bullet.amplitude * Math.sin(bullet.angularVel * bullet.totalTime);
            return { x: bullet.posX, y: bullet.originY + dy, w: BULLET_W, h: BULLET_H };
        }
        case 'divergent': {
            const r = bullet.totalTime / bullet.b;
            const dy = bullet.a * (r ** 3 - r ** 2);
            return { x: bullet.posX, y: bullet.originY + dy, w: BULLET_W, h: BULLET_H };
        }
    }
}

// Returns the bullet advanced by `dt` seconds, or undefined once it has left the screen.
export function updateBullet(bullet: Bullet, context: Context, dt: number): Bullet | undefined {
    const [w, h] = context.outputSize();
    switch (bullet.kind) {
        case 'rect': {
            const rect = { ...bullet.rect, x: bullet.rect.x + BULLET_SPEED * dt };
            return rect.x > w ? undefined : { kind: 'rect', rect };
        }
        case 'sine': {
            const next: SineBullet = { ...bullet, posX: bullet.posX + BULLET_SPEED * dt, totalTime: bullet.totalTime + dt };
            return bulletRect(next).x > w ? undefined : next;
        }
        case 'divergent': {
            const next: DivergentBullet = { ...bullet, posX: bullet.posX + BULLET_SPEED * dt, totalTime: bullet.totalTime + dt };
            const rect = bulletRect(next);
            const outside = rect.x > w || rect.x < 0 || rect.y > h || rect.y < 0;
            return outside ? undefined : next;
        }
    }
}

// Survivors only, in their original order
export function updateBullets(bullets: readonly Bullet[], context: Context, dt: number): Bullet[] {
    const next: Bullet[] = [];
    for (const b of bullets) {
        const updated = updateBullet(b, context, dt);
        if (updated) next.push(updated);
    }
    return next;
}

const BULLET_COLORS: Record<Bullet['kind'], number> = {
    rect: COLORS.RECT_BULLET,
    sine: COLORS.SINE_BULLET,
    divergent: COLORS.DIVERGENT_BULLET,
};

export function renderBullet(bullet: Bullet, surface: RenderSurface): void {
    surface.fillRect(bulletRect(bullet), BULLET_COLORS[bullet.kind]);
}

// One bullet at the tip of each cannon, top mount first.
export function spawnBullets(cannon: CannonType, ship: Rectangle): Bullet[] {
    const x = ship.x + CANNON_OFFSET_X;
    const mounts = [ship.y + CANNON_TOP_Y, ship.y + CANNON_BOTTOM_Y];
    switch (cannon.kind) {
        case 'rect':
            return mounts.map((y): Bullet => ({ kind: 'rect', rect: { x, y, w: BULLET_W, h: BULLET_H } }));
        case 'sine': {
            const { amplitude, angularVel } = cannon;
            return mounts.map((y): Bullet => ({ kind: 'sine', posX: x, originY: y, amplitude, angularVel, totalTime: 0 }));
        }
        case 'divergent': {
            const { a, b } = cannon;
            // mirrored so the two bullets spread apart
            return mounts.map((y, i): Bullet => ({ kind: 'divergent', posX: x, originY: y, a: i === 0 ? -a : a, b, totalTime: 0 }));
        }
    }
}
