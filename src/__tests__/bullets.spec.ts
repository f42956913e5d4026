import { describe, it, expect } from 'vitest';
import { bulletRect, renderBullet, spawnBullets, updateBullet, updateBullets, type Bullet } from '../game/bullets';
import { CANNON_PRESETS, COLORS } from '../constants/tuning';
import { FakeSurface, makeContext } from './helpers/fakes';

const ship = { x: 64, y: 64, w: 43, h: 39 };
const straight = (x: number): Bullet => ({ kind: 'rect', rect: { x, y: 100, w: 8, h: 4 } });

describe('spawnBullets', () => {
    it('puts one bullet at each cannon tip', () => {
        expect(spawnBullets({ kind: 'rect' }, ship)).toEqual([
            { kind: 'rect', rect: { x: 94, y: 70, w: 8, h: 4 } },
            { kind: 'rect', rect: { x: 94, y: 93, w: 8, h: 4 } },
        ]);
    });

    it('mirrors the divergent curve for the top cannon', () => {
        const [top, bottom] = spawnBullets({ kind: 'divergent', ...CANNON_PRESETS.DIVERGENT }, ship);
        expect(top).toEqual({ kind: 'divergent', posX: 94, originY: 70, a: -100, b: 1.2, totalTime: 0 });
        expect(bottom).toEqual({ kind: 'divergent', posX: 94, originY: 93, a: 100, b: 1.2, totalTime: 0 });
    });
});

describe('updateBullet', () => {
    it('flies a straight bullet right until it passes the right edge', () => {
        const { context } = makeContext();
        let bullet: Bullet | undefined = straight(0);
        let steps = 0;
        while (bullet) {
            bullet = updateBullet(bullet, context, 0.1);
            steps++;
        }
        // 24px per step: at 792 after 33 steps, past 800 on the 34th
        expect(steps).toBe(34);
    });

    it('keeps a bullet that lands exactly on the right edge', () => {
        const { context } = makeContext();
        expect(updateBullet(straight(776), context, 0.1)).toEqual(straight(800));
    });

    it('waves a sine bullet around its origin', () => {
        const { context } = makeContext();
        const [top] = spawnBullets({ kind: 'sine', ...CANNON_PRESETS.SINE }, ship);
        const next = updateBullet(top, context, 0.1);
        expect(next).toBeDefined();
        if (!next) return;
        const rect = bulletRect(next);
        expect(rect.x).toBeCloseTo(118, 9);
        expect(rect.y).toBeCloseTo(70 + 10 * Math.sin(1.5), 9);
    });

    it('spreads divergent bullets apart', () => {
        const { context } = makeContext();
        const moved = updateBullets(spawnBullets({ kind: 'divergent', ...CANNON_PRESETS.DIVERGENT }, ship), context, 0.6);
        expect(moved).toHaveLength(2);
        const [top, bottom] = moved.map(bulletRect);
        expect(top.x).toBeCloseTo(238, 9);
        expect(top.y).toBeCloseTo(82.5, 9);
        expect(bottom.y).toBeCloseTo(80.5, 9);
    });

    it('drops a divergent bullet that leaves through the top', () => {
        const { context } = makeContext();
        const bullet: Bullet = { kind: 'divergent', posX: 100, originY: 10, a: 100, b: 1, totalTime: 0 };
        // y = 10 + 100 * (0.125 - 0.25) = -2.5
        expect(updateBullet(bullet, context, 0.5)).toBeUndefined();
    });
});

describe('updateBullets', () => {
    it('keeps survivors in order without touching the input', () => {
        const { context } = makeContext();
        const bullets = [straight(10), straight(790), straight(20)];
        expect(updateBullets(bullets, context, 0.1)).toEqual([straight(34), straight(44)]);
        expect(bullets[0]).toEqual(straight(10));
    });
});

describe('renderBullet', () => {
    it('fills the bullet box in the colour of its cannon', () => {
        const surface = new FakeSurface();
        renderBullet(straight(10), surface);
        renderBullet({ kind: 'sine', posX: 50, originY: 60, amplitude: 10, angularVel: 15, totalTime: 0 }, surface);
        expect(surface.calls).toEqual([
            { op: 'fillRect', rect: { x: 10, y: 100, w: 8, h: 4 }, color: COLORS.RECT_BULLET },
            { op: 'fillRect', rect: { x: 50, y: 60, w: 8, h: 4 }, color: COLORS.SINE_BULLET },
        ]);
    });
});
