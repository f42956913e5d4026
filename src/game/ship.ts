import type { Rectangle, RenderSurface } from '../types';
import type { Delta } from '../movement';
import type { CannonType } from './bullets';
import { Sprite } from '../sprites/sprite';
import { sliceGrid } from '../sprites/grid';
import { moveInside } from '../math';
import { requireAsset, ASSETS } from '../assets';
import { SHIP_H, SHIP_START, SHIP_W } from '../constants/tuning';

// Cells of the 3x3 ship sheet, row-major: rows go up/mid/down, columns norm/fast/slow
export const ShipFrame = {
    UpNorm: 0,
    UpFast: 1,
    UpSlow: 2,
    MidNorm: 3,
    MidFast: 4,
    MidSlow: 5,
    DownNorm: 6,
    DownFast: 7,
    DownSlow: 8,
} as const;
export type ShipFrame = typeof ShipFrame[keyof typeof ShipFrame];

export interface Ship {
    rect: Rectangle;
    sprites: Sprite[];
    current: ShipFrame;
    cannon: CannonType;
}

export function loadShipSprites(surface: RenderSurface): Sprite[] {
    const sheet = requireAsset(Sprite.load(surface, ASSETS.SPACESHIP), ASSETS.SPACESHIP);
    return sliceGrid(sheet, { cols: 3, rows: 3, cellW: SHIP_W, cellH: SHIP_H });
}

export function createShip(sprites: Sprite[]): Ship {
    return {
        rect: { x: SHIP_START.X, y: SHIP_START.Y, w: SHIP_W, h: SHIP_H },
        sprites,
        current: ShipFrame.MidNorm,
        cannon: { kind: 'rect' },
    };
}

// Moving right tilts the ship "fast", moving left "slow".
export function selectShipFrame(dx: number, dy: number): ShipFrame {
    if (dx === 0 && dy < 0) return ShipFrame.UpNorm;
    if (dx > 0 && dy < 0) return ShipFrame.UpFast;
    if (dx < 0 && dy < 0) return ShipFrame.UpSlow;
    if (dx === 0 && dy === 0) return ShipFrame.MidNorm;
    if (dx > 0 && dy === 0) return ShipFrame.MidFast;
    if (dx < 0 && dy === 0) return ShipFrame.MidSlow;
    if (dx === 0 && dy > 0) return ShipFrame.DownNorm;
    if (dx > 0 && dy > 0) return ShipFrame.DownFast;
    if (dx < 0 && dy > 0) return ShipFrame.DownSlow;
    throw new Error(`Unreachable ship direction (${dx}, ${dy})`);
}

// Applies the frame's movement, keeps the ship inside `region` and picks the matching sprite.
export function steerShip(ship: Ship, delta: Delta, region: Rectangle): void {
    const moved = { ...ship.rect, x: ship.rect.x + delta.dx, y: ship.rect.y + delta.dy };
    // a window smaller than the ship leaves it where it was
    ship.rect = moveInside(moved, region) ?? ship.rect;
    ship.current = selectShipFrame(delta.dx, delta.dy);
}

export function renderShip(ship: Ship, surface: RenderSurface): void {
    ship.sprites[ship.current].render(surface, ship.rect);
}
