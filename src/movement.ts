import type { HeldKeys } from './game/input';

export interface Delta { dx: number; dy: number; }

// Opposing keys cancel; diagonal movement is scaled by 1/sqrt(2) so it is no
// faster than moving along one axis.
export function movementDelta(held: Pick<HeldKeys, 'up' | 'down' | 'left' | 'right'>, speed: number, elapsed: number): Delta {
    const vertical = held.up !== held.down;
    const horizontal = held.left !== held.right;
    const moved = (vertical && horizontal ? Math.SQRT1_2 : 1) * speed * elapsed;
    const dx = horizontal ? (held.left ? -moved : moved) : 0;
    const dy = vertical ? (held.up ? -moved : moved) : 0;
    return { dx, dy };
}
