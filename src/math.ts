import type { Rectangle } from './types';

export function clamp(v: number, min: number, max: number): number {
    return v < min ? min : (v > max ? max : v);
}

// True when `inner` lies entirely within `outer` (shared edges count as inside).
export function rectContains(outer: Rectangle, inner: Rectangle): boolean {
    return inner.x >= outer.x && inner.y >= outer.y
        && inner.x + inner.w <= outer.x + outer.w
        && inner.y + inner.h <= outer.y + outer.h;
}

// Translates `rect` (never resizes it) so that it fits inside `bound`, each axis
// independently. Undefined when the rectangle is wider or taller than the bound.
export function moveInside(rect: Rectangle, bound: Rectangle): Rectangle | undefined {
    if (rect.w > bound.w || rect.h > bound.h) return undefined;
    return {
        x: clamp(rect.x, bound.x, bound.x + bound.w - rect.w),
        y: clamp(rect.y, bound.y, bound.y + bound.h - rect.h),
        w: rect.w,
        h: rect.h,
    };
}
