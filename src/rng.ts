export type Rng = () => number;

// Mulberry32 PRNG; deterministic for a given seed, values in [0, 1)
export function randomRng(seed: number): Rng {
    let s = seed >>> 0;
    return function () {
        s += 0x6D2B79F5;
        let t = Math.imul(s ^ (s >>> 15), 1 | s);
        t ^= t + Math.imul(t ^ (t >>> 7), 61 | t);
        return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
    };
}

// Uniform value in [min, max)
export function rangeOf(rng: Rng, min: number, max: number): number {
    return min + rng() * (max - min);
}
