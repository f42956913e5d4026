import { describe, it, expect } from 'vitest';
import { EventBus } from '../events';

describe('EventBus', () => {
    it('delivers payloads to every handler of a type, in subscription order', () => {
        const bus = new EventBus();
        const seen: string[] = [];
        bus.on('fps', ({ fps }) => seen.push(`a${fps}`));
        bus.on('fps', ({ fps }) => seen.push(`b${fps}`));
        bus.on('quit', ({ frames }) => seen.push(`quit${frames}`));
        bus.emit('fps', { fps: 60 });
        expect(seen).toEqual(['a60', 'b60']);
    });

    it('stops calling a handler once it is removed', () => {
        const bus = new EventBus();
        const frames: number[] = [];
        const onQuit = ({ frames: n }: { frames: number }) => { frames.push(n); };
        bus.on('quit', onQuit);
        bus.emit('quit', { frames: 1 });
        bus.off('quit', onQuit);
        bus.emit('quit', { frames: 2 });
        // removing twice is harmless
        bus.off('quit', onQuit);
        expect(frames).toEqual([1]);
    });
});
