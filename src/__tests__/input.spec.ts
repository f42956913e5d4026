import { describe, it, expect } from 'vitest';
import { DEFAULT_BINDINGS, Events } from '../game/input';
import { FakeSurface, ScriptedInput } from './helpers/fakes';

function setup() {
    const input = new ScriptedInput();
    const surface = new FakeSurface();
    const events = new Events(input);
    return { input, surface, events, pump: () => events.pump(surface) };
}

describe('Events', () => {
    it('reports one press edge while a key is held, then one release edge', () => {
        const { input, events, pump } = setup();
        const edges: (boolean | undefined)[] = [];
        const held: boolean[] = [];
        const frame = () => { pump(); edges.push(events.now.keys.up); held.push(events.isHeld('up')); };

        input.down('ArrowUp'); frame();
        // key repeat while held
        input.down('ArrowUp').down('ArrowUp'); frame();
        frame();
        input.down('ArrowUp'); frame();
        input.up('ArrowUp'); frame();
        frame();

        expect(edges).toEqual([true, undefined, undefined, undefined, false, undefined]);
        expect(held).toEqual([true, true, true, true, false, false]);
    });

    it('treats a press and release within one frame as a release', () => {
        const { input, events, pump } = setup();
        input.down('Space').up('Space');
        pump();
        expect(events.wasReleased('space')).toBe(true);
        expect(events.wasPressed('space')).toBe(false);
        expect(events.isHeld('space')).toBe(false);
    });

    it('tracks keys independently', () => {
        const { input, events, pump } = setup();
        input.down('ArrowLeft');
        pump();
        input.down('ArrowUp');
        pump();
        expect(events.now.keys.left).toBeUndefined();
        expect(events.wasPressed('up')).toBe(true);
        expect(events.held.left && events.held.up).toBe(true);
        expect(events.held.right).toBe(false);
    });

    it('ignores keys that are not bound', () => {
        const { input, events, pump } = setup();
        input.down('KeyZ').up('KeyQ');
        pump();
        expect(Object.values(events.now.keys).every(edge => edge === undefined)).toBe(true);
        expect(Object.values(events.held).some(Boolean)).toBe(false);
    });

    it('keeps the quit and resize flags for a single frame', () => {
        const { input, surface, events, pump } = setup();
        surface.size = [1024, 768];
        input.push({ type: 'resize' }, { type: 'quit' });
        pump();
        expect(events.now.quit).toBe(true);
        expect(events.now.resize).toEqual([1024, 768]);
        pump();
        expect(events.now.quit).toBe(false);
        expect(events.now.resize).toBeUndefined();
    });

    it('honours custom bindings', () => {
        const input = new ScriptedInput();
        const events = new Events(input, { ...DEFAULT_BINDINGS, up: 'KeyW' });
        input.down('KeyW').down('ArrowUp');
        events.pump(new FakeSurface());
        expect(events.wasPressed('up')).toBe(true);
    });

    it('rejects two keys bound to the same code', () => {
        expect(() => new Events(new ScriptedInput(), { ...DEFAULT_BINDINGS, one: 'Space' }))
            .toThrow("Keys 'space' and 'one' are both bound to Space");
    });
});
