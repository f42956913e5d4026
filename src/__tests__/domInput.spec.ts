/** @vitest-environment jsdom */
import { describe, it, expect, afterEach } from 'vitest';
import { DomInputSource } from '../game/input';

let source: DomInputSource | undefined;
afterEach(() => { source?.dispose(); source = undefined; });

function key(type: 'keydown' | 'keyup', code: string): KeyboardEvent {
    const e = new KeyboardEvent(type, { code, cancelable: true });
    window.dispatchEvent(e);
    return e;
}

describe('DomInputSource', () => {
    it('queues keyboard events until polled', () => {
        source = new DomInputSource(window);
        key('keydown', 'ArrowUp');
        key('keyup', 'ArrowUp');
        expect(source.poll()).toEqual([
            { type: 'keydown', code: 'ArrowUp' },
            { type: 'keyup', code: 'ArrowUp' },
        ]);
        expect(source.poll()).toEqual([]);
    });

    it('prevents the browser default only for game keys', () => {
        source = new DomInputSource(window);
        expect(key('keydown', 'Space').defaultPrevented).toBe(true);
        expect(key('keydown', 'KeyZ').defaultPrevented).toBe(false);
    });

    it('turns resize and pagehide into resize and quit', () => {
        source = new DomInputSource(window);
        window.dispatchEvent(new Event('resize'));
        window.dispatchEvent(new Event('pagehide'));
        expect(source.poll()).toEqual([{ type: 'resize' }, { type: 'quit' }]);
    });

    it('stops listening once disposed', () => {
        source = new DomInputSource(window);
        source.dispose();
        key('keydown', 'ArrowLeft');
        expect(source.poll()).toEqual([]);
    });
});
