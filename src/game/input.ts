import type { InputSource, RawInputEvent, RenderSurface, Size } from '../types';

export const DEFAULT_BINDINGS = {
    escape: 'Escape',
    up: 'ArrowUp',
    down: 'ArrowDown',
    left: 'ArrowLeft',
    right: 'ArrowRight',
    space: 'Space',
    one: 'Digit1',
    two: 'Digit2',
    three: 'Digit3',
} as const;

export type Key = keyof typeof DEFAULT_BINDINGS;
// Key -> KeyboardEvent.code
export type KeyBindings = Record<Key, string>;

const KEYS: readonly Key[] = ['escape', 'up', 'down', 'left', 'right', 'space', 'one', 'two', 'three'];

function keyTable<T>(initial: T): Record<Key, T> {
    return { escape: initial, up: initial, down: initial, left: initial, right: initial, space: initial, one: initial, two: initial, three: initial };
}

// true => pressed this frame, false => released this frame, undefined => no edge
export type KeyEdge = boolean | undefined;

export interface FrameEvents {
    keys: Record<Key, KeyEdge>;
    quit: boolean;
    // Output size after the latest resize received this frame
    resize: Size | undefined;
}

export type HeldKeys = Record<Key, boolean>;

function createFrameEvents(): FrameEvents {
    return { keys: keyTable<KeyEdge>(undefined), quit: false, resize: undefined };
}

export function createHeldKeys(): HeldKeys { return keyTable(false); }

/**
 * Input state seen by views: `now` holds the transitions of the current frame
 * and is rebuilt on every pump, `held` tracks which keys are down across frames.
 */
export class Events {
    now: FrameEvents = createFrameEvents();
    readonly held: HeldKeys = createHeldKeys();
    private readonly byCode = new Map<string, Key>();

    constructor(private readonly source: InputSource, bindings: KeyBindings = DEFAULT_BINDINGS) {
        for (const k of KEYS) {
            const code = bindings[k];
            const other = this.byCode.get(code);
            if (other) throw new Error(`Keys '${other}' and '${k}' are both bound to ${code}`);
            this.byCode.set(code, k);
        }
    }

    isHeld(key: Key): boolean { return this.held[key]; }
    wasPressed(key: Key): boolean { return this.now.keys[key] === true; }
    wasReleased(key: Key): boolean { return this.now.keys[key] === false; }

    pump(surface: RenderSurface): void {
        this.now = createFrameEvents();
        for (const event of this.source.poll()) this.apply(event, surface);
    }

    private apply(event: RawInputEvent, surface: RenderSurface): void {
        switch (event.type) {
            case 'resize':
                this.now.resize = surface.outputSize();
                break;
            case 'quit':
                this.now.quit = true;
                break;
            case 'keydown': {
                const key = this.byCode.get(event.code);
                if (!key) return;
                // OS key repeat sends keydown again while held; only the first one is an edge
                if (!this.held[key]) this.now.keys[key] = true;
                this.held[key] = true;
                break;
            }
            case 'keyup': {
                const key = this.byCode.get(event.code);
                if (!key) return;
                this.now.keys[key] = false;
                this.held[key] = false;
                break;
            }
        }
    }
}

/**
 * Queues keyboard, resize and page-hide events from a browser window until the
 * loop polls them.
 */
export class DomInputSource implements InputSource {
    private queue: RawInputEvent[] = [];
    private readonly gameCodes: Set<string>;

    private readonly onKeyDown = (e: KeyboardEvent) => {
        if (this.gameCodes.has(e.code)) e.preventDefault();
        this.queue.push({ type: 'keydown', code: e.code });
    };
    private readonly onKeyUp = (e: KeyboardEvent) => {
        if (this.gameCodes.has(e.code)) e.preventDefault();
        this.queue.push({ type: 'keyup', code: e.code });
    };
    private readonly onResize = () => { this.queue.push({ type: 'resize' }); };
    private readonly onPageHide = () => { this.queue.push({ type: 'quit' }); };

    constructor(private readonly target: Window, bindings: KeyBindings = DEFAULT_BINDINGS) {
        this.gameCodes = new Set(Object.values(bindings));
        target.addEventListener('keydown', this.onKeyDown);
        target.addEventListener('keyup', this.onKeyUp);
        target.addEventListener('resize', this.onResize);
        target.addEventListener('pagehide', this.onPageHide);
    }

    poll(): RawInputEvent[] {
        const drained = this.queue;
        this.queue = [];
        return drained;
    }

    dispose(): void {
        this.target.removeEventListener('keydown', this.onKeyDown);
        this.target.removeEventListener('keyup', this.onKeyUp);
        this.target.removeEventListener('resize', this.onResize);
        this.target.removeEventListener('pagehide', this.onPageHide);
        this.queue = [];
    }
}
