import type { View } from './view';

// Diagnostics published by the game loop
export type LoopEventMap = {
    fps: { fps: number };
    viewChange: { from: View; to: View };
    quit: { frames: number };
};

type Handler<T> = (payload: T) => void;

export class EventBus {
    private handlers: { [K in keyof LoopEventMap]: Handler<LoopEventMap[K]>[] } = {
        fps: [],
        viewChange: [],
        quit: [],
    };
    on<K extends keyof LoopEventMap>(type: K, fn: Handler<LoopEventMap[K]>) { this.handlers[type].push(fn); }
    off<K extends keyof LoopEventMap>(type: K, fn: Handler<LoopEventMap[K]>) {
        const arr = this.handlers[type]; const i = arr.indexOf(fn); if (i >= 0) arr.splice(i, 1);
    }
    emit<K extends keyof LoopEventMap>(type: K, payload: LoopEventMap[K]) { this.handlers[type].forEach(h => h(payload)); }
}
