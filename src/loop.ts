import type { Context } from './context';
import type { View } from './view';
import { EventBus } from './events';
import { FPS_REPORT_INTERVAL_MS, TARGET_FPS } from './constants/tuning';

export interface Clock {
    // Milliseconds, monotonic
    now(): number;
    sleep(ms: number): Promise<void>;
}

export const systemClock: Clock = {
    now: () => performance.now(),
    sleep: ms => new Promise(resolve => setTimeout(resolve, ms)),
};

export interface LoopOptions {
    fps?: number;
    clock?: Clock;
    bus?: EventBus;
}

/**
 * Runs the game with the view returned by `init` until a view quits.
 *
 * Frames are accepted at most `fps` times per second. Each accepted frame pumps
 * input, lets the active view update and draw, then either presents the frame,
 * switches to another view or stops. Waiting for the next tick is the only
 * point where the loop yields.
 */
export async function spawn(context: Context, init: (context: Context) => View, options: LoopOptions = {}): Promise<void> {
    const clock = options.clock ?? systemClock;
    const bus = options.bus ?? new EventBus();
    const interval = 1000 / (options.fps ?? TARGET_FPS);

    let current = init(context);
    current.resume?.(context);

    let before = clock.now();
    let lastSecond = before;
    let fps = 0;
    let frames = 0;

    for (;;) {
        const now = clock.now();
        const dt = now - before;
        // Frame came too fast: wait out the tick, then measure again
        if (dt < interval) {
            await clock.sleep(interval - dt);
            continue;
        }

        before = now;
        fps++;
        frames++;
        if (now - lastSecond > FPS_REPORT_INTERVAL_MS) {
            bus.emit('fps', { fps });
            lastSecond = now;
            fps = 0;
        }

        context.events.pump(context.surface);
        const action = current.render(context, dt / 1000);

        switch (action.type) {
            case 'none':
                context.surface.present();
                break;
            case 'quit':
                current.pause?.(context);
                bus.emit('quit', { frames });
                return;
            case 'change': {
                const previous = current;
                previous.pause?.(context);
                current = action.view;
                current.resume?.(context);
                bus.emit('viewChange', { from: previous, to: current });
                break;
            }
        }
    }
}
