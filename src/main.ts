import { Context } from './context';
import { EventBus, type LoopEventMap } from './events';
import { DomInputSource, Events } from './game/input';
import { spawn } from './loop';
import { MainMenuView } from './menu';
import { PixiSurface } from './pixiSurface';
import { FONT_ASSETS, TEXTURE_ASSETS } from './assets';

async function bootstrap() {
    const root = document.getElementById('app');
    if (!root) throw new Error('Missing #app element');
    const surface = await PixiSurface.create(root, { textures: TEXTURE_ASSETS, fonts: FONT_ASSETS });
    const input = new DomInputSource(window);
    const context = new Context(surface, new Events(input));

    const bus = new EventBus();
    const logFps = ({ fps }: LoopEventMap['fps']) => console.info(`[loop] FPS: ${fps}`);
    const logViewChange = ({ from, to }: LoopEventMap['viewChange']) => console.debug(`[loop] View: ${from.constructor.name} -> ${to.constructor.name}`);
    const logQuit = ({ frames }: LoopEventMap['quit']) => console.info(`[loop] Quit after ${frames} frames`);
    bus.on('fps', logFps);
    bus.on('viewChange', logViewChange);
    bus.on('quit', logQuit);

    try {
        await spawn(context, MainMenuView.create, { bus });
    } finally {
        bus.off('fps', logFps);
        bus.off('viewChange', logViewChange);
        bus.off('quit', logQuit);
        input.dispose();
        surface.destroy();
    }
}

bootstrap().catch(err => console.error('[loop] Game stopped:', err));
