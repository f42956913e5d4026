import type { Context } from './context';
import type { View } from './view';
import { ViewAction } from './view';
import { Sprite } from './sprites/sprite';
import { Backgrounds } from './game/background';
import { ShipView } from './game';
import { requireAsset, ASSETS } from './assets';
import { COLORS, MENU_FONT_SIZE, MENU_SPACING, MENU_TOP } from './constants/tuning';

export type MenuAction = 'newGame' | 'quit';

interface MenuEntry {
    action: MenuAction;
    // shown while the entry is not selected
    idle: Sprite;
    hover: Sprite;
}

export const MENU_ENTRIES: readonly { label: string; action: MenuAction }[] = [
    { label: 'New Game', action: 'newGame' },
    { label: 'Quit', action: 'quit' },
];

function labelSprite(context: Context, label: string, color: number): Sprite {
    return requireAsset(context.textSprite(label, ASSETS.MENU_FONT, MENU_FONT_SIZE, color), `${ASSETS.MENU_FONT} (${label})`);
}

function createEntries(context: Context): MenuEntry[] {
    return MENU_ENTRIES.map(({ label, action }) => ({
        action,
        idle: labelSprite(context, label, COLORS.MENU_IDLE),
        hover: labelSprite(context, label, COLORS.MENU_HOVER),
    }));
}

export class MainMenuView implements View {
    private entries: MenuEntry[];
    // Labels are freed when the menu loses focus and rasterized again if it comes back
    private released = false;
    private selected = 0;

    constructor(context: Context, readonly backgrounds: Backgrounds) {
        this.entries = createEntries(context);
    }

    static create(context: Context): MainMenuView {
        return new MainMenuView(context, Backgrounds.load(context.surface));
    }

    get selectedAction(): MenuAction { return this.entries[this.selected].action; }

    resume(context: Context): void {
        if (!this.released) return;
        this.entries = createEntries(context);
        this.released = false;
    }

    pause(context: Context): void {
        if (this.released) return;
        for (const entry of this.entries) {
            entry.idle.release(context.surface);
            entry.hover.release(context.surface);
        }
        this.released = true;
    }

    private run(action: MenuAction, context: Context): ViewAction {
        switch (action) {
            case 'newGame': return ViewAction.change(new ShipView(context, this.backgrounds.clone()));
            case 'quit': return ViewAction.quit();
        }
    }

    render(context: Context, elapsed: number): ViewAction {
        const events = context.events;
        if (events.now.quit || events.wasPressed('escape')) return ViewAction.quit();
        if (events.wasPressed('space')) return this.run(this.selectedAction, context);

        // Selection wraps around at both ends
        const count = this.entries.length;
        if (events.wasPressed('up')) this.selected = (this.selected - 1 + count) % count;
        if (events.wasPressed('down')) this.selected = (this.selected + 1) % count;

        const surface = context.surface;
        surface.clear(COLORS.CLEAR);
        this.backgrounds.back.render(surface, elapsed);
        this.backgrounds.middle.render(surface, elapsed);
        this.backgrounds.front.render(surface, elapsed);

        const [winW] = context.outputSize();
        this.entries.forEach((entry, i) => {
            const sprite = i === this.selected ? entry.hover : entry.idle;
            const [w, h] = sprite.size();
            sprite.render(surface, { x: (winW - w) / 2, y: MENU_TOP + MENU_SPACING * i, w, h });
        });

        return ViewAction.none();
    }
}
