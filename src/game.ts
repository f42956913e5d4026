import type { Context } from './context';
import type { View } from './view';
import { ViewAction } from './view';
import { Backgrounds } from './game/background';
import { Asteroid, loadAsteroidFrames } from './game/asteroid';
import { renderBullet, spawnBullets, updateBullets, type Bullet } from './game/bullets';
import { createShip, loadShipSprites, renderShip, steerShip, type Ship } from './game/ship';
import { movementDelta } from './movement';
import { randomRng, type Rng } from './rng';
import { MainMenuView } from './menu';
import { CANNON_PRESETS, COLORS, DEBUG, MOVE_REGION_WIDTH, PLAYER_SPEED } from './constants/tuning';

/** Gameplay: the player's ship, its bullets and an asteroid over the parallax starfield. */
export class ShipView implements View {
    readonly player: Ship;
    bullets: Bullet[] = [];
    readonly asteroid: Asteroid;

    constructor(context: Context, readonly backgrounds: Backgrounds, rng: Rng = randomRng(Date.now())) {
        this.player = createShip(loadShipSprites(context.surface));
        this.asteroid = new Asteroid(context, loadAsteroidFrames(context.surface), rng);
    }

    static create(context: Context): ShipView {
        return new ShipView(context, Backgrounds.load(context.surface));
    }

    render(context: Context, elapsed: number): ViewAction {
        const events = context.events;
        if (events.now.quit) return ViewAction.quit();
        if (events.wasPressed('escape')) {
            return ViewAction.change(new MainMenuView(context, this.backgrounds.clone()));
        }

        // Change the player's cannons
        if (events.wasPressed('one')) this.player.cannon = { kind: 'rect' };
        if (events.wasPressed('two')) this.player.cannon = { kind: 'sine', ...CANNON_PRESETS.SINE };
        if (events.wasPressed('three')) this.player.cannon = { kind: 'divergent', ...CANNON_PRESETS.DIVERGENT };

        const [w, h] = context.outputSize();
        const delta = movementDelta(events.held, PLAYER_SPEED, elapsed);
        steerShip(this.player, delta, { x: 0, y: 0, w: w * MOVE_REGION_WIDTH, h });

        this.bullets = updateBullets(this.bullets, context, elapsed);
        this.asteroid.update(context, elapsed);

        // Fire after updating so new bullets start at the cannon tips
        if (events.wasPressed('space')) this.bullets.push(...spawnBullets(this.player.cannon, this.player.rect));

        const surface = context.surface;
        surface.clear(COLORS.CLEAR);
        this.backgrounds.back.render(surface, elapsed);
        this.backgrounds.middle.render(surface, elapsed);
        if (DEBUG) surface.fillRect(this.player.rect, COLORS.DEBUG_BOX);
        renderShip(this.player, surface);
        for (const bullet of this.bullets) renderBullet(bullet, surface);
        this.asteroid.render(surface);
        // Foreground layer passes over the ship
        this.backgrounds.front.render(surface, elapsed);

        return ViewAction.none();
    }
}
