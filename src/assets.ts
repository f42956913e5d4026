// Asset paths are resolved by the surface relative to the page (served from public/).
export const ASSETS = {
    SPACESHIP: 'assets/spaceship.png',
    ASTEROID: 'assets/asteroid.png',
    STAR_BG: 'assets/starBG.png',
    STAR_MG: 'assets/starMG.png',
    STAR_FG: 'assets/starFG.png',
    MENU_FONT: 'assets/belligerent.ttf',
};

export const TEXTURE_ASSETS: readonly string[] = [ASSETS.SPACESHIP, ASSETS.ASTEROID, ASSETS.STAR_BG, ASSETS.STAR_MG, ASSETS.STAR_FG];
export const FONT_ASSETS: readonly string[] = [ASSETS.MENU_FONT];

// Startup assets are mandatory: a missing one aborts view construction.
export function requireAsset<T>(value: T | undefined, what: string): T {
    if (value === undefined) throw new Error(`Missing asset: ${what}`);
    return value;
}
