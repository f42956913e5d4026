// Centralized gameplay & pacing constants.
// Adjust these values to retune the game without hunting through logic files.

// Draws the player's bounding box under the ship sprite
export const DEBUG = false;

// Loop pacing
export const TARGET_FPS = 60;
export const FPS_REPORT_INTERVAL_MS = 1000;

// Player ship
export const PLAYER_SPEED = 180; // px/s
export const SHIP_W = 43;
export const SHIP_H = 39;
export const SHIP_START = { X: 64, Y: 64 };
export const MOVE_REGION_WIDTH = 0.7; // fraction of the window the ship may roam

// Cannon mounts, relative to the ship's top-left corner
export const CANNON_OFFSET_X = 30;
export const CANNON_TOP_Y = 6;
export const CANNON_BOTTOM_Y = SHIP_H - 10;

// Bullets
export const BULLET_SPEED = 240; // px/s
export const BULLET_W = 8;
export const BULLET_H = 4;

export const CANNON_PRESETS = {
    SINE: { amplitude: 10, angularVel: 15 },
    DIVERGENT: { a: 100, b: 1.2 },
};

// Asteroid sheet: 21 x 7 cells, the last 4 cells are empty
export const ASTEROID_SIDE = 96;
export const ASTEROIDS_WIDE = 21;
export const ASTEROIDS_HIGH = 7;
export const ASTEROIDS_TOTAL = ASTEROIDS_WIDE * ASTEROIDS_HIGH - 4;
export const ASTEROID_FPS = { MIN: 10, MAX: 30 };
export const ASTEROID_VEL = { MIN: 50, MAX: 150 }; // px/s

// Parallax layers, px/s
export const BACKGROUND_VEL = { BACK: 20, MIDDLE: 40, FRONT: 80 };

// Main menu layout
export const MENU_FONT_SIZE = 32;
export const MENU_TOP = 32;
export const MENU_SPACING = 48;

export const COLORS = {
    CLEAR: 0x000000,
    DEBUG_BOX: 0xc8c832,
    RECT_BULLET: 0xe6e61e,
    SINE_BULLET: 0x1ee61e,
    DIVERGENT_BULLET: 0xe61e1e,
    MENU_IDLE: 0xdcdcdc,
    MENU_HOVER: 0xffffff,
};
