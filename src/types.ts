export interface Rectangle { x: number; y: number; w: number; h: number; }

// 0xRRGGBB
export type Color = number;

export type Size = [width: number, height: number];

// Opaque handles owned by the surface; sprites only ever read their dimensions.
export interface Texture { readonly width: number; readonly height: number; }
export interface Font { readonly family: string; readonly size: number; }

/**
 * Immediate-mode drawing target the core renders into. Implemented by the host
 * (see PixiSurface) and by in-process fakes in tests.
 */
export interface RenderSurface {
    outputSize(): Size;
    clear(color: Color): void;
    fillRect(rect: Rectangle, color: Color): void;
    // Draws the `src` region of `texture`, stretched to `dest`.
    blit(texture: Texture, src: Rectangle, dest: Rectangle): void;
    present(): void;
    loadTexture(path: string): Texture | undefined;
    loadFont(path: string, size: number): Font | undefined;
    renderText(font: Font, text: string, color: Color): Texture | undefined;
    // Frees a texture the surface created for rendered text. The handle must not be drawn again.
    releaseTexture(texture: Texture): void;
}

export type RawInputEvent =
    | { type: 'keydown'; code: string }
    | { type: 'keyup'; code: string }
    | { type: 'resize' }
    | { type: 'quit' };

// Non-blocking: returns everything queued since the previous poll.
export interface InputSource { poll(): RawInputEvent[]; }
