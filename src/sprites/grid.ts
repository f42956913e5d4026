import { Sprite } from './sprite';

export interface GridSheetOptions {
    cols: number;
    rows: number;
    cellW: number;
    cellH: number;
    // Limit total frames taken from the grid (useful when the last row is partial).
    frameCount?: number;
}

// Slice a grid spritesheet into uniform cells, row by row.
// Throws if a cell falls outside the sheet: sheets are sliced once at startup.
export function sliceGrid(sheet: Sprite, options: GridSheetOptions): Sprite[] {
    const { cols, rows, cellW, cellH } = options;
    const total = Math.min(options.frameCount ?? cols * rows, cols * rows);
    const list: Sprite[] = [];
    for (let ry = 0; ry < rows && list.length < total; ry++) {
        for (let cx = 0; cx < cols && list.length < total; cx++) {
            const cell = sheet.region({ x: cx * cellW, y: ry * cellH, w: cellW, h: cellH });
            if (!cell) throw new Error(`Grid cell (${cx}, ${ry}) lies outside the sheet`);
            list.push(cell);
        }
    }
    return list;
}
