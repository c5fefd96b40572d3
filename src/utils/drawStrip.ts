import { CELL_ON, type GridSnapshot } from '../types';

export const OFF_COLOR = '#ffffff';
export const ON_COLOR = '#a9a9a9'; // darkgray
export const EDGE_COLOR = '#000000';

export type StripContext = Pick<
    CanvasRenderingContext2D,
    'fillStyle' | 'strokeStyle' | 'lineWidth' | 'clearRect' | 'fillRect' | 'strokeRect'
>;

/**
 * Draws one square per cell, left to right, each with a 1px outline.
 * Strokes are offset by half a pixel so the outline stays crisp.
 */
export function drawStrip(ctx: StripContext, cells: GridSnapshot, cellSize: number): void {
    ctx.clearRect(0, 0, cells.length * cellSize, cellSize);
    ctx.lineWidth = 1;
    ctx.strokeStyle = EDGE_COLOR;

    for (let i = 0; i < cells.length; i++) {
        const x = i * cellSize;
        ctx.fillStyle = cells[i] === CELL_ON ? ON_COLOR : OFF_COLOR;
        ctx.fillRect(x, 0, cellSize, cellSize);
        ctx.strokeRect(x + 0.5, 0.5, cellSize - 1, cellSize - 1);
    }
}
