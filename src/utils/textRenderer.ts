import { CELL_ON, type GridSnapshot } from '../types';

export const ON_GLYPH = '■';
export const OFF_GLYPH = '□';

export function renderText(cells: GridSnapshot): string {
    return cells.map(cell => (cell === CELL_ON ? ON_GLYPH : OFF_GLYPH)).join('');
}

export function countOn(cells: GridSnapshot): number {
    return cells.filter(cell => cell === CELL_ON).length;
}
