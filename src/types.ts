import type { GridError } from './grid/errors';

export const DEFAULT_HEIGHT = 14;

export const CELL_OFF = 0;
export const CELL_ON = 1;

export type CellValue = typeof CELL_OFF | typeof CELL_ON;

export type GridCells = CellValue[];

// Read-only view handed to renderers
export type GridSnapshot = readonly CellValue[];

export const GRID_FILE_VERSION = 1;

export interface GridFile {
    version: typeof GRID_FILE_VERSION;
    height: number;
    grid: number[];
}

export type GridFailure = { ok: false; error: GridError };

export type GridResult = { ok: true } | GridFailure;

export type GridValueResult<T> = { ok: true; value: T } | GridFailure;

export function isCellValue(value: unknown): value is CellValue {
    return value === CELL_OFF || value === CELL_ON;
}
