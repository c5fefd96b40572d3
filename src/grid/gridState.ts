import {
    CELL_OFF,
    CELL_ON,
    DEFAULT_HEIGHT,
    isCellValue,
    type CellValue,
    type GridCells,
    type GridResult,
    type GridSnapshot,
} from '../types';
import { generateJSON, parseGridFile } from '../utils/gridFile';
import { GridError, describeError, fail } from './errors';
import type { GridStorage } from './storage';

/**
 * A fixed-length strip of ON/OFF cells.
 *
 * Construction and `toggle` / `cellAt` throw a `GridError` on bad input.
 * `setState`, `saveState` and `loadState` report failures through a
 * `GridResult` instead, and leave the cells untouched when they fail.
 */
export class GridState {
    readonly height: number;
    private cells: GridCells;
    private readonly storage?: GridStorage;

    constructor(height: number = DEFAULT_HEIGHT, storage?: GridStorage) {
        if (!Number.isInteger(height) || height < 0) {
            throw new GridError('InvalidArgument', `Grid height must be a non-negative integer, got ${height}`);
        }
        this.height = height;
        this.cells = new Array<CellValue>(height).fill(CELL_OFF);
        this.storage = storage;
    }

    static create(height: number = DEFAULT_HEIGHT, storage?: GridStorage): GridState {
        return new GridState(height, storage);
    }

    get length(): number {
        return this.cells.length;
    }

    toggle(index: number): void {
        this.assertIndex(index);
        this.cells[index] = this.cells[index] === CELL_OFF ? CELL_ON : CELL_OFF;
    }

    cellAt(index: number): CellValue {
        this.assertIndex(index);
        return this.cells[index];
    }

    getState(): GridCells {
        return this.cells.slice();
    }

    setState(next: readonly unknown[]): GridResult {
        if (next.length !== this.length) {
            return fail('SizeMismatch', `State length ${next.length} does not match grid height ${this.length}`);
        }

        const replacement: GridCells = [];
        for (let i = 0; i < next.length; i++) {
            const value = next[i];
            if (!isCellValue(value)) {
                const shown = typeof value === 'string' ? JSON.stringify(value) : String(value);
                return fail('InvalidValue', `Invalid cell value ${shown} at index ${i}`);
            }
            // Store the constants themselves, never the caller's value (-0 passes the check)
            replacement.push(value === CELL_ON ? CELL_ON : CELL_OFF);
        }

        this.cells = replacement;
        return { ok: true };
    }

    clear(): void {
        this.cells.fill(CELL_OFF);
    }

    // Render hook: the only thing a renderer needs from the grid
    printGrid(): GridSnapshot {
        return Object.freeze(this.cells.slice());
    }

    saveState(path: string): GridResult {
        if (!this.storage) {
            return fail('IOError', 'No storage attached to this grid');
        }
        try {
            this.storage.write(path, generateJSON(this.cells));
            return { ok: true };
        } catch (err) {
            return fail('IOError', `Could not save grid to ${path}: ${describeError(err)}`, err);
        }
    }

    loadState(path: string): GridResult {
        if (!this.storage) {
            return fail('IOError', 'No storage attached to this grid');
        }

        let text: string;
        try {
            text = this.storage.read(path);
        } catch (err) {
            return fail('IOError', `Could not read grid from ${path}: ${describeError(err)}`, err);
        }

        return this.loadFromText(text);
    }

    // Same validation as loadState, for documents that arrive without a path (uploads, pastes)
    loadFromText(text: string): GridResult {
        const parsed = parseGridFile(text);
        if (!parsed.ok) return parsed;

        // The embedded height is cross-checked, never adopted
        const { height } = parsed.value;
        if (height !== undefined && height !== this.length) {
            return fail('SizeMismatch', `File declares height ${height} but grid height is ${this.length}`);
        }

        return this.setState(parsed.value.grid);
    }

    private assertIndex(index: number): void {
        if (!Number.isInteger(index) || index < 0 || index >= this.length) {
            throw new GridError('IndexOutOfRange', `Index ${index} is out of bounds for grid of size ${this.length}`);
        }
    }
}
