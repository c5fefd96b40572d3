import { GRID_FILE_VERSION, type GridFile, type GridSnapshot, type GridValueResult } from '../types';
import { describeError, fail } from '../grid/errors';
import { GridFileSchema, formatIssues } from './validators';

export interface ParsedGridFile {
    height?: number;
    grid: unknown[];
}

/**
 * Serializes cells to the persisted document:
 *   { "version": 1, "height": n, "grid": [0, 1, ...] }
 */
export const generateJSON = (cells: GridSnapshot): string => {
    const document: GridFile = {
        version: GRID_FILE_VERSION,
        height: cells.length,
        grid: Array.from(cells),
    };
    return JSON.stringify(document, null, 2) + '\n';
};

/**
 * Parses a persisted document. Only the structure and the document's own
 * consistency are checked here; the value domain and the live grid length
 * are checked by GridState, which shares those rules with setState.
 *
 * Files without `version` (as written by older tools) are accepted.
 */
export function parseGridFile(text: string): GridValueResult<ParsedGridFile> {
    let json: unknown;
    try {
        json = JSON.parse(text);
    } catch (err) {
        return fail('ParseError', `Grid file is not valid JSON: ${describeError(err)}`, err);
    }

    const parsed = GridFileSchema.safeParse(json);
    if (!parsed.success) {
        return fail('ParseError', `Invalid grid file: ${formatIssues(parsed.error)}`, parsed.error);
    }

    const { height, grid } = parsed.data;
    if (height !== undefined && height !== grid.length) {
        return fail('SizeMismatch', `Declared height ${height} does not match ${grid.length} stored cells`);
    }

    return { ok: true, value: { height, grid } };
}
