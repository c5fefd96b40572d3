import { describe, it, expect } from 'vitest';
import { GridFileSchema, GridConfigSchema } from './validators';
import { generateJSON, parseGridFile } from './gridFile';

describe('Validators', () => {
    it('validates a correct grid document', () => {
        const valid = { version: 1, height: 3, grid: [0, 1, 0] };
        expect(GridFileSchema.parse(valid)).toEqual(valid);
    });

    it('rejects a negative height', () => {
        expect(() => GridFileSchema.parse({ height: -2, grid: [] })).toThrow();
    });

    it('fills configuration defaults', () => {
        expect(GridConfigSchema.parse({})).toEqual({ height: 14, cellSize: 20, storageKey: 'toggle-grid' });
    });
});

describe('Grid file', () => {
    it('generates a versioned document', () => {
        expect(generateJSON([1, 0])).toBe('{\n  "version": 1,\n  "height": 2,\n  "grid": [\n    1,\n    0\n  ]\n}\n');
    });

    it('parses what it generates', () => {
        expect(parseGridFile(generateJSON([0, 1, 1]))).toEqual({ ok: true, value: { height: 3, grid: [0, 1, 1] } });
    });

    it('leaves the value domain to the grid', () => {
        const result = parseGridFile('{"grid": [5, -1]}');
        expect(result).toEqual({ ok: true, value: { height: undefined, grid: [5, -1] } });
    });

    it('flags malformed JSON as a parse error', () => {
        const result = parseGridFile('{');
        expect(result.ok).toBe(false);
        if (!result.ok) {
            expect(result.error.kind).toBe('ParseError');
            expect(result.error.message).toMatch(/^Grid file is not valid JSON: /);
        }
    });

    it('names the offending field', () => {
        const result = parseGridFile('{"height": 2, "grid": "01"}');
        expect(result.ok).toBe(false);
        if (!result.ok) {
            expect(result.error.kind).toBe('ParseError');
            expect(result.error.message).toBe('Invalid grid file: grid: Expected array, received string');
        }
    });

    it('flags a declared height that disagrees with the cells', () => {
        const result = parseGridFile('{"height": 2, "grid": [0]}');
        expect(result.ok).toBe(false);
        if (!result.ok) {
            expect(result.error.kind).toBe('SizeMismatch');
            expect(result.error.message).toBe('Declared height 2 does not match 1 stored cells');
        }
    });
});
