import { useState, useCallback } from 'react';
import { GridState } from '../grid/gridState';
import { GridError, describeError, fail } from '../grid/errors';
import type { GridStorage } from '../grid/storage';
import type { GridResult, GridSnapshot } from '../types';
import { generateJSON } from '../utils/gridFile';

interface UseGridOptions {
    height: number;
    storage: GridStorage;
}

export function useGrid({ height, storage }: UseGridOptions) {
    // One grid for the lifetime of the component; later prop changes are ignored
    const [grid] = useState(() => new GridState(height, storage));
    const [cells, setCells] = useState<GridSnapshot>(() => grid.printGrid());
    const [error, setError] = useState<GridError | null>(null);

    const sync = useCallback(() => setCells(grid.printGrid()), [grid]);

    const report = useCallback((result: GridResult): boolean => {
        if (!result.ok) {
            console.error('Grid operation failed:', result.error);
            setError(result.error);
            return false;
        }
        setError(null);
        sync();
        return true;
    }, [sync]);

    const toggle = useCallback((index: number) => {
        try {
            grid.toggle(index);
        } catch (err) {
            if (!(err instanceof GridError)) throw err;
            console.error('Grid operation failed:', err);
            setError(err);
            return;
        }
        setError(null);
        sync();
    }, [grid, sync]);

    const clear = useCallback(() => {
        grid.clear();
        setError(null);
        sync();
    }, [grid, sync]);

    const setPattern = useCallback((next: readonly unknown[]) => report(grid.setState(next)), [grid, report]);
    const save = useCallback((key: string) => report(grid.saveState(key)), [grid, report]);
    const load = useCallback((key: string) => report(grid.loadState(key)), [grid, report]);
    const importText = useCallback((text: string) => report(grid.loadFromText(text)), [grid, report]);
    const exportText = useCallback(() => generateJSON(grid.printGrid()), [grid]);

    // Resolves to false, with the failure in `error`, when the file cannot be read or loaded
    const importFile = useCallback(async (file: Pick<File, 'name' | 'text'>): Promise<boolean> => {
        let text: string;
        try {
            text = await file.text();
        } catch (err) {
            return report(fail('IOError', `Could not read ${file.name}: ${describeError(err)}`, err));
        }
        return report(grid.loadFromText(text));
    }, [grid, report]);

    return {
        height: grid.height,
        cells,
        error,
        toggle,
        clear,
        setPattern,
        save,
        load,
        importText,
        importFile,
        exportText,
    };
}
