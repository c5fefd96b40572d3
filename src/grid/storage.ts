/**
 * Synchronous text storage used by `GridState.saveState` / `loadState`.
 * Implementations throw when a read or write cannot be completed.
 */
export interface GridStorage {
    read(path: string): string;
    write(path: string, contents: string): void;
}

/**
 * Keeps grid documents in a Web Storage area (usually `window.localStorage`),
 * using the path as the key.
 */
export function browserStorage(area: Pick<Storage, 'getItem' | 'setItem'>): GridStorage {
    return {
        read(path) {
            const contents = area.getItem(path);
            if (contents === null) {
                throw new Error(`No saved grid under "${path}"`);
            }
            return contents;
        },
        write(path, contents) {
            // setItem throws QuotaExceededError when the area is full
            area.setItem(path, contents);
        },
    };
}

export function memoryStorage(initial: Record<string, string> = {}): GridStorage & { files: Map<string, string> } {
    const files = new Map(Object.entries(initial));
    return {
        files,
        read(path) {
            const contents = files.get(path);
            if (contents === undefined) {
                throw new Error(`ENOENT: no such file, open '${path}'`);
            }
            return contents;
        },
        write(path, contents) {
            files.set(path, contents);
        },
    };
}
