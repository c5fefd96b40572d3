import { readFileSync, renameSync, rmSync, writeFileSync } from 'node:fs';
import type { GridStorage } from './storage';

export const fileStorage: GridStorage = {
    read(path) {
        return readFileSync(path, 'utf8');
    },
    write(path, contents) {
        // Temp file + rename: the target holds either the old or the new contents
        const tempPath = `${path}.${process.pid}.tmp`;
        try {
            writeFileSync(tempPath, contents, 'utf8');
            renameSync(tempPath, path);
        } catch (err) {
            rmSync(tempPath, { force: true });
            throw err;
        }
    },
};
