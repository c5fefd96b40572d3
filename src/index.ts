import { DEFAULT_HEIGHT } from './types';
import { GridState } from './grid/gridState';
import { fileStorage } from './grid/fileStorage';

export * from './types';
export { GridState } from './grid/gridState';
export { GridError, type GridErrorKind } from './grid/errors';
export { browserStorage, memoryStorage, type GridStorage } from './grid/storage';
export { fileStorage } from './grid/fileStorage';
export { generateJSON, parseGridFile, type ParsedGridFile } from './utils/gridFile';
export { indexFromPosition } from './utils/geometry';
export { renderText } from './utils/textRenderer';
export { resolveConfig, type GridConfig } from './config';

/** Creates an all-OFF grid that saves to and loads from the file system. */
export function create(height: number = DEFAULT_HEIGHT): GridState {
    return new GridState(height, fileStorage);
}
