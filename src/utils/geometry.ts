/**
 * Maps a pointer x-coordinate (relative to the strip's left edge) to a cell index.
 * Returns null when the point lies outside the strip.
 */
export function indexFromPosition(x: number, cellSize: number, length: number): number | null {
    if (!Number.isFinite(x) || x < 0 || cellSize <= 0) return null;
    const index = Math.floor(x / cellSize);
    return index < length ? index : null;
}
