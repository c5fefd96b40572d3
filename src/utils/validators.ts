import { z } from 'zod';
import { DEFAULT_HEIGHT, GRID_FILE_VERSION } from '../types';

export const GridFileSchema = z.object({
    version: z.literal(GRID_FILE_VERSION).optional(),
    height: z.number().int().nonnegative().optional(), // advisory, cross-checked on load
    grid: z.array(z.unknown()), // each value is checked by GridState, as in setState
});

export const GridConfigSchema = z.object({
    height: z.number().int().nonnegative().default(DEFAULT_HEIGHT),
    cellSize: z.number().positive().default(20), // pixels per cell
    storageKey: z.string().min(1).default('toggle-grid'),
});

export type GridConfig = z.infer<typeof GridConfigSchema>;

export function formatIssues(error: z.ZodError): string {
    return error.issues
        .map(issue => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
        .join('; ');
}
