import { GridError } from './grid/errors';
import { GridConfigSchema, formatIssues, type GridConfig } from './utils/validators';

export type { GridConfig };

export function resolveConfig(overrides: Partial<GridConfig> = {}): GridConfig {
    const parsed = GridConfigSchema.safeParse(overrides);
    if (!parsed.success) {
        throw new GridError('InvalidArgument', `Invalid grid configuration: ${formatIssues(parsed.error)}`, {
            cause: parsed.error,
        });
    }
    return parsed.data;
}

export const defaultConfig: GridConfig = resolveConfig();
