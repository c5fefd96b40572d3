import type { GridFailure } from '../types';

export type GridErrorKind =
    | 'InvalidArgument'
    | 'IndexOutOfRange'
    | 'SizeMismatch'
    | 'InvalidValue'
    | 'IOError'
    | 'ParseError';

export class GridError extends Error {
    readonly kind: GridErrorKind;

    constructor(kind: GridErrorKind, message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'GridError';
        this.kind = kind;
    }
}

export function fail(kind: GridErrorKind, message: string, cause?: unknown): GridFailure {
    return {
        ok: false,
        error: new GridError(kind, message, cause === undefined ? undefined : { cause }),
    };
}

export function describeError(err: unknown): string {
    if (err instanceof GridError) return `${err.kind}: ${err.message}`;
    return err instanceof Error ? err.message : String(err);
}
