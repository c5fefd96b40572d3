import { parseArgs } from 'node:util';
import { pathToFileURL } from 'node:url';
import { defaultConfig } from './config';
import { GridState } from './grid/gridState';
import { describeError } from './grid/errors';
import { fileStorage } from './grid/fileStorage';
import type { GridStorage } from './grid/storage';
import type { GridResult } from './types';
import { countOn, renderText } from './utils/textRenderer';

export interface CliIO {
    stdout: (line: string) => void;
    stderr: (line: string) => void;
    storage: GridStorage;
}

const USAGE = `usage: grid <command> <file> [args] [--height n]

commands:
  init <file>              write an all-OFF grid
  show <file>              print the grid
  toggle <file> <index...> flip cells and save
  set <file> <bits>        write cells from a 0/1 string (height defaults to its length)`;

class UsageError extends Error {}

function parseInteger(text: string, what: string): number {
    if (!/^-?\d+$/.test(text)) {
        throw new UsageError(`${what} must be an integer, got "${text}"`);
    }
    return Number(text);
}

const defaultIO: CliIO = {
    stdout: line => console.log(line),
    stderr: line => console.error(line),
    storage: fileStorage,
};

function check(result: GridResult): void {
    if (!result.ok) throw result.error;
}

function describe(grid: GridState): string {
    const cells = grid.printGrid();
    return `${renderText(cells)} ${countOn(cells)}/${cells.length} on`;
}

export function runCli(argv: string[], io: CliIO = defaultIO): number {
    let values: { height?: string };
    let positionals: string[];
    try {
        ({ values, positionals } = parseArgs({
            args: argv,
            options: { height: { type: 'string' } },
            allowPositionals: true,
        }));
    } catch (err) {
        io.stderr(`${describeError(err)}\n${USAGE}`);
        return 2;
    }

    const [command, file, ...rest] = positionals;
    try {
        const height = values.height === undefined ? undefined : parseInteger(values.height, '--height');

        if (command === undefined || file === undefined) {
            throw new UsageError('missing command or file');
        }

        switch (command) {
            case 'init': {
                const grid = new GridState(height ?? defaultConfig.height, io.storage);
                check(grid.saveState(file));
                io.stdout(describe(grid));
                return 0;
            }
            case 'show': {
                const grid = new GridState(height ?? defaultConfig.height, io.storage);
                check(grid.loadState(file));
                io.stdout(describe(grid));
                return 0;
            }
            case 'toggle': {
                if (rest.length === 0) throw new UsageError('toggle needs at least one index');
                const grid = new GridState(height ?? defaultConfig.height, io.storage);
                check(grid.loadState(file));
                for (const arg of rest) {
                    grid.toggle(parseInteger(arg, 'index'));
                }
                check(grid.saveState(file));
                io.stdout(describe(grid));
                return 0;
            }
            case 'set': {
                const [bits] = rest;
                if (bits === undefined) throw new UsageError('set needs a string of 0s and 1s');
                const grid = new GridState(height ?? bits.length, io.storage);
                check(grid.setState(Array.from(bits, bit => (bit === '0' || bit === '1' ? Number(bit) : bit))));
                check(grid.saveState(file));
                io.stdout(describe(grid));
                return 0;
            }
            default:
                throw new UsageError(`unknown command "${command}"`);
        }
    } catch (err) {
        if (err instanceof UsageError) {
            io.stderr(`${err.message}\n${USAGE}`);
            return 2;
        }
        io.stderr(`error: ${describeError(err)}`);
        return 1;
    }
}

const entry = process.argv[1];
if (entry !== undefined && import.meta.url === pathToFileURL(entry).href) {
    process.exitCode = runCli(process.argv.slice(2));
}
