import { describe, it, expect, vi, beforeEach } from 'vitest';
import { fireEvent, render, screen } from '@testing-library/react';
import App from './App';
import { resolveConfig } from './config';
import { memoryStorage } from './grid/storage';

describe('App', () => {
    beforeEach(() => {
        vi.spyOn(HTMLCanvasElement.prototype, 'getContext').mockReturnValue(null);
    });

    it('toggles, saves, clears and loads', () => {
        const storage = memoryStorage();
        render(<App storage={storage} config={resolveConfig({ height: 5, storageKey: 'slot' })} />);
        expect(screen.getByText('0 / 5 on')).toBeInTheDocument();

        fireEvent.click(screen.getByTestId('grid-canvas'), { clientX: 25 });
        expect(screen.getByText('1 / 5 on')).toBeInTheDocument();

        fireEvent.click(screen.getByRole('button', { name: 'Save' }));
        expect(JSON.parse(storage.read('slot'))).toEqual({ version: 1, height: 5, grid: [0, 1, 0, 0, 0] });

        fireEvent.click(screen.getByRole('button', { name: 'Clear' }));
        expect(screen.getByText('0 / 5 on')).toBeInTheDocument();

        fireEvent.click(screen.getByRole('button', { name: 'Load' }));
        expect(screen.getByText('1 / 5 on')).toBeInTheDocument();
        expect(screen.queryByRole('alert')).not.toBeInTheDocument();
    });

    it('shows load failures', () => {
        vi.spyOn(console, 'error').mockImplementation(() => {});
        render(<App storage={memoryStorage()} config={resolveConfig({ height: 3, storageKey: 'slot' })} />);
        fireEvent.click(screen.getByRole('button', { name: 'Load' }));
        expect(screen.getByRole('alert')).toHaveTextContent(
            "IOError: Could not read grid from slot: ENOENT: no such file, open 'slot'",
        );
    });

    it('shows import failures', async () => {
        vi.spyOn(console, 'error').mockImplementation(() => {});
        render(<App storage={memoryStorage()} config={resolveConfig({ height: 3 })} />);
        const file = { name: 'g.json', text: () => Promise.reject(new Error('read failed')) };
        fireEvent.change(screen.getByLabelText('Import'), { target: { files: [file] } });
        expect(await screen.findByRole('alert')).toHaveTextContent('IOError: Could not read g.json: read failed');
        expect(screen.getByText('0 / 3 on')).toBeInTheDocument();
    });
});
