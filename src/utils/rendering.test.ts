import { describe, it, expect } from 'vitest';
import { indexFromPosition } from './geometry';
import { drawStrip, type StripContext } from './drawStrip';
import { countOn, renderText } from './textRenderer';

describe('indexFromPosition', () => {
    it('maps x to the cell under it', () => {
        expect(indexFromPosition(0, 20, 5)).toBe(0);
        expect(indexFromPosition(19.9, 20, 5)).toBe(0);
        expect(indexFromPosition(20, 20, 5)).toBe(1);
        expect(indexFromPosition(99, 20, 5)).toBe(4);
    });

    it('returns null outside the strip', () => {
        expect(indexFromPosition(100, 20, 5)).toBeNull();
        expect(indexFromPosition(-1, 20, 5)).toBeNull();
        expect(indexFromPosition(Number.NaN, 20, 5)).toBeNull();
        expect(indexFromPosition(5, 20, 0)).toBeNull();
    });
});

describe('drawStrip', () => {
    function recordingContext() {
        const ops: string[] = [];
        const ctx: StripContext = {
            fillStyle: '',
            strokeStyle: '',
            lineWidth: 0,
            clearRect(x, y, w, h) {
                ops.push(`clear ${x},${y},${w},${h}`);
            },
            fillRect(x, y, w, h) {
                ops.push(`fill ${String(ctx.fillStyle)} ${x},${y},${w},${h}`);
            },
            strokeRect(x, y, w, h) {
                ops.push(`stroke ${String(ctx.strokeStyle)} ${x},${y},${w},${h}`);
            },
        };
        return { ctx, ops };
    }

    it('draws a box per cell', () => {
        const { ctx, ops } = recordingContext();
        drawStrip(ctx, [0, 1], 20);
        expect(ops).toEqual([
            'clear 0,0,40,20',
            'fill #ffffff 0,0,20,20',
            'stroke #000000 0.5,0.5,19,19',
            'fill #a9a9a9 20,0,20,20',
            'stroke #000000 20.5,0.5,19,19',
        ]);
        expect(ctx.lineWidth).toBe(1);
    });
});

describe('renderText', () => {
    it('uses one glyph per cell', () => {
        expect(renderText([1, 0, 1, 0, 1])).toBe('■□■□■');
        expect(renderText([])).toBe('');
    });

    it('counts cells that are on', () => {
        expect(countOn([1, 0, 1, 1])).toBe(3);
    });
});
