import React, { useRef, useEffect, useCallback } from 'react';
import type { GridSnapshot } from '../types';
import { drawStrip } from '../utils/drawStrip';
import { indexFromPosition } from '../utils/geometry';
import { countOn } from '../utils/textRenderer';

interface GridCanvasProps {
    cells: GridSnapshot;
    cellSize: number;
    onToggle: (index: number) => void;
}

export function GridCanvas({ cells, cellSize, onToggle }: GridCanvasProps) {
    const canvasRef = useRef<HTMLCanvasElement>(null);
    const width = cells.length * cellSize;

    // --- Rendering ---
    useEffect(() => {
        const canvas = canvasRef.current;
        if (!canvas) return;
        const ctx = canvas.getContext('2d');
        if (!ctx) return;

        const dpr = window.devicePixelRatio || 1;
        if (canvas.width !== width * dpr || canvas.height !== cellSize * dpr) {
            canvas.width = width * dpr;
            canvas.height = cellSize * dpr;
        }
        ctx.setTransform(dpr, 0, 0, dpr, 0, 0);

        drawStrip(ctx, cells, cellSize);
    }, [cells, cellSize, width]);

    // Screen -> cell index
    const handleClick = useCallback((e: React.MouseEvent<HTMLCanvasElement>) => {
        const rect = e.currentTarget.getBoundingClientRect();
        const index = indexFromPosition(e.clientX - rect.left, cellSize, cells.length);
        if (index !== null) onToggle(index);
    }, [cellSize, cells.length, onToggle]);

    return (
        <canvas
            ref={canvasRef}
            data-testid="grid-canvas"
            role="img"
            aria-label={`${countOn(cells)} of ${cells.length} cells on`}
            className="grid-canvas"
            style={{ width: `${width}px`, height: `${cellSize}px` }}
            onClick={handleClick}
        />
    );
}
