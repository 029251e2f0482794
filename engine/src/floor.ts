/**
 * Floorline Decision Engine - Floor Calculator
 * Worst and best observed outcome over the retained window
 */

import type { FloorResult } from './types';
import { HistoryWindow } from './historyWindow';
import { maxOf, minOf } from './math';

/**
 * Floor = min, ceiling = max over the whole window. No interpolation:
 * the floor was met or exceeded in every sampled game.
 */
export function computeFloor(window: HistoryWindow): FloorResult {
    const sampleCount = window.count;
    if (!window.isValid()) {
        return { valid: false, sampleCount };
    }

    const values = window.values();
    return {
        valid: true,
        floor: minOf(values),
        ceiling: maxOf(values),
        sampleCount,
    };
}

/**
 * "hits/total" label; a floor or ceiling is a 100% bound by construction
 */
export function confidenceLabel(sampleCount: number): string {
    return `${sampleCount}/${sampleCount}`;
}
