/**
 * Floorline Decision Engine - Pick Ranker
 */

import type { Pick } from './types';

/**
 * Best price first. Positive prices outrank all negative ones and
 * -110 outranks -400. Array.prototype.sort is stable, so equal prices
 * keep their scan order.
 */
export function rankPicks<P extends Pick>(picks: readonly P[]): P[] {
    return [...picks].sort((a, b) => b.price - a.price);
}
