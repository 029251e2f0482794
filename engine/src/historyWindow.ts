/**
 * Floorline Decision Engine - History Window
 * Bounded, recency-ordered samples for one (entity, stat)
 */

import { CONFIG } from './config';
import type { HistoryProfile, StatKey } from './types';
import { maxOf, minOf } from './math';

export interface WindowLimits {
    minGames: number;
    maxGames: number;
}

const DEFAULT_LIMITS: WindowLimits = {
    minGames: CONFIG.MIN_GAMES,
    maxGames: CONFIG.MAX_GAMES,
};

export class HistoryWindow {
    private readonly samples: readonly number[];
    readonly limits: WindowLimits;

    /**
     * @param samples - most recent first; anything past maxGames is dropped
     */
    constructor(samples: readonly number[], limits: Partial<WindowLimits> = {}) {
        this.limits = { ...DEFAULT_LIMITS, ...limits };
        this.samples = Object.freeze(samples.slice(0, Math.max(0, this.limits.maxGames)));
    }

    static fromProfile(profile: HistoryProfile, stat: StatKey, limits: Partial<WindowLimits> = {}): HistoryWindow {
        const series: Partial<Record<StatKey, number[]>> = profile.series;
        return new HistoryWindow(series[stat] ?? [], limits);
    }

    get count(): number {
        return this.samples.length;
    }

    isValid(): boolean {
        return this.count >= this.limits.minGames;
    }

    /** Sample at recency rank (0 = most recent) */
    at(rank: number): number | undefined {
        return this.samples[rank];
    }

    values(): readonly number[] {
        return this.samples;
    }

    floor(): number | null {
        return this.isValid() ? minOf(this.samples) : null;
    }

    ceiling(): number | null {
        return this.isValid() ? maxOf(this.samples) : null;
    }
}
