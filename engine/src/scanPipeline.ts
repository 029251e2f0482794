/**
 * Floorline Decision Engine - Scan Pipeline
 * Sequential scan across every entity with market offers
 */

import { CONFIG } from './config';
import { analyzeEntity, type OfferBook, trackedStats } from './analyze';
import { rankPicks } from './ranker';
import type {
    EntityKind,
    HistoryCache,
    HistoryProfile,
    HistorySource,
    KindStats,
    MarketSource,
    Pacer,
    Pick,
    ProfileResult,
    ScanObserver,
    ScanOptions,
    ScanResult,
    ScanStats,
} from './types';

export interface ScanDependencies {
    history: HistorySource;
    market: MarketSource;
    /** Acquired before every history source call; cache hits skip it */
    pacer: Pacer;
    cache?: HistoryCache;
    observer?: ScanObserver;
    /** Cache read/write failures; the scan falls back to the source */
    onCacheError?: (error: unknown) => void;
}

type Settled<T> = { ok: true; value: T } | { ok: false; error: unknown };

async function settle<T>(fn: () => Promise<T>): Promise<Settled<T>> {
    try {
        return { ok: true, value: await fn() };
    } catch (error) {
        return { ok: false, error };
    }
}

function describeError(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}

function emptyKindStats(): KindStats {
    return { withOffers: 0, analyzed: 0, skipped: 0, picks: 0 };
}

export function createScanStats(): ScanStats {
    return {
        entitiesWithOffers: 0,
        analyzed: 0,
        skipped: 0,
        skipReasons: { insufficient_history: 0, not_found: 0, retrieval_error: 0 },
        byKind: { player: emptyKindStats(), team: emptyKindStats() },
        cacheHits: 0,
        matchAttempts: 0,
        noMatch: 0,
        rejected: 0,
        statsSkipped: 0,
    };
}

export class ScanPipeline {
    private readonly deps: ScanDependencies;
    private readonly options: ScanOptions;

    constructor(deps: ScanDependencies, options: Partial<ScanOptions> & { day: string }) {
        this.deps = deps;
        this.options = {
            oddsThreshold: options.oddsThreshold ?? CONFIG.ODDS_THRESHOLD,
            minGames: options.minGames ?? CONFIG.MIN_GAMES,
            maxGames: options.maxGames ?? CONFIG.MAX_GAMES,
            day: options.day,
            fresh: options.fresh ?? false,
        };
    }

    /**
     * Per-entity failures become skip counters. Only a failure to list the
     * entities of a kind escapes, since nothing can be scanned without it.
     */
    async run(): Promise<ScanResult> {
        const stats = createScanStats();
        const picks: Pick[] = [];

        for (const kind of CONFIG.KIND_ORDER) {
            const names = await this.deps.market.listEntities(kind);
            stats.entitiesWithOffers += names.length;
            stats.byKind[kind].withOffers += names.length;

            for (const [i, name] of names.entries()) {
                this.deps.observer?.onEntity?.(kind, name, i + 1, names.length);
                picks.push(...await this.scanEntity(kind, name, stats));
            }
        }

        return { picks: rankPicks(picks), stats };
    }

    private async scanEntity(kind: EntityKind, name: string, stats: ScanStats): Promise<Pick[]> {
        const kindStats = stats.byKind[kind];

        const offers = await settle(() => this.loadOffers(kind, name));
        const result: ProfileResult = offers.ok
            ? await this.resolveProfile(kind, name)
            : { ok: false, reason: 'retrieval_error', detail: describeError(offers.error) };

        this.deps.observer?.onProfile?.(kind, name, result);

        if (!result.ok) {
            stats.skipped++;
            stats.skipReasons[result.reason]++;
            kindStats.skipped++;
            return [];
        }
        if (result.cached) stats.cacheHits++;

        stats.analyzed++;
        kindStats.analyzed++;

        const book = offers.ok ? offers.value : {};
        const analysis = analyzeEntity(result.profile, book, this.options);
        stats.matchAttempts += analysis.matchAttempts;
        stats.noMatch += analysis.noMatch;
        stats.rejected += analysis.rejected;
        stats.statsSkipped += analysis.statsSkipped;
        kindStats.picks += analysis.picks.length;

        for (const pick of analysis.picks) this.deps.observer?.onPick?.(pick);
        return analysis.picks;
    }

    private async loadOffers(kind: EntityKind, name: string): Promise<OfferBook> {
        const book: OfferBook = {};
        for (const stat of trackedStats(kind)) {
            for (const side of CONFIG.SIDES[kind]) {
                const offers = await this.deps.market.getOffers(kind, name, stat, side);
                if (offers.length === 0) continue;
                const bySide = book[stat] ?? {};
                bySide[side] = offers;
                book[stat] = bySide;
            }
        }
        return book;
    }

    /**
     * Cache first (unless fresh), then the paced source. Insufficient
     * history is judged on the full profile, cached or not.
     */
    async resolveProfile(kind: EntityKind, name: string): Promise<ProfileResult> {
        const { cache, history, pacer, onCacheError } = this.deps;
        const { day, fresh, minGames } = this.options;

        let profile: HistoryProfile | null = null;
        let cached = false;

        if (cache && !fresh) {
            const hit = await settle(() => cache.get(kind, name, day));
            if (hit.ok) {
                profile = hit.value;
                cached = profile !== null;
            } else {
                onCacheError?.(hit.error);
            }
        }

        if (!profile) {
            await pacer.acquire();
            const fetched = await settle(() => history.getProfile(kind, name));
            if (!fetched.ok) {
                return { ok: false, reason: 'retrieval_error', detail: describeError(fetched.error) };
            }
            const found = fetched.value;
            if (!found || found.sampleCount === 0) {
                return { ok: false, reason: 'not_found' };
            }
            profile = found;

            if (cache) {
                const stored = await settle(() => cache.set(found, day));
                if (!stored.ok) onCacheError?.(stored.error);
            }
        }

        if (profile.sampleCount < minGames) {
            return { ok: false, reason: 'insufficient_history', detail: `${profile.sampleCount}/${minGames} games` };
        }
        return { ok: true, profile, cached };
    }
}
