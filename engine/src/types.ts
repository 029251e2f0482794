/**
 * Floorline Decision Engine - Type Definitions
 * Canonical data contracts shared by the engine and its adapters
 */

// ============================================================================
// ENTITIES & STATS
// ============================================================================

export type EntityKind = 'player' | 'team';

export type PlayerStat = 'PTS' | 'REB' | 'AST' | 'FG3M' | 'STL' | 'BLK';
export type TeamStat = 'PTS';
export type StatKey = PlayerStat | TeamStat;

export type Side = 'OVER' | 'UNDER';

/**
 * How a matched price is compared against the threshold.
 * Player props are single-sided (inclusive), team totals two-sided (strict).
 */
export type AdmissionMode = 'inclusive' | 'strict';

// ============================================================================
// HISTORY CONTRACT (what the history source must produce)
// ============================================================================

/** Per-stat samples, index 0 = most recent game */
export type StatSeries<S extends StatKey = StatKey> = Partial<Record<S, number[]>>;

interface HistoryProfileBase {
    entityName: string;
    /** Provider id of the entity, when known */
    sourceId?: number;
    /** Number of games backing the profile */
    sampleCount: number;
}

export interface PlayerHistoryProfile extends HistoryProfileBase {
    kind: 'player';
    teamAbbr?: string;
    series: StatSeries<PlayerStat>;
}

export interface TeamHistoryProfile extends HistoryProfileBase {
    kind: 'team';
    series: StatSeries<TeamStat>;
}

export type HistoryProfile = PlayerHistoryProfile | TeamHistoryProfile;

export type FloorResult =
    | { valid: true; floor: number; ceiling: number; sampleCount: number }
    | { valid: false; sampleCount: number };

// ============================================================================
// MARKET CONTRACT
// ============================================================================

export interface MarketOffer {
    strike: number;
    /** American odds */
    price: number;
}

// ============================================================================
// PICK CONTRACT (output)
// ============================================================================

export type PickBasis = 'floor' | 'ceiling';

interface PickBase {
    readonly entityName: string;
    readonly side: Side;
    readonly strike: number;
    readonly price: number;
    readonly basis: PickBasis;
    readonly floorOrCeiling: number;
    readonly sampleCount: number;
    /** Always "N/N": a floor or ceiling held in every sampled game */
    readonly confidenceLabel: string;
}

export interface PlayerPick extends PickBase {
    readonly kind: 'player';
    readonly stat: PlayerStat;
    readonly side: 'OVER';
    readonly basis: 'floor';
    readonly teamAbbr?: string;
}

export interface TeamPick extends PickBase {
    readonly kind: 'team';
    readonly stat: TeamStat;
}

export type Pick = PlayerPick | TeamPick;

// ============================================================================
// PIPELINE CONTRACT
// ============================================================================

export type SkipReason = 'insufficient_history' | 'not_found' | 'retrieval_error';

export type ProfileResult =
    | { ok: true; profile: HistoryProfile; cached: boolean }
    | { ok: false; reason: SkipReason; detail?: string };

export interface HistorySource {
    getProfile(kind: EntityKind, entityName: string): Promise<HistoryProfile | null>;
}

export interface MarketSource {
    listEntities(kind: EntityKind): Promise<string[]>;
    getOffers(kind: EntityKind, entityName: string, stat: StatKey, side: Side): Promise<MarketOffer[]>;
}

export interface HistoryCache {
    get(kind: EntityKind, entityName: string, day: string): Promise<HistoryProfile | null>;
    set(profile: HistoryProfile, day: string): Promise<void>;
}

/** Blocking acquire before every external history fetch */
export interface Pacer {
    acquire(): Promise<void>;
}

export interface ScanOptions {
    oddsThreshold: number;
    minGames: number;
    maxGames: number;
    /** Calendar day used as the cache key, e.g. "2025-11-03" */
    day: string;
    /** Skip cache reads (writes still happen) */
    fresh?: boolean;
}

export interface KindStats {
    withOffers: number;
    analyzed: number;
    skipped: number;
    picks: number;
}

export interface ScanStats {
    entitiesWithOffers: number;
    analyzed: number;
    skipped: number;
    skipReasons: Record<SkipReason, number>;
    byKind: Record<EntityKind, KindStats>;
    cacheHits: number;
    matchAttempts: number;
    noMatch: number;
    rejected: number;
    /** Stat windows shorter than minGames on an otherwise analyzable entity */
    statsSkipped: number;
}

export interface ScanResult {
    picks: Pick[];
    stats: ScanStats;
}

/** Progress hooks; the engine itself never logs */
export interface ScanObserver {
    onEntity?(kind: EntityKind, entityName: string, index: number, total: number): void;
    onProfile?(kind: EntityKind, entityName: string, result: ProfileResult): void;
    onPick?(pick: Pick): void;
}
