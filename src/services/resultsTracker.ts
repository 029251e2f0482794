import type { SupabaseClient } from '@supabase/supabase-js';
import { z } from 'zod';
import type { EntityKind, Pacer, Side, StatKey } from '../../engine/src/types';
import { type AppConfig, ConfigError } from '../config/env';
import { type FetchLike, Logger, logger as defaultLogger, RateLimiter, type RetryOptions } from '../lib/resilience';
import { createSupabaseClient } from '../lib/supabase';
import { addDays, formatZonedDate, parseGameDate, SCAN_TIME_ZONE } from '../utils/dateUtils';
import { PICKS_TABLE } from './dbService';
import { type GameLine, type GameResultSource, NbaStatsService } from './nbaStatsService';
import { SlackNotifier } from './notifierService';

// ═══════════════════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════════════════

export type PickResult = 'hit' | 'miss';

/** NUMERIC columns come back as numbers or strings depending on precision */
const Numeric = z.union([z.number(), z.string().regex(/^-?\d+(\.\d+)?$/).transform(Number)]);

const StoredPickSchema = z.object({
    id: z.number().int(),
    entity_type: z.enum(['player', 'team']),
    entity_name: z.string(),
    stat_type: z.enum(['PTS', 'REB', 'AST', 'FG3M', 'STL', 'BLK']),
    bet_type: z.enum(['OVER', 'UNDER']),
    line: Numeric,
    floor: Numeric.nullable(),
    ceiling: Numeric.nullable(),
});

export type StoredPick = z.infer<typeof StoredPickSchema>;

export interface ScoredPick {
    id: number;
    entityType: EntityKind;
    entityName: string;
    stat: StatKey;
    side: Side;
    line: number;
    actual: number;
    result: PickResult;
    /** Distance from the line in the pick's favour; negative on a miss */
    margin: number;
    floor: number | null;
    ceiling: number | null;
}

export interface ResultsSummary {
    date: string;
    /** Picks loaded for the date */
    found: number;
    scored: ScoredPick[];
    hits: number;
    misses: number;
    /** No game on the date, no value for the stat, or the lookup failed */
    unscored: number;
    /** Percentage of scored picks that hit; null when nothing was scored */
    hitRate: number | null;
    best: ScoredPick | null;
    worst: ScoredPick | null;
}

// ═══════════════════════════════════════════════════════════════════════════
// SCORING
// ═══════════════════════════════════════════════════════════════════════════

/** OVER hits above the line, UNDER below it; landing on the line is a miss */
export function scorePick(side: Side, line: number, actual: number): { result: PickResult; margin: number } {
    const margin = side === 'OVER' ? actual - line : line - actual;
    return { result: margin > 0 ? 'hit' : 'miss', margin };
}

/**
 * Best is the hit with the widest margin, worst the miss with the narrowest
 * (most negative). Ties keep the earlier pick.
 */
export function summarizeResults(date: string, found: number, scored: readonly ScoredPick[]): ResultsSummary {
    let best: ScoredPick | null = null;
    let worst: ScoredPick | null = null;
    let hits = 0;

    for (const pick of scored) {
        if (pick.result === 'hit') {
            hits++;
            if (!best || pick.margin > best.margin) best = pick;
        } else if (!worst || pick.margin < worst.margin) {
            worst = pick;
        }
    }

    return {
        date,
        found,
        scored: [...scored],
        hits,
        misses: scored.length - hits,
        unscored: found - scored.length,
        hitRate: scored.length > 0 ? (hits / scored.length) * 100 : null,
        best,
        worst,
    };
}

// ═══════════════════════════════════════════════════════════════════════════
// DATABASE
// ═══════════════════════════════════════════════════════════════════════════

export async function loadPicksForDate(
    supabase: SupabaseClient,
    date: string,
    unscoredOnly = false,
): Promise<StoredPick[]> {
    let query = supabase
        .from(PICKS_TABLE)
        .select('id, entity_type, entity_name, stat_type, bet_type, line, floor, ceiling')
        .eq('scan_date', date);
    if (unscoredOnly) query = query.is('result', null);

    const { data, error } = await query.order('id', { ascending: true });
    if (error) throw error;
    return z.array(StoredPickSchema).parse(data ?? []);
}

export async function recordResult(
    supabase: SupabaseClient,
    pickId: number,
    actual: number,
    result: PickResult,
    scoredAt: Date,
): Promise<void> {
    const { error } = await supabase
        .from(PICKS_TABLE)
        .update({ actual_value: actual, result, scored_at: scoredAt.toISOString() })
        .eq('id', pickId);

    if (error) throw error;
}

// ═══════════════════════════════════════════════════════════════════════════
// TRACKER
// ═══════════════════════════════════════════════════════════════════════════

export interface TrackResultsDeps {
    supabase: SupabaseClient;
    results: GameResultSource;
    /** One token per game lookup; entities with several picks are looked up once */
    pacer: Pacer;
    log?: Logger;
    now?: () => Date;
}

export interface TrackResultsOptions {
    date: string;
    unscoredOnly?: boolean;
}

/**
 * Scores every stored pick of a day against the final box score and writes
 * the outcome back. A pick whose game cannot be found stays unscored;
 * database errors abort the run.
 */
export async function trackResults(deps: TrackResultsDeps, options: TrackResultsOptions): Promise<ResultsSummary> {
    const log = deps.log ?? defaultLogger;
    const now = deps.now ?? (() => new Date());
    const { date } = options;

    const picks = await loadPicksForDate(deps.supabase, date, options.unscoredOnly ?? false);
    log.info('Results', `Found ${picks.length} picks to score for ${date}`);

    const games = new Map<string, GameLine | null>();
    const scored: ScoredPick[] = [];

    for (const pick of picks) {
        const label = `${pick.entity_name} - ${pick.stat_type} ${pick.bet_type} ${pick.line}`;
        const key = `${pick.entity_type}:${pick.entity_name}`;

        if (!games.has(key)) {
            await deps.pacer.acquire();
            try {
                games.set(key, await deps.results.getGameOnDate(pick.entity_type, pick.entity_name, date));
            } catch (e) {
                log.warn('Results', `${label}: box score unavailable`, e);
                continue;
            }
        }

        const actual = games.get(key)?.[pick.stat_type];
        if (actual === undefined) {
            log.warn('Results', `${label}: no game found`);
            continue;
        }

        const { result, margin } = scorePick(pick.bet_type, pick.line, actual);
        await recordResult(deps.supabase, pick.id, actual, result, now());
        log.info('Results', `${label}: ${actual} → ${result.toUpperCase()}`);

        scored.push({
            id: pick.id,
            entityType: pick.entity_type,
            entityName: pick.entity_name,
            stat: pick.stat_type,
            side: pick.bet_type,
            line: pick.line,
            actual,
            result,
            margin,
            floor: pick.floor,
            ceiling: pick.ceiling,
        });
    }

    return summarizeResults(date, picks.length, scored);
}

// ═══════════════════════════════════════════════════════════════════════════
// RUNNER
// ═══════════════════════════════════════════════════════════════════════════

export interface ResultsRunOptions {
    /** YYYY-MM-DD; defaults to yesterday (Pacific) */
    date?: string;
    unscoredOnly?: boolean;
    notify?: boolean;
}

export interface ResultsRunDeps {
    config: AppConfig;
    log?: Logger;
    fetchImpl?: FetchLike;
    /** Defaults to a client built from config */
    supabase?: SupabaseClient | null;
    results?: GameResultSource;
    retry?: RetryOptions;
    now?: () => Date;
    sleep?: (ms: number) => Promise<void>;
}

export interface ResultsRunReport {
    summary: ResultsSummary;
    notified: boolean;
}

/**
 * Scores a past day and posts the summary. Nothing is posted when no pick
 * could be scored; failures are posted and rethrown.
 */
export async function runResultsTracker(deps: ResultsRunDeps, options: ResultsRunOptions = {}): Promise<ResultsRunReport> {
    const { config } = deps;
    const log = deps.log ?? defaultLogger;
    const now = deps.now ?? (() => new Date());
    const notify = options.notify ?? true;
    const notifier = new SlackNotifier({ webhookUrl: config.slackWebhookUrl, fetchImpl: deps.fetchImpl, now, log });

    try {
        const date = options.date ?? addDays(formatZonedDate(now(), SCAN_TIME_ZONE), -1);
        const supabase = deps.supabase === undefined ? createSupabaseClient(config) : deps.supabase;
        if (!supabase) throw new ConfigError('[ENV:MISSING] SUPABASE_URL, SUPABASE_SERVICE_ROLE_KEY');

        const pacer = RateLimiter.spacing(config.pacing.statsMs, { sleep: deps.sleep });
        const results = deps.results ?? new NbaStatsService({
            season: config.season,
            pacer,
            fetchImpl: deps.fetchImpl,
            retry: deps.retry,
            log,
        });

        const summary = await trackResults(
            { supabase, results, pacer, log, now },
            { date, unscoredOnly: options.unscoredOnly },
        );

        let notified = false;
        if (summary.scored.length === 0) {
            log.info('Results', `No picks to score for ${date}`);
        } else if (notify) {
            notified = await notifier.notifyResults(summary);
        }
        return { summary, notified };
    } catch (e) {
        log.error('Results', 'Results tracker failed', e);
        if (notify) await notifier.notifyResultsError(e);
        throw e;
    }
}

// ═══════════════════════════════════════════════════════════════════════════
// CLI
// ═══════════════════════════════════════════════════════════════════════════

/** [YYYY-MM-DD] --unscored-only --no-notify */
export function parseResultsArgs(argv: readonly string[]): ResultsRunOptions {
    const options: ResultsRunOptions = {};
    for (const arg of argv) {
        if (arg === '--unscored-only') options.unscoredOnly = true;
        else if (arg === '--no-notify') options.notify = false;
        else if (arg.startsWith('--')) throw new Error(`Unknown argument: ${arg}`);
        else if (options.date !== undefined) throw new Error(`Unexpected argument: ${arg}`);
        else if (!/^\d{4}-\d{2}-\d{2}$/.test(arg) || parseGameDate(arg) === null) throw new Error(`Invalid date: ${arg}`);
        else options.date = arg;
    }
    return options;
}

export function buildResultsReport(summary: ResultsSummary): string[] {
    const lines = [`Results for ${summary.date}`, `Picks found: ${summary.found}`];
    if (summary.scored.length === 0) {
        lines.push('Nothing scored.');
        return lines;
    }

    for (const pick of summary.scored) {
        const mark = pick.result === 'hit' ? 'HIT ' : 'MISS';
        lines.push(`${mark} ${pick.entityName} - ${pick.stat} ${pick.side} ${pick.line} (actual ${pick.actual})`);
    }
    const rate = summary.hitRate === null ? '' : `, ${summary.hitRate.toFixed(1)}%`;
    lines.push('', `Scored: ${summary.scored.length} (${summary.hits} hits, ${summary.misses} misses${rate})`);
    if (summary.unscored > 0) lines.push(`Not scored: ${summary.unscored}`);
    return lines;
}
