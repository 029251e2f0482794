import type { SupabaseClient } from '@supabase/supabase-js';
import {
    describePick,
    formatPicks,
    formatStats,
    type HistoryCache,
    type HistorySource,
    type ScanObserver,
    type ScanResult,
    ScanPipeline,
} from '../../engine/src';
import { type AppConfig, requireOddsApiKey } from '../config/env';
import { type FetchLike, Logger, logger as defaultLogger, RateLimiter, type RetryOptions } from '../lib/resilience';
import { createSupabaseClient } from '../lib/supabase';
import { formatZonedDate, formatZonedTime, SCAN_TIME_ZONE } from '../utils/dateUtils';
import { saveScannerResults } from './dbService';
import { MemoryHistoryCache, SupabaseHistoryCache } from './historyCache';
import { NbaStatsService } from './nbaStatsService';
import { SlackNotifier } from './notifierService';
import { type BoardMeta, OddsApiService, type OddsEvent } from './oddsApiService';

export interface ScanRunOptions {
    /** Ignore today's cached profiles */
    fresh?: boolean;
    /** false keeps the run off the database, history cache included */
    persist?: boolean;
    notify?: boolean;
    /** Overrides the configured odds threshold */
    threshold?: number;
}

export interface ScanRunDeps {
    config: AppConfig;
    log?: Logger;
    fetchImpl?: FetchLike;
    /** Defaults to a client built from config; null keeps the run off the database */
    supabase?: SupabaseClient | null;
    /** Defaults to the NBA stats provider */
    history?: HistorySource;
    cache?: HistoryCache;
    retry?: RetryOptions;
    now?: () => Date;
    /** Rate limiter waits, and the scheduler's wait for the scan time */
    sleep?: (ms: number) => Promise<void>;
}

export interface ScanRunReport {
    day: string;
    result: ScanResult;
    meta: BoardMeta;
    runId: number | null;
    notified: boolean;
}

/** "New York Knicks vs Boston Celtics at 4:30 PM PST" */
export function describeGame(game: OddsEvent): string {
    const time = formatZonedTime(new Date(game.commence_time), SCAN_TIME_ZONE);
    return `${game.home_team} vs ${game.away_team} at ${time}`;
}

function progressObserver(log: Logger): ScanObserver {
    return {
        onEntity: (kind, name, index, total) => log.debug('Scanner', `[${kind} ${index}/${total}] ${name}`),
        onProfile: (kind, name, result) => {
            if (!result.ok) {
                log.info('Scanner', `${name}: skipped (${result.reason}${result.detail ? `, ${result.detail}` : ''})`);
            } else if (result.cached) {
                log.debug('Scanner', `${name}: ${kind} history from cache (${result.profile.sampleCount} games)`);
            }
        },
        onPick: pick => log.info('Scanner', `Pick: ${describePick(pick)}`),
    };
}

/**
 * One full scan for today's slate: odds board, paced history, pipeline,
 * then persistence and Slack. Persistence and notification failures are
 * logged and do not fail the run; anything else is reported to Slack and
 * rethrown.
 */
export async function runScan(deps: ScanRunDeps, options: ScanRunOptions = {}): Promise<ScanRunReport> {
    const { config } = deps;
    const log = deps.log ?? defaultLogger;
    const now = deps.now ?? (() => new Date());
    const limiterClock = { sleep: deps.sleep };
    const notify = options.notify ?? true;

    const notifier = new SlackNotifier({
        webhookUrl: config.slackWebhookUrl,
        fetchImpl: deps.fetchImpl,
        now,
        log,
    });

    try {
        const startedAt = now();
        const day = formatZonedDate(startedAt, SCAN_TIME_ZONE);

        const odds = new OddsApiService({
            apiKey: requireOddsApiKey(config),
            bookmaker: config.bookmaker,
            pacer: RateLimiter.spacing(config.pacing.oddsMs, limiterClock),
            fetchImpl: deps.fetchImpl,
            retry: deps.retry,
            log,
        });
        const { board, meta } = await odds.loadBoard(day);

        let supabase: SupabaseClient | null = null;
        if (options.persist !== false) {
            supabase = deps.supabase === undefined ? createSupabaseClient(config) : deps.supabase;
        }
        const cache = deps.cache ?? (supabase ? new SupabaseHistoryCache(supabase) : new MemoryHistoryCache());
        const statsPacer = RateLimiter.spacing(config.pacing.statsMs, limiterClock);
        const history = deps.history ?? new NbaStatsService({
            season: config.season,
            maxGames: config.scan.maxGames,
            pacer: statsPacer,
            fetchImpl: deps.fetchImpl,
            retry: deps.retry,
            log,
        });

        const pipeline = new ScanPipeline(
            {
                history,
                market: board,
                pacer: statsPacer,
                cache,
                observer: progressObserver(log),
                onCacheError: e => log.warn('Cache', 'History cache unavailable, using provider', e),
            },
            {
                oddsThreshold: options.threshold ?? config.scan.oddsThreshold,
                minGames: config.scan.minGames,
                maxGames: config.scan.maxGames,
                day,
                fresh: options.fresh ?? false,
            },
        );

        log.info('Scanner', `Scanning ${board.size.player} players and ${board.size.team} teams for ${day}`);
        const result = await pipeline.run();
        log.info('Scanner', `Scan complete: ${result.picks.length} picks`);

        let runId: number | null = null;
        if (supabase) {
            try {
                runId = await saveScannerResults(
                    supabase,
                    result.picks,
                    result.stats,
                    {
                        sport: 'nba',
                        season: config.season,
                        scanDate: day,
                        gameDate: meta.firstGame ? formatZonedDate(new Date(meta.firstGame.commence_time), SCAN_TIME_ZONE) : null,
                    },
                    meta,
                );
                log.info('Database', `Saved run #${runId}`);
            } catch (e) {
                log.error('Database', 'Failed to save scanner results', e);
            }
        }

        let notified = false;
        if (notify) {
            const firstGame = meta.firstGame ? describeGame(meta.firstGame) : null;
            notified = await notifier.notifySuccess(result.picks.length, result.picks, firstGame);
        }

        return { day, result, meta, runId, notified };
    } catch (e) {
        log.error('Scanner', 'Scan failed', e);
        if (notify) await notifier.notifyError(e);
        throw e;
    }
}

// ═══════════════════════════════════════════════════════════════════════════
// CLI
// ═══════════════════════════════════════════════════════════════════════════

/** --fresh, --no-db, --no-notify, --threshold=<n> */
export function parseScanArgs(argv: readonly string[]): ScanRunOptions {
    const options: ScanRunOptions = {};
    for (const arg of argv) {
        if (arg === '--fresh') options.fresh = true;
        else if (arg === '--no-db') options.persist = false;
        else if (arg === '--no-notify') options.notify = false;
        else if (arg.startsWith('--threshold=')) {
            const raw = arg.slice('--threshold='.length);
            const value = Number(raw);
            if (raw.trim() === '' || !Number.isInteger(value)) throw new Error(`Invalid --threshold: ${arg}`);
            options.threshold = value;
        } else {
            throw new Error(`Unknown argument: ${arg}`);
        }
    }
    return options;
}

export function buildReport(report: ScanRunReport): string[] {
    const { day, result, meta, runId } = report;
    const lines = [
        `Floorline scan for ${day}`,
        `Games: ${meta.gamesScheduled} scheduled, ${meta.gamesWithProps} with alternate lines`,
        '',
    ];

    if (result.picks.length === 0) {
        lines.push('No picks today.');
    } else {
        lines.push(`${result.picks.length} picks:`, ...formatPicks(result.picks));
    }

    lines.push('', ...formatStats(result.stats));
    if (meta.requestsRemaining !== null) lines.push(`Odds API requests remaining: ${meta.requestsRemaining}`);
    if (runId !== null) lines.push(`Saved as run #${runId}`);
    return lines;
}
