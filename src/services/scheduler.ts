import { requireOddsApiKey } from '../config/env';
import { logger as defaultLogger, RateLimiter, sleep as defaultSleep } from '../lib/resilience';
import { formatZonedDate, formatZonedTime, SCAN_TIME_ZONE } from '../utils/dateUtils';
import { SlackNotifier } from './notifierService';
import { OddsApiService, type OddsEvent } from './oddsApiService';
import { describeGame, runScan, type ScanRunDeps, type ScanRunOptions, type ScanRunReport } from './scanRunner';

/** Scan this long before the first tip-off */
export const SCAN_LEAD_MS = 3 * 60 * 60 * 1000;

/** Closer than this the scan runs straight away */
export const MIN_SCHEDULE_DELAY_MS = 10 * 60 * 1000;

export type ScanPlan =
    | { mode: 'immediate'; reason: 'past_target' | 'target_imminent'; target: Date }
    | { mode: 'scheduled'; target: Date; delayMs: number };

/**
 * Scan time for the day: SCAN_LEAD_MS before the first tip-off, or now when
 * that moment has passed or is under MIN_SCHEDULE_DELAY_MS away.
 */
export function planScanTime(firstGame: Pick<OddsEvent, 'commence_time'>, now: Date): ScanPlan {
    const target = new Date(Date.parse(firstGame.commence_time) - SCAN_LEAD_MS);
    const delayMs = target.getTime() - now.getTime();

    if (delayMs <= 0) return { mode: 'immediate', reason: 'past_target', target };
    if (delayMs < MIN_SCHEDULE_DELAY_MS) return { mode: 'immediate', reason: 'target_imminent', target };
    return { mode: 'scheduled', target, delayMs };
}

export interface ScheduleReport {
    day: string;
    games: number;
    /** null when there are no games */
    plan: ScanPlan | null;
    scan: ScanRunReport | null;
}

/**
 * Finds today's first game, announces the plan, waits for the scan time and
 * runs the scan. A failure before the wait is posted as a scheduler failure;
 * the scan reports its own.
 */
export async function runScheduledScan(deps: ScanRunDeps, options: ScanRunOptions = {}): Promise<ScheduleReport> {
    const { config } = deps;
    const log = deps.log ?? defaultLogger;
    const now = deps.now ?? (() => new Date());
    const wait = deps.sleep ?? defaultSleep;
    const notify = options.notify ?? true;
    const notifier = new SlackNotifier({ webhookUrl: config.slackWebhookUrl, fetchImpl: deps.fetchImpl, now, log });

    const prepare = async (): Promise<ScheduleReport> => {
        const day = formatZonedDate(now(), SCAN_TIME_ZONE);
        const odds = new OddsApiService({
            apiKey: requireOddsApiKey(config),
            bookmaker: config.bookmaker,
            pacer: RateLimiter.spacing(config.pacing.oddsMs, { sleep: deps.sleep }),
            fetchImpl: deps.fetchImpl,
            retry: deps.retry,
            log,
        });
        const events = await odds.getEvents(day);

        if (events.length === 0) {
            log.info('Scheduler', `No games for ${day}, scanner not scheduled`);
            if (notify) await notifier.notifyNoGames();
            return { day, games: 0, plan: null, scan: null };
        }

        const firstGame = describeGame(events[0]);
        const plan = planScanTime(events[0], now());
        const scheduledFor = plan.mode === 'scheduled' ? formatZonedTime(plan.target, SCAN_TIME_ZONE) : 'now';
        log.info('Scheduler', `First game: ${firstGame}; scanner scheduled for ${scheduledFor}`);
        if (notify) await notifier.notifyScheduled(firstGame, events.length, scheduledFor);
        return { day, games: events.length, plan, scan: null };
    };

    let scheduled: ScheduleReport;
    try {
        scheduled = await prepare();
    } catch (e) {
        log.error('Scheduler', 'Scheduler failed', e);
        if (notify) await notifier.notifySchedulerError(e);
        throw e;
    }

    const { plan } = scheduled;
    if (!plan) return scheduled;
    if (plan.mode === 'scheduled') await wait(plan.delayMs);
    const scan = await runScan(deps, options);
    return { ...scheduled, scan };
}
