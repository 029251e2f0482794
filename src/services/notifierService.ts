import { describePick } from '../../engine/src/explain';
import type { Pick } from '../../engine/src/types';
import { type FetchLike, HttpError, Logger, logger as defaultLogger, withTimeout } from '../lib/resilience';
import { formatZonedDate, formatZonedTime, SCAN_TIME_ZONE } from '../utils/dateUtils';
import type { ResultsSummary, ScoredPick } from './resultsTracker';

// ═══════════════════════════════════════════════════════════════════════════
// SLACK BLOCKS
// ═══════════════════════════════════════════════════════════════════════════

export const TOP_PICKS_IN_MESSAGE = 4;
export const MAX_STACK_LENGTH = 2000;

type TextObject = { type: 'plain_text' | 'mrkdwn'; text: string };

export type SlackBlock =
    | { type: 'header'; text: TextObject }
    | { type: 'section'; text: TextObject }
    | { type: 'context'; elements: TextObject[] };

export interface SlackPayload {
    blocks: SlackBlock[];
}

export function buildSlackPayload(message: string, timestamp: string, title?: string, isError = false): SlackPayload {
    const blocks: SlackBlock[] = [];
    if (title) {
        blocks.push({ type: 'header', text: { type: 'plain_text', text: `${isError ? '🚨' : '✅'} ${title}` } });
    }
    blocks.push({ type: 'section', text: { type: 'mrkdwn', text: message } });
    blocks.push({ type: 'context', elements: [{ type: 'mrkdwn', text: `⏰ ${timestamp}` }] });
    return { blocks };
}

export function successMessage(totalPicks: number, topPicks: readonly Pick[], firstGameTime?: string | null): string {
    let message = `*Picks generated:* ${totalPicks}`;
    if (firstGameTime) message += `\n*First game:* ${firstGameTime}`;

    const top = topPicks.slice(0, TOP_PICKS_IN_MESSAGE);
    if (top.length > 0) {
        message += '\n\n*Top picks:*\n';
        for (const pick of top) {
            message += `• ${describePick(pick)} (${pick.basis}: ${pick.floorOrCeiling})\n`;
        }
    }
    return message;
}

/** Keeps the tail of the stack, where the failing frame is */
export function errorMessage(error: string, stack?: string, job = 'Scanner'): string {
    let message = `${job} failed with error:\n\n\`\`\`${error}\`\`\``;
    if (stack) {
        const trimmed = stack.length > MAX_STACK_LENGTH
            ? `${stack.slice(-MAX_STACK_LENGTH)}\n... (truncated)`
            : stack;
        message += `\n\n*Traceback:*\n\`\`\`${trimmed}\`\`\``;
    }
    return message;
}

function describeOutcome(pick: ScoredPick): string {
    return `${pick.entityName} (${pick.actual} ${pick.stat} on ${pick.line} line`;
}

export function resultsMessage(summary: ResultsSummary): string {
    let message = `*Date:* ${summary.date}\n*Picks scored:* ${summary.scored.length}`;
    message += `\n*Results:* ${summary.hits} hits / ${summary.misses} misses`;
    if (summary.hitRate !== null) message += `\n*Hit rate:* *${summary.hitRate.toFixed(1)}%*`;
    if (summary.unscored > 0) message += `\n*Not scored:* ${summary.unscored}`;

    if (summary.best || summary.worst) message += '\n';
    if (summary.best) message += `\n🔥 *Best:* ${describeOutcome(summary.best)})`;
    if (summary.worst) {
        const { worst } = summary;
        const basis = worst.side === 'OVER' ? worst.floor : worst.ceiling;
        const label = worst.side === 'OVER' ? 'floor' : 'ceiling';
        message += `\n❌ *Worst:* ${describeOutcome(worst)}${basis === null ? '' : `, ${label}: ${basis}`})`;
    }
    return message;
}

export const NO_GAMES_MESSAGE = 'No games found for today - scanner not scheduled.';

/** `scheduledFor` is a Pacific time, or "now" when the scan starts at once */
export function schedulerMessage(firstGame: string, totalGames: number, scheduledFor: string): string {
    return `*First game:* ${firstGame}\n*Total games today:* ${totalGames}\n*Scanner scheduled for:* ${scheduledFor}`;
}

// ═══════════════════════════════════════════════════════════════════════════
// NOTIFIER
// ═══════════════════════════════════════════════════════════════════════════

export interface SlackNotifierOptions {
    webhookUrl: string | null;
    fetchImpl?: FetchLike;
    now?: () => Date;
    timeoutMs?: number;
    log?: Logger;
}

/**
 * Posts run summaries to a Slack incoming webhook. Every method resolves to
 * whether the message was delivered; delivery problems are logged, never thrown.
 */
export class SlackNotifier {
    private readonly webhookUrl: string | null;
    private readonly fetchImpl: FetchLike;
    private readonly now: () => Date;
    private readonly timeoutMs: number;
    private readonly log: Logger;

    constructor(options: SlackNotifierOptions) {
        this.webhookUrl = options.webhookUrl;
        this.fetchImpl = options.fetchImpl ?? fetch;
        this.now = options.now ?? (() => new Date());
        this.timeoutMs = options.timeoutMs ?? 10000;
        this.log = options.log ?? defaultLogger;
    }

    timestamp(): string {
        const now = this.now();
        return `${formatZonedDate(now, SCAN_TIME_ZONE)} ${formatZonedTime(now, SCAN_TIME_ZONE)}`;
    }

    async send(message: string, title?: string, isError = false): Promise<boolean> {
        if (!this.webhookUrl) {
            this.log.warn('Notify', 'SLACK_WEBHOOK_URL not set, skipping notification');
            return false;
        }

        const payload = buildSlackPayload(message, this.timestamp(), title, isError);
        try {
            const res = await withTimeout(
                this.fetchImpl(this.webhookUrl, {
                    method: 'POST',
                    headers: { 'Content-Type': 'application/json' },
                    body: JSON.stringify(payload),
                }),
                this.timeoutMs,
                'Slack webhook',
            );
            if (!res.ok) throw new HttpError(res.status, 'slack-webhook', await res.text());
            return true;
        } catch (e) {
            this.log.warn('Notify', 'Failed to send Slack notification', e);
            return false;
        }
    }

    notifySuccess(totalPicks: number, topPicks: readonly Pick[], firstGameTime?: string | null): Promise<boolean> {
        return this.send(successMessage(totalPicks, topPicks, firstGameTime), 'Scanner Success');
    }

    notifyError(error: unknown): Promise<boolean> {
        return this.sendError(error, 'Scanner');
    }

    notifyResults(summary: ResultsSummary): Promise<boolean> {
        return this.send(resultsMessage(summary), 'Results Tracker Success');
    }

    notifyResultsError(error: unknown): Promise<boolean> {
        return this.sendError(error, 'Results tracker', 'Results Tracker Failed');
    }

    notifyScheduled(firstGame: string, totalGames: number, scheduledFor: string): Promise<boolean> {
        return this.send(schedulerMessage(firstGame, totalGames, scheduledFor), 'Scheduler Success');
    }

    notifyNoGames(): Promise<boolean> {
        return this.send(NO_GAMES_MESSAGE, 'Scheduler - No Games');
    }

    notifySchedulerError(error: unknown): Promise<boolean> {
        return this.sendError(error, 'Scheduler');
    }

    private sendError(error: unknown, job: string, title = `${job} Failed`): Promise<boolean> {
        const text = error instanceof Error ? error.message : String(error);
        const stack = error instanceof Error ? error.stack : undefined;
        return this.send(errorMessage(text, stack, job), title, true);
    }
}
