import { z } from 'zod';
import type { Pacer, PlayerStat } from '../../engine/src/types';
import { MarketBoard } from './marketBoard';
import { type FetchLike, Logger, logger as defaultLogger, resilientFetch, type RetryOptions } from '../lib/resilience';
import { formatZonedDate, SCAN_TIME_ZONE } from '../utils/dateUtils';

// ═══════════════════════════════════════════════════════════════════════════
// MARKETS
// ═══════════════════════════════════════════════════════════════════════════

export const ODDS_API_BASE_URL = 'https://api.the-odds-api.com/v4';
export const NBA_SPORT_KEY = 'basketball_nba';
export const TEAM_TOTALS_MARKET = 'alternate_team_totals';

/** Alternate player markets → tracked stat */
export const PLAYER_MARKETS: Record<string, PlayerStat> = {
    player_points_alternate: 'PTS',
    player_rebounds_alternate: 'REB',
    player_assists_alternate: 'AST',
    player_threes_alternate: 'FG3M',
    player_steals_alternate: 'STL',
    player_blocks_alternate: 'BLK',
};

// ═══════════════════════════════════════════════════════════════════════════
// PAYLOAD SCHEMAS
// ═══════════════════════════════════════════════════════════════════════════

export const OddsEventSchema = z.object({
    id: z.string(),
    commence_time: z.string(),
    home_team: z.string(),
    away_team: z.string(),
});

const OutcomeSchema = z.object({
    name: z.string(),
    description: z.string().optional(),
    price: z.number(),
    point: z.number().optional(),
});

const BookmakerSchema = z.object({
    key: z.string(),
    markets: z.array(z.object({
        key: z.string(),
        outcomes: z.array(OutcomeSchema).default([]),
    })).default([]),
});

export const EventOddsSchema = OddsEventSchema.extend({
    bookmakers: z.array(BookmakerSchema).default([]),
});

export type OddsEvent = z.infer<typeof OddsEventSchema>;
export type EventOdds = z.infer<typeof EventOddsSchema>;

export interface BoardMeta {
    gamesScheduled: number;
    gamesWithProps: number;
    firstGame: OddsEvent | null;
    requestsRemaining: number | null;
}

// ═══════════════════════════════════════════════════════════════════════════
// PARSING
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Copies the bookmaker's Over outcomes of the alternate player markets and
 * both sides of alternate team totals onto the board. Returns how many
 * offers were added.
 */
export function addEventToBoard(board: MarketBoard, event: EventOdds, bookmaker: string): number {
    const book = event.bookmakers.find(b => b.key === bookmaker);
    if (!book) return 0;

    let added = 0;
    for (const market of book.markets) {
        const stat = PLAYER_MARKETS[market.key];

        for (const outcome of market.outcomes) {
            const entityName = outcome.description?.trim();
            if (!entityName || outcome.point === undefined) continue;
            const offer = { strike: outcome.point, price: Math.round(outcome.price) };

            if (stat) {
                if (outcome.name !== 'Over') continue;
                board.addPlayerOffer(entityName, stat, offer);
                added++;
            } else if (market.key === TEAM_TOTALS_MARKET) {
                if (outcome.name !== 'Over' && outcome.name !== 'Under') continue;
                board.addTeamOffer(entityName, outcome.name === 'Over' ? 'OVER' : 'UNDER', offer);
                added++;
            }
        }
    }
    return added;
}

// ═══════════════════════════════════════════════════════════════════════════
// CLIENT
// ═══════════════════════════════════════════════════════════════════════════

export interface OddsApiOptions {
    apiKey: string;
    bookmaker?: string;
    sport?: string;
    baseUrl?: string;
    /** Acquired before every request */
    pacer?: Pacer;
    fetchImpl?: FetchLike;
    retry?: RetryOptions;
    timeoutMs?: number;
    log?: Logger;
}

export class OddsApiService {
    private readonly apiKey: string;
    private readonly bookmaker: string;
    private readonly sport: string;
    private readonly baseUrl: string;
    private readonly pacer?: Pacer;
    private readonly fetchImpl?: FetchLike;
    private readonly retry?: RetryOptions;
    private readonly timeoutMs: number;
    private readonly log: Logger;

    /** From the x-requests-remaining header of the latest response */
    requestsRemaining: number | null = null;

    constructor(options: OddsApiOptions) {
        this.apiKey = options.apiKey;
        this.bookmaker = options.bookmaker ?? 'draftkings';
        this.sport = options.sport ?? NBA_SPORT_KEY;
        this.baseUrl = options.baseUrl ?? ODDS_API_BASE_URL;
        this.pacer = options.pacer;
        this.fetchImpl = options.fetchImpl;
        this.retry = options.retry;
        this.timeoutMs = options.timeoutMs ?? 15000;
        this.log = options.log ?? defaultLogger;
    }

    private async getJson(path: string, params: Record<string, string>): Promise<unknown> {
        const query = new URLSearchParams({ apiKey: this.apiKey, ...params });
        const url = `${this.baseUrl}${path}?${query.toString()}`;

        await this.pacer?.acquire();
        const res = await resilientFetch(url, {}, {
            fetchImpl: this.fetchImpl,
            retry: { log: this.log, ...this.retry },
            timeoutMs: this.timeoutMs,
        });

        const remaining = res.headers.get('x-requests-remaining');
        if (remaining !== null && Number.isFinite(Number(remaining))) {
            this.requestsRemaining = Number(remaining);
        }
        return res.json();
    }

    /**
     * Events starting on the given calendar day (Pacific), earliest first
     */
    async getEvents(day: string): Promise<OddsEvent[]> {
        const raw = await this.getJson(`/sports/${this.sport}/events`, {});
        const events = z.array(OddsEventSchema).parse(raw);
        return events
            .filter(e => formatZonedDate(new Date(e.commence_time), SCAN_TIME_ZONE) === day)
            .sort((a, b) => Date.parse(a.commence_time) - Date.parse(b.commence_time));
    }

    async getEventOdds(eventId: string, markets: readonly string[]): Promise<EventOdds> {
        const raw = await this.getJson(`/sports/${this.sport}/events/${eventId}/odds`, {
            regions: 'us',
            markets: markets.join(','),
            oddsFormat: 'american',
            bookmakers: this.bookmaker,
        });
        return EventOddsSchema.parse(raw);
    }

    /**
     * One odds request per event for every tracked market. An event that
     * fails is logged and left off the board.
     */
    async loadBoard(day: string): Promise<{ board: MarketBoard; meta: BoardMeta }> {
        const board = new MarketBoard();
        const events = await this.getEvents(day);
        const markets = [...Object.keys(PLAYER_MARKETS), TEAM_TOTALS_MARKET];
        let gamesWithProps = 0;

        this.log.info('Odds', `Found ${events.length} games for ${day}`);

        for (const [i, event] of events.entries()) {
            const label = `[${i + 1}/${events.length}] ${event.away_team} @ ${event.home_team}`;
            try {
                const odds = await this.getEventOdds(event.id, markets);
                const added = addEventToBoard(board, odds, this.bookmaker);
                if (added > 0) gamesWithProps++;
                this.log.info('Odds', `${label}: ${added} alternate lines`);
            } catch (e) {
                this.log.warn('Odds', `${label}: could not fetch alternate lines`, e);
            }
        }

        return {
            board,
            meta: {
                gamesScheduled: events.length,
                gamesWithProps,
                firstGame: events[0] ?? null,
                requestsRemaining: this.requestsRemaining,
            },
        };
    }
}
