import { z } from 'zod';
import teamsJson from '../../data/nba-teams.json';
import { CONFIG } from '../../engine/src/config';
import type {
    EntityKind,
    HistoryProfile,
    HistorySource,
    Pacer,
    PlayerHistoryProfile,
    PlayerStat,
    StatKey,
    StatSeries,
    TeamHistoryProfile,
} from '../../engine/src/types';
import { type FetchLike, Logger, logger as defaultLogger, resilientFetch, type RetryOptions } from '../lib/resilience';
import { parseGameDate } from '../utils/dateUtils';

export const NBA_STATS_BASE_URL = 'https://stats.nba.com/stats';

/** stats.nba.com rejects requests without browser-like headers */
const STATS_HEADERS: Record<string, string> = {
    'Accept': 'application/json, text/plain, */*',
    'Accept-Language': 'en-US,en;q=0.9',
    'Origin': 'https://www.nba.com',
    'Referer': 'https://www.nba.com/',
    'User-Agent': 'Mozilla/5.0 (X11; Linux x86_64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0 Safari/537.36',
};

// ═══════════════════════════════════════════════════════════════════════════
// TEAMS
// ═══════════════════════════════════════════════════════════════════════════

const TeamSchema = z.object({ name: z.string(), id: z.number().int(), abbr: z.string() });
export type NbaTeam = z.infer<typeof TeamSchema>;

export const NBA_TEAMS: readonly NbaTeam[] = z.array(TeamSchema).parse(teamsJson);

const TEAMS_BY_NAME = new Map<string, NbaTeam>(NBA_TEAMS.map(t => [t.name, t]));

export function findTeam(teamName: string): NbaTeam | null {
    return TEAMS_BY_NAME.get(teamName) ?? null;
}

// ═══════════════════════════════════════════════════════════════════════════
// RESULT SETS
// ═══════════════════════════════════════════════════════════════════════════

const CellSchema = z.union([z.string(), z.number(), z.null()]);
type Cell = z.infer<typeof CellSchema>;

const ResultSetSchema = z.object({
    name: z.string(),
    headers: z.array(z.string()),
    rowSet: z.array(z.array(CellSchema)),
});

const StatsResponseSchema = z.object({
    resultSets: z.array(ResultSetSchema),
});

export type StatsRow = Record<string, Cell>;

/**
 * Named result set as header-keyed rows; the first set when name is omitted
 */
export function readResultSet(payload: unknown, name?: string): StatsRow[] {
    const { resultSets } = StatsResponseSchema.parse(payload);
    const set = name ? resultSets.find(s => s.name === name) : resultSets[0];
    if (!set) throw new Error(`Result set ${name ?? '#0'} missing from stats response`);

    return set.rowSet.map(row => {
        const record: StatsRow = {};
        set.headers.forEach((header, i) => {
            record[header] = row[i] ?? null;
        });
        return record;
    });
}

function numberCell(row: StatsRow, key: string): number | null {
    const v = row[key];
    if (typeof v === 'number' && Number.isFinite(v)) return v;
    if (typeof v === 'string' && v.trim() !== '' && Number.isFinite(Number(v))) return Number(v);
    return null;
}

/**
 * Most recent first. Rows with unreadable dates sink to the end; the sort is
 * stable, so same-day rows keep provider order.
 */
export function sortByRecency(rows: readonly StatsRow[]): StatsRow[] {
    const dated = rows.map(row => {
        const raw = row.GAME_DATE;
        return { row, ts: typeof raw === 'string' ? parseGameDate(raw) : null };
    });
    dated.sort((a, b) => {
        if (a.ts === b.ts) return 0;
        if (a.ts === null) return 1;
        if (b.ts === null) return -1;
        return b.ts - a.ts;
    });
    return dated.map(d => d.row);
}

export function seriesFrom<S extends PlayerStat>(rows: readonly StatsRow[], stats: readonly S[]): StatSeries<S> {
    const series: StatSeries<S> = {};
    for (const stat of stats) {
        const values: number[] = [];
        for (const row of rows) {
            const v = numberCell(row, stat);
            if (v !== null) values.push(v);
        }
        series[stat] = values;
    }
    return series;
}

/** Directory key: the odds feed drops accents the stats site keeps ("Jokić" / "Jokic") */
export function playerNameKey(name: string): string {
    return name.normalize('NFD').replace(/\p{Diacritic}/gu, '').trim().toLowerCase();
}

/** "NYK vs. BOS" / "NYK @ BOS" → "NYK" */
export function teamFromMatchup(matchup: Cell): string | undefined {
    if (typeof matchup !== 'string') return undefined;
    const abbr = matchup.trim().split(/\s+/)[0];
    return abbr || undefined;
}

// ═══════════════════════════════════════════════════════════════════════════
// SERVICE
// ═══════════════════════════════════════════════════════════════════════════

/** Box-score values of one game */
export type GameLine = Partial<Record<StatKey, number>>;

/** Final stats of an entity on a given day */
export interface GameResultSource {
    /** null when the entity is unknown or did not play that day */
    getGameOnDate(kind: EntityKind, entityName: string, date: string): Promise<GameLine | null>;
}

export interface NbaStatsOptions {
    season: string;
    maxGames?: number;
    /**
     * Callers take one token per profile or game lookup. The first player
     * lookup also loads the directory, so it takes a second token between
     * the directory and the game log.
     */
    pacer?: Pacer;
    seasonType?: string;
    baseUrl?: string;
    fetchImpl?: FetchLike;
    retry?: RetryOptions;
    timeoutMs?: number;
    log?: Logger;
}

export class NbaStatsService implements HistorySource, GameResultSource {
    private readonly season: string;
    private readonly maxGames: number;
    private readonly seasonType: string;
    private readonly baseUrl: string;
    private readonly fetchImpl?: FetchLike;
    private readonly retry?: RetryOptions;
    private readonly timeoutMs: number;
    private readonly log: Logger;
    private readonly pacer?: Pacer;
    private directory: Promise<Map<string, number>> | null = null;

    constructor(options: NbaStatsOptions) {
        this.season = options.season;
        this.maxGames = options.maxGames ?? CONFIG.MAX_GAMES;
        this.seasonType = options.seasonType ?? 'Regular Season';
        this.baseUrl = options.baseUrl ?? NBA_STATS_BASE_URL;
        this.fetchImpl = options.fetchImpl;
        this.retry = options.retry;
        this.timeoutMs = options.timeoutMs ?? 30000;
        this.log = options.log ?? defaultLogger;
        this.pacer = options.pacer;
    }

    private async getJson(endpoint: string, params: Record<string, string>): Promise<unknown> {
        const url = `${this.baseUrl}/${endpoint}?${new URLSearchParams(params).toString()}`;
        const res = await resilientFetch(url, { headers: STATS_HEADERS }, {
            fetchImpl: this.fetchImpl,
            retry: { log: this.log, ...this.retry },
            timeoutMs: this.timeoutMs,
        });
        return res.json();
    }

    async getProfile(kind: EntityKind, entityName: string): Promise<HistoryProfile | null> {
        return kind === 'player' ? this.getPlayerProfile(entityName) : this.getTeamProfile(entityName);
    }

    /**
     * Display name → person id for the season, loaded once. A failed load
     * is not kept, so the next lookup retries it.
     */
    async findPlayerId(playerName: string): Promise<number | null> {
        let loaded = false;
        if (!this.directory) {
            loaded = true;
            this.directory = this.loadDirectory();
            void this.directory.catch(() => {
                this.directory = null;
            });
        }
        const directory = await this.directory;
        const id = directory.get(playerNameKey(playerName)) ?? null;
        // the directory request spent the caller's token
        if (loaded && id !== null) await this.pacer?.acquire();
        return id;
    }

    private async loadDirectory(): Promise<Map<string, number>> {
        const payload = await this.getJson('commonallplayers', {
            LeagueID: '00',
            Season: this.season,
            IsOnlyCurrentSeason: '1',
        });
        const directory = new Map<string, number>();
        for (const row of readResultSet(payload, 'CommonAllPlayers')) {
            const id = numberCell(row, 'PERSON_ID');
            const name = row.DISPLAY_FIRST_LAST;
            if (id !== null && typeof name === 'string') directory.set(playerNameKey(name), id);
        }
        this.log.debug('NbaStats', `Player directory loaded (${directory.size} players)`);
        return directory;
    }

    private async playerLog(playerId: number): Promise<StatsRow[]> {
        const payload = await this.getJson('playergamelog', {
            PlayerID: String(playerId),
            Season: this.season,
            SeasonType: this.seasonType,
        });
        return sortByRecency(readResultSet(payload, 'PlayerGameLog'));
    }

    private async teamLog(team: NbaTeam): Promise<StatsRow[]> {
        const payload = await this.getJson('leaguegamefinder', {
            TeamIDNullable: String(team.id),
            SeasonNullable: this.season,
            SeasonTypeNullable: this.seasonType,
            LeagueID: '00',
        });
        return sortByRecency(readResultSet(payload));
    }

    async getPlayerProfile(playerName: string): Promise<PlayerHistoryProfile | null> {
        const playerId = await this.findPlayerId(playerName);
        if (playerId === null) return null;

        const recent = (await this.playerLog(playerId)).slice(0, this.maxGames);
        if (recent.length === 0) return null;

        const teamAbbr = teamFromMatchup(recent[0].MATCHUP ?? null);
        return {
            kind: 'player',
            entityName: playerName,
            sourceId: playerId,
            sampleCount: recent.length,
            series: seriesFrom(recent, CONFIG.PLAYER_STATS),
            ...(teamAbbr ? { teamAbbr } : {}),
        };
    }

    async getTeamProfile(teamName: string): Promise<TeamHistoryProfile | null> {
        const team = findTeam(teamName);
        if (!team) return null;

        const recent = (await this.teamLog(team)).slice(0, this.maxGames);
        if (recent.length === 0) return null;

        return {
            kind: 'team',
            entityName: teamName,
            sourceId: team.id,
            sampleCount: recent.length,
            series: seriesFrom(recent, CONFIG.TEAM_STATS),
        };
    }

    /**
     * The season log row played on `date` (YYYY-MM-DD, the game's local day)
     */
    async getGameOnDate(kind: EntityKind, entityName: string, date: string): Promise<GameLine | null> {
        const target = parseGameDate(date);
        if (target === null) throw new Error(`Invalid game date: ${date}`);

        let rows: StatsRow[];
        let stats: readonly StatKey[];
        if (kind === 'player') {
            const playerId = await this.findPlayerId(entityName);
            if (playerId === null) return null;
            rows = await this.playerLog(playerId);
            stats = CONFIG.PLAYER_STATS;
        } else {
            const team = findTeam(entityName);
            if (!team) return null;
            rows = await this.teamLog(team);
            stats = CONFIG.TEAM_STATS;
        }

        const row = rows.find(r => typeof r.GAME_DATE === 'string' && parseGameDate(r.GAME_DATE) === target);
        if (!row) return null;

        const line: GameLine = {};
        for (const stat of stats) {
            const v = numberCell(row, stat);
            if (v !== null) line[stat] = v;
        }
        return line;
    }
}
