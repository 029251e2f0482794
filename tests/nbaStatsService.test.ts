import { describe, it, expect } from 'vitest';
import { ScanPipeline } from '../engine/src/scanPipeline';
import type { Pacer } from '../engine/src/types';
import { MarketBoard } from '../src/services/marketBoard';
import {
    findTeam,
    NBA_TEAMS,
    NbaStatsService,
    playerNameKey,
    readResultSet,
    sortByRecency,
    teamFromMatchup,
} from '../src/services/nbaStatsService';
import { createFetchStub, jsonResponse, silentLogger } from './helpers';

const DIRECTORY = {
    resultSets: [{
        name: 'CommonAllPlayers',
        headers: ['PERSON_ID', 'DISPLAY_FIRST_LAST', 'TEAM_ABBREVIATION'],
        rowSet: [
            [1628973, 'Jalen Brunson', 'NYK'],
            [1628404, 'Josh Hart', 'NYK'],
        ],
    }],
};

const LOG_HEADERS = ['GAME_DATE', 'MATCHUP', 'PTS', 'REB', 'AST', 'FG3M', 'STL', 'BLK'];

const BRUNSON_LOG = {
    resultSets: [{
        name: 'PlayerGameLog',
        headers: LOG_HEADERS,
        rowSet: [
            ['OCT 30, 2025', 'NYK vs. MIL', 31, 3, 7, 2, 1, 0],
            ['NOV 03, 2025', 'NYK @ BOS', 30, 4, 8, 3, 0, 0],
            ['OCT 28, 2025', 'NYK vs. CHI', 38, 2, 5, 4, 2, 1],
            ['NOV 01, 2025', 'NYK @ WAS', 34, 5, 6, 1, 1, 0],
        ],
    }],
};

const CELTICS_GAMES = {
    resultSets: [{
        name: 'LeagueGameFinderResults',
        headers: ['GAME_DATE', 'MATCHUP', 'PTS'],
        rowSet: [
            ['2025-11-01', 'BOS vs. PHI', 118],
            ['2025-11-03', 'BOS vs. NYK', 120],
        ],
    }],
};

function service(maxGames = 20) {
    const stub = createFetchStub([
        { match: url => url.pathname.endsWith('/commonallplayers'), respond: () => jsonResponse(DIRECTORY) },
        { match: url => url.pathname.endsWith('/playergamelog'), respond: () => jsonResponse(BRUNSON_LOG) },
        { match: url => url.pathname.endsWith('/leaguegamefinder'), respond: () => jsonResponse(CELTICS_GAMES) },
    ]);
    const stats = new NbaStatsService({
        season: '2025-26',
        maxGames,
        fetchImpl: stub.fetchImpl,
        retry: { maxAttempts: 1 },
        log: silentLogger(),
    });
    return { stats, requests: stub.requests };
}

describe('result sets', () => {
    it('keys rows by header', () => {
        expect(readResultSet(DIRECTORY, 'CommonAllPlayers')[0]).toEqual({
            PERSON_ID: 1628973,
            DISPLAY_FIRST_LAST: 'Jalen Brunson',
            TEAM_ABBREVIATION: 'NYK',
        });
    });

    it('fails on a missing result set', () => {
        expect(() => readResultSet(DIRECTORY, 'PlayerGameLog')).toThrow('Result set PlayerGameLog missing from stats response');
    });

    it('orders rows most recent first with undated rows last', () => {
        const rows = sortByRecency([
            { GAME_DATE: 'NOV 01, 2025', PTS: 1 },
            { GAME_DATE: null, PTS: 2 },
            { GAME_DATE: 'NOV 03, 2025', PTS: 3 },
            { GAME_DATE: '2025-11-02', PTS: 4 },
        ]);
        expect(rows.map(r => r.PTS)).toEqual([3, 4, 1, 2]);
    });

    it('reads the team from a matchup', () => {
        expect(teamFromMatchup('NYK @ BOS')).toBe('NYK');
        expect(teamFromMatchup('BOS vs. NYK')).toBe('BOS');
        expect(teamFromMatchup(null)).toBeUndefined();
    });

    it('keys player names without accents or case', () => {
        expect(playerNameKey('Nikola Jokić')).toBe('nikola jokic');
        expect(playerNameKey('Luka Dončić')).toBe(playerNameKey('luka doncic'));
    });
});

describe('teams', () => {
    it('loads all thirty franchises', () => {
        expect(NBA_TEAMS).toHaveLength(30);
        expect(findTeam('Boston Celtics')).toEqual({ name: 'Boston Celtics', id: 1610612738, abbr: 'BOS' });
        expect(findTeam('Seattle SuperSonics')).toBeNull();
    });
});

describe('NbaStatsService', () => {
    it('builds a player profile from the game log, most recent first', async () => {
        const { stats } = service();

        const profile = await stats.getProfile('player', 'Jalen Brunson');

        expect(profile).toEqual({
            kind: 'player',
            entityName: 'Jalen Brunson',
            sourceId: 1628973,
            sampleCount: 4,
            teamAbbr: 'NYK',
            series: {
                PTS: [30, 34, 31, 38],
                REB: [4, 5, 3, 2],
                AST: [8, 6, 7, 5],
                FG3M: [3, 1, 2, 4],
                STL: [0, 1, 1, 2],
                BLK: [0, 0, 0, 1],
            },
        });
    });

    it('truncates to maxGames', async () => {
        const { stats } = service(2);
        const profile = await stats.getPlayerProfile('Jalen Brunson');
        expect(profile?.sampleCount).toBe(2);
        expect(profile?.series.PTS).toEqual([30, 34]);
    });

    it('loads the player directory once', async () => {
        const { stats, requests } = service();

        await stats.getPlayerProfile('Jalen Brunson');
        await stats.getPlayerProfile('Josh Hart');

        const directoryCalls = requests.filter(r => r.url.pathname.endsWith('/commonallplayers'));
        expect(directoryCalls).toHaveLength(1);
        expect(directoryCalls[0].url.searchParams.get('Season')).toBe('2025-26');
    });

    it('returns null for unknown players without fetching a log', async () => {
        const { stats, requests } = service();

        expect(await stats.getProfile('player', 'Nobody Atall')).toBeNull();
        expect(requests.some(r => r.url.pathname.endsWith('/playergamelog'))).toBe(false);
    });

    it('retries the directory after a failed load', async () => {
        let attempts = 0;
        const stub = createFetchStub([
            {
                match: url => url.pathname.endsWith('/commonallplayers'),
                respond: () => (++attempts === 1 ? new Response('busy', { status: 503 }) : jsonResponse(DIRECTORY)),
            },
            { match: url => url.pathname.endsWith('/playergamelog'), respond: () => jsonResponse(BRUNSON_LOG) },
        ]);
        const stats = new NbaStatsService({
            season: '2025-26',
            fetchImpl: stub.fetchImpl,
            retry: { maxAttempts: 1 },
            log: silentLogger(),
        });

        await expect(stats.findPlayerId('Jalen Brunson')).rejects.toThrow('Request failed with status 503');
        await expect(stats.findPlayerId('Jalen Brunson')).resolves.toBe(1628973);
        expect(attempts).toBe(2);
    });

    it('builds a team profile from the game finder', async () => {
        const { stats, requests } = service();

        const profile = await stats.getProfile('team', 'Boston Celtics');

        expect(profile).toEqual({
            kind: 'team',
            entityName: 'Boston Celtics',
            sourceId: 1610612738,
            sampleCount: 2,
            series: { PTS: [120, 118] },
        });
        expect(requests[0].url.searchParams.get('TeamIDNullable')).toBe('1610612738');
    });

    it('returns null for an unknown team without a request', async () => {
        const { stats, requests } = service();
        expect(await stats.getTeamProfile('Seattle SuperSonics')).toBeNull();
        expect(requests).toHaveLength(0);
    });
});

describe('accented names', () => {
    it('finds a player the odds feed spells without accents', async () => {
        const stub = createFetchStub([
            {
                match: url => url.pathname.endsWith('/commonallplayers'),
                respond: () => jsonResponse({
                    resultSets: [{
                        name: 'CommonAllPlayers',
                        headers: ['PERSON_ID', 'DISPLAY_FIRST_LAST', 'TEAM_ABBREVIATION'],
                        rowSet: [[203999, 'Nikola Jokić', 'DEN']],
                    }],
                }),
            },
        ]);
        const stats = new NbaStatsService({ season: '2025-26', fetchImpl: stub.fetchImpl, log: silentLogger() });

        expect(await stats.findPlayerId('Nikola Jokic')).toBe(203999);
    });
});

describe('game results', () => {
    it('reads a player box score for one date', async () => {
        const { stats } = service(2);

        expect(await stats.getGameOnDate('player', 'Jalen Brunson', '2025-10-30')).toEqual({
            PTS: 31, REB: 3, AST: 7, FG3M: 2, STL: 1, BLK: 0,
        });
    });

    it('reads a team score for one date', async () => {
        const { stats } = service();
        expect(await stats.getGameOnDate('team', 'Boston Celtics', '2025-11-03')).toEqual({ PTS: 120 });
    });

    it('returns null when there was no game that day', async () => {
        const { stats } = service();
        expect(await stats.getGameOnDate('player', 'Jalen Brunson', '2025-11-02')).toBeNull();
        expect(await stats.getGameOnDate('team', 'Seattle SuperSonics', '2025-11-03')).toBeNull();
    });

    it('rejects a malformed date', async () => {
        const { stats } = service();
        await expect(stats.getGameOnDate('team', 'Boston Celtics', 'yesterday')).rejects.toThrow('Invalid game date: yesterday');
    });
});

describe('pacing', () => {
    it('takes a token before every stats request during a scan', async () => {
        const events: string[] = [];
        const pacer: Pacer = {
            async acquire() {
                events.push('token');
            },
        };
        const stub = createFetchStub([
            { match: url => url.pathname.endsWith('/commonallplayers'), respond: () => jsonResponse(DIRECTORY) },
            { match: url => url.pathname.endsWith('/playergamelog'), respond: () => jsonResponse(BRUNSON_LOG) },
        ]);
        const fetchImpl: typeof stub.fetchImpl = (input, init) => {
            events.push(new URL(input).pathname);
            return stub.fetchImpl(input, init);
        };
        const stats = new NbaStatsService({ season: '2025-26', pacer, fetchImpl, log: silentLogger() });

        const board = new MarketBoard();
        board.addPlayerOffer('Jalen Brunson', 'PTS', { strike: 27.5, price: -200 });
        board.addPlayerOffer('Josh Hart', 'PTS', { strike: 9.5, price: -120 });

        await new ScanPipeline({ history: stats, market: board, pacer }, { day: '2025-11-03', minGames: 1 }).run();

        expect(events).toEqual([
            'token',
            '/stats/commonallplayers',
            'token',
            '/stats/playergamelog',
            'token',
            '/stats/playergamelog',
        ]);
    });
});
