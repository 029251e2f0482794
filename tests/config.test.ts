import { describe, it, expect } from 'vitest';
import { ConfigError, loadConfig, requireOddsApiKey } from '../src/config/env';

describe('loadConfig', () => {
    it('fills every default from an empty environment', () => {
        expect(loadConfig({})).toEqual({
            oddsApiKey: null,
            bookmaker: 'draftkings',
            supabase: null,
            slackWebhookUrl: null,
            season: '2025-26',
            scan: { oddsThreshold: -500, minGames: 6, maxGames: 20 },
            pacing: { statsMs: 600, oddsMs: 200 },
            logLevel: 'info',
        });
    });

    it('reads numeric overrides and treats blanks as unset', () => {
        const config = loadConfig({
            ODDS_API_KEY: 'test-secret',
            SCAN_ODDS_THRESHOLD: '-450',
            SCAN_MIN_GAMES: '8',
            SCAN_MAX_GAMES: '',
            STATS_PACING_MS: '0',
            LOG_LEVEL: 'debug',
        });
        expect(config.oddsApiKey).toBe('test-secret');
        expect(config.scan).toEqual({ oddsThreshold: -450, minGames: 8, maxGames: 20 });
        expect(config.pacing.statsMs).toBe(0);
        expect(config.logLevel).toBe('debug');
    });

    it('enables Supabase only with both url and key', () => {
        expect(loadConfig({ SUPABASE_URL: 'https://project.supabase.test' }).supabase).toBeNull();
        expect(loadConfig({
            SUPABASE_URL: 'https://project.supabase.test',
            SUPABASE_SERVICE_ROLE_KEY: 'test-secret',
        }).supabase).toEqual({ url: 'https://project.supabase.test', serviceRoleKey: 'test-secret' });
    });

    it('rejects a window whose minimum exceeds its maximum', () => {
        expect(() => loadConfig({ SCAN_MIN_GAMES: '10', SCAN_MAX_GAMES: '8' }))
            .toThrow('[ENV:INVALID] SCAN_MIN_GAMES (10) exceeds SCAN_MAX_GAMES (8)');
    });

    it('rejects malformed values with the offending key', () => {
        expect(() => loadConfig({ SCAN_MIN_GAMES: 'six' })).toThrow(ConfigError);
        expect(() => loadConfig({ SCAN_MIN_GAMES: 'six' })).toThrow(/^\[ENV:INVALID\] SCAN_MIN_GAMES/);
        expect(() => loadConfig({ NBA_SEASON: '2025' })).toThrow(/NBA_SEASON/);
        expect(() => loadConfig({ LOG_LEVEL: 'loud' })).toThrow(/LOG_LEVEL/);
    });
});

describe('requireOddsApiKey', () => {
    it('names the missing key', () => {
        expect(() => requireOddsApiKey(loadConfig({}))).toThrow('[ENV:MISSING] ODDS_API_KEY');
        expect(requireOddsApiKey(loadConfig({ ODDS_API_KEY: 'test-secret' }))).toBe('test-secret');
    });
});
