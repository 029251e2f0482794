// =============================================================================
// RUNTIME CONFIGURATION
// Environment → validated config object, built once and passed down.
// =============================================================================

import { z } from 'zod';
import { CONFIG } from '../../engine/src/config';

type Env = Record<string, string | undefined>;

export class ConfigError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'ConfigError';
    }
}

const blankToUndefined = (v: unknown) => (typeof v === 'string' && v.trim() === '' ? undefined : v);

const intFrom = (fallback: number) =>
    z.preprocess(blankToUndefined, z.coerce.number().int().default(fallback));

const EnvSchema = z.object({
    ODDS_API_KEY: z.preprocess(blankToUndefined, z.string().optional()),
    ODDS_BOOKMAKER: z.preprocess(blankToUndefined, z.string().default('draftkings')),
    SUPABASE_URL: z.preprocess(blankToUndefined, z.string().url().optional()),
    SUPABASE_SERVICE_ROLE_KEY: z.preprocess(blankToUndefined, z.string().optional()),
    SLACK_WEBHOOK_URL: z.preprocess(blankToUndefined, z.string().url().optional()),
    NBA_SEASON: z.preprocess(blankToUndefined, z.string().regex(/^\d{4}-\d{2}$/).default('2025-26')),
    SCAN_ODDS_THRESHOLD: intFrom(CONFIG.ODDS_THRESHOLD),
    SCAN_MIN_GAMES: intFrom(CONFIG.MIN_GAMES).pipe(z.number().min(1)),
    SCAN_MAX_GAMES: intFrom(CONFIG.MAX_GAMES).pipe(z.number().min(1)),
    STATS_PACING_MS: intFrom(CONFIG.STATS_PACING_MS).pipe(z.number().min(0)),
    ODDS_PACING_MS: intFrom(CONFIG.ODDS_PACING_MS).pipe(z.number().min(0)),
    LOG_LEVEL: z.preprocess(blankToUndefined, z.enum(['debug', 'info', 'warn', 'error']).default('info')),
});

export interface AppConfig {
    oddsApiKey: string | null;
    bookmaker: string;
    supabase: { url: string; serviceRoleKey: string } | null;
    slackWebhookUrl: string | null;
    season: string;
    scan: {
        oddsThreshold: number;
        minGames: number;
        maxGames: number;
    };
    pacing: {
        statsMs: number;
        oddsMs: number;
    };
    logLevel: 'debug' | 'info' | 'warn' | 'error';
}

/**
 * Supabase and Slack are optional: a partial pair disables persistence
 * instead of failing the run. The odds key is checked where it is needed.
 */
export function loadConfig(env: Env = process.env): AppConfig {
    const parsed = EnvSchema.safeParse(env);
    if (!parsed.success) {
        const issues = parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join('; ');
        throw new ConfigError(`[ENV:INVALID] ${issues}`);
    }
    const e = parsed.data;

    if (e.SCAN_MIN_GAMES > e.SCAN_MAX_GAMES) {
        throw new ConfigError(`[ENV:INVALID] SCAN_MIN_GAMES (${e.SCAN_MIN_GAMES}) exceeds SCAN_MAX_GAMES (${e.SCAN_MAX_GAMES})`);
    }

    return {
        oddsApiKey: e.ODDS_API_KEY ?? null,
        bookmaker: e.ODDS_BOOKMAKER,
        supabase: e.SUPABASE_URL && e.SUPABASE_SERVICE_ROLE_KEY
            ? { url: e.SUPABASE_URL, serviceRoleKey: e.SUPABASE_SERVICE_ROLE_KEY }
            : null,
        slackWebhookUrl: e.SLACK_WEBHOOK_URL ?? null,
        season: e.NBA_SEASON,
        scan: {
            oddsThreshold: e.SCAN_ODDS_THRESHOLD,
            minGames: e.SCAN_MIN_GAMES,
            maxGames: e.SCAN_MAX_GAMES,
        },
        pacing: {
            statsMs: e.STATS_PACING_MS,
            oddsMs: e.ODDS_PACING_MS,
        },
        logLevel: e.LOG_LEVEL,
    };
}

export function requireOddsApiKey(config: AppConfig): string {
    if (!config.oddsApiKey) throw new ConfigError('[ENV:MISSING] ODDS_API_KEY');
    return config.oddsApiKey;
}
