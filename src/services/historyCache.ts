import type { SupabaseClient } from '@supabase/supabase-js';
import { z } from 'zod';
import type { EntityKind, HistoryCache, HistoryProfile } from '../../engine/src/types';

// ═══════════════════════════════════════════════════════════════════════════
// KEYS & SCHEMA
// ═══════════════════════════════════════════════════════════════════════════

/** Staleness is by calendar day, never by time of day */
export function historyCacheKey(kind: EntityKind, entityName: string, day: string): string {
    return `${day}:${kind}:${entityName.toLowerCase()}`;
}

const Samples = z.array(z.number()).optional();

const PlayerProfileSchema = z.object({
    kind: z.literal('player'),
    entityName: z.string(),
    sourceId: z.number().optional(),
    sampleCount: z.number().int().min(0),
    teamAbbr: z.string().optional(),
    series: z.object({
        PTS: Samples, REB: Samples, AST: Samples, FG3M: Samples, STL: Samples, BLK: Samples,
    }),
});

const TeamProfileSchema = z.object({
    kind: z.literal('team'),
    entityName: z.string(),
    sourceId: z.number().optional(),
    sampleCount: z.number().int().min(0),
    series: z.object({ PTS: Samples }),
});

export const HistoryProfileSchema = z.discriminatedUnion('kind', [PlayerProfileSchema, TeamProfileSchema]);

// ═══════════════════════════════════════════════════════════════════════════
// IN-PROCESS
// ═══════════════════════════════════════════════════════════════════════════

export class MemoryHistoryCache implements HistoryCache {
    private readonly entries = new Map<string, HistoryProfile>();

    async get(kind: EntityKind, entityName: string, day: string): Promise<HistoryProfile | null> {
        return this.entries.get(historyCacheKey(kind, entityName, day)) ?? null;
    }

    async set(profile: HistoryProfile, day: string): Promise<void> {
        this.entries.set(historyCacheKey(profile.kind, profile.entityName, day), profile);
    }

    get size(): number {
        return this.entries.size;
    }
}

// ═══════════════════════════════════════════════════════════════════════════
// SUPABASE (history_cache table)
// ═══════════════════════════════════════════════════════════════════════════

export const HISTORY_CACHE_TABLE = 'history_cache';

export class SupabaseHistoryCache implements HistoryCache {
    private readonly supabase: SupabaseClient;

    constructor(supabase: SupabaseClient) {
        this.supabase = supabase;
    }

    /** A row that no longer parses is treated as a miss */
    async get(kind: EntityKind, entityName: string, day: string): Promise<HistoryProfile | null> {
        const { data, error } = await this.supabase
            .from(HISTORY_CACHE_TABLE)
            .select('content')
            .eq('cache_key', historyCacheKey(kind, entityName, day))
            .maybeSingle();

        if (error) throw error;
        if (!data) return null;

        const parsed = HistoryProfileSchema.safeParse(data.content);
        return parsed.success ? parsed.data : null;
    }

    async set(profile: HistoryProfile, day: string): Promise<void> {
        const { error } = await this.supabase
            .from(HISTORY_CACHE_TABLE)
            .upsert({
                cache_key: historyCacheKey(profile.kind, profile.entityName, day),
                cache_date: day,
                entity_type: profile.kind,
                entity_name: profile.entityName,
                content: profile,
                fetched_at: new Date().toISOString(),
            }, { onConflict: 'cache_key' });

        if (error) throw error;
    }
}
