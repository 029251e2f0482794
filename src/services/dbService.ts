import type { SupabaseClient } from '@supabase/supabase-js';
import type { EntityKind, Pick, ScanStats } from '../../engine/src/types';
import { findTeam } from './nbaStatsService';

// ═══════════════════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════════════════

export const SCANNER_RUNS_TABLE = 'scanner_runs';
export const PICKS_TABLE = 'picks';

export interface RunContext {
    sport: string;
    season: string;
    /** Calendar day the scan ran for (Pacific) */
    scanDate: string;
    /** Day of the first game, when one is known */
    gameDate: string | null;
}

export interface PickRow {
    run_id: number;
    sport: string;
    season: string;
    scan_date: string;
    game_date: string | null;
    entity_type: EntityKind;
    entity_name: string;
    team_abbr: string | null;
    stat_type: string;
    bet_type: string;
    line: number;
    odds: number;
    floor: number | null;
    ceiling: number | null;
    games_analyzed: number;
    hit_rate: string;
}

export interface ScannerRunUpdate {
    total_picks?: number;
    player_picks?: number;
    team_picks?: number;
    entities_analyzed?: number;
    entities_skipped?: number;
    api_requests_remaining?: number | null;
    games_scheduled?: number;
    games_with_props?: number;
}

export interface BoardCounts {
    gamesScheduled: number;
    gamesWithProps: number;
    requestsRemaining: number | null;
}

// ═══════════════════════════════════════════════════════════════════════════
// ROWS
// ═══════════════════════════════════════════════════════════════════════════

export function toPickRow(pick: Pick, runId: number, ctx: RunContext): PickRow {
    const base = {
        run_id: runId,
        sport: ctx.sport,
        season: ctx.season,
        scan_date: ctx.scanDate,
        game_date: ctx.gameDate,
        entity_name: pick.entityName,
        stat_type: pick.stat,
        bet_type: pick.side,
        line: pick.strike,
        odds: pick.price,
        games_analyzed: pick.sampleCount,
        hit_rate: pick.confidenceLabel,
    };

    if (pick.kind === 'player') {
        return {
            ...base,
            entity_type: 'player',
            team_abbr: pick.teamAbbr ?? null,
            floor: pick.floorOrCeiling,
            ceiling: null,
        };
    }

    return {
        ...base,
        entity_type: 'team',
        team_abbr: findTeam(pick.entityName)?.abbr ?? null,
        floor: pick.basis === 'floor' ? pick.floorOrCeiling : null,
        ceiling: pick.basis === 'ceiling' ? pick.floorOrCeiling : null,
    };
}

// ═══════════════════════════════════════════════════════════════════════════
// WRITES
// ═══════════════════════════════════════════════════════════════════════════

export async function createScannerRun(supabase: SupabaseClient, ctx: RunContext): Promise<number> {
    const { data, error } = await supabase
        .from(SCANNER_RUNS_TABLE)
        .insert({
            sport: ctx.sport,
            scan_date: ctx.scanDate,
            game_date: ctx.gameDate,
            total_picks: 0,
            player_picks: 0,
            team_picks: 0,
            entities_analyzed: 0,
            entities_skipped: 0,
        })
        .select('id')
        .single();

    if (error) throw error;
    if (!data || typeof data.id !== 'number') throw new Error('scanner_runs insert returned no id');
    return data.id;
}

export async function updateScannerRun(supabase: SupabaseClient, runId: number, update: ScannerRunUpdate): Promise<void> {
    const { error } = await supabase
        .from(SCANNER_RUNS_TABLE)
        .update(update)
        .eq('id', runId);

    if (error) throw error;
}

/** Returns the number of rows written */
export async function savePicks(
    supabase: SupabaseClient,
    runId: number,
    picks: readonly Pick[],
    ctx: RunContext,
): Promise<number> {
    if (picks.length === 0) return 0;

    const rows = picks.map(p => toPickRow(p, runId, ctx));
    const { error } = await supabase.from(PICKS_TABLE).insert(rows);

    if (error) throw error;
    return rows.length;
}

/**
 * Run row, its picks, then the run's final counts. Returns the run id.
 */
export async function saveScannerResults(
    supabase: SupabaseClient,
    picks: readonly Pick[],
    stats: ScanStats,
    ctx: RunContext,
    board?: BoardCounts,
): Promise<number> {
    const runId = await createScannerRun(supabase, ctx);
    const saved = await savePicks(supabase, runId, picks, ctx);

    const update: ScannerRunUpdate = {
        total_picks: saved,
        player_picks: picks.filter(p => p.kind === 'player').length,
        team_picks: picks.filter(p => p.kind === 'team').length,
        entities_analyzed: stats.analyzed,
        entities_skipped: stats.skipped,
    };
    if (board) {
        update.games_scheduled = board.gamesScheduled;
        update.games_with_props = board.gamesWithProps;
        if (board.requestsRemaining !== null) update.api_requests_remaining = board.requestsRemaining;
    }

    await updateScannerRun(supabase, runId, update);
    return runId;
}
