/**
 * Floorline Decision Engine - Configuration
 * All tunable parameters in one place
 */

import type { EntityKind, PlayerStat, Side, TeamStat } from './types';

const PLAYER_STATS: readonly PlayerStat[] = ['PTS', 'REB', 'AST', 'FG3M', 'STL', 'BLK'];
const TEAM_STATS: readonly TeamStat[] = ['PTS'];
const SIDES: Readonly<Record<EntityKind, readonly Side[]>> = {
    player: ['OVER'],
    team: ['OVER', 'UNDER'],
};
const KIND_ORDER: readonly EntityKind[] = ['player', 'team'];

export const CONFIG = {
    // ============================================================================
    // HISTORY WINDOW
    // ============================================================================

    /** Games required before a window is valid for decisioning */
    MIN_GAMES: 6,

    /** Most recent games retained per window */
    MAX_GAMES: 20,

    // ============================================================================
    // ADMISSION
    // ============================================================================

    /** Skip picks priced worse than this (American odds) */
    ODDS_THRESHOLD: -500,

    // ============================================================================
    // TRACKED MARKETS
    // ============================================================================

    PLAYER_STATS,
    TEAM_STATS,

    /** Sides offered per entity kind */
    SIDES,

    /** Order in which entity kinds are scanned */
    KIND_ORDER,

    // ============================================================================
    // PACING
    // ============================================================================

    /** Minimum spacing between stats provider calls (ms) */
    STATS_PACING_MS: 600,

    /** Minimum spacing between odds provider calls (ms) */
    ODDS_PACING_MS: 200,
} as const;

export type ConfigType = typeof CONFIG;
