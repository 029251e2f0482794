/**
 * Floorline Decision Engine - Entity Analysis
 * Floor → match → admission for every tracked stat of one entity
 */

import { CONFIG } from './config';
import { computeFloor } from './floor';
import { HistoryWindow, type WindowLimits } from './historyWindow';
import { matchLine } from './lineMatcher';
import { admissionModeFor, isAdmitted } from './admission';
import { buildPlayerPick, buildTeamPick } from './pick';
import type { EntityKind, HistoryProfile, MarketOffer, Pick, Side, StatKey } from './types';

/** Offers of one entity, by stat then side */
export type OfferBook = Partial<Record<StatKey, Partial<Record<Side, readonly MarketOffer[]>>>>;

export interface AnalyzeOptions extends WindowLimits {
    oddsThreshold: number;
}

export interface EntityAnalysis {
    picks: Pick[];
    matchAttempts: number;
    noMatch: number;
    rejected: number;
    statsSkipped: number;
}

export function trackedStats(kind: EntityKind): readonly StatKey[] {
    return kind === 'player' ? CONFIG.PLAYER_STATS : CONFIG.TEAM_STATS;
}

/**
 * Pure and synchronous. A stat without offers is ignored; a stat with offers
 * but a short window is counted in statsSkipped and never reaches matching.
 */
export function analyzeEntity(
    profile: HistoryProfile,
    book: OfferBook,
    options: AnalyzeOptions
): EntityAnalysis {
    const analysis: EntityAnalysis = { picks: [], matchAttempts: 0, noMatch: 0, rejected: 0, statsSkipped: 0 };
    const mode = admissionModeFor(profile.kind);
    const limits: WindowLimits = { minGames: options.minGames, maxGames: options.maxGames };

    for (const stat of trackedStats(profile.kind)) {
        const bySide = book[stat] ?? {};
        const sides = CONFIG.SIDES[profile.kind].filter(side => (bySide[side]?.length ?? 0) > 0);
        if (sides.length === 0) continue;

        const bound = computeFloor(HistoryWindow.fromProfile(profile, stat, limits));
        if (!bound.valid) {
            analysis.statsSkipped++;
            continue;
        }

        for (const side of sides) {
            analysis.matchAttempts++;
            const matched = matchLine(side, bound, bySide[side] ?? []);
            if (!matched) {
                analysis.noMatch++;
                continue;
            }
            if (!isAdmitted(matched.price, options.oddsThreshold, mode)) {
                analysis.rejected++;
                continue;
            }

            if (profile.kind === 'player') {
                analysis.picks.push(buildPlayerPick(profile, stat, matched, bound.floor, bound.sampleCount));
            } else if (stat === 'PTS') {
                analysis.picks.push(buildTeamPick(profile, stat, side, matched, bound, bound.sampleCount));
            }
        }
    }

    return analysis;
}
