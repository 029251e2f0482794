/**
 * Floorline Decision Engine - Explain Module
 * Plain-text rendering of picks and run statistics
 */

import { formatAmericanOdds } from './math';
import type { Pick, ScanStats, SkipReason } from './types';

const SKIP_LABELS: Record<SkipReason, string> = {
    not_found: 'Not found in stats provider',
    insufficient_history: 'Insufficient game history',
    retrieval_error: 'Retrieval errors',
};

const SKIP_ORDER: readonly SkipReason[] = ['not_found', 'insufficient_history', 'retrieval_error'];

/**
 * Headline for one pick, e.g. "Jalen Brunson - PTS 27.5 Over @ -200"
 */
export function describePick(pick: Pick): string {
    const odds = formatAmericanOdds(pick.price);
    if (pick.kind === 'player') {
        return `${pick.entityName} - ${pick.stat} ${pick.strike} Over @ ${odds}`;
    }
    return `${pick.entityName} - ${pick.side} ${pick.strike} @ ${odds}`;
}

/**
 * Justification line, e.g. "Floor: 30 | Hit rate: 8/8 (8 games)"
 */
export function describeBasis(pick: Pick): string {
    const label = pick.basis === 'floor' ? 'Floor' : 'Ceiling';
    return `${label}: ${pick.floorOrCeiling} | Hit rate: ${pick.confidenceLabel} (${pick.sampleCount} games)`;
}

export function formatPicks(picks: readonly Pick[]): string[] {
    const lines: string[] = [];
    picks.forEach((pick, i) => {
        lines.push(`${i + 1}. ${describePick(pick)}`);
        lines.push(`   ${describeBasis(pick)}`);
    });
    return lines;
}

export function formatStats(stats: ScanStats): string[] {
    const lines = [
        `Entities with offers: ${stats.entitiesWithOffers}`,
        `Analyzed: ${stats.analyzed} (players ${stats.byKind.player.analyzed}, teams ${stats.byKind.team.analyzed})`,
        `Skipped: ${stats.skipped}`,
    ];
    if (stats.skipped > 0) {
        for (const reason of SKIP_ORDER) {
            lines.push(`  - ${SKIP_LABELS[reason]}: ${stats.skipReasons[reason]}`);
        }
    }
    lines.push(`Match attempts: ${stats.matchAttempts} (no line: ${stats.noMatch}, priced out: ${stats.rejected})`);
    return lines;
}
