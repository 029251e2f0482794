/**
 * Floorline Decision Engine - Admission Filter
 * Price bar applied to a matched offer
 */

import type { AdmissionMode, EntityKind } from './types';

/**
 * Player props are OVER-only and compare inclusively.
 * Team totals carry both sides and compare strictly.
 * The two rules differ on a price exactly at the threshold; see DESIGN.md.
 */
export function admissionModeFor(kind: EntityKind): AdmissionMode {
    return kind === 'player' ? 'inclusive' : 'strict';
}

export function isAdmitted(price: number, threshold: number, mode: AdmissionMode): boolean {
    return mode === 'inclusive' ? price >= threshold : price > threshold;
}
