/**
 * Floorline Decision Engine - Line Matcher
 * Strike selection against the alternate lines of one stat/side
 */

import type { MarketOffer, Side } from './types';

/**
 * Highest strike strictly below the floor.
 * The floor clears it in every sampled game while paying the most.
 */
export function matchOver(floor: number, offers: readonly MarketOffer[]): MarketOffer | null {
    let best: MarketOffer | null = null;
    for (const offer of offers) {
        if (offer.strike >= floor) continue;
        // strict comparison keeps the first of equal strikes
        if (best === null || offer.strike > best.strike) {
            best = offer;
        }
    }
    return best;
}

/**
 * Lowest strike strictly above the ceiling
 */
export function matchUnder(ceiling: number, offers: readonly MarketOffer[]): MarketOffer | null {
    let best: MarketOffer | null = null;
    for (const offer of offers) {
        if (offer.strike <= ceiling) continue;
        if (best === null || offer.strike < best.strike) {
            best = offer;
        }
    }
    return best;
}

/**
 * Dispatch on side: OVER uses the floor, UNDER the ceiling
 */
export function matchLine(
    side: Side,
    bound: { floor: number; ceiling: number },
    offers: readonly MarketOffer[]
): MarketOffer | null {
    return side === 'OVER' ? matchOver(bound.floor, offers) : matchUnder(bound.ceiling, offers);
}
