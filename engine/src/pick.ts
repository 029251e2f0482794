/**
 * Floorline Decision Engine - Pick Construction
 */

import { confidenceLabel } from './floor';
import type {
    MarketOffer,
    PlayerHistoryProfile,
    PlayerPick,
    PlayerStat,
    Side,
    TeamHistoryProfile,
    TeamPick,
    TeamStat,
} from './types';

export function buildPlayerPick(
    profile: PlayerHistoryProfile,
    stat: PlayerStat,
    offer: MarketOffer,
    floor: number,
    sampleCount: number
): PlayerPick {
    const pick: PlayerPick = {
        kind: 'player',
        entityName: profile.entityName,
        stat,
        side: 'OVER',
        strike: offer.strike,
        price: offer.price,
        basis: 'floor',
        floorOrCeiling: floor,
        sampleCount,
        confidenceLabel: confidenceLabel(sampleCount),
        ...(profile.teamAbbr ? { teamAbbr: profile.teamAbbr } : {}),
    };
    return Object.freeze(pick);
}

export function buildTeamPick(
    profile: TeamHistoryProfile,
    stat: TeamStat,
    side: Side,
    offer: MarketOffer,
    bound: { floor: number; ceiling: number },
    sampleCount: number
): TeamPick {
    const pick: TeamPick = {
        kind: 'team',
        entityName: profile.entityName,
        stat,
        side,
        strike: offer.strike,
        price: offer.price,
        basis: side === 'OVER' ? 'floor' : 'ceiling',
        floorOrCeiling: side === 'OVER' ? bound.floor : bound.ceiling,
        sampleCount,
        confidenceLabel: confidenceLabel(sampleCount),
    };
    return Object.freeze(pick);
}
