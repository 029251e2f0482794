import type {
    EntityKind,
    MarketOffer,
    MarketSource,
    PlayerStat,
    Side,
    StatKey,
} from '../../engine/src/types';

/**
 * In-memory offer board for one scan, filled from the odds provider.
 * Entities are listed in the order their first offer arrived.
 */
export class MarketBoard implements MarketSource {
    private readonly players = new Map<string, Map<PlayerStat, MarketOffer[]>>();
    private readonly teams = new Map<string, Record<Side, MarketOffer[]>>();

    addPlayerOffer(playerName: string, stat: PlayerStat, offer: MarketOffer) {
        let byStat = this.players.get(playerName);
        if (!byStat) {
            byStat = new Map<PlayerStat, MarketOffer[]>();
            this.players.set(playerName, byStat);
        }
        const offers = byStat.get(stat) ?? [];
        offers.push(offer);
        byStat.set(stat, offers);
    }

    addTeamOffer(teamName: string, side: Side, offer: MarketOffer) {
        let bySide = this.teams.get(teamName);
        if (!bySide) {
            bySide = { OVER: [], UNDER: [] };
            this.teams.set(teamName, bySide);
        }
        bySide[side].push(offer);
    }

    async listEntities(kind: EntityKind): Promise<string[]> {
        return kind === 'player' ? [...this.players.keys()] : [...this.teams.keys()];
    }

    async getOffers(kind: EntityKind, entityName: string, stat: StatKey, side: Side): Promise<MarketOffer[]> {
        if (kind === 'player') {
            if (side !== 'OVER') return [];
            return [...(this.players.get(entityName)?.get(stat) ?? [])];
        }
        if (stat !== 'PTS') return [];
        return [...(this.teams.get(entityName)?.[side] ?? [])];
    }

    get size(): Record<EntityKind, number> {
        return { player: this.players.size, team: this.teams.size };
    }
}
