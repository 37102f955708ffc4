import type { Archetype, Card, Rarity, RewardState } from './types';

export interface CollectionSummary {
  total: number;
  byRarity: Record<Rarity, number>;
  byArchetype: Record<Archetype, number>;
}

export const commitPendingCard = (state: RewardState): RewardState => {
  if (!state.pendingCard) return state;
  return {
    ...state,
    pendingCard: null,
    collection: [...state.collection, state.pendingCard]
  };
};

export const listCollection = (state: RewardState): readonly Card[] => state.collection;

export const summarizeCollection = (cards: readonly Card[]): CollectionSummary =>
  cards.reduce<CollectionSummary>(
    (summary, card) => ({
      total: summary.total + 1,
      byRarity: { ...summary.byRarity, [card.rarity]: summary.byRarity[card.rarity] + 1 },
      byArchetype: {
        ...summary.byArchetype,
        [card.creature.archetype]: summary.byArchetype[card.creature.archetype] + 1
      }
    }),
    {
      total: 0,
      byRarity: { common: 0, rare: 0, epic: 0 },
      byArchetype: { Guardian: 0, Striker: 0, Supporter: 0 }
    }
  );
