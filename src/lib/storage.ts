import { z } from 'zod';
import { abilitySchema, creatureSchema } from './content';
import { warn } from './logging';
import { initialRewardState } from './reward-engine';
import type { Card, RewardState } from './types';

const KEY = 'buddy_rewards_v1';

export type KeyValueStore = Pick<Storage, 'getItem' | 'setItem'>;

const cardSchema = z.object({
  id: z.string().min(1),
  creature: creatureSchema,
  rarity: z.enum(['common', 'rare', 'epic']),
  stats: z.object({
    stamina: z.number().int().nonnegative(),
    strength: z.number().int().nonnegative(),
    shield: z.number().int().nonnegative(),
    speed: z.number().int().nonnegative()
  }),
  innatePower: abilitySchema.nullable(),
  switchAbility: abilitySchema.nullable(),
  createdAt: z.string()
});

const toSafeInt = (value: unknown, fallback = 0) => {
  const numeric = Number(value);
  if (!Number.isFinite(numeric)) return fallback;
  return Math.max(0, Math.floor(numeric));
};

const asRecord = (value: unknown): Record<string, unknown> =>
  value && typeof value === 'object' && !Array.isArray(value) ? Object.fromEntries(Object.entries(value)) : {};

const toCard = (value: unknown): Card | null => {
  const parsed = cardSchema.safeParse(value);
  return parsed.success ? parsed.data : null;
};

export const normalizeRewardState = (raw: unknown): RewardState => {
  const parsed = asRecord(raw);
  const progress = asRecord(parsed.progress);
  const bySource = asRecord(progress.correctBySource);
  const rawCollection = Array.isArray(parsed.collection) ? parsed.collection : [];
  const collection = rawCollection.map(toCard).filter((card): card is Card => card !== null);
  const seen = new Set<string>();
  const uniqueCollection = collection.filter((card) => {
    if (seen.has(card.id)) return false;
    seen.add(card.id);
    return true;
  });
  const pendingCard = toCard(parsed.pendingCard);

  const math = toSafeInt(bySource.math);
  const reading = toSafeInt(bySource.reading);
  // The total can never trail the per-game tallies.
  const correctAnswers = Math.max(toSafeInt(progress.correctAnswers), math + reading);

  return {
    progress: {
      correctAnswers,
      correctBySource: { math, reading },
      pendingTokens: toSafeInt(progress.pendingTokens),
      unacknowledgedRewards: toSafeInt(progress.unacknowledgedRewards)
    },
    pendingCard: pendingCard && !seen.has(pendingCard.id) ? pendingCard : null,
    collection: uniqueCollection
  };
};

const browserStore = (): KeyValueStore | null =>
  typeof globalThis.localStorage === 'undefined' ? null : globalThis.localStorage;

export function loadRewardState(store: KeyValueStore | null = browserStore()): RewardState {
  if (!store) return initialRewardState();
  try {
    const raw = store.getItem(KEY);
    if (!raw) return initialRewardState();
    return normalizeRewardState(JSON.parse(raw));
  } catch (error) {
    warn('saved rewards could not be read, starting fresh', error);
    return initialRewardState();
  }
}

export function saveRewardState(state: RewardState, store: KeyValueStore | null = browserStore()): void {
  if (!store) return;
  try {
    store.setItem(KEY, JSON.stringify(state));
  } catch (error) {
    warn('rewards could not be saved', error);
  }
}

export const REWARD_STORAGE_KEY = KEY;
