import { describe, expect, it, vi } from 'vitest';
import { loadBundledContent } from '../lib/content';
import { RewardEngine, initialRewardState } from '../lib/reward-engine';
import { REWARD_STORAGE_KEY, loadRewardState, normalizeRewardState, saveRewardState, type KeyValueStore } from '../lib/storage';

const memoryStore = (initial: Record<string, string> = {}): KeyValueStore => {
  const values = new Map(Object.entries(initial));
  return {
    getItem: (key) => values.get(key) ?? null,
    setItem: (key, value) => {
      values.set(key, value);
    }
  };
};

const collectedState = () => {
  const engine = new RewardEngine({ content: loadBundledContent().creatures, random: () => 0.5, createId: () => 'card-1' });
  for (let i = 0; i < 16; i += 1) engine.recordCorrectAnswer('reading');
  engine.generateCard();
  engine.commitPendingCard();
  return engine.getSnapshot();
};

describe('reward storage', () => {
  it('restores what it saved', () => {
    const store = memoryStore();
    const state = collectedState();
    saveRewardState(state, store);
    expect(loadRewardState(store)).toEqual(state);
  });

  it('starts fresh when nothing or garbage is stored', () => {
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    expect(loadRewardState(memoryStore())).toEqual(initialRewardState());
    expect(loadRewardState(memoryStore({ [REWARD_STORAGE_KEY]: '{not json' }))).toEqual(initialRewardState());
    expect(loadRewardState(null)).toEqual(initialRewardState());
  });

  it('clamps counters and drops malformed or repeated cards', () => {
    const card = collectedState().collection[0];
    const state = normalizeRewardState({
      progress: { correctAnswers: -4, correctBySource: { math: 2.7, reading: 'x' }, pendingTokens: 3, unacknowledgedRewards: -1 },
      pendingCard: card,
      collection: [card, { ...card, rarity: 'legendary' }, card]
    });
    expect(state.progress).toEqual({
      correctAnswers: 2,
      correctBySource: { math: 2, reading: 0 },
      pendingTokens: 3,
      unacknowledgedRewards: 0
    });
    expect(state.collection).toEqual([card]);
    expect(state.pendingCard).toBeNull();
  });
});
