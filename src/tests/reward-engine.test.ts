import { describe, expect, it } from 'vitest';
import { loadBundledContent } from '../lib/content';
import { RewardEngine } from '../lib/reward-engine';
import type { CreatureContent } from '../lib/types';

const { creatures: content } = loadBundledContent();

const makeEngine = (overrides: Partial<CreatureContent> = {}) => {
  let nextId = 0;
  return new RewardEngine({
    content: { ...content, ...overrides },
    random: () => 0,
    createId: () => `card-${(nextId += 1)}`,
    now: () => new Date('2026-03-01T10:00:00Z')
  });
};

const answer = (engine: RewardEngine, times: number) => {
  for (let i = 0; i < times; i += 1) engine.recordCorrectAnswer();
};

describe('reward engine', () => {
  it('turns fifteen correct answers into one collected card', () => {
    const engine = makeEngine();
    answer(engine, 15);
    const card = engine.generateCard();
    engine.commitPendingCard();

    const state = engine.getSnapshot();
    expect(card?.id).toBe('card-1');
    expect(engine.listCollection()).toHaveLength(1);
    expect(engine.listCollection()[0]).toBe(card);
    expect(state.pendingCard).toBeNull();
    expect(state.progress.pendingTokens).toBe(0);
  });

  it('walks the reward lifecycle', () => {
    const engine = makeEngine();
    expect(engine.phase).toBe('no_tokens');
    answer(engine, 30);
    expect(engine.phase).toBe('tokens_available');
    engine.generateCard();
    expect(engine.phase).toBe('card_pending');
    engine.commitPendingCard();
    expect(engine.phase).toBe('tokens_available');
    engine.generateCard();
    engine.commitPendingCard();
    expect(engine.phase).toBe('no_tokens');
  });

  it('refuses a second card while one is waiting to be revealed', () => {
    const engine = makeEngine();
    answer(engine, 30);
    const first = engine.generateCard();
    const second = engine.generateCard();

    expect(second).toBeNull();
    expect(engine.getSnapshot().pendingCard).toBe(first);
    expect(engine.getSnapshot().progress.pendingTokens).toBe(1);
  });

  it('does nothing without a token', () => {
    const engine = makeEngine();
    answer(engine, 14);
    const before = engine.getSnapshot();
    expect(engine.generateCard()).toBeNull();
    expect(engine.getSnapshot()).toBe(before);
  });

  it('keeps the token when the creature pool is empty', () => {
    const engine = makeEngine({ creatures: [] });
    answer(engine, 15);
    expect(engine.generateCard()).toBeNull();
    expect(engine.getSnapshot().progress.pendingTokens).toBe(1);
    expect(engine.phase).toBe('tokens_available');
  });

  it('ignores a commit when nothing is pending', () => {
    const engine = makeEngine();
    engine.commitPendingCard();
    expect(engine.listCollection()).toHaveLength(0);
  });

  it('keeps value-equal cards as separate entries in insertion order', () => {
    const engine = makeEngine();
    answer(engine, 30);
    engine.generateCard();
    engine.commitPendingCard();
    engine.generateCard();
    engine.commitPendingCard();

    const [first, second] = engine.listCollection();
    expect(first.stats).toEqual(second.stats);
    expect(first.creature.id).toBe(second.creature.id);
    expect([first.id, second.id]).toEqual(['card-1', 'card-2']);
  });

  it('raises the reward notice once per threshold and clears it on acknowledgment', () => {
    const engine = makeEngine();
    answer(engine, 14);
    expect(engine.rewardNotice).toBe(false);
    engine.recordCorrectAnswer('math');
    expect(engine.rewardNotice).toBe(true);
    engine.acknowledgeReward();
    expect(engine.rewardNotice).toBe(false);
    engine.recordCorrectAnswer('reading');
    expect(engine.rewardNotice).toBe(false);
  });

  it('notifies subscribers on change and stops after unsubscribing', () => {
    const engine = makeEngine();
    let calls = 0;
    const unsubscribe = engine.subscribe(() => {
      calls += 1;
    });
    engine.recordCorrectAnswer();
    engine.commitPendingCard();
    engine.acknowledgeReward();
    unsubscribe();
    engine.recordCorrectAnswer();
    expect(calls).toBe(1);
  });

  it('never alters a committed card', () => {
    const engine = makeEngine();
    answer(engine, 30);
    engine.generateCard();
    engine.commitPendingCard();
    const committed = engine.listCollection()[0];
    const snapshot = JSON.stringify(committed);
    engine.generateCard();
    engine.commitPendingCard();
    answer(engine, 15);
    expect(JSON.stringify(engine.listCollection()[0])).toBe(snapshot);
  });
});
