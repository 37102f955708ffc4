import { createCardId, generateCard, type CardIdFactory } from './card-generator';
import { commitPendingCard, listCollection } from './collection';
import { debug, info } from './logging';
import { acknowledgeReward, consumeToken, hasRewardNotice, initialProgress, recordCorrectAnswer } from './progress';
import type { AnswerSource, Card, CreatureContent, RandomSource, RewardPhase, RewardState } from './types';

export const initialRewardState = (): RewardState => ({
  progress: initialProgress(),
  pendingCard: null,
  collection: []
});

export const rewardPhase = (state: RewardState): RewardPhase => {
  if (state.pendingCard) return 'card_pending';
  return state.progress.pendingTokens > 0 ? 'tokens_available' : 'no_tokens';
};

export interface RewardEngineOptions {
  content: CreatureContent;
  random?: RandomSource;
  createId?: CardIdFactory;
  now?: () => Date;
  initialState?: RewardState;
}

type Listener = () => void;

/**
 * Owns the reward state for one player session. Every mutation replaces the state object,
 * so `getSnapshot` can be handed straight to `useSyncExternalStore`.
 */
export class RewardEngine {
  private state: RewardState;
  private readonly listeners = new Set<Listener>();
  private readonly content: CreatureContent;
  private readonly random: RandomSource;
  private readonly createId: CardIdFactory;
  private readonly now: () => Date;

  constructor(options: RewardEngineOptions) {
    this.content = options.content;
    this.random = options.random ?? Math.random;
    this.createId = options.createId ?? createCardId;
    this.now = options.now ?? (() => new Date());
    this.state = options.initialState ?? initialRewardState();
  }

  readonly subscribe = (listener: Listener) => {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  };

  readonly getSnapshot = (): RewardState => this.state;

  get phase(): RewardPhase {
    return rewardPhase(this.state);
  }

  get rewardNotice(): boolean {
    return hasRewardNotice(this.state.progress);
  }

  recordCorrectAnswer(source?: AnswerSource): void {
    const progress = recordCorrectAnswer(this.state.progress, source);
    if (progress.pendingTokens > this.state.progress.pendingTokens) {
      info('reward earned', { correctAnswers: progress.correctAnswers, pendingTokens: progress.pendingTokens });
    }
    this.setState({ ...this.state, progress });
  }

  acknowledgeReward(): void {
    const progress = acknowledgeReward(this.state.progress);
    if (progress !== this.state.progress) this.setState({ ...this.state, progress });
  }

  generateCard(): Card | null {
    if (this.state.pendingCard) {
      debug('generateCard ignored: a card is already waiting to be revealed');
      return null;
    }
    const progress = consumeToken(this.state.progress);
    if (!progress) {
      debug('generateCard ignored: no reward tokens');
      return null;
    }
    const card = generateCard(this.content, this.random, this.createId, this.now());
    if (!card) {
      debug('generateCard ignored: creature pool is empty');
      return null;
    }
    debug('card generated', { id: card.id, creature: card.creature.id, rarity: card.rarity });
    this.setState({ ...this.state, progress, pendingCard: card });
    return card;
  }

  commitPendingCard(): void {
    const next = commitPendingCard(this.state);
    if (next !== this.state) this.setState(next);
  }

  listCollection(): readonly Card[] {
    return listCollection(this.state);
  }

  private setState(next: RewardState) {
    this.state = next;
    for (const listener of this.listeners) listener();
  }
}
