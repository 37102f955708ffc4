import type { AnswerSource, ProgressState } from './types';

export const REWARD_INTERVAL = 15;

export const initialProgress = (): ProgressState => ({
  correctAnswers: 0,
  correctBySource: { math: 0, reading: 0 },
  pendingTokens: 0,
  unacknowledgedRewards: 0
});

export const recordCorrectAnswer = (progress: ProgressState, source?: AnswerSource): ProgressState => {
  const correctAnswers = progress.correctAnswers + 1;
  const earned = correctAnswers % REWARD_INTERVAL === 0;
  return {
    correctAnswers,
    correctBySource: source
      ? { ...progress.correctBySource, [source]: progress.correctBySource[source] + 1 }
      : progress.correctBySource,
    pendingTokens: progress.pendingTokens + (earned ? 1 : 0),
    unacknowledgedRewards: progress.unacknowledgedRewards + (earned ? 1 : 0)
  };
};

export const hasRewardNotice = (progress: ProgressState) => progress.unacknowledgedRewards > 0;

export const acknowledgeReward = (progress: ProgressState): ProgressState =>
  hasRewardNotice(progress) ? { ...progress, unacknowledgedRewards: 0 } : progress;

export const consumeToken = (progress: ProgressState): ProgressState | null =>
  progress.pendingTokens > 0 ? { ...progress, pendingTokens: progress.pendingTokens - 1 } : null;

export const answersUntilNextReward = (progress: ProgressState) =>
  REWARD_INTERVAL - (progress.correctAnswers % REWARD_INTERVAL);
