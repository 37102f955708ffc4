export type AppMode = 'reading' | 'math';

export type Grade = 'Kindergarten' | '1st Grade' | '2nd Grade' | '3rd Grade';

export const GRADES: readonly Grade[] = ['Kindergarten', '1st Grade', '2nd Grade', '3rd Grade'];

export type AnswerSource = 'math' | 'reading';

export type RandomSource = () => number;

export type MathOperation = '+' | '-' | '×' | '÷';

export interface MathProblem {
  question: string;
  answer: number;
  left: number;
  right: number;
  operation: MathOperation;
}

export interface Story {
  title: string;
  sentences: string[];
}

export interface GradeReadingContent {
  random: string[];
  stories: Story[];
}

export interface ReadingContent {
  grades: Partial<Record<Grade, GradeReadingContent>>;
}

export type ReadingMode = 'random' | 'story';

export interface ReadingState {
  sentence: string;
  storyTitle: string | null;
  story: Story | null;
  storyIndex: number;
  feedback: string;
  isCorrect: boolean;
}

export type Archetype = 'Guardian' | 'Striker' | 'Supporter';

export type Rarity = 'common' | 'rare' | 'epic';

export interface BaseCreature {
  readonly id: string;
  readonly name: string;
  readonly archetype: Archetype;
  readonly baseStamina: number;
  readonly baseStrength: number;
  readonly shield: number;
  readonly speed: number;
}

export interface Ability {
  readonly id: string;
  readonly name: string;
  readonly description: string;
}

export interface CreatureContent {
  creatures: readonly BaseCreature[];
  innatePowers: readonly Ability[];
  switchAbilities: readonly Ability[];
}

export interface CardStats {
  readonly stamina: number;
  readonly strength: number;
  readonly shield: number;
  readonly speed: number;
}

export interface Card {
  readonly id: string;
  readonly creature: BaseCreature;
  readonly rarity: Rarity;
  readonly stats: CardStats;
  readonly innatePower: Ability | null;
  readonly switchAbility: Ability | null;
  readonly createdAt: string;
}

export interface ProgressState {
  correctAnswers: number;
  correctBySource: Record<AnswerSource, number>;
  pendingTokens: number;
  unacknowledgedRewards: number;
}

export type RewardPhase = 'no_tokens' | 'tokens_available' | 'card_pending';

export interface RewardState {
  progress: ProgressState;
  pendingCard: Card | null;
  collection: readonly Card[];
}
