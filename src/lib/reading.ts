import type { GradeReadingContent, RandomSource, ReadingMode, ReadingState } from './types';

export const READING_FEEDBACK = {
  correct: "Great job! That's correct!",
  incorrect: 'Not quite, try reading it again!'
} as const;

export const initialReadingState = (): ReadingState => ({
  sentence: 'Loading...',
  storyTitle: null,
  story: null,
  storyIndex: 0,
  feedback: '',
  isCorrect: false
});

const PUNCTUATION = /[\p{P}]/gu;
const EDGE_PUNCTUATION = /^[\p{P}]+|[\p{P}]+$/gu;

export const normalizeSpokenText = (text: string) =>
  text.toLowerCase().replace(PUNCTUATION, '').split(/\s+/).filter(Boolean).join(' ');

export const isReadingMatch = (target: string, heard: string) => {
  const cleanTarget = normalizeSpokenText(target);
  return cleanTarget.length > 0 && cleanTarget === normalizeSpokenText(heard);
};

export const cleanWordForSpeech = (word: string) => word.trim().replace(EDGE_PUNCTUATION, '');

export const splitWords = (sentence: string) => sentence.split(/\s+/).filter(Boolean);

const pickOne = <T,>(items: readonly T[], random: RandomSource): T | undefined =>
  items.length === 0 ? undefined : items[Math.min(items.length - 1, Math.floor(random() * items.length))];

const hasMoreSentences = (state: ReadingState) =>
  state.story !== null && state.storyIndex < state.story.sentences.length - 1;

export function nextReading(
  state: ReadingState,
  content: GradeReadingContent | undefined,
  mode: ReadingMode,
  random: RandomSource = Math.random
): ReadingState {
  if (!content) return state;
  const cleared = { feedback: '', isCorrect: false };

  if (mode === 'story') {
    if (state.isCorrect && state.story && hasMoreSentences(state)) {
      const storyIndex = state.storyIndex + 1;
      return { ...state, ...cleared, storyIndex, sentence: state.story.sentences[storyIndex] };
    }
    const story = pickOne(content.stories, random) ?? null;
    return {
      ...cleared,
      story,
      storyIndex: 0,
      storyTitle: story?.title ?? null,
      sentence: story?.sentences[0] ?? 'No stories found.'
    };
  }

  return {
    ...cleared,
    story: null,
    storyIndex: 0,
    storyTitle: null,
    sentence: pickOne(content.random, random) ?? 'No sentences found.'
  };
}

export const validateReading = (state: ReadingState, transcript: string): ReadingState => {
  const isCorrect = isReadingMatch(state.sentence, transcript);
  return { ...state, isCorrect, feedback: isCorrect ? READING_FEEDBACK.correct : READING_FEEDBACK.incorrect };
};

export const readingButtonLabel = (state: ReadingState, mode: ReadingMode) => {
  if (!state.isCorrect) return 'Pass';
  if (mode === 'random' || hasMoreSentences(state)) return 'Next Sentence';
  return 'Next Story';
};
