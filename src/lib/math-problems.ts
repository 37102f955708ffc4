import type { Grade, MathOperation, MathProblem, RandomSource } from './types';

export const MAX_ANSWER_LENGTH = 4;
export const NUMBER_PAD_KEYS = ['1', '2', '3', '4', '5', '6', '7', '8', '9', '', '0', 'del'] as const;
export type NumberPadKey = (typeof NUMBER_PAD_KEYS)[number];

export type MathCheckResult = 'invalid' | 'correct' | 'incorrect';

export const MATH_FEEDBACK: Record<MathCheckResult, string> = {
  invalid: 'Please enter a number!',
  correct: 'Great job!',
  incorrect: 'Not quite, try again!'
};

const randInt = (min: number, max: number, random: RandomSource) => Math.floor(random() * (max - min + 1)) + min;
const pick = <T,>(items: readonly T[], random: RandomSource): T => items[randInt(0, items.length - 1, random)];
const coinFlip = (random: RandomSource) => random() < 0.5;

const makeProblem = (left: number, operation: MathOperation, right: number, answer: number): MathProblem => ({
  question: `${left} ${operation} ${right} = ?`,
  answer,
  left,
  right,
  operation
});

// Subtraction keeps right <= left so answers never go negative.
const addOrSubtract = (left: number, right: number, random: RandomSource) =>
  coinFlip(random) ? makeProblem(left, '+', right, left + right) : makeProblem(left, '-', right, left - right);

export function generateMathProblem(grade: Grade, random: RandomSource = Math.random): MathProblem {
  switch (grade) {
    case 'Kindergarten': {
      const left = randInt(1, 10, random);
      return addOrSubtract(left, randInt(1, left, random), random);
    }
    case '1st Grade': {
      const left = randInt(1, 20, random);
      return addOrSubtract(left, randInt(1, left, random), random);
    }
    case '2nd Grade': {
      if (coinFlip(random)) {
        const left = randInt(10, 99, random);
        return addOrSubtract(left, randInt(10, left, random), random);
      }
      const left = pick([2, 5, 10], random);
      const right = randInt(2, 10, random);
      return makeProblem(left, '×', right, left * right);
    }
    case '3rd Grade': {
      if (coinFlip(random)) {
        const left = randInt(2, 12, random);
        const right = randInt(2, 12, random);
        return makeProblem(left, '×', right, left * right);
      }
      const divisor = randInt(2, 12, random);
      const answer = randInt(2, 12, random);
      return makeProblem(divisor * answer, '÷', divisor, answer);
    }
  }
}

export const applyNumberPadKey = (entry: string, key: NumberPadKey): string => {
  if (key === 'del') return entry.slice(0, -1);
  if (key === '' || entry.length >= MAX_ANSWER_LENGTH) return entry;
  return entry + key;
};

export const checkMathAnswer = (entry: string, problem: MathProblem): MathCheckResult => {
  const trimmed = entry.trim();
  if (!/^-?\d+$/.test(trimmed)) return 'invalid';
  return Number(trimmed) === problem.answer ? 'correct' : 'incorrect';
};

export const showsBlockVisual = (problem: MathProblem) => problem.operation === '+' || problem.operation === '-';
