import { abilitiesForArchetype } from './archetypes';
import type { Ability, BaseCreature, Card, CardStats, CreatureContent, RandomSource, Rarity } from './types';

export const RARITY_THRESHOLDS = { epic: 0.95, rare: 0.7 } as const;

export const RARITY_BONUS: Record<Rarity, { stamina: number; strength: number }> = {
  common: { stamina: 0, strength: 0 },
  rare: { stamina: 1, strength: 0 },
  epic: { stamina: 2, strength: 1 }
};

export type CardIdFactory = () => string;

const fallbackCardId = () => `card-${Date.now()}-${Math.random().toString(16).slice(2, 10)}`;

export const createCardId: CardIdFactory = () => {
  if (typeof globalThis.crypto?.randomUUID === 'function') return globalThis.crypto.randomUUID();
  return fallbackCardId();
};

const pickIndex = (length: number, random: RandomSource) => Math.min(length - 1, Math.floor(random() * length));

export const pickOne = <T,>(items: readonly T[], random: RandomSource): T | null => {
  if (items.length === 0) return null;
  return items[pickIndex(items.length, random)];
};

// Lower bounds are exclusive: 0.95 rolls rare, 0.70 rolls common.
export const rarityFromSample = (sample: number): Rarity => {
  if (sample > RARITY_THRESHOLDS.epic) return 'epic';
  if (sample > RARITY_THRESHOLDS.rare) return 'rare';
  return 'common';
};

export const applyRarityBonus = (creature: BaseCreature, rarity: Rarity): CardStats => ({
  stamina: creature.baseStamina + RARITY_BONUS[rarity].stamina,
  strength: creature.baseStrength + RARITY_BONUS[rarity].strength,
  shield: creature.shield,
  speed: creature.speed
});

export interface CardDraw {
  creature: BaseCreature;
  rarity: Rarity;
  innatePower: Ability | null;
  switchAbility: Ability | null;
}

export const drawCard = (content: CreatureContent, random: RandomSource): CardDraw | null => {
  const creature = pickOne(content.creatures, random);
  if (!creature) return null;
  const rarity = rarityFromSample(random());
  return {
    creature,
    rarity,
    innatePower: pickOne(abilitiesForArchetype(content, creature.archetype, 'innate'), random),
    switchAbility: pickOne(abilitiesForArchetype(content, creature.archetype, 'switch'), random)
  };
};

export const buildCard = (draw: CardDraw, id: string, now = new Date()): Card => ({
  id,
  creature: draw.creature,
  rarity: draw.rarity,
  stats: applyRarityBonus(draw.creature, draw.rarity),
  innatePower: draw.innatePower,
  switchAbility: draw.switchAbility,
  createdAt: now.toISOString()
});

export const generateCard = (
  content: CreatureContent,
  random: RandomSource = Math.random,
  createId: CardIdFactory = createCardId,
  now = new Date()
): Card | null => {
  const draw = drawCard(content, random);
  return draw ? buildCard(draw, createId(), now) : null;
};
