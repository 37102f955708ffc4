import { describe, expect, it } from 'vitest';
import { isAbilityAllowed } from '../lib/archetypes';
import { applyRarityBonus, buildCard, generateCard, pickOne, rarityFromSample } from '../lib/card-generator';
import { loadBundledContent } from '../lib/content';
import type { CreatureContent } from '../lib/types';

const sequence = (...values: number[]) => {
  let index = 0;
  return () => values[index++ % values.length];
};

const { creatures: content } = loadBundledContent();

describe('rarity roll', () => {
  it('treats the thresholds as exclusive lower bounds', () => {
    expect(rarityFromSample(0.95)).toBe('rare');
    expect(rarityFromSample(0.7)).toBe('common');
    expect(rarityFromSample(0.96)).toBe('epic');
    expect(rarityFromSample(0.71)).toBe('rare');
    expect(rarityFromSample(0)).toBe('common');
  });

  it('adds the rarity bonus to stamina and strength only', () => {
    const creature = content.creatures[0];
    expect(applyRarityBonus(creature, 'common')).toEqual({ stamina: 6, strength: 2, shield: 3, speed: 1 });
    expect(applyRarityBonus(creature, 'rare')).toEqual({ stamina: 7, strength: 2, shield: 3, speed: 1 });
    expect(applyRarityBonus(creature, 'epic')).toEqual({ stamina: 8, strength: 3, shield: 3, speed: 1 });
  });
});

describe('card generation', () => {
  it('builds a card from the creature, rarity and archetype abilities drawn', () => {
    const card = generateCard(content, sequence(0, 0.96, 0, 0.99), () => 'card-1', new Date('2026-03-01T10:00:00Z'));
    expect(card).toEqual({
      id: 'card-1',
      creature: content.creatures[0],
      rarity: 'epic',
      stats: { stamina: 8, strength: 3, shield: 3, speed: 1 },
      innatePower: content.innatePowers.find((ability) => ability.id === 'innate-stone-skin'),
      switchAbility: content.switchAbilities.find((ability) => ability.id === 'switch-stand-tall'),
      createdAt: '2026-03-01T10:00:00.000Z'
    });
  });

  it('leaves an ability slot empty when the archetype has nothing in that pool', () => {
    const noInnate: CreatureContent = { ...content, innatePowers: [] };
    const card = generateCard(noInnate, sequence(0, 0.5, 0), () => 'card-2');
    expect(card?.innatePower).toBeNull();
    expect(card?.switchAbility?.id).toBe('switch-wall-up');
    expect(card?.rarity).toBe('common');
  });

  it('returns nothing when there are no creatures to draw from', () => {
    expect(generateCard({ ...content, creatures: [] }, Math.random, () => 'never')).toBeNull();
  });

  it('keeps stats and abilities consistent across many draws', () => {
    const bonus = { common: 0, rare: 1, epic: 2 };
    for (let i = 0; i < 500; i += 1) {
      const card = generateCard(content, Math.random, () => `card-${i}`);
      if (!card) throw new Error('expected a card');
      expect(card.stats.stamina).toBe(card.creature.baseStamina + bonus[card.rarity]);
      expect(card.stats.strength).toBe(card.creature.baseStrength + (card.rarity === 'epic' ? 1 : 0));
      if (card.innatePower) expect(isAbilityAllowed(card.creature.archetype, 'innate', card.innatePower.id)).toBe(true);
      if (card.switchAbility) {
        expect(isAbilityAllowed(card.creature.archetype, 'switch', card.switchAbility.id)).toBe(true);
      }
    }
  });

  it('gives identical draws distinct identities', () => {
    const draw = { creature: content.creatures[1], rarity: 'rare' as const, innatePower: null, switchAbility: null };
    const first = buildCard(draw, 'a');
    const second = buildCard(draw, 'b');
    expect(first.stats).toEqual(second.stats);
    expect(first.id).not.toBe(second.id);
  });

  it('never picks past the end of a pool', () => {
    expect(pickOne(['x', 'y'], () => 0.999999)).toBe('y');
    expect(pickOne([], () => 0.5)).toBeNull();
  });
});
