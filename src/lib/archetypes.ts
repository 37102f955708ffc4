import type { Ability, Archetype, CreatureContent } from './types';

export type AbilityPool = 'innate' | 'switch';

export const ARCHETYPE_ABILITIES: Readonly<Record<Archetype, Readonly<Record<AbilityPool, ReadonlySet<string>>>>> = {
  Guardian: {
    innate: new Set(['innate-stone-skin', 'innate-big-hug']),
    switch: new Set(['switch-wall-up', 'switch-stand-tall'])
  },
  Striker: {
    innate: new Set(['innate-quick-start', 'innate-double-tap']),
    switch: new Set(['switch-dash-in', 'switch-pounce'])
  },
  Supporter: {
    innate: new Set(['innate-sunny-song', 'innate-lucky-charm']),
    switch: new Set(['switch-tag-team', 'switch-cheer'])
  }
};

export const abilitiesForArchetype = (
  content: CreatureContent,
  archetype: Archetype,
  pool: AbilityPool
): Ability[] => {
  const eligible = ARCHETYPE_ABILITIES[archetype][pool];
  const source = pool === 'innate' ? content.innatePowers : content.switchAbilities;
  return source.filter((ability) => eligible.has(ability.id));
};

export const isAbilityAllowed = (archetype: Archetype, pool: AbilityPool, abilityId: string) =>
  ARCHETYPE_ABILITIES[archetype][pool].has(abilityId);
