import { describe, expect, it } from 'vitest';
import { ARCHETYPE_ABILITIES, abilitiesForArchetype } from '../lib/archetypes';
import { ContentLoadError, loadBundledContent, parseCreatureContent, parseReadingContent } from '../lib/content';
import { GRADES, type Archetype } from '../lib/types';

const archetypes: Archetype[] = ['Guardian', 'Striker', 'Supporter'];

describe('bundled content', () => {
  it('loads creatures, abilities and sentences for every grade', () => {
    const { creatures, reading } = loadBundledContent();
    expect(creatures.creatures).toHaveLength(12);
    for (const grade of GRADES) {
      expect(reading.grades[grade]?.random.length).toBeGreaterThan(0);
      expect(reading.grades[grade]?.stories.length).toBeGreaterThan(0);
    }
  });

  it('has abilities in both pools for every archetype', () => {
    const { creatures } = loadBundledContent();
    for (const archetype of archetypes) {
      expect(abilitiesForArchetype(creatures, archetype, 'innate')).toHaveLength(ARCHETYPE_ABILITIES[archetype].innate.size);
      expect(abilitiesForArchetype(creatures, archetype, 'switch')).toHaveLength(ARCHETYPE_ABILITIES[archetype].switch.size);
    }
  });
});

describe('content validation', () => {
  const creature = { id: 'zip-fox', name: 'Zip Fox', baseStamina: 4, baseStrength: 4, shield: 0, speed: 4 };

  it('rejects a creature without an archetype', () => {
    const run = () => parseCreatureContent({ creatures: [creature], innatePowers: [], switchAbilities: [] });
    expect(run).toThrow(ContentLoadError);
    try {
      run();
    } catch (error) {
      expect(error).toBeInstanceOf(ContentLoadError);
      if (error instanceof ContentLoadError) {
        expect(error.source).toBe('creatures.json');
        expect(error.issues[0]).toMatch(/^creatures\.0\.archetype: /);
      }
    }
  });

  it('rejects duplicate creature ids', () => {
    const entry = { ...creature, archetype: 'Striker' };
    expect(() => parseCreatureContent({ creatures: [entry, entry], innatePowers: [], switchAbilities: [] })).toThrow(
      'creatures: creature ids must be unique'
    );
  });

  it('rejects missing reading content', () => {
    expect(() => parseReadingContent(undefined)).toThrow(ContentLoadError);
    expect(() => parseReadingContent({ grades: { Kindergarten: { random: [''], stories: [] } } })).toThrow(
      /grades\.Kindergarten\.random\.0/
    );
  });
});
