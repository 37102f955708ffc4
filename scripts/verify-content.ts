import fs from 'node:fs';
import path from 'node:path';
import { ARCHETYPE_ABILITIES, type AbilityPool } from '../src/lib/archetypes';
import { ContentLoadError, parseCreatureContent, parseReadingContent } from '../src/lib/content';
import { GRADES, type Archetype } from '../src/lib/types';

const root = path.resolve(process.cwd());
const contentDir = path.join(root, 'src', 'content');
const archetypes: Archetype[] = ['Guardian', 'Striker', 'Supporter'];
const pools: AbilityPool[] = ['innate', 'switch'];

const failures: string[] = [];

const check = (condition: boolean, message: string) => {
  if (!condition) failures.push(message);
};

const readJson = (file: string): unknown => JSON.parse(fs.readFileSync(path.join(contentDir, file), 'utf8'));

try {
  const creatures = parseCreatureContent(readJson('creatures.json'));
  const abilityIds = {
    innate: new Set(creatures.innatePowers.map((ability) => ability.id)),
    switch: new Set(creatures.switchAbilities.map((ability) => ability.id))
  };
  for (const archetype of archetypes) {
    check(
      creatures.creatures.some((creature) => creature.archetype === archetype),
      `No creature uses the ${archetype} archetype.`
    );
    for (const pool of pools) {
      for (const id of ARCHETYPE_ABILITIES[archetype][pool]) {
        check(abilityIds[pool].has(id), `${archetype} lists ${pool} ability "${id}" that is not in creatures.json.`);
      }
    }
  }

  const reading = parseReadingContent(readJson('sentences.json'));
  for (const grade of GRADES) {
    const content = reading.grades[grade];
    check(Boolean(content), `sentences.json has no entry for ${grade}.`);
    check((content?.random.length ?? 0) > 0, `${grade} has no random sentences.`);
    check((content?.stories.length ?? 0) > 0, `${grade} has no stories.`);
  }
} catch (loadError) {
  failures.push(loadError instanceof ContentLoadError ? loadError.message : `Unexpected error: ${String(loadError)}`);
}

if (failures.length > 0) {
  console.error('verify:content failed');
  failures.forEach((failure, index) => console.error(`  ${index + 1}. ${failure}`));
  process.exitCode = 1;
} else {
  console.log('verify:content passed');
  console.log('  - creatures.json and sentences.json match their schemas');
  console.log('  - every archetype ability id exists in the content');
  console.log('  - every grade has sentences and stories');
}
