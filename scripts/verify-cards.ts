import { isAbilityAllowed } from '../src/lib/archetypes';
import { RARITY_BONUS, generateCard } from '../src/lib/card-generator';
import { loadBundledContent } from '../src/lib/content';
import { RewardEngine } from '../src/lib/reward-engine';
import type { Rarity } from '../src/lib/types';

const SAMPLE_SIZE = 20000;
const EXPECTED_SHARE: Record<Rarity, number> = { common: 0.7, rare: 0.25, epic: 0.05 };
const SHARE_TOLERANCE = 0.02;
const RARITIES: Rarity[] = ['common', 'rare', 'epic'];

const percent = (count: number, total: number) => ((count / total) * 100).toFixed(2);

function printDistributionTable(title: string, counts: Record<string, number>, total: number): void {
  console.log(`\n${title}`);
  const rows = Object.entries(counts).sort((a, b) => b[1] - a[1]);
  for (const [key, count] of rows) {
    console.log(`  ${key.padEnd(24)} ${String(count).padStart(6)}  (${percent(count, total)}%)`);
  }
}

function runCardSamples() {
  const { creatures: content } = loadBundledContent();
  const failures: string[] = [];
  const rarityCounts: Record<Rarity, number> = { common: 0, rare: 0, epic: 0 };
  const creatureCounts: Record<string, number> = {};
  const ids = new Set<string>();

  for (let i = 0; i < SAMPLE_SIZE; i += 1) {
    const card = generateCard(content);
    if (!card) {
      failures.push('generateCard returned nothing with a full creature pool');
      break;
    }
    rarityCounts[card.rarity] += 1;
    creatureCounts[card.creature.name] = (creatureCounts[card.creature.name] ?? 0) + 1;
    if (ids.has(card.id)) failures.push(`Duplicate card id: ${card.id}`);
    ids.add(card.id);

    const bonus = RARITY_BONUS[card.rarity];
    if (card.stats.stamina !== card.creature.baseStamina + bonus.stamina) {
      failures.push(`Stamina bonus wrong for ${card.creature.id} (${card.rarity})`);
    }
    if (card.stats.strength !== card.creature.baseStrength + bonus.strength) {
      failures.push(`Strength bonus wrong for ${card.creature.id} (${card.rarity})`);
    }
    if (card.innatePower && !isAbilityAllowed(card.creature.archetype, 'innate', card.innatePower.id)) {
      failures.push(`${card.creature.archetype} got foreign innate power ${card.innatePower.id}`);
    }
    if (card.switchAbility && !isAbilityAllowed(card.creature.archetype, 'switch', card.switchAbility.id)) {
      failures.push(`${card.creature.archetype} got foreign switch ability ${card.switchAbility.id}`);
    }
  }

  for (const rarity of RARITIES) {
    const share = rarityCounts[rarity] / SAMPLE_SIZE;
    if (Math.abs(share - EXPECTED_SHARE[rarity]) > SHARE_TOLERANCE) {
      failures.push(`Rarity ${rarity} share ${percent(rarityCounts[rarity], SAMPLE_SIZE)}% is off target`);
    }
  }

  printDistributionTable('=== Rarity Distribution ===', rarityCounts, SAMPLE_SIZE);
  printDistributionTable('=== Creature Distribution ===', creatureCounts, SAMPLE_SIZE);
  return { failures };
}

function runLifecycleSanity() {
  const failures: string[] = [];
  const engine = new RewardEngine({ content: loadBundledContent().creatures });
  for (let i = 0; i < 45; i += 1) engine.recordCorrectAnswer(i % 2 === 0 ? 'math' : 'reading');
  if (engine.getSnapshot().progress.pendingTokens !== 3) failures.push('45 correct answers should earn 3 tokens');

  let opened = 0;
  while (engine.phase === 'tokens_available' && opened < 10) {
    engine.generateCard();
    if (engine.generateCard() !== null) failures.push('A second card was generated while one was pending');
    engine.commitPendingCard();
    opened += 1;
  }
  if (opened !== 3 || engine.listCollection().length !== 3) failures.push(`Expected 3 cards, opened ${opened}`);
  if (engine.phase !== 'no_tokens') failures.push(`Lifecycle should end in no_tokens, got ${engine.phase}`);

  console.log(`\n=== Lifecycle ===\n  opened ${opened} cards from 45 correct answers`);
  return { failures };
}

function main() {
  const failures = [...runCardSamples().failures, ...runLifecycleSanity().failures];

  if (failures.length > 0) {
    console.error('\n=== Verification Failures ===');
    failures.slice(0, 40).forEach((f, index) => {
      console.error(`  ${index + 1}. ${f}`);
    });
    if (failures.length > 40) {
      console.error(`  ...and ${failures.length - 40} more`);
    }
    process.exitCode = 1;
    return;
  }

  console.log('\nAll card verification checks passed.');
}

main();
