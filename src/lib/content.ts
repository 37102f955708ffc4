import { z, type ZodError } from 'zod';
import creaturesJson from '../content/creatures.json';
import sentencesJson from '../content/sentences.json';
import type { CreatureContent, ReadingContent } from './types';

export class ContentLoadError extends Error {
  readonly source: string;
  readonly issues: string[];

  constructor(source: string, issues: string[]) {
    super(`Could not load ${source}: ${issues.join('; ')}`);
    this.name = 'ContentLoadError';
    this.source = source;
    this.issues = issues;
  }
}

const statSchema = z.number().int().nonnegative();

export const creatureSchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1),
  archetype: z.enum(['Guardian', 'Striker', 'Supporter']),
  baseStamina: statSchema,
  baseStrength: statSchema,
  shield: statSchema,
  speed: statSchema
});

export const abilitySchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1),
  description: z.string().min(1)
});

const uniqueIds = (items: Array<{ id: string }>) => new Set(items.map((item) => item.id)).size === items.length;

const creatureContentSchema = z.object({
  creatures: z.array(creatureSchema).refine(uniqueIds, { message: 'creature ids must be unique' }),
  innatePowers: z.array(abilitySchema).refine(uniqueIds, { message: 'innate power ids must be unique' }),
  switchAbilities: z.array(abilitySchema).refine(uniqueIds, { message: 'switch ability ids must be unique' })
});

const sentenceSchema = z.string().trim().min(1);

const gradeContentSchema = z.object({
  random: z.array(sentenceSchema),
  stories: z.array(
    z.object({
      title: z.string().trim().min(1),
      sentences: z.array(sentenceSchema).min(1)
    })
  )
});

const readingContentSchema = z.object({
  grades: z.object({
    Kindergarten: gradeContentSchema.optional(),
    '1st Grade': gradeContentSchema.optional(),
    '2nd Grade': gradeContentSchema.optional(),
    '3rd Grade': gradeContentSchema.optional()
  })
});

const describeIssues = (error: ZodError) =>
  error.issues.map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message));

export function parseCreatureContent(raw: unknown, source = 'creatures.json'): CreatureContent {
  const parsed = creatureContentSchema.safeParse(raw);
  if (!parsed.success) throw new ContentLoadError(source, describeIssues(parsed.error));
  return parsed.data;
}

export function parseReadingContent(raw: unknown, source = 'sentences.json'): ReadingContent {
  const parsed = readingContentSchema.safeParse(raw);
  if (!parsed.success) throw new ContentLoadError(source, describeIssues(parsed.error));
  return parsed.data;
}

export const loadBundledContent = (): { creatures: CreatureContent; reading: ReadingContent } => ({
  creatures: parseCreatureContent(creaturesJson),
  reading: parseReadingContent(sentencesJson)
});
