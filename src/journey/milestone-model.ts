import fs from 'fs';
import { z } from 'zod';

import { UnknownCheckpoint } from '../errors.js';
import type { MilestoneState } from '../types.js';

const lowercase = (s: string) => s === s.toLowerCase();

const CheckpointSchema = z.object({
  name: z
    .string()
    .regex(/^[a-z][a-z0-9_]*$/, 'checkpoint names are snake_case'),
  label: z.string().min(1),
  question: z.string().min(1),
  description: z.string().min(1),
  openEnded: z.boolean().default(false),
  values: z
    .array(z.string().trim().min(1).refine(lowercase, 'values are lowercase'))
    .min(1),
  synonyms: z
    .record(z.array(z.string().trim().min(1).refine(lowercase, 'synonyms are lowercase')))
    .default({}),
  guidance: z.array(z.string()).default([]),
});

const MilestoneSchema = z.object({
  index: z.number().int().positive(),
  title: z.string().min(1),
  goal: z.string().min(1),
  checkpoints: z.array(CheckpointSchema).min(1),
});

export const JourneyDefinitionSchema = z
  .object({
    id: z.string().min(1),
    title: z.string().min(1),
    persona: z.string().min(1),
    closing: z.string().min(1),
    milestones: z.array(MilestoneSchema).min(1),
  })
  .superRefine((def, ctx) => {
    def.milestones.forEach((m, i) => {
      if (m.index !== i + 1) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['milestones', i, 'index'],
          message: `milestone indices must run 1..N in order (expected ${i + 1}, got ${m.index})`,
        });
      }
    });

    const seen = new Set<string>();
    def.milestones.forEach((m, i) => {
      m.checkpoints.forEach((cp, j) => {
        if (seen.has(cp.name)) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: ['milestones', i, 'checkpoints', j, 'name'],
            message: `duplicate checkpoint name "${cp.name}"`,
          });
        }
        seen.add(cp.name);

        for (const key of Object.keys(cp.synonyms)) {
          if (!cp.values.includes(key)) {
            ctx.addIssue({
              code: z.ZodIssueCode.custom,
              path: ['milestones', i, 'checkpoints', j, 'synonyms', key],
              message: `synonym key "${key}" is not a value of "${cp.name}"`,
            });
          }
        }

        // Every phrase must resolve to a single value
        const owner = new Map<string, string>();
        cp.values.forEach((value, k) => {
          if (owner.has(value)) {
            ctx.addIssue({
              code: z.ZodIssueCode.custom,
              path: ['milestones', i, 'checkpoints', j, 'values', k],
              message: `duplicate value "${value}" in "${cp.name}"`,
            });
          }
          owner.set(value, value);
        });
        for (const [key, phrases] of Object.entries(cp.synonyms)) {
          phrases.forEach((phrase, k) => {
            const claimed = owner.get(phrase);
            if (claimed !== undefined && claimed !== key) {
              ctx.addIssue({
                code: z.ZodIssueCode.custom,
                path: ['milestones', i, 'checkpoints', j, 'synonyms', key, k],
                message: `"${phrase}" in "${cp.name}" resolves to both "${claimed}" and "${key}"`,
              });
            }
            owner.set(phrase, key);
          });
        }
      });
    });
  });

export type JourneyDefinition = z.infer<typeof JourneyDefinitionSchema>;
export type MilestoneDefinition = JourneyDefinition['milestones'][number];
export type CheckpointDefinition = MilestoneDefinition['checkpoints'][number];

export function parseJourneyDefinition(raw: unknown): JourneyDefinition {
  const result = JourneyDefinitionSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues
      .map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`)
      .join('; ');
    throw new Error(`Invalid journey definition: ${issues}`);
  }
  return result.data;
}

export function loadJourneyDefinition(filePath: string): JourneyDefinition {
  const raw: unknown = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
  return parseJourneyDefinition(raw);
}

/**
 * Read-only view over a validated journey definition. Nothing downstream
 * names a concrete checkpoint; everything goes through this table.
 */
export class MilestoneModel {
  private readonly byName = new Map<
    string,
    { checkpoint: CheckpointDefinition; milestone: number }
  >();

  constructor(readonly definition: JourneyDefinition) {
    for (const m of definition.milestones) {
      for (const cp of m.checkpoints) {
        this.byName.set(cp.name, { checkpoint: cp, milestone: m.index });
      }
    }
  }

  static fromFile(filePath: string): MilestoneModel {
    return new MilestoneModel(loadJourneyDefinition(filePath));
  }

  get journeyType(): string {
    return this.definition.id;
  }

  get milestones(): readonly MilestoneDefinition[] {
    return this.definition.milestones;
  }

  get lastMilestone(): number {
    return this.definition.milestones.length;
  }

  /** All checkpoint names, milestone by milestone, in definition order. */
  get checkpointNames(): string[] {
    return this.definition.milestones.flatMap((m) =>
      m.checkpoints.map((cp) => cp.name),
    );
  }

  milestone(index: number): MilestoneDefinition {
    const m = this.definition.milestones[index - 1];
    if (!m) {
      throw new RangeError(
        `Milestone ${index} is outside 1..${this.lastMilestone}`,
      );
    }
    return m;
  }

  checkpointsOf(index: number): readonly CheckpointDefinition[] {
    return this.milestone(index).checkpoints;
  }

  hasCheckpoint(name: string): boolean {
    return this.byName.has(name);
  }

  checkpoint(name: string): CheckpointDefinition {
    const entry = this.byName.get(name);
    if (!entry) throw new UnknownCheckpoint(name);
    return entry.checkpoint;
  }

  milestoneOf(name: string): number {
    const entry = this.byName.get(name);
    if (!entry) throw new UnknownCheckpoint(name);
    return entry.milestone;
  }

  emptyCheckpoints(): Record<string, string | null> {
    return Object.fromEntries(this.checkpointNames.map((n) => [n, null]));
  }

  emptyMilestones(): Record<number, MilestoneState> {
    const result: Record<number, MilestoneState> = {};
    for (const m of this.definition.milestones) {
      result[m.index] = { completed: false, completedAt: null };
    }
    return result;
  }
}
