import { z } from 'zod';

import {
  EXTRACTION_TIMEOUT,
  KEYWORD_FALLBACK_ENABLED,
} from '../config.js';
import { ExtractionUnavailable } from '../errors.js';
import type {
  ExtractionCapability,
  FunctionCall,
  FunctionDeclaration,
} from '../llm/capabilities.js';
import { runWithTimeout } from '../llm/timeout.js';
import { logger } from '../logger.js';
import type { Journey, JourneyStore, Message } from '../types.js';
import { applyCheckpointValue, normalizeCheckpointValue } from './checkpoints.js';
import { keywordMatch } from './keyword-matcher.js';
import type { CheckpointDefinition, MilestoneModel } from './milestone-model.js';
import { activeCheckpoint } from './state-machine.js';

export const RECORD_CHECKPOINT_VALUE = 'record_checkpoint_value';

const recordCheckpointShape = {
  checkpoint_name: z
    .string()
    .describe('Name of the checkpoint being answered. Must be the target checkpoint.'),
  value: z
    .string()
    .describe('The value the user gave, using one of the allowed values when the list is closed'),
};

export const recordCheckpointFunction: FunctionDeclaration = {
  name: RECORD_CHECKPOINT_VALUE,
  description:
    'Record the answer the user clearly gave to the target checkpoint question. Only call this when the answer is explicit.',
  parameters: recordCheckpointShape,
};

const RecordCheckpointArgs = z.object(recordCheckpointShape);

export type SentinelOutcome =
  | { kind: 'idle' }
  | { kind: 'no_signal'; checkpoint: string }
  | { kind: 'rejected'; checkpoint: string; reason: string }
  | { kind: 'redundant'; checkpoint: string }
  | {
      kind: 'recorded';
      checkpoint: string;
      value: string;
      source: 'extraction' | 'keyword';
      milestoneCompleted: boolean;
    };

export interface SentinelOptions {
  extractionTimeoutMs: number;
  keywordFallback: boolean;
}

export function buildSentinelSystemPrompt(model: MilestoneModel): string {
  return `You are the Sentinel, a focused information extractor for a "${model.definition.title}" conversation.

You never talk to the user. You read the last few messages and decide whether the user has answered ONE specific question, the target checkpoint described below.

Guidelines:
- Only call ${RECORD_CHECKPOINT_VALUE} when the user has clearly and explicitly answered the target question.
- Do not guess, infer from tone, or fill in a value the user did not give.
- Record only the target checkpoint. Ignore anything else the user mentions.
- When the allowed values are a closed list, use exactly one of them.
- If the answer is missing or ambiguous, do not call any function.`;
}

export function buildSentinelPrompt(
  checkpoint: CheckpointDefinition,
  recent: readonly Message[],
): string {
  const domain = checkpoint.openEnded
    ? `Known values (others are allowed): ${checkpoint.values.join(', ')}`
    : `Allowed values (closed list): ${checkpoint.values.join(', ')}`;
  const guidance = checkpoint.guidance.length
    ? `\nGuidance:\n${checkpoint.guidance.map((g) => `- ${g}`).join('\n')}`
    : '';
  const transcript = recent
    .map((m) => `[${m.speaker === 'user' ? 'User' : 'Assistant'}]: ${m.content}`)
    .join('\n');

  return `Target checkpoint: ${checkpoint.name} (${checkpoint.label})
Question: ${checkpoint.question}
Meaning: ${checkpoint.description}
${domain}${guidance}

Recent conversation:
${transcript}`;
}

/**
 * Extracts the value of the active checkpoint from the latest messages and
 * records it. Never advances or completes a journey.
 */
export class Sentinel {
  private readonly options: SentinelOptions;

  constructor(
    private readonly store: JourneyStore,
    private readonly model: MilestoneModel,
    private readonly extraction: ExtractionCapability,
    options: Partial<SentinelOptions> = {},
  ) {
    this.options = {
      extractionTimeoutMs: options.extractionTimeoutMs ?? EXTRACTION_TIMEOUT,
      keywordFallback: options.keywordFallback ?? KEYWORD_FALLBACK_ENABLED,
    };
  }

  async analyze(
    journey: Journey,
    recent: readonly Message[],
  ): Promise<SentinelOutcome> {
    if (journey.status !== 'in_progress') return { kind: 'idle' };
    const target = activeCheckpoint(this.model, journey);
    if (!target) return { kind: 'idle' };

    let call: FunctionCall | null;
    try {
      call = await this.extract(target, recent);
    } catch (err) {
      const unavailable =
        err instanceof ExtractionUnavailable
          ? err
          : new ExtractionUnavailable(
              err instanceof Error ? err.message : String(err),
              { cause: err },
            );
      logger.warn(
        { err: unavailable, journeyId: journey.id, checkpoint: target.name },
        'Extraction unavailable',
      );
      return this.fallback(journey, target, recent);
    }

    if (!call) {
      logger.debug(
        { journeyId: journey.id, checkpoint: target.name },
        'Sentinel found no answer',
      );
      return { kind: 'no_signal', checkpoint: target.name };
    }

    if (call.name !== RECORD_CHECKPOINT_VALUE) {
      return this.reject(journey, target, `unexpected function "${call.name}"`);
    }
    const parsed = RecordCheckpointArgs.safeParse(call.args);
    if (!parsed.success) {
      return this.reject(journey, target, 'malformed arguments');
    }
    if (parsed.data.checkpoint_name !== target.name) {
      return this.reject(
        journey,
        target,
        `reported checkpoint "${parsed.data.checkpoint_name}" is not the active one`,
      );
    }

    const value = normalizeCheckpointValue(target, parsed.data.value);
    if (value === null) {
      return this.reject(
        journey,
        target,
        `value "${parsed.data.value}" is outside the domain`,
      );
    }
    return this.record(journey, target, value, 'extraction');
  }

  private extract(
    target: CheckpointDefinition,
    recent: readonly Message[],
  ): Promise<FunctionCall | null> {
    const systemPrompt = buildSentinelSystemPrompt(this.model);
    const prompt = buildSentinelPrompt(target, recent);
    return runWithTimeout(
      (signal) =>
        this.extraction.extract({
          systemPrompt,
          prompt,
          functions: [recordCheckpointFunction],
          signal,
        }),
      this.options.extractionTimeoutMs,
      'Checkpoint extraction',
    );
  }

  private fallback(
    journey: Journey,
    target: CheckpointDefinition,
    recent: readonly Message[],
  ): SentinelOutcome {
    if (!this.options.keywordFallback) {
      return { kind: 'no_signal', checkpoint: target.name };
    }
    const latest = [...recent].reverse().find((m) => m.speaker === 'user');
    const value = latest ? keywordMatch(target, latest.content) : null;
    if (value === null) {
      return { kind: 'no_signal', checkpoint: target.name };
    }
    return this.record(journey, target, value, 'keyword');
  }

  private reject(
    journey: Journey,
    target: CheckpointDefinition,
    reason: string,
  ): SentinelOutcome {
    logger.info(
      { journeyId: journey.id, checkpoint: target.name, reason },
      'Sentinel discarded extraction',
    );
    return { kind: 'rejected', checkpoint: target.name, reason };
  }

  private record(
    journey: Journey,
    target: CheckpointDefinition,
    value: string,
    source: 'extraction' | 'keyword',
  ): SentinelOutcome {
    const result = applyCheckpointValue(
      this.store,
      this.model,
      journey.id,
      target.name,
      value,
    );
    if (result.outcome === 'already_set') {
      logger.info(
        { journeyId: journey.id, checkpoint: target.name },
        'Checkpoint already set, ignoring',
      );
      return { kind: 'redundant', checkpoint: target.name };
    }

    logger.info(
      {
        journeyId: journey.id,
        checkpoint: target.name,
        value,
        source,
        milestoneCompleted: result.milestoneCompleted,
      },
      'Checkpoint recorded',
    );
    return {
      kind: 'recorded',
      checkpoint: target.name,
      value,
      source,
      milestoneCompleted: result.milestoneCompleted,
    };
  }
}
