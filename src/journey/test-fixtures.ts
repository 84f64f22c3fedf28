import { fileURLToPath } from 'url';

import type { ExtractionCapability, FunctionCall } from '../llm/capabilities.js';
import type { Journey } from '../types.js';
import { MilestoneModel } from './milestone-model.js';

export const RENOVATION_DEFINITION_PATH = fileURLToPath(
  new URL('../../journeys/renovation.json', import.meta.url),
);

export function loadRenovationModel(): MilestoneModel {
  return MilestoneModel.fromFile(RENOVATION_DEFINITION_PATH);
}

/** In-memory journey snapshot for pure state-machine and prompt tests. */
export function makeJourney(
  model: MilestoneModel,
  overrides: Partial<Journey> = {},
): Journey {
  const now = '2026-01-01T00:00:00.000Z';
  return {
    id: 1,
    userId: 1,
    journeyType: model.journeyType,
    currentMilestone: 1,
    status: 'in_progress',
    checkpoints: model.emptyCheckpoints(),
    milestones: model.emptyMilestones(),
    createdAt: now,
    updatedAt: now,
    ...overrides,
  };
}

export function recordCall(checkpointName: string, value: string): FunctionCall {
  return {
    name: 'record_checkpoint_value',
    args: { checkpoint_name: checkpointName, value },
  };
}

/** Extraction stand-in that replays queued answers, then reports no call. */
export class ScriptedExtraction implements ExtractionCapability {
  readonly prompts: string[] = [];
  private readonly queue: Array<FunctionCall | null | Error>;

  constructor(answers: Array<FunctionCall | null | Error> = []) {
    this.queue = [...answers];
  }

  push(answer: FunctionCall | null | Error): void {
    this.queue.push(answer);
  }

  async extract(request: { prompt: string }): Promise<FunctionCall | null> {
    this.prompts.push(request.prompt);
    const next = this.queue.shift() ?? null;
    if (next instanceof Error) throw next;
    return next;
  }
}
