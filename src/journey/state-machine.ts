import { InvalidTransition } from '../errors.js';
import type { Journey, MilestoneState } from '../types.js';
import type { CheckpointDefinition, MilestoneModel } from './milestone-model.js';

function isFilled(value: string | null | undefined): value is string {
  return value !== null && value !== undefined;
}

export function isMilestoneComplete(
  model: MilestoneModel,
  journey: Journey,
  milestone: number,
): boolean {
  return model
    .checkpointsOf(milestone)
    .every((cp) => isFilled(journey.checkpoints[cp.name]));
}

/** First unmet checkpoint of the current milestone, or null when it is satisfied. */
export function activeCheckpoint(
  model: MilestoneModel,
  journey: Journey,
): CheckpointDefinition | null {
  return (
    model
      .checkpointsOf(journey.currentMilestone)
      .find((cp) => !isFilled(journey.checkpoints[cp.name])) ?? null
  );
}

export function pendingCheckpoints(
  model: MilestoneModel,
  journey: Journey,
  milestone: number,
): CheckpointDefinition[] {
  return model
    .checkpointsOf(milestone)
    .filter((cp) => !isFilled(journey.checkpoints[cp.name]));
}

/** Names of every filled checkpoint, in definition order. */
export function completedCheckpoints(
  model: MilestoneModel,
  journey: Journey,
): string[] {
  return model.checkpointNames.filter((name) =>
    isFilled(journey.checkpoints[name]),
  );
}

export function knownValues(
  model: MilestoneModel,
  journey: Journey,
): Array<{ checkpoint: CheckpointDefinition; value: string }> {
  const result: Array<{ checkpoint: CheckpointDefinition; value: string }> = [];
  for (const name of model.checkpointNames) {
    const value = journey.checkpoints[name];
    if (isFilled(value)) {
      result.push({ checkpoint: model.checkpoint(name), value });
    }
  }
  return result;
}

export function canAdvance(model: MilestoneModel, journey: Journey): boolean {
  return (
    journey.status === 'in_progress' &&
    journey.currentMilestone < model.lastMilestone &&
    isMilestoneComplete(model, journey, journey.currentMilestone)
  );
}

function assertInProgress(journey: Journey, action: string): void {
  if (journey.status !== 'in_progress') {
    throw new InvalidTransition(
      `Cannot ${action} journey ${journey.id}: status is ${journey.status}`,
      journey.id,
    );
  }
}

/** Returns a snapshot one milestone further; checkpoints are left untouched. */
export function advance(
  model: MilestoneModel,
  journey: Journey,
  now: string = new Date().toISOString(),
): Journey {
  assertInProgress(journey, 'advance');
  if (journey.currentMilestone >= model.lastMilestone) {
    throw new InvalidTransition(
      `Journey ${journey.id} is already on the last milestone`,
      journey.id,
    );
  }
  if (!isMilestoneComplete(model, journey, journey.currentMilestone)) {
    const missing = pendingCheckpoints(model, journey, journey.currentMilestone)
      .map((cp) => cp.name)
      .join(', ');
    throw new InvalidTransition(
      `Milestone ${journey.currentMilestone} of journey ${journey.id} is incomplete (missing: ${missing})`,
      journey.id,
    );
  }
  return {
    ...journey,
    currentMilestone: journey.currentMilestone + 1,
    updatedAt: now,
  };
}

export function complete(
  model: MilestoneModel,
  journey: Journey,
  now: string = new Date().toISOString(),
): Journey {
  assertInProgress(journey, 'complete');
  const incomplete = model.milestones
    .map((m) => m.index)
    .filter((index) => !isMilestoneComplete(model, journey, index));
  if (incomplete.length > 0) {
    throw new InvalidTransition(
      `Journey ${journey.id} cannot be completed: milestone(s) ${incomplete.join(', ')} incomplete`,
      journey.id,
    );
  }

  const milestones: Record<number, MilestoneState> = {};
  for (const m of model.milestones) {
    const existing = journey.milestones[m.index];
    milestones[m.index] =
      existing && existing.completed
        ? existing
        : { completed: true, completedAt: now };
  }

  return {
    ...journey,
    status: 'completed',
    currentMilestone: model.lastMilestone,
    milestones,
    updatedAt: now,
  };
}
