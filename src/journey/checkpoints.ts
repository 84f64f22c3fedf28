import { InvalidTransition, JourneyNotFound } from '../errors.js';
import type { Journey, JourneyPatch, JourneyStore } from '../types.js';
import { scanCanonicalValues } from './keyword-matcher.js';
import type { CheckpointDefinition, MilestoneModel } from './milestone-model.js';
import { isMilestoneComplete } from './state-machine.js';

function clean(raw: string): string {
  return raw
    .trim()
    .toLowerCase()
    .replace(/\s+/g, ' ')
    .replace(/^["'`]+/, '')
    .replace(/["'`.,;:!?]+$/, '')
    .trim();
}

/**
 * Map a reported value onto the checkpoint's domain. Returns null when the
 * value must be discarded.
 *
 * Closed domains accept a canonical value, a synonym, or text that mentions
 * exactly one canonical value. Open domains prefer a known value found in the
 * text and otherwise keep the cleaned text. Text that only names values under
 * a negation ("not the kitchen") is discarded in both.
 */
export function normalizeCheckpointValue(
  checkpoint: CheckpointDefinition,
  raw: string,
): string | null {
  const cleaned = clean(raw);
  if (!cleaned) return null;

  if (checkpoint.values.includes(cleaned)) return cleaned;

  for (const [value, phrases] of Object.entries(checkpoint.synonyms)) {
    if (phrases.includes(cleaned)) return value;
  }

  const { values, negated } = scanCanonicalValues(checkpoint, cleaned);
  if (values.length === 1) return values[0];
  if (values.length === 0 && negated.length > 0) return null;

  return checkpoint.openEnded ? cleaned : null;
}

export interface ApplyResult {
  journey: Journey;
  outcome: 'recorded' | 'already_set';
  /** True when this write completed the checkpoint's milestone. */
  milestoneCompleted: boolean;
}

/**
 * Write a normalized value into an empty slot and raise the milestone's
 * completion flag when the write fills it. The only code path that sets
 * milestone completion.
 */
export function applyCheckpointValue(
  store: JourneyStore,
  model: MilestoneModel,
  journeyId: number,
  checkpointName: string,
  value: string,
  now: string = new Date().toISOString(),
): ApplyResult {
  const milestone = model.milestoneOf(checkpointName);

  // Decide on stored state, not on the caller's snapshot
  const journey = store.getJourney(journeyId);
  if (!journey) throw new JourneyNotFound(journeyId);
  if (journey.status !== 'in_progress') {
    throw new InvalidTransition(
      `Cannot record "${checkpointName}" on journey ${journeyId}: status is ${journey.status}`,
      journeyId,
    );
  }

  if (journey.journeyType !== model.journeyType) {
    throw new InvalidTransition(
      `Journey ${journeyId} is a "${journey.journeyType}" journey, not "${model.journeyType}"`,
      journeyId,
    );
  }
  if (!(checkpointName in journey.checkpoints)) {
    throw new InvalidTransition(
      `Journey ${journeyId} has no slot for checkpoint "${checkpointName}"`,
      journeyId,
    );
  }

  const existing = journey.checkpoints[checkpointName];
  if (existing !== null) {
    return { journey, outcome: 'already_set', milestoneCompleted: false };
  }

  const next: Journey = {
    ...journey,
    checkpoints: { ...journey.checkpoints, [checkpointName]: value },
  };
  const patch: JourneyPatch = { checkpoints: { [checkpointName]: value } };

  const wasComplete = journey.milestones[milestone]?.completed ?? false;
  const milestoneCompleted =
    !wasComplete && isMilestoneComplete(model, next, milestone);
  if (milestoneCompleted) {
    patch.milestones = { [milestone]: { completed: true, completedAt: now } };
  }

  const updated = store.updateJourney(journeyId, patch);
  if (!updated) throw new JourneyNotFound(journeyId);

  return { journey: updated, outcome: 'recorded', milestoneCompleted };
}
