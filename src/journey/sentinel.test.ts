import { describe, it, expect, beforeEach } from 'vitest';

import { _initTestDatabase, sqliteStore } from '../db.js';
import type { ExtractionCapability, ExtractionRequest, FunctionCall } from '../llm/capabilities.js';
import type { Journey } from '../types.js';
import { Sentinel } from './sentinel.js';
import { ScriptedExtraction, loadRenovationModel, recordCall } from './test-fixtures.js';

const model = loadRenovationModel();

class HangingExtraction implements ExtractionCapability {
  signal: AbortSignal | undefined;

  extract(request: ExtractionRequest): Promise<FunctionCall | null> {
    this.signal = request.signal;
    return new Promise<FunctionCall | null>(() => {});
  }
}

describe('Sentinel', () => {
  let journey: Journey;

  beforeEach(() => {
    _initTestDatabase();
    const user = sqliteStore.createUser('Ada', 'Test');
    journey = sqliteStore.createJourney(
      user.id,
      model.journeyType,
      model.checkpointNames,
      model.milestones.map((m) => m.index),
    );
  });

  function say(content: string) {
    sqliteStore.appendMessage({
      userId: journey.userId,
      journeyId: journey.id,
      speaker: 'user',
      content,
      currentMilestone: journey.currentMilestone,
    });
    return sqliteStore.getRecentMessages(journey.id, 5);
  }

  function fresh(): Journey {
    const current = sqliteStore.getJourney(journey.id);
    if (!current) throw new Error('journey missing');
    return current;
  }

  it('asks only about the active checkpoint and records its value', async () => {
    const extraction = new ScriptedExtraction([recordCall('room', 'kitchen')]);
    const sentinel = new Sentinel(sqliteStore, model, extraction);
    const recent = say('I want to redo my kitchen for functional reasons');

    const outcome = await sentinel.analyze(journey, recent);

    expect(outcome).toEqual({
      kind: 'recorded',
      checkpoint: 'room',
      value: 'kitchen',
      source: 'extraction',
      milestoneCompleted: false,
    });
    expect(extraction.prompts).toHaveLength(1);
    expect(extraction.prompts[0]).toContain('Target checkpoint: room (Room)');
    expect(extraction.prompts[0]).not.toContain('renovation_purpose');
    expect(fresh().checkpoints.room).toBe('kitchen');
    expect(fresh().checkpoints.renovation_purpose).toBeNull();
    expect(fresh().milestones[1].completed).toBe(false);
  });

  it('completes the milestone when the last checkpoint is recorded', async () => {
    sqliteStore.updateJourney(journey.id, { checkpoints: { room: 'kitchen' } });
    const extraction = new ScriptedExtraction([recordCall('renovation_purpose', 'Functional')]);
    const sentinel = new Sentinel(sqliteStore, model, extraction);

    const outcome = await sentinel.analyze(fresh(), say('Mostly for functional reasons'));

    expect(outcome).toMatchObject({ kind: 'recorded', value: 'functional', milestoneCompleted: true });
    expect(fresh().milestones[1].completed).toBe(true);
    expect(fresh().milestones[1].completedAt).not.toBeNull();
    expect(fresh().currentMilestone).toBe(1);
  });

  it('reports no signal when the model makes no call', async () => {
    const sentinel = new Sentinel(sqliteStore, model, new ScriptedExtraction([null]));
    const outcome = await sentinel.analyze(journey, say('Hello there'));
    expect(outcome).toEqual({ kind: 'no_signal', checkpoint: 'room' });
    expect(fresh().checkpoints.room).toBeNull();
  });

  it('discards a value reported for a different checkpoint', async () => {
    const extraction = new ScriptedExtraction([recordCall('renovation_purpose', 'functional')]);
    const sentinel = new Sentinel(sqliteStore, model, extraction);

    const outcome = await sentinel.analyze(journey, say('It needs to be more functional'));

    expect(outcome).toEqual({
      kind: 'rejected',
      checkpoint: 'room',
      reason: 'reported checkpoint "renovation_purpose" is not the active one',
    });
    expect(fresh().checkpoints).toEqual(model.emptyCheckpoints());
  });

  it('discards calls to other functions and malformed arguments', async () => {
    const extraction = new ScriptedExtraction([
      { name: 'advance_milestone', args: {} },
      { name: 'record_checkpoint_value', args: { checkpoint_name: 'room' } },
    ]);
    const sentinel = new Sentinel(sqliteStore, model, extraction);
    const recent = say('The kitchen');

    expect(await sentinel.analyze(journey, recent)).toEqual({
      kind: 'rejected',
      checkpoint: 'room',
      reason: 'unexpected function "advance_milestone"',
    });
    expect(await sentinel.analyze(journey, recent)).toEqual({
      kind: 'rejected',
      checkpoint: 'room',
      reason: 'malformed arguments',
    });
    expect(fresh().checkpoints.room).toBeNull();
  });

  it('discards values outside a closed domain', async () => {
    sqliteStore.updateJourney(journey.id, { checkpoints: { room: 'kitchen' } });
    const extraction = new ScriptedExtraction([recordCall('renovation_purpose', 'vibes')]);
    const sentinel = new Sentinel(sqliteStore, model, extraction);

    const outcome = await sentinel.analyze(fresh(), say('good vibes'));

    expect(outcome).toEqual({
      kind: 'rejected',
      checkpoint: 'renovation_purpose',
      reason: 'value "vibes" is outside the domain',
    });
    expect(fresh().checkpoints.renovation_purpose).toBeNull();
  });

  it('never overwrites a value set since the snapshot was taken', async () => {
    const stale = journey;
    sqliteStore.updateJourney(journey.id, { checkpoints: { room: 'garage' } });
    const sentinel = new Sentinel(
      sqliteStore,
      model,
      new ScriptedExtraction([recordCall('room', 'kitchen')]),
    );

    const outcome = await sentinel.analyze(stale, say('Actually the kitchen'));

    expect(outcome).toEqual({ kind: 'redundant', checkpoint: 'room' });
    expect(fresh().checkpoints.room).toBe('garage');
  });

  it('stays idle when the current milestone is already satisfied', async () => {
    sqliteStore.updateJourney(journey.id, {
      checkpoints: { room: 'kitchen', renovation_purpose: 'repair' },
    });
    const extraction = new ScriptedExtraction([recordCall('budget_range', 'low')]);
    const sentinel = new Sentinel(sqliteStore, model, extraction);

    expect(await sentinel.analyze(fresh(), say('Something cheap'))).toEqual({ kind: 'idle' });
    expect(extraction.prompts).toHaveLength(0);
    expect(fresh().checkpoints.budget_range).toBeNull();
  });

  it('stays idle on a journey that is not in progress', async () => {
    const extraction = new ScriptedExtraction([recordCall('room', 'kitchen')]);
    const sentinel = new Sentinel(sqliteStore, model, extraction);
    const abandoned = { ...journey, status: 'abandoned' as const };
    expect(await sentinel.analyze(abandoned, say('The kitchen'))).toEqual({ kind: 'idle' });
    expect(extraction.prompts).toHaveLength(0);
  });

  describe('when extraction is unavailable', () => {
    it('falls back to keyword matching on the latest user message', async () => {
      const sentinel = new Sentinel(
        sqliteStore,
        model,
        new ScriptedExtraction([new Error('overloaded')]),
      );
      const outcome = await sentinel.analyze(journey, say("It's the kitchen"));
      expect(outcome).toEqual({
        kind: 'recorded',
        checkpoint: 'room',
        value: 'kitchen',
        source: 'keyword',
        milestoneCompleted: false,
      });
      expect(fresh().checkpoints.room).toBe('kitchen');
    });

    it('records nothing when the keywords are ambiguous', async () => {
      const sentinel = new Sentinel(
        sqliteStore,
        model,
        new ScriptedExtraction([new Error('overloaded')]),
      );
      const outcome = await sentinel.analyze(journey, say('Either the kitchen or the bathroom'));
      expect(outcome).toEqual({ kind: 'no_signal', checkpoint: 'room' });
      expect(fresh().checkpoints.room).toBeNull();
    });

    it('does nothing when the fallback is disabled', async () => {
      const sentinel = new Sentinel(
        sqliteStore,
        model,
        new ScriptedExtraction([new Error('overloaded')]),
        { keywordFallback: false },
      );
      const outcome = await sentinel.analyze(journey, say("It's the kitchen"));
      expect(outcome).toEqual({ kind: 'no_signal', checkpoint: 'room' });
      expect(fresh().checkpoints.room).toBeNull();
    });

    it('gives up on a slow model, aborts it and falls back', async () => {
      const extraction = new HangingExtraction();
      const sentinel = new Sentinel(sqliteStore, model, extraction, {
        extractionTimeoutMs: 20,
      });

      const outcome = await sentinel.analyze(journey, say('My bathroom is leaking'));

      expect(outcome).toMatchObject({ kind: 'recorded', value: 'bathroom', source: 'keyword' });
      expect(extraction.signal?.aborted).toBe(true);
    });
  });
});
