import { describe, it, expect } from 'vitest';

import { UnknownCheckpoint } from '../errors.js';
import { MilestoneModel, parseJourneyDefinition } from './milestone-model.js';
import { loadRenovationModel } from './test-fixtures.js';

function minimalDefinition() {
  const synonyms: Record<string, string[]> = { red: ['crimson'] };
  return {
    id: 'demo',
    title: 'Demo',
    persona: 'You are a helper.',
    closing: 'Say goodbye.',
    milestones: [
      {
        index: 1,
        title: 'First',
        goal: 'learn the color',
        checkpoints: [
          {
            name: 'color',
            label: 'Color',
            question: 'Which color?',
            description: 'Favorite color.',
            values: ['red', 'blue'],
            synonyms,
          },
        ],
      },
    ],
  };
}

describe('renovation definition', () => {
  const model = loadRenovationModel();

  it('has three milestones with two checkpoints each', () => {
    expect(model.lastMilestone).toBe(3);
    expect(model.milestones.map((m) => m.title)).toEqual([
      'Project Basics',
      'Budget and Timeline',
      'Style Preferences and Plan',
    ]);
    expect(model.checkpointNames).toEqual([
      'room',
      'renovation_purpose',
      'budget_range',
      'timeline',
      'style_preference',
      'priority_feature',
    ]);
  });

  it('maps checkpoints back to their milestone', () => {
    expect(model.milestoneOf('room')).toBe(1);
    expect(model.milestoneOf('timeline')).toBe(2);
    expect(model.milestoneOf('priority_feature')).toBe(3);
    expect(model.checkpointsOf(2).map((cp) => cp.name)).toEqual(['budget_range', 'timeline']);
  });

  it('marks only the room as open-ended', () => {
    const open = model.checkpointNames.filter((n) => model.checkpoint(n).openEnded);
    expect(open).toEqual(['room']);
  });

  it('throws UnknownCheckpoint for names outside the table', () => {
    expect(model.hasCheckpoint('color')).toBe(false);
    expect(() => model.checkpoint('color')).toThrow(UnknownCheckpoint);
    expect(() => model.milestoneOf('color')).toThrow(UnknownCheckpoint);
  });

  it('builds empty slots for every checkpoint and milestone', () => {
    expect(model.emptyCheckpoints()).toEqual({
      room: null,
      renovation_purpose: null,
      budget_range: null,
      timeline: null,
      style_preference: null,
      priority_feature: null,
    });
    expect(model.emptyMilestones()).toEqual({
      1: { completed: false, completedAt: null },
      2: { completed: false, completedAt: null },
      3: { completed: false, completedAt: null },
    });
  });

  it('rejects milestone indices outside the table', () => {
    expect(() => model.milestone(0)).toThrow(RangeError);
    expect(() => model.milestone(4)).toThrow(RangeError);
  });
});

describe('parseJourneyDefinition', () => {
  it('applies defaults for optional checkpoint fields', () => {
    const def = parseJourneyDefinition(minimalDefinition());
    const cp = new MilestoneModel(def).checkpoint('color');
    expect(cp.openEnded).toBe(false);
    expect(cp.guidance).toEqual([]);
  });

  it('rejects milestones out of order', () => {
    const raw = minimalDefinition();
    raw.milestones[0].index = 2;
    expect(() => parseJourneyDefinition(raw)).toThrow(
      'milestone indices must run 1..N in order (expected 1, got 2)',
    );
  });

  it('rejects duplicate checkpoint names', () => {
    const raw = minimalDefinition();
    raw.milestones.push({
      index: 2,
      title: 'Second',
      goal: 'learn the color again',
      checkpoints: [{ ...raw.milestones[0].checkpoints[0] }],
    });
    expect(() => parseJourneyDefinition(raw)).toThrow('duplicate checkpoint name "color"');
  });

  it('rejects synonyms for values outside the domain', () => {
    const raw = minimalDefinition();
    raw.milestones[0].checkpoints[0].synonyms = { red: ['crimson'], green: ['lime'] };
    expect(() => parseJourneyDefinition(raw)).toThrow(
      'synonym key "green" is not a value of "color"',
    );
  });

  it('rejects duplicate values', () => {
    const raw = minimalDefinition();
    raw.milestones[0].checkpoints[0].values = ['red', 'blue', 'red'];
    expect(() => parseJourneyDefinition(raw)).toThrow('duplicate value "red" in "color"');
  });

  it('rejects a synonym listed under two values', () => {
    const raw = minimalDefinition();
    raw.milestones[0].checkpoints[0].synonyms = {
      red: ['crimson', 'scarlet'],
      blue: ['navy', 'crimson'],
    };
    expect(() => parseJourneyDefinition(raw)).toThrow(
      '"crimson" in "color" resolves to both "red" and "blue"',
    );
  });

  it('rejects a synonym that is another value', () => {
    const raw = minimalDefinition();
    raw.milestones[0].checkpoints[0].synonyms = { red: ['blue'] };
    expect(() => parseJourneyDefinition(raw)).toThrow(
      '"blue" in "color" resolves to both "blue" and "red"',
    );
  });

  it('rejects a definition without milestones', () => {
    const raw = { ...minimalDefinition(), milestones: [] };
    expect(() => parseJourneyDefinition(raw)).toThrow('Invalid journey definition');
  });
});
