import { describe, it, expect } from 'vitest';

import type { Journey } from '../types.js';
import { renderPrompt, selectTemplate } from './prompts.js';
import { loadRenovationModel, makeJourney } from './test-fixtures.js';

const model = loadRenovationModel();

function withValues(values: Record<string, string>, overrides: Partial<Journey> = {}): Journey {
  return makeJourney(model, {
    checkpoints: { ...model.emptyCheckpoints(), ...values },
    ...overrides,
  });
}

const ALL = {
  room: 'kitchen',
  renovation_purpose: 'functional',
  budget_range: 'medium',
  timeline: 'months',
  style_preference: 'modern',
  priority_feature: 'storage',
};

describe('selectTemplate', () => {
  it('introduces a milestone whose first checkpoint is unmet', () => {
    expect(selectTemplate(model, makeJourney(model))).toBe('milestone_intro');
    expect(selectTemplate(model, withValues({ renovation_purpose: 'repair' }))).toBe(
      'milestone_intro',
    );
  });

  it('continues a partially answered milestone', () => {
    expect(selectTemplate(model, withValues({ room: 'kitchen' }))).toBe('partial_completion');
  });

  it('offers a transition once a non-final milestone is complete', () => {
    const journey = withValues({ room: 'kitchen', renovation_purpose: 'functional' });
    expect(selectTemplate(model, journey)).toBe('milestone_transition');
  });

  it('wraps up when the last milestone is complete but the journey is still open', () => {
    expect(selectTemplate(model, withValues(ALL, { currentMilestone: 3 }))).toBe(
      'partial_completion',
    );
  });

  it('gives completion precedence over everything else', () => {
    expect(selectTemplate(model, withValues({}, { status: 'completed' }))).toBe('journey_complete');
    expect(selectTemplate(model, withValues(ALL, { status: 'completed', currentMilestone: 3 }))).toBe(
      'journey_complete',
    );
  });

  it('is deterministic', () => {
    const journey = withValues({ room: 'kitchen', budget_range: 'low' });
    const first = selectTemplate(model, journey);
    for (let i = 0; i < 10; i++) {
      expect(selectTemplate(model, { ...journey })).toBe(first);
    }
  });
});

describe('renderPrompt', () => {
  const options = { actionsEnabled: false };

  it('says nothing is known on a fresh journey', () => {
    const prompt = renderPrompt(model, makeJourney(model), 'milestone_intro', options);
    expect(prompt).toContain("You're currently in Milestone 1 of 3: Project Basics.");
    expect(prompt).toContain('What you know so far: nothing yet.');
    expect(prompt).toContain('1. Room: Which room do you want to renovate?');
  });

  it('substitutes known values and asks for the next one', () => {
    const prompt = renderPrompt(model, withValues({ room: 'kitchen' }), 'partial_completion', options);
    expect(prompt).toContain('What you know so far:\n- Room: kitchen');
    expect(prompt).toContain(
      'Still needed in this milestone:\n- Purpose: What is the main purpose of your renovation? (one of: aesthetic, functional, repair, modernize, expand space)',
    );
  });

  it('never renders placeholders for unknown values', () => {
    const journeys = [
      makeJourney(model),
      withValues({ room: 'kitchen' }),
      withValues({ room: 'kitchen', renovation_purpose: 'repair' }),
      withValues(ALL, { currentMilestone: 3 }),
      withValues(ALL, { currentMilestone: 3, status: 'completed' }),
    ];
    for (const journey of journeys) {
      const prompt = renderPrompt(model, journey, selectTemplate(model, journey), {
        actionsEnabled: true,
      });
      expect(prompt).not.toMatch(/\{[a-z_]+\}/);
      expect(prompt).not.toContain('null');
      expect(prompt).not.toContain('undefined');
    }
  });

  it('announces the next milestone on transition', () => {
    const journey = withValues({ room: 'kitchen', renovation_purpose: 'functional' });
    const prompt = renderPrompt(model, journey, 'milestone_transition', options);
    expect(prompt).toContain('Milestone 1 (Project Basics) is complete.');
    expect(prompt).toContain('Milestone 2: Budget and Timeline');
  });

  it('mentions actions only when they are enabled', () => {
    const journey = withValues({ room: 'kitchen', renovation_purpose: 'functional' });
    const without = renderPrompt(model, journey, 'milestone_transition', options);
    const withActions = renderPrompt(model, journey, 'milestone_transition', {
      actionsEnabled: true,
    });
    expect(without).not.toContain('advance_milestone');
    expect(withActions).toContain(
      '- Call advance_milestone once the user is ready to move on to the next milestone.',
    );
    expect(withActions).not.toContain('complete_journey');
  });

  it('asks to wrap up and complete on the final milestone', () => {
    const journey = withValues(ALL, { currentMilestone: 3 });
    const prompt = renderPrompt(model, journey, 'partial_completion', { actionsEnabled: true });
    expect(prompt).toContain('Every question of the final milestone has been answered.');
    expect(prompt).toContain('- Call complete_journey only after');
    expect(prompt).toContain('- Priority feature: storage');
  });

  it('closes the conversation once the journey is complete', () => {
    const journey = withValues(ALL, { currentMilestone: 3, status: 'completed' });
    const prompt = renderPrompt(model, journey, 'journey_complete', { actionsEnabled: true });
    expect(prompt).toContain('All 3 milestones of "Renovation planning" are complete.');
    expect(prompt).toContain(model.definition.closing);
    expect(prompt).not.toContain('Available actions');
  });
});
