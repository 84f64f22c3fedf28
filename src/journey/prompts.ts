import type { Journey } from '../types.js';
import {
  ADVANCE_MILESTONE,
  COMPLETE_JOURNEY,
  REMEMBER_USER_ATTRIBUTE,
} from './actions.js';
import type { CheckpointDefinition, MilestoneModel } from './milestone-model.js';
import {
  activeCheckpoint,
  isMilestoneComplete,
  knownValues,
  pendingCheckpoints,
} from './state-machine.js';

export const TEMPLATE_IDS = [
  'journey_complete',
  'milestone_transition',
  'milestone_intro',
  'partial_completion',
] as const;

export type TemplateId = (typeof TEMPLATE_IDS)[number];

export interface RenderOptions {
  actionsEnabled: boolean;
}

/** First matching rule wins. */
export function selectTemplate(model: MilestoneModel, journey: Journey): TemplateId {
  if (journey.status === 'completed') return 'journey_complete';

  const current = journey.currentMilestone;
  if (isMilestoneComplete(model, journey, current) && current < model.lastMilestone) {
    return 'milestone_transition';
  }

  const active = activeCheckpoint(model, journey);
  const first = model.checkpointsOf(current)[0];
  if (active !== null && first !== undefined && active.name === first.name) {
    return 'milestone_intro';
  }

  return 'partial_completion';
}

function describeDomain(cp: CheckpointDefinition): string {
  return cp.openEnded
    ? `for example ${cp.values.slice(0, 5).join(', ')}`
    : `one of: ${cp.values.join(', ')}`;
}

function knownSection(model: MilestoneModel, journey: Journey): string {
  const known = knownValues(model, journey);
  if (known.length === 0) {
    return 'What you know so far: nothing yet.';
  }
  const lines = known.map(({ checkpoint, value }) => `- ${checkpoint.label}: ${value}`);
  return `What you know so far:\n${lines.join('\n')}`;
}

function actionsSection(
  model: MilestoneModel,
  journey: Journey,
  templateId: TemplateId,
): string {
  const lines = [
    `- Call ${REMEMBER_USER_ATTRIBUTE} when the user shares a useful personal fact that none of the questions cover.`,
  ];
  if (templateId === 'milestone_transition') {
    lines.unshift(
      `- Call ${ADVANCE_MILESTONE} once the user is ready to move on to the next milestone.`,
    );
  }
  if (
    templateId === 'partial_completion' &&
    pendingCheckpoints(model, journey, journey.currentMilestone).length === 0
  ) {
    lines.unshift(
      `- Call ${COMPLETE_JOURNEY} only after every question of the final milestone has been answered and summarized.`,
    );
  }
  return `Available actions:\n${lines.join('\n')}`;
}

function introBody(model: MilestoneModel, journey: Journey): string {
  const milestone = model.milestone(journey.currentMilestone);
  const goals = milestone.checkpoints
    .map((cp, i) => `${i + 1}. ${cp.label}: ${cp.question} (${describeDomain(cp)})`)
    .join('\n');
  return `Your goal in this milestone is to ${milestone.goal}. You need to learn:
${goals}

Start with the first question. Ask one question at a time and acknowledge each answer before moving on.`;
}

function partialBody(model: MilestoneModel, journey: Journey): string {
  const remaining = pendingCheckpoints(model, journey, journey.currentMilestone);
  const next = remaining[0];
  if (next === undefined) {
    return `Every question of the final milestone has been answered. Present a short summary of everything you know, confirm it with the user, and wrap up the planning conversation.`;
  }
  const rest = remaining
    .slice(1)
    .map((cp) => `- ${cp.label}: ${cp.question}`)
    .join('\n');
  return `Still needed in this milestone:
- ${next.label}: ${next.question} (${describeDomain(next)})${rest ? `\n${rest}` : ''}

Acknowledge what the user already told you, then focus on the ${next.label.toLowerCase()} question. Ask one question at a time.`;
}

function transitionBody(model: MilestoneModel, journey: Journey): string {
  const current = model.milestone(journey.currentMilestone);
  const next = model.milestone(journey.currentMilestone + 1);
  return `Milestone ${current.index} (${current.title}) is complete.

Summarize what you learned in this milestone and explain that next you will move on to Milestone ${next.index}: ${next.title}, where the goal is to ${next.goal}.`;
}

function completeBody(model: MilestoneModel): string {
  return `The planning journey is complete. Give the user a clear summary of their plan based on what you know, offer a few practical next steps, and answer any follow-up questions.

${model.definition.closing}`;
}

function bodyFor(
  model: MilestoneModel,
  journey: Journey,
  templateId: TemplateId,
): string {
  switch (templateId) {
    case 'journey_complete':
      return completeBody(model);
    case 'milestone_transition':
      return transitionBody(model, journey);
    case 'milestone_intro':
      return introBody(model, journey);
    case 'partial_completion':
      return partialBody(model, journey);
  }
}

/**
 * Render the system prompt for a template. Only known values are substituted;
 * a checkpoint that is still empty is never mentioned by value.
 */
export function renderPrompt(
  model: MilestoneModel,
  journey: Journey,
  templateId: TemplateId,
  options: RenderOptions,
): string {
  const milestone = model.milestone(journey.currentMilestone);
  const header =
    templateId === 'journey_complete'
      ? `${model.definition.persona}\n\nAll ${model.lastMilestone} milestones of "${model.definition.title}" are complete.`
      : `${model.definition.persona}\n\nYou're currently in Milestone ${milestone.index} of ${model.lastMilestone}: ${milestone.title}.`;

  const sections = [
    header,
    knownSection(model, journey),
    bodyFor(model, journey, templateId),
    'Be friendly, helpful and conversational. Keep replies short.',
  ];
  if (options.actionsEnabled && templateId !== 'journey_complete') {
    sections.push(actionsSection(model, journey, templateId));
  }
  return sections.join('\n\n');
}
