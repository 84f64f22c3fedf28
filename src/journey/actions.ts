import { z } from 'zod';

import type { FunctionDeclaration } from '../llm/capabilities.js';

export const ADVANCE_MILESTONE = 'advance_milestone';
export const COMPLETE_JOURNEY = 'complete_journey';
export const REMEMBER_USER_ATTRIBUTE = 'remember_user_attribute';

const rememberAttributeShape = {
  key: z
    .string()
    .min(1)
    .describe('Short snake_case name for the fact, e.g. "household_size" or "pets"'),
  value: z.string().min(1).describe('The fact as the user stated it'),
};

export const RememberAttributeArgs = z.object(rememberAttributeShape);

/** Side-channel actions the generation model may request during a turn. */
export const generationActions: FunctionDeclaration[] = [
  {
    name: ADVANCE_MILESTONE,
    description:
      'Move the journey to the next milestone. Only valid once every checkpoint of the current milestone is collected.',
    parameters: {},
  },
  {
    name: COMPLETE_JOURNEY,
    description:
      'Mark the journey as completed. Only valid once every checkpoint of the last milestone is collected.',
    parameters: {},
  },
  {
    name: REMEMBER_USER_ATTRIBUTE,
    description:
      'Remember a useful fact about the user that is not one of the journey questions.',
    parameters: rememberAttributeShape,
  },
];
