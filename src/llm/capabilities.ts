import type { ZodRawShape } from 'zod';

import type { Speaker } from '../types.js';

/** A function the model may call. Parameters double as the validator for its arguments. */
export interface FunctionDeclaration {
  name: string;
  description: string;
  parameters: ZodRawShape;
}

export interface FunctionCall {
  name: string;
  args: Record<string, unknown>;
}

export interface ConversationTurn {
  speaker: Speaker;
  content: string;
}

export interface ExtractionRequest {
  systemPrompt: string;
  prompt: string;
  /** Exactly the functions the model is allowed to call. */
  functions: FunctionDeclaration[];
  signal?: AbortSignal;
}

export interface ExtractionCapability {
  /** First function call the model made, or null when it made none. */
  extract(request: ExtractionRequest): Promise<FunctionCall | null>;
}

export interface GenerationRequest {
  systemPrompt: string;
  history: ConversationTurn[];
  functions: FunctionDeclaration[];
  signal?: AbortSignal;
}

export interface GenerationResult {
  text: string;
  calls: FunctionCall[];
}

export interface GenerationCapability {
  generate(request: GenerationRequest): Promise<GenerationResult>;
}
