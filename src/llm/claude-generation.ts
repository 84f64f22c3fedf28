import { MODEL_GENERATION } from '../config.js';
import type {
  ConversationTurn,
  GenerationCapability,
  GenerationRequest,
  GenerationResult,
} from './capabilities.js';
import { runAgent } from './claude-agent.js';

export function formatHistory(history: readonly ConversationTurn[]): string {
  const transcript = history
    .map((t) => `[${t.speaker === 'user' ? 'User' : 'Assistant'}]: ${t.content}`)
    .join('\n\n');
  return `Conversation so far:

${transcript}

Write the assistant's next reply to the user. Reply with the message text only.`;
}

export class ClaudeGeneration implements GenerationCapability {
  constructor(private readonly model: string = MODEL_GENERATION) {}

  async generate(request: GenerationRequest): Promise<GenerationResult> {
    const result = await runAgent({
      model: this.model,
      systemPrompt: request.systemPrompt,
      prompt: formatHistory(request.history),
      functions: request.functions,
      maxTurns: request.functions.length > 0 ? 4 : 1,
      signal: request.signal,
    });

    if (result.text === null) {
      throw new Error(
        `Generation run ended without a reply${result.error ? ` (${result.error})` : ''}`,
      );
    }
    return { text: result.text, calls: result.calls };
  }
}
