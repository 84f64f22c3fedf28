import { MODEL_SENTINEL } from '../config.js';
import { ExtractionUnavailable } from '../errors.js';
import type {
  ExtractionCapability,
  ExtractionRequest,
  FunctionCall,
} from './capabilities.js';
import { runAgent, type AgentRunResult } from './claude-agent.js';

/** Sentinel extraction on a small, fast model. */
export class ClaudeExtraction implements ExtractionCapability {
  constructor(private readonly model: string = MODEL_SENTINEL) {}

  async extract(request: ExtractionRequest): Promise<FunctionCall | null> {
    let result: AgentRunResult;
    try {
      result = await runAgent({
        model: this.model,
        systemPrompt: request.systemPrompt,
        prompt: request.prompt,
        functions: request.functions,
        maxTurns: 2,
        signal: request.signal,
      });
    } catch (err) {
      throw new ExtractionUnavailable(
        `Extraction query failed: ${err instanceof Error ? err.message : String(err)}`,
        { cause: err },
      );
    }

    const [first] = result.calls;
    if (first) return first;
    // max_turns after a call is expected; an error with no call is not
    if (result.error) {
      throw new ExtractionUnavailable(`Extraction run ended with ${result.error}`);
    }
    return null;
  }
}
