import {
  createSdkMcpServer,
  query,
  tool,
} from '@anthropic-ai/claude-agent-sdk';

import { logger } from '../logger.js';
import type { FunctionCall, FunctionDeclaration } from './capabilities.js';

export const MCP_SERVER_NAME = 'journey';

export interface AgentRunRequest {
  model: string;
  systemPrompt: string;
  prompt: string;
  functions: FunctionDeclaration[];
  maxTurns: number;
  signal?: AbortSignal;
}

export interface AgentRunResult {
  /** Final text of a successful run, or null. */
  text: string | null;
  /** Function calls in the order the model made them. */
  calls: FunctionCall[];
  /** Result subtype when the run ended in an error state. */
  error: string | null;
}

function buildServer(functions: FunctionDeclaration[], calls: FunctionCall[]) {
  const tools = functions.map((fn) =>
    tool(fn.name, fn.description, fn.parameters, async (args) => {
      calls.push({ name: fn.name, args: { ...args } });
      return { content: [{ type: 'text' as const, text: 'Noted.' }] };
    }),
  );
  return createSdkMcpServer({ name: MCP_SERVER_NAME, version: '1.0.0', tools });
}

/**
 * One query() run with the declared functions served from an in-process MCP
 * server. Calls are captured, never executed: the engine decides what to apply.
 */
export async function runAgent(request: AgentRunRequest): Promise<AgentRunResult> {
  const calls: FunctionCall[] = [];
  const abortController = new AbortController();
  if (request.signal) {
    if (request.signal.aborted) abortController.abort();
    request.signal.addEventListener('abort', () => abortController.abort(), { once: true });
  }

  const hasFunctions = request.functions.length > 0;
  let text: string | null = null;
  let error: string | null = null;

  for await (const message of query({
    prompt: request.prompt,
    options: {
      model: request.model,
      systemPrompt: request.systemPrompt,
      tools: [],
      mcpServers: hasFunctions
        ? { [MCP_SERVER_NAME]: buildServer(request.functions, calls) }
        : {},
      allowedTools: request.functions.map((fn) => `mcp__${MCP_SERVER_NAME}__${fn.name}`),
      permissionMode: 'bypassPermissions',
      allowDangerouslySkipPermissions: true,
      settingSources: [],
      maxTurns: request.maxTurns,
      abortController,
    },
  })) {
    if (message.type === 'result') {
      if (message.subtype === 'success') {
        text = message.result;
      } else {
        error = message.subtype;
      }
      logger.debug(
        { model: request.model, subtype: message.subtype, calls: calls.length },
        'Agent run finished',
      );
    }
  }

  return { text, calls, error };
}
