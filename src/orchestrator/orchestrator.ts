import { FSM, State } from '../core/fsm';
import { bound, DEFAULT_MAX_HISTORY, repair, type HistoryStore } from '../core/history';
import { KeyedMutex } from '../core/keyed-mutex';
import type { Message, ToolCall, ToolMessage, ToolRequestMessage, UserMessage } from '../core/message';
import type { LLMClient } from '../llm/llm-base';
import { logger, preview } from '../observability/logger';
import { serializeToolResult, type ToolRegistry } from '../tools/registry';
import { FALLBACK_REPLY, SYSTEM_PROMPT } from './prompts';

export type OrchestratorOptions = {
  llm: LLMClient;
  registry: ToolRegistry;
  store: HistoryStore;
  model: string;
  systemPrompt?: string;
  maxHistory?: number;
  fallbackReply?: string;
};

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === 'object' && v !== null && !Array.isArray(v);
}

/** Malformed or non-object payloads become `{}`; the tool then reports what is missing. */
export function parseToolArguments(raw: string): Record<string, unknown> {
  try {
    const parsed: unknown = JSON.parse(raw);
    return isRecord(parsed) ? parsed : {};
  } catch {
    logger.warn('tool arguments are not valid JSON, using {}', { raw: preview(raw) });
    return {};
  }
}

/**
 * Drives one round per inbound message: a first completion with tool
 * declarations, optional sequential tool execution, a second completion
 * without tools, then a single history commit. At most two model calls per
 * round; LLM failures reject and leave history untouched.
 */
export class Orchestrator {
  private llm: LLMClient;
  private registry: ToolRegistry;
  private store: HistoryStore;
  private model: string;
  private systemPrompt: string;
  private maxHistory: number;
  private fallbackReply: string;
  private locks = new KeyedMutex();

  constructor(opts: OrchestratorOptions) {
    this.llm = opts.llm;
    this.registry = opts.registry;
    this.store = opts.store;
    this.model = opts.model;
    this.systemPrompt = opts.systemPrompt ?? SYSTEM_PROMPT;
    this.maxHistory = opts.maxHistory ?? DEFAULT_MAX_HISTORY;
    this.fallbackReply = opts.fallbackReply ?? FALLBACK_REPLY;
  }

  /** Rounds for one user run strictly one after another. */
  orchestrate(userId: string, text: string): Promise<string> {
    return this.locks.run(userId, () => this.runRound(userId, text));
  }

  reset(userId: string): Promise<void> {
    return this.locks.run(userId, () => this.store.reset(userId));
  }

  private async runRound(userId: string, text: string): Promise<string> {
    const fsm = new FSM();
    const startedAt = Date.now();
    logger.info('round start', { uid: userId, text: preview(text) });

    try {
      const history = bound(repair(await this.store.get(userId)), this.maxHistory);
      const userMsg: UserMessage = { role: 'user', content: text };
      const messages: Message[] = [{ role: 'system', content: this.systemPrompt }, ...history, userMsg];

      const first = await this.llm.complete({
        model: this.model,
        messages,
        tools: this.registry.declarations(),
        toolChoice: 'auto'
      });

      const roundMessages: Message[] = [];
      let finalText: string | null;

      if (first.toolCalls.length === 0) {
        finalText = first.content;
      } else {
        fsm.to(State.EXECUTING_TOOLS);
        const request: ToolRequestMessage = { role: 'assistant', content: first.content, tool_calls: first.toolCalls };
        const toolMessages = await this.executeTools(userId, request.tool_calls);
        roundMessages.push(request, ...toolMessages);

        fsm.to(State.AWAITING_SECOND_RESPONSE);
        const second = await this.llm.complete({ model: this.model, messages: [...messages, ...roundMessages] });
        if (second.toolCalls.length > 0) {
          logger.warn('follow-up response requested tools again, ignoring', {
            uid: userId,
            tools: second.toolCalls.map((tc) => tc.function.name)
          });
        }
        finalText = second.content;
      }

      fsm.to(State.FINALIZE);
      const reply = finalText && finalText.trim().length > 0 ? finalText : this.fallbackReply;
      await this.commitRound(userId, [userMsg, ...roundMessages, { role: 'assistant', content: reply }]);
      fsm.to(State.DONE);

      logger.info('round done', { uid: userId, states: fsm.trail.join(' > '), ms: Date.now() - startedAt });
      return reply;
    } catch (err) {
      const failedIn = fsm.state;
      if (failedIn !== State.DONE) fsm.to(State.FAILED);
      logger.error('round failed', {
        uid: userId,
        state: failedIn,
        error: err instanceof Error ? err.message : String(err)
      });
      throw err;
    }
  }

  private async executeTools(userId: string, calls: ToolCall[]): Promise<ToolMessage[]> {
    const out: ToolMessage[] = [];
    for (const call of calls) {
      const name = call.function.name;
      const args = parseToolArguments(call.function.arguments);
      const result = await this.registry.invoke(name, args);
      logger.info('tool call', { uid: userId, tool: name, ok: result.ok });
      out.push({ role: 'tool', tool_call_id: call.id, name, content: serializeToolResult(result) });
    }
    return out;
  }

  /** The only place a round touches stored history. */
  private async commitRound(userId: string, messages: Message[]): Promise<void> {
    await this.store.append(userId, ...messages);
  }
}
