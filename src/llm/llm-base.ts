import OpenAI from 'openai';
import type { Message, ToolCall } from '../core/message';
import type { ToolDeclaration } from '../tools/registry';

export type CompletionRequest = {
  model: string;
  messages: Message[];
  tools?: ToolDeclaration[];
  toolChoice?: 'auto' | 'none';
};

export type CompletionResponse = {
  content: string | null;
  toolCalls: ToolCall[];
};

/** Chat-completions boundary. Failures reject; callers decide what the user sees. */
export interface LLMClient {
  complete(request: CompletionRequest): Promise<CompletionResponse>;
}

export class MalformedCompletionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'MalformedCompletionError';
  }
}

/** The slice of the OpenAI SDK the adapter calls; an `OpenAI` instance satisfies it. */
export type ChatCompletionsApi = {
  chat: {
    completions: {
      create(
        params: OpenAI.Chat.Completions.ChatCompletionCreateParamsNonStreaming
      ): Promise<OpenAI.Chat.Completions.ChatCompletion>;
    };
  };
};

type OpenAIClientOptions = {
  apiKey: string;
  baseUrl?: string;
  client?: ChatCompletionsApi;
};

function toWire(msg: Message): OpenAI.Chat.Completions.ChatCompletionMessageParam {
  switch (msg.role) {
    case 'system':
      return { role: 'system', content: msg.content };
    case 'user':
      return { role: 'user', content: msg.content };
    case 'assistant':
      return msg.tool_calls && msg.tool_calls.length > 0
        ? { role: 'assistant', content: msg.content, tool_calls: msg.tool_calls }
        : { role: 'assistant', content: msg.content };
    case 'tool':
      return { role: 'tool', content: msg.content, tool_call_id: msg.tool_call_id };
  }
}

export class OpenAIChatClient implements LLMClient {
  private client: ChatCompletionsApi;

  constructor(opts: OpenAIClientOptions) {
    this.client =
      opts.client ??
      new OpenAI({
        apiKey: opts.apiKey,
        baseURL: opts.baseUrl
      });
  }

  async complete(request: CompletionRequest): Promise<CompletionResponse> {
    const params: OpenAI.Chat.Completions.ChatCompletionCreateParamsNonStreaming = {
      model: request.model,
      messages: request.messages.map(toWire)
    };
    if (request.tools && request.tools.length > 0) {
      params.tools = request.tools;
      params.tool_choice = request.toolChoice ?? 'auto';
    }
    const response = await this.client.chat.completions.create(params);

    const message = response.choices?.[0]?.message;
    if (!message) {
      throw new MalformedCompletionError('completion response carried no message');
    }

    const toolCalls: ToolCall[] = [];
    for (const tc of message.tool_calls ?? []) {
      if (tc.type !== 'function') continue;
      toolCalls.push({
        id: tc.id,
        type: 'function',
        function: { name: tc.function.name, arguments: tc.function.arguments }
      });
    }
    return { content: message.content ?? null, toolCalls };
  }
}
