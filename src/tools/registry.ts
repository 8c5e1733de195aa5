import type { z } from 'zod';
import { describeIssues } from './schemas';

export type ToolResult =
  | { ok: true; result: Record<string, unknown> }
  | { ok: false; error: string; details?: Record<string, unknown> };

export type JsonSchemaObject = {
  type: 'object';
  properties: Record<string, Record<string, unknown>>;
  required?: string[];
  additionalProperties: false;
};

/** Function-calling declaration in the chat-completions wire format. */
export type ToolDeclaration = {
  type: 'function';
  function: {
    name: string;
    description: string;
    parameters: JsonSchemaObject;
  };
};

export interface ToolDefinition<S extends z.ZodTypeAny> {
  name: string;
  description: string;
  parameters: JsonSchemaObject;
  input: S;
  handler: (args: z.output<S>) => Promise<ToolResult>;
}

type RegisteredTool = {
  declaration: ToolDeclaration;
  invoke: (args: Record<string, unknown>) => Promise<ToolResult>;
};

export const ok = (result: Record<string, unknown>): ToolResult => ({ ok: true, result });
// `details` carries whatever else the tool reported next to its error, e.g. the search query
export const fail = (error: string, details?: Record<string, unknown>): ToolResult =>
  details ? { ok: false, error, details } : { ok: false, error };

export function serializeToolResult(result: ToolResult): string {
  if (result.ok) return JSON.stringify(result.result);
  return JSON.stringify({ ...result.details, error: result.error });
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export class ToolRegistry {
  private tools = new Map<string, RegisteredTool>();

  register<S extends z.ZodTypeAny>(def: ToolDefinition<S>): this {
    if (this.tools.has(def.name)) {
      throw new Error(`tool already registered: ${def.name}`);
    }
    this.tools.set(def.name, {
      declaration: {
        type: 'function',
        function: { name: def.name, description: def.description, parameters: def.parameters }
      },
      invoke: async (args) => {
        const parsed = def.input.safeParse(args);
        if (!parsed.success) {
          return fail(`invalid arguments: ${describeIssues(parsed.error)}`);
        }
        return def.handler(parsed.data);
      }
    });
    return this;
  }

  has(name: string): boolean {
    return this.tools.has(name);
  }

  names(): string[] {
    return [...this.tools.keys()];
  }

  declarations(): ToolDeclaration[] {
    return [...this.tools.values()].map((t) => t.declaration);
  }

  /** Never rejects: every failure comes back as an error result. */
  async invoke(name: string, args: Record<string, unknown>): Promise<ToolResult> {
    const tool = this.tools.get(name);
    if (!tool) return fail(`unknown tool: ${name}`);
    try {
      return await tool.invoke(args);
    } catch (err) {
      return fail(`tool ${name} failed: ${errorMessage(err)}`);
    }
  }
}
