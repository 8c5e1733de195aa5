import type { z } from 'zod';
import { ToolRegistry, type JsonSchemaObject, type ToolResult } from './registry';
import {
  addProductInput,
  currencyRatesInput,
  expressionInput,
  findProductInput,
  listProductsInput,
  searchWebInput,
  translateTextInput
} from './schemas';

/** Where the built-in tools actually run. Implemented by ToolBackendClient. */
export interface ToolBackend {
  run(tool: string, params: Record<string, unknown>): Promise<ToolResult>;
}

type Builtin = {
  name: string;
  description: string;
  parameters: JsonSchemaObject;
  input: z.ZodTypeAny;
};

const BUILTINS: Builtin[] = [
  {
    name: 'list_products',
    description: 'Return every product in the catalog.',
    parameters: { type: 'object', properties: {}, additionalProperties: false },
    input: listProductsInput
  },
  {
    name: 'find_product',
    description: "Find products whose name contains the given text (for example 'tea').",
    parameters: {
      type: 'object',
      properties: { name: { type: 'string', description: 'Part of the product name to search for.' } },
      required: ['name'],
      additionalProperties: false
    },
    input: findProductInput
  },
  {
    name: 'add_product',
    description: 'Add a new product to the catalog.',
    parameters: {
      type: 'object',
      properties: {
        name: { type: 'string', description: 'Product name.' },
        category: { type: 'string', description: "Product category (for example 'fruit')." },
        price: { type: 'number', description: 'Price in catalog currency units.' }
      },
      required: ['name', 'category', 'price'],
      additionalProperties: false
    },
    input: addProductInput
  },
  {
    name: 'calculate',
    description: 'Safe calculator for arithmetic expressions.',
    parameters: {
      type: 'object',
      properties: {
        expression: { type: 'string', description: "Arithmetic expression, for example '(2 + 3) * 4'." }
      },
      required: ['expression'],
      additionalProperties: false
    },
    input: expressionInput
  },
  {
    name: 'calculate_advanced',
    description: 'Calculator with math functions (sin, cos, sqrt, log, pi, e and others).',
    parameters: {
      type: 'object',
      properties: {
        expression: {
          type: 'string',
          description: "Expression with functions, for example 'sqrt(16) + sin(pi/2)'."
        }
      },
      required: ['expression'],
      additionalProperties: false
    },
    input: expressionInput
  },
  {
    name: 'search_web',
    description:
      'Search the web through DuckDuckGo. Use it for current information the model cannot know ' +
      '(weather, news, recent events, live data).',
    parameters: {
      type: 'object',
      properties: {
        query: { type: 'string', description: "Search query, for example 'weather in Berlin'." },
        max_results: { type: 'integer', description: 'Maximum number of results (1-10, default 5).' }
      },
      required: ['query'],
      additionalProperties: false
    },
    input: searchWebInput
  },
  {
    name: 'get_currency_rates',
    description: 'Get current exchange rates (EUR/USD/RUB and others).',
    parameters: {
      type: 'object',
      properties: {
        base: { type: 'string', description: 'Base currency (default USD).' },
        currencies: {
          type: 'array',
          items: { type: 'string' },
          description: "Currencies to quote (default ['EUR', 'RUB'])."
        }
      },
      required: [],
      additionalProperties: false
    },
    input: currencyRatesInput
  },
  {
    name: 'translate_text',
    description: 'Translate text into English, German, French or Russian.',
    parameters: {
      type: 'object',
      properties: {
        text: { type: 'string', description: 'Text to translate.' },
        target_language: {
          type: 'string',
          description: "Target language: 'en', 'de', 'fr', 'ru' or the language name."
        },
        source_language: { type: 'string', description: "Source language (default 'auto')." }
      },
      required: ['text', 'target_language'],
      additionalProperties: false
    },
    input: translateTextInput
  }
];

export const BUILTIN_TOOL_NAMES = BUILTINS.map((b) => b.name);

/** Registers every built-in tool, each forwarding its validated arguments to the backend. */
export function createBuiltinRegistry(backend: ToolBackend): ToolRegistry {
  const registry = new ToolRegistry();
  for (const b of BUILTINS) {
    registry.register({
      ...b,
      handler: (args: Record<string, unknown>) => backend.run(b.name, args)
    });
  }
  return registry;
}
