import type { z } from 'zod';
import type { FetchLike } from '../tools/backend-client';
import {
  addProductInput,
  currencyRatesInput,
  describeIssues,
  expressionInput,
  findProductInput,
  listProductsInput,
  searchWebInput,
  translateTextInput
} from '../tools/schemas';
import { CalcError, evaluate } from './calculator';
import type { Catalog } from './catalog';
import { getCurrencyRates } from './currency';
import { translateText } from './translate';
import { searchWeb } from './web-search';

export type ToolHandler = (params: Record<string, unknown>) => Promise<Record<string, unknown>>;

export type ToolServerDeps = {
  catalog: Catalog;
  fetchImpl?: FetchLike;
};

function withInput<S extends z.ZodTypeAny>(
  schema: S,
  fn: (args: z.output<S>) => Record<string, unknown> | Promise<Record<string, unknown>>
): ToolHandler {
  return async (params) => {
    const parsed = schema.safeParse(params);
    if (!parsed.success) return { error: `invalid parameters: ${describeIssues(parsed.error)}` };
    return fn(parsed.data);
  };
}

function calculate(expression: string, advanced: boolean): Record<string, unknown> {
  try {
    return { result: evaluate(expression, { advanced }) };
  } catch (err) {
    if (err instanceof CalcError) return { error: `could not evaluate expression: ${err.message}` };
    throw err;
  }
}

/** Closed table of server-side tools, keyed by the names the bot declares. */
export function createToolHandlers(deps: ToolServerDeps): ReadonlyMap<string, ToolHandler> {
  const { catalog, fetchImpl = fetch } = deps;

  return new Map<string, ToolHandler>([
    ['list_products', withInput(listProductsInput, () => ({ products: catalog.list() }))],
    ['find_product', withInput(findProductInput, ({ name }) => ({ products: catalog.find(name) }))],
    ['add_product', withInput(addProductInput, (args) => ({ product: catalog.add(args) }))],
    ['calculate', withInput(expressionInput, ({ expression }) => calculate(expression, false))],
    ['calculate_advanced', withInput(expressionInput, ({ expression }) => calculate(expression, true))],
    ['search_web', withInput(searchWebInput, (args) => searchWeb(args.query, args.max_results, fetchImpl))],
    [
      'get_currency_rates',
      withInput(currencyRatesInput, (args) => getCurrencyRates(args.base, args.currencies, fetchImpl))
    ],
    [
      'translate_text',
      withInput(translateTextInput, (args) =>
        translateText(args.text, args.target_language, args.source_language, fetchImpl)
      )
    ]
  ]);
}
