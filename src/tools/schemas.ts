import { z } from 'zod';

// Argument schemas shared by the bot-side registry and the tool server.
// Objects are strict: the model must not invent parameters.

export const listProductsInput = z.object({}).strict();

export const findProductInput = z.object({ name: z.string().trim().min(1) }).strict();

export const addProductInput = z
  .object({
    name: z.string().trim().min(1),
    category: z.string().trim().min(1),
    price: z.number().finite()
  })
  .strict();

export const expressionInput = z.object({ expression: z.string().trim().min(1) }).strict();

export const searchWebInput = z
  .object({
    query: z.string().trim().min(1),
    max_results: z.number().optional()
  })
  .strict();

export const currencyRatesInput = z
  .object({
    base: z.string().trim().min(1).default('USD'),
    currencies: z.union([z.array(z.string()), z.string()]).optional()
  })
  .strict();

export const translateTextInput = z
  .object({
    text: z.string().trim().min(1),
    target_language: z.string().trim().min(1),
    source_language: z.string().trim().min(1).default('auto')
  })
  .strict();

export type FindProductArgs = z.infer<typeof findProductInput>;
export type AddProductArgs = z.infer<typeof addProductInput>;
export type ExpressionArgs = z.infer<typeof expressionInput>;
export type SearchWebArgs = z.infer<typeof searchWebInput>;
export type CurrencyRatesArgs = z.infer<typeof currencyRatesInput>;
export type TranslateTextArgs = z.infer<typeof translateTextInput>;

/** Renders zod issues as one line, e.g. `name: Required; price: Expected number, received string`. */
export function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}
