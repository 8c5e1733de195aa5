import { z } from 'zod';
import type { FetchLike } from '../tools/backend-client';

const DEFAULT_CURRENCIES = ['EUR', 'RUB'];

const ratesSchema = z.object({
  date: z.string().optional(),
  rates: z.record(z.number())
});

/** A single code or a list; anything else means the default pair. */
export function normalizeCurrencies(value: unknown): string[] {
  if (typeof value === 'string') return [value.toUpperCase()];
  if (Array.isArray(value)) {
    return value.filter((v): v is string => typeof v === 'string').map((v) => v.toUpperCase());
  }
  return DEFAULT_CURRENCIES;
}

export async function getCurrencyRates(
  base: string,
  currencies: unknown,
  fetchImpl: FetchLike = fetch
): Promise<Record<string, unknown>> {
  const baseCode = base.toUpperCase();
  const wanted = normalizeCurrencies(currencies);
  try {
    const res = await fetchImpl(`https://api.exchangerate-api.com/v4/latest/${encodeURIComponent(baseCode)}`, {
      signal: AbortSignal.timeout(10_000)
    });
    if (!res.ok) throw new Error(`HTTP ${res.status}`);
    const parsed = ratesSchema.safeParse(await res.json());
    if (!parsed.success) throw new Error('unexpected response shape');

    const rates: Record<string, number> = {};
    for (const code of wanted) {
      const rate = parsed.data.rates[code];
      if (rate !== undefined) rates[code] = rate;
    }
    return { base: baseCode, rates, date: parsed.data.date ?? '' };
  } catch (err) {
    return { error: `Could not fetch exchange rates: ${err instanceof Error ? err.message : String(err)}` };
  }
}
