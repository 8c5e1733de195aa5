import { z } from 'zod';
import { logger } from '../observability/logger';
import type { FetchLike } from '../tools/backend-client';

export type SearchHit = { title: string; body: string; url: string };

const topicSchema = z.object({
  Text: z.string().optional(),
  FirstURL: z.string().optional()
});
const instantAnswerSchema = z.object({
  Heading: z.string().optional(),
  AbstractText: z.string().optional(),
  AbstractURL: z.string().optional(),
  Results: z.array(topicSchema).optional(),
  RelatedTopics: z
    .array(z.union([topicSchema.extend({ Topics: z.array(topicSchema) }), topicSchema]))
    .optional()
});

type InstantAnswer = z.infer<typeof instantAnswerSchema>;

export const DEFAULT_MAX_RESULTS = 5;

/** Out-of-range or non-integer limits fall back to the default. */
export function clampMaxResults(value: unknown): number {
  return typeof value === 'number' && Number.isInteger(value) && value >= 1 && value <= 10 ? value : DEFAULT_MAX_RESULTS;
}

function topicHit(text: string | undefined, url: string | undefined): SearchHit | null {
  if (!text && !url) return null;
  const body = text ?? '';
  const dash = body.indexOf(' - ');
  return { title: dash > 0 ? body.slice(0, dash) : body, body, url: url ?? '' };
}

function collectHits(answer: InstantAnswer): SearchHit[] {
  const hits: SearchHit[] = [];
  if (answer.AbstractText) {
    hits.push({ title: answer.Heading ?? '', body: answer.AbstractText, url: answer.AbstractURL ?? '' });
  }
  for (const r of answer.Results ?? []) {
    const hit = topicHit(r.Text, r.FirstURL);
    if (hit) hits.push(hit);
  }
  for (const t of answer.RelatedTopics ?? []) {
    const group = 'Topics' in t ? t.Topics : [t];
    for (const item of group) {
      const hit = topicHit(item.Text, item.FirstURL);
      if (hit) hits.push(hit);
    }
  }
  return hits;
}

/**
 * Web search through the DuckDuckGo Instant Answer API. Resolves to a result
 * mapping in every case; provider failures carry an `error` key.
 */
export async function searchWeb(
  query: string,
  maxResults: unknown,
  fetchImpl: FetchLike = fetch
): Promise<Record<string, unknown>> {
  const limit = clampMaxResults(maxResults);
  const url =
    'https://api.duckduckgo.com/?' +
    new URLSearchParams({ q: query, format: 'json', no_html: '1', skip_disambig: '1' }).toString();

  try {
    const res = await fetchImpl(url, { signal: AbortSignal.timeout(10_000) });
    if (!res.ok) throw new Error(`HTTP ${res.status}`);
    const parsed = instantAnswerSchema.safeParse(await res.json());
    if (!parsed.success) throw new Error('unexpected response shape');

    const results = collectHits(parsed.data).slice(0, limit);
    logger.info('web search', { query, results: results.length });
    if (results.length === 0) {
      return { results: [], query, message: 'Nothing was found for this query. Try rephrasing it.' };
    }
    return { results, query };
  } catch (err) {
    logger.warn('web search failed', { query, error: err instanceof Error ? err.message : String(err) });
    return { error: 'Web search is temporarily unavailable. Try again later.', query };
  }
}
