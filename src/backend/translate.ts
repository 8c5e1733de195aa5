import { z } from 'zod';
import type { FetchLike } from '../tools/backend-client';

const LANGUAGE_ALIASES: ReadonlyMap<string, string> = new Map<string, string>([
  ['en', 'en'],
  ['english', 'en'],
  ['английский', 'en'],
  ['de', 'de'],
  ['german', 'de'],
  ['немецкий', 'de'],
  ['fr', 'fr'],
  ['french', 'fr'],
  ['французский', 'fr'],
  ['ru', 'ru'],
  ['russian', 'ru'],
  ['русский', 'ru']
]);

export function resolveLanguage(value: string): string {
  const key = value.trim().toLowerCase();
  return LANGUAGE_ALIASES.get(key) ?? key;
}

// [[["Hallo","hello",...], ...], null, "en", ...]
const responseSchema = z.array(z.unknown()).min(1);
const segmentsSchema = z.array(z.array(z.unknown()));

export async function translateText(
  text: string,
  targetLanguage: string,
  sourceLanguage = 'auto',
  fetchImpl: FetchLike = fetch
): Promise<Record<string, unknown>> {
  const target = resolveLanguage(targetLanguage);
  const source = sourceLanguage.trim().toLowerCase() === 'auto' ? 'auto' : resolveLanguage(sourceLanguage);
  const url =
    'https://translate.googleapis.com/translate_a/single?' +
    new URLSearchParams({ client: 'gtx', sl: source, tl: target, dt: 't', q: text }).toString();

  try {
    const res = await fetchImpl(url, { signal: AbortSignal.timeout(10_000) });
    if (!res.ok) throw new Error(`HTTP ${res.status}`);
    const parsed = responseSchema.safeParse(await res.json());
    const segments = segmentsSchema.safeParse(parsed.success ? parsed.data[0] : undefined);
    if (!parsed.success || !segments.success) throw new Error('unexpected response shape');

    const translated = segments.data.map((seg) => (typeof seg[0] === 'string' ? seg[0] : '')).join('');
    const detected = typeof parsed.data[2] === 'string' ? parsed.data[2] : undefined;
    return {
      original_text: text,
      translated_text: translated,
      source_language: source === 'auto' ? detected ?? 'auto' : source,
      target_language: target
    };
  } catch (err) {
    return { error: `Translation failed: ${err instanceof Error ? err.message : String(err)}` };
  }
}
