export const TELEGRAM_MESSAGE_LIMIT = 4096;

const SENTENCE_ENDS = new Set(['.', '!', '?', '。', '！', '？', ';']);

function findCut(text: string, limit: number): number {
  const window = text.slice(0, limit);
  const newline = window.lastIndexOf('\n');
  if (newline > 0) return newline + 1;
  for (let i = window.length - 1; i > 0; i--) {
    if (SENTENCE_ENDS.has(window[i]) && (i + 1 === window.length || /\s/.test(window[i + 1]))) {
      return i + 1;
    }
  }
  const space = window.lastIndexOf(' ');
  if (space > 0) return space + 1;
  // do not separate a surrogate pair (emoji and other astral characters)
  if (limit > 1 && isHighSurrogate(text.charCodeAt(limit - 1))) return limit - 1;
  return limit;
}

function isHighSurrogate(code: number): boolean {
  return code >= 0xd800 && code <= 0xdbff;
}

/**
 * Splits a reply into pieces of at most `limit` characters, preferring line
 * breaks, then sentence ends, then spaces. Pieces are trimmed at the cut and
 * blank pieces are skipped.
 */
export function splitMessage(text: string, limit = TELEGRAM_MESSAGE_LIMIT): string[] {
  if (limit <= 0) throw new RangeError('limit must be positive');
  const out: string[] = [];
  let rest = text;
  while (rest.length > limit) {
    const cut = findCut(rest, limit);
    const piece = rest.slice(0, cut).trimEnd();
    if (piece.length > 0) out.push(piece);
    rest = rest.slice(cut).trimStart();
  }
  if (rest.trim().length > 0) out.push(rest);
  return out;
}
