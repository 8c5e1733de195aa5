import { isToolRequest, messageSchema, type Message } from './message';

export const DEFAULT_MAX_HISTORY = 20;

/**
 * Per-user conversation log. The system prompt is never stored here; it is
 * prepended when a request is built.
 */
export interface HistoryStore {
  get(userId: string): Promise<Message[]>;
  append(userId: string, ...messages: Message[]): Promise<void>;
  reset(userId: string): Promise<void>;
}

/**
 * Single left-to-right pass that keeps only messages the completion API
 * accepts. A tool message survives only while the accepted output ends in the
 * tool-result block of an assistant message that requested that call id, and
 * only once per id. Messages with an unknown role or a malformed shape are
 * dropped.
 */
export function repair(history: readonly unknown[]): Message[] {
  const out: Message[] = [];
  let pending: Set<string> | null = null;

  for (const raw of history) {
    const parsed = messageSchema.safeParse(raw);
    if (!parsed.success) continue;
    const msg = parsed.data;

    if (msg.role === 'tool') {
      if (pending?.has(msg.tool_call_id)) {
        pending.delete(msg.tool_call_id);
        out.push(msg);
      }
      continue;
    }

    out.push(msg);
    pending = isToolRequest(msg) ? new Set(msg.tool_calls.map((tc) => tc.id)) : null;
  }
  return out;
}

/**
 * Keeps the newest `maxSize` messages. When the cut lands inside a tool-result
 * block, the requesting assistant message is pulled back in (and the newest
 * message dropped to stay within bounds); failing that, the leading orphan is
 * dropped. Run `repair` on the result: later tool messages of the same block
 * may still be stranded.
 */
export function trim(history: readonly Message[], maxSize: number): Message[] {
  if (history.length <= maxSize) return [...history];
  if (maxSize <= 0) return [];

  const start = history.length - maxSize;
  let trimmed = history.slice(start);

  if (trimmed[0]?.role === 'tool') {
    const before = history[start - 1];
    if (isToolRequest(before)) {
      trimmed = [before, ...trimmed].slice(0, maxSize);
    } else {
      trimmed = trimmed.slice(1);
    }
  }
  return trimmed;
}

/** `trim` followed by `repair`, applied only when the history is over the bound. */
export function bound(history: readonly Message[], maxSize: number): Message[] {
  if (history.length <= maxSize) return [...history];
  return repair(trim(history, maxSize));
}

export class InMemoryHistoryStore implements HistoryStore {
  private histories = new Map<string, Message[]>();

  constructor(private readonly maxSize: number = DEFAULT_MAX_HISTORY) {}

  async get(userId: string): Promise<Message[]> {
    return [...(this.histories.get(userId) ?? [])];
  }

  async append(userId: string, ...messages: Message[]): Promise<void> {
    const next = [...(this.histories.get(userId) ?? []), ...messages];
    this.histories.set(userId, bound(next, this.maxSize));
  }

  async reset(userId: string): Promise<void> {
    this.histories.set(userId, []);
  }
}
