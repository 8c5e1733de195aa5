import { logger } from '../observability/logger';
import { fail, ok, type ToolResult } from './registry';

export type FetchLike = typeof fetch;

export type BackendClientOptions = {
  baseUrl: string;
  timeoutMs?: number;
  fetchImpl?: FetchLike;
};

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === 'object' && v !== null && !Array.isArray(v);
}

function isTimeout(err: unknown): boolean {
  return err instanceof Error && (err.name === 'TimeoutError' || err.name === 'AbortError');
}

/**
 * HTTP client for the tool server. `run` resolves to an error result on
 * connection failure, timeout, non-2xx status, an unreadable body, or an
 * `error` the tool itself reported.
 */
export class ToolBackendClient {
  private baseUrl: string;
  private timeoutMs: number;
  private fetchImpl: FetchLike;

  constructor(opts: BackendClientOptions) {
    this.baseUrl = opts.baseUrl.replace(/\/+$/, '');
    this.timeoutMs = opts.timeoutMs ?? 10_000;
    this.fetchImpl = opts.fetchImpl ?? fetch;
  }

  async run(tool: string, params: Record<string, unknown>): Promise<ToolResult> {
    const url = `${this.baseUrl}/run_tool`;
    let res: Response;
    try {
      res = await this.fetchImpl(url, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({ tool, params }),
        signal: AbortSignal.timeout(this.timeoutMs)
      });
    } catch (err) {
      logger.warn('tool server request failed', { tool, error: err instanceof Error ? err.message : String(err) });
      if (isTimeout(err)) {
        return fail('tool server did not respond in time');
      }
      return fail('could not connect to the tool server; make sure it is running');
    }

    if (!res.ok) {
      const body = await res.text().catch(() => '');
      return fail(`HTTP ${res.status}: ${body}`.trim());
    }

    let data: unknown;
    try {
      data = await res.json();
    } catch (err) {
      return fail(`unexpected response from tool server: ${err instanceof Error ? err.message : String(err)}`);
    }

    // expected shape: {"tool": "...", "response": {...}}
    if (!isRecord(data)) return fail('unexpected response from tool server: not a JSON object');
    const response = data.response;
    if (!isRecord(response)) return ok({});
    // tools report their own failures as {"error": "..."} inside a 200 response
    if (typeof response.error === 'string') {
      const details = Object.fromEntries(Object.entries(response).filter(([key]) => key !== 'error'));
      return fail(response.error, Object.keys(details).length > 0 ? details : undefined);
    }
    return ok(response);
  }

  /** Startup probe; never throws. */
  async ping(): Promise<boolean> {
    try {
      const res = await this.fetchImpl(`${this.baseUrl}/schema`, { signal: AbortSignal.timeout(5_000) });
      return res.ok;
    } catch {
      return false;
    }
  }
}
