import { FetchError, errorMessage } from './errors.js';
import type { Logger } from './logger.js';
import type { CalendarSource } from './types.js';

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export type FetchOptions = {
  timeoutMs: number;
  fetch?: FetchLike;
  log?: Logger;
};

export type FetchedCalendar = {
  source: CalendarSource;
  body: string;
};

export type SourceFailure = {
  source: CalendarSource;
  error: Error;
};

const USER_AGENT = 'airwaves/1.0';

// Calendar URLs carry API keys in their query string; keep those out of logs.
export function redactUrl(url: string): string {
  try {
    const u = new URL(url);
    for (const key of u.searchParams.keys()) {
      if (/key|token|secret|password/i.test(key)) u.searchParams.set(key, 'REDACTED');
    }
    return u.toString();
  } catch {
    return url;
  }
}

export async function fetchCalendar(source: CalendarSource, options: FetchOptions): Promise<string> {
  const doFetch = options.fetch ?? fetch;
  const where = redactUrl(source.url);
  let response: Response;
  try {
    response = await doFetch(source.url, {
      headers: {
        'User-Agent': USER_AGENT,
        Accept: 'text/calendar, text/plain;q=0.9, */*;q=0.8',
      },
      signal: AbortSignal.timeout(options.timeoutMs),
    });
  } catch (err) {
    const reason = err instanceof Error && err.name === 'TimeoutError' ? `timed out after ${options.timeoutMs}ms` : errorMessage(err);
    throw new FetchError(where, reason, { cause: err });
  }

  if (!response.ok) {
    throw new FetchError(where, `HTTP ${response.status} ${response.statusText}`.trim(), { status: response.status });
  }

  try {
    return await response.text();
  } catch (err) {
    throw new FetchError(where, `reading body failed: ${errorMessage(err)}`, { status: response.status, cause: err });
  }
}

export async function fetchCalendars(
  sources: readonly CalendarSource[],
  options: FetchOptions,
): Promise<{ fetched: FetchedCalendar[]; failures: SourceFailure[] }> {
  const results = await Promise.allSettled(sources.map((source) => fetchCalendar(source, options)));

  const fetched: FetchedCalendar[] = [];
  const failures: SourceFailure[] = [];
  results.forEach((result, i) => {
    const source = sources[i];
    if (result.status === 'fulfilled') {
      options.log?.debug({ url: redactUrl(source.url), type: source.type, bytes: result.value.length }, 'Fetched calendar');
      fetched.push({ source, body: result.value });
    } else {
      const error = result.reason instanceof Error ? result.reason : new FetchError(redactUrl(source.url), String(result.reason));
      options.log?.error({ url: redactUrl(source.url), type: source.type, err: error }, 'Calendar fetch failed; skipping source');
      failures.push({ source, error });
    }
  });
  return { fetched, failures };
}
