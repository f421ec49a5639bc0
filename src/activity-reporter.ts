/**
 * @fileoverview Activity signals from a running service.
 *
 * Liveness alone says whether a session is dead. For a live process the
 * reporter tells the coordinator whether the service is blocked waiting for
 * an approval or reporting a failure.
 *
 * @module activity-reporter
 */

import { ACTIVITY_TIMEOUT_MS } from './config/lifecycle-timing.js';
import type { SessionRecord } from './types.js';
import { getErrorMessage } from './types.js';
import { debugLog } from './utils/debug-log.js';

export type ActivitySignal =
  | { kind: 'ok' }
  | { kind: 'blocked'; pending: number }
  | { kind: 'failed'; reason: string };

export interface SessionActivityReporter {
  report(session: Pick<SessionRecord, 'id' | 'port'>): Promise<ActivitySignal>;
}

/** Reporter that never signals anything; status falls back to the activity timestamp. */
export const quietActivityReporter: SessionActivityReporter = {
  report: async () => ({ kind: 'ok' }),
};

/**
 * Queries the service's local HTTP API for pending permission requests.
 *
 * `GET http://<host>:<port>/permission` returning a non-empty array means
 * the service is blocked. Any transport or protocol failure is reported as
 * `failed` so the session shows up as `error` rather than `running`.
 */
export class HttpActivityReporter implements SessionActivityReporter {
  constructor(
    private readonly host: string = '127.0.0.1',
    private readonly timeoutMs: number = ACTIVITY_TIMEOUT_MS,
  ) {}

  async report(session: Pick<SessionRecord, 'id' | 'port'>): Promise<ActivitySignal> {
    const url = `http://${this.host}:${session.port}/permission`;
    try {
      const res = await fetch(url, { signal: AbortSignal.timeout(this.timeoutMs) });
      if (!res.ok) {
        return { kind: 'failed', reason: `HTTP ${res.status} from ${url}` };
      }
      const body: unknown = await res.json();
      if (!Array.isArray(body)) {
        return { kind: 'failed', reason: `Unexpected response from ${url}` };
      }
      return body.length > 0 ? { kind: 'blocked', pending: body.length } : { kind: 'ok' };
    } catch (err) {
      debugLog('ActivityReporter', `Session ${session.id} unreachable`, err);
      return { kind: 'failed', reason: getErrorMessage(err) };
    }
  }
}
