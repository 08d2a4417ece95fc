import { logger, type Logger } from '@modules/logger.js';
import type { StatusVerdict } from '@modules/status-waiter.js';

export type LifecycleState =
  | 'initialized'
  | 'cloned'
  | 'branch-pushed'
  | 'pr-created'
  | 'pr-status-resolved'
  | 'merged'
  | 'merge-status-resolved';

export type LifecycleEvent =
  | { type: 'state'; state: LifecycleState; detail?: Record<string, unknown> }
  | { type: 'head-sha'; pullNumber: number; sha: string }
  | { type: 'waiting-for-status'; sha: string; context: string }
  | { type: 'status-poll'; sha: string; context: string; verdict: StatusVerdict | 'missing' }
  | { type: 'teardown-failed'; path: string; error: string };

/**
 * Receives progress from the lifecycle. Reporting never affects control flow:
 * an observer that throws is logged and otherwise ignored by {@link notify}.
 */
export interface LifecycleObserver {
  onEvent(event: LifecycleEvent): void;
}

export const silentObserver: LifecycleObserver = {
  onEvent() {},
};

export function createLoggingObserver(log: Logger): LifecycleObserver {
  return {
    onEvent(event) {
      switch (event.type) {
        case 'state':
          log.info(`Lifecycle reached ${event.state}`, event.detail);
          break;
        case 'head-sha':
          log.info(`HEAD sha is ${event.sha}`, { pullNumber: event.pullNumber });
          break;
        case 'waiting-for-status':
          log.info(`Waiting for ${event.sha} to report ${event.context}`);
          break;
        case 'status-poll':
          log.debug('Polled commit status', { sha: event.sha, context: event.context, verdict: event.verdict });
          break;
        case 'teardown-failed':
          log.warn('Failed to remove workspace', { path: event.path, error: event.error });
          break;
      }
    },
  };
}

export function notify(observer: LifecycleObserver, event: LifecycleEvent): void {
  try {
    observer.onEvent(event);
  } catch (err) {
    logger.warn('Lifecycle observer threw', { event: event.type, error: String(err) });
  }
}
