import type { Logger } from './logger.js';

// ---------------------------------------------------------------------------
// Dependency interfaces (injected by server / worker / test)
// ---------------------------------------------------------------------------

export interface AuditEntry {
  action: string;
  category: string;
  resourceType?: string | null;
  resourceId?: string | null;
  detail?: Record<string, unknown> | null;
}

export interface AuditRepo {
  appendAuditLog(entry: AuditEntry): Promise<unknown>;
}

export interface EventEmitter {
  emit(event: string, payload: Record<string, unknown>): void;
}

// ---------------------------------------------------------------------------
// Logger-backed defaults
// Entries are written as structured log lines; persisting them is left to
// whatever collects the logs.
// ---------------------------------------------------------------------------

export function createLoggerAuditRepo(logger: Logger): AuditRepo {
  const log = logger.child({ component: 'audit' });
  return {
    async appendAuditLog(entry) {
      log.info({ audit: entry }, entry.action);
    },
  };
}

export function createLoggerEventEmitter(logger: Logger): EventEmitter {
  const log = logger.child({ component: 'events' });
  return {
    emit(event, payload) {
      log.debug({ event, payload }, event);
    },
  };
}
