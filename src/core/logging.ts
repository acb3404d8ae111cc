/*
 * Structured log store for puzzle resolution, obstacle and bridge events.
 */

export type LogEventType = 'puzzle' | 'cascade' | 'obstacle' | 'bridge' | 'system';

export interface LogEventMetadata {
  [key: string]: unknown;
}

export interface LogEventPayload {
  type: LogEventType;
  message: string;
  metadata?: LogEventMetadata;
}

export interface LogEntry extends LogEventPayload {
  id: string;
  timestamp: number;
  occurrences: number;
}

export type LogChange =
  | { kind: 'append'; entry: LogEntry; index: number }
  | { kind: 'update'; entry: LogEntry; index: number }
  | { kind: 'remove'; entries: LogEntry[] };

export type LogListener = (change: LogChange) => void;

export type LogFn = (payload: LogEventPayload) => void;

export interface StorageLike {
  getItem(key: string): string | null;
  setItem(key: string, value: string): void;
  removeItem?(key: string): void;
}

export interface LogStoreOptions {
  storage?: StorageLike | null;
  storageKey?: string;
  maxEntries?: number;
  now?: () => number;
}

const DEFAULT_MAX_ENTRIES = 150;
const LOG_HISTORY_STORAGE_KEY = 'puzzle-core:log-history:v1';

export const LOG_EVENT_TYPES: readonly LogEventType[] = [
  'puzzle',
  'cascade',
  'obstacle',
  'bridge',
  'system'
];

let sequence = 0;

const toId = (timestamp: number): string => {
  sequence += 1;
  return `${timestamp.toString(36)}-${sequence.toString(36)}`;
};

const isLogEventType = (value: unknown): value is LogEventType =>
  typeof value === 'string' && (LOG_EVENT_TYPES as readonly string[]).includes(value);

const normalizeMetadata = (metadata: LogEventMetadata | undefined): LogEventMetadata => {
  if (!metadata || typeof metadata !== 'object') {
    return {};
  }
  return { ...metadata };
};

const toMetadata = (value: unknown): LogEventMetadata => {
  if (!value || typeof value !== 'object' || Array.isArray(value)) {
    return {};
  }
  return Object.fromEntries(Object.entries(value));
};

const aggregateKeyOf = (metadata: LogEventMetadata | undefined): string | null => {
  const key = metadata?.aggregateKey;
  if (typeof key === 'string' && key.trim().length > 0) {
    return key.trim();
  }
  return null;
};

export class LogStore {
  private history: LogEntry[] = [];

  private readonly listeners = new Set<LogListener>();

  private readonly storage: StorageLike | null;

  private readonly storageKey: string;

  private readonly maxEntries: number;

  private readonly now: () => number;

  constructor(options: LogStoreOptions = {}) {
    this.storage = options.storage ?? null;
    this.storageKey = options.storageKey ?? LOG_HISTORY_STORAGE_KEY;
    this.maxEntries = Math.max(1, options.maxEntries ?? DEFAULT_MAX_ENTRIES);
    this.now = options.now ?? Date.now;
    this.hydrate();
  }

  private hydrate(): void {
    if (!this.storage) {
      return;
    }
    let parsed: unknown;
    try {
      const raw = this.storage.getItem(this.storageKey);
      if (!raw) {
        return;
      }
      parsed = JSON.parse(raw);
    } catch (error) {
      console.warn('Failed to restore log history', error);
      return;
    }
    if (!Array.isArray(parsed)) {
      return;
    }
    const restored: LogEntry[] = [];
    for (const item of parsed) {
      if (!item || typeof item !== 'object') {
        continue;
      }
      const candidate: Record<string, unknown> = { ...item };
      const type = candidate.type;
      const message = candidate.message;
      if (!isLogEventType(type) || typeof message !== 'string') {
        continue;
      }
      const timestamp =
        typeof candidate.timestamp === 'number' && Number.isFinite(candidate.timestamp)
          ? candidate.timestamp
          : this.now();
      const occurrences = candidate.occurrences;
      restored.push({
        id: typeof candidate.id === 'string' ? candidate.id : toId(timestamp),
        type,
        message,
        metadata: toMetadata(candidate.metadata),
        timestamp,
        occurrences:
          typeof occurrences === 'number' && occurrences > 0 ? Math.floor(occurrences) : 1
      });
    }
    this.history = restored.slice(-this.maxEntries);
  }

  private persist(): void {
    if (!this.storage) {
      return;
    }
    try {
      this.storage.setItem(this.storageKey, JSON.stringify(this.history));
    } catch (error) {
      console.warn('Failed to persist log history', error);
    }
  }

  getHistory(): LogEntry[] {
    return this.history.map((entry) => ({
      ...entry,
      metadata: normalizeMetadata(entry.metadata)
    }));
  }

  subscribe(listener: LogListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  clear(): void {
    if (this.history.length === 0) {
      return;
    }
    const removed = this.history.slice();
    this.history = [];
    this.persist();
    this.emitChange({ kind: 'remove', entries: removed });
  }

  emit(payload: LogEventPayload): LogEntry {
    const timestamp = this.now();
    const entry: LogEntry = {
      id: toId(timestamp),
      type: payload.type,
      message: payload.message,
      metadata: normalizeMetadata(payload.metadata),
      timestamp,
      occurrences: 1
    };

    const aggregated = this.tryAggregate(entry);
    if (aggregated) {
      this.history[aggregated.index] = aggregated.entry;
      this.persist();
      this.emitChange({ kind: 'update', entry: aggregated.entry, index: aggregated.index });
      return aggregated.entry;
    }

    this.history.push(entry);
    const trimmed: LogEntry[] = [];
    while (this.history.length > this.maxEntries) {
      const removed = this.history.shift();
      if (removed) {
        trimmed.push(removed);
      }
    }
    this.persist();
    if (trimmed.length > 0) {
      this.emitChange({ kind: 'remove', entries: trimmed });
    }
    const index = this.history.length - 1;
    this.emitChange({ kind: 'append', entry, index });
    return entry;
  }

  /** Folds an entry into the previous one when both share an aggregate key. */
  private tryAggregate(entry: LogEntry): { entry: LogEntry; index: number } | null {
    const key = aggregateKeyOf(entry.metadata);
    if (!key || this.history.length === 0) {
      return null;
    }
    const index = this.history.length - 1;
    const previous = this.history[index];
    if (previous.type !== entry.type || aggregateKeyOf(previous.metadata) !== key) {
      return null;
    }
    const merged: LogEntry = {
      ...previous,
      message: entry.message,
      metadata: { ...previous.metadata, ...entry.metadata },
      timestamp: entry.timestamp,
      occurrences: previous.occurrences + entry.occurrences
    };
    return { entry: merged, index };
  }

  private emitChange(change: LogChange): void {
    for (const listener of this.listeners) {
      try {
        listener(change);
      } catch (error) {
        console.warn('Failed to handle log change', error);
      }
    }
  }
}

export const logStore = new LogStore();

export const logEvent: LogFn = (payload) => {
  logStore.emit(payload);
};

export const subscribeToLogs = (listener: LogListener): (() => void) =>
  logStore.subscribe(listener);

export const getLogHistory = (): LogEntry[] => logStore.getHistory();

export const clearLogs = (): void => logStore.clear();
