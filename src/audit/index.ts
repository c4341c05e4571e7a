/**
 * Audit module for chanseal.
 * Records what the engine did and which error codes it returned.
 * Events never carry key material or plaintext.
 */

import type { ErrorCode } from '../errors';
import type { Storage } from '../storage/interface';
import { StorageNamespace, namespacedKey } from '../storage/interface';

/**
 * Audit event types.
 */
export type AuditEventType =
  | 'IDENTITY_CREATED'
  | 'IDENTITY_LOADED'
  | 'OFFER_CREATED'
  | 'OFFER_ACCEPTED'
  | 'OFFER_REJECTED'
  | 'MESSAGE_SEALED'
  | 'MESSAGE_OPENED'
  | 'MESSAGE_REJECTED'
  | 'CHANNEL_KEY_CREATED'
  | 'CHANNEL_KEY_SHARED'
  | 'CHANNEL_KEY_RECEIVED'
  | 'CHANNEL_ENABLED'
  | 'CHANNEL_DISABLED'
  | 'PERSISTENCE_MODE_CHANGED'
  | 'STORE_SAVED'
  | 'STORE_LOADED'
  | 'STORE_FAILED'
  | 'ERROR'
  | 'WARNING';

/**
 * Audit event severity levels.
 */
export type AuditSeverity = 'DEBUG' | 'INFO' | 'WARNING' | 'ERROR' | 'CRITICAL';

export interface AuditEvent {
  id: string;
  type: AuditEventType;
  severity: AuditSeverity;
  timestamp: Date;
  /** Local identity fingerprint, once one exists */
  fingerprint?: string;
  /** Related peer (direct operations) */
  peerId?: string;
  /** Related `network/channel` id (channel operations) */
  channelId?: string;
  /** Error code returned to the host, for failures */
  code?: ErrorCode;
  message: string;
  metadata?: Record<string, unknown>;
}

export interface AuditEventSerialized extends Omit<AuditEvent, 'timestamp'> {
  timestamp: string;
}

export interface AuditEventOptions {
  peerId?: string;
  channelId?: string;
  code?: ErrorCode;
  metadata?: Record<string, unknown>;
}

export interface AuditQueryOptions {
  type?: AuditEventType | AuditEventType[];
  severity?: AuditSeverity | AuditSeverity[];
  peerId?: string;
  channelId?: string;
  code?: ErrorCode;
  /** Start time (inclusive) */
  startTime?: Date;
  /** End time (inclusive) */
  endTime?: Date;
  limit?: number;
  offset?: number;
  order?: 'asc' | 'desc';
}

export interface AuditLoggerConfig {
  /** Storage backend (optional, for persistence) */
  storage?: Storage;
  /** Maximum events to keep in memory */
  maxMemoryEvents?: number;
  /** Minimum severity to record */
  minSeverity?: AuditSeverity;
  /** Mirror events to the console */
  consoleOutput?: boolean;
}

const SEVERITY_PRIORITY: Record<AuditSeverity, number> = {
  DEBUG: 0,
  INFO: 1,
  WARNING: 2,
  ERROR: 3,
  CRITICAL: 4,
};

function generateEventId(): string {
  const timestamp = Date.now().toString(36);
  const random = Math.random().toString(36).slice(2, 10);
  return `audit_${timestamp}_${random}`;
}

function toArray<T>(value: T | T[]): T[] {
  return Array.isArray(value) ? value : [value];
}

export class AuditLogger {
  private readonly storage?: Storage;
  private readonly maxMemoryEvents: number;
  private readonly minSeverityLevel: number;
  private readonly consoleOutput: boolean;
  private events: AuditEvent[] = [];
  private fingerprint?: string;

  constructor(config: AuditLoggerConfig = {}) {
    this.storage = config.storage;
    this.maxMemoryEvents = config.maxMemoryEvents ?? 1000;
    this.minSeverityLevel = SEVERITY_PRIORITY[config.minSeverity ?? 'INFO'];
    this.consoleOutput = config.consoleOutput ?? false;
  }

  /**
   * Attach the local identity fingerprint to subsequent events.
   */
  setFingerprint(fingerprint: string | undefined): void {
    this.fingerprint = fingerprint;
  }

  /**
   * Record an event. Events below the minimum severity are returned but not kept.
   */
  async log(
    type: AuditEventType,
    severity: AuditSeverity,
    message: string,
    options: AuditEventOptions = {}
  ): Promise<AuditEvent> {
    const event: AuditEvent = {
      id: generateEventId(),
      type,
      severity,
      timestamp: new Date(),
      message,
      ...(this.fingerprint !== undefined && { fingerprint: this.fingerprint }),
      ...(options.peerId !== undefined && { peerId: options.peerId }),
      ...(options.channelId !== undefined && { channelId: options.channelId }),
      ...(options.code !== undefined && { code: options.code }),
      ...(options.metadata !== undefined && { metadata: options.metadata }),
    };

    if (SEVERITY_PRIORITY[severity] < this.minSeverityLevel) {
      return event;
    }

    this.events.push(event);
    if (this.events.length > this.maxMemoryEvents) {
      this.events.shift();
    }

    if (this.storage) {
      const key = namespacedKey(StorageNamespace.AUDIT, event.id);
      await this.storage.set(key, new TextEncoder().encode(JSON.stringify(this.serializeEvent(event))));
    }

    if (this.consoleOutput) {
      this.logToConsole(event);
    }

    return event;
  }

  private serializeEvent(event: AuditEvent): AuditEventSerialized {
    return {
      ...event,
      timestamp: event.timestamp.toISOString(),
    };
  }

  private logToConsole(event: AuditEvent): void {
    const code = event.code ? ` (${event.code})` : '';
    const msg = `[${event.severity}] [${event.type}] ${event.message}${code}`;

    switch (event.severity) {
      case 'DEBUG':
        console.debug(msg, event.metadata ?? '');
        break;
      case 'INFO':
        console.info(msg, event.metadata ?? '');
        break;
      case 'WARNING':
        console.warn(msg, event.metadata ?? '');
        break;
      case 'ERROR':
      case 'CRITICAL':
        console.error(msg, event.metadata ?? '');
        break;
    }
  }

  query(options: AuditQueryOptions = {}): AuditEvent[] {
    const { startTime, endTime } = options;
    let results = [...this.events];

    if (options.type) {
      const types = toArray(options.type);
      results = results.filter((e) => types.includes(e.type));
    }
    if (options.severity) {
      const severities = toArray(options.severity);
      results = results.filter((e) => severities.includes(e.severity));
    }
    if (options.peerId) {
      results = results.filter((e) => e.peerId === options.peerId);
    }
    if (options.channelId) {
      results = results.filter((e) => e.channelId === options.channelId);
    }
    if (options.code) {
      results = results.filter((e) => e.code === options.code);
    }
    if (startTime) {
      results = results.filter((e) => e.timestamp >= startTime);
    }
    if (endTime) {
      results = results.filter((e) => e.timestamp <= endTime);
    }

    // Stable sort keeps insertion order for events in the same millisecond
    const order = options.order ?? 'desc';
    if (order === 'desc') {
      results.reverse();
    }
    results.sort((a, b) => {
      const diff = a.timestamp.getTime() - b.timestamp.getTime();
      return order === 'asc' ? diff : -diff;
    });

    const offset = options.offset ?? 0;
    const limit = options.limit ?? results.length;
    return results.slice(offset, offset + limit);
  }

  getErrors(): AuditEvent[] {
    return this.query({ severity: ['ERROR', 'CRITICAL'] });
  }

  getRecent(count: number = 10): AuditEvent[] {
    return this.query({ limit: count, order: 'desc' });
  }

  getCount(): number {
    return this.events.length;
  }

  getStats(): {
    total: number;
    byType: Record<string, number>;
    bySeverity: Record<string, number>;
  } {
    const byType: Record<string, number> = {};
    const bySeverity: Record<string, number> = {};

    for (const event of this.events) {
      byType[event.type] = (byType[event.type] ?? 0) + 1;
      bySeverity[event.severity] = (bySeverity[event.severity] ?? 0) + 1;
    }

    return { total: this.events.length, byType, bySeverity };
  }

  clear(): void {
    this.events = [];
  }

  /**
   * Export all in-memory events as JSON.
   */
  export(): string {
    return JSON.stringify(
      this.events.map((e) => this.serializeEvent(e)),
      null,
      2
    );
  }
}

/**
 * Create an audit logger with default configuration.
 */
export function createAuditLogger(options?: AuditLoggerConfig): AuditLogger {
  return new AuditLogger(options);
}
