// =============================================================================
// COURSEWORK — Audit Service
//
// Append-only trail of successful mutations. Denied or invalid operations
// never reach it: callers record only after the store write succeeded.
//
// Each event carries a SHA-512 hash of its content so tampering with a
// stored row is detectable.
// =============================================================================

import { createHash } from 'crypto';
import { v4 as uuidv4 } from 'uuid';
import { AuditEvent, AuditTargetType } from '../types/records';
import { Role } from '../types/roles';
import { AuditStore } from '../types/store';

export interface AuditEntry {
  eventType: string;
  description: string;
  actor?: { id: string; role: Role };
  targetType: AuditTargetType;
  targetId?: string;
  metadata?: Record<string, unknown>;
}

/**
 * Value with object keys sorted at every level. JSONB does not keep key
 * order, so the hash must not depend on it.
 */
function canonical(value: unknown): unknown {
  if (Array.isArray(value)) return value.map(canonical);
  if (value instanceof Date) return value.toISOString();
  if (typeof value === 'object' && value !== null) {
    const sorted: Record<string, unknown> = {};
    const entries = Object.entries(value).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
    for (const [key, inner] of entries) sorted[key] = canonical(inner);
    return sorted;
  }
  return value;
}

export function computeEventHash(event: Omit<AuditEvent, 'eventHash'>): string {
  const hashInput = JSON.stringify({
    id: event.id,
    occurredAt: event.occurredAt.toISOString(),
    eventType: event.eventType,
    description: event.description,
    actorId: event.actorId,
    targetType: event.targetType,
    targetId: event.targetId,
    metadata: canonical(event.metadata),
  });
  return createHash('sha512').update(hashInput).digest('hex');
}

export class AuditTrail {
  constructor(private readonly store: AuditStore) {}

  /**
   * Record an event. Returns the stored event so callers can link it.
   */
  async record(entry: AuditEntry): Promise<AuditEvent> {
    const base = {
      id: uuidv4(),
      eventType: entry.eventType,
      description: entry.description,
      actorId: entry.actor?.id ?? null,
      actorRole: entry.actor?.role ?? null,
      targetType: entry.targetType,
      targetId: entry.targetId ?? null,
      metadata: entry.metadata ?? {},
      occurredAt: new Date(),
    };
    const event: AuditEvent = { ...base, eventHash: computeEventHash(base) };

    await this.store.append(event);
    return event;
  }

  /** Most recent first */
  async recent(limit = 50): Promise<AuditEvent[]> {
    return this.store.list(limit);
  }

  /** Recompute the hash of a stored event and compare */
  static verify(event: AuditEvent): boolean {
    const { eventHash, ...rest } = event;
    return computeEventHash(rest) === eventHash;
  }
}
