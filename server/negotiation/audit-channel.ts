/**
 * Audit Channel
 *
 * Bounded, asynchronous hand-off of compliance events to their sinks. Publishing never
 * waits on a sink. When the buffer is full the incoming event is dropped and counted.
 */

import { ulid } from 'ulid';
import type { Logger } from 'pino';
import type { ComplianceEventRecord } from '../../shared/schema';
import { recordAuditDrop, recordAuditSinkFailure } from '../observability/metrics';
import type { NegotiationRepository } from './repository';

export type AuditEvent = ComplianceEventRecord;

export interface AuditEventInput {
  eventType: string;
  severity: AuditEvent['severity'];
  passed: boolean;
  description: string;
  conversationId?: string | null;
  accountId?: string | null;
  debtorId?: string | null;
  metadata?: Record<string, unknown>;
  createdAt?: Date;
}

export interface AuditSink {
  readonly name: string;
  write(events: AuditEvent[]): Promise<void>;
}

export const DEFAULT_AUDIT_CAPACITY = 1000;
const BATCH_SIZE = 100;

export class AuditChannel {
  private buffer: AuditEvent[] = [];
  private draining: Promise<void> | null = null;
  private closed = false;
  private droppedCount = 0;
  private sinkFailureCount = 0;

  constructor(
    private readonly sinks: readonly AuditSink[],
    private readonly logger: Logger,
    private readonly capacity: number = DEFAULT_AUDIT_CAPACITY
  ) {}

  get dropped(): number {
    return this.droppedCount;
  }

  get sinkFailures(): number {
    return this.sinkFailureCount;
  }

  get pending(): number {
    return this.buffer.length;
  }

  /** Returns false when the event was dropped */
  publish(input: AuditEventInput): boolean {
    if (this.closed || this.buffer.length >= this.capacity) {
      this.droppedCount++;
      recordAuditDrop();
      this.logger.warn(
        { eventType: input.eventType, conversationId: input.conversationId, dropped: this.droppedCount },
        this.closed ? '[Audit] Channel closed, event dropped' : '[Audit] Channel full, event dropped'
      );
      return false;
    }

    this.buffer.push({
      id: ulid(),
      eventType: input.eventType,
      severity: input.severity,
      passed: input.passed,
      description: input.description,
      conversationId: input.conversationId ?? null,
      accountId: input.accountId ?? null,
      debtorId: input.debtorId ?? null,
      metadata: input.metadata ?? {},
      createdAt: input.createdAt ?? new Date()
    });
    this.scheduleDrain();
    return true;
  }

  publishAll(inputs: readonly AuditEventInput[]): number {
    let accepted = 0;
    for (const input of inputs) {
      if (this.publish(input)) accepted++;
    }
    return accepted;
  }

  /** Resolves once everything published so far has been handed to the sinks */
  async flush(): Promise<void> {
    while (this.draining) {
      await this.draining;
    }
  }

  async close(): Promise<void> {
    this.closed = true;
    await this.flush();
  }

  private scheduleDrain(): void {
    if (this.draining) return;
    this.draining = this.drain().finally(() => {
      this.draining = null;
    });
  }

  private async drain(): Promise<void> {
    // yield so publishers are never slowed by sink I/O
    await new Promise<void>((resolve) => setImmediate(resolve));

    while (this.buffer.length > 0) {
      const batch = this.buffer.splice(0, BATCH_SIZE);
      for (const sink of this.sinks) {
        try {
          await sink.write(batch);
        } catch (error) {
          this.sinkFailureCount++;
          recordAuditSinkFailure(sink.name);
          this.logger.error({ err: error, sink: sink.name, events: batch.length }, '[Audit] Sink write failed');
        }
      }
    }
  }
}

/** Writes each event to the structured log */
export class LogAuditSink implements AuditSink {
  readonly name = 'log';

  constructor(private readonly logger: Logger) {}

  async write(events: AuditEvent[]): Promise<void> {
    for (const event of events) {
      const fields = {
        eventId: event.id,
        eventType: event.eventType,
        conversationId: event.conversationId,
        accountId: event.accountId,
        severity: event.severity,
        passed: event.passed,
        metadata: event.metadata
      };
      if (event.severity === 'critical' || event.severity === 'error') {
        this.logger.warn(fields, `[Compliance] ${event.description}`);
      } else {
        this.logger.info(fields, `[Compliance] ${event.description}`);
      }
    }
  }
}

/** Persists events as compliance event rows */
export class RepositoryAuditSink implements AuditSink {
  readonly name = 'repository';

  constructor(private readonly repository: Pick<NegotiationRepository, 'appendComplianceEvents'>) {}

  write(events: AuditEvent[]): Promise<void> {
    return this.repository.appendComplianceEvents(events);
  }
}
