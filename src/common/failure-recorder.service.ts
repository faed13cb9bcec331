import { Injectable, Logger } from '@nestjs/common';
import { errorMessage } from './errors';

export type FailureKind =
  | 'retrieval'
  | 'ticket_lookup'
  | 'generation'
  | 'timeout'
  | 'ingest'
  | 'startup';

export type FailureRecord = {
  kind: FailureKind;
  at: string;
  message: string;
  context: Record<string, unknown>;
};

const MAX_RECENT = 100;

/**
 * Every degraded path goes through here, so nothing is dropped without a log line.
 */
@Injectable()
export class FailureRecorder {
  private readonly logger = new Logger(FailureRecorder.name);
  private readonly recentFailures: FailureRecord[] = [];
  private readonly counts = new Map<FailureKind, number>();

  record(
    kind: FailureKind,
    context: Record<string, unknown> & { error?: unknown },
  ): FailureRecord {
    const { error, ...rest } = context;
    const entry: FailureRecord = {
      kind,
      at: new Date().toISOString(),
      message: error === undefined ? kind : errorMessage(error),
      context: rest,
    };

    this.recentFailures.push(entry);
    if (this.recentFailures.length > MAX_RECENT) this.recentFailures.shift();
    this.counts.set(kind, (this.counts.get(kind) ?? 0) + 1);

    this.logger.warn(
      `[${kind}] ${entry.message} ${JSON.stringify(rest)}`,
    );
    return entry;
  }

  recent(): FailureRecord[] {
    return [...this.recentFailures];
  }

  count(kind: FailureKind): number {
    return this.counts.get(kind) ?? 0;
  }
}
