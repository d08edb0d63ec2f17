/**
 * Action Sink: the boundary that receives finished decision records.
 * Delivering the actions (notifications, tickets, dashboards) happens
 * behind this interface.
 */

import { once } from 'node:events';
import type { Writable } from 'node:stream';
import type { DecisionRecord } from '../engine/types.js';

export interface ActionSink {
  /** Called once per subject, never concurrently by the engine */
  write(record: DecisionRecord): void | Promise<void>;
  close?(): void | Promise<void>;
}

/**
 * Keeps records in memory in arrival order.
 */
export class CollectingSink implements ActionSink {
  readonly records: DecisionRecord[] = [];

  write(record: DecisionRecord): void {
    this.records.push(record);
  }

  /** Records keyed by subject id */
  bySubject(): Map<string, DecisionRecord> {
    return new Map(this.records.map(record => [record.subjectId, record]));
  }

  /** Records ordered by subject id, independent of completion order */
  sorted(): DecisionRecord[] {
    return [...this.records].sort((a, b) => (a.subjectId < b.subjectId ? -1 : a.subjectId > b.subjectId ? 1 : 0));
  }

  clear(): void {
    this.records.length = 0;
  }
}

/**
 * Writes one JSON document per line to a stream, honouring backpressure.
 */
export class NdjsonSink implements ActionSink {
  constructor(private readonly stream: Writable) {}

  async write(record: DecisionRecord): Promise<void> {
    if (!this.stream.write(`${JSON.stringify(record)}\n`)) {
      await once(this.stream, 'drain');
    }
  }
}
