/**
 * Decision journal.
 *
 * Every entry, exit, block and failure the engine decides on is kept here as a
 * structured event, so observers can tell "no opportunity" apart from
 * "opportunity blocked by X". Entries are also broadcast on the event bus.
 */

import { v4 as uuid } from 'uuid';
import { eventBus } from '../infra/eventBus.js';
import { EventLogger, LogLevel } from '../infra/logger.js';
import { DecisionEvent, DecisionKind, Direction } from '../types.js';
import { Clock, isoAt, systemClock } from '../utils/time.js';

export interface DecisionInput {
  kind: DecisionKind;
  reason: string;
  positionId?: string;
  direction?: Direction;
  details?: Record<string, unknown>;
}

export interface DecisionQueryOpts {
  kind?: DecisionKind;
  positionId?: string;
  limit?: number;
}

const BLOCKING_KINDS: readonly DecisionKind[] = ['entry_blocked', 'entry_discarded', 'exit_blocked', 'order_failed'];

const LEVEL_BY_KIND: Partial<Record<DecisionKind, LogLevel>> = {
  entry_candidate: 'debug',
  entry_discarded: 'debug',
  entry_blocked: 'debug',
  exit_blocked: 'info',
  order_failed: 'warn',
  position_failed: 'warn',
  risk_disabled: 'warn',
  trading_halted: 'error',
};

export class DecisionJournal {
  private readonly events: DecisionEvent[] = [];
  private readonly counts: Record<string, number>;

  constructor(
    private readonly logger: EventLogger,
    private readonly maxEntries = 500,
    private readonly clock: Clock = systemClock,
    initialCounts: Record<string, number> = {},
  ) {
    this.counts = { ...initialCounts };
  }

  async record(input: DecisionInput): Promise<DecisionEvent> {
    const event: DecisionEvent = {
      id: uuid(),
      at: isoAt(this.clock()),
      kind: input.kind,
      reason: input.reason,
      ...(input.positionId ? { positionId: input.positionId } : {}),
      ...(input.direction ? { direction: input.direction } : {}),
      ...(input.details ? { details: structuredClone(input.details) } : {}),
    };

    this.events.push(event);
    if (this.events.length > this.maxEntries) {
      this.events.splice(0, this.events.length - this.maxEntries);
    }

    if (BLOCKING_KINDS.includes(event.kind)) {
      this.counts[event.reason] = (this.counts[event.reason] ?? 0) + 1;
    }

    eventBus.emit('decision.recorded', event);
    await this.logger.log(LEVEL_BY_KIND[event.kind] ?? 'info', `decision.${event.kind}`, {
      reason: event.reason,
      positionId: event.positionId,
      direction: event.direction,
      ...event.details,
    });

    return structuredClone(event);
  }

  /** Newest first. */
  list(opts: DecisionQueryOpts = {}): DecisionEvent[] {
    const limit = Math.max(0, opts.limit ?? 100);
    const matches: DecisionEvent[] = [];
    for (let i = this.events.length - 1; i >= 0 && matches.length < limit; i -= 1) {
      const event = this.events[i];
      if (opts.kind && event.kind !== opts.kind) continue;
      if (opts.positionId && event.positionId !== opts.positionId) continue;
      matches.push(structuredClone(event));
    }
    return matches;
  }

  /** Blocked and failed decisions keyed by reason. */
  reasonCounts(): Record<string, number> {
    return { ...this.counts };
  }

  get size(): number {
    return this.events.length;
  }
}
