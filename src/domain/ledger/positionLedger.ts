import { DomainError, ErrorCode, InvariantViolationError } from '../../errors/taxonomy.js';
import { eventBus } from '../../infra/eventBus.js';
import { EventLogger } from '../../infra/logger.js';
import { StateStore } from '../../infra/storage/stateStore.js';
import { AppState, Direction, ExecutionMode, PairFill, Position, PositionState } from '../../types.js';
import { Clock, elapsedMs, isoAt, systemClock } from '../../utils/time.js';

export interface OpenDraftInput {
  direction: Direction;
  mode: ExecutionMode;
  targetContracts: number;
  exitSpreadTarget: number;
  triggerSpread: number;
}

export interface FillOutcome {
  position: Position;
  applied: boolean;
}

const EPSILON = 1e-9;
const ACTIVE_STATES: readonly PositionState[] = ['OPENING', 'OPEN', 'CLOSING'];

const round = (v: number): number => Number(v.toFixed(8));

export const isActive = (position: Pick<Position, 'state'>): boolean => ACTIVE_STATES.includes(position.state);

export const remainingContracts = (position: Pick<Position, 'filledContracts' | 'exitedContracts'>): number =>
  round(position.filledContracts - position.exitedContracts);

const formatId = (seq: number): string => `pos_${String(seq).padStart(6, '0')}`;

const hasFill = (position: Position, fillId: string): boolean =>
  position.entryFills.some((f) => f.id === fillId) || position.exitFills.some((f) => f.id === fillId);

/**
 * Owns every Position. Mutations run inside one store transaction each, so a
 * tick and a fill callback can never interleave on the same record.
 */
export class PositionLedger {
  constructor(
    private readonly store: StateStore,
    private readonly logger: EventLogger,
    private readonly clock: Clock = systemClock,
  ) {}

  async openDraft(input: OpenDraftInput): Promise<Position> {
    if (!(input.targetContracts > 0)) {
      throw new InvariantViolationError('targetContracts must be positive', { targetContracts: input.targetContracts });
    }

    const position = await this.store.transaction((state) => {
      const seq = state.nextPositionSeq;
      state.nextPositionSeq += 1;
      const now = isoAt(this.clock());

      const created: Position = {
        id: formatId(seq),
        seq,
        direction: input.direction,
        mode: input.mode,
        state: 'OPENING',
        targetContracts: round(input.targetContracts),
        filledContracts: 0,
        exitedContracts: 0,
        entryFills: [],
        exitFills: [],
        openedAt: now,
        updatedAt: now,
        exitSpreadTarget: input.exitSpreadTarget,
        triggerSpread: input.triggerSpread,
        closeRequested: false,
      };

      state.positions[created.id] = created;
      return structuredClone(created);
    });

    eventBus.emit('position.opened', { positionId: position.id, direction: position.direction, mode: position.mode });
    await this.logger.log('info', 'position.draft_opened', {
      positionId: position.id,
      direction: position.direction,
      mode: position.mode,
      targetContracts: position.targetContracts,
    });
    return position;
  }

  /**
   * Applies a paired entry fill. Replaying a fill id is a no-op. The position
   * becomes OPEN once `minFillRatio` of the target is filled.
   */
  async recordEntryFill(positionId: string, fill: PairFill, minFillRatio = 1): Promise<FillOutcome> {
    const outcome = await this.store.transaction((state) => {
      const position = this.require(state, positionId);
      if (hasFill(position, fill.id)) return { position: structuredClone(position), applied: false };

      if (position.state !== 'OPENING') {
        throw new DomainError(ErrorCode.InvalidTransition, 409, `Entry fill on ${position.state} position.`, {
          positionId,
          fillId: fill.id,
        });
      }

      const filled = round(position.filledContracts + fill.contracts);
      this.assertBounds(position, { filled, exited: position.exitedContracts, fill });

      position.entryFills.push(structuredClone(fill));
      position.filledContracts = filled;
      position.updatedAt = isoAt(this.clock());
      if (filled + EPSILON >= position.targetContracts * minFillRatio) {
        position.state = 'OPEN';
      }

      state.metrics.totalVolume = round(state.metrics.totalVolume + fill.legs.reduce((s, l) => s + l.price * l.contracts, 0));
      return { position: structuredClone(position), applied: true };
    });

    if (outcome.applied) {
      eventBus.emit('position.filled', { positionId, side: 'ENTRY', contracts: fill.contracts, state: outcome.position.state });
    }
    return outcome;
  }

  /**
   * Applies a paired exit (or unwind) fill. A CLOSING position whose exits
   * cover its filled contracts becomes CLOSED.
   */
  async recordExitFill(positionId: string, fill: PairFill): Promise<FillOutcome & { closed: boolean }> {
    const outcome = await this.store.transaction((state) => {
      const position = this.require(state, positionId);
      if (hasFill(position, fill.id)) return { position: structuredClone(position), applied: false, closed: false };

      if (position.state !== 'CLOSING' && position.state !== 'FAILED_OPEN') {
        throw new DomainError(ErrorCode.InvalidTransition, 409, `Exit fill on ${position.state} position.`, {
          positionId,
          fillId: fill.id,
        });
      }

      const exited = round(position.exitedContracts + fill.contracts);
      this.assertBounds(position, { filled: position.filledContracts, exited, fill });

      const now = isoAt(this.clock());
      position.exitFills.push(structuredClone(fill));
      position.exitedContracts = exited;
      position.updatedAt = now;

      let closed = false;
      if (position.state === 'CLOSING' && exited + EPSILON >= position.filledContracts) {
        position.state = 'CLOSED';
        position.closedAt = now;
        state.metrics.positionsClosed += 1;
        closed = true;
      }

      state.metrics.totalVolume = round(state.metrics.totalVolume + fill.legs.reduce((s, l) => s + l.price * l.contracts, 0));
      return { position: structuredClone(position), applied: true, closed };
    });

    if (outcome.closed) {
      eventBus.emit('position.closed', { positionId, reason: outcome.position.closeReason });
    }
    return outcome;
  }

  /** OPENING → FAILED_OPEN. The caller unwinds `remainingContracts` of the result. */
  async markFailedOpen(positionId: string, reason: string): Promise<Position> {
    const position = await this.store.transaction((state) => {
      const p = this.require(state, positionId);
      if (p.state === 'FAILED_OPEN') return structuredClone(p);
      if (p.state !== 'OPENING') {
        throw new DomainError(ErrorCode.InvalidTransition, 409, `Cannot fail a ${p.state} position.`, { positionId });
      }

      p.state = 'FAILED_OPEN';
      p.failureReason = reason;
      p.updatedAt = isoAt(this.clock());
      state.metrics.positionsFailed += 1;
      return structuredClone(p);
    });

    eventBus.emit('position.failed', { positionId, reason, unwindContracts: remainingContracts(position) });
    await this.logger.log('warn', 'position.failed_open', {
      positionId,
      reason,
      filledContracts: position.filledContracts,
    });
    return position;
  }

  /** OPEN → CLOSING. Idempotent for a position already closing. */
  async markClosing(positionId: string, reason: string): Promise<Position> {
    return this.store.transaction((state) => {
      const p = this.require(state, positionId);
      if (p.state === 'CLOSING') return structuredClone(p);
      if (p.state !== 'OPEN') {
        throw new DomainError(ErrorCode.InvalidTransition, 409, `Cannot close a ${p.state} position.`, { positionId });
      }
      p.state = 'CLOSING';
      p.closeReason = reason;
      p.updatedAt = isoAt(this.clock());
      return structuredClone(p);
    });
  }

  async requestClose(positionId: string, reason: string): Promise<Position> {
    return this.store.transaction((state) => {
      const p = this.require(state, positionId);
      if (!isActive(p)) {
        throw new DomainError(ErrorCode.InvalidTransition, 409, `Position is already ${p.state}.`, { positionId });
      }
      p.closeRequested = true;
      p.closeReason = p.closeReason ?? reason;
      p.updatedAt = isoAt(this.clock());
      return structuredClone(p);
    });
  }

  async touchOrder(positionId: string, nowMs: number = this.clock()): Promise<void> {
    await this.store.transaction((state) => {
      const p = this.require(state, positionId);
      p.lastOrderAt = isoAt(nowMs);
      return undefined;
    });
  }

  async settle(positionId: string, realizedPnl: number, fees: number): Promise<Position> {
    return this.store.transaction((state) => {
      const p = this.require(state, positionId);
      p.realizedPnl = round(realizedPnl);
      state.metrics.settledTrades += 1;
      if (realizedPnl > 0) state.metrics.winningTrades += 1;
      state.metrics.totalRealizedPnl = round(state.metrics.totalRealizedPnl + realizedPnl);
      state.metrics.totalFees = round(state.metrics.totalFees + fees);
      return structuredClone(p);
    });
  }

  /**
   * Moves settled positions beyond the newest `retain` out of the state file.
   * Each one is written to the event log before it is dropped.
   */
  async archiveSettled(retain: number): Promise<number> {
    const archived = await this.store.transaction((state) => {
      const settled = Object.values(state.positions)
        .filter((p) => p.realizedPnl !== undefined && !isActive(p) && remainingContracts(p) <= EPSILON)
        .sort((a, b) => a.seq - b.seq);
      const excess = settled.slice(0, Math.max(0, settled.length - retain));
      for (const p of excess) delete state.positions[p.id];
      state.metrics.positionsArchived += excess.length;
      return excess;
    });

    for (const position of archived) {
      await this.logger.log('info', 'position.archived', { position });
    }
    return archived.length;
  }

  get(positionId: string): Position | undefined {
    return this.store.read((state) => state.positions[positionId]);
  }

  list(): Position[] {
    return this.store.read((state) => Object.values(state.positions)).sort((a, b) => a.seq - b.seq);
  }

  /** Positions in state OPEN. */
  listOpen(): Position[] {
    return this.list().filter((p) => p.state === 'OPEN');
  }

  /** Positions not yet terminal: OPENING, OPEN or CLOSING. */
  listActive(): Position[] {
    return this.list().filter(isActive);
  }

  /** FAILED_OPEN positions that still carry unhedged-back contracts. */
  listPendingUnwind(): Position[] {
    return this.list().filter((p) => p.state === 'FAILED_OPEN' && remainingContracts(p) > EPSILON);
  }

  ageOf(positionId: string, nowMs: number = this.clock()): number {
    const position = this.get(positionId);
    if (!position) {
      throw new DomainError(ErrorCode.PositionNotFound, 404, `Position '${positionId}' not found.`);
    }
    return elapsedMs(position.openedAt, nowMs);
  }

  /** Active positions plus failed opens that still hold contracts. */
  exposedCount(): number {
    return this.listActive().length + this.listPendingUnwind().length;
  }

  /**
   * Contracts committed in `direction`: active positions at target size, and
   * failed opens at what is still left to unwind.
   */
  directionContracts(direction: Direction): number {
    const active = this.listActive()
      .filter((p) => p.direction === direction)
      .reduce((sum, p) => sum + p.targetContracts, 0);
    const unwinding = this.listPendingUnwind()
      .filter((p) => p.direction === direction)
      .reduce((sum, p) => sum + remainingContracts(p), 0);
    return round(active + unwinding);
  }

  private require(state: AppState, positionId: string): Position {
    const position = state.positions[positionId];
    if (!position) {
      throw new DomainError(ErrorCode.PositionNotFound, 404, `Position '${positionId}' not found.`);
    }
    return position;
  }

  private assertBounds(position: Position, next: { filled: number; exited: number; fill: PairFill }): void {
    const { filled, exited, fill } = next;
    if (!(fill.contracts > 0)) {
      throw new InvariantViolationError('Fill contracts must be positive', { positionId: position.id, fillId: fill.id });
    }
    if (filled < 0 || filled > position.targetContracts + EPSILON) {
      throw new InvariantViolationError('filledContracts out of bounds', {
        positionId: position.id,
        filled,
        target: position.targetContracts,
      });
    }
    if (exited < 0 || exited > filled + EPSILON) {
      throw new InvariantViolationError('exitedContracts exceed filledContracts', {
        positionId: position.id,
        exited,
        filled,
      });
    }
  }
}
