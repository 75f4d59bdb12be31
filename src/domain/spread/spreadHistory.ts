import { SpreadPair, Venue } from '../../types.js';

export interface SpreadPoint {
  at: number;
  entryV1ToV2: number;
  entryV2ToV1: number;
  exitV1ToV2: number;
  exitV2ToV1: number;
  bestEntry: number;
  bestExit: number;
  fresh: Record<Venue, boolean>;
}

export interface SpreadStatistics {
  count: number;
  avgEntry: number;
  maxEntry: number;
  avgExit: number;
  minExit: number;
  positiveEntries: number;
  negativeExits: number;
}

/** Bounded ring of spread observations for charting and session stats. */
export class SpreadHistory {
  private readonly points: SpreadPoint[] = [];

  constructor(private readonly maxPoints = 1000) {}

  record(at: number, spreads: SpreadPair, fresh: Record<Venue, boolean>): SpreadPoint {
    const point: SpreadPoint = {
      at,
      entryV1ToV2: spreads.V1_TO_V2.grossEntrySpread,
      entryV2ToV1: spreads.V2_TO_V1.grossEntrySpread,
      exitV1ToV2: spreads.V1_TO_V2.grossExitSpread,
      exitV2ToV1: spreads.V2_TO_V1.grossExitSpread,
      bestEntry: Math.max(spreads.V1_TO_V2.grossEntrySpread, spreads.V2_TO_V1.grossEntrySpread),
      bestExit: Math.max(spreads.V1_TO_V2.grossExitSpread, spreads.V2_TO_V1.grossExitSpread),
      fresh: { ...fresh },
    };

    this.points.push(point);
    if (this.points.length > this.maxPoints) {
      this.points.splice(0, this.points.length - this.maxPoints);
    }
    return point;
  }

  recent(limit = 100): SpreadPoint[] {
    return this.points.slice(-Math.max(0, limit)).map((p) => ({ ...p, fresh: { ...p.fresh } }));
  }

  statistics(): SpreadStatistics {
    if (this.points.length === 0) {
      return { count: 0, avgEntry: 0, maxEntry: 0, avgExit: 0, minExit: 0, positiveEntries: 0, negativeExits: 0 };
    }

    const entries = this.points.map((p) => p.bestEntry);
    const exits = this.points.map((p) => p.bestExit);
    const avg = (values: number[]): number => values.reduce((sum, v) => sum + v, 0) / values.length;

    return {
      count: this.points.length,
      avgEntry: avg(entries),
      maxEntry: Math.max(...entries),
      avgExit: avg(exits),
      minExit: Math.min(...exits),
      positiveEntries: entries.filter((v) => v > 0).length,
      negativeExits: exits.filter((v) => v < 0).length,
    };
  }

  clear(): void {
    this.points.length = 0;
  }

  get size(): number {
    return this.points.length;
  }
}
