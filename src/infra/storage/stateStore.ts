import fs from 'node:fs/promises';
import path from 'node:path';
import { AppState } from '../../types.js';
import { createDefaultState } from './defaultState.js';

const isMissingFile = (error: unknown): boolean =>
  error instanceof Error && 'code' in error && error.code === 'ENOENT';

/**
 * Single-writer JSON state. Every mutation runs inside `transaction`, which
 * chains on the previous one, so concurrent callers never interleave.
 */
export class StateStore {
  private state: AppState = createDefaultState();
  private lock: Promise<void> = Promise.resolve();

  constructor(private readonly stateFilePath: string) {}

  async init(): Promise<void> {
    await fs.mkdir(path.dirname(this.stateFilePath), { recursive: true });

    let raw: string;
    try {
      raw = await fs.readFile(this.stateFilePath, 'utf-8');
    } catch (error) {
      if (!isMissingFile(error)) throw error;
      this.state = createDefaultState();
      await this.persist();
      return;
    }

    const parsed = JSON.parse(raw) as AppState;
    const defaults = createDefaultState();
    this.state = {
      ...defaults,
      ...parsed,
      risk: { ...defaults.risk, ...parsed.risk },
      metrics: { ...defaults.metrics, ...parsed.metrics },
    };
  }

  snapshot(): AppState {
    return structuredClone(this.state);
  }

  /** Read without cloning the whole state. The selector must not leak references. */
  read<T>(selector: (state: Readonly<AppState>) => T): T {
    return structuredClone(selector(this.state));
  }

  async transaction<T>(work: (state: AppState) => Promise<T> | T): Promise<T> {
    const previous = this.lock;
    let release: () => void = () => {};

    this.lock = new Promise<void>((resolve) => {
      release = resolve;
    });

    await previous;
    try {
      const result = await work(this.state);
      await this.persist();
      return result;
    } finally {
      release();
    }
  }

  async flush(): Promise<void> {
    await this.lock;
    await this.persist();
  }

  private async persist(): Promise<void> {
    await fs.writeFile(this.stateFilePath, JSON.stringify(this.state, null, 2));
  }
}
