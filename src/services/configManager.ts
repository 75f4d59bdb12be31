import { ZodError } from 'zod';
import { AppConfig, validateThresholds } from '../config.js';
import { DomainError, ErrorCode } from '../errors/taxonomy.js';
import { eventBus } from '../infra/eventBus.js';
import { EventLogger } from '../infra/logger.js';
import { ExecutionMode, ThresholdConfig, ThresholdUpdate } from '../types.js';

const freeze = (config: ThresholdConfig): ThresholdConfig =>
  Object.freeze({ ...config, spreadOffsets: Object.freeze({ ...config.spreadOffsets }) });

/**
 * Holds the tunable thresholds and the global mode. Readers get a frozen
 * snapshot; updates build a new snapshot and swap the reference.
 */
export class ConfigManager {
  private current: ThresholdConfig;
  private mode: ExecutionMode;

  constructor(
    initial: AppConfig['thresholds'],
    private readonly trading: Pick<AppConfig['trading'], 'defaultMode' | 'liveEnabled'>,
    private readonly logger?: EventLogger,
  ) {
    this.current = freeze({ ...validateThresholds(initial), version: 1 });
    this.mode = trading.defaultMode;
  }

  currentConfig(): ThresholdConfig {
    return this.current;
  }

  /** Mode assigned to positions created from now on. */
  currentMode(): ExecutionMode {
    return this.mode;
  }

  async setMode(mode: ExecutionMode): Promise<ExecutionMode> {
    if (mode === 'REAL' && !this.trading.liveEnabled) {
      throw new DomainError(ErrorCode.InvalidPayload, 400, 'Live trading is disabled by configuration.');
    }

    const previous = this.mode;
    this.mode = mode;
    if (previous !== mode) {
      eventBus.emit('mode.changed', { from: previous, to: mode });
      await this.logger?.log('warn', 'config.mode_changed', { from: previous, to: mode });
    }
    return mode;
  }

  async updateThresholds(update: ThresholdUpdate): Promise<ThresholdConfig> {
    const base = this.current;
    const { version: _version, ...fields } = base;

    let validated: Omit<ThresholdConfig, 'version'>;
    try {
      validated = validateThresholds({
        ...fields,
        ...update,
        spreadOffsets: { ...fields.spreadOffsets, ...update.spreadOffsets },
      });
    } catch (error) {
      if (error instanceof ZodError) {
        throw new DomainError(ErrorCode.InvalidPayload, 400, 'Invalid threshold update.', { issues: error.flatten() });
      }
      throw error;
    }

    const next = freeze({ ...validated, version: base.version + 1 });
    this.current = next;

    eventBus.emit('config.updated', { version: next.version, changed: Object.keys(update) });
    await this.logger?.log('info', 'config.thresholds_updated', { version: next.version, update });
    return next;
  }
}
