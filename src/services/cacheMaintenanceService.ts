import type { CacheManager, CacheRefreshResult } from '../domain/cache/cacheManager.js';
import type { SourceSelector } from '../domain/types/packageIndex.js';
import { createChildLogger } from '../utils/logger.js';

const logger = createChildLogger({ service: 'CacheMaintenanceService' });

export interface RefreshTelemetry {
  startTime: Date;
  endTime: Date;
  duration: number;
  source: SourceSelector | 'options';
  version: string;
  rebuilt: boolean;
  packageCount?: number;
  success: boolean;
  error?: string;
}

export interface CacheMaintenanceHooks {
  onRefreshStart?: (source: SourceSelector | 'options') => void;
  onRefreshComplete?: (telemetry: RefreshTelemetry) => void;
  onRefreshError?: (error: Error, source: SourceSelector | 'options') => void;
}

/**
 * Wraps CacheManager refreshes with telemetry and lifecycle hooks
 */
export class CacheMaintenanceService {
  private lastTelemetry: RefreshTelemetry | null = null;

  constructor(
    private readonly cacheManager: Pick<CacheManager, 'ensureFresh' | 'ensureOptions'>,
    private readonly hooks: CacheMaintenanceHooks = {},
  ) {}

  refresh(source: SourceSelector): Promise<CacheRefreshResult> {
    return this.track(source, () => this.cacheManager.ensureFresh(source));
  }

  refreshOptions(): Promise<CacheRefreshResult> {
    return this.track('options', () => this.cacheManager.ensureOptions());
  }

  getLastTelemetry(): RefreshTelemetry | null {
    return this.lastTelemetry;
  }

  private async track(
    source: SourceSelector | 'options',
    run: () => Promise<CacheRefreshResult>,
  ): Promise<CacheRefreshResult> {
    const startTime = new Date();
    logger.info({ source }, 'Cache refresh initiated');

    this.hooks.onRefreshStart?.(source);

    try {
      const result = await run();
      const endTime = new Date();
      const telemetry: RefreshTelemetry = {
        startTime,
        endTime,
        duration: endTime.getTime() - startTime.getTime(),
        source,
        version: result.version,
        rebuilt: result.rebuilt,
        packageCount: result.packageCount,
        success: true,
      };

      logger.info(
        { source, duration: telemetry.duration, version: result.version, rebuilt: result.rebuilt },
        'Cache refresh completed',
      );

      this.lastTelemetry = telemetry;
      this.hooks.onRefreshComplete?.(telemetry);
      return result;
    } catch (error) {
      const endTime = new Date();
      const duration = endTime.getTime() - startTime.getTime();
      const err = error instanceof Error ? error : new Error(String(error));

      logger.error({ err, source, duration }, 'Cache refresh failed');

      this.lastTelemetry = {
        startTime,
        endTime,
        duration,
        source,
        version: '',
        rebuilt: false,
        success: false,
        error: err.message,
      };
      this.hooks.onRefreshError?.(err, source);

      throw error;
    }
  }
}
