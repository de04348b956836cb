import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { DataSource } from 'typeorm';
import { RailsApiService } from '../rails-api/rails-api.service';
import { HealthProbeResult, HealthStatus } from './dto/health-check.dto';

const DEFAULT_PROBE_TIMEOUT_MS = 5000;

/**
 * HealthCheckService
 *
 * Probes the database and the planning backend for the readiness
 * endpoint. Each probe is bounded by HEALTH_PROBE_TIMEOUT_MS and the two
 * run in parallel.
 *
 * Only the database gates readiness: the service keeps handling mail
 * while the planning backend is away, so a failed upstream check is
 * reported as degraded.
 */
@Injectable()
export class HealthCheckService {
  private readonly logger = new Logger(HealthCheckService.name);
  private readonly probeTimeout: number;

  private readonly thresholds = {
    database: { degraded: 100, unhealthy: 500 },
  };

  constructor(
    private readonly dataSource: DataSource,
    private readonly railsApiService: RailsApiService,
    private readonly configService: ConfigService,
  ) {
    this.probeTimeout =
      Number(this.configService.get<string>('HEALTH_PROBE_TIMEOUT_MS')) ||
      DEFAULT_PROBE_TIMEOUT_MS;
  }

  async checkReadiness(): Promise<Record<string, HealthProbeResult>> {
    const [database, upstreamApi] = await Promise.all([
      this.probeDatabase(),
      this.probeUpstreamApi(),
    ]);

    if (database.status === 'unhealthy') {
      this.logger.warn(`Database probe failed: ${database.error ?? 'unknown'}`);
    }

    return { database, upstreamApi };
  }

  /**
   * Rejects with 'Probe timeout' if the probe has not settled in time.
   */
  private async withTimeout<T>(probe: Promise<T>): Promise<T> {
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => reject(new Error('Probe timeout')), this.probeTimeout);
    });

    try {
      return await Promise.race([probe, timeout]);
    } finally {
      clearTimeout(timer);
    }
  }

  /**
   * PostgreSQL probe: SELECT 1 via the TypeORM DataSource.
   * Healthy: < 100ms, Degraded: < 500ms, Unhealthy: slower, timeout or error.
   */
  private async probeDatabase(): Promise<HealthProbeResult> {
    const startTime = Date.now();
    try {
      await this.withTimeout(this.dataSource.query('SELECT 1'));
      const responseTimeMs = Date.now() - startTime;

      let status: HealthStatus = 'healthy';
      if (responseTimeMs >= this.thresholds.database.unhealthy) {
        status = 'unhealthy';
      } else if (responseTimeMs >= this.thresholds.database.degraded) {
        status = 'degraded';
      }

      return {
        status,
        responseTimeMs,
        lastChecked: new Date().toISOString(),
      };
    } catch (error) {
      return {
        status: 'unhealthy',
        responseTimeMs: Date.now() - startTime,
        error: error instanceof Error ? error.message : 'Database probe failed',
        lastChecked: new Date().toISOString(),
      };
    }
  }

  private async probeUpstreamApi(): Promise<HealthProbeResult> {
    const startTime = Date.now();
    let reachable: boolean;
    let error: string | undefined;

    try {
      reachable = await this.withTimeout(this.railsApiService.validateConnection());
    } catch (probeError) {
      reachable = false;
      error = probeError instanceof Error ? probeError.message : 'Upstream API probe failed';
    }

    return {
      status: reachable ? 'healthy' : 'degraded',
      responseTimeMs: Date.now() - startTime,
      ...(reachable ? {} : { error: error ?? 'Upstream API health check failed' }),
      lastChecked: new Date().toISOString(),
    };
  }
}
