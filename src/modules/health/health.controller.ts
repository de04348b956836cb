import { Controller, Get, HttpCode, HttpStatus, Res } from '@nestjs/common';
import { ApiOperation, ApiTags } from '@nestjs/swagger';
import { Response } from 'express';
import { SkipThrottle } from '@nestjs/throttler';
import { HealthCheckService } from './health.service';
import { HealthLivenessDto, HealthReadinessDto } from './dto/health-check.dto';

/**
 * HealthController
 *
 * Liveness and readiness probes for the container platform. Excluded
 * from throttling and request logging.
 */
@ApiTags('Health')
@Controller('health')
@SkipThrottle()
export class HealthController {
  constructor(private readonly healthCheckService: HealthCheckService) {}

  /**
   * Liveness Probe: GET /health
   * Returns HTTP 200 while the process is running.
   */
  @Get()
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Liveness probe' })
  getLiveness(): HealthLivenessDto {
    return {
      status: 'ok',
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
    };
  }

  /**
   * Readiness Probe: GET /health/ready
   * Returns HTTP 503 while any gating dependency is unhealthy.
   */
  @Get('ready')
  @ApiOperation({ summary: 'Readiness probe (database and planning backend)' })
  async getReadiness(@Res({ passthrough: true }) res: Response): Promise<HealthReadinessDto> {
    const checks = await this.healthCheckService.checkReadiness();

    const hasUnhealthy = Object.values(checks).some(
      (check) => check.status === 'unhealthy',
    );

    if (hasUnhealthy) {
      res.status(HttpStatus.SERVICE_UNAVAILABLE);
    }

    return {
      status: hasUnhealthy ? 'not_ready' : 'ready',
      timestamp: new Date().toISOString(),
      checks: Object.fromEntries(
        Object.entries(checks).map(([key, val]) => [
          key,
          {
            status: val.status,
            responseTimeMs: val.responseTimeMs,
            ...(val.error ? { error: val.error } : {}),
          },
        ]),
      ),
    };
  }
}
