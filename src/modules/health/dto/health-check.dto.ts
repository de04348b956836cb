/**
 * Health check response shapes.
 */

export type HealthStatus = 'healthy' | 'degraded' | 'unhealthy';

export interface HealthProbeResult {
  status: HealthStatus;
  responseTimeMs: number;
  error?: string;
  lastChecked: string; // ISO timestamp
}

export interface HealthLivenessDto {
  status: 'ok';
  timestamp: string;
  uptime: number;
}

export interface HealthReadinessDto {
  status: 'ready' | 'not_ready';
  timestamp: string;
  checks: Record<string, { status: HealthStatus; responseTimeMs: number; error?: string }>;
}
