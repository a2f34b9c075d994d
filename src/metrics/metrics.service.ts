import { Injectable, Logger } from '@nestjs/common';
import type { MetricPath } from './metrics.constants';
import { Metrics } from './interfaces';
import { isRecord } from '../shared/object.utils';
import { getErrorMessage } from '../shared/error.utils';

/**
 * @class MetricsService
 * @description In-memory counters for version lookups, authentications,
 * challenges and signing. Values live for the lifetime of the process.
 */
@Injectable()
export class MetricsService {
  private readonly logger = new Logger(MetricsService.name);
  /** Timestamp when the service was initialized, used for uptime calculation */
  private readonly startTime: number = Date.now();

  private metrics: Metrics = {
    versions: {
      requests_total: 0,
    },
    authentication: {
      requests_total: 0,
      browser_total: 0,
      mobile_total: 0,
      frictionless_total: 0,
      challenge_total: 0,
      rejected_total: 0,
    },
    challenge: {
      mobile_requests_total: 0,
      browser_forms_total: 0,
      decrypt_failures_total: 0,
      otp_success_total: 0,
      otp_failure_total: 0,
    },
    signing: {
      signed_total: 0,
      fallback_total: 0,
    },
    transactions: {
      active_total: 0,
      results_total: 0,
    },
    server: {
      uptime_seconds: 0,
    },
  };

  /**
   * Retrieves the current state of all metrics.
   * @returns A copy of all metrics with uptime calculated at call time.
   */
  getMetrics(): Readonly<Metrics> {
    const uptimeSeconds = Math.floor((Date.now() - this.startTime) / 1000);

    return {
      versions: { ...this.metrics.versions },
      authentication: { ...this.metrics.authentication },
      challenge: { ...this.metrics.challenge },
      signing: { ...this.metrics.signing },
      transactions: { ...this.metrics.transactions },
      server: {
        uptime_seconds: uptimeSeconds,
      },
    };
  }

  /**
   * Increments a specific metric by the given value.
   * An invalid path is logged and ignored.
   */
  increment(path: MetricPath, value: number = 1): void {
    this.update(path, 'increment', (current) => current + value);
  }

  set(path: MetricPath, value: number): void {
    this.update(path, 'set', () => value);
  }

  private update(path: string, operation: string, apply: (current: number) => number): void {
    try {
      const keys = path.split('.');
      let current: unknown = this.metrics;

      for (let i = 0; i < keys.length - 1; i++) {
        if (!isRecord(current) || !isRecord(current[keys[i]])) {
          throw new Error(`Invalid metric path: ${path} (key "${keys[i]}" not found)`);
        }
        current = current[keys[i]];
      }

      const finalKey = keys[keys.length - 1];
      const value = isRecord(current) ? current[finalKey] : undefined;
      if (!isRecord(current) || typeof value !== 'number') {
        throw new Error(`Invalid metric path: ${path} (not a number)`);
      }

      current[finalKey] = apply(value);
    } catch (error) {
      this.logger.error(`Failed to ${operation} metric ${path}: ${getErrorMessage(error)}`);
    }
  }
}
