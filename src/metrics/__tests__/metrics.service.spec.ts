import { Test, TestingModule } from '@nestjs/testing';
import { MetricsService } from '../metrics.service';
import { METRIC_PATHS } from '../metrics.constants';

describe('MetricsService', () => {
  let service: MetricsService;

  beforeEach(async () => {
    jest.useFakeTimers();
    jest.setSystemTime(new Date('2024-01-01T00:00:00.000Z'));

    const module: TestingModule = await Test.createTestingModule({
      providers: [MetricsService],
    }).compile();

    service = module.get<MetricsService>(MetricsService);
  });

  afterEach(() => {
    jest.useRealTimers();
  });

  it('starts with every counter at zero', () => {
    expect(service.getMetrics()).toEqual({
      versions: { requests_total: 0 },
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
      signing: { signed_total: 0, fallback_total: 0 },
      transactions: { active_total: 0, results_total: 0 },
      server: { uptime_seconds: 0 },
    });
  });

  it('returns a copy that later updates do not change', () => {
    const before = service.getMetrics();
    service.increment(METRIC_PATHS.VERSION_REQUESTS_TOTAL);

    expect(before.versions.requests_total).toBe(0);
    expect(service.getMetrics().versions.requests_total).toBe(1);
  });

  it('computes uptime from the start time', () => {
    jest.advanceTimersByTime(61_500);

    expect(service.getMetrics().server.uptime_seconds).toBe(61);
  });

  describe('increment', () => {
    it('adds one by default', () => {
      service.increment(METRIC_PATHS.AUTH_MOBILE_TOTAL);
      service.increment(METRIC_PATHS.AUTH_MOBILE_TOTAL);

      expect(service.getMetrics().authentication.mobile_total).toBe(2);
    });

    it('adds the given value', () => {
      service.increment(METRIC_PATHS.CHALLENGE_OTP_FAILURE_TOTAL, 3);

      expect(service.getMetrics().challenge.otp_failure_total).toBe(3);
    });
  });

  it('sets a gauge', () => {
    service.set(METRIC_PATHS.TRANSACTIONS_ACTIVE_TOTAL, 7);
    service.set(METRIC_PATHS.TRANSACTIONS_ACTIVE_TOTAL, 4);

    expect(service.getMetrics().transactions.active_total).toBe(4);
  });

  it('leaves other sections untouched', () => {
    service.increment(METRIC_PATHS.CHALLENGE_DECRYPT_FAILURES_TOTAL);

    const metrics = service.getMetrics();
    expect(metrics.challenge.decrypt_failures_total).toBe(1);
    expect(metrics.challenge.mobile_requests_total).toBe(0);
    expect(metrics.authentication.requests_total).toBe(0);
  });
});
