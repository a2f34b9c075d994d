/**
 * Counters exposed at GET /metrics. Totals only grow; `active_total` and
 * `uptime_seconds` are computed when read.
 */
export interface Metrics {
  versions: {
    requests_total: number;
  };

  authentication: {
    requests_total: number;
    browser_total: number;
    mobile_total: number;
    frictionless_total: number;
    challenge_total: number;
    /** AReqs refused before a transaction was stored */
    rejected_total: number;
  };

  challenge: {
    mobile_requests_total: number;
    browser_forms_total: number;
    decrypt_failures_total: number;
    otp_success_total: number;
    otp_failure_total: number;
  };

  signing: {
    signed_total: number;
    /** ARes built with the static signed content */
    fallback_total: number;
  };

  transactions: {
    active_total: number;
    results_total: number;
  };

  server: {
    uptime_seconds: number;
  };
}
