export const METRIC_PATHS = {
  // Version lookups
  VERSION_REQUESTS_TOTAL: 'versions.requests_total',

  // Authentication
  AUTH_REQUESTS_TOTAL: 'authentication.requests_total',
  AUTH_BROWSER_TOTAL: 'authentication.browser_total',
  AUTH_MOBILE_TOTAL: 'authentication.mobile_total',
  AUTH_FRICTIONLESS_TOTAL: 'authentication.frictionless_total',
  AUTH_CHALLENGE_TOTAL: 'authentication.challenge_total',
  AUTH_REJECTED_TOTAL: 'authentication.rejected_total',

  // Challenge
  CHALLENGE_MOBILE_REQUESTS_TOTAL: 'challenge.mobile_requests_total',
  CHALLENGE_BROWSER_FORMS_TOTAL: 'challenge.browser_forms_total',
  CHALLENGE_DECRYPT_FAILURES_TOTAL: 'challenge.decrypt_failures_total',
  CHALLENGE_OTP_SUCCESS_TOTAL: 'challenge.otp_success_total',
  CHALLENGE_OTP_FAILURE_TOTAL: 'challenge.otp_failure_total',

  // ACS signed content
  SIGNING_SIGNED_TOTAL: 'signing.signed_total',
  SIGNING_FALLBACK_TOTAL: 'signing.fallback_total',

  // Transactions
  TRANSACTIONS_ACTIVE_TOTAL: 'transactions.active_total',
  TRANSACTIONS_RESULTS_TOTAL: 'transactions.results_total',
} as const;

export type MetricPath = (typeof METRIC_PATHS)[keyof typeof METRIC_PATHS];
