export const BOOLEAN_TRUE_VALUES = ['true', '1', 'yes', 'on'];

// Configuration defaults
export const DEFAULT_SERVER_HOST = '127.0.0.1';
export const DEFAULT_SERVER_PORT = 8080;
export const DEFAULT_TRANSACTION_TTL = 1200; // 20 minutes
export const DEFAULT_TRANSACTION_CLEANUP_INTERVAL = 60; // 1 minute
export const DEFAULT_ACS_CERT_PATH = 'certs/acs-cert.pem';
export const DEFAULT_ACS_KEY_PATH = 'certs/acs-private-key.pem';
export const DEFAULT_REDIRECT_URL = 'https://merchant.example/3ds/complete';
export const DEFAULT_THROTTLE_TTL = 60000;
export const DEFAULT_THROTTLE_LIMIT = 1000;
export const ALLOWED_URL_PROTOCOLS = ['http:', 'https:'] as const;
