/**
 * Configuration type definition for type-safe access
 */
export interface TdsConfiguration {
  environment: string;
  server: {
    host: string;
    port: number;
    publicBaseUrl: string;
    swaggerEnabled: boolean;
  };
  transaction: {
    ttl: number;
    cleanupInterval: number;
  };
  acs: {
    certPath: string;
    keyPath: string;
  };
  challenge: {
    defaultRedirectUrl: string;
  };
  throttle: {
    ttl: number;
    limit: number;
  };
}
