export const CERTIFICATE_CONFIG = 'CERTIFICATE_CONFIG';
