export * from './version.dto';
export * from './authenticate-request.dto';
export * from './authenticate-response.dto';
export * from './results.dto';
export * from './final.dto';
