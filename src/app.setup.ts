import { ValidationPipe } from '@nestjs/common';
import type { NestExpressApplication } from '@nestjs/platform-express';
import { text } from 'express';
import { MOBILE_CHALLENGE_PATH } from './three-ds/three-ds.constants';

/**
 * Pipes and body parsers shared by the server bootstrap and the e2e harness.
 * Must run before `init()`, which mounts the default json and urlencoded parsers.
 */
export function configureApp(app: NestExpressApplication): NestExpressApplication {
  // Unknown AReq fields are stripped, not rejected
  app.useGlobalPipes(
    new ValidationPipe({
      whitelist: true,
      forbidNonWhitelisted: false,
      transform: true,
    }),
  );

  // SDKs send the compact JWE under any content type
  app.use(MOBILE_CHALLENGE_PATH, text({ type: () => true }));

  return app;
}
