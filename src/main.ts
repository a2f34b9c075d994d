import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { NestExpressApplication } from '@nestjs/platform-express';
import { ConfigService } from '@nestjs/config';
import { Logger } from '@nestjs/common';
import { SwaggerModule, DocumentBuilder } from '@nestjs/swagger';
import { AppModule } from './app.module';
import { configureApp } from './app.setup';
import { logConfigurationSummary } from './config/config.utils';
import type { TdsConfiguration } from './config/config.types';
import { getErrorMessage, getErrorStack } from './shared/error.utils';

/**
 * BootStrap
 */
async function bootstrap() {
  const logger = new Logger('bootstrap');

  try {
    const isDevelopment = process.env.NODE_ENV === 'development';
    const app = await NestFactory.create<NestExpressApplication>(AppModule, {
      logger: isDevelopment ? ['log', 'error', 'warn', 'debug', 'verbose'] : ['log', 'error', 'warn'],
    });

    configureApp(app);
    app.enableShutdownHooks();

    const config = app.get<ConfigService>(ConfigService);
    const tdsConfig = config.get<TdsConfiguration>('tds');
    if (!tdsConfig) {
      logger.error('Configuration namespace "tds" failed to load');
      process.exit(1);
    }

    const shutdown = async (signal: string) => {
      logger.log(`Received ${signal}, starting graceful shutdown`);
      try {
        await app.close();
        logger.log('Application closed successfully');
        process.exit(0);
      } catch (shutdownError) {
        logger.error(`Error during shutdown: ${getErrorMessage(shutdownError)}`, getErrorStack(shutdownError));
        process.exit(1);
      }
    };

    const handleSignal = (signal: NodeJS.Signals) => {
      void shutdown(signal);
    };

    process.on('SIGTERM', handleSignal);
    process.on('SIGINT', handleSignal);

    if (tdsConfig.environment === 'development') {
      app.enableCors();
      logger.log(`RUNNING IN DEVELOPMENT MODE`);
      logConfigurationSummary(tdsConfig);
    }

    if (tdsConfig.server.swaggerEnabled) {
      const swaggerConfig = new DocumentBuilder()
        .setTitle('Mock 3-D Secure Server')
        .setDescription('Versioning, authentication, results and challenge endpoints of a mock 3DS 2.2.0 server.')
        .setVersion('1.0')
        .build();
      const document = SwaggerModule.createDocument(app, swaggerConfig);
      SwaggerModule.setup('api-docs', app, document);
      logger.log('Swagger UI is available at /api-docs');
    }

    await app.listen(tdsConfig.server.port);

    logger.log(`HTTP port: ${tdsConfig.server.port}`);
    logger.log(`Public base URL: ${tdsConfig.server.publicBaseUrl}`);
    logger.log('Mock 3DS server is ready');
  } catch (error) {
    logger.error(`Failed to bootstrap application: ${getErrorMessage(error)}`, getErrorStack(error));
    process.exit(1);
  }
}
bootstrap().catch((error) => {
  const logger = new Logger('bootstrap');
  logger.error(`Unhandled bootstrap error: ${getErrorMessage(error)}`);
  process.exit(1);
});
