import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { DocumentBuilder, SwaggerModule } from '@nestjs/swagger';
import { resolveLogLevels } from '../../../libs/common/src';
import { AppModule } from './app.module';
import { configureIssuerApp } from './bootstrap';

async function bootstrap() {
  const app = await NestFactory.create(AppModule, {
    logger: resolveLogLevels(process.env.LOG_LEVEL),
  });
  const logger = new Logger('Bootstrap');
  const config = configureIssuerApp(app);

  // Swagger Documentation
  if (config.app.nodeEnv !== 'production') {
    const document = SwaggerModule.createDocument(
      app,
      new DocumentBuilder()
        .setTitle('Auth Service API')
        .setDescription('Issues RS256-signed access and refresh tokens')
        .setVersion('1.0')
        .addBearerAuth()
        .build(),
    );
    SwaggerModule.setup('api/docs', app, document);
    logger.log('Swagger documentation available at /api/docs');
  }

  await app.listen(config.app.port);
  logger.log(`Auth service is running on: http://localhost:${config.app.port}`);
}

bootstrap().catch((err: unknown) => {
  new Logger('Bootstrap').error(
    `Auth service failed to start: ${err instanceof Error ? err.message : String(err)}`,
    err instanceof Error ? err.stack : undefined,
  );
  process.exit(1);
});
