import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { DocumentBuilder, SwaggerModule } from '@nestjs/swagger';
import { resolveLogLevels } from '../../../libs/common/src';
import { AppModule } from './app.module';
import { configureGatewayApp } from './bootstrap';

async function bootstrap() {
  const app = await NestFactory.create(AppModule, {
    bodyParser: false,
    logger: resolveLogLevels(process.env.LOG_LEVEL),
  });
  const logger = new Logger('Bootstrap');
  const config = configureGatewayApp(app);

  if (config.app.nodeEnv !== 'production') {
    const document = SwaggerModule.createDocument(
      app,
      new DocumentBuilder()
        .setTitle('API Gateway')
        .setDescription('Verifies access tokens locally and forwards to backend services')
        .setVersion('1.0')
        .addBearerAuth()
        .build(),
    );
    SwaggerModule.setup('docs', app, document);
    logger.log('Swagger documentation available at /docs');
  }

  await app.listen(config.app.port);
  logger.log(`Gateway is running on: http://localhost:${config.app.port}`);
  logger.log(`Verifying tokens with key from ${config.issuer.publicKeyUrl}`);
}

bootstrap().catch((err: unknown) => {
  new Logger('Bootstrap').error(
    `Gateway failed to start: ${err instanceof Error ? err.message : String(err)}`,
    err instanceof Error ? err.stack : undefined,
  );
  process.exit(1);
});
