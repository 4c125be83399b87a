import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { Logger } from '@nestjs/common';
import type { ConfigType } from '@nestjs/config';
import { DocumentBuilder, SwaggerModule } from '@nestjs/swagger';
import { AppModule } from './app.module';
import { configureApp } from './app.setup';
import appConfig from './config/app.config';
import { USER_ID_HEADER_DISPLAY } from './common/constants/headers.constant';

async function bootstrap() {
  const logger = new Logger('Bootstrap');

  const app = await NestFactory.create(AppModule, { bufferLogs: true });
  const config = app.get<ConfigType<typeof appConfig>>(appConfig.KEY);
  app.useLogger(config.logLevels);

  configureApp(app);
  app.enableShutdownHooks();

  //Swagger documentation
  if (config.nodeEnv !== 'production') {
    const document = SwaggerModule.createDocument(
      app,
      new DocumentBuilder()
        .setTitle('Reminder Service')
        .setDescription('Per-user dated reminders')
        .setVersion('1.0')
        .addApiKey(
          { type: 'apiKey', in: 'header', name: USER_ID_HEADER_DISPLAY },
          'user-id',
        )
        .build(),
    );
    SwaggerModule.setup('api/docs', app, document);
  }

  await app.listen(config.port);
  logger.log(`Application is running on: http://localhost:${config.port}/api/v1`);
  logger.log(`API Documentation: http://localhost:${config.port}/api/docs`);
  logger.log(`Health Check: http://localhost:${config.port}/api/v1/health`);
}

bootstrap().catch((error: unknown) => {
  new Logger('Bootstrap').error(
    'Application failed to start',
    error instanceof Error ? error.stack : String(error),
  );
  process.exit(1);
});
