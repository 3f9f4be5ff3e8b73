import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { Logger } from '@nestjs/common';
import { DocumentBuilder, SwaggerModule } from '@nestjs/swagger';
import { AppModule } from './app.module';

async function bootstrap() {
  const app = await NestFactory.create(AppModule);
  const logger = new Logger('Bootstrap');

  app.enableShutdownHooks();

  // Setup Swagger documentation
  const config = new DocumentBuilder()
    .setTitle('Artifact Transfer Service API')
    .setDescription(
      'Uploads experiment artifacts to S3, downloads objects and pulls messages from SQS',
    )
    .setVersion('1.0')
    .addTag('Artifacts', 'Upload and download of experiment artifacts')
    .addTag('Queue', 'Receiving and deleting queue messages')
    .build();

  const document = SwaggerModule.createDocument(app, config);
  SwaggerModule.setup('api', app, document);

  const port = process.env.APP_PORT ?? 4000;

  await app.listen(port);

  logger.log(`Application is running on: http://localhost:${port}`);
  logger.log(`Swagger documentation: http://localhost:${port}/api`);
}

bootstrap().catch((error: unknown) => {
  Logger.error('Failed to start application', error);
  process.exit(1);
});
