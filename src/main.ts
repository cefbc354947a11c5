import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { AppModule } from './app.module';
import { SwaggerModule, DocumentBuilder } from '@nestjs/swagger';
import { Logger, ValidationPipe } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';

async function bootstrap() {
  const app = await NestFactory.create(AppModule);
  const configService = app.get(ConfigService);
  const logger = new Logger('Bootstrap');

  app.enableCors({
    origin: configService.get<string>('CORS_ORIGIN', '*'),
  });

  // Query strings arrive as strings; DTO transforms turn them into lists and numbers
  app.useGlobalPipes(new ValidationPipe({ transform: true }));

  if (configService.get<string>('ENABLE_SWAGGER', 'true') !== 'false') {
    const config = new DocumentBuilder()
      .setTitle('Federated Search API')
      .setDescription('Search, category relevance and document lookup across collections')
      .setVersion('1.0')
      .build();
    const document = SwaggerModule.createDocument(app, config);
    SwaggerModule.setup(configService.get<string>('DOCS_PATH', 'docs'), app, document);
  }

  app.enableShutdownHooks();

  const port = Number(configService.get<string>('PORT', '3000'));
  const host = configService.get<string>('HOST', '0.0.0.0');

  await app.listen(port, host);
  logger.log(`Application is running on: ${await app.getUrl()}`);
}

bootstrap().catch((error: unknown) => {
  new Logger('Bootstrap').error(error instanceof Error ? error.stack : String(error));
  process.exit(1);
});
