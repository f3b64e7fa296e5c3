import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { ValidationPipe } from '@nestjs/common';
import { DocumentBuilder, SwaggerModule } from '@nestjs/swagger';
import { Logger } from 'nestjs-pino';
import { AppModule } from './app.module';
import { AllExceptionsFilter } from './shared/filters/all-exceptions.filter';
import { LoggingInterceptor } from './shared/interceptors/logging.interceptor';
import { INJECTION_TOKENS } from './shared/constants/injection-tokens';
import type { AppConfig } from './shared/config/app.config';

async function bootstrap() {
  const app = await NestFactory.create(AppModule, { bufferLogs: true });

  // Structured logging
  app.useLogger(app.get(Logger));

  // Global validation pipe
  app.useGlobalPipes(
    new ValidationPipe({
      whitelist: true,
      transform: true,
      forbidNonWhitelisted: true,
    }),
  );

  // Global exception filter
  app.useGlobalFilters(new AllExceptionsFilter());

  // Global logging interceptor
  app.useGlobalInterceptors(new LoggingInterceptor());

  app.enableCors();

  // Swagger
  const config = new DocumentBuilder()
    .setTitle('Customer Revenue Service')
    .setDescription(
      'Computes total revenue per customer from sales transactions. ' +
        'Reads the fact_sales table or a prepared CSV file, and also aggregates rows posted as JSON or CSV. ' +
        'Malformed rows are skipped and reported, never fatal.',
    )
    .setVersion('1.0')
    .addTag('revenue', 'Per-customer revenue aggregation')
    .addTag('health', 'Service health checks')
    .build();

  const document = SwaggerModule.createDocument(app, config);
  SwaggerModule.setup('api/docs', app, document, {
    swaggerOptions: {
      tagsSorter: 'alpha',
      operationsSorter: 'alpha',
    },
  });

  const { port } = app.get<AppConfig>(INJECTION_TOKENS.APP_CONFIG);
  await app.listen(port);

  const logger = app.get(Logger);
  logger.log(`Application running on http://localhost:${port}`);
  logger.log(`Swagger UI available at http://localhost:${port}/api/docs`);
}
void bootstrap();
