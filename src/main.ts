import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { HttpAdapterHost, NestFactory } from '@nestjs/core';
import { DocumentBuilder, SwaggerModule } from '@nestjs/swagger';
import { AppModule } from './app.module';
import { EngineExceptionFilter } from './common/engine-exception.filter';

async function bootstrap() {
  const app = await NestFactory.create(AppModule);
  app.enableShutdownHooks();

  const { httpAdapter } = app.get(HttpAdapterHost);
  app.useGlobalFilters(new EngineExceptionFilter(httpAdapter));

  const config = app.get(ConfigService);
  const swaggerPath = config.getOrThrow<string>('SWAGGER_PATH');
  const document = SwaggerModule.createDocument(
    app,
    new DocumentBuilder()
      .setTitle('Stepgraph CI API')
      .setDescription('Pipeline templates and dependency-graph execution')
      .setVersion('0.1.0')
      .build(),
  );
  SwaggerModule.setup(swaggerPath, app, document);

  const port = config.getOrThrow<number>('PORT');
  await app.listen(port);
  Logger.log(`Swagger: http://localhost:${port}/${swaggerPath}`, 'Bootstrap');
}

bootstrap().catch((err: unknown) => {
  Logger.error(err instanceof Error ? err.stack ?? err.message : String(err), 'Bootstrap');
  process.exit(1);
});
