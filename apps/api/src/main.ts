import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { ConfigService } from '@nestjs/config';
import { Environment } from '@app/config/env/Environment';
import { Logger } from '@app/logger/Logger';
import { ApiModule } from './ApiModule';
import { setNestApp } from './setNestApp';

async function bootstrap() {
  const app = await NestFactory.create(ApiModule);
  const port = app
    .get<ConfigService<Environment>>(ConfigService)
    .get('server.port', { infer: true });

  setNestApp(app);

  app.enableShutdownHooks(); // running jobs are cancelled on SIGTERM
  await app.listen(port ?? 8000);

  app.get(Logger).info(`Lead generator API listening on port ${port}`);
}

void bootstrap();
