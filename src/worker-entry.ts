import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { WorkerAppModule } from './worker-app.module';

async function bootstrap(): Promise<void> {
  // No HTTP server: the worker only consumes the refresh queue and runs the scheduler.
  const app = await NestFactory.createApplicationContext(WorkerAppModule);
  app.enableShutdownHooks();

  new Logger('Worker').log('Page refresh worker is listening for jobs');
}

bootstrap().catch((error: unknown) => {
  new Logger('Worker').error(
    'Worker failed to start',
    error instanceof Error ? error.stack : String(error),
  );
  process.exit(1);
});
