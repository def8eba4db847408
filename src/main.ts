#!/usr/bin/env node
import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { Logger } from '@nestjs/common';
import { AppModule } from './app.module';
import { getErrorMessage, getErrorStack } from './common/utils/error.utils';
import { getLoggerLevels } from './config/publisher.config';
import { PublishingOrchestrator } from './publisher/publishing-orchestrator.service';

async function bootstrap(): Promise<number> {
  const logger = new Logger('Bootstrap');

  const app = await NestFactory.createApplicationContext(AppModule, {
    logger: getLoggerLevels(process.env.LOG_LEVEL),
  });

  try {
    const summary = await app.get(PublishingOrchestrator).run();
    logger.log(
      `Done in ${summary.finishedAt.getTime() - summary.startedAt.getTime()}ms`,
    );
    return 0;
  } catch (error) {
    logger.error(
      `Publishing run aborted: ${getErrorMessage(error)}`,
      getErrorStack(error),
    );
    return 1;
  } finally {
    await app.close();
  }
}

bootstrap()
  .then((exitCode) => {
    process.exitCode = exitCode;
  })
  .catch((error) => {
    console.error('Failed to start publisher:', error);
    process.exit(1);
  });
