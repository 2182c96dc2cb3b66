import { INestApplicationContext } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { AppModule } from './app.module';

/**
 * Bootstrap errors (missing settings, unknown pair) reject instead of
 * aborting the process, so the caller can report them and set the exit code.
 */
export function createAppContext(): Promise<INestApplicationContext> {
  return NestFactory.createApplicationContext(AppModule, {
    abortOnError: false,
  });
}
