/**
 * One-shot batch indexing: INPUT_DIR → OUTPUT_DIR, then exit.
 */

import 'reflect-metadata';
import { Logger as NestLogger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { Logger } from 'nestjs-pino';
import { AppModule } from './app.module';
import { IndexingService } from './indexing/indexing.service';

async function run(): Promise<number> {
  const app = await NestFactory.createApplicationContext(AppModule, {
    bufferLogs: true,
  });
  app.useLogger(app.get(Logger));
  const logger = app.get(Logger);

  try {
    const report = await app.get(IndexingService).indexLibrary();
    const failed = report.books.filter((book) => !book.success).length;

    logger.log(
      `Indexed ${report.books.length - failed}/${report.books.length} books ` +
        `(${report.totalChunks} chunks) into ${report.outputDir}`,
    );
    return failed > 0 && failed === report.books.length ? 1 : 0;
  } catch (error) {
    logger.error(
      `Batch indexing failed: ${error instanceof Error ? error.message : String(error)}`,
    );
    return 1;
  } finally {
    await app.close();
  }
}

void run().then(
  (code) => {
    process.exitCode = code;
  },
  (error: unknown) => {
    new NestLogger('Cli').error(
      'Indexing could not start',
      error instanceof Error ? error.stack : String(error),
    );
    process.exitCode = 1;
  },
);
