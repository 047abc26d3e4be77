/**
 * Persist Stage
 * Per-book corpus after each book; combined corpus and catalog once the
 * whole library has been indexed.
 */

import { Injectable, Logger } from '@nestjs/common';
import { CorpusWriterService } from './services/corpus-writer.service';
import { buildCatalog } from './services/catalog-builder';
import type {
  PersistInputDto,
  PersistLibraryInputDto,
  PersistLibraryOutputDto,
  PersistOutputDto,
} from './dto';

@Injectable()
export class PersistStage {
  private readonly logger = new Logger(PersistStage.name);

  constructor(private readonly corpusWriter: CorpusWriterService) {}

  async execute(input: PersistInputDto): Promise<PersistOutputDto> {
    const startTime = Date.now();

    const corpusPath = await this.corpusWriter.writeBookCorpus(
      input.outputDir,
      input.bookTitle,
      input.chunks,
    );

    const durationMs = Date.now() - startTime;
    this.logger.log(
      `Persist Stage completed for "${input.bookTitle}" in ${durationMs}ms: ${corpusPath}`,
    );

    return { corpusPath, chunkCount: input.chunks.length, durationMs };
  }

  async persistLibrary(
    input: PersistLibraryInputDto,
  ): Promise<PersistLibraryOutputDto> {
    const catalog = buildCatalog(input.chunks);

    const corpusPath = await this.corpusWriter.writeCombinedCorpus(
      input.outputDir,
      input.chunks,
    );
    const catalogPath = await this.corpusWriter.writeCatalog(
      input.outputDir,
      catalog,
    );

    this.logger.log(
      `Library persisted: ${catalog.books.length} books, ${input.chunks.length} chunks`,
    );

    return {
      corpusPath,
      catalogPath,
      catalog,
      chunkCount: input.chunks.length,
    };
  }
}
