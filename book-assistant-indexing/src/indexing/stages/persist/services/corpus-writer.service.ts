/**
 * Corpus Writer Service
 * JSON output of the indexing pipeline: per-book corpora and hierarchy
 * snapshots (never overwritten), the combined corpus and the catalog
 * (regenerated on every run).
 */

import { Injectable, Logger } from '@nestjs/common';
import { mkdir, writeFile } from 'fs/promises';
import { join } from 'path';
import type { EmbeddedChunk } from '../../../types/corpus.types';
import type { SectionNode } from '../../structure/types';
import {
  toSafeFileName,
  writeFileWithoutOverwrite,
} from '../../../../common/utils/file-path.utils';
import { BookCatalog, CATALOG_FILE, COMBINED_CORPUS_FILE } from '../types';
import { CorpusWriteError } from '../errors';

function toJson(value: unknown): string {
  return JSON.stringify(value, null, 2);
}

@Injectable()
export class CorpusWriterService {
  private readonly logger = new Logger(CorpusWriterService.name);

  async writeBookCorpus(
    outputDir: string,
    bookTitle: string,
    chunks: EmbeddedChunk[],
  ): Promise<string> {
    const target = join(outputDir, `${toSafeFileName(bookTitle)}_paragraphs.json`);
    return this.guard(target, async () => {
      await mkdir(outputDir, { recursive: true });
      const written = await writeFileWithoutOverwrite(target, toJson(chunks));
      this.logger.log(`Wrote ${chunks.length} chunks to ${written}`);
      return written;
    });
  }

  async writeHierarchySnapshot(
    outputDir: string,
    bookTitle: string,
    chapterOrder: number,
    sections: readonly SectionNode[],
  ): Promise<string> {
    const target = join(
      outputDir,
      `${toSafeFileName(bookTitle)}_hierarchy_${chapterOrder + 1}.json`,
    );
    return this.guard(target, async () => {
      await mkdir(outputDir, { recursive: true });
      return writeFileWithoutOverwrite(target, toJson(sections));
    });
  }

  async writeCombinedCorpus(
    outputDir: string,
    chunks: EmbeddedChunk[],
  ): Promise<string> {
    const target = join(outputDir, COMBINED_CORPUS_FILE);
    return this.guard(target, async () => {
      await mkdir(outputDir, { recursive: true });
      await writeFile(target, toJson(chunks), 'utf-8');
      this.logger.log(`Wrote combined corpus (${chunks.length} chunks) to ${target}`);
      return target;
    });
  }

  async writeCatalog(outputDir: string, catalog: BookCatalog): Promise<string> {
    const target = join(outputDir, CATALOG_FILE);
    return this.guard(target, async () => {
      await mkdir(outputDir, { recursive: true });
      await writeFile(target, toJson(catalog), 'utf-8');
      return target;
    });
  }

  private async guard(
    target: string,
    write: () => Promise<string>,
  ): Promise<string> {
    try {
      return await write();
    } catch (error) {
      throw new CorpusWriteError(
        target,
        error instanceof Error ? error : undefined,
      );
    }
  }
}
