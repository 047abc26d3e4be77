/**
 * Corpus Service
 * Loads corpus and catalog snapshots from disk. Each path is read and
 * validated once; later requests share the same immutable snapshot.
 */

import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { readFile } from 'fs/promises';
import { resolve } from 'path';
import type { ZodTypeAny, output } from 'zod';
import type { BookCatalog, EmbeddedChunk } from '../types';
import { CorpusLoadError } from '../errors';
import { catalogSchema, corpusSchema } from './corpus.schema';

@Injectable()
export class CorpusService {
  private readonly logger = new Logger(CorpusService.name);
  private readonly corpora = new Map<string, Promise<readonly EmbeddedChunk[]>>();
  private readonly catalogs = new Map<string, Promise<BookCatalog>>();
  private readonly defaultCorpusPath: string;
  private readonly defaultCatalogPath: string;

  constructor(private readonly configService: ConfigService) {
    this.defaultCorpusPath = this.configService.get<string>(
      'CORPUS_PATH',
      './output/all_books_paragraphs.json',
    );
    this.defaultCatalogPath = this.configService.get<string>(
      'CATALOG_PATH',
      './output/book_index.json',
    );
  }

  getCorpus(corpusPath = this.defaultCorpusPath): Promise<readonly EmbeddedChunk[]> {
    return this.cached(this.corpora, resolve(corpusPath), async (path) => {
      const corpus = await this.readJson(path, corpusSchema);
      this.logger.log(`Loaded corpus ${path}: ${corpus.length} chunks`);
      return Object.freeze(corpus);
    });
  }

  getCatalog(catalogPath = this.defaultCatalogPath): Promise<BookCatalog> {
    return this.cached(this.catalogs, resolve(catalogPath), (path) =>
      this.readJson(path, catalogSchema),
    );
  }

  /**
   * Drop cached snapshots so the next request rereads the files
   */
  invalidate(): void {
    this.corpora.clear();
    this.catalogs.clear();
  }

  private cached<T>(
    cache: Map<string, Promise<T>>,
    path: string,
    load: (path: string) => Promise<T>,
  ): Promise<T> {
    const existing = cache.get(path);
    if (existing) {
      return existing;
    }

    const pending = load(path);
    cache.set(path, pending);
    // Failed loads are retried on the next request
    void pending.catch(() => cache.delete(path));
    return pending;
  }

  private async readJson<S extends ZodTypeAny>(
    path: string,
    schema: S,
  ): Promise<output<S>> {
    let raw: string;
    try {
      raw = await readFile(path, 'utf-8');
    } catch (error) {
      throw new CorpusLoadError(
        path,
        'file not readable',
        error instanceof Error ? error : undefined,
      );
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (error) {
      throw new CorpusLoadError(
        path,
        'invalid JSON',
        error instanceof Error ? error : undefined,
      );
    }

    const parsed = schema.safeParse(json);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      throw new CorpusLoadError(
        path,
        `unexpected shape at ${issue?.path.join('.') || '<root>'}: ${issue?.message ?? 'invalid'}`,
      );
    }
    return parsed.data;
  }
}
