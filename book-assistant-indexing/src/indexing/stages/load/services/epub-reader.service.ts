/**
 * EPUB Reader Service
 * Opens an EPUB container with epub2 and exposes spine, navigation and
 * chapter markup.
 */

import { Injectable } from '@nestjs/common';
import { access } from 'fs/promises';
import EPub from 'epub2';
import { EpubBook, EpubSpineEntry, EpubTocEntry } from '../types';
import { EpubReadError, FileNotFoundError } from '../errors/load-errors';

function stringField(fields: Record<string, unknown>, key: string): string | null {
  const value = fields[key];
  return typeof value === 'string' && value.trim().length > 0 ? value : null;
}

function toSpineEntry(element: object): EpubSpineEntry | null {
  const fields: Record<string, unknown> = { ...element };
  const id = stringField(fields, 'id');
  const href = stringField(fields, 'href');
  if (!id || !href) {
    return null;
  }
  return { id, href, title: stringField(fields, 'title') };
}

function toTocEntry(element: object): EpubTocEntry | null {
  const fields: Record<string, unknown> = { ...element };
  const href = stringField(fields, 'href');
  const title = stringField(fields, 'title');
  return href && title ? { href, title: title.trim() } : null;
}

function isPresent<T>(value: T | null): value is T {
  return value !== null;
}

@Injectable()
export class EpubReaderService {
  /**
   * @throws FileNotFoundError when the path does not exist
   * @throws EpubReadError when the container cannot be parsed
   */
  async open(filePath: string): Promise<EpubBook> {
    try {
      await access(filePath);
    } catch {
      throw new FileNotFoundError(filePath);
    }

    let epub: EPub;
    try {
      epub = await EPub.createAsync(filePath);
    } catch (error) {
      throw new EpubReadError(
        filePath,
        error instanceof Error ? error.message : String(error),
        error instanceof Error ? error : undefined,
      );
    }

    return {
      metadata: { ...epub.metadata },
      spine: epub.flow.map(toSpineEntry).filter(isPresent),
      toc: epub.toc.map(toTocEntry).filter(isPresent),
      readChapter: (id: string) => epub.getChapterRawAsync(id),
    };
  }
}
