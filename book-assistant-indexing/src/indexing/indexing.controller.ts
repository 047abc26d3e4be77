/**
 * Indexing HTTP Controller
 */

import {
  BadRequestException,
  Body,
  Controller,
  Logger,
  Post,
  ValidationPipe,
} from '@nestjs/common';
import { IndexingService } from './indexing.service';
import { IndexLibraryDto } from './dto/index-library.dto';
import type { IndexingReportDto } from './dto/indexing-report.dto';
import { LibraryReadError } from './errors/indexing-errors';

@Controller('indexing')
export class IndexingController {
  private readonly logger = new Logger(IndexingController.name);

  constructor(private readonly indexingService: IndexingService) {}

  /**
   * POST /indexing/books
   *
   * Request: { "inputDir"?: "./books", "outputDir"?: "./output" }
   * Response: per-book report plus combined corpus and catalog paths
   */
  @Post('books')
  async indexBooks(
    @Body(new ValidationPipe({ whitelist: true })) body: IndexLibraryDto,
  ): Promise<IndexingReportDto> {
    try {
      return await this.indexingService.indexLibrary(body);
    } catch (error) {
      if (error instanceof LibraryReadError) {
        this.logger.warn(error.message);
        throw new BadRequestException(error.message);
      }
      throw error;
    }
  }
}
