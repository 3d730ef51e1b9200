/**
 * Preprocessing HTTP Controller
 *
 * POST /preprocess           - structure a document's page/span stream
 * GET  /preprocess/taxonomy  - built-in functional taxonomy
 */

import {
  Body,
  Controller,
  Get,
  HttpCode,
  HttpStatus,
  InternalServerErrorException,
  Logger,
  Post,
  UnprocessableEntityException,
  ValidationPipe,
} from '@nestjs/common';
import { PreprocessRequestDto } from './dto';
import { InvalidContentError, PreprocessError } from './errors';
import {
  DEFAULT_KEYWORD_TAXONOMY,
  toTaxonomyEntries,
  type TaxonomyEntry,
} from './grouper';
import { PreprocessEngine } from './preprocess.engine';
import type { PreprocessOutput } from './types';

@Controller('preprocess')
export class PreprocessingController {
  private readonly logger = new Logger(PreprocessingController.name);

  constructor(private readonly engine: PreprocessEngine) {}

  /**
   * POST /preprocess
   *
   * Request:
   * {
   *   "pages": [{ "pageNumber": 1, "spans": [{ "page": 1, "text": "1. Intro", "fontSize": 18 }] }],
   *   "options": { "minRepetition": 2, "groupByFunction": false }  // optional
   * }
   *
   * Response: { result, diagnostics, config }
   */
  @Post()
  @HttpCode(HttpStatus.OK)
  preprocess(
    @Body(
      new ValidationPipe({
        whitelist: true,
        forbidNonWhitelisted: true,
        transform: true,
      }),
    )
    body: PreprocessRequestDto,
  ): PreprocessOutput {
    this.logger.log(`Preprocess request: ${body.pages.length} pages`);

    try {
      return this.engine.execute(body.pages, body.options ?? {});
    } catch (error) {
      if (error instanceof InvalidContentError) {
        throw new UnprocessableEntityException({
          error: error.name,
          stage: error.stage,
          message: error.message,
        });
      }
      if (error instanceof PreprocessError) {
        throw new InternalServerErrorException({
          error: error.name,
          stage: error.stage,
          message: error.message,
        });
      }
      throw error;
    }
  }

  @Get('taxonomy')
  getTaxonomy(): TaxonomyEntry[] {
    return toTaxonomyEntries(DEFAULT_KEYWORD_TAXONOMY);
  }
}
