import {
  InternalServerErrorException,
  UnprocessableEntityException,
} from '@nestjs/common';
import { Test, TestingModule } from '@nestjs/testing';
import { plainToInstance } from 'class-transformer';
import { PreprocessRequestDto } from './dto';
import { GroupingError, InvalidContentError } from './errors';
import { PreprocessEngine } from './preprocess.engine';
import { PreprocessingController } from './preprocessing.controller';
import type { PreprocessOutput } from './types';

function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error('expected an exception');
}

describe('PreprocessingController', () => {
  let controller: PreprocessingController;
  const execute = jest.fn();

  const output: PreprocessOutput = {
    result: { groups: [], removedHeaderPatterns: [], removedFooterPatterns: [] },
    diagnostics: {
      warnings: [],
      statistics: {
        normalizationTime: 0,
        noiseRemovalTime: 0,
        segmentationTime: 0,
        groupingTime: 0,
        totalTime: 0,
        totalPages: 1,
        inputSpans: 1,
        removedSpans: 0,
        totalSections: 0,
        topLevelSections: 0,
        maxDepth: 0,
        totalGroups: 0,
      },
    },
    config: {
      minRepetition: 3,
      positionThreshold: 50,
      similarityThreshold: 0.9,
      minHeadingFontSize: 12,
      fontSizeRatioThreshold: 1.2,
      normalizeText: true,
      removeHeadersFooters: true,
      groupByFunction: true,
      normalizer: {
        normalizeUnicode: true,
        removeControlChars: true,
        normalizeWhitespace: true,
        normalizeQuotes: false,
        normalizeWidth: false,
      },
      keywordTaxonomy: [],
    },
  };

  const body = plainToInstance(PreprocessRequestDto, {
    pages: [{ pageNumber: 1, spans: [{ page: 1, text: 'hello' }] }],
    options: { minRepetition: 2 },
  });

  beforeEach(async () => {
    execute.mockReset();

    const module: TestingModule = await Test.createTestingModule({
      controllers: [PreprocessingController],
      providers: [{ provide: PreprocessEngine, useValue: { execute } }],
    }).compile();

    controller = module.get<PreprocessingController>(PreprocessingController);
  });

  describe('preprocess', () => {
    it('returns the engine output', () => {
      execute.mockReturnValue(output);

      expect(controller.preprocess(body)).toBe(output);
      expect(execute).toHaveBeenCalledWith(
        [{ pageNumber: 1, spans: [{ page: 1, text: 'hello' }] }],
        { minRepetition: 2 },
      );
    });

    it('maps invalid content to 422', () => {
      execute.mockImplementation(() => {
        throw new InvalidContentError('Document has no pages');
      });

      const error = captureError(() => controller.preprocess(body));

      expect(error).toBeInstanceOf(UnprocessableEntityException);
      if (error instanceof UnprocessableEntityException) {
        expect(error.getResponse()).toEqual({
          error: 'InvalidContentError',
          stage: 'input',
          message: 'Document has no pages',
        });
      }
    });

    it('maps stage failures to 500 with the stage', () => {
      execute.mockImplementation(() => {
        throw new GroupingError('taxonomy broken');
      });

      const error = captureError(() => controller.preprocess(body));

      expect(error).toBeInstanceOf(InternalServerErrorException);
      if (error instanceof InternalServerErrorException) {
        expect(error.getResponse()).toEqual({
          error: 'GroupingError',
          stage: 'grouping',
          message: 'Failed to group sections: taxonomy broken',
        });
      }
    });

    it('rethrows anything else', () => {
      const failure = new TypeError('unexpected');
      execute.mockImplementation(() => {
        throw failure;
      });

      expect(() => controller.preprocess(body)).toThrow(failure);
    });
  });

  describe('getTaxonomy', () => {
    it('lists the built-in groups', () => {
      const taxonomy = controller.getTaxonomy();

      expect(taxonomy).toHaveLength(10);
      expect(taxonomy[8]).toEqual({
        name: 'API',
        keywords: ['api', '엔드포인트', 'rest', 'graphql', '웹훅', 'endpoint', 'webhook'],
      });
    });
  });
});
