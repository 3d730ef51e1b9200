import { ConfigService } from '@nestjs/config';
import { Test, TestingModule } from '@nestjs/testing';
import {
  DEFAULT_NORMALIZER_OPTIONS,
  DEFAULT_PREPROCESS_OPTIONS,
} from '../preprocessing/constants/preprocess-defaults';
import { PreprocessConfigService } from './preprocess-config.service';

async function createService(
  env: Record<string, string>,
): Promise<PreprocessConfigService> {
  const module: TestingModule = await Test.createTestingModule({
    providers: [
      PreprocessConfigService,
      {
        provide: ConfigService,
        useValue: { get: (key: string): string | undefined => env[key] },
      },
    ],
  }).compile();

  return module.get<PreprocessConfigService>(PreprocessConfigService);
}

describe('PreprocessConfigService', () => {
  it('uses the built-in defaults when nothing is configured', async () => {
    const service = await createService({});

    expect(service.getDefaults()).toEqual({
      ...DEFAULT_PREPROCESS_OPTIONS,
      normalizer: { ...DEFAULT_NORMALIZER_OPTIONS },
    });
  });

  it('reads and coerces environment values', async () => {
    const service = await createService({
      PREPROCESS_MIN_REPETITION: '4',
      PREPROCESS_POSITION_THRESHOLD: '72.5',
      PREPROCESS_SIMILARITY_THRESHOLD: '0.75',
      PREPROCESS_MIN_HEADING_FONT_SIZE: '10',
      PREPROCESS_FONT_SIZE_RATIO_THRESHOLD: '1.4',
      PREPROCESS_NORMALIZE_TEXT: 'false',
      PREPROCESS_REMOVE_HEADERS_FOOTERS: '0',
      PREPROCESS_GROUP_BY_FUNCTION: 'no',
    });

    expect(service.getDefaults()).toEqual({
      minRepetition: 4,
      positionThreshold: 72.5,
      similarityThreshold: 0.75,
      minHeadingFontSize: 10,
      fontSizeRatioThreshold: 1.4,
      normalizeText: false,
      removeHeadersFooters: false,
      groupByFunction: false,
      normalizer: { ...DEFAULT_NORMALIZER_OPTIONS },
    });
  });

  it('clamps out-of-range values and ignores unparseable ones', async () => {
    const service = await createService({
      PREPROCESS_MIN_REPETITION: '0',
      PREPROCESS_POSITION_THRESHOLD: 'abc',
      PREPROCESS_SIMILARITY_THRESHOLD: '1.5',
      PREPROCESS_MIN_HEADING_FONT_SIZE: '-3',
      PREPROCESS_GROUP_BY_FUNCTION: 'maybe',
    });

    const defaults = service.getDefaults();
    expect(defaults.minRepetition).toBe(1);
    expect(defaults.positionThreshold).toBe(50);
    expect(defaults.similarityThreshold).toBe(1);
    expect(defaults.minHeadingFontSize).toBe(0);
    expect(defaults.groupByFunction).toBe(true);
  });

  it('floors fractional repetition counts', async () => {
    const service = await createService({ PREPROCESS_MIN_REPETITION: '2.7' });

    expect(service.getDefaults().minRepetition).toBe(2);
  });

  it('hands out independent copies', async () => {
    const service = await createService({});

    const first = service.getDefaults();
    first.minRepetition = 99;
    first.normalizer.normalizeQuotes = true;

    expect(service.getDefaults().minRepetition).toBe(3);
    expect(service.getDefaults().normalizer.normalizeQuotes).toBe(false);
  });
});
