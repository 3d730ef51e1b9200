import { plainToInstance } from 'class-transformer';
import { validate } from 'class-validator';
import { PreprocessRequestDto } from './preprocess-request.dto';

async function constraintsFor(plain: object): Promise<string[]> {
  const errors = await validate(plainToInstance(PreprocessRequestDto, plain));
  const collect = (list: typeof errors): string[] =>
    list.flatMap((error) => [
      ...Object.keys(error.constraints ?? {}),
      ...collect(error.children ?? []),
    ]);
  return collect(errors);
}

describe('PreprocessRequestDto', () => {
  it('accepts a minimal request', async () => {
    await expect(
      constraintsFor({ pages: [{ pageNumber: 1, spans: [{ page: 1, text: 'x' }] }] }),
    ).resolves.toEqual([]);
  });

  it('accepts every option', async () => {
    await expect(
      constraintsFor({
        pages: [],
        options: {
          minRepetition: 2,
          positionThreshold: 40,
          similarityThreshold: 0.8,
          minHeadingFontSize: 10,
          fontSizeRatioThreshold: 1.3,
          normalizeText: false,
          removeHeadersFooters: true,
          groupByFunction: true,
          normalizer: { normalizeQuotes: true },
          customKeywords: { Shipping: ['delivery'] },
        },
      }),
    ).resolves.toEqual([]);
  });

  it('requires pages', async () => {
    await expect(constraintsFor({})).resolves.toContain('isArray');
  });

  it('validates nested spans', async () => {
    await expect(
      constraintsFor({ pages: [{ pageNumber: 1, spans: [{ page: 0, text: 'x' }] }] }),
    ).resolves.toEqual(['min']);
  });

  it('keeps the similarity threshold within 0..1', async () => {
    await expect(
      constraintsFor({ pages: [], options: { similarityThreshold: 1.5 } }),
    ).resolves.toEqual(['max']);
  });

  it('requires custom keywords to be lists of strings', async () => {
    await expect(
      constraintsFor({ pages: [], options: { customKeywords: { Shipping: 'delivery' } } }),
    ).resolves.toEqual(['isKeywordRecord']);
    await expect(
      constraintsFor({ pages: [], options: { customKeywords: ['delivery'] } }),
    ).resolves.toEqual(['isKeywordRecord']);
  });
});
