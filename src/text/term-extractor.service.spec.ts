import { TermExtractorService } from './term-extractor.service';

describe('TermExtractorService', () => {
  let extractor: TermExtractorService;

  beforeEach(() => {
    extractor = new TermExtractorService();
  });

  it('emits unigrams and adjacent bigrams in text order', () => {
    expect(
      extractor.extract('Precision oncology uses molecular profiling.'),
    ).toEqual([
      'precision',
      'precision oncology',
      'oncology',
      'oncology uses',
      'uses',
      'uses molecular',
      'molecular',
      'molecular profiling',
      'profiling',
    ]);
  });

  it('does not bridge a bigram across a stop word', () => {
    expect(
      extractor.extract(
        'Immunotherapy harnesses the immune system to fight cancer.',
      ),
    ).toEqual([
      'immunotherapy',
      'immunotherapy harnesses',
      'harnesses',
      'immune',
      'immune system',
      'system',
      'fight',
      'fight cancer',
      'cancer',
    ]);
  });

  it('strips punctuation, drops apostrophes and short tokens', () => {
    expect(
      extractor.extract("The patient's CAR-T therapy", { bigrams: false }),
    ).toEqual(['patients', 'car', 'therapy']);
  });

  it('falls back to the longest token when every token is filtered', () => {
    expect(extractor.extract('To be or not to be, which is it?')).toEqual([
      'which',
    ]);
  });

  it('keeps the first of equally long fallback tokens', () => {
    expect(extractor.extract('The and of it')).toEqual(['the']);
  });

  it('returns nothing for text without tokens', () => {
    expect(extractor.extract('  ...!!! ')).toEqual([]);
  });

  it('is deterministic', () => {
    const text = 'Biomarkers predict treatment response; biomarkers matter.';
    expect(extractor.extract(text)).toEqual(extractor.extract(text));
  });

  it('canonicalizes terms to their node identity', () => {
    expect(extractor.canonicalize('  Precision   Oncology! ')).toBe(
      'precision oncology',
    );
  });
});
