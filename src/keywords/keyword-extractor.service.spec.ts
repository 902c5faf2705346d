import { Test, TestingModule } from '@nestjs/testing';
import {
  GraphNotFoundError,
  InvalidParameterError,
} from '../common/errors/knowledge-graph.errors';
import { DomainGraphStoreService } from '../domains/domain-graph-store.service';
import { TermExtractorService } from '../text/term-extractor.service';
import { rankedGraphOf } from '../../test/fixtures/graph.fixtures';
import { KeywordExtractorService } from './keyword-extractor.service';

describe('KeywordExtractorService', () => {
  let service: KeywordExtractorService;
  const graph = rankedGraphOf(
    {
      oncology: 0.4,
      immunotherapy: 0.45,
      cancer: 0.3,
      'precision oncology': 0.2,
      biopsy: 0.3,
      tumour: 0.01,
    },
    [],
    'cancer health care',
  );
  const getGraph = jest.fn((domain: string) => {
    if (domain === 'cancer_care') return graph;
    throw new GraphNotFoundError(domain);
  });

  beforeEach(async () => {
    getGraph.mockClear();
    const module: TestingModule = await Test.createTestingModule({
      providers: [
        KeywordExtractorService,
        TermExtractorService,
        { provide: DomainGraphStoreService, useValue: { getGraph } },
      ],
    }).compile();

    service = module.get(KeywordExtractorService);
  });

  it('returns graph terms found in the text, strongest first', async () => {
    const keywords = await service.extract(
      'Precision oncology and immunotherapy for cancer.',
      'cancer_care',
    );

    expect(keywords).toEqual([
      { term: 'immunotherapy', score: 0.45 },
      { term: 'oncology', score: 0.4 },
      { term: 'cancer', score: 0.3 },
      { term: 'precision oncology', score: 0.2 },
    ]);
  });

  it('truncates to max_keywords', async () => {
    const keywords = await service.extract(
      'Precision oncology and immunotherapy for cancer.',
      'cancer_care',
      2,
    );

    expect(keywords.map((k) => k.term)).toEqual(['immunotherapy', 'oncology']);
  });

  it('breaks score ties by term', async () => {
    const keywords = await service.extract('Cancer biopsy', 'cancer_care');

    expect(keywords).toEqual([
      { term: 'biopsy', score: 0.3 },
      { term: 'cancer', score: 0.3 },
    ]);
  });

  it('drops terms below the threshold', async () => {
    const keywords = await service.extract('tumour biopsy', 'cancer_care');

    expect(keywords).toEqual([{ term: 'biopsy', score: 0.3 }]);
  });

  it('returns an empty list when nothing clears a high threshold', async () => {
    await expect(
      service.extract('oncology and immunotherapy', 'cancer_care', 10, 0.9),
    ).resolves.toEqual([]);
  });

  it('ignores terms the graph does not know', async () => {
    await expect(
      service.extract('Radiology reports', 'cancer_care'),
    ).resolves.toEqual([]);
  });

  it('fails for an unknown domain', async () => {
    await expect(
      service.extract('oncology', 'unknown_domain'),
    ).rejects.toBeInstanceOf(GraphNotFoundError);
  });

  it('validates parameters before reading the graph', async () => {
    await expect(
      service.extract('oncology', 'cancer_care', 0),
    ).rejects.toThrow('max_keywords must be a positive integer (got 0)');
    await expect(
      service.extract('oncology', 'cancer_care', 5, -0.1),
    ).rejects.toBeInstanceOf(InvalidParameterError);
    expect(getGraph).not.toHaveBeenCalled();
  });

  describe('summarize', () => {
    it('describes the score distribution', () => {
      const summary = service.summarize([
        { term: 'a', score: 0.4 },
        { term: 'b', score: 0.2 },
        { term: 'c', score: 0.06 },
        { term: 'd', score: 0.02 },
      ]);

      expect(summary).toMatchObject({
        count: 4,
        highCentralityCount: 2,
        mediumCentralityCount: 1,
        lowCentralityCount: 1,
      });
      expect(summary.centrality.min).toBe(0.02);
      expect(summary.centrality.max).toBe(0.4);
      expect(summary.centrality.mean).toBeCloseTo(0.17, 9);
      expect(summary.centrality.median).toBeCloseTo(0.13, 9);
    });

    it('reports zeros for no keywords', () => {
      expect(service.summarize([]).count).toBe(0);
    });
  });
});
