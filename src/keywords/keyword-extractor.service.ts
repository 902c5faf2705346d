import { Injectable, Logger } from '@nestjs/common';
import {
  assertPositiveInteger,
  assertUnitInterval,
} from '../common/utils/params';
import { DomainGraphStoreService } from '../domains/domain-graph-store.service';
import { compareRanked } from '../graph/centrality-ranker.service';
import { RankedTerm } from '../graph/types/domain-graph.types';
import { TermExtractorService } from '../text/term-extractor.service';

export const DEFAULT_MAX_KEYWORDS = 10;
export const DEFAULT_KEYWORD_MIN_CENTRALITY = 0.05;

const HIGH_CENTRALITY = 0.1;
const MEDIUM_CENTRALITY = 0.05;

export interface KeywordSummary {
  count: number;
  centrality: {
    min: number;
    max: number;
    mean: number;
    median: number;
  };
  highCentralityCount: number;
  mediumCentralityCount: number;
  lowCentralityCount: number;
}

@Injectable()
export class KeywordExtractorService {
  private readonly logger = new Logger(KeywordExtractorService.name);

  constructor(
    private readonly store: DomainGraphStoreService,
    private readonly extractor: TermExtractorService,
  ) {}

  /**
   * Terms of `text` that are nodes of the domain graph scoring at least
   * `minCentrality`, strongest first. The graph is only read.
   */
  async extract(
    text: string,
    domain: string,
    maxKeywords = DEFAULT_MAX_KEYWORDS,
    minCentrality = DEFAULT_KEYWORD_MIN_CENTRALITY,
  ): Promise<RankedTerm[]> {
    assertPositiveInteger('max_keywords', maxKeywords);
    assertUnitInterval('min_centrality', minCentrality);

    const graph = this.store.getGraph(domain);
    const candidates = new Set(this.extractor.extract(text));

    const keywords: RankedTerm[] = [];
    for (const term of candidates) {
      const score = graph.centrality.get(term);
      if (score !== undefined && score >= minCentrality) {
        keywords.push({ term, score });
      }
    }

    this.logger.debug(
      `${keywords.length} of ${candidates.size} candidates matched "${graph.domain}"`,
    );

    return keywords.sort(compareRanked).slice(0, maxKeywords);
  }

  summarize(keywords: readonly RankedTerm[]): KeywordSummary {
    const scores = keywords.map((k) => k.score).sort((a, b) => a - b);
    const n = scores.length;
    if (n === 0) {
      return {
        count: 0,
        centrality: { min: 0, max: 0, mean: 0, median: 0 },
        highCentralityCount: 0,
        mediumCentralityCount: 0,
        lowCentralityCount: 0,
      };
    }

    const middle = Math.floor(n / 2);
    return {
      count: n,
      centrality: {
        min: scores[0],
        max: scores[n - 1],
        mean: scores.reduce((sum, s) => sum + s, 0) / n,
        median:
          n % 2 === 1 ? scores[middle] : (scores[middle - 1] + scores[middle]) / 2,
      },
      highCentralityCount: scores.filter((s) => s >= HIGH_CENTRALITY).length,
      mediumCentralityCount: scores.filter(
        (s) => s >= MEDIUM_CENTRALITY && s < HIGH_CENTRALITY,
      ).length,
      lowCentralityCount: scores.filter((s) => s < MEDIUM_CENTRALITY).length,
    };
  }
}
