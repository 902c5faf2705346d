import { Inject, Injectable, Logger, Optional } from '@nestjs/common';
import { InvalidParameterError } from '../common/errors/knowledge-graph.errors';
import {
  assertPositiveInteger,
  assertUnitInterval,
  compareStrings,
} from '../common/utils/params';
import { errorMessage } from '../common/utils/validation';
import { DomainGraphStoreService } from '../domains/domain-graph-store.service';
import { compareRanked } from '../graph/centrality-ranker.service';
import { RankedDomainGraph } from '../graph/types/domain-graph.types';
import {
  DEFINITION_PROVIDER,
  DefinitionProvider,
} from './definition-provider.interface';

export const DEFAULT_MAX_GLOSSARY_TERMS = 20;
export const DEFAULT_GLOSSARY_MIN_CENTRALITY = 0.1;

export const GLOSSARY_FORMATS = ['json', 'markdown', 'csv'] as const;
export type GlossaryFormat = (typeof GLOSSARY_FORMATS)[number];

export function parseGlossaryFormat(value: string): GlossaryFormat {
  const format = GLOSSARY_FORMATS.find((f) => f === value);
  if (format === undefined) {
    throw new InvalidParameterError(
      `format must be one of ${GLOSSARY_FORMATS.join(', ')} (got ${value})`,
    );
  }
  return format;
}

const RELATED_TERM_LIMIT = 5;
const HIGH_CENTRALITY = 0.2;
const MEDIUM_CENTRALITY = 0.1;

export interface GlossaryTerm {
  term: string;
  score: number;
  definition?: string;
}

export interface GlossaryBuildOptions {
  /** Defaults to true. Has no effect when no provider is bound. */
  includeDefinitions?: boolean;
}

export interface GlossarySummary {
  count: number;
  centrality: { min: number; max: number; mean: number };
  highCentralityCount: number;
  mediumCentralityCount: number;
  lowCentralityCount: number;
  definitionCount: number;
  /** Share of terms with a definition, 0 to 100. */
  definitionCoverage: number;
}

function csvField(value: string): string {
  return /[",\r\n]/.test(value) ? `"${value.replace(/"/g, '""')}"` : value;
}

@Injectable()
export class GlossaryBuilderService {
  private readonly logger = new Logger(GlossaryBuilderService.name);

  constructor(
    private readonly store: DomainGraphStoreService,
    @Optional()
    @Inject(DEFINITION_PROVIDER)
    private readonly definitions?: DefinitionProvider,
  ) {}

  // ============================================
  // BUILD
  // ============================================

  /**
   * The domain's most central terms, strongest first. Definitions that fail
   * to generate are logged and left out; the term itself is kept.
   */
  async build(
    domain: string,
    maxTerms = DEFAULT_MAX_GLOSSARY_TERMS,
    minCentrality = DEFAULT_GLOSSARY_MIN_CENTRALITY,
    options: GlossaryBuildOptions = {},
  ): Promise<GlossaryTerm[]> {
    assertPositiveInteger('max_terms', maxTerms);
    assertUnitInterval('min_centrality', minCentrality);

    const graph = this.store.getGraph(domain);
    const terms: GlossaryTerm[] = [...graph.centrality]
      .map(([term, score]) => ({ term, score }))
      .filter((t) => t.score >= minCentrality)
      .sort(compareRanked)
      .slice(0, maxTerms);

    const provider = this.definitions;
    if (!provider || options.includeDefinitions === false) {
      return terms;
    }

    const results = await Promise.allSettled(
      terms.map((t) =>
        provider.define({
          term: t.term,
          domain: graph.domain,
          relatedTerms: this.relatedTerms(graph, t.term),
        }),
      ),
    );

    return terms.map((t, i) => {
      const result = results[i];
      if (result.status === 'fulfilled') {
        return { ...t, definition: result.value };
      }
      this.logger.warn(
        `⚠️ No definition for "${t.term}": ${errorMessage(result.reason)}`,
      );
      return t;
    });
  }

  /**
   * Neighbours of `term` by descending edge weight, then term.
   */
  private relatedTerms(graph: RankedDomainGraph, term: string): string[] {
    return graph.edges
      .filter((e) => e.source === term || e.target === term)
      .map((e) => ({
        term: e.source === term ? e.target : e.source,
        weight: e.weight,
      }))
      .sort((a, b) => b.weight - a.weight || compareStrings(a.term, b.term))
      .slice(0, RELATED_TERM_LIMIT)
      .map((n) => n.term);
  }

  // ============================================
  // EXPORT
  // ============================================

  export(
    terms: readonly GlossaryTerm[],
    format: string,
    domain: string,
  ): string {
    switch (parseGlossaryFormat(format)) {
      case 'json':
        return JSON.stringify(terms, null, 2);
      case 'markdown':
        return this.toMarkdown(terms, domain);
      case 'csv':
        return this.toCsv(terms);
    }
  }

  private toMarkdown(terms: readonly GlossaryTerm[], domain: string): string {
    const sections = terms.map((t) => {
      const lines = [
        `## ${t.term}`,
        `**Centrality Score:** ${t.score.toFixed(3)}`,
      ];
      if (t.definition !== undefined) {
        lines.push(`**Definition:** ${t.definition}`);
      }
      return lines.join('\n');
    });
    return [`# Glossary: ${domain}`, ...sections].join('\n\n') + '\n';
  }

  private toCsv(terms: readonly GlossaryTerm[]): string {
    const rows = [
      ['Term', 'Centrality Score', 'Definition'],
      ...terms.map((t) => [t.term, String(t.score), t.definition ?? '']),
    ];
    return rows.map((row) => row.map(csvField).join(',')).join('\r\n') + '\r\n';
  }

  // ============================================
  // ANALYSIS
  // ============================================

  summarize(terms: readonly GlossaryTerm[]): GlossarySummary {
    const scores = terms.map((t) => t.score);
    const definitionCount = terms.filter(
      (t) => t.definition !== undefined,
    ).length;
    const n = scores.length;

    return {
      count: n,
      centrality: {
        min: n > 0 ? Math.min(...scores) : 0,
        max: n > 0 ? Math.max(...scores) : 0,
        mean: n > 0 ? scores.reduce((sum, s) => sum + s, 0) / n : 0,
      },
      highCentralityCount: scores.filter((s) => s >= HIGH_CENTRALITY).length,
      mediumCentralityCount: scores.filter(
        (s) => s >= MEDIUM_CENTRALITY && s < HIGH_CENTRALITY,
      ).length,
      lowCentralityCount: scores.filter((s) => s < MEDIUM_CENTRALITY).length,
      definitionCount,
      definitionCoverage: n > 0 ? (definitionCount / n) * 100 : 0,
    };
  }
}
