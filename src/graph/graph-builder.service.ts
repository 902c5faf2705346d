import { Injectable, Logger } from '@nestjs/common';
import { setImmediate as yieldToEventLoop } from 'node:timers/promises';
import { EmptyCorpusError } from '../common/errors/knowledge-graph.errors';
import {
  assertPositiveInteger,
  compareStrings,
} from '../common/utils/params';
import { TermExtractorService } from '../text/term-extractor.service';
import {
  BuildGraphOptions,
  CO_OCCURRENCE_WINDOW,
  CoOccurrenceEdge,
  DEFAULT_MIN_EDGE_WEIGHT,
  DomainGraph,
  edgeKey,
  TermNode,
  withDegrees,
} from './types/domain-graph.types';

interface TermStats {
  term: string;
  docFrequency: number;
  firstSeen: number; // position in corpus order
}

@Injectable()
export class GraphBuilderService {
  private readonly logger = new Logger(GraphBuilderService.name);

  constructor(private readonly extractor: TermExtractorService) {}

  // ============================================
  // BUILD
  // ============================================

  /**
   * Build an unranked co-occurrence graph from a corpus.
   *
   * Yields to the event loop between documents and stops with the signal's
   * reason once `signal` is aborted.
   */
  async build(
    domain: string,
    documents: readonly string[],
    options: BuildGraphOptions,
    signal?: AbortSignal,
  ): Promise<DomainGraph> {
    const {
      maxNodes,
      minEdgeWeight = DEFAULT_MIN_EDGE_WEIGHT,
      bigrams = true,
    } = options;
    assertPositiveInteger('max_nodes', maxNodes);
    assertPositiveInteger('min_edge_weight', minEdgeWeight);

    if (documents.length === 0) {
      throw new EmptyCorpusError(domain);
    }

    const stats = new Map<string, TermStats>();
    const weights = new Map<string, number>();
    let position = 0;

    for (const document of documents) {
      await yieldToEventLoop();
      signal?.throwIfAborted();

      const terms = this.extractor.extract(document, { bigrams });

      for (const term of terms) {
        if (!stats.has(term)) {
          stats.set(term, { term, docFrequency: 0, firstSeen: position });
        }
        position++;
      }
      for (const term of new Set(terms)) {
        const entry = stats.get(term);
        if (entry) entry.docFrequency++;
      }

      this.countWindowPairs(terms, weights);
    }

    if (stats.size === 0) {
      throw new EmptyCorpusError(domain);
    }

    const retained = this.selectNodes([...stats.values()], maxNodes);
    const edges = this.collectEdges(weights, minEdgeWeight, retained);

    const nodes: TermNode[] = retained.map((s) => ({
      term: s.term,
      docFrequency: s.docFrequency,
      degree: 0,
    }));

    this.logger.log(
      `Built graph for "${domain}": ${nodes.length} nodes, ${edges.length} edges from ${documents.length} documents`,
    );

    return Object.freeze({
      domain,
      nodes: withDegrees(nodes, edges),
      edges: Object.freeze(edges),
      builtAt: new Date(),
    });
  }

  // ============================================
  // HELPERS
  // ============================================

  private countWindowPairs(
    terms: readonly string[],
    weights: Map<string, number>,
  ): void {
    for (let i = 0; i < terms.length; i++) {
      const end = Math.min(i + CO_OCCURRENCE_WINDOW, terms.length);
      for (let j = i + 1; j < end; j++) {
        if (terms[i] === terms[j]) continue;
        const key = edgeKey(terms[i], terms[j]);
        weights.set(key, (weights.get(key) ?? 0) + 1);
      }
    }
  }

  /**
   * Keep at most `maxNodes` terms: highest document frequency first, then
   * earliest first appearance, then canonical string. Result is in corpus
   * order.
   */
  private selectNodes(all: TermStats[], maxNodes: number): TermStats[] {
    const byCorpusOrder = (a: TermStats, b: TermStats) =>
      a.firstSeen - b.firstSeen;

    if (all.length <= maxNodes) {
      return [...all].sort(byCorpusOrder);
    }

    return [...all]
      .sort(
        (a, b) =>
          b.docFrequency - a.docFrequency ||
          a.firstSeen - b.firstSeen ||
          compareStrings(a.term, b.term),
      )
      .slice(0, maxNodes)
      .sort(byCorpusOrder);
  }

  private collectEdges(
    weights: Map<string, number>,
    minEdgeWeight: number,
    retained: TermStats[],
  ): CoOccurrenceEdge[] {
    const kept = new Set(retained.map((s) => s.term));
    const edges: CoOccurrenceEdge[] = [];

    for (const [key, weight] of weights) {
      if (weight < minEdgeWeight) continue;
      const [source, target] = key.split('\t');
      if (!kept.has(source) || !kept.has(target)) continue;
      edges.push(Object.freeze({ source, target, weight }));
    }

    return edges.sort(
      (a, b) =>
        compareStrings(a.source, b.source) ||
        compareStrings(a.target, b.target),
    );
  }
}
