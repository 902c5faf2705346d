import { Injectable } from '@nestjs/common';
import Graph from 'graphology';
import { betweenness } from 'graphology-metrics/centrality';
import { assertUnitInterval, compareStrings } from '../common/utils/params';
import {
  DomainGraph,
  RankedDomainGraph,
  RankedTerm,
  withDegrees,
} from './types/domain-graph.types';

const DEGREE_WEIGHT = 0.5;
const BETWEENNESS_WEIGHT = 0.5;

/**
 * Order ranked terms by score descending, then term ascending.
 */
export function compareRanked(a: RankedTerm, b: RankedTerm): number {
  return b.score - a.score || compareStrings(a.term, b.term);
}

@Injectable()
export class CentralityRankerService {
  /**
   * Score every node with an equal blend of degree centrality
   * (`degree / (n - 1)`) and betweenness. Betweenness is computed with
   * Brandes' algorithm on the unweighted graph and rescaled by the graph's
   * maximum, so the most-between node scores 1. Isolated nodes score 0.
   *
   * Any existing scores on the input are ignored; the input is not modified.
   */
  rank(graph: DomainGraph): RankedDomainGraph {
    const g = new Graph({ type: 'undirected', multi: false });
    for (const term of graph.nodes.keys()) {
      g.addNode(term);
    }
    for (const edge of graph.edges) {
      g.addEdge(edge.source, edge.target);
    }

    const n = g.order;
    const rawBetweenness: Record<string, number> =
      n > 2 ? betweenness(g, { getEdgeWeight: null, normalized: false }) : {};
    const maxBetweenness = Math.max(0, ...Object.values(rawBetweenness));

    const centrality = new Map<string, number>();
    for (const term of graph.nodes.keys()) {
      const degree = n > 1 ? g.degree(term) / (n - 1) : 0;
      const between =
        maxBetweenness > 0 ? (rawBetweenness[term] ?? 0) / maxBetweenness : 0;
      const score = DEGREE_WEIGHT * degree + BETWEENNESS_WEIGHT * between;
      centrality.set(term, Math.min(1, Math.max(0, score)));
    }

    return Object.freeze({
      domain: graph.domain,
      nodes: graph.nodes,
      edges: graph.edges,
      builtAt: graph.builtAt,
      centrality,
    });
  }

  /**
   * Drop nodes scoring below `minCentrality` along with their edges. Scores
   * of the surviving nodes are kept as they are.
   */
  retainAbove(
    graph: RankedDomainGraph,
    minCentrality: number,
  ): RankedDomainGraph {
    assertUnitInterval('min_centrality', minCentrality);

    const keep = (term: string) =>
      (graph.centrality.get(term) ?? 0) >= minCentrality;

    const edges = graph.edges.filter(
      (e) => keep(e.source) && keep(e.target),
    );
    const nodes = [...graph.nodes.values()].filter((node) => keep(node.term));

    return Object.freeze({
      domain: graph.domain,
      nodes: withDegrees(nodes, edges),
      edges: Object.freeze(edges),
      builtAt: graph.builtAt,
      centrality: new Map(
        nodes.map((node) => [node.term, graph.centrality.get(node.term) ?? 0]),
      ),
    });
  }

  /**
   * All nodes as ranked terms in canonical order.
   */
  rankedTerms(graph: RankedDomainGraph): RankedTerm[] {
    return [...graph.centrality]
      .map(([term, score]) => ({ term, score }))
      .sort(compareRanked);
  }
}
