// Domain graph value types. Graph values are frozen once built; ranking and
// pruning produce new values instead of mutating.

export interface TermNode {
  readonly term: string;
  readonly docFrequency: number;
  /** Number of retained edges incident to the node. */
  readonly degree: number;
}

export interface CoOccurrenceEdge {
  /** Always the smaller endpoint in code-unit order. */
  readonly source: string;
  readonly target: string;
  readonly weight: number;
}

export interface DomainGraph {
  readonly domain: string;
  readonly nodes: ReadonlyMap<string, TermNode>;
  readonly edges: readonly CoOccurrenceEdge[];
  readonly builtAt: Date;
}

export interface RankedDomainGraph extends DomainGraph {
  /** One score in [0, 1] for every node. */
  readonly centrality: ReadonlyMap<string, number>;
}

export interface RankedTerm {
  term: string;
  score: number;
}

export interface BuildGraphOptions {
  maxNodes: number;
  minEdgeWeight?: number;
  /** Include bigram terms. Defaults to true. */
  bigrams?: boolean;
}

export const DEFAULT_MIN_EDGE_WEIGHT = 2;

/**
 * Co-occurrence window, in term occurrences. Two occurrences co-occur when
 * fewer than this many positions apart within the same document.
 */
export const CO_OCCURRENCE_WINDOW = 5;

export function edgeKey(a: string, b: string): string {
  // Canonical terms never contain a tab.
  return a < b ? `${a}\t${b}` : `${b}\t${a}`;
}

/**
 * Recompute node degrees from an edge list, keeping node order.
 */
export function withDegrees(
  nodes: Iterable<TermNode>,
  edges: readonly CoOccurrenceEdge[],
): Map<string, TermNode> {
  const degrees = new Map<string, number>();
  for (const { source, target } of edges) {
    degrees.set(source, (degrees.get(source) ?? 0) + 1);
    degrees.set(target, (degrees.get(target) ?? 0) + 1);
  }

  const result = new Map<string, TermNode>();
  for (const node of nodes) {
    result.set(
      node.term,
      Object.freeze({ ...node, degree: degrees.get(node.term) ?? 0 }),
    );
  }
  return result;
}
