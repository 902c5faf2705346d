import {
  BuildGraphOptions,
  RankedDomainGraph,
} from '../../graph/types/domain-graph.types';

export type GraphSource = 'prebuilt' | 'built';

/**
 * What to do when a build is requested for a domain that already has one in
 * flight: join it, or fail with `BuildInProgressError`.
 */
export type BuildContention = 'wait' | 'reject';

export const BUILD_CONTENTION_POLICIES: readonly BuildContention[] = [
  'wait',
  'reject',
];

export const DEFAULT_MAX_NODES = 50;
export const DEFAULT_BUILD_TIMEOUT_MS = 30_000;

/**
 * One published graph. Entries are frozen and replaced as a whole, so a
 * reader holding one never sees a later build.
 */
export interface StoreEntry {
  readonly key: string;
  readonly aliases: readonly string[];
  readonly graph: RankedDomainGraph;
  readonly source: GraphSource;
  readonly loadedAt: Date;
}

export interface StoreBuildOptions extends Partial<BuildGraphOptions> {
  /** Drop nodes scoring below this after ranking. 0 keeps everything. */
  minCentrality?: number;
  /** Overrides `KG_BUILD_TIMEOUT_MS` for this build. */
  timeoutMs?: number;
  signal?: AbortSignal;
}

export interface BuildOutcome {
  graph: RankedDomainGraph;
  /** True when an already published graph was returned. */
  reused: boolean;
}

export interface LoadResult {
  domain: string;
  path: string;
  loaded: boolean;
  error?: string;
}

export interface CentralitySummary {
  min: number;
  max: number;
  mean: number;
}

export interface DomainSummary {
  domain: string;
  aliases: readonly string[];
  source: GraphSource;
  nodeCount: number;
  edgeCount: number;
  builtAt: Date;
  loadedAt: Date;
}

export interface DomainStats extends DomainSummary {
  centrality: CentralitySummary;
  isolatedNodes: number;
}

export type StoreEvent =
  | { type: 'loaded'; domain: string; path: string }
  | { type: 'built'; domain: string; nodeCount: number; edgeCount: number }
  | { type: 'build-failed'; domain: string; error: string }
  | { type: 'evicted'; domain: string };
