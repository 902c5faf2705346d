import {
  Injectable,
  Logger,
  OnModuleDestroy,
  OnModuleInit,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Observable, Subject } from 'rxjs';
import {
  BuildCancelledError,
  BuildInProgressError,
  BuildTimeoutError,
  GraphNotFoundError,
} from '../common/errors/knowledge-graph.errors';
import {
  assertPositiveInteger,
  assertUnitInterval,
  compareStrings,
} from '../common/utils/params';
import { errorMessage } from '../common/utils/validation';
import { CentralityRankerService } from '../graph/centrality-ranker.service';
import { GraphBuilderService } from '../graph/graph-builder.service';
import { RankedDomainGraph } from '../graph/types/domain-graph.types';
import { ResolvedDomain, resolveDomainName } from './domain-names';
import { GraphPersistenceService } from './graph-persistence.service';
import {
  BUILD_CONTENTION_POLICIES,
  BuildContention,
  BuildOutcome,
  DEFAULT_BUILD_TIMEOUT_MS,
  DEFAULT_MAX_NODES,
  DomainStats,
  DomainSummary,
  LoadResult,
  StoreBuildOptions,
  StoreEntry,
  StoreEvent,
} from './types/domain-store.types';

const DEFAULT_PREBUILT_DOMAINS = 'cancer health care';

/**
 * Settle with `work`, or reject with the signal's reason as soon as it
 * aborts. `work` keeps running after an abort; its outcome is ignored.
 */
function raceAbort<T>(work: Promise<T>, signal: AbortSignal): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(signal.reason);
    if (signal.aborted) {
      onAbort();
    } else {
      signal.addEventListener('abort', onAbort, { once: true });
    }
    void work.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(error);
      },
    );
  });
}

/**
 * Abort `controller` with a `BuildCancelledError` when the caller's signal
 * fires. Returns the function that detaches the listener.
 */
function linkCallerSignal(
  controller: AbortController,
  key: string,
  signal?: AbortSignal,
): () => void {
  if (!signal) return () => undefined;

  const cancel = () => controller.abort(new BuildCancelledError(key));
  if (signal.aborted) {
    cancel();
    return () => undefined;
  }
  signal.addEventListener('abort', cancel, { once: true });
  return () => signal.removeEventListener('abort', cancel);
}

/**
 * Keyed store of one ranked graph per domain.
 *
 * Each build produces a fresh frozen graph and the published entry for the
 * domain is swapped in one assignment, so readers always see either the old
 * or the new graph. At most one build per domain key runs at a time.
 */
@Injectable()
export class DomainGraphStoreService implements OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(DomainGraphStoreService.name);
  private readonly entries = new Map<string, StoreEntry>();
  private readonly inFlight = new Map<string, Promise<RankedDomainGraph>>();
  private readonly events = new Subject<StoreEvent>();

  private readonly buildTimeoutMs: number;
  private readonly contention: BuildContention;
  private readonly persistOnBuild: boolean;
  private readonly prebuiltDomains: string[];

  readonly events$: Observable<StoreEvent> = this.events.asObservable();

  constructor(
    private readonly builder: GraphBuilderService,
    private readonly ranker: CentralityRankerService,
    private readonly persistence: GraphPersistenceService,
    private readonly configService: ConfigService,
  ) {
    this.buildTimeoutMs = Number(
      this.configService.get<number | string>(
        'KG_BUILD_TIMEOUT_MS',
        DEFAULT_BUILD_TIMEOUT_MS,
      ),
    );
    this.contention = this.readContention();
    this.persistOnBuild =
      String(
        this.configService.get<boolean | string>('KG_PERSIST_ON_BUILD', true),
      ).toLowerCase() !== 'false';
    this.prebuiltDomains = this.configService
      .get<string>('KG_PREBUILT_DOMAINS', DEFAULT_PREBUILT_DOMAINS)
      .split(',')
      .map((name) => name.trim())
      .filter((name) => name.length > 0);
  }

  async onModuleInit() {
    for (const domain of this.prebuiltDomains) {
      const result = await this.loadPrebuilt(domain);
      if (result.loaded) {
        this.logger.log(`✅ Loaded pre-built graph for "${result.domain}"`);
      }
    }
  }

  onModuleDestroy() {
    this.events.complete();
  }

  // ============================================
  // LOOKUP
  // ============================================

  resolve(domain: string): ResolvedDomain {
    return resolveDomainName(domain);
  }

  has(domain: string): boolean {
    return this.entries.has(resolveDomainName(domain).key);
  }

  /**
   * The published graph for a domain or alias. Never waits for a build.
   */
  getGraph(domain: string): RankedDomainGraph {
    return this.getEntry(domain).graph;
  }

  getEntry(domain: string): StoreEntry {
    const { key } = resolveDomainName(domain);
    const entry = this.entries.get(key);
    if (!entry) {
      throw new GraphNotFoundError(domain.trim() || key);
    }
    return entry;
  }

  listDomains(): DomainSummary[] {
    return [...this.entries.values()]
      .map((entry) => this.summarize(entry))
      .sort((a, b) => compareStrings(a.domain, b.domain));
  }

  getStats(domain: string): DomainStats {
    const entry = this.getEntry(domain);
    const scores = [...entry.graph.centrality.values()];
    const isolatedNodes = [...entry.graph.nodes.values()].filter(
      (node) => node.degree === 0,
    ).length;

    return {
      ...this.summarize(entry),
      centrality: {
        min: scores.length > 0 ? Math.min(...scores) : 0,
        max: scores.length > 0 ? Math.max(...scores) : 0,
        mean:
          scores.length > 0
            ? scores.reduce((sum, score) => sum + score, 0) / scores.length
            : 0,
      },
      isolatedNodes,
    };
  }

  /**
   * Remove a domain's entry. The graph stays valid for anyone still holding
   * it.
   */
  evict(domain: string): boolean {
    const { key } = resolveDomainName(domain);
    const removed = this.entries.delete(key);
    if (removed) {
      this.logger.log(`🗑️ Evicted graph for "${key}"`);
      this.events.next({ type: 'evicted', domain: key });
    }
    return removed;
  }

  // ============================================
  // BUILD
  // ============================================

  async getOrBuild(
    domain: string,
    documents?: readonly string[],
    options: StoreBuildOptions = {},
  ): Promise<RankedDomainGraph> {
    return (await this.obtain(domain, documents, options)).graph;
  }

  /**
   * Like `getOrBuild`, and reports whether a published graph was reused.
   */
  async obtain(
    domain: string,
    documents?: readonly string[],
    options: StoreBuildOptions = {},
  ): Promise<BuildOutcome> {
    const resolved = resolveDomainName(domain);

    const existing = this.entries.get(resolved.key);
    if (existing) {
      return { graph: existing.graph, reused: true };
    }

    const pending = this.inFlight.get(resolved.key);
    if (pending) {
      return {
        graph: await this.joinBuild(resolved.key, pending, options.signal),
        reused: false,
      };
    }

    if (documents === undefined) {
      throw new GraphNotFoundError(domain.trim() || resolved.key);
    }

    return {
      graph: await this.startBuild(resolved, documents, options),
      reused: false,
    };
  }

  /**
   * Recompute a domain's graph and replace the published entry. Until the
   * new graph is published readers keep seeing the previous one.
   */
  async rebuild(
    domain: string,
    documents: readonly string[],
    options: StoreBuildOptions = {},
  ): Promise<RankedDomainGraph> {
    const resolved = resolveDomainName(domain);

    const pending = this.inFlight.get(resolved.key);
    if (pending) {
      return this.joinBuild(resolved.key, pending, options.signal);
    }

    return this.startBuild(resolved, documents, options);
  }

  private joinBuild(
    key: string,
    pending: Promise<RankedDomainGraph>,
    signal?: AbortSignal,
  ): Promise<RankedDomainGraph> {
    if (this.contention === 'reject') {
      throw new BuildInProgressError(key);
    }
    if (!signal) return pending;

    const controller = new AbortController();
    const unlink = linkCallerSignal(controller, key, signal);
    return raceAbort(pending, controller.signal).finally(unlink);
  }

  private startBuild(
    resolved: ResolvedDomain,
    documents: readonly string[],
    options: StoreBuildOptions,
  ): Promise<RankedDomainGraph> {
    const build = this.runBuild(resolved, documents, options).finally(() => {
      if (this.inFlight.get(resolved.key) === build) {
        this.inFlight.delete(resolved.key);
      }
    });
    this.inFlight.set(resolved.key, build);
    return build;
  }

  private async runBuild(
    resolved: ResolvedDomain,
    documents: readonly string[],
    options: StoreBuildOptions,
  ): Promise<RankedDomainGraph> {
    const { key } = resolved;
    const timeoutMs = options.timeoutMs ?? this.buildTimeoutMs;
    const minCentrality = options.minCentrality ?? 0;
    assertPositiveInteger('timeout_ms', timeoutMs);
    assertUnitInterval('min_centrality', minCentrality);

    const deadline = Date.now() + timeoutMs;
    const controller = new AbortController();
    const timer = setTimeout(
      () => controller.abort(new BuildTimeoutError(key, timeoutMs)),
      timeoutMs,
    );
    const unlink = linkCallerSignal(controller, key, options.signal);

    try {
      const graph = await raceAbort(
        this.compute(resolved, documents, options, {
          minCentrality,
          timeoutMs,
          deadline,
          signal: controller.signal,
        }),
        controller.signal,
      );

      if (this.persistOnBuild) {
        await this.persistence.save(resolved.slug, graph);
      }

      this.publish(resolved, graph, 'built');
      this.events.next({
        type: 'built',
        domain: key,
        nodeCount: graph.nodes.size,
        edgeCount: graph.edges.length,
      });
      return graph;
    } catch (error) {
      this.logger.warn(
        `⚠️ Build for "${key}" failed: ${errorMessage(error)}`,
      );
      this.events.next({
        type: 'build-failed',
        domain: key,
        error: errorMessage(error),
      });
      throw error;
    } finally {
      clearTimeout(timer);
      unlink();
    }
  }

  /**
   * Build, rank and prune. The timer cannot fire while a synchronous step
   * runs, so the deadline is also checked after each step.
   */
  private async compute(
    { key }: ResolvedDomain,
    documents: readonly string[],
    options: StoreBuildOptions,
    limits: {
      minCentrality: number;
      timeoutMs: number;
      deadline: number;
      signal: AbortSignal;
    },
  ): Promise<RankedDomainGraph> {
    const { minCentrality, timeoutMs, deadline, signal } = limits;
    const checkpoint = () => {
      signal.throwIfAborted();
      if (Date.now() > deadline) {
        throw new BuildTimeoutError(key, timeoutMs);
      }
    };

    const graph = await this.builder.build(
      key,
      documents,
      {
        maxNodes: options.maxNodes ?? DEFAULT_MAX_NODES,
        minEdgeWeight: options.minEdgeWeight,
        bigrams: options.bigrams,
      },
      signal,
    );
    checkpoint();

    const ranked = this.ranker.rank(graph);
    checkpoint();

    return minCentrality > 0
      ? this.ranker.retainAbove(ranked, minCentrality)
      : ranked;
  }

  // ============================================
  // PRE-BUILT GRAPHS
  // ============================================

  /**
   * Load a persisted graph and publish it as the domain's entry. Failures
   * are logged and reported in the result.
   */
  async loadPrebuilt(domain: string, path?: string): Promise<LoadResult> {
    let resolved: ResolvedDomain;
    try {
      resolved = resolveDomainName(domain);
    } catch (error) {
      return this.loadFailed(domain, path ?? '', error);
    }

    const source = path ?? this.persistence.pathFor(resolved.slug);
    try {
      const graph = await this.persistence.load(source);
      const fileKey = resolveDomainName(graph.domain).key;
      if (fileKey !== resolved.key) {
        throw new Error(
          `file holds domain "${graph.domain}", expected "${resolved.key}"`,
        );
      }

      this.publish(
        resolved,
        Object.freeze({ ...graph, domain: resolved.key }),
        'prebuilt',
      );
      this.events.next({ type: 'loaded', domain: resolved.key, path: source });
      return { domain: resolved.key, path: source, loaded: true };
    } catch (error) {
      return this.loadFailed(resolved.key, source, error);
    }
  }

  private loadFailed(domain: string, path: string, error: unknown): LoadResult {
    const message = errorMessage(error);
    this.logger.warn(
      `⚠️ Could not load pre-built graph for "${domain}": ${message}`,
    );
    return { domain, path, loaded: false, error: message };
  }

  // ============================================
  // HELPERS
  // ============================================

  private publish(
    resolved: ResolvedDomain,
    graph: RankedDomainGraph,
    source: StoreEntry['source'],
  ): void {
    this.entries.set(
      resolved.key,
      Object.freeze({
        key: resolved.key,
        aliases: resolved.aliases,
        graph,
        source,
        loadedAt: new Date(),
      }),
    );
  }

  private summarize(entry: StoreEntry): DomainSummary {
    return {
      domain: entry.key,
      aliases: entry.aliases,
      source: entry.source,
      nodeCount: entry.graph.nodes.size,
      edgeCount: entry.graph.edges.length,
      builtAt: entry.graph.builtAt,
      loadedAt: entry.loadedAt,
    };
  }

  private readContention(): BuildContention {
    const configured = this.configService.get<string>(
      'KG_BUILD_CONTENTION',
      'wait',
    );
    const policy = BUILD_CONTENTION_POLICIES.find((p) => p === configured);
    if (!policy) {
      this.logger.warn(
        `Unknown KG_BUILD_CONTENTION "${configured}", using "wait"`,
      );
      return 'wait';
    }
    return policy;
  }
}
