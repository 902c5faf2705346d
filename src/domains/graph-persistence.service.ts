import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { plainToInstance } from 'class-transformer';
import { validate } from 'class-validator';
import { mkdir, readFile, rename, rm, writeFile } from 'node:fs/promises';
import { dirname, join, resolve } from 'node:path';
import { PersistenceError } from '../common/errors/knowledge-graph.errors';
import {
  describeValidationErrors,
  errorMessage,
} from '../common/utils/validation';
import {
  CoOccurrenceEdge,
  RankedDomainGraph,
  TermNode,
  withDegrees,
} from '../graph/types/domain-graph.types';
import { TermExtractorService } from '../text/term-extractor.service';
import { PersistedGraphDto } from './dto/persisted-graph.dto';

export const DEFAULT_GRAPH_DIR = 'knowledge_graphs';

/**
 * Reads and writes ranked domain graphs as JSON files, one per domain, under
 * `KG_GRAPH_DIR`.
 */
@Injectable()
export class GraphPersistenceService {
  private readonly logger = new Logger(GraphPersistenceService.name);
  readonly graphDir: string;

  constructor(
    private readonly configService: ConfigService,
    private readonly extractor: TermExtractorService,
  ) {
    this.graphDir = resolve(
      this.configService.get<string>('KG_GRAPH_DIR', DEFAULT_GRAPH_DIR),
    );
  }

  pathFor(slug: string): string {
    return join(this.graphDir, `${slug}.json`);
  }

  // ============================================
  // CODEC
  // ============================================

  serialize(graph: RankedDomainGraph): PersistedGraphDto {
    return {
      domain: graph.domain,
      nodes: [...graph.nodes.values()].map((node) => ({
        term: node.term,
        doc_frequency: node.docFrequency,
        centrality: graph.centrality.get(node.term) ?? 0,
      })),
      edges: graph.edges.map((edge) => ({
        source: edge.source,
        target: edge.target,
        weight: edge.weight,
      })),
      built_at: graph.builtAt.toISOString(),
    };
  }

  /**
   * Validate a parsed JSON value and turn it into a ranked graph. Terms are
   * brought to canonical form, so two stored terms that differ only in case
   * or punctuation are a duplicate. Stored scores are restored as they are;
   * nothing is re-ranked.
   */
  async deserialize(raw: unknown): Promise<RankedDomainGraph> {
    if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
      throw new PersistenceError('Persisted graph must be a JSON object');
    }

    const dto = plainToInstance(PersistedGraphDto, raw);
    const errors = await validate(dto);
    if (errors.length > 0) {
      throw new PersistenceError(
        `Invalid persisted graph: ${describeValidationErrors(errors).join('; ')}`,
      );
    }

    const nodes: TermNode[] = [];
    const centrality = new Map<string, number>();
    for (const node of dto.nodes) {
      const term = this.canonicalTerm(node.term);
      if (centrality.has(term)) {
        throw new PersistenceError(
          `Invalid persisted graph: duplicate term "${term}"`,
        );
      }
      nodes.push({ term, docFrequency: node.doc_frequency, degree: 0 });
      centrality.set(term, node.centrality);
    }

    const seen = new Set<string>();
    const edges: CoOccurrenceEdge[] = [];
    for (const edge of dto.edges) {
      const source = this.canonicalTerm(edge.source);
      const target = this.canonicalTerm(edge.target);
      if (!centrality.has(source) || !centrality.has(target)) {
        throw new PersistenceError(
          `Invalid persisted graph: edge "${source}" - "${target}" references an unknown term`,
        );
      }
      if (source === target) {
        throw new PersistenceError(
          `Invalid persisted graph: self-loop on "${source}"`,
        );
      }
      const [a, b] = source < target ? [source, target] : [target, source];
      const key = `${a}\t${b}`;
      if (seen.has(key)) {
        throw new PersistenceError(
          `Invalid persisted graph: duplicate edge "${a}" - "${b}"`,
        );
      }
      seen.add(key);
      edges.push(Object.freeze({ source: a, target: b, weight: edge.weight }));
    }

    return Object.freeze({
      domain: dto.domain,
      nodes: withDegrees(nodes, edges),
      edges: Object.freeze(edges),
      builtAt: new Date(dto.built_at),
      centrality,
    });
  }

  private canonicalTerm(raw: string): string {
    const term = this.extractor.canonicalize(raw);
    if (term.length === 0) {
      throw new PersistenceError(
        `Invalid persisted graph: term "${raw}" has no letters or digits`,
      );
    }
    return term;
  }

  // ============================================
  // FILES
  // ============================================

  /**
   * Write a graph to `<graphDir>/<slug>.json`. The file is written beside the
   * target first and renamed over it, so readers never see a partial file.
   */
  async save(slug: string, graph: RankedDomainGraph): Promise<string> {
    const path = this.pathFor(slug);
    const tempPath = `${path}.${process.pid}.${Date.now()}.tmp`;
    const body = JSON.stringify(this.serialize(graph), null, 2);

    try {
      await mkdir(dirname(path), { recursive: true });
      await writeFile(tempPath, body, 'utf8');
      await rename(tempPath, path);
    } catch (error) {
      await rm(tempPath, { force: true });
      throw new PersistenceError(
        `Failed to write graph for "${graph.domain}" to ${path}: ${errorMessage(error)}`,
      );
    }

    this.logger.log(`💾 Saved graph for "${graph.domain}" to ${path}`);
    return path;
  }

  async load(path: string): Promise<RankedDomainGraph> {
    let text: string;
    try {
      text = await readFile(path, 'utf8');
    } catch (error) {
      throw new PersistenceError(
        `Failed to read graph file ${path}: ${errorMessage(error)}`,
      );
    }

    let raw: unknown;
    try {
      raw = JSON.parse(text);
    } catch (error) {
      throw new PersistenceError(
        `Graph file ${path} is not valid JSON: ${errorMessage(error)}`,
      );
    }

    return this.deserialize(raw);
  }
}
