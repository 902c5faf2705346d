/**
 * build-knowledge-graph.ts
 *
 * Usage:
 *  npm run build && npm run kg:build -- [corpus.json]
 *
 * The corpus file holds `{ "domain": string, "documents": string[] }`.
 * MAX_NODES, MIN_EDGE_WEIGHT and MIN_CENTRALITY override the build options.
 * The graph is written to KG_GRAPH_DIR (default ./knowledge_graphs).
 */

import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { readFileSync } from 'node:fs';
import { resolve } from 'node:path';
import { AppModule } from '../src/app.module';
import { DomainGraphStoreService } from '../src/domains/domain-graph-store.service';
import { GraphPersistenceService } from '../src/domains/graph-persistence.service';
import { DEFAULT_MAX_NODES } from '../src/domains/types/domain-store.types';
import { CentralityRankerService } from '../src/graph/centrality-ranker.service';
import { DEFAULT_MIN_EDGE_WEIGHT } from '../src/graph/types/domain-graph.types';

const DEFAULT_CORPUS = 'data/corpora/cancer-health-care.json';

interface Corpus {
  domain: string;
  documents: string[];
}

function isCorpus(value: unknown): value is Corpus {
  return (
    typeof value === 'object' &&
    value !== null &&
    'domain' in value &&
    typeof value.domain === 'string' &&
    'documents' in value &&
    Array.isArray(value.documents) &&
    value.documents.every((d: unknown) => typeof d === 'string')
  );
}

function numberFromEnv(name: string, fallback: number): number {
  const raw = process.env[name];
  return raw === undefined || raw === '' ? fallback : Number(raw);
}

async function main() {
  const corpusPath = resolve(process.argv[2] ?? DEFAULT_CORPUS);
  console.log(`🚀 Building knowledge graph from ${corpusPath}`);

  const corpus: unknown = JSON.parse(readFileSync(corpusPath, 'utf-8'));
  if (!isCorpus(corpus)) {
    throw new Error(
      'Corpus file must hold { "domain": string, "documents": string[] }',
    );
  }
  console.log(`📋 ${corpus.documents.length} documents for "${corpus.domain}"`);

  const app = await NestFactory.createApplicationContext(AppModule, {
    logger: ['error', 'warn'],
  });
  const controller = new AbortController();
  const cancel = () => controller.abort();
  process.once('SIGINT', cancel);

  try {
    const store = app.get(DomainGraphStoreService);
    const startTime = Date.now();

    const graph = await store.rebuild(corpus.domain, corpus.documents, {
      maxNodes: numberFromEnv('MAX_NODES', DEFAULT_MAX_NODES),
      minEdgeWeight: numberFromEnv('MIN_EDGE_WEIGHT', DEFAULT_MIN_EDGE_WEIGHT),
      minCentrality: numberFromEnv('MIN_CENTRALITY', 0.05),
      signal: controller.signal,
    });

    const { slug } = store.resolve(corpus.domain);
    console.log(
      `\n✅ ${graph.nodes.size} nodes, ${graph.edges.length} edges in ${Date.now() - startTime}ms`,
    );
    console.log(`💾 Saved to ${app.get(GraphPersistenceService).pathFor(slug)}`);

    console.log('\n📊 Most central terms:');
    for (const { term, score } of app
      .get(CentralityRankerService)
      .rankedTerms(graph)
      .slice(0, 10)) {
      console.log(`   ${score.toFixed(3)}  ${term}`);
    }
  } finally {
    process.off('SIGINT', cancel);
    await app.close();
  }
}

main().catch((error: unknown) => {
  console.error('\n❌ Build failed:', error);
  process.exit(1);
});
