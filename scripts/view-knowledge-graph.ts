/**
 * view-knowledge-graph.ts
 *
 * Usage:
 *  npm run build && npm run kg:view -- [domain] [limit]
 *
 * Prints statistics and the most central terms of a persisted graph without
 * starting the application.
 */

import 'reflect-metadata';
import { ConfigService } from '@nestjs/config';
import { resolveDomainName } from '../src/domains/domain-names';
import { GraphPersistenceService } from '../src/domains/graph-persistence.service';
import { CentralityRankerService } from '../src/graph/centrality-ranker.service';
import { TermExtractorService } from '../src/text/term-extractor.service';

async function main() {
  const domain = process.argv[2] ?? 'cancer health care';
  const limit = Number(process.argv[3] ?? 20);

  const persistence = new GraphPersistenceService(
    new ConfigService(),
    new TermExtractorService(),
  );
  const path = persistence.pathFor(resolveDomainName(domain).slug);
  const graph = await persistence.load(path);

  const ranked = new CentralityRankerService().rankedTerms(graph);
  const isolated = [...graph.nodes.values()].filter((n) => n.degree === 0);
  const strongest = [...graph.edges]
    .sort((a, b) => b.weight - a.weight)
    .slice(0, 5);

  console.log('='.repeat(60));
  console.log(`📊 ${graph.domain}  (${path})`);
  console.log('='.repeat(60));
  console.log(`   Built at:       ${graph.builtAt.toISOString()}`);
  console.log(`   Nodes:          ${graph.nodes.size}`);
  console.log(`   Edges:          ${graph.edges.length}`);
  console.log(`   Isolated nodes: ${isolated.length}`);

  console.log(`\n🏆 Top ${Math.min(limit, ranked.length)} terms by centrality:`);
  ranked.slice(0, limit).forEach(({ term, score }, i) => {
    const node = graph.nodes.get(term);
    console.log(
      `   ${String(i + 1).padStart(3)}. ${score.toFixed(3)}  ${term}  (docs: ${node?.docFrequency ?? 0}, degree: ${node?.degree ?? 0})`,
    );
  });

  console.log('\n🔗 Strongest co-occurrences:');
  for (const edge of strongest) {
    console.log(`   ${edge.weight}x  ${edge.source} - ${edge.target}`);
  }
}

main().catch((error: unknown) => {
  console.error('\n❌ Could not read graph:', error);
  process.exit(1);
});
