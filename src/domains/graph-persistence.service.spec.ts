import { ConfigService } from '@nestjs/config';
import { mkdtempSync, readdirSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { PersistenceError } from '../common/errors/knowledge-graph.errors';
import { CentralityRankerService } from '../graph/centrality-ranker.service';
import { graphOf } from '../../test/fixtures/graph.fixtures';
import { TermExtractorService } from '../text/term-extractor.service';
import { GraphPersistenceService } from './graph-persistence.service';

describe('GraphPersistenceService', () => {
  let dir: string;
  let persistence: GraphPersistenceService;

  const validFile = () => ({
    domain: 'oncology',
    nodes: [
      { term: 'tumour', doc_frequency: 3, centrality: 0.75 },
      { term: 'biopsy', doc_frequency: 1, centrality: 0.25 },
    ],
    edges: [{ source: 'tumour', target: 'biopsy', weight: 2 }],
    built_at: '2024-01-01T00:00:00.000Z',
  });

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'kg-persist-'));
    persistence = new GraphPersistenceService(
      new ConfigService({ KG_GRAPH_DIR: join(dir, 'graphs') }),
      new TermExtractorService(),
    );
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('round-trips a ranked graph through a file', async () => {
    const graph = new CentralityRankerService().rank(
      graphOf(
        ['alpha', 'beta', 'gamma', 'delta'],
        [
          ['alpha', 'beta'],
          ['beta', 'gamma'],
          ['beta', 'delta'],
        ],
        'oncology',
      ),
    );

    const path = await persistence.save('oncology', graph);
    const loaded = await persistence.load(path);

    expect(path).toBe(join(dir, 'graphs', 'oncology.json'));
    expect(loaded.domain).toBe('oncology');
    expect([...loaded.nodes.values()]).toEqual([...graph.nodes.values()]);
    expect(loaded.edges).toEqual(graph.edges);
    expect(loaded.builtAt.toISOString()).toBe('2024-01-01T00:00:00.000Z');
    for (const [term, score] of graph.centrality) {
      expect(loaded.centrality.get(term)).toBeCloseTo(score, 9);
    }
  });

  it('leaves no temporary file behind', async () => {
    const graph = new CentralityRankerService().rank(graphOf(['alpha'], []));

    await persistence.save('solo', graph);

    expect(readdirSync(join(dir, 'graphs'))).toEqual(['solo.json']);
  });

  it('serializes to the snake_case file format', () => {
    const graph = new CentralityRankerService().rank(
      graphOf(['alpha', 'beta'], [['alpha', 'beta']]),
    );

    expect(persistence.serialize(graph)).toEqual({
      domain: 'test',
      nodes: [
        { term: 'alpha', doc_frequency: 1, centrality: 0.5 },
        { term: 'beta', doc_frequency: 1, centrality: 0.5 },
      ],
      edges: [{ source: 'alpha', target: 'beta', weight: 1 }],
      built_at: '2024-01-01T00:00:00.000Z',
    });
  });

  it('restores stored scores and recomputes degrees', async () => {
    const graph = await persistence.deserialize(validFile());

    expect(graph.centrality.get('tumour')).toBe(0.75);
    expect(graph.nodes.get('biopsy')).toEqual({
      term: 'biopsy',
      docFrequency: 1,
      degree: 1,
    });
    expect(graph.edges).toEqual([
      { source: 'biopsy', target: 'tumour', weight: 2 },
    ]);
  });

  it('reports a missing file', async () => {
    await expect(
      persistence.load(join(dir, 'missing.json')),
    ).rejects.toThrow(/^Failed to read graph file/);
  });

  it('reports a file that is not JSON', async () => {
    const path = join(dir, 'broken.json');
    writeFileSync(path, '{ "domain": ');

    await expect(persistence.load(path)).rejects.toThrow(/is not valid JSON/);
  });

  it('rejects a value that is not an object', async () => {
    await expect(persistence.deserialize([1, 2])).rejects.toThrow(
      'Persisted graph must be a JSON object',
    );
  });

  it('rejects out-of-range centrality', async () => {
    const file = validFile();
    file.nodes[0].centrality = 1.5;

    await expect(persistence.deserialize(file)).rejects.toThrow(
      /nodes\.0\.centrality/,
    );
  });

  it('rejects a missing timestamp', async () => {
    const { built_at: _builtAt, ...file } = validFile();

    await expect(persistence.deserialize(file)).rejects.toBeInstanceOf(
      PersistenceError,
    );
  });

  it('rejects duplicate terms', async () => {
    const file = validFile();
    file.nodes.push({ term: 'tumour', doc_frequency: 1, centrality: 0 });

    await expect(persistence.deserialize(file)).rejects.toThrow(
      'Invalid persisted graph: duplicate term "tumour"',
    );
  });

  it('rejects edges to unknown terms', async () => {
    const file = validFile();
    file.edges.push({ source: 'tumour', target: 'scan', weight: 1 });

    await expect(persistence.deserialize(file)).rejects.toThrow(
      'Invalid persisted graph: edge "tumour" - "scan" references an unknown term',
    );
  });

  it('rejects the same edge stored in both directions', async () => {
    const file = validFile();
    file.edges.push({ source: 'biopsy', target: 'tumour', weight: 1 });

    await expect(persistence.deserialize(file)).rejects.toThrow(
      'Invalid persisted graph: duplicate edge "biopsy" - "tumour"',
    );
  });

  it('brings stored terms to canonical form', async () => {
    const graph = await persistence.deserialize({
      domain: 'oncology',
      nodes: [
        { term: 'Tumour', doc_frequency: 3, centrality: 0.75 },
        { term: 'Fine-Needle  Biopsy', doc_frequency: 1, centrality: 0.25 },
      ],
      edges: [{ source: 'TUMOUR', target: 'fine needle biopsy', weight: 2 }],
      built_at: '2024-01-01T00:00:00.000Z',
    });

    expect([...graph.centrality]).toEqual([
      ['tumour', 0.75],
      ['fine needle biopsy', 0.25],
    ]);
    expect(graph.edges).toEqual([
      { source: 'fine needle biopsy', target: 'tumour', weight: 2 },
    ]);
  });

  it('rejects terms that collapse to the same canonical form', async () => {
    const file = validFile();
    file.nodes.push({ term: 'Tumour!', doc_frequency: 1, centrality: 0 });

    await expect(persistence.deserialize(file)).rejects.toThrow(
      'Invalid persisted graph: duplicate term "tumour"',
    );
  });

  it('rejects a term without letters or digits', async () => {
    const file = validFile();
    file.nodes.push({ term: '???', doc_frequency: 1, centrality: 0 });

    await expect(persistence.deserialize(file)).rejects.toThrow(
      'Invalid persisted graph: term "???" has no letters or digits',
    );
  });
});
