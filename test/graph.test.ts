import { describe, it, expect } from 'vitest';
import { buildGraph } from '../src/graph/index.js';
import { exportToJSON, importFromJSON } from '../src/graph/serializer.js';
import { getGraphSummary, getRelated } from '../src/graph/queries.js';
import type { FolderNode, MettaDefinitions } from '../src/parser/types.js';

const mettaDefinitions: MettaDefinitions = {
  functions: [{ name: 'grandparent', start_line: 3, end_line: 4, parameters: ['$x', '$z'] }],
  executions: [{ line: 6, expression: 'grandparent(2 args)' }],
  facts: [{ line: 1, pattern: 'parent(2 args)', subject: 'parent' }],
  expressions: [],
  variables: ['$x', '$z'],
  atomspaces: ['&self'],
  summary: {
    function_count: 1,
    expression_count: 0,
    execution_count: 1,
    fact_count: 1,
    variable_count: 2,
    atomspace_count: 1,
  },
};

function sampleTree(): FolderNode {
  return {
    name: 'proj',
    path: '/proj',
    type: 'folder',
    children: [
      {
        name: 'app.py',
        path: '/proj/app.py',
        type: 'file',
        language: 'python',
        parser_kind: 'external',
        definitions: {
          classes: [
            {
              name: 'Greeter',
              line: 1,
              functions: [{ name: 'greet', line: 2, variables: ['msg', 'msg'], line_count: 3 }],
            },
          ],
          functions: [{ name: 'main', line: 6, variables: ['g'], line_count: 2 }],
        },
      },
      {
        name: 'kb.metta',
        path: '/proj/kb.metta',
        type: 'file',
        language: 'metta',
        parser_kind: 'dsl',
        definitions: mettaDefinitions,
      },
      { name: 'README.md', path: '/proj/README.md', type: 'file' },
      { name: 'broken.go', path: '/proj/broken.go', type: 'file', language: 'go', parse_error: 'boom' },
    ],
  };
}

describe('Graph builder', () => {
  it('should derive ids from tree positions', () => {
    const graph = buildGraph(sampleTree());

    expect(graph.nodes().sort()).toEqual([
      '/proj',
      '/proj/README.md',
      '/proj/app.py',
      '/proj/app.py:Greeter',
      '/proj/app.py:Greeter:greet',
      '/proj/app.py:main',
      '/proj/broken.go',
      '/proj/kb.metta',
      '/proj/kb.metta:grandparent',
    ]);
  });

  it('should connect nodes with the right relations', () => {
    const graph = buildGraph(sampleTree());

    expect(getRelated(graph, '/proj', 'contains')).toEqual([
      '/proj/app.py',
      '/proj/kb.metta',
      '/proj/README.md',
      '/proj/broken.go',
    ]);
    expect(getRelated(graph, '/proj/app.py', 'defines')).toEqual(['/proj/app.py:Greeter', '/proj/app.py:main']);
    expect(getRelated(graph, '/proj/app.py:Greeter', 'hasMethod')).toEqual(['/proj/app.py:Greeter:greet']);
    expect(getRelated(graph, '/proj/kb.metta', 'defines')).toEqual(['/proj/kb.metta:grandparent']);
    expect(getRelated(graph, '/proj/broken.go', 'defines')).toEqual([]);
  });

  it('should record node attributes', () => {
    const graph = buildGraph(sampleTree());

    expect(graph.getNodeAttributes('/proj')).toEqual({ type: 'folder', name: 'proj' });
    expect(graph.getNodeAttributes('/proj/kb.metta')).toEqual({ type: 'file', name: 'kb.metta', language: 'metta' });
    expect(graph.getNodeAttributes('/proj/README.md')).toEqual({ type: 'file', name: 'README.md' });
    expect(graph.getNodeAttributes('/proj/app.py:Greeter:greet')).toEqual({ type: 'function', name: 'greet' });
  });

  it('should leave variables out unless asked', () => {
    const summary = getGraphSummary(buildGraph(sampleTree()));

    expect(summary).toEqual({
      nodeCount: 9,
      edgeCount: 8,
      nodesByType: { folder: 1, file: 4, class: 1, function: 3, variable: 0 },
      edgesByRelation: { contains: 4, defines: 3, hasMethod: 1, uses: 0 },
    });
  });

  it('should add one uses edge per distinct variable of conventional functions', () => {
    const graph = buildGraph(sampleTree(), { includeVariables: true });

    expect(getRelated(graph, '/proj/app.py:Greeter:greet', 'uses')).toEqual(['/proj/app.py:Greeter:greet::var::msg']);
    expect(getRelated(graph, '/proj/app.py:main', 'uses')).toEqual(['/proj/app.py:main::var::g']);
    expect(getRelated(graph, '/proj/kb.metta:grandparent', 'uses')).toEqual([]);
    expect(graph.getNodeAttributes('/proj/app.py:main::var::g')).toEqual({ type: 'variable', name: 'g' });
    expect(getGraphSummary(graph).edgesByRelation.uses).toBe(2);
  });

  it('should fall back to the name when a node has no path', () => {
    const graph = buildGraph({
      name: 'root',
      path: '',
      type: 'folder',
      children: [{ name: 'a.metta', path: '', type: 'file', language: 'metta' }],
    });

    expect(graph.nodes()).toEqual(['root', 'a.metta']);
    expect(getRelated(graph, 'root', 'contains')).toEqual(['a.metta']);
  });

  it('should build the same graph from the same tree', () => {
    const first = exportToJSON(buildGraph(sampleTree()), '/proj');
    const second = exportToJSON(buildGraph(sampleTree()), '/proj');

    expect(second.nodes).toEqual(first.nodes);
    expect(second.edges).toEqual(first.edges);
  });

  it('should return no related nodes for an unknown id', () => {
    expect(getRelated(buildGraph(sampleTree()), '/nowhere', 'contains')).toEqual([]);
  });
});

describe('Graph serialization', () => {
  it('should export nodes, edges and counts', () => {
    const doc = exportToJSON(buildGraph(sampleTree()), '/proj');

    expect(doc.root).toBe('/proj');
    expect(doc.metadata.node_count).toBe(9);
    expect(doc.metadata.edge_count).toBe(8);
    expect(doc.nodes).toContainEqual({ id: '/proj/app.py', type: 'file', name: 'app.py', language: 'python' });
    expect(doc.edges).toContainEqual({
      source: '/proj/app.py:Greeter',
      target: '/proj/app.py:Greeter:greet',
      relation: 'hasMethod',
    });
  });

  it('should rebuild an equivalent graph from its document', () => {
    const graph = buildGraph(sampleTree(), { includeVariables: true });
    const restored = importFromJSON(exportToJSON(graph, '/proj'));

    expect(getGraphSummary(restored)).toEqual(getGraphSummary(graph));
    expect(restored.getNodeAttributes('/proj/app.py')).toEqual(graph.getNodeAttributes('/proj/app.py'));
  });

  it('should drop edges whose endpoints are missing', () => {
    const restored = importFromJSON({
      root: '/x',
      nodes: [{ id: '/x', type: 'folder', name: 'x' }],
      edges: [{ source: '/x', target: '/x/missing', relation: 'contains' }],
      metadata: { generated_at: '2024-01-01T00:00:00.000Z', node_count: 1, edge_count: 1 },
    });

    expect(restored.order).toBe(1);
    expect(restored.size).toBe(0);
  });
});
