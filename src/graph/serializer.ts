import { DirectedGraph } from 'graphology';
import type {
  DefinitionGraph,
  EdgeRelation,
  GraphEdgeAttributes,
  GraphNodeAttributes,
  GraphNodeType,
} from './index.js';

export interface GraphNodeRecord {
  id: string;
  type: GraphNodeType;
  name: string;
  language?: string;
}

export interface GraphEdgeRecord {
  source: string;
  target: string;
  relation: EdgeRelation;
}

export interface GraphDocument {
  root: string;
  nodes: GraphNodeRecord[];
  edges: GraphEdgeRecord[];
  metadata: {
    generated_at: string;
    node_count: number;
    edge_count: number;
  };
}

export function exportToJSON(graph: DefinitionGraph, root: string): GraphDocument {
  const nodes: GraphNodeRecord[] = [];
  const edges: GraphEdgeRecord[] = [];

  graph.forEachNode((nodeId, attrs) => {
    nodes.push({
      id: nodeId,
      type: attrs.type,
      name: attrs.name,
      ...(attrs.language ? { language: attrs.language } : {}),
    });
  });

  graph.forEachEdge((_edge, attrs, source, target) => {
    edges.push({ source, target, relation: attrs.relation });
  });

  return {
    root,
    nodes,
    edges,
    metadata: {
      generated_at: new Date().toISOString(),
      node_count: nodes.length,
      edge_count: edges.length,
    },
  };
}

export function importFromJSON(json: GraphDocument): DefinitionGraph {
  const graph: DefinitionGraph = new DirectedGraph<GraphNodeAttributes, GraphEdgeAttributes>();

  for (const node of json.nodes) {
    graph.mergeNode(node.id, {
      type: node.type,
      name: node.name,
      ...(node.language ? { language: node.language } : {}),
    });
  }

  for (const edge of json.edges) {
    if (graph.hasNode(edge.source) && graph.hasNode(edge.target)) {
      graph.mergeEdge(edge.source, edge.target, { relation: edge.relation });
    }
  }

  return graph;
}
