import type { DefinitionGraph, EdgeRelation, GraphNodeType } from './index.js';

export interface GraphSummary {
  nodeCount: number;
  edgeCount: number;
  nodesByType: Record<GraphNodeType, number>;
  edgesByRelation: Record<EdgeRelation, number>;
}

export function getGraphSummary(graph: DefinitionGraph): GraphSummary {
  const nodesByType: Record<GraphNodeType, number> = {
    folder: 0,
    file: 0,
    class: 0,
    function: 0,
    variable: 0,
  };
  const edgesByRelation: Record<EdgeRelation, number> = {
    contains: 0,
    defines: 0,
    hasMethod: 0,
    uses: 0,
  };

  graph.forEachNode((_node, attrs) => {
    nodesByType[attrs.type]++;
  });

  graph.forEachEdge((_edge, attrs) => {
    edgesByRelation[attrs.relation]++;
  });

  return {
    nodeCount: graph.order,
    edgeCount: graph.size,
    nodesByType,
    edgesByRelation,
  };
}

/**
 * Nodes reachable from `nodeId` through outgoing edges of one relation,
 * e.g. the methods of a class (`hasMethod`) or the files of a folder
 * (`contains`).
 */
export function getRelated(graph: DefinitionGraph, nodeId: string, relation: EdgeRelation): string[] {
  if (!graph.hasNode(nodeId)) return [];

  const related: string[] = [];
  graph.forEachOutEdge(nodeId, (_edge, attrs, _source, target) => {
    if (attrs.relation === relation) {
      related.push(target);
    }
  });
  return related;
}
