import { DirectedGraph } from 'graphology';
import type { FunctionDef, TreeNode } from '../parser/types.js';

export type GraphNodeType = 'folder' | 'file' | 'class' | 'function' | 'variable';

export type EdgeRelation = 'contains' | 'defines' | 'hasMethod' | 'uses';

// graphology attributes must be index-signature compatible, hence type aliases
export type GraphNodeAttributes = {
  type: GraphNodeType;
  name: string;
  language?: string;
};

export type GraphEdgeAttributes = {
  relation: EdgeRelation;
};

export type DefinitionGraph = DirectedGraph<GraphNodeAttributes, GraphEdgeAttributes>;

export interface BuildGraphOptions {
  /** Add a variable node and a `uses` edge for every variable a function declares */
  includeVariables?: boolean;
}

/**
 * Derive the definition graph from a finished tree.
 *
 * Ids come from positions in the tree only: folders and files use their
 * path, classes and functions `<parent>:<name>`, variables
 * `<function>::var::<name>`. The same tree always yields the same ids.
 */
export function buildGraph(tree: TreeNode, options: BuildGraphOptions = {}): DefinitionGraph {
  const graph: DefinitionGraph = new DirectedGraph<GraphNodeAttributes, GraphEdgeAttributes>();
  addTreeNode(graph, tree, null, options);
  return graph;
}

function addTreeNode(
  graph: DefinitionGraph,
  node: TreeNode,
  parentId: string | null,
  options: BuildGraphOptions
): void {
  const nodeId = node.path || node.name;

  graph.mergeNode(nodeId, {
    type: node.type,
    name: node.name,
    ...(node.type === 'file' && node.language ? { language: node.language } : {}),
  });

  if (parentId !== null) {
    graph.mergeEdge(parentId, nodeId, { relation: 'contains' });
  }

  if (node.type === 'folder') {
    for (const child of node.children) {
      addTreeNode(graph, child, nodeId, options);
    }
    return;
  }

  const definitions = node.definitions;
  if (!definitions) return;

  if ('classes' in definitions) {
    for (const cls of definitions.classes) {
      const classId = `${nodeId}:${cls.name}`;
      graph.mergeNode(classId, { type: 'class', name: cls.name });
      graph.mergeEdge(nodeId, classId, { relation: 'defines' });

      for (const method of cls.functions) {
        const methodId = addFunction(graph, classId, method.name, 'hasMethod');
        if (options.includeVariables) {
          addVariables(graph, methodId, method);
        }
      }
    }

    for (const fn of definitions.functions) {
      const fnId = addFunction(graph, nodeId, fn.name, 'defines');
      if (options.includeVariables) {
        addVariables(graph, fnId, fn);
      }
    }
    return;
  }

  for (const fn of definitions.functions) {
    addFunction(graph, nodeId, fn.name, 'defines');
  }
}

function addFunction(
  graph: DefinitionGraph,
  ownerId: string,
  name: string,
  relation: 'defines' | 'hasMethod'
): string {
  const fnId = `${ownerId}:${name}`;
  graph.mergeNode(fnId, { type: 'function', name });
  graph.mergeEdge(ownerId, fnId, { relation });
  return fnId;
}

function addVariables(graph: DefinitionGraph, fnId: string, fn: FunctionDef): void {
  for (const variable of fn.variables) {
    const varId = `${fnId}::var::${variable}`;
    graph.mergeNode(varId, { type: 'variable', name: variable });
    graph.mergeEdge(fnId, varId, { relation: 'uses' });
  }
}
