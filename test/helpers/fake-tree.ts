import type { SyntaxNodeLike } from '../../src/parser/types.js';

export interface FakeNodeOptions {
  text?: string;
  startRow?: number;
  endRow?: number;
  fields?: Record<string, SyntaxNodeLike>;
  children?: SyntaxNodeLike[];
}

/**
 * In-process stand-in for a tree-sitter node. Field nodes are also listed
 * as children, the way tree-sitter exposes them.
 */
export function fakeNode(type: string, options: FakeNodeOptions = {}): SyntaxNodeLike {
  const fields = options.fields ?? {};
  const children = [...Object.values(fields), ...(options.children ?? [])];
  const startRow = options.startRow ?? 0;

  return {
    type,
    text: options.text ?? children.map(child => child.text).join(' '),
    startPosition: { row: startRow, column: 0 },
    endPosition: { row: options.endRow ?? startRow, column: 0 },
    children,
    childForFieldName: (fieldName: string) => fields[fieldName] ?? null,
  };
}

export function identifier(name: string, row = 0): SyntaxNodeLike {
  return fakeNode('identifier', { text: name, startRow: row });
}
