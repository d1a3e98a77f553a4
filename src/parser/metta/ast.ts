import type { SyntaxPoint } from '../types.js';

export type MettaNodeKind =
  | 'program'
  | 'comment'
  | 'execution'
  | 'expression'
  | 'empty_expression'
  | 'function_definition'
  | 'function_signature'
  | 'variable'
  | 'atomspace_ref'
  | 'string'
  | 'number'
  | 'operator'
  | 'atom'
  | 'unknown';

/**
 * Node of the MeTTa syntax tree. `endLine` only grows: attaching a child or
 * closing the form pulls it forward, so a parent always ends at or after
 * every one of its children.
 */
export class MettaNode {
  readonly children: MettaNode[] = [];
  private _endLine: number;

  constructor(
    readonly type: MettaNodeKind,
    readonly value: string,
    readonly startLine: number,
    endLine: number = startLine
  ) {
    this._endLine = Math.max(endLine, startLine);
  }

  get endLine(): number {
    return this._endLine;
  }

  /** 0-based, mirroring tree-sitter positions (column is not tracked) */
  get startPosition(): SyntaxPoint {
    return { row: this.startLine - 1, column: 0 };
  }

  get endPosition(): SyntaxPoint {
    return { row: this._endLine - 1, column: 0 };
  }

  addChild(child: MettaNode): void {
    this.children.push(child);
    this.extendTo(child.endLine);
  }

  /** Record the line of the token that closes this form */
  extendTo(line: number): void {
    if (line > this._endLine) {
      this._endLine = line;
    }
  }
}

export interface MettaTree {
  rootNode: MettaNode;
}
