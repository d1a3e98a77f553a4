import { tokenize } from './lexer.js';
import type { Token, TokenKind } from './lexer.js';
import { MettaNode } from './ast.js';
import type { MettaNodeKind, MettaTree } from './ast.js';

const ATOM_NODE_KINDS: Partial<Record<TokenKind, MettaNodeKind>> = {
  variable: 'variable',
  atomspace: 'atomspace_ref',
  string: 'string',
  number: 'number',
  operator: 'operator',
  atom: 'atom',
};

const lenientDecoder = new TextDecoder('utf-8');

/**
 * Recursive-descent parser for MeTTa with one token of lookahead.
 *
 * The grammar is lenient on purpose: tokens that cannot start a top-level
 * form are skipped, and running out of input inside an open form ends that
 * form where the input ends instead of failing.
 */
export class MettaParser {
  private tokens: Token[] = [];
  private current = 0;

  parse(source: Uint8Array | string): MettaTree {
    const code = typeof source === 'string' ? source : lenientDecoder.decode(source);

    this.tokens = tokenize(code);
    this.current = 0;

    const root = new MettaNode('program', '', 1);

    while (!this.isAtEnd()) {
      const form = this.parseTopLevel();
      if (form) {
        root.addChild(form);
      }
    }

    return { rootNode: root };
  }

  private isAtEnd(): boolean {
    return this.current >= this.tokens.length;
  }

  private peek(): Token | undefined {
    return this.tokens[this.current];
  }

  private advance(): Token | undefined {
    const token = this.tokens[this.current];
    if (token) {
      this.current++;
    }
    return token;
  }

  private check(kind: TokenKind): boolean {
    return this.peek()?.kind === kind;
  }

  private parseTopLevel(): MettaNode | null {
    const token = this.peek();
    if (!token) return null;

    switch (token.kind) {
      case 'comment':
        this.advance();
        return new MettaNode('comment', token.text.trim(), token.line);
      case 'execute':
        return this.parseExecution();
      case 'lparen':
        return this.parseExpression();
      default:
        this.advance();
        return null;
    }
  }

  private parseExecution(): MettaNode | null {
    const bang = this.advance();
    if (!bang) return null;

    const execution = new MettaNode('execution', '!', bang.line);
    if (this.check('lparen')) {
      execution.addChild(this.parseExpression());
    }
    return execution;
  }

  /** Parses a parenthesized form; the current token is the opening paren */
  private parseExpression(): MettaNode {
    const lparen = this.advance();
    const startLine = lparen?.line ?? 1;

    if (this.isAtEnd() || this.check('rparen')) {
      const empty = new MettaNode('empty_expression', '', startLine);
      this.closeForm(empty);
      return empty;
    }

    const form = this.check('equals')
      ? this.parseFunctionDefinition(startLine)
      : this.parseCall(startLine);

    this.closeForm(form);
    return form;
  }

  private closeForm(node: MettaNode): void {
    if (this.check('rparen')) {
      const rparen = this.advance();
      if (rparen) {
        node.extendTo(rparen.line);
      }
    }
  }

  private parseFunctionDefinition(startLine: number): MettaNode {
    this.advance(); // '='

    const definition = new MettaNode('function_definition', '', startLine);

    if (this.check('lparen')) {
      const signature = this.parseSignature();
      if (signature) {
        definition.addChild(signature);
      }
    }

    this.collectElements(definition);
    return definition;
  }

  private parseSignature(): MettaNode | null {
    this.advance(); // '('

    if (this.isAtEnd() || this.check('rparen')) {
      // `()` as a signature names nothing; its ')' is left for the body loop
      return null;
    }

    const nameToken = this.advance();
    if (!nameToken) return null;

    const signature = new MettaNode('function_signature', nameToken.text, nameToken.line);
    this.collectElements(signature);
    this.closeForm(signature);
    return signature;
  }

  private parseCall(startLine: number): MettaNode {
    const call = new MettaNode('expression', '', startLine);
    this.collectElements(call);
    return call;
  }

  /** Attach elements to `parent` until the closing paren or end of input */
  private collectElements(parent: MettaNode): void {
    while (!this.isAtEnd() && !this.check('rparen')) {
      const element = this.parseElement();
      if (element) {
        parent.addChild(element);
      }
    }
  }

  private parseElement(): MettaNode | null {
    if (this.check('lparen')) {
      return this.parseExpression();
    }

    const token = this.advance();
    if (!token) return null;

    const kind = ATOM_NODE_KINDS[token.kind] ?? 'unknown';
    return new MettaNode(kind, token.text, token.line);
  }
}

export function createMettaParser(): MettaParser {
  return new MettaParser();
}
