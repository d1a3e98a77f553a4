export type TokenKind =
  | 'comment'
  | 'execute'
  | 'lparen'
  | 'rparen'
  | 'lbracket'
  | 'rbracket'
  | 'atomspace'
  | 'variable'
  | 'string'
  | 'number'
  | 'equals'
  | 'operator'
  | 'atom'
  | 'unknown';

export interface Token {
  readonly kind: TokenKind;
  readonly text: string;
  readonly line: number;    // 1-based
  readonly column: number;  // offset from the last newline
}

type RuleKind = TokenKind | 'whitespace' | 'newline';

interface LexRule {
  kind: RuleKind;
  pattern: RegExp;
}

// Tried in order at each position; the first rule that matches wins.
const RULES: LexRule[] = [
  { kind: 'comment', pattern: /;[^\n]*/y },
  { kind: 'execute', pattern: /!/y },
  { kind: 'lparen', pattern: /\(/y },
  { kind: 'rparen', pattern: /\)/y },
  { kind: 'lbracket', pattern: /\[/y },
  { kind: 'rbracket', pattern: /\]/y },
  { kind: 'atomspace', pattern: /&[a-zA-Z_][a-zA-Z0-9_-]*/y },
  { kind: 'variable', pattern: /\$[a-zA-Z_][a-zA-Z0-9_-]*/y },
  { kind: 'string', pattern: /"(?:[^"\\]|\\.)*"/y },
  { kind: 'number', pattern: /-?\d+(?:\.\d+)?/y },
  { kind: 'equals', pattern: /=/y },
  { kind: 'operator', pattern: /[+\-*/><!=]+/y },
  { kind: 'atom', pattern: /[a-zA-Z_][a-zA-Z0-9_-]*!?/y },
  { kind: 'whitespace', pattern: /[ \t\r\f\v]+/y },
  { kind: 'newline', pattern: /\n/y },
];

function matchAt(source: string, offset: number): { kind: RuleKind; text: string } | null {
  for (const rule of RULES) {
    rule.pattern.lastIndex = offset;
    const match = rule.pattern.exec(source);
    if (match && match[0].length > 0) {
      return { kind: rule.kind, text: match[0] };
    }
  }
  return null;
}

/**
 * Split MeTTa source into tokens. Whitespace and newlines are dropped;
 * a character no rule accepts becomes a one-character `unknown` token.
 */
export function tokenize(source: string): Token[] {
  const tokens: Token[] = [];
  let line = 1;
  let lineStart = 0;
  let offset = 0;

  while (offset < source.length) {
    const match = matchAt(source, offset);

    if (!match) {
      // Keep surrogate pairs together
      const codePoint = source.codePointAt(offset) ?? 0;
      const text = String.fromCodePoint(codePoint);
      tokens.push({ kind: 'unknown', text, line, column: offset - lineStart });
      offset += text.length;
      continue;
    }

    if (match.kind === 'newline') {
      line++;
      offset += match.text.length;
      lineStart = offset;
      continue;
    }

    if (match.kind !== 'whitespace') {
      tokens.push({ kind: match.kind, text: match.text, line, column: offset - lineStart });
    }
    offset += match.text.length;
  }

  return tokens;
}
