export type LanguageId =
  | 'python'
  | 'javascript'
  | 'typescript'
  | 'tsx'
  | 'java'
  | 'go'
  | 'metta';

export type ExternalLanguage = Exclude<LanguageId, 'metta'>;

export type ParserKind = 'external' | 'dsl';

// Minimal surface of a third-party syntax tree node (tree-sitter's SyntaxNode satisfies it)
export interface SyntaxPoint {
  row: number;
  column: number;
}

export interface SyntaxNodeLike {
  type: string;
  text: string;
  startPosition: SyntaxPoint;
  endPosition: SyntaxPoint;
  children: SyntaxNodeLike[];
  childForFieldName(fieldName: string): SyntaxNodeLike | null;
}

export interface SyntaxTreeLike {
  rootNode: SyntaxNodeLike;
}

export type ParserHandle =
  | { kind: 'dsl' }
  | { kind: 'external'; language: ExternalLanguage; parse(source: string): SyntaxTreeLike };

// ---------------------------------------------------------------------------
// Definitions records (serialized as-is into the tree document)
// ---------------------------------------------------------------------------

export interface FunctionDef {
  name: string;
  line: number;        // 1-based start line
  variables: string[];
  line_count: number;  // inclusive
}

export interface ClassDef {
  name: string;
  line: number;
  functions: FunctionDef[];
}

export interface ConventionalDefinitions {
  classes: ClassDef[];
  functions: FunctionDef[];
}

export interface MettaFunctionDef {
  name: string;
  start_line: number;
  end_line: number;
  parameters: string[];
}

export interface MettaExecution {
  line: number;
  expression: string;
}

export interface MettaFact {
  line: number;
  pattern: string;
  subject: string;
}

export interface MettaExpression {
  line: number;
  signature: string;
}

export interface MettaSummary {
  function_count: number;
  expression_count: number;
  execution_count: number;
  fact_count: number;
  variable_count: number;
  atomspace_count: number;
}

export interface MettaDefinitions {
  functions: MettaFunctionDef[];
  executions: MettaExecution[];
  facts: MettaFact[];
  expressions: MettaExpression[];
  variables: string[];   // unique, sorted
  atomspaces: string[];  // unique, sorted
  summary: MettaSummary;
}

export type Definitions = ConventionalDefinitions | MettaDefinitions;

// ---------------------------------------------------------------------------
// Hierarchical document
// ---------------------------------------------------------------------------

export interface FileNode {
  name: string;
  path: string;        // absolute
  type: 'file';
  language?: LanguageId;
  definitions?: Definitions;
  parser_kind?: ParserKind;
  parse_error?: string;
}

export interface FolderNode {
  name: string;
  path: string;        // absolute
  type: 'folder';
  children: TreeNode[];
}

export type TreeNode = FileNode | FolderNode;
