export { parseProject, processFile, processSource, DEFAULT_MAX_FILE_SIZE } from './parser/index.js';
export type { FileOutcome, ParseProjectOptions } from './parser/index.js';
export {
  detectLanguage,
  isDslLanguage,
  resolveParser,
  getSupportedLanguages,
  getExtensionsForLanguage,
  getLanguageVersion,
  EXTENSION_MAP,
} from './parser/detect.js';
export { initGrammars, LANGUAGE_RULES, classifyNode } from './parser/grammars.js';
export type { NodeRole, NameLayout, LanguageRules } from './parser/grammars.js';
export { extractDefinitions } from './parser/extract.js';
export { tokenize } from './parser/metta/lexer.js';
export type { Token, TokenKind } from './parser/metta/lexer.js';
export { MettaNode } from './parser/metta/ast.js';
export type { MettaNodeKind, MettaTree } from './parser/metta/ast.js';
export { MettaParser, createMettaParser } from './parser/metta/parser.js';
export { extractMettaDefinitions, expressionSignature } from './parser/metta/extract.js';
export { buildGraph } from './graph/index.js';
export type {
  BuildGraphOptions,
  DefinitionGraph,
  EdgeRelation,
  GraphEdgeAttributes,
  GraphNodeAttributes,
  GraphNodeType,
} from './graph/index.js';
export { exportToJSON, importFromJSON } from './graph/serializer.js';
export type { GraphDocument, GraphEdgeRecord, GraphNodeRecord } from './graph/serializer.js';
export { getGraphSummary, getRelated } from './graph/queries.js';
export type { GraphSummary } from './graph/queries.js';
export { filterTreeByLanguage, summarizeTree, collectFiles } from './tree/index.js';
export type { TreeSummary } from './tree/index.js';
export { loadConfig, mergeConfig, validateConfig, DEFAULT_CONFIG, CONFIG_FILENAME } from './config.js';
export type { AstWeaveConfig } from './config.js';
export { SourceProcessingError, ParserUnavailableError, ProcessingErrorCode } from './errors.js';
export type * from './parser/types.js';
