/**
 * Grammar loading and per-language extraction rules.
 *
 * tree-sitter and its grammar packages are native modules, so they are
 * required lazily: a grammar that fails to load only makes files of that
 * language unavailable instead of breaking the whole run.
 */

import { createRequire } from 'module';
import type Parser from 'tree-sitter';
import type { ExternalLanguage, SyntaxTreeLike } from './types.js';

const require = createRequire(import.meta.url);

type GrammarLanguage = Parameters<Parser['setLanguage']>[0];

interface GrammarSource {
  language: ExternalLanguage;
  packageName: string;
  exportName?: string;
}

const GRAMMAR_SOURCES: readonly GrammarSource[] = [
  { language: 'python', packageName: 'tree-sitter-python' },
  { language: 'javascript', packageName: 'tree-sitter-javascript' },
  { language: 'typescript', packageName: 'tree-sitter-typescript', exportName: 'typescript' },
  { language: 'tsx', packageName: 'tree-sitter-typescript', exportName: 'tsx' },
  { language: 'java', packageName: 'tree-sitter-java' },
  { language: 'go', packageName: 'tree-sitter-go' },
];

// ---------------------------------------------------------------------------
// Node roles
// ---------------------------------------------------------------------------

/**
 * How a variable node spells the names it declares:
 * - `single`: the name field holds one name (or a pattern, kept as written)
 * - `siblings`: the name field repeats, `var a, b int`
 * - `list`: the name field is one list node, `a, b := 1, 2`
 */
export type NameLayout = 'single' | 'siblings' | 'list';

export type NodeRole =
  | { kind: 'class'; nameField: string }
  | { kind: 'function'; nameField: string }
  | { kind: 'variable'; nameField: string; layout: NameLayout }
  | { kind: 'other' };

export type LanguageRules = Readonly<Record<string, NodeRole>>;

const OTHER: NodeRole = { kind: 'other' };

const classRole = (nameField = 'name'): NodeRole => ({ kind: 'class', nameField });
const functionRole = (nameField = 'name'): NodeRole => ({ kind: 'function', nameField });
const variableRole = (nameField = 'name', layout: NameLayout = 'single'): NodeRole => ({
  kind: 'variable',
  nameField,
  layout,
});

const ECMASCRIPT_RULES: LanguageRules = {
  class_declaration: classRole(),
  class: classRole(),
  function_declaration: functionRole(),
  generator_function_declaration: functionRole(),
  method_definition: functionRole(),
  variable_declarator: variableRole(),
};

const TYPESCRIPT_RULES: LanguageRules = {
  ...ECMASCRIPT_RULES,
  abstract_class_declaration: classRole(),
};

export const LANGUAGE_RULES: Readonly<Record<ExternalLanguage, LanguageRules>> = {
  python: {
    class_definition: classRole(),
    function_definition: functionRole(),
    assignment: variableRole('left'),
  },
  javascript: ECMASCRIPT_RULES,
  typescript: TYPESCRIPT_RULES,
  tsx: TYPESCRIPT_RULES,
  java: {
    class_declaration: classRole(),
    method_declaration: functionRole(),
    constructor_declaration: functionRole(),
    variable_declarator: variableRole(),
  },
  go: {
    function_declaration: functionRole(),
    method_declaration: functionRole(),
    var_spec: variableRole('name', 'siblings'),
    short_var_declaration: variableRole('left', 'list'),
  },
};

export function classifyNode(rules: LanguageRules, nodeType: string): NodeRole {
  return Object.prototype.hasOwnProperty.call(rules, nodeType) ? rules[nodeType] : OTHER;
}

// ---------------------------------------------------------------------------
// Grammar cache
// ---------------------------------------------------------------------------

// tree-sitter reads string input through a fixed buffer, 32KB unless told otherwise
const MIN_PARSE_BUFFER_SIZE = 1024 * 1024;

export function parseBufferSize(source: string): number {
  return Math.max(MIN_PARSE_BUFFER_SIZE, source.length * 2);
}

const parserCache = new Map<ExternalLanguage, Parser>();
const languageVersions = new Map<ExternalLanguage, string>();
const unavailableGrammarErrors = new Map<ExternalLanguage, string>();

let grammarsInitialized = false;

/**
 * Load every grammar once. Idempotent; failures are remembered per
 * language and reported when a parser for that language is requested.
 */
export function initGrammars(): void {
  if (grammarsInitialized) return;

  let TreeSitter: typeof Parser;
  try {
    TreeSitter = require('tree-sitter');
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    console.error(`[Grammars] tree-sitter failed to load, conventional languages unavailable: ${message}`);
    for (const source of GRAMMAR_SOURCES) {
      unavailableGrammarErrors.set(source.language, message);
    }
    grammarsInitialized = true;
    return;
  }

  for (const source of GRAMMAR_SOURCES) {
    const lang = source.language;
    try {
      const grammarModule = require(source.packageName);
      const language: GrammarLanguage = source.exportName
        ? grammarModule[source.exportName]
        : grammarModule;

      const parser = new TreeSitter();
      parser.setLanguage(language);
      parserCache.set(lang, parser);

      languageVersions.set(lang, readPackageVersion(source.packageName));
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      console.error(`[Grammars] Failed to load ${lang} grammar, parsing will be unavailable: ${message}`);
      unavailableGrammarErrors.set(lang, message);
    }
  }

  grammarsInitialized = true;
}

export function getUnavailableGrammarErrors(): ReadonlyMap<ExternalLanguage, string> {
  return unavailableGrammarErrors;
}

/**
 * Parse function for a conventional language, or the reason it is missing.
 */
export function getGrammarParser(
  language: ExternalLanguage
): { ok: true; parse: (source: string) => SyntaxTreeLike } | { ok: false; reason: string } {
  initGrammars();

  const parser = parserCache.get(language);
  if (!parser) {
    return { ok: false, reason: unavailableGrammarErrors.get(language) ?? 'grammar not loaded' };
  }

  return {
    ok: true,
    parse: (source: string) => parser.parse(source, undefined, { bufferSize: parseBufferSize(source) }),
  };
}

export function getGrammarVersion(language: ExternalLanguage): string | null {
  initGrammars();
  return languageVersions.get(language) ?? null;
}

function readPackageVersion(packageName: string): string {
  try {
    const pkg: { version?: unknown } = require(`${packageName}/package.json`);
    return typeof pkg.version === 'string' ? pkg.version : 'unknown';
  } catch {
    return 'unknown';
  }
}
