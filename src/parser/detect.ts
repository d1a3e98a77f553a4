import { extname } from 'path';
import { ParserUnavailableError } from '../errors.js';
import { getGrammarParser, getGrammarVersion } from './grammars.js';
import type { LanguageId, ParserHandle } from './types.js';

export const DSL_LANGUAGE: LanguageId = 'metta';
export const DSL_PARSER_VERSION = 'custom-1.0';

/**
 * File extension to language. Matched case-insensitively.
 */
export const EXTENSION_MAP: Readonly<Record<string, LanguageId>> = {
  '.py': 'python',
  '.pyw': 'python',
  '.js': 'javascript',
  '.mjs': 'javascript',
  '.cjs': 'javascript',
  '.jsx': 'javascript',
  '.ts': 'typescript',
  '.mts': 'typescript',
  '.cts': 'typescript',
  '.tsx': 'tsx',
  '.java': 'java',
  '.go': 'go',
  '.metta': 'metta',
  '.mta': 'metta',
};

export function detectLanguage(filePath: string): LanguageId | null {
  const ext = extname(filePath).toLowerCase();
  return Object.prototype.hasOwnProperty.call(EXTENSION_MAP, ext) ? EXTENSION_MAP[ext] : null;
}

export function isDslLanguage(language: LanguageId): boolean {
  return language === DSL_LANGUAGE;
}

/**
 * Parser handle for a language. Throws ParserUnavailableError when the
 * language needs a grammar that could not be loaded.
 */
export function resolveParser(language: LanguageId): ParserHandle {
  if (language === 'metta') {
    return { kind: 'dsl' };
  }

  const grammar = getGrammarParser(language);
  if (!grammar.ok) {
    throw new ParserUnavailableError(language, grammar.reason);
  }
  return { kind: 'external', language, parse: grammar.parse };
}

export function getSupportedLanguages(): LanguageId[] {
  return Array.from(new Set(Object.values(EXTENSION_MAP))).sort();
}

export function getExtensionsForLanguage(language: LanguageId): string[] {
  return Object.keys(EXTENSION_MAP).filter(ext => EXTENSION_MAP[ext] === language);
}

export function getLanguageVersion(language: LanguageId): string | null {
  if (language === 'metta') {
    return DSL_PARSER_VERSION;
  }
  return getGrammarVersion(language);
}
