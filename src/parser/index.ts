/**
 * All parser operations are read-only: nothing under the scanned root is
 * written, moved or deleted.
 */

import { basename, join, relative, resolve } from 'path';
import { minimatch } from 'minimatch';
import { detectLanguage, resolveParser } from './detect.js';
import { LANGUAGE_RULES } from './grammars.js';
import { extractDefinitions } from './extract.js';
import { createMettaParser } from './metta/parser.js';
import { extractMettaDefinitions } from './metta/extract.js';
import { entryKind, fileSize, listDirectory, readSourceBytes } from '../utils/files.js';
import type { EntryKind } from '../utils/files.js';
import { ProcessingErrorCode, SourceProcessingError, errorMessage, toError } from '../errors.js';
import type {
  Definitions,
  FileNode,
  FolderNode,
  LanguageId,
  ParserHandle,
  ParserKind,
  TreeNode,
} from './types.js';

export const DEFAULT_MAX_FILE_SIZE = 1_000_000; // 1MB

export type FileOutcome =
  | { ok: true; definitions: Definitions; parserKind: ParserKind }
  | { ok: false; error: SourceProcessingError };

export interface ParseProjectOptions {
  /** minimatch globs tested against paths relative to the root */
  exclude?: string[];
  maxFileSize?: number;
  verbose?: boolean;
  /** Parser lookup; defaults to the process-wide registry */
  resolveParser?: (language: LanguageId) => ParserHandle;
}

const strictDecoder = new TextDecoder('utf-8', { fatal: true });

function failure(message: string, code: ProcessingErrorCode, cause?: unknown): FileOutcome {
  return {
    ok: false,
    error: new SourceProcessingError(message, code, cause === undefined ? undefined : toError(cause)),
  };
}

/**
 * Parse and extract one file's bytes. Never throws: every failure comes
 * back as `{ ok: false }`.
 */
export function processSource(
  source: Uint8Array,
  language: LanguageId,
  lookup: (language: LanguageId) => ParserHandle = resolveParser
): FileOutcome {
  let handle: ParserHandle;
  try {
    handle = lookup(language);
  } catch (err) {
    if (err instanceof SourceProcessingError) {
      return { ok: false, error: err };
    }
    return failure(errorMessage(err), ProcessingErrorCode.PARSER_UNAVAILABLE, err);
  }

  if (handle.kind === 'dsl') {
    try {
      const tree = createMettaParser().parse(source);
      return { ok: true, definitions: extractMettaDefinitions(tree.rootNode), parserKind: 'dsl' };
    } catch (err) {
      return failure(`Failed to extract definitions: ${errorMessage(err)}`, ProcessingErrorCode.EXTRACTION_FAILED, err);
    }
  }

  let text: string;
  try {
    text = strictDecoder.decode(source);
  } catch (err) {
    return failure('File is not valid UTF-8 text', ProcessingErrorCode.DECODE_FAILED, err);
  }

  try {
    const tree = handle.parse(text);
    const definitions = extractDefinitions(tree.rootNode, LANGUAGE_RULES[handle.language]);
    return { ok: true, definitions, parserKind: 'external' };
  } catch (err) {
    return failure(`Failed to extract definitions: ${errorMessage(err)}`, ProcessingErrorCode.EXTRACTION_FAILED, err);
  }
}

/**
 * Read a file from disk and process it. Never throws.
 */
export function processFile(
  fullPath: string,
  language: LanguageId,
  options: ParseProjectOptions = {}
): FileOutcome {
  const maxFileSize = options.maxFileSize ?? DEFAULT_MAX_FILE_SIZE;

  let source: Buffer;
  try {
    const size = fileSize(fullPath);
    if (size > maxFileSize) {
      return failure(
        `File too large (${(size / 1024).toFixed(0)}KB)`,
        ProcessingErrorCode.READ_FAILED
      );
    }
    source = readSourceBytes(fullPath);
  } catch (err) {
    return failure(`Failed to read file: ${errorMessage(err)}`, ProcessingErrorCode.READ_FAILED, err);
  }

  return processSource(source, language, options.resolveParser);
}

/**
 * Walk `rootPath` depth-first and build the folder/file tree, attaching
 * definitions to every file whose language is recognized. A failing file
 * gets `parse_error` and the walk carries on. Symlinked directories below
 * the root are left out; symlinked files are read through the link.
 */
export function parseProject(rootPath: string, options: ParseProjectOptions = {}): TreeNode {
  const projectRoot = resolve(rootPath);
  const exclude = options.exclude ?? [];
  let parsedFiles = 0;
  let errorFiles = 0;
  let skippedFiles = 0;

  const isExcluded = (fullPath: string): boolean => {
    const rel = relative(projectRoot, fullPath);
    return rel !== '' && exclude.some(pattern => minimatch(rel, pattern, { matchBase: true }));
  };

  const buildFile = (fullPath: string): FileNode => {
    const node: FileNode = {
      name: basename(fullPath),
      path: fullPath,
      type: 'file',
    };

    const language = detectLanguage(fullPath);
    if (!language) {
      skippedFiles++;
      return node;
    }

    if (options.verbose) {
      console.error(`[Parser] Parsing: ${relative(projectRoot, fullPath) || node.name}`);
    }

    node.language = language;
    const outcome = processFile(fullPath, language, options);
    if (outcome.ok) {
      parsedFiles++;
      node.definitions = outcome.definitions;
      node.parser_kind = outcome.parserKind;
    } else {
      errorFiles++;
      node.parse_error = outcome.error.message;
      console.error(`[Parser] Error parsing file ${fullPath}: ${outcome.error.message}`);
    }
    return node;
  };

  const buildFolder = (fullPath: string): FolderNode => {
    const folder: FolderNode = {
      name: basename(fullPath),
      path: fullPath,
      type: 'folder',
      children: [],
    };

    let entries: string[];
    try {
      entries = listDirectory(fullPath);
    } catch (err) {
      console.error(`[Walker] Error scanning directory ${fullPath}: ${errorMessage(err)}`);
      return folder;
    }

    for (const entry of entries) {
      const childPath = join(fullPath, entry);
      if (isExcluded(childPath)) {
        if (options.verbose) {
          console.error(`[Walker] Excluded: ${relative(projectRoot, childPath)}`);
        }
        continue;
      }
      const kind = entryKind(childPath);
      // Linked directories can point back at an ancestor
      if (kind === 'linked-directory') {
        if (options.verbose) {
          console.error(`[Walker] Skipping symlinked directory: ${relative(projectRoot, childPath)}`);
        }
        continue;
      }
      folder.children.push(visit(childPath, kind));
    }
    return folder;
  };

  const visit = (fullPath: string, kind: EntryKind): TreeNode =>
    kind === 'file' ? buildFile(fullPath) : buildFolder(fullPath);

  // A linked root is followed; links below it are not
  const tree = visit(projectRoot, entryKind(projectRoot));

  if (options.verbose || errorFiles > 0) {
    console.error(`\n[Parser] Summary:`);
    console.error(`  Parsed: ${parsedFiles} files`);
    if (skippedFiles > 0) {
      console.error(`  Unrecognized: ${skippedFiles} files`);
    }
    if (errorFiles > 0) {
      console.error(`  Errors: ${errorFiles} files`);
    }
  }

  return tree;
}
