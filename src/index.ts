#!/usr/bin/env node

import { Command } from 'commander';
import { resolve, dirname, join } from 'path';
import { writeFileSync, readFileSync, mkdirSync } from 'fs';
import { fileURLToPath } from 'url';
import { parseProject } from './parser/index.js';
import {
  getExtensionsForLanguage,
  getLanguageVersion,
  getSupportedLanguages,
  isDslLanguage,
} from './parser/detect.js';
import { getUnavailableGrammarErrors, initGrammars } from './parser/grammars.js';
import { buildGraph } from './graph/index.js';
import { exportToJSON } from './graph/serializer.js';
import { getGraphSummary } from './graph/queries.js';
import { filterTreeByLanguage, summarizeTree } from './tree/index.js';
import { loadConfig, mergeConfig } from './config.js';
import type { TreeNode } from './parser/types.js';

// Read version from package.json
const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);
const packageJsonPath = join(__dirname, '../package.json');
const packageJson: { version: string } = JSON.parse(readFileSync(packageJsonPath, 'utf-8'));

const program = new Command();

program
  .name('astweave')
  .description('Folder/file syntax tree and definition graph builder, with a built-in MeTTa front-end')
  .version(packageJson.version);

interface ParseCommandOptions {
  output: string;
  graphOutput: string;
  pretty?: boolean;
  stats?: boolean;
  exclude?: string[];
  mettaOnly?: boolean;
  variables?: boolean;
  verbose?: boolean;
}

function writeJSON(filePath: string, data: unknown, pretty: boolean): void {
  mkdirSync(dirname(resolve(filePath)), { recursive: true });
  const json = pretty ? JSON.stringify(data, null, 2) : JSON.stringify(data);
  writeFileSync(filePath, json, 'utf-8');
}

program
  .command('parse')
  .description('Parse a directory into a definitions tree and a definition graph')
  .argument('<directory>', 'Directory to parse')
  .option('-o, --output <path>', 'Tree JSON output path', 'docs/ast_summary.json')
  .option('-g, --graph-output <path>', 'Graph JSON output path', 'docs/ast_graph.json')
  .option('--pretty', 'Pretty-print JSON output')
  .option('--stats', 'Print graph statistics')
  .option('--exclude <patterns...>', 'Glob patterns to exclude (e.g., "**/*.test.*" "dist/**")')
  .option('--metta-only', 'Keep only MeTTa files in the outputs')
  .option('--variables', 'Add variable nodes and "uses" edges to the graph')
  .option('--verbose', 'Show detailed parsing progress')
  .action((directory: string, options: ParseCommandOptions) => {
    const startTime = Date.now();

    try {
      const projectRoot = resolve(directory);
      const config = mergeConfig(loadConfig(projectRoot), {
        ...(options.exclude ? { exclude: options.exclude } : {}),
        ...(options.variables ? { includeVariables: true } : {}),
        ...(options.verbose ? { verbose: true } : {}),
      });

      console.log(`Scanning: ${projectRoot}`);
      console.log(`Languages supported: ${getSupportedLanguages().join(', ')}`);

      let tree: TreeNode | null = parseProject(projectRoot, {
        exclude: config.exclude,
        maxFileSize: config.maxFileSize,
        verbose: config.verbose,
      });

      if (options.mettaOnly) {
        console.log('MeTTa-only mode enabled');
        tree = filterTreeByLanguage(tree, 'metta');
        if (!tree) {
          console.log('No MeTTa files found');
          return;
        }
      }

      writeJSON(options.output, tree, options.pretty ?? false);
      console.log(`Tree saved to: ${options.output}`);

      const summary = summarizeTree(tree);
      console.log('\nSummary:');
      console.log(`  Total files: ${summary.total_files}`);
      console.log(`  MeTTa files: ${summary.metta_files}`);
      console.log(`  Other files: ${summary.other_files}`);
      console.log(`  Parse errors: ${summary.errors}`);

      const graph = buildGraph(tree, { includeVariables: config.includeVariables });
      writeJSON(options.graphOutput, exportToJSON(graph, projectRoot), options.pretty ?? false);
      console.log(`Graph saved to: ${options.graphOutput}`);

      if (options.stats) {
        const elapsed = Date.now() - startTime;
        const graphSummary = getGraphSummary(graph);

        console.log('\n=== Graph Statistics ===');
        console.log(`Nodes: ${graphSummary.nodeCount}`);
        for (const [type, count] of Object.entries(graphSummary.nodesByType)) {
          console.log(`  ${type}: ${count}`);
        }
        console.log(`Edges: ${graphSummary.edgeCount}`);
        for (const [relation, count] of Object.entries(graphSummary.edgesByRelation)) {
          console.log(`  ${relation}: ${count}`);
        }
        console.log(`Time: ${elapsed}ms`);
      }
    } catch (err) {
      console.error('Error parsing project:', err);
      process.exit(1);
    }
  });

program
  .command('languages')
  .description('List supported languages and their parsers')
  .action(() => {
    initGrammars();
    const unavailable = getUnavailableGrammarErrors();

    for (const language of getSupportedLanguages()) {
      const extensions = getExtensionsForLanguage(language).join(', ');
      const parserKind = isDslLanguage(language) ? 'dsl' : 'tree-sitter';
      const version = getLanguageVersion(language);
      const status = language !== 'metta' && unavailable.has(language)
        ? 'unavailable'
        : (version ?? 'unknown');
      console.log(`${language.padEnd(12)} ${parserKind.padEnd(12)} ${status.padEnd(12)} ${extensions}`);
    }
  });

program.parse();
