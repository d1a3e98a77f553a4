import type {
  MettaDefinitions,
  MettaExecution,
  MettaExpression,
  MettaFact,
  MettaFunctionDef,
} from '../types.js';
import type { MettaNode } from './ast.js';

interface Context {
  functions: MettaFunctionDef[];
  executions: MettaExecution[];
  facts: MettaFact[];
  expressions: MettaExpression[];
}

/**
 * Classify the constructs of a parsed MeTTa file.
 *
 * - `(= (name $a $b) body...)` → function
 * - `!(expr)` → execution
 * - three-element expression headed by a plain atom → fact
 * - any other expression → expression
 */
export function extractMettaDefinitions(root: MettaNode): MettaDefinitions {
  const variables = new Set<string>();
  const atomspaces = new Set<string>();
  collectReferences(root, variables, atomspaces);

  const context: Context = {
    functions: [],
    executions: [],
    facts: [],
    expressions: [],
  };
  classifyNode(root, context);

  return {
    functions: context.functions,
    executions: context.executions,
    facts: context.facts,
    expressions: context.expressions,
    variables: Array.from(variables).sort(),
    atomspaces: Array.from(atomspaces).sort(),
    summary: {
      function_count: context.functions.length,
      expression_count: context.expressions.length,
      execution_count: context.executions.length,
      fact_count: context.facts.length,
      variable_count: variables.size,
      atomspace_count: atomspaces.size,
    },
  };
}

function collectReferences(node: MettaNode, variables: Set<string>, atomspaces: Set<string>): void {
  if (node.type === 'variable') {
    variables.add(node.value);
  } else if (node.type === 'atomspace_ref') {
    atomspaces.add(node.value);
  }

  for (const child of node.children) {
    collectReferences(child, variables, atomspaces);
  }
}

function classifyNode(node: MettaNode, context: Context): void {
  switch (node.type) {
    case 'function_definition': {
      const fn = toFunctionDef(node);
      if (fn) {
        context.functions.push(fn);
      }
      break;
    }
    case 'execution': {
      const executed = node.children[0];
      if (executed) {
        context.executions.push({
          line: node.startLine,
          expression: expressionSignature(executed),
        });
      }
      break;
    }
    case 'expression':
      classifyExpression(node, context);
      break;
  }

  for (const child of node.children) {
    classifyNode(child, context);
  }
}

function classifyExpression(node: MettaNode, context: Context): void {
  const signature = expressionSignature(node);
  const head = node.children[0];

  if (node.children.length === 3 && head && head.type === 'atom') {
    context.facts.push({
      line: node.startLine,
      pattern: signature,
      subject: head.value,
    });
    return;
  }

  context.expressions.push({
    line: node.startLine,
    signature,
  });
}

function toFunctionDef(node: MettaNode): MettaFunctionDef | null {
  const signature = node.children.find(child => child.type === 'function_signature');
  if (!signature) return null;

  return {
    name: signature.value,
    start_line: node.startLine,
    end_line: node.endLine,
    parameters: signature.children
      .filter(child => child.type === 'variable')
      .map(child => child.value),
  };
}

/**
 * Readable head-and-arity label: `foo(2 args)`, or just `foo` when the
 * form has no arguments.
 */
export function expressionSignature(node: MettaNode): string {
  const head = node.children[0];
  if (!head) {
    return node.value || 'empty';
  }

  const argCount = node.children.length - 1;
  return argCount > 0 ? `${head.value}(${argCount} args)` : head.value;
}
