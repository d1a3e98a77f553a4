import { classifyNode } from './grammars.js';
import type { LanguageRules, NameLayout } from './grammars.js';
import type { ClassDef, ConventionalDefinitions, FunctionDef, SyntaxNodeLike } from './types.js';

interface Context {
  rules: LanguageRules;
  classes: ClassDef[];
  functions: FunctionDef[];
}

/**
 * Harvest classes, functions and their variables from a conventional
 * syntax tree in one depth-first pass.
 *
 * The enclosing class is passed down as a parameter, not kept on a stack:
 * a nested class takes over for its own subtree only, and functions below
 * it are attributed to the innermost class. Nested classes are listed at
 * the top level next to their outer class.
 */
export function extractDefinitions(rootNode: SyntaxNodeLike, rules: LanguageRules): ConventionalDefinitions {
  const context: Context = {
    rules,
    classes: [],
    functions: [],
  };

  walkNode(rootNode, null, context);

  return {
    classes: context.classes,
    functions: context.functions,
  };
}

function walkNode(node: SyntaxNodeLike, currentClass: ClassDef | null, context: Context): void {
  const role = classifyNode(context.rules, node.type);
  let enclosingClass = currentClass;

  switch (role.kind) {
    case 'class': {
      const nameNode = node.childForFieldName(role.nameField);
      if (nameNode) {
        enclosingClass = {
          name: nameNode.text,
          line: node.startPosition.row + 1,
          functions: [],
        };
        context.classes.push(enclosingClass);
      }
      break;
    }
    case 'function': {
      const nameNode = node.childForFieldName(role.nameField);
      if (nameNode) {
        const fn: FunctionDef = {
          name: nameNode.text,
          line: node.startPosition.row + 1,
          variables: collectVariables(node, context.rules),
          line_count: node.endPosition.row - node.startPosition.row + 1,
        };
        if (enclosingClass) {
          enclosingClass.functions.push(fn);
        } else {
          context.functions.push(fn);
        }
      }
      break;
    }
  }

  for (const child of node.children) {
    walkNode(child, enclosingClass, context);
  }
}

/**
 * Names declared by assignment/declarator nodes anywhere below a function,
 * in source order and with repeats kept.
 */
function collectVariables(functionNode: SyntaxNodeLike, rules: LanguageRules): string[] {
  const variables: string[] = [];

  const visit = (node: SyntaxNodeLike): void => {
    const role = classifyNode(rules, node.type);
    if (role.kind === 'variable') {
      variables.push(...declaredNames(node, role.nameField, role.layout));
    }
    for (const child of node.children) {
      visit(child);
    }
  };

  visit(functionNode);
  return variables;
}

function declaredNames(node: SyntaxNodeLike, nameField: string, layout: NameLayout): string[] {
  const nameNode = node.childForFieldName(nameField);
  if (!nameNode) return [];

  switch (layout) {
    case 'single':
      return [nameNode.text];
    case 'list': {
      const items = nameNode.children.filter(child => child.type !== ',');
      return items.length > 0 ? items.map(child => child.text) : [nameNode.text];
    }
    case 'siblings': {
      // Repeated fields sit side by side: name , name , ... then the type or '='
      const names: string[] = [];
      const first = node.children.findIndex(child => samePosition(child, nameNode));
      for (const child of node.children.slice(first < 0 ? 0 : first)) {
        if (child.type === nameNode.type) {
          names.push(child.text);
        } else if (child.type !== ',') {
          break;
        }
      }
      return names.length > 0 ? names : [nameNode.text];
    }
  }
}

function samePosition(a: SyntaxNodeLike, b: SyntaxNodeLike): boolean {
  return a.startPosition.row === b.startPosition.row && a.startPosition.column === b.startPosition.column;
}
