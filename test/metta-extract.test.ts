import { describe, it, expect } from 'vitest';
import { readFileSync } from 'fs';
import { fileURLToPath } from 'url';
import { createMettaParser } from '../src/parser/metta/parser.js';
import { extractMettaDefinitions, expressionSignature } from '../src/parser/metta/extract.js';
import type { MettaDefinitions } from '../src/parser/types.js';

function extract(source: string | Uint8Array): MettaDefinitions {
  return extractMettaDefinitions(createMettaParser().parse(source).rootNode);
}

describe('MeTTa definitions', () => {
  it('should extract a function with its parameters', () => {
    const defs = extract('(= (double $x) (* $x 2))');

    expect(defs.functions).toEqual([
      { name: 'double', start_line: 1, end_line: 1, parameters: ['$x'] },
    ]);
    expect(defs.expressions).toEqual([{ line: 1, signature: '*(2 args)' }]);
    expect(defs.facts).toEqual([]);
    expect(defs.variables).toEqual(['$x']);
  });

  it('should only count variables as parameters', () => {
    const defs = extract('(= (scale $v 10 $factor)\n  (* $v $factor))');

    expect(defs.functions).toEqual([
      { name: 'scale', start_line: 1, end_line: 2, parameters: ['$v', '$factor'] },
    ]);
  });

  it('should drop function definitions without a signature', () => {
    const defs = extract('(= foo bar)');

    expect(defs.functions).toEqual([]);
    expect(defs.summary.function_count).toBe(0);
  });

  it('should capture executions with an arity signature', () => {
    const defs = extract('!(foo 1 2)');

    expect(defs.executions).toEqual([{ line: 1, expression: 'foo(2 args)' }]);
  });

  it('should use the bare head for executions without arguments', () => {
    const defs = extract('\n!(run)');

    expect(defs.executions).toEqual([{ line: 2, expression: 'run' }]);
  });

  it('should classify three-element atom-headed expressions as facts', () => {
    const defs = extract('(Bob parent Alex)');

    expect(defs.facts).toEqual([{ line: 1, pattern: 'Bob(2 args)', subject: 'Bob' }]);
    expect(defs.expressions).toEqual([]);
  });

  it('should not treat two-element expressions as facts', () => {
    const defs = extract('(a b)');

    expect(defs.facts).toEqual([]);
    expect(defs.expressions).toEqual([{ line: 1, signature: 'a(1 args)' }]);
  });

  it('should not treat operator-headed triples as facts', () => {
    const defs = extract('(+ 1 2)');

    expect(defs.facts).toEqual([]);
    expect(defs.expressions).toEqual([{ line: 1, signature: '+(2 args)' }]);
  });

  it('should classify nested forms inside executions too', () => {
    const defs = extract('!(add-atom &self (Sam likes pizza))');

    expect(defs.executions).toEqual([{ line: 1, expression: 'add-atom(2 args)' }]);
    expect(defs.facts.map(f => f.subject)).toEqual(['add-atom', 'Sam']);
    expect(defs.atomspaces).toEqual(['&self']);
  });

  it('should collect unique variables and atomspaces in sorted order', () => {
    const defs = extract('(= (f $y $x) (g $x $y $x &kb))\n!(match &self $y &kb)');

    expect(defs.variables).toEqual(['$x', '$y']);
    expect(defs.atomspaces).toEqual(['&kb', '&self']);
  });

  it('should derive every summary count from its collection', () => {
    const source = readFileSync(fileURLToPath(new URL('./fixtures/metta/family.metta', import.meta.url)));
    const defs = extract(source);

    expect(defs.summary).toEqual({
      function_count: defs.functions.length,
      expression_count: defs.expressions.length,
      execution_count: defs.executions.length,
      fact_count: defs.facts.length,
      variable_count: defs.variables.length,
      atomspace_count: defs.atomspaces.length,
    });
    expect(defs.functions.map(f => f.name)).toEqual(['grandparent', 'is-parent']);
    expect(defs.facts.map(f => [f.line, f.subject])).toEqual([
      [2, 'parent'],
      [3, 'parent'],
      [4, 'parent'],
      [7, 'parent'],
      [7, 'parent'],
      [10, 'parent'],
      [13, 'grandparent'],
      [14, 'is-parent'],
    ]);
    expect(defs.variables).toEqual(['$c', '$p', '$who', '$x', '$y', '$z']);
    expect(defs.executions).toEqual([
      { line: 13, expression: 'grandparent(2 args)' },
      { line: 14, expression: 'is-parent(2 args)' },
    ]);
  });

  it('should produce identical records for identical input', () => {
    const source = '(= (f $x) (g $x))\n!(f 1)\n(Tom parent Bob)';

    expect(extract(source)).toEqual(extract(source));
  });

  it('should label empty forms', () => {
    const root = createMettaParser().parse('()').rootNode;

    expect(expressionSignature(root.children[0])).toBe('empty');
  });
});
