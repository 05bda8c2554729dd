import { describe, expect, it } from 'vitest';

import type { VariableSymbol } from '../src/semantics/symbols.js';
import { SymbolTable } from '../src/semantics/symbols.js';

const variable = (name: string, slot: number): VariableSymbol => ({
  kind: 'variable',
  name,
  type: 'int',
  storage: { kind: 'local', slot },
  line: 1,
});

describe('SymbolTable', () => {
  it('resolves the innermost declaration first', () => {
    const table = new SymbolTable();
    table.push('global');
    table.declare(variable('x', 0));
    table.push('block');
    table.declare(variable('x', 1));
    expect(table.lookup('x')).toMatchObject({ storage: { slot: 1 } });
    table.pop();
    expect(table.lookup('x')).toMatchObject({ storage: { slot: 0 } });
  });

  it('returns the existing entry on a clash in the same scope', () => {
    const table = new SymbolTable();
    table.push('global');
    const first = variable('x', 0);
    expect(table.declare(first)).toBeUndefined();
    expect(table.declare(variable('x', 1))).toBe(first);
  });

  it('tracks depth and whether the global scope is innermost', () => {
    const table = new SymbolTable();
    expect(table.depth).toBe(0);
    table.push('global');
    expect(table.atGlobalScope()).toBe(true);
    table.push('function', 'f');
    expect(table.depth).toBe(2);
    expect(table.atGlobalScope()).toBe(false);
    expect(table.lookup('missing')).toBeUndefined();
  });

  it('inherits the owning function name and snapshots scopes by creation order', () => {
    const table = new SymbolTable();
    table.push('global');
    table.push('function', 'f');
    table.push('for');
    table.declare(variable('i', 0));
    table.pop();
    table.pop();
    table.pop();
    expect(table.snapshot().scopes.map((s) => [s.id, s.owner, s.within, s.depth, s.symbols.length])).toEqual([
      [0, 'global', '@main', 0, 0],
      [1, 'function', 'f', 1, 0],
      [2, 'for', 'f', 2, 1],
    ]);
  });

  it('throws when popping or declaring with no open scope', () => {
    const table = new SymbolTable();
    expect(() => table.pop()).toThrow('SymbolTable.pop() on an empty scope stack');
    expect(() => table.declare(variable('x', 0))).toThrow('SymbolTable.declare() with no open scope');
  });
});
