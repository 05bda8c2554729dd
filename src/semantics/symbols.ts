import type { ScalarType, ValueType } from './types.js';

/**
 * Where a variable lives at run time.
 *
 * Globals are slots in the program's global array; locals are slots in the frame of the function
 * that declares them (the implicit `@main` frame for top-level blocks).
 */
export type Storage = { kind: 'global'; slot: number } | { kind: 'local'; slot: number };

export interface VariableSymbol {
  kind: 'variable';
  name: string;
  type: ValueType;
  storage: Storage;
  /** 1-based declaration line. */
  line: number;
}

export interface FunctionSymbol {
  kind: 'function';
  name: string;
  returnType: ScalarType;
  params: ValueType[];
  line: number;
}

export type SymbolEntry = VariableSymbol | FunctionSymbol;

/**
 * What a scope belongs to, for snapshots and diagnostics.
 */
export type ScopeOwner = 'global' | 'function' | 'block' | 'for';

interface Scope {
  id: number;
  owner: ScopeOwner;
  /** Function name for function scopes and anything nested in one; `@main` otherwise. */
  within: string;
  depth: number;
  symbols: Map<string, SymbolEntry>;
}

/**
 * Serializable record of one scope as it looked when it was popped.
 */
export interface ScopeSnapshot {
  id: number;
  owner: ScopeOwner;
  within: string;
  depth: number;
  symbols: SymbolEntry[];
}

export interface SymbolTableSnapshot {
  scopes: ScopeSnapshot[];
}

/**
 * Explicit stack of lexical scopes.
 *
 * Scope entry and exit are explicit calls so tests can drive them directly. Every popped scope is
 * kept (in pop order, then re-sorted by id) so the whole table can be inspected after analysis.
 */
export class SymbolTable {
  private readonly scopes: Scope[] = [];
  private readonly closed: ScopeSnapshot[] = [];
  private nextId = 0;

  get depth(): number {
    return this.scopes.length;
  }

  push(owner: ScopeOwner, within?: string): void {
    const parent = this.scopes[this.scopes.length - 1];
    this.scopes.push({
      id: this.nextId++,
      owner,
      within: within ?? parent?.within ?? '@main',
      depth: this.scopes.length,
      symbols: new Map(),
    });
  }

  pop(): void {
    const scope = this.scopes.pop();
    if (!scope) throw new Error('SymbolTable.pop() on an empty scope stack');
    this.closed.push({
      id: scope.id,
      owner: scope.owner,
      within: scope.within,
      depth: scope.depth,
      symbols: [...scope.symbols.values()],
    });
  }

  /**
   * Declare in the innermost scope. Returns the existing entry instead when the name is taken there.
   */
  declare(entry: SymbolEntry): SymbolEntry | undefined {
    const scope = this.scopes[this.scopes.length - 1];
    if (!scope) throw new Error('SymbolTable.declare() with no open scope');
    const existing = scope.symbols.get(entry.name);
    if (existing) return existing;
    scope.symbols.set(entry.name, entry);
    return undefined;
  }

  /**
   * Innermost-to-outermost lookup.
   */
  lookup(name: string): SymbolEntry | undefined {
    for (let i = this.scopes.length - 1; i >= 0; i--) {
      const found = this.scopes[i]?.symbols.get(name);
      if (found) return found;
    }
    return undefined;
  }

  /**
   * True when the innermost open scope is the outermost (global) one.
   */
  atGlobalScope(): boolean {
    return this.scopes.length === 1;
  }

  snapshot(): SymbolTableSnapshot {
    return { scopes: [...this.closed].sort((a, b) => a.id - b.id) };
  }
}
