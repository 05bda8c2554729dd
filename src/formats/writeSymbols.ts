import type { ScopeSnapshot, SymbolEntry, SymbolTableSnapshot } from '../semantics/symbols.js';
import type { SymbolsArtifact, WriteTextOptions } from './types.js';

function formatSymbol(s: SymbolEntry): string {
  if (s.kind === 'function') {
    return `function ${s.name}(${s.params.join(', ')}) -> ${s.returnType}  ; line ${s.line}`;
  }
  return `${s.storage.kind} ${s.type} ${s.name} @${s.storage.slot}  ; line ${s.line}`;
}

function formatScope(scope: ScopeSnapshot): string[] {
  const indent = '  '.repeat(scope.depth);
  const head = `${indent}scope #${scope.id} ${scope.owner} (${scope.within})`;
  return [head, ...scope.symbols.map((s) => `${indent}  ${formatSymbol(s)}`)];
}

/**
 * Create a `.symbols.txt` listing: every scope in creation order, indented by nesting depth.
 */
export function writeSymbols(symbols: SymbolTableSnapshot, opts?: WriteTextOptions): SymbolsArtifact {
  const lineEnding = opts?.lineEnding ?? '\n';
  const lines = symbols.scopes.flatMap(formatScope);
  return { kind: 'symbols', text: lines.join(lineEnding) + lineEnding };
}
