import type { Token } from '../frontend/tokens.js';
import type { TokensArtifact, WriteTextOptions } from './types.js';

/**
 * Create a `.tokens.txt` listing: `line:col  Kind  lexeme`, one token per line.
 */
export function writeTokens(tokens: Token[], opts?: WriteTextOptions): TokensArtifact {
  const lineEnding = opts?.lineEnding ?? '\n';
  const lines = tokens.map((t) => {
    const pos = `${t.line}:${t.column}`.padEnd(8);
    const kind = t.kind.padEnd(13);
    return t.kind === 'EOF' ? `${pos}${t.kind}` : `${pos}${kind}${t.lexeme}`;
  });
  return { kind: 'tokens', text: lines.join(lineEnding) + lineEnding };
}
