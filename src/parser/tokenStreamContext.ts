import { Token, type TokenStream, type Vocabulary } from "antlr4ng";

import type { SourceContext, SourceToken } from "../tree/types.js";

export interface TokenStreamContextOptions {
  /** Text the token offsets point into. */
  source: string;
  filename?: string;
  /** Maps token types to the names used as node kinds. */
  vocabulary: Vocabulary;
}

/**
 * Exposes an antlr4ng token stream as the context nodes are created from.
 * The active token is the one the parser consumed last.
 */
export class TokenStreamContext implements SourceContext {
  readonly source: string;
  readonly filename: string;
  private readonly tokens: TokenStream;
  private readonly vocabulary: Vocabulary;

  constructor(tokens: TokenStream, options: TokenStreamContextOptions) {
    this.tokens = tokens;
    this.source = options.source;
    this.filename = options.filename ?? "<unknown>";
    this.vocabulary = options.vocabulary;
  }

  get currentToken(): SourceToken | null {
    const token = this.tokens.LT(-1);
    if (!token || token.type === Token.EOF) {
      return null;
    }
    return {
      kind: tokenKind(token, this.vocabulary),
      line: token.line,
      start: token.start,
      end: token.stop + 1,
    };
  }

  get currentLine(): number {
    const token = this.tokens.LT(-1) ?? this.tokens.LT(1);
    return token?.line ?? 1;
  }
}

function tokenKind(token: Token, vocabulary: Vocabulary): string {
  return (
    vocabulary.getSymbolicName(token.type) ??
    vocabulary.getDisplayName(token.type) ??
    "UNKNOWN"
  );
}
