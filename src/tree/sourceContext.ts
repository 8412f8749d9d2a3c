import type { SourceContext, SourceToken } from "./types.js";

export interface MutableSourceContext extends SourceContext {
  /** Makes `token` the active token and moves the current line to it. */
  advance(token: SourceToken): void;
  /** Drops the active token, keeping the current line. */
  clearToken(): void;
}

/**
 * Context for hand-written tokenizers that track the active token themselves.
 */
export function createSourceContext(source: string, filename = "<memory>"): MutableSourceContext {
  let currentToken: SourceToken | null = null;
  let currentLine = 1;

  return {
    source,
    filename,
    get currentToken() {
      return currentToken;
    },
    get currentLine() {
      return currentLine;
    },
    advance(token) {
      if (token.start > token.end) {
        throw new RangeError(
          `Token ${token.kind} starts at ${token.start} after its end ${token.end}`
        );
      }
      currentToken = { ...token };
      currentLine = token.line;
    },
    clearToken() {
      currentToken = null;
    },
  };
}
