import { describe, expect, it } from "vitest";

import { createSourceContext } from "../../src/index.js";

describe("createSourceContext", () => {
  it("tracks the active token and line", () => {
    const context = createSourceContext("let x;", "decl.js");

    expect(context.currentToken).toBeNull();
    expect(context.currentLine).toBe(1);
    expect(context.filename).toBe("decl.js");

    context.advance({ kind: "LET", line: 3, start: 0, end: 3 });
    expect(context.currentToken).toEqual({ kind: "LET", line: 3, start: 0, end: 3 });
    expect(context.currentLine).toBe(3);

    context.clearToken();
    expect(context.currentToken).toBeNull();
    expect(context.currentLine).toBe(3);
  });

  it("rejects tokens that end before they start", () => {
    const context = createSourceContext("x");

    expect(() => context.advance({ kind: "IDENT", line: 1, start: 2, end: 1 })).toThrow(
      RangeError
    );
  });
});
