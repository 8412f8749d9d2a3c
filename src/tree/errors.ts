export interface NodeDiagnosticContext {
  /** Kind of the node the operation was applied to. */
  kind: string;
  /** Source line of that node, when it was created from a context. */
  line?: number;
}

export class SyntaxTreeError extends Error {
  readonly kind: string;
  readonly line: number | undefined;

  constructor(message: string, node: NodeDiagnosticContext) {
    super(
      node.line === undefined
        ? `${node.kind}: ${message}`
        : `${node.kind} (line ${node.line}): ${message}`
    );
    this.name = "SyntaxTreeError";
    this.kind = node.kind;
    this.line = node.line;
  }
}

export class InvalidChildError extends SyntaxTreeError {
  constructor(message: string, node: NodeDiagnosticContext) {
    super(message, node);
    this.name = "InvalidChildError";
  }
}

export class ChildNotFoundError extends SyntaxTreeError {
  constructor(message: string, node: NodeDiagnosticContext) {
    super(message, node);
    this.name = "ChildNotFoundError";
  }
}

export class SerializationError extends SyntaxTreeError {
  constructor(message: string, node: NodeDiagnosticContext) {
    super(message, node);
    this.name = "SerializationError";
  }
}

export class NoSourceContextError extends SyntaxTreeError {
  constructor(message: string, node: NodeDiagnosticContext) {
    super(message, node);
    this.name = "NoSourceContextError";
  }
}
