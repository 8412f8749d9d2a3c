import type { SyntaxNode } from "./syntaxNode.js";

export interface SourceToken {
  /** Token type name, used as the default node kind. */
  kind: string;
  /** One-based source line of the token. */
  line: number;
  /** Inclusive zero-based start offset within the source buffer. */
  start: number;
  /** Exclusive zero-based end offset within the source buffer. */
  end: number;
}

/**
 * Read-only view of the tokenizer state a parser builds nodes from.
 * Nodes never advance it.
 */
export interface SourceContext {
  readonly currentToken: SourceToken | null;
  readonly currentLine: number;
  readonly source: string;
  readonly filename: string;
}

export interface SyntaxComment {
  style: string;
  mode: string;
  text: string;
}

export type ScalarValue = boolean | number | string;

/**
 * Node values are references (e.g. a jump target or a declaration list entry),
 * never owned children.
 */
export type AttributeValue =
  | ScalarValue
  | SyntaxNode
  | readonly (ScalarValue | SyntaxNode)[];

/** `null` marks an empty slot, e.g. the elision in `[1, , 2]`. */
export type SyntaxChild = SyntaxNode | null;

export type ExportedValue =
  | ScalarValue
  | readonly ScalarValue[]
  | readonly SyntaxComment[]
  | readonly (ExportedNode | null)[]
  | ExportedNode;

export interface ExportedNode {
  kind: string;
  [name: string]: ExportedValue;
}

export interface TaggedTreeOptions {
  /** Emit line breaks and indentation. Defaults to `true`. */
  pretty?: boolean;
  /** Indentation depth of the outermost tag. */
  indent?: number;
  /** One level of indentation. Defaults to two spaces. */
  tab?: string;
  /** List attributes whose node elements render as their `value` attribute. */
  valueListAttributes?: readonly string[];
}

export interface ExportOptions {
  valueListAttributes?: readonly string[];
}

export interface JsonOptions extends ExportOptions {
  /** Spaces per indentation level; `0` emits a single line. Defaults to 2. */
  indent?: number;
}

export const DEFAULT_VALUE_LIST_ATTRIBUTES: readonly string[] = ["varDecls", "funDecls"];

/** Names that are never rendered as attributes. */
export const RESERVED_ATTRIBUTE_NAMES: ReadonlySet<string> = new Set([
  "kind",
  "parent",
  "comments",
  "target",
  "relationName",
  "start",
  "end",
]);

/** Keys the node's own structure occupies in both serialized forms. */
export const STRUCTURAL_KEYS: ReadonlySet<string> = new Set(["line", "children"]);
