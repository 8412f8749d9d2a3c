export { SyntaxNode, createNode } from "./tree/syntaxNode.js";
export { createSourceContext } from "./tree/sourceContext.js";
export type { MutableSourceContext } from "./tree/sourceContext.js";
export { renderTaggedTree } from "./tree/taggedTree.js";
export { exportTree, toJson } from "./tree/exportTree.js";
export { importTree, fromJson } from "./tree/importTree.js";
export { TokenStreamContext } from "./parser/tokenStreamContext.js";
export type { TokenStreamContextOptions } from "./parser/tokenStreamContext.js";
export {
  SyntaxTreeError,
  InvalidChildError,
  ChildNotFoundError,
  SerializationError,
  NoSourceContextError,
} from "./tree/errors.js";
export type { NodeDiagnosticContext } from "./tree/errors.js";
export { DEFAULT_VALUE_LIST_ATTRIBUTES, RESERVED_ATTRIBUTE_NAMES } from "./tree/types.js";
export type {
  AttributeValue,
  ExportOptions,
  ExportedNode,
  ExportedValue,
  JsonOptions,
  ScalarValue,
  SourceContext,
  SourceToken,
  SyntaxChild,
  SyntaxComment,
  TaggedTreeOptions,
} from "./tree/types.js";
