import { createLogger } from "../utils/logger.js";
import { isAttributeList, isNodeReference, resolveListElements } from "./attributes.js";
import { SerializationError } from "./errors.js";
import type { SyntaxNode } from "./syntaxNode.js";
import {
  DEFAULT_VALUE_LIST_ATTRIBUTES,
  RESERVED_ATTRIBUTE_NAMES,
  STRUCTURAL_KEYS,
  type ExportOptions,
  type ExportedNode,
  type JsonOptions,
} from "./types.js";

const logger = createLogger("export-tree");

/**
 * Builds a plain record of the tree below `node`. Span offsets, parent links
 * and node references are left out.
 */
export function exportTree(node: SyntaxNode, options: ExportOptions = {}): ExportedNode {
  const valueListAttributes = options.valueListAttributes ?? DEFAULT_VALUE_LIST_ATTRIBUTES;
  try {
    return exportNode(node, valueListAttributes);
  } catch (error) {
    if (error instanceof SerializationError) {
      logger.warn("tree export aborted", { kind: error.kind, line: error.line });
    }
    throw error;
  }
}

export function toJson(node: SyntaxNode, options: JsonOptions = {}): string {
  logger.debug("exporting tree as JSON", { kind: node.kind });
  const record = exportTree(node, options);
  return JSON.stringify(record, null, options.indent ?? 2);
}

function exportNode(node: SyntaxNode, valueListAttributes: readonly string[]): ExportedNode {
  const record: ExportedNode = { kind: node.kind };
  if (node.line !== undefined) {
    record.line = node.line;
  }

  for (const [name, value] of node.attributes) {
    if (RESERVED_ATTRIBUTE_NAMES.has(name) || STRUCTURAL_KEYS.has(name)) {
      continue;
    }
    if (isAttributeList(value)) {
      record[name] = resolveListElements(node, name, value, valueListAttributes);
    } else if (!isNodeReference(value)) {
      record[name] = value;
    }
  }

  if (node.comments.length > 0) {
    record.comments = node.comments.map((comment) => ({ ...comment }));
  }

  for (const [name, child] of node.relatedEntries()) {
    if (name in record) {
      throw new SerializationError(
        `relation "${name}" has the same name as an attribute of ${node.kind}`,
        node
      );
    }
    record[name] = exportNode(child, valueListAttributes);
  }

  const children = node.unrelatedChildren();
  if (children.length > 0) {
    record.children = children.map((child) =>
      child === null ? null : exportNode(child, valueListAttributes)
    );
  }

  return record;
}
