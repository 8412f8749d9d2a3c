import { isScalarValue } from "./attributes.js";
import { SerializationError } from "./errors.js";
import { SyntaxNode } from "./syntaxNode.js";
import type { ScalarValue, SyntaxComment } from "./types.js";

const UNKNOWN_KIND = "(unknown)";

/**
 * Rebuilds a tree from an exported record. Relations are appended before the
 * unrelated children; the rebuilt nodes have no source context.
 */
export function importTree(record: unknown): SyntaxNode {
  return hydrate(record, "$");
}

export function fromJson(text: string): SyntaxNode {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new SerializationError(`invalid JSON: ${reason}`, { kind: UNKNOWN_KIND });
  }
  return importTree(parsed);
}

function hydrate(value: unknown, path: string): SyntaxNode {
  if (!isRecord(value)) {
    throw new SerializationError(`expected an exported node at ${path}`, { kind: UNKNOWN_KIND });
  }
  const kind = value.kind;
  if (typeof kind !== "string" || kind === "") {
    throw new SerializationError(`missing node kind at ${path}`, { kind: UNKNOWN_KIND });
  }

  const node = new SyntaxNode(undefined, kind);
  const relations: Array<[string, unknown]> = [];
  let children: unknown[] = [];

  for (const [key, entry] of Object.entries(value)) {
    switch (key) {
      case "kind":
        break;
      case "line":
        if (typeof entry !== "number") {
          throw new SerializationError(`line at ${path} must be a number`, node);
        }
        node.line = entry;
        break;
      case "children":
        if (!Array.isArray(entry)) {
          throw new SerializationError(`children at ${path} must be a list`, node);
        }
        children = entry;
        break;
      case "comments":
        node.comments = readComments(entry, path, node);
        break;
      default:
        if (isScalarValue(entry)) {
          node.attributes.set(key, entry);
        } else if (Array.isArray(entry)) {
          node.attributes.set(key, readScalarList(entry, `${path}.${key}`, node));
        } else if (isRecord(entry)) {
          relations.push([key, entry]);
        } else {
          throw new SerializationError(`unsupported value at ${path}.${key}`, node);
        }
    }
  }

  for (const [name, entry] of relations) {
    node.append(hydrate(entry, `${path}.${name}`), name);
  }
  children.forEach((entry, index) => {
    node.append(entry === null ? null : hydrate(entry, `${path}.children[${index}]`));
  });

  return node;
}

function readScalarList(entries: unknown[], path: string, node: SyntaxNode): ScalarValue[] {
  return entries.map((entry, index) => {
    if (!isScalarValue(entry)) {
      throw new SerializationError(`list element ${index} at ${path} is not a scalar`, node);
    }
    return entry;
  });
}

function readComments(entry: unknown, path: string, node: SyntaxNode): SyntaxComment[] {
  if (!Array.isArray(entry)) {
    throw new SerializationError(`comments at ${path} must be a list`, node);
  }
  return entry.map((comment: unknown, index): SyntaxComment => {
    if (!isRecord(comment)) {
      throw new SerializationError(`comment ${index} at ${path} is malformed`, node);
    }
    const { style, mode, text } = comment;
    if (typeof style !== "string" || typeof mode !== "string" || typeof text !== "string") {
      throw new SerializationError(`comment ${index} at ${path} is malformed`, node);
    }
    return { style, mode, text };
  });
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
