import { createLogger } from "../utils/logger.js";
import { isAttributeList, isNodeReference, resolveListElements } from "./attributes.js";
import { SerializationError } from "./errors.js";
import type { SyntaxNode } from "./syntaxNode.js";
import {
  DEFAULT_VALUE_LIST_ATTRIBUTES,
  RESERVED_ATTRIBUTE_NAMES,
  STRUCTURAL_KEYS,
  type AttributeValue,
  type TaggedTreeOptions,
} from "./types.js";

const logger = createLogger("tagged-tree");

interface RenderSettings {
  pretty: boolean;
  tab: string;
  valueListAttributes: readonly string[];
}

/**
 * Renders `node` as nested tags: one tag per node named after its kind,
 * attributes as JSON-encoded strings, relations wrapped in tags named after
 * the relation and empty slots as `<none/>`.
 */
export function renderTaggedTree(node: SyntaxNode, options: TaggedTreeOptions = {}): string {
  const settings: RenderSettings = {
    pretty: options.pretty ?? true,
    tab: options.tab ?? "  ",
    valueListAttributes: options.valueListAttributes ?? DEFAULT_VALUE_LIST_ATTRIBUTES,
  };
  logger.debug("rendering tagged tree", { kind: node.kind, pretty: settings.pretty });

  try {
    return renderNode(node, options.indent ?? 0, settings);
  } catch (error) {
    if (error instanceof SerializationError) {
      logger.warn("tagged tree rendering aborted", { kind: error.kind, line: error.line });
    }
    throw error;
  }
}

function renderNode(node: SyntaxNode, indent: number, settings: RenderSettings): string {
  const lead = settings.pretty ? settings.tab.repeat(indent) : "";
  const innerLead = settings.pretty ? settings.tab.repeat(indent + 1) : "";
  const lineBreak = settings.pretty ? "\n" : "";

  const attributes = renderAttributes(node, settings.valueListAttributes);
  const attrs = attributes.length > 0 ? ` ${attributes.join(" ")}` : "";
  const related = node.relatedEntries();

  if (node.length === 0 && related.length === 0 && node.comments.length === 0) {
    return `${lead}<${node.kind}${attrs}/>${lineBreak}`;
  }

  let result = `${lead}<${node.kind}${attrs}>${lineBreak}`;

  for (const comment of node.comments) {
    result += `${innerLead}<comment style="${comment.style}" mode="${comment.mode}">${comment.text}</comment>${lineBreak}`;
  }

  for (const child of node.children) {
    if (child === null) {
      result += `${innerLead}<none/>${lineBreak}`;
    } else if (child.relationName === undefined) {
      result += renderNode(child, indent + 1, settings);
    } else if (node.related(child.relationName) !== child) {
      throw new SerializationError(
        `child ${child.kind} is marked as relation "${child.relationName}" which ${node.kind} holds for another node`,
        node
      );
    }
  }

  for (const [name, child] of related) {
    result += `${innerLead}<${name}>${lineBreak}`;
    result += renderNode(child, indent + 2, settings);
    result += `${innerLead}</${name}>${lineBreak}`;
  }

  result += `${lead}</${node.kind}>${lineBreak}`;
  return result;
}

function renderAttributes(node: SyntaxNode, valueListAttributes: readonly string[]): string[] {
  const rendered: string[] = [];
  if (node.line !== undefined) {
    rendered.push(formatAttribute("line", String(node.line)));
  }

  for (const [name, value] of node.attributes) {
    if (RESERVED_ATTRIBUTE_NAMES.has(name) || STRUCTURAL_KEYS.has(name)) {
      continue;
    }
    const text = renderAttributeValue(node, name, value, valueListAttributes);
    if (text !== undefined) {
      rendered.push(formatAttribute(name, text));
    }
  }
  return rendered;
}

function renderAttributeValue(
  node: SyntaxNode,
  name: string,
  value: AttributeValue,
  valueListAttributes: readonly string[]
): string | undefined {
  if (isAttributeList(value)) {
    if (value.length === 0) {
      return undefined;
    }
    return resolveListElements(node, name, value, valueListAttributes).map(String).join(",");
  }
  if (isNodeReference(value)) {
    // references such as jump targets are not part of the tree
    return undefined;
  }
  if (typeof value === "boolean") {
    return value ? "true" : "false";
  }
  return String(value);
}

function formatAttribute(name: string, text: string): string {
  return `${name}=${JSON.stringify(text)}`;
}
