import { SerializationError } from "./errors.js";
import type { SyntaxNode } from "./syntaxNode.js";
import type { AttributeValue, ScalarValue } from "./types.js";

type AttributeList = readonly (ScalarValue | SyntaxNode)[];

export function isAttributeList(value: AttributeValue): value is AttributeList {
  return Array.isArray(value);
}

export function isNodeReference(value: ScalarValue | SyntaxNode): value is SyntaxNode {
  return typeof value === "object";
}

export function isScalarValue(value: unknown): value is ScalarValue {
  return typeof value === "boolean" || typeof value === "number" || typeof value === "string";
}

/**
 * Resolves the elements of a list attribute to scalars. Node elements of a
 * value-carrying list (declaration lists) stand for their `value` attribute;
 * anywhere else they have no text form.
 */
export function resolveListElements(
  owner: SyntaxNode,
  name: string,
  list: AttributeList,
  valueListAttributes: readonly string[]
): ScalarValue[] {
  const valueCarrying = valueListAttributes.includes(name);
  return list.map((element, position) => {
    if (!isNodeReference(element)) {
      return element;
    }
    if (!valueCarrying) {
      throw new SerializationError(
        `element ${position} of list attribute "${name}" is a ${element.kind} node and has no text form`,
        owner
      );
    }
    const value = element.getAttribute("value");
    if (!isScalarValue(value)) {
      throw new SerializationError(
        `element ${position} of list attribute "${name}" (${element.kind}) carries no scalar value`,
        owner
      );
    }
    return value;
  });
}
