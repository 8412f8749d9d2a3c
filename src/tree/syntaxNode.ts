import { createLogger } from "../utils/logger.js";
import { ChildNotFoundError, InvalidChildError, NoSourceContextError } from "./errors.js";
import { exportTree, toJson } from "./exportTree.js";
import { renderTaggedTree } from "./taggedTree.js";
import { STRUCTURAL_KEYS } from "./types.js";
import type {
  AttributeValue,
  ExportOptions,
  ExportedNode,
  JsonOptions,
  SourceContext,
  SyntaxChild,
  SyntaxComment,
  TaggedTreeOptions,
} from "./types.js";

const logger = createLogger("syntax-node");

/** Keys the exported record uses for the node's own structure. */
const STRUCTURAL_RELATION_NAMES = new Set(["kind", ...STRUCTURAL_KEYS, "comments"]);

/**
 * A vertex of the syntax tree: an ordered list of children (with empty slots)
 * plus named relations into that list and a bag of scalar attributes.
 */
export class SyntaxNode implements Iterable<SyntaxChild> {
  readonly kind: string;
  line: number | undefined;
  start: number | undefined;
  end: number | undefined;
  /** Owning node. Set by `append` and `replace`, cleared when replaced out. */
  parent: SyntaxNode | undefined;
  readonly context: SourceContext | undefined;
  readonly attributes = new Map<string, AttributeValue>();
  comments: SyntaxComment[] = [];

  private readonly childList: SyntaxChild[] = [];
  /** Relation name to position in `childList`. */
  private readonly relationIndex = new Map<string, number>();
  private relation: string | undefined;

  constructor(
    context?: SourceContext,
    kind?: string,
    initialChildren: readonly SyntaxChild[] = []
  ) {
    const token = context?.currentToken ?? null;
    if (context && token) {
      // An explicit kind keeps the token's position, e.g. a block built on a curly.
      this.kind = kind || token.kind;
      this.line = token.line;
      this.start = token.start;
      this.end = token.end;
    } else {
      this.kind = kind ?? "";
      this.line = context?.currentLine;
    }
    this.context = context;

    if (!this.kind) {
      throw new RangeError("Syntax node kind must be a non-empty string");
    }

    for (const child of initialChildren) {
      this.append(child);
    }
  }

  get children(): readonly SyntaxChild[] {
    return this.childList;
  }

  get length(): number {
    return this.childList.length;
  }

  /** Relation this node is held under by its parent, if any. */
  get relationName(): string | undefined {
    return this.relation;
  }

  get relations(): Readonly<Record<string, SyntaxNode>> {
    const result: Record<string, SyntaxNode> = {};
    for (const [name, child] of this.relatedEntries()) {
      result[name] = child;
    }
    return result;
  }

  [Symbol.iterator](): Iterator<SyntaxChild> {
    return this.childList[Symbol.iterator]();
  }

  at(index: number): SyntaxChild | undefined {
    return this.childList.at(index);
  }

  indexOf(child: SyntaxNode): number {
    return this.childList.indexOf(child);
  }

  related(name: string): SyntaxNode | undefined {
    const index = this.relationIndex.get(name);
    if (index === undefined) {
      return undefined;
    }
    return this.childList[index] ?? undefined;
  }

  relatedEntries(): Array<[string, SyntaxNode]> {
    const entries: Array<[string, SyntaxNode]> = [];
    for (const name of this.relationIndex.keys()) {
      const child = this.related(name);
      if (child) {
        entries.push([name, child]);
      }
    }
    return entries;
  }

  getAttribute(name: string): AttributeValue | undefined {
    return this.attributes.get(name);
  }

  setAttribute(name: string, value: AttributeValue): this {
    this.attributes.set(name, value);
    return this;
  }

  /**
   * Attaches `child` at the end of the sequence and widens this node's span to
   * cover it. With `relation`, the child is also reachable by that name.
   * An empty slot cannot carry a relation; that call does nothing.
   */
  append(child: SyntaxChild, relation?: string): this {
    if (child === null || child === undefined) {
      if (relation === undefined) {
        this.childList.push(null);
      }
      return this;
    }

    if (!(child instanceof SyntaxNode)) {
      throw new InvalidChildError(`cannot append ${describeValue(child)}`, this);
    }

    if (relation !== undefined && (!relation || STRUCTURAL_RELATION_NAMES.has(relation))) {
      throw new RangeError(`"${relation}" cannot be used as a relation name`);
    }

    this.widenSpan(child);
    child.parent = this;

    if (relation !== undefined) {
      this.relationIndex.set(relation, this.childList.length);
      child.relation = relation;
    }

    this.childList.push(child);
    return this;
  }

  /**
   * Puts `newChild` at the position of `oldChild` and hands it the old child's
   * relation. The span is left as it was.
   */
  replace(oldChild: SyntaxNode, newChild: SyntaxNode): SyntaxNode {
    if (!(newChild instanceof SyntaxNode)) {
      throw new InvalidChildError(`cannot replace with ${describeValue(newChild)}`, this);
    }

    const index = this.childList.indexOf(oldChild);
    if (index < 0) {
      throw new ChildNotFoundError(`${oldChild.kind} is not a child of this node`, this);
    }
    if (oldChild === newChild) {
      return oldChild;
    }

    this.childList[index] = newChild;
    newChild.parent = this;

    const relation = oldChild.relation;
    newChild.relation = relation;
    if (relation !== undefined) {
      this.relationIndex.set(relation, index);
      oldChild.relation = undefined;
    }
    if (oldChild.parent === this) {
      oldChild.parent = undefined;
    }

    logger.debug("replaced child", {
      kind: this.kind,
      index,
      removed: oldChild.kind,
      inserted: newChild.kind,
      relation,
    });
    return oldChild;
  }

  /** Children not held under a relation, empty slots included. */
  unrelatedChildren(): SyntaxChild[] {
    return this.childList.filter((child) => child === null || child.relation === undefined);
  }

  childCount(onlyUnrelated = true): number {
    if (!onlyUnrelated) {
      return this.childList.length;
    }
    return this.unrelatedChildren().length;
  }

  getSourceText(): string {
    const context = this.requireContext("source text");
    return context.source.slice(this.start ?? 0, this.end ?? context.source.length);
  }

  getFileName(): string {
    return this.requireContext("file name").filename;
  }

  toTaggedTree(options: TaggedTreeOptions = {}): string {
    return renderTaggedTree(this, options);
  }

  exportTree(options: ExportOptions = {}): ExportedNode {
    return exportTree(this, options);
  }

  toJson(options: JsonOptions = {}): string {
    return toJson(this, options);
  }

  toString(): string {
    return this.toTaggedTree();
  }

  private widenSpan(child: SyntaxNode): void {
    if (child.start !== undefined && (this.start === undefined || child.start < this.start)) {
      this.start = child.start;
    }
    if (child.end !== undefined && (this.end === undefined || child.end > this.end)) {
      this.end = child.end;
    }
  }

  private requireContext(purpose: string): SourceContext {
    if (!this.context) {
      throw new NoSourceContextError(`no source context to read the ${purpose} from`, this);
    }
    return this.context;
  }
}

export function createNode(
  context?: SourceContext,
  kind?: string,
  initialChildren: readonly SyntaxChild[] = []
): SyntaxNode {
  return new SyntaxNode(context, kind, initialChildren);
}

function describeValue(value: unknown): string {
  if (value === null) {
    return "null";
  }
  if (Array.isArray(value)) {
    return "an array";
  }
  return `a value of type ${typeof value}`;
}
