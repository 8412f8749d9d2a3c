import { describe, expect, it } from "vitest";

import {
  SerializationError,
  createNode,
  createSourceContext,
  renderTaggedTree,
} from "../../src/index.js";
import type { SyntaxNode } from "../../src/index.js";

function num(value: number): SyntaxNode {
  return createNode(undefined, "Num").setAttribute("value", value);
}

function declaration(name: string): SyntaxNode {
  return createNode(undefined, "VarDecl").setAttribute("value", name);
}

function binaryExpr(): SyntaxNode {
  const node = createNode(undefined, "BinaryExpr");
  node.append(num(1), "left");
  node.append(num(2), "right");
  return node;
}

describe("toTaggedTree", () => {
  it("wraps related children in relation tags", () => {
    expect(binaryExpr().toTaggedTree({ pretty: false })).toBe(
      '<BinaryExpr><left><Num value="1"/></left><right><Num value="2"/></right></BinaryExpr>'
    );
  });

  it("indents nested tags when pretty", () => {
    expect(binaryExpr().toTaggedTree()).toBe(
      [
        "<BinaryExpr>",
        "  <left>",
        '    <Num value="1"/>',
        "  </left>",
        "  <right>",
        '    <Num value="2"/>',
        "  </right>",
        "</BinaryExpr>",
        "",
      ].join("\n")
    );
  });

  it("starts at the requested indentation", () => {
    const block = createNode(undefined, "Block", [createNode(undefined, "EmptyStatement")]);

    expect(block.toTaggedTree({ indent: 1, tab: "\t" })).toBe(
      "\t<Block>\n\t\t<EmptyStatement/>\n\t</Block>\n"
    );
  });

  it("renders empty slots as none", () => {
    const array = createNode(undefined, "ArrayLit");
    array.append(null).append(null).append(null).append(num(7));

    expect(array.toTaggedTree({ pretty: false })).toBe(
      '<ArrayLit><none/><none/><none/><Num value="7"/></ArrayLit>'
    );
  });

  it("encodes scalar and list attributes as JSON strings", () => {
    const node = createNode(undefined, "Identifier")
      .setAttribute("name", "x")
      .setAttribute("readOnly", true)
      .setAttribute("count", 3)
      .setAttribute("ratio", 1.5)
      .setAttribute("flags", [])
      .setAttribute("params", ["a", "b"])
      .setAttribute("label", 'say "hi"');

    expect(node.toTaggedTree({ pretty: false })).toBe(
      '<Identifier name="x" readOnly="true" count="3" ratio="1.5" params="a,b" label="say \\"hi\\""/>'
    );
  });

  it("skips reserved names and node references", () => {
    const target = createNode(undefined, "Label");
    const node = createNode(undefined, "Break")
      .setAttribute("target", target)
      .setAttribute("start", 4)
      .setAttribute("relationName", "body")
      .setAttribute("loop", target)
      .setAttribute("label", "outer");

    expect(node.toTaggedTree({ pretty: false })).toBe('<Break label="outer"/>');
  });

  it("leaves out attributes named after structural keys", () => {
    const node = createNode(undefined, "Block")
      .setAttribute("children", "3")
      .setAttribute("line", 9);

    expect(node.toTaggedTree({ pretty: false })).toBe("<Block/>");
  });

  it("emits the creation line", () => {
    const context = createSourceContext("\nrun()");
    context.advance({ kind: "IDENT", line: 2, start: 1, end: 4 });

    expect(createNode(context, "Call").toTaggedTree({ pretty: false })).toBe('<Call line="2"/>');
  });

  it("renders declaration lists through their values", () => {
    const script = createNode(undefined, "Script").setAttribute("varDecls", [
      declaration("a"),
      declaration("b"),
    ]);

    expect(script.toTaggedTree({ pretty: false })).toBe('<Script varDecls="a,b"/>');
  });

  it("accepts custom value-carrying list names", () => {
    const node = createNode(undefined, "Import").setAttribute("names", [declaration("x")]);

    expect(renderTaggedTree(node, { pretty: false, valueListAttributes: ["names"] })).toBe(
      '<Import names="x"/>'
    );
  });

  it("fails on list elements without a text form", () => {
    const withNodes = createNode(undefined, "Call").setAttribute("args", [num(1)]);
    const withoutValue = createNode(undefined, "Script").setAttribute("funDecls", [
      createNode(undefined, "Function"),
    ]);

    expect(() => withNodes.toTaggedTree()).toThrow(SerializationError);
    expect(() => withoutValue.toTaggedTree()).toThrow(SerializationError);
  });

  it("emits comments before children", () => {
    const block = createNode(undefined, "Block");
    block.comments = [{ style: "single", mode: "inline", text: "note" }];

    expect(block.toTaggedTree({ pretty: false })).toBe(
      '<Block><comment style="single" mode="inline">note</comment></Block>'
    );
  });

  it("puts unrelated children before related ones", () => {
    const call = createNode(undefined, "Call");
    call.append(createNode(undefined, "Identifier").setAttribute("name", "f"), "callee");
    call.append(num(1));

    expect(call.toTaggedTree({ pretty: false })).toBe(
      '<Call><Num value="1"/><callee><Identifier name="f"/></callee></Call>'
    );
  });

  it("fails when a child claims a relation its parent holds for another node", () => {
    const node = createNode(undefined, "While");
    node.append(createNode(undefined, "Block"), "body");
    node.append(createNode(undefined, "EmptyStatement"), "body");

    expect(() => node.toTaggedTree()).toThrow(SerializationError);
  });

  it("produces identical text on repeated calls", () => {
    const node = binaryExpr();

    expect(node.toTaggedTree()).toBe(node.toTaggedTree());
    expect(String(node)).toBe(node.toTaggedTree());
  });
});
