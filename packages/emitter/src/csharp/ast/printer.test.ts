import { describe, it } from "mocha";
import { expect } from "chai";
import {
  attribute,
  binary,
  block,
  cast,
  conditional,
  id,
  identifierType,
  ifStatement,
  intLiteral,
  invoke,
  literal,
  member,
  not,
  nullableType,
  predefinedType,
  returnStatement,
  stringLiteral,
  tryFinally,
  varLocal,
} from "./builders.js";
import { printCompilationUnit, printExpression, printMember, printStatement, printType } from "./printer.js";

describe("C# printer", () => {
  describe("expressions", () => {
    it("should parenthesize right operands of equal precedence", () => {
      const expr = binary(
        binary(id("a"), "-", id("b")),
        "-",
        binary(id("c"), "-", id("d"))
      );

      expect(printExpression(expr)).to.equal("a - b - (c - d)");
    });

    it("should parenthesize looser operands", () => {
      const expr = binary(binary(id("a"), "+", id("b")), "*", id("c"));

      expect(printExpression(expr)).to.equal("(a + b) * c");
    });

    it("should escape keywords used as identifiers", () => {
      expect(printExpression(invoke(member(id("event"), "Fire"), [id("this")]))).to.equal(
        "@event.Fire(this)"
      );
    });

    it("should wrap negative cast operands", () => {
      expect(printExpression(cast(predefinedType("int"), literal("-1")))).to.equal("(int)(-1)");
    });

    it("should wrap conditionals used as receivers", () => {
      const expr = member(conditional(id("flag"), id("a"), id("b")), "Length");

      expect(printExpression(expr)).to.equal("(flag ? a : b).Length");
    });

    it("should escape string literals", () => {
      expect(printExpression(stringLiteral('say "hi"\n'))).to.equal('"say \\"hi\\"\\n"');
    });

    it("should print negation of member access without parentheses", () => {
      expect(printExpression(not(member(id("x"), "Ok")))).to.equal("!x.Ok");
    });
  });

  describe("types", () => {
    it("should keep global qualifiers and escape keyword segments", () => {
      expect(
        printType(identifierType("global::System.ReadOnlySpan", [predefinedType("byte")]))
      ).to.equal("global::System.ReadOnlySpan<byte>");
      expect(printType(identifierType("Lib.event.Handler"))).to.equal("Lib.@event.Handler");
      expect(printType(nullableType(predefinedType("int")))).to.equal("int?");
    });
  });

  describe("statements", () => {
    it("should indent nested blocks", () => {
      const stmt = tryFinally(
        [
          varLocal("x", intLiteral(1)),
          ifStatement(binary(id("x"), "!=", intLiteral(0)), [returnStatement(id("x"))]),
        ],
        []
      );

      expect(printStatement(stmt, "")).to.equal(
        [
          "try",
          "{",
          "    var x = 1;",
          "    if (x != 0)",
          "    {",
          "        return x;",
          "    }",
          "}",
          "finally",
          "{",
          "}",
        ].join("\n")
      );
    });
  });

  describe("declarations", () => {
    it("should print docs and attributes before members", () => {
      const text = printMember(
        {
          kind: "methodDeclaration",
          attributes: [attribute("Obsolete", [stringLiteral("Use <Other>")])],
          modifiers: ["public", "static"],
          returnType: predefinedType("int"),
          name: "Count",
          parameters: [{ name: "object", type: predefinedType("object") }],
          body: block([returnStatement(intLiteral(0))]),
          docs: "Counts a & b",
        },
        ""
      );

      expect(text).to.equal(
        [
          "/// <summary>",
          "/// Counts a &amp; b",
          "/// </summary>",
          '[Obsolete("Use <Other>")]',
          "public static int Count(object @object)",
          "{",
          "    return 0;",
          "}",
        ].join("\n")
      );
    });

    it("should print a compilation unit with header and namespace", () => {
      const text = printCompilationUnit({
        kind: "compilationUnit",
        header: ["<auto-generated>", "", "</auto-generated>"],
        nullableEnable: true,
        usings: [],
        members: [
          {
            kind: "namespaceDeclaration",
            name: "Sample",
            members: [
              {
                kind: "enumDeclaration",
                attributes: [],
                modifiers: ["public"],
                name: "Mode",
                baseType: predefinedType("int"),
                members: [
                  { name: "Off", value: intLiteral(0) },
                  { name: "On", value: intLiteral(1) },
                ],
              },
            ],
          },
        ],
      });

      expect(text).to.equal(
        [
          "// <auto-generated>",
          "//",
          "// </auto-generated>",
          "",
          "#nullable enable",
          "",
          "namespace Sample",
          "{",
          "    public enum Mode : int",
          "    {",
          "        Off = 0,",
          "        On = 1",
          "    }",
          "}",
          "",
        ].join("\n")
      );
    });
  });
});
