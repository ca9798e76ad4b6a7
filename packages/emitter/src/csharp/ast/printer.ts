/**
 * C# AST Printer
 *
 * Converts typed C# AST nodes into deterministic C# source text.
 * Pure and stateless. Parenthesization is derived from operator
 * precedence, four spaces per indentation level.
 */

import type {
  CSharpAttributeAst,
  CSharpBlockStatementAst,
  CSharpCompilationUnitAst,
  CSharpEnumMemberAst,
  CSharpExpressionAst,
  CSharpMemberAst,
  CSharpNamespaceDeclarationAst,
  CSharpParameterAst,
  CSharpStatementAst,
  CSharpTypeAst,
  CSharpTypeDeclarationAst,
} from "./types.js";

const INDENT = "    ";

// ============================================================
// C# reserved keywords for identifier escaping
// ============================================================

const CSHARP_KEYWORDS: ReadonlySet<string> = new Set([
  "abstract",
  "as",
  "base",
  "bool",
  "break",
  "byte",
  "case",
  "catch",
  "char",
  "checked",
  "class",
  "const",
  "continue",
  "decimal",
  "default",
  "delegate",
  "do",
  "double",
  "else",
  "enum",
  "event",
  "explicit",
  "extern",
  "false",
  "finally",
  "fixed",
  "float",
  "for",
  "foreach",
  "goto",
  "if",
  "implicit",
  "in",
  "int",
  "interface",
  "internal",
  "is",
  "lock",
  "long",
  "namespace",
  "new",
  "null",
  "object",
  "operator",
  "out",
  "override",
  "params",
  "private",
  "protected",
  "public",
  "readonly",
  "ref",
  "return",
  "sbyte",
  "sealed",
  "short",
  "sizeof",
  "stackalloc",
  "static",
  "string",
  "struct",
  "switch",
  "this",
  "throw",
  "true",
  "try",
  "typeof",
  "uint",
  "ulong",
  "unchecked",
  "unsafe",
  "ushort",
  "using",
  "virtual",
  "void",
  "volatile",
  "while",
]);

/**
 * Keywords that stay bare in expression position
 */
const EXPRESSION_KEYWORDS: ReadonlySet<string> = new Set(["this", "base", "null", "true", "false"]);

/**
 * Predefined type keywords; never escaped inside a qualified type name
 */
const PREDEFINED_TYPE_KEYWORDS: ReadonlySet<string> = new Set([
  "bool",
  "byte",
  "char",
  "decimal",
  "double",
  "float",
  "int",
  "long",
  "object",
  "sbyte",
  "short",
  "string",
  "uint",
  "ulong",
  "ushort",
  "void",
  "nint",
  "nuint",
]);

export const isCSharpKeyword = (name: string): boolean => CSHARP_KEYWORDS.has(name);

/**
 * Escape a C# identifier if it's a keyword
 */
export const escapeIdentifier = (name: string): string =>
  CSHARP_KEYWORDS.has(name) ? `@${name}` : name;

/**
 * Escape segments in a qualified name (e.g. "global::Foo.event.Bar").
 * The "global::" prefix and predefined type keywords are preserved.
 */
const escapeQualifiedName = (name: string): string => {
  const globalPrefix = "global::";
  const hasGlobal = name.startsWith(globalPrefix);
  const body = hasGlobal ? name.slice(globalPrefix.length) : name;

  const escaped = body
    .split(".")
    .map((segment) =>
      CSHARP_KEYWORDS.has(segment) && !PREDEFINED_TYPE_KEYWORDS.has(segment)
        ? `@${segment}`
        : segment
    )
    .join(".");

  return hasGlobal ? `${globalPrefix}${escaped}` : escaped;
};

// ============================================================
// Operator precedence for parenthesization
// ============================================================

/**
 * C# operator precedence levels (higher = binds tighter)
 */
const getOperatorPrecedence = (op: string): number => {
  switch (op) {
    case "??":
      return 3;
    case "||":
      return 4;
    case "&&":
      return 5;
    case "|":
      return 6;
    case "^":
      return 7;
    case "&":
      return 8;
    case "==":
    case "!=":
      return 9;
    case "<":
    case ">":
    case "<=":
    case ">=":
      return 10;
    case "<<":
    case ">>":
      return 11;
    case "+":
    case "-":
      return 12;
    case "*":
    case "/":
    case "%":
      return 13;
    default:
      return 0;
  }
};

const getExpressionPrecedence = (expr: CSharpExpressionAst): number => {
  switch (expr.kind) {
    case "assignmentExpression":
      return 1;
    case "conditionalExpression":
      return 2;
    case "binaryExpression":
      return getOperatorPrecedence(expr.operatorToken);
    case "prefixUnaryExpression":
    case "castExpression":
      return 14;
    case "literalExpression":
    case "identifierExpression":
    case "memberAccessExpression":
    case "invocationExpression":
    case "objectCreationExpression":
    case "arrayCreationExpression":
    case "defaultExpression":
      return 16;
    case "argumentModifierExpression":
      return 0;
    default: {
      const exhaustiveCheck: never = expr;
      void exhaustiveCheck;
      throw new Error("ICE: Unhandled expression AST kind in getExpressionPrecedence");
    }
  }
};

/**
 * Whether an operand of a binary expression needs parentheses. Operators
 * are left-associative, so a right operand of equal precedence does.
 */
const needsParensInBinary = (
  child: CSharpExpressionAst,
  parentPrecedence: number,
  isRightOperand: boolean
): boolean => {
  const childPrec = getExpressionPrecedence(child);
  if (childPrec < parentPrecedence) return true;
  return childPrec === parentPrecedence && isRightOperand;
};

const parenthesizeIfNeeded = (
  expr: CSharpExpressionAst,
  parentPrecedence: number,
  isRightOperand: boolean
): string => {
  const text = printExpression(expr);
  return needsParensInBinary(expr, parentPrecedence, isRightOperand) ? `(${text})` : text;
};

// ============================================================
// Type Printer
// ============================================================

export const printType = (type: CSharpTypeAst): string => {
  switch (type.kind) {
    case "predefinedType":
      return type.keyword;

    case "identifierType": {
      const name = escapeQualifiedName(type.name);
      if (!type.typeArguments || type.typeArguments.length === 0) {
        return name;
      }
      return `${name}<${type.typeArguments.map(printType).join(", ")}>`;
    }

    case "nullableType":
      return `${printType(type.underlyingType)}?`;

    case "arrayType":
      return `${printType(type.elementType)}[]`;

    case "varType":
      return "var";

    default: {
      const exhaustiveCheck: never = type;
      void exhaustiveCheck;
      throw new Error("ICE: Unhandled type AST kind in printType");
    }
  }
};

// ============================================================
// Expression Printer
// ============================================================

export const printExpression = (expr: CSharpExpressionAst): string => {
  switch (expr.kind) {
    case "literalExpression":
      return expr.text;

    case "identifierExpression":
      return EXPRESSION_KEYWORDS.has(expr.identifier)
        ? expr.identifier
        : escapeIdentifier(expr.identifier);

    case "memberAccessExpression":
      return `${printPrimaryExpression(expr.expression)}.${escapeIdentifier(expr.memberName)}`;

    case "invocationExpression": {
      const callee = printPrimaryExpression(expr.expression);
      const typeArgs =
        expr.typeArguments && expr.typeArguments.length > 0
          ? `<${expr.typeArguments.map(printType).join(", ")}>`
          : "";
      const args = expr.arguments.map(printExpression).join(", ");
      return `${callee}${typeArgs}(${args})`;
    }

    case "objectCreationExpression": {
      const typeName = printType(expr.type);
      const args = expr.arguments.map(printExpression).join(", ");
      const init =
        expr.initializer && expr.initializer.length > 0
          ? ` { ${expr.initializer.map(printExpression).join(", ")} }`
          : "";
      return `new ${typeName}(${args})${init}`;
    }

    case "arrayCreationExpression": {
      const elemType = printType(expr.elementType);
      if (expr.initializer.length === 0) {
        return `new ${elemType}[0]`;
      }
      return `new ${elemType}[] { ${expr.initializer.map(printExpression).join(", ")} }`;
    }

    case "assignmentExpression":
      return `${printExpression(expr.left)} ${expr.operatorToken} ${printExpression(expr.right)}`;

    case "binaryExpression": {
      const prec = getOperatorPrecedence(expr.operatorToken);
      const left = parenthesizeIfNeeded(expr.left, prec, false);
      const right = parenthesizeIfNeeded(expr.right, prec, true);
      return `${left} ${expr.operatorToken} ${right}`;
    }

    case "prefixUnaryExpression": {
      const operand = printUnaryOperand(expr.operand);
      if (expr.operatorToken === "-" && operand.startsWith("-")) {
        return `- ${operand}`;
      }
      return `${expr.operatorToken}${operand}`;
    }

    case "conditionalExpression": {
      const cond = parenthesizeIfNeeded(expr.condition, 3, false);
      const whenTrue = printExpression(expr.whenTrue);
      const whenFalse = printExpression(expr.whenFalse);
      return `${cond} ? ${whenTrue} : ${whenFalse}`;
    }

    case "castExpression":
      return `(${printType(expr.type)})${printCastOperand(expr.expression)}`;

    case "defaultExpression":
      return expr.type ? `default(${printType(expr.type)})` : "default";

    case "argumentModifierExpression":
      return `${expr.modifier} ${printExpression(expr.expression)}`;

    default: {
      const exhaustiveCheck: never = expr;
      void exhaustiveCheck;
      throw new Error("ICE: Unhandled expression AST kind in printExpression");
    }
  }
};

/**
 * Print an expression that appears before `.member` or `(args)`
 */
const printPrimaryExpression = (expr: CSharpExpressionAst): string => {
  const text = printExpression(expr);
  return getExpressionPrecedence(expr) >= 15 ? text : `(${text})`;
};

const printUnaryOperand = (expr: CSharpExpressionAst): string => {
  const text = printExpression(expr);
  return getExpressionPrecedence(expr) >= 14 ? text : `(${text})`;
};

/**
 * Cast operands need unary precedence; negative operands are wrapped so
 * `(int)-1` never reads as a subtraction.
 */
const printCastOperand = (expr: CSharpExpressionAst): string => {
  const text = printExpression(expr);
  if (getExpressionPrecedence(expr) < 14) {
    return `(${text})`;
  }
  if (expr.kind === "prefixUnaryExpression" && expr.operatorToken === "-") {
    return `(${text})`;
  }
  if (expr.kind === "literalExpression" && text.startsWith("-")) {
    return `(${text})`;
  }
  return text;
};

// ============================================================
// Statement Printer
// ============================================================

export const printStatement = (stmt: CSharpStatementAst, indent: string): string => {
  switch (stmt.kind) {
    case "blockStatement":
      return printBlockStatement(stmt, indent);

    case "localDeclarationStatement": {
      const mods = stmt.modifiers.length > 0 ? `${stmt.modifiers.join(" ")} ` : "";
      const decls = stmt.declarators
        .map((d) =>
          d.initializer
            ? `${escapeIdentifier(d.name)} = ${printExpression(d.initializer)}`
            : escapeIdentifier(d.name)
        )
        .join(", ");
      return `${indent}${mods}${printType(stmt.type)} ${decls};`;
    }

    case "expressionStatement":
      return `${indent}${printExpression(stmt.expression)};`;

    case "ifStatement": {
      const cond = printExpression(stmt.condition);
      const thenBody = printStatement(stmt.thenStatement, indent);
      if (!stmt.elseStatement) {
        return `${indent}if (${cond})\n${thenBody}`;
      }
      const elseBody = printStatement(stmt.elseStatement, indent);
      return `${indent}if (${cond})\n${thenBody}\n${indent}else\n${elseBody}`;
    }

    case "tryStatement":
      return `${indent}try\n${printBlockStatement(stmt.body, indent)}\n${indent}finally\n${printBlockStatement(stmt.finallyBody, indent)}`;

    case "throwStatement":
      return `${indent}throw ${printExpression(stmt.expression)};`;

    case "returnStatement":
      return stmt.expression
        ? `${indent}return ${printExpression(stmt.expression)};`
        : `${indent}return;`;

    default: {
      const exhaustiveCheck: never = stmt;
      void exhaustiveCheck;
      throw new Error("ICE: Unhandled statement AST kind in printStatement");
    }
  }
};

const printBlockStatement = (block: CSharpBlockStatementAst, indent: string): string => {
  if (block.statements.length === 0) {
    return `${indent}{\n${indent}}`;
  }
  const innerIndent = indent + INDENT;
  const stmts = block.statements.map((s) => printStatement(s, innerIndent)).join("\n");
  return `${indent}{\n${stmts}\n${indent}}`;
};

const printParameter = (param: CSharpParameterAst): string => {
  const mods =
    param.modifiers && param.modifiers.length > 0 ? `${param.modifiers.join(" ")} ` : "";
  return `${mods}${printType(param.type)} ${escapeIdentifier(param.name)}`;
};

// ============================================================
// Declaration Printer
// ============================================================

const escapeXml = (text: string): string =>
  text.replace(/&/g, "&amp;").replace(/</g, "&lt;").replace(/>/g, "&gt;");

/**
 * `/// <summary>` block for a docs string
 */
const printDocs = (docs: string | undefined, indent: string): string => {
  if (docs === undefined) return "";
  const lines = docs
    .split("\n")
    .map((line) => `${indent}///${line.length > 0 ? ` ${escapeXml(line)}` : ""}`);
  return [`${indent}/// <summary>`, ...lines, `${indent}/// </summary>`, ""].join("\n");
};

const printAttributes = (attrs: readonly CSharpAttributeAst[], indent: string): string =>
  attrs
    .map((a) => {
      const args =
        a.arguments && a.arguments.length > 0
          ? `(${a.arguments.map(printExpression).join(", ")})`
          : "";
      return `${indent}[${escapeQualifiedName(a.name)}${args}]\n`;
    })
    .join("");

const modifiersOf = (modifiers: readonly string[]): string =>
  modifiers.length > 0 ? `${modifiers.join(" ")} ` : "";

export const printMember = (member: CSharpMemberAst, indent: string): string => {
  switch (member.kind) {
    case "fieldDeclaration": {
      const docs = printDocs(member.docs, indent);
      const attrs = printAttributes(member.attributes, indent);
      const init = member.initializer ? ` = ${printExpression(member.initializer)}` : "";
      return `${docs}${attrs}${indent}${modifiersOf(member.modifiers)}${printType(member.type)} ${escapeIdentifier(member.name)}${init};`;
    }

    case "methodDeclaration": {
      const docs = printDocs(member.docs, indent);
      const attrs = printAttributes(member.attributes, indent);
      const typeParams =
        member.typeParameters && member.typeParameters.length > 0
          ? `<${member.typeParameters.join(", ")}>`
          : "";
      const params = member.parameters.map(printParameter).join(", ");
      const signature = `${docs}${attrs}${indent}${modifiersOf(member.modifiers)}${printType(member.returnType)} ${escapeIdentifier(member.name)}${typeParams}(${params})`;
      return member.body
        ? `${signature}\n${printBlockStatement(member.body, indent)}`
        : `${signature};`;
    }

    case "constructorDeclaration": {
      const attrs = printAttributes(member.attributes, indent);
      const params = member.parameters.map(printParameter).join(", ");
      return `${attrs}${indent}${modifiersOf(member.modifiers)}${escapeIdentifier(member.name)}(${params})\n${printBlockStatement(member.body, indent)}`;
    }

    case "destructorDeclaration":
      return `${indent}~${escapeIdentifier(member.name)}()\n${printBlockStatement(member.body, indent)}`;

    case "classDeclaration":
    case "structDeclaration":
    case "enumDeclaration":
      return printTypeDeclaration(member, indent);

    default: {
      const exhaustiveCheck: never = member;
      void exhaustiveCheck;
      throw new Error("ICE: Unhandled member AST kind in printMember");
    }
  }
};

export const printTypeDeclaration = (decl: CSharpTypeDeclarationAst, indent: string): string => {
  const docs = printDocs(decl.docs, indent);
  const attrs = printAttributes(decl.attributes, indent);
  const mods = modifiersOf(decl.modifiers);
  const innerIndent = indent + INDENT;

  switch (decl.kind) {
    case "classDeclaration":
    case "structDeclaration": {
      const keyword = decl.kind === "classDeclaration" ? "class" : "struct";
      const baseClause =
        decl.interfaces.length > 0 ? ` : ${decl.interfaces.map(printType).join(", ")}` : "";
      const members = decl.members.map((m) => printMember(m, innerIndent)).join("\n\n");
      const body = members.length > 0 ? `${members}\n` : "";
      return `${docs}${attrs}${indent}${mods}${keyword} ${escapeIdentifier(decl.name)}${baseClause}\n${indent}{\n${body}${indent}}`;
    }

    case "enumDeclaration": {
      const baseClause = decl.baseType ? ` : ${printType(decl.baseType)}` : "";
      const members = decl.members.map((m) => printEnumMember(m, innerIndent)).join(",\n");
      const body = members.length > 0 ? `${members}\n` : "";
      return `${docs}${attrs}${indent}${mods}enum ${escapeIdentifier(decl.name)}${baseClause}\n${indent}{\n${body}${indent}}`;
    }

    default: {
      const exhaustiveCheck: never = decl;
      void exhaustiveCheck;
      throw new Error("ICE: Unhandled type declaration AST kind in printTypeDeclaration");
    }
  }
};

const printEnumMember = (member: CSharpEnumMemberAst, indent: string): string => {
  const docs = printDocs(member.docs, indent);
  const name = escapeIdentifier(member.name);
  return member.value
    ? `${docs}${indent}${name} = ${printExpression(member.value)}`
    : `${docs}${indent}${name}`;
};

// ============================================================
// Compilation Unit Printer
// ============================================================

const printNamespaceDeclaration = (ns: CSharpNamespaceDeclarationAst): string => {
  const members = ns.members.map((m) => printTypeDeclaration(m, INDENT)).join("\n\n");
  return `namespace ${escapeQualifiedName(ns.name)}\n{\n${members}\n}`;
};

export const printCompilationUnit = (unit: CSharpCompilationUnitAst): string => {
  const header = unit.header.map((line) => `//${line.length > 0 ? ` ${line}` : ""}`).join("\n");
  const nullable = unit.nullableEnable ? "#nullable enable" : "";
  const usings = unit.usings
    .map((u) => `${u.isGlobal ? "global " : ""}using ${escapeIdentifier(u.alias)} = ${printType(u.type)};`)
    .join("\n");
  const members = unit.members
    .map((m) =>
      m.kind === "namespaceDeclaration" ? printNamespaceDeclaration(m) : printTypeDeclaration(m, "")
    )
    .join("\n\n");

  const parts = [header, nullable, usings, members].filter((p) => p.length > 0);
  return parts.join("\n\n") + "\n";
};
