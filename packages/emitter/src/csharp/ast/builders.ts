/**
 * Builders for C# AST nodes
 */

import type {
  CSharpAttributeAst,
  CSharpBlockStatementAst,
  CSharpExpressionAst,
  CSharpStatementAst,
  CSharpTypeAst,
} from "./types.js";

// ============================================================
// Types
// ============================================================

export const predefinedType = (keyword: string): CSharpTypeAst => ({
  kind: "predefinedType",
  keyword,
});

export const identifierType = (
  name: string,
  typeArguments?: readonly CSharpTypeAst[]
): CSharpTypeAst =>
  typeArguments && typeArguments.length > 0
    ? { kind: "identifierType", name, typeArguments }
    : { kind: "identifierType", name };

export const nullableType = (underlyingType: CSharpTypeAst): CSharpTypeAst => ({
  kind: "nullableType",
  underlyingType,
});

export const arrayType = (elementType: CSharpTypeAst): CSharpTypeAst => ({
  kind: "arrayType",
  elementType,
});

export const varType = (): CSharpTypeAst => ({ kind: "varType" });

export const voidType = (): CSharpTypeAst => predefinedType("void");

// ============================================================
// Expressions
// ============================================================

export const literal = (text: string): CSharpExpressionAst => ({
  kind: "literalExpression",
  text,
});

export const intLiteral = (value: number): CSharpExpressionAst => literal(String(value));

export const boolLiteral = (value: boolean): CSharpExpressionAst => literal(value ? "true" : "false");

export const nullLiteral = (): CSharpExpressionAst => literal("null");

/**
 * Regular string literal with C# escapes
 */
export const stringLiteral = (value: string): CSharpExpressionAst =>
  literal(
    `"${value
      .replace(/\\/g, "\\\\")
      .replace(/"/g, '\\"')
      .replace(/\n/g, "\\n")
      .replace(/\r/g, "\\r")
      .replace(/\t/g, "\\t")}"`
  );

export const id = (identifier: string): CSharpExpressionAst => ({
  kind: "identifierExpression",
  identifier,
});

export const thisExpr = (): CSharpExpressionAst => id("this");

export const member = (expression: CSharpExpressionAst, memberName: string): CSharpExpressionAst => ({
  kind: "memberAccessExpression",
  expression,
  memberName,
});

/**
 * Member access over a dotted name, e.g. `Native.OpaqueStruct_destroy`
 */
export const path = (dotted: string): CSharpExpressionAst => {
  const [head, ...rest] = dotted.split(".");
  return rest.reduce((expression, name) => member(expression, name), id(head ?? dotted));
};

export const invoke = (
  expression: CSharpExpressionAst,
  args: readonly CSharpExpressionAst[] = [],
  typeArguments?: readonly CSharpTypeAst[]
): CSharpExpressionAst =>
  typeArguments && typeArguments.length > 0
    ? { kind: "invocationExpression", expression, arguments: args, typeArguments }
    : { kind: "invocationExpression", expression, arguments: args };

export const newObject = (
  type: CSharpTypeAst,
  args: readonly CSharpExpressionAst[] = [],
  initializer?: readonly CSharpExpressionAst[]
): CSharpExpressionAst =>
  initializer
    ? { kind: "objectCreationExpression", type, arguments: args, initializer }
    : { kind: "objectCreationExpression", type, arguments: args };

export const newArray = (
  elementType: CSharpTypeAst,
  initializer: readonly CSharpExpressionAst[]
): CSharpExpressionAst => ({ kind: "arrayCreationExpression", elementType, initializer });

export const assignment = (
  left: CSharpExpressionAst,
  right: CSharpExpressionAst
): CSharpExpressionAst => ({ kind: "assignmentExpression", operatorToken: "=", left, right });

export const binary = (
  left: CSharpExpressionAst,
  operatorToken: string,
  right: CSharpExpressionAst
): CSharpExpressionAst => ({ kind: "binaryExpression", operatorToken, left, right });

export const not = (operand: CSharpExpressionAst): CSharpExpressionAst => ({
  kind: "prefixUnaryExpression",
  operatorToken: "!",
  operand,
});

export const conditional = (
  condition: CSharpExpressionAst,
  whenTrue: CSharpExpressionAst,
  whenFalse: CSharpExpressionAst
): CSharpExpressionAst => ({ kind: "conditionalExpression", condition, whenTrue, whenFalse });

export const cast = (type: CSharpTypeAst, expression: CSharpExpressionAst): CSharpExpressionAst => ({
  kind: "castExpression",
  type,
  expression,
});

export const defaultOf = (type?: CSharpTypeAst): CSharpExpressionAst =>
  type ? { kind: "defaultExpression", type } : { kind: "defaultExpression" };

export const withModifier = (
  modifier: "ref" | "out" | "in",
  expression: CSharpExpressionAst
): CSharpExpressionAst => ({ kind: "argumentModifierExpression", modifier, expression });

// ============================================================
// Statements
// ============================================================

export const block = (statements: readonly CSharpStatementAst[]): CSharpBlockStatementAst => ({
  kind: "blockStatement",
  statements,
});

export const local = (
  name: string,
  type: CSharpTypeAst,
  initializer?: CSharpExpressionAst,
  modifiers: readonly string[] = []
): CSharpStatementAst => ({
  kind: "localDeclarationStatement",
  modifiers,
  type,
  declarators: [initializer ? { name, initializer } : { name }],
});

export const varLocal = (name: string, initializer: CSharpExpressionAst): CSharpStatementAst =>
  local(name, varType(), initializer);

export const expressionStatement = (expression: CSharpExpressionAst): CSharpStatementAst => ({
  kind: "expressionStatement",
  expression,
});

export const assign = (left: CSharpExpressionAst, right: CSharpExpressionAst): CSharpStatementAst =>
  expressionStatement(assignment(left, right));

export const returnStatement = (expression?: CSharpExpressionAst): CSharpStatementAst =>
  expression ? { kind: "returnStatement", expression } : { kind: "returnStatement" };

export const throwStatement = (expression: CSharpExpressionAst): CSharpStatementAst => ({
  kind: "throwStatement",
  expression,
});

export const ifStatement = (
  condition: CSharpExpressionAst,
  thenStatements: readonly CSharpStatementAst[],
  elseStatements?: readonly CSharpStatementAst[]
): CSharpStatementAst =>
  elseStatements
    ? {
        kind: "ifStatement",
        condition,
        thenStatement: block(thenStatements),
        elseStatement: block(elseStatements),
      }
    : { kind: "ifStatement", condition, thenStatement: block(thenStatements) };

export const tryFinally = (
  body: readonly CSharpStatementAst[],
  finallyBody: readonly CSharpStatementAst[]
): CSharpStatementAst => ({
  kind: "tryStatement",
  body: block(body),
  finallyBody: block(finallyBody),
});

// ============================================================
// Attributes
// ============================================================

export const attribute = (
  name: string,
  args: readonly CSharpExpressionAst[] = []
): CSharpAttributeAst => (args.length > 0 ? { name, arguments: args } : { name });
