/**
 * Builders over the TypeScript node factory for the generated JavaScript
 * modules and their declaration files, plus the deterministic printer.
 */

import * as ts from "typescript";

const f = ts.factory;

export type MemberName = string | ts.PropertyName;

export type ParamSpec = {
  readonly name: string;
  readonly type?: ts.TypeNode;
};

// ============================================================
// Expressions
// ============================================================

export const id = (name: string): ts.Identifier => f.createIdentifier(name);

export const str = (text: string): ts.StringLiteral => f.createStringLiteral(text);

export const num = (value: number): ts.Expression =>
  value < 0
    ? f.createPrefixUnaryExpression(ts.SyntaxKind.MinusToken, f.createNumericLiteral(-value))
    : f.createNumericLiteral(value);

export const bigint = (value: number): ts.Expression => f.createBigIntLiteral(`${value}n`);

export const bool = (value: boolean): ts.Expression => (value ? f.createTrue() : f.createFalse());

export const nullLiteral = (): ts.Expression => f.createNull();

export const thisExpr = (): ts.Expression => f.createThis();

export const access = (target: ts.Expression, name: string): ts.Expression =>
  f.createPropertyAccessExpression(target, name);

export const privateAccess = (name: string): ts.Expression =>
  f.createPropertyAccessExpression(f.createThis(), f.createPrivateIdentifier(`#${name}`));

export const elementAccess = (target: ts.Expression, key: ts.Expression): ts.Expression =>
  f.createElementAccessExpression(target, key);

export const call = (callee: ts.Expression, args: readonly ts.Expression[] = []): ts.Expression =>
  f.createCallExpression(callee, undefined, args);

export const newExpr = (callee: ts.Expression, args: readonly ts.Expression[] = []): ts.Expression =>
  f.createNewExpression(callee, undefined, args);

export const spread = (expression: ts.Expression): ts.Expression => f.createSpreadElement(expression);

export const array = (elements: readonly ts.Expression[]): ts.Expression =>
  f.createArrayLiteralExpression(elements, false);

export const object = (
  properties: readonly { readonly name: string; readonly value: ts.Expression }[],
  multiLine = true
): ts.Expression =>
  f.createObjectLiteralExpression(
    properties.map((property) => f.createPropertyAssignment(property.name, property.value)),
    multiLine && properties.length > 0
  );

export const paren = (expression: ts.Expression): ts.Expression =>
  f.createParenthesizedExpression(expression);

export const binary = (
  left: ts.Expression,
  operator: ts.BinaryOperator,
  right: ts.Expression
): ts.Expression => f.createBinaryExpression(left, operator, right);

/**
 * `base + offset`, or `base` itself at offset zero
 */
export const offsetBy = (base: ts.Expression, offset: number): ts.Expression =>
  offset === 0 ? base : binary(base, ts.SyntaxKind.PlusToken, num(offset));

export const isNullish = (value: ts.Expression): ts.Expression =>
  binary(value, ts.SyntaxKind.EqualsEqualsToken, f.createNull());

export const strictEquals = (left: ts.Expression, right: ts.Expression): ts.Expression =>
  binary(left, ts.SyntaxKind.EqualsEqualsEqualsToken, right);

export const strictNotEquals = (left: ts.Expression, right: ts.Expression): ts.Expression =>
  binary(left, ts.SyntaxKind.ExclamationEqualsEqualsToken, right);

export const and = (left: ts.Expression, right: ts.Expression): ts.Expression =>
  binary(left, ts.SyntaxKind.AmpersandAmpersandToken, right);

export const not = (operand: ts.Expression): ts.Expression =>
  f.createPrefixUnaryExpression(ts.SyntaxKind.ExclamationToken, operand);

export const conditional = (
  condition: ts.Expression,
  whenTrue: ts.Expression,
  whenFalse: ts.Expression
): ts.Expression =>
  f.createConditionalExpression(
    condition,
    f.createToken(ts.SyntaxKind.QuestionToken),
    whenTrue,
    f.createToken(ts.SyntaxKind.ColonToken),
    whenFalse
  );

export const arrow = (params: readonly string[], body: ts.Expression): ts.Expression =>
  f.createArrowFunction(
    undefined,
    undefined,
    params.map((name) => parameter({ name })),
    undefined,
    f.createToken(ts.SyntaxKind.EqualsGreaterThanToken),
    body
  );

// ============================================================
// Statements
// ============================================================

export const block = (statements: readonly ts.Statement[]): ts.Block => f.createBlock(statements, true);

export const constStatement = (
  name: string,
  initializer: ts.Expression,
  exported = false
): ts.Statement =>
  f.createVariableStatement(
    exported ? [f.createModifier(ts.SyntaxKind.ExportKeyword)] : undefined,
    f.createVariableDeclarationList(
      [f.createVariableDeclaration(name, undefined, undefined, initializer)],
      ts.NodeFlags.Const
    )
  );

export const expressionStatement = (expression: ts.Expression): ts.Statement =>
  f.createExpressionStatement(expression);

export const assign = (target: ts.Expression, value: ts.Expression): ts.Statement =>
  expressionStatement(binary(target, ts.SyntaxKind.EqualsToken, value));

export const returnStatement = (expression?: ts.Expression): ts.Statement =>
  f.createReturnStatement(expression);

export const throwStatement = (expression: ts.Expression): ts.Statement =>
  f.createThrowStatement(expression);

export const ifStatement = (
  condition: ts.Expression,
  thenStatements: readonly ts.Statement[],
  elseStatements?: readonly ts.Statement[]
): ts.Statement =>
  f.createIfStatement(
    condition,
    block(thenStatements),
    elseStatements ? block(elseStatements) : undefined
  );

export const tryFinally = (
  body: readonly ts.Statement[],
  finalizer: readonly ts.Statement[]
): ts.Statement => f.createTryStatement(block(body), undefined, block(finalizer));

// ============================================================
// Declarations
// ============================================================

const modifiers = (
  kinds: readonly ts.ModifierSyntaxKind[]
): readonly ts.Modifier[] | undefined =>
  kinds.length > 0 ? kinds.map((kind) => f.createModifier(kind)) : undefined;

export const parameter = (spec: ParamSpec): ts.ParameterDeclaration =>
  f.createParameterDeclaration(undefined, undefined, spec.name, undefined, spec.type, undefined);

export const computedName = (expression: ts.Expression): ts.PropertyName =>
  f.createComputedPropertyName(expression);

export const privateField = (name: string): ts.ClassElement =>
  f.createPropertyDeclaration(undefined, f.createPrivateIdentifier(`#${name}`), undefined, undefined, undefined);

export const fieldDeclaration = (name: string, type: ts.TypeNode): ts.ClassElement =>
  f.createPropertyDeclaration(undefined, name, undefined, type, undefined);

export const constructorDeclaration = (
  params: readonly ParamSpec[],
  body: readonly ts.Statement[] | undefined,
  options: { readonly isPrivate?: boolean } = {}
): ts.ClassElement =>
  f.createConstructorDeclaration(
    modifiers(options.isPrivate ? [ts.SyntaxKind.PrivateKeyword] : []),
    params.map(parameter),
    body ? block(body) : undefined
  );

export const methodDeclaration = (
  name: MemberName,
  params: readonly ParamSpec[],
  body: readonly ts.Statement[] | undefined,
  options: { readonly isStatic?: boolean; readonly returnType?: ts.TypeNode } = {}
): ts.ClassElement =>
  f.createMethodDeclaration(
    modifiers(options.isStatic ? [ts.SyntaxKind.StaticKeyword] : []),
    undefined,
    name,
    undefined,
    undefined,
    params.map(parameter),
    options.returnType,
    body ? block(body) : undefined
  );

export const classDeclaration = (
  name: string,
  members: readonly ts.ClassElement[],
  options: { readonly declare?: boolean } = {}
): ts.Statement =>
  f.createClassDeclaration(
    modifiers(
      options.declare
        ? [ts.SyntaxKind.ExportKeyword, ts.SyntaxKind.DeclareKeyword]
        : [ts.SyntaxKind.ExportKeyword]
    ),
    name,
    undefined,
    undefined,
    members
  );

export const declareConst = (name: string, type: ts.TypeNode): ts.Statement =>
  f.createVariableStatement(
    modifiers([ts.SyntaxKind.ExportKeyword, ts.SyntaxKind.DeclareKeyword]),
    f.createVariableDeclarationList(
      [f.createVariableDeclaration(name, undefined, type, undefined)],
      ts.NodeFlags.Const
    )
  );

export const typeAlias = (name: string, type: ts.TypeNode): ts.Statement =>
  f.createTypeAliasDeclaration(modifiers([ts.SyntaxKind.ExportKeyword]), name, undefined, type);

export type ImportBinding = {
  readonly name: string;
  readonly alias?: string;
};

export const importNamed = (
  bindings: readonly ImportBinding[],
  from: string,
  typeOnly = false
): ts.Statement =>
  f.createImportDeclaration(
    undefined,
    f.createImportClause(
      typeOnly,
      undefined,
      f.createNamedImports(
        bindings.map((binding) =>
          binding.alias === undefined
            ? f.createImportSpecifier(false, undefined, id(binding.name))
            : f.createImportSpecifier(false, id(binding.name), id(binding.alias))
        )
      )
    ),
    str(from)
  );

export const importNamespace = (name: string, from: string): ts.Statement =>
  f.createImportDeclaration(
    undefined,
    f.createImportClause(false, undefined, f.createNamespaceImport(id(name))),
    str(from)
  );

export const exportFrom = (names: readonly string[], from: string, typeOnly = false): ts.Statement =>
  f.createExportDeclaration(
    undefined,
    typeOnly,
    f.createNamedExports(names.map((name) => f.createExportSpecifier(false, undefined, name))),
    str(from)
  );

export const emptyExport = (): ts.Statement =>
  f.createExportDeclaration(undefined, false, f.createNamedExports([]));

// ============================================================
// Types
// ============================================================

export type KeywordTypeName = "number" | "bigint" | "boolean" | "string" | "void";

const KEYWORD_TYPES: Readonly<Record<KeywordTypeName, ts.KeywordTypeSyntaxKind>> = {
  number: ts.SyntaxKind.NumberKeyword,
  bigint: ts.SyntaxKind.BigIntKeyword,
  boolean: ts.SyntaxKind.BooleanKeyword,
  string: ts.SyntaxKind.StringKeyword,
  void: ts.SyntaxKind.VoidKeyword,
};

export const keywordType = (name: KeywordTypeName): ts.TypeNode =>
  f.createKeywordTypeNode(KEYWORD_TYPES[name]);

export const typeRef = (name: string, args?: readonly ts.TypeNode[]): ts.TypeNode =>
  f.createTypeReferenceNode(name, args);

export const nullType = (): ts.TypeNode => f.createLiteralTypeNode(f.createNull());

export const unionType = (types: readonly ts.TypeNode[]): ts.TypeNode => f.createUnionTypeNode(types);

export const readonlyArrayType = (element: ts.TypeNode): ts.TypeNode =>
  f.createTypeOperatorNode(ts.SyntaxKind.ReadonlyKeyword, f.createArrayTypeNode(element));

export const numberLiteralType = (value: number): ts.TypeNode =>
  value < 0
    ? f.createLiteralTypeNode(
        f.createPrefixUnaryExpression(ts.SyntaxKind.MinusToken, f.createNumericLiteral(-value))
      )
    : f.createLiteralTypeNode(f.createNumericLiteral(value));

export type PropertySpec = {
  readonly name: string;
  readonly type: ts.TypeNode;
  readonly docs?: string;
};

/**
 * Object type of readonly properties, declared at nesting `depth`
 */
export const typeLiteral = (members: readonly PropertySpec[], depth = 0): ts.TypeNode =>
  f.createTypeLiteralNode(
    members.map((member) =>
      withDocs(
        f.createPropertySignature(
          modifiers([ts.SyntaxKind.ReadonlyKeyword]),
          member.name,
          undefined,
          member.type
        ),
        member.docs,
        depth + 1
      )
    )
  );

/**
 * `(typeof X)[keyof typeof X]`
 */
export const valuesOfType = (name: string): ts.TypeNode =>
  f.createIndexedAccessTypeNode(
    f.createTypeQueryNode(id(name)),
    f.createTypeOperatorNode(ts.SyntaxKind.KeyOfKeyword, f.createTypeQueryNode(id(name)))
  );

// ============================================================
// Comments & printing
// ============================================================

/**
 * Attach docs as a JSDoc block. `depth` is the nesting level of the node;
 * the printer does not re-indent comment continuation lines.
 */
export const withDocs = <T extends ts.Node>(node: T, docs: string | undefined, depth = 0): T => {
  if (docs === undefined) return node;
  const lines = docs.split("\n");
  const pad = "    ".repeat(depth);
  const text =
    lines.length === 1
      ? `* ${lines[0] ?? ""} `
      : `*\n${lines.map((line) => `${pad} *${line.length > 0 ? ` ${line}` : ""}`).join("\n")}\n${pad} `;
  return ts.addSyntheticLeadingComment(node, ts.SyntaxKind.MultiLineCommentTrivia, text, true);
};

const printer = ts.createPrinter({ newLine: ts.NewLineKind.LineFeed });

const scratchFile = ts.createSourceFile(
  "generated.mts",
  "",
  ts.ScriptTarget.ES2022,
  false,
  ts.ScriptKind.TS
);

export const printNode = (node: ts.Node): string =>
  printer.printNode(ts.EmitHint.Unspecified, node, scratchFile);

/**
 * Print a module: header comment lines, then top-level statements
 * separated by blank lines
 */
export const printModule = (
  header: readonly string[],
  statements: readonly ts.Statement[]
): string =>
  `${[header.map((line) => `// ${line}`).join("\n"), ...statements.map(printNode)].join("\n\n")}\n`;
