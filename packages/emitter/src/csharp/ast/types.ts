/**
 * C# AST for binding units
 *
 * Structured nodes following Roslyn syntax node semantics with camelCase
 * TypeScript naming. Every construct the binding units use is an explicit
 * node; there are no raw text escapes.
 *
 * Pipeline: TypePlan -> CSharpAst -> deterministic printer -> C# text
 */

// ============================================================
// Type AST
// ============================================================

export type CSharpPredefinedTypeAst = {
  readonly kind: "predefinedType";
  /** C# keyword: "int", "byte", "nint", "void", "string", ... */
  readonly keyword: string;
};

export type CSharpIdentifierTypeAst = {
  readonly kind: "identifierType";
  /** Possibly qualified, e.g. "global::System.ReadOnlySpan" or "Point.Abi" */
  readonly name: string;
  readonly typeArguments?: readonly CSharpTypeAst[];
};

export type CSharpNullableTypeAst = {
  readonly kind: "nullableType";
  readonly underlyingType: CSharpTypeAst;
};

export type CSharpArrayTypeAst = {
  readonly kind: "arrayType";
  readonly elementType: CSharpTypeAst;
};

export type CSharpVarTypeAst = {
  readonly kind: "varType";
};

export type CSharpTypeAst =
  | CSharpPredefinedTypeAst
  | CSharpIdentifierTypeAst
  | CSharpNullableTypeAst
  | CSharpArrayTypeAst
  | CSharpVarTypeAst;

// ============================================================
// Expression AST
// ============================================================

export type CSharpLiteralExpressionAst = {
  readonly kind: "literalExpression";
  /** Source text of the literal, already escaped */
  readonly text: string;
};

export type CSharpIdentifierExpressionAst = {
  readonly kind: "identifierExpression";
  readonly identifier: string;
};

export type CSharpMemberAccessExpressionAst = {
  readonly kind: "memberAccessExpression";
  readonly expression: CSharpExpressionAst;
  readonly memberName: string;
};

export type CSharpInvocationExpressionAst = {
  readonly kind: "invocationExpression";
  readonly expression: CSharpExpressionAst;
  readonly arguments: readonly CSharpExpressionAst[];
  readonly typeArguments?: readonly CSharpTypeAst[];
};

export type CSharpObjectCreationExpressionAst = {
  readonly kind: "objectCreationExpression";
  readonly type: CSharpTypeAst;
  readonly arguments: readonly CSharpExpressionAst[];
  /** Member initializers, printed as `{ a, b }` */
  readonly initializer?: readonly CSharpExpressionAst[];
};

export type CSharpArrayCreationExpressionAst = {
  readonly kind: "arrayCreationExpression";
  readonly elementType: CSharpTypeAst;
  readonly initializer: readonly CSharpExpressionAst[];
};

export type CSharpAssignmentExpressionAst = {
  readonly kind: "assignmentExpression";
  readonly operatorToken: "=";
  readonly left: CSharpExpressionAst;
  readonly right: CSharpExpressionAst;
};

export type CSharpBinaryExpressionAst = {
  readonly kind: "binaryExpression";
  readonly operatorToken: string;
  readonly left: CSharpExpressionAst;
  readonly right: CSharpExpressionAst;
};

export type CSharpPrefixUnaryExpressionAst = {
  readonly kind: "prefixUnaryExpression";
  readonly operatorToken: string;
  readonly operand: CSharpExpressionAst;
};

export type CSharpConditionalExpressionAst = {
  readonly kind: "conditionalExpression";
  readonly condition: CSharpExpressionAst;
  readonly whenTrue: CSharpExpressionAst;
  readonly whenFalse: CSharpExpressionAst;
};

export type CSharpCastExpressionAst = {
  readonly kind: "castExpression";
  readonly type: CSharpTypeAst;
  readonly expression: CSharpExpressionAst;
};

export type CSharpDefaultExpressionAst = {
  readonly kind: "defaultExpression";
  readonly type?: CSharpTypeAst;
};

export type CSharpArgumentModifierExpressionAst = {
  readonly kind: "argumentModifierExpression";
  readonly modifier: "ref" | "out" | "in";
  readonly expression: CSharpExpressionAst;
};

export type CSharpExpressionAst =
  | CSharpLiteralExpressionAst
  | CSharpIdentifierExpressionAst
  | CSharpMemberAccessExpressionAst
  | CSharpInvocationExpressionAst
  | CSharpObjectCreationExpressionAst
  | CSharpArrayCreationExpressionAst
  | CSharpAssignmentExpressionAst
  | CSharpBinaryExpressionAst
  | CSharpPrefixUnaryExpressionAst
  | CSharpConditionalExpressionAst
  | CSharpCastExpressionAst
  | CSharpDefaultExpressionAst
  | CSharpArgumentModifierExpressionAst;

// ============================================================
// Statement AST
// ============================================================

export type CSharpBlockStatementAst = {
  readonly kind: "blockStatement";
  readonly statements: readonly CSharpStatementAst[];
};

export type CSharpVariableDeclaratorAst = {
  readonly name: string;
  readonly initializer?: CSharpExpressionAst;
};

export type CSharpLocalDeclarationStatementAst = {
  readonly kind: "localDeclarationStatement";
  /** "using" for using declarations */
  readonly modifiers: readonly string[];
  readonly type: CSharpTypeAst;
  readonly declarators: readonly CSharpVariableDeclaratorAst[];
};

export type CSharpExpressionStatementAst = {
  readonly kind: "expressionStatement";
  readonly expression: CSharpExpressionAst;
};

export type CSharpIfStatementAst = {
  readonly kind: "ifStatement";
  readonly condition: CSharpExpressionAst;
  readonly thenStatement: CSharpStatementAst;
  readonly elseStatement?: CSharpStatementAst;
};

export type CSharpTryStatementAst = {
  readonly kind: "tryStatement";
  readonly body: CSharpBlockStatementAst;
  readonly finallyBody: CSharpBlockStatementAst;
};

export type CSharpThrowStatementAst = {
  readonly kind: "throwStatement";
  readonly expression: CSharpExpressionAst;
};

export type CSharpReturnStatementAst = {
  readonly kind: "returnStatement";
  readonly expression?: CSharpExpressionAst;
};

export type CSharpStatementAst =
  | CSharpBlockStatementAst
  | CSharpLocalDeclarationStatementAst
  | CSharpExpressionStatementAst
  | CSharpIfStatementAst
  | CSharpTryStatementAst
  | CSharpThrowStatementAst
  | CSharpReturnStatementAst;

// ============================================================
// Declaration/Member AST
// ============================================================

export type CSharpAttributeAst = {
  readonly name: string;
  readonly arguments?: readonly CSharpExpressionAst[];
};

export type CSharpParameterAst = {
  readonly name: string;
  readonly type: CSharpTypeAst;
  /** "ref", "out", "in", "params" */
  readonly modifiers?: readonly string[];
};

export type CSharpFieldDeclarationAst = {
  readonly kind: "fieldDeclaration";
  readonly attributes: readonly CSharpAttributeAst[];
  readonly modifiers: readonly string[];
  readonly type: CSharpTypeAst;
  readonly name: string;
  readonly initializer?: CSharpExpressionAst;
  readonly docs?: string;
};

export type CSharpMethodDeclarationAst = {
  readonly kind: "methodDeclaration";
  readonly attributes: readonly CSharpAttributeAst[];
  readonly modifiers: readonly string[];
  readonly returnType: CSharpTypeAst;
  readonly name: string;
  readonly typeParameters?: readonly string[];
  readonly parameters: readonly CSharpParameterAst[];
  /** Absent for extern methods */
  readonly body?: CSharpBlockStatementAst;
  readonly docs?: string;
};

export type CSharpConstructorDeclarationAst = {
  readonly kind: "constructorDeclaration";
  readonly attributes: readonly CSharpAttributeAst[];
  readonly modifiers: readonly string[];
  readonly name: string;
  readonly parameters: readonly CSharpParameterAst[];
  readonly body: CSharpBlockStatementAst;
};

/** Finalizer: `~Name()` */
export type CSharpDestructorDeclarationAst = {
  readonly kind: "destructorDeclaration";
  readonly name: string;
  readonly body: CSharpBlockStatementAst;
};

export type CSharpMemberAst =
  | CSharpFieldDeclarationAst
  | CSharpMethodDeclarationAst
  | CSharpConstructorDeclarationAst
  | CSharpDestructorDeclarationAst
  | CSharpTypeDeclarationAst;

export type CSharpEnumMemberAst = {
  readonly name: string;
  readonly value?: CSharpExpressionAst;
  readonly docs?: string;
};

export type CSharpClassDeclarationAst = {
  readonly kind: "classDeclaration";
  readonly attributes: readonly CSharpAttributeAst[];
  readonly modifiers: readonly string[];
  readonly name: string;
  readonly interfaces: readonly CSharpTypeAst[];
  readonly members: readonly CSharpMemberAst[];
  readonly docs?: string;
};

export type CSharpStructDeclarationAst = {
  readonly kind: "structDeclaration";
  readonly attributes: readonly CSharpAttributeAst[];
  readonly modifiers: readonly string[];
  readonly name: string;
  readonly interfaces: readonly CSharpTypeAst[];
  readonly members: readonly CSharpMemberAst[];
  readonly docs?: string;
};

export type CSharpEnumDeclarationAst = {
  readonly kind: "enumDeclaration";
  readonly attributes: readonly CSharpAttributeAst[];
  readonly modifiers: readonly string[];
  readonly name: string;
  readonly baseType?: CSharpTypeAst;
  readonly members: readonly CSharpEnumMemberAst[];
  readonly docs?: string;
};

export type CSharpTypeDeclarationAst =
  | CSharpClassDeclarationAst
  | CSharpStructDeclarationAst
  | CSharpEnumDeclarationAst;

// ============================================================
// Top-level compilation unit
// ============================================================

/** `global using Alias = Target;` */
export type CSharpUsingAliasDirectiveAst = {
  readonly kind: "usingAliasDirective";
  readonly alias: string;
  readonly type: CSharpTypeAst;
  readonly isGlobal: boolean;
};

export type CSharpNamespaceDeclarationAst = {
  readonly kind: "namespaceDeclaration";
  readonly name: string;
  readonly members: readonly CSharpTypeDeclarationAst[];
};

export type CSharpCompilationUnitAst = {
  readonly kind: "compilationUnit";
  /** Leading `//` comment lines */
  readonly header: readonly string[];
  /** Emits `#nullable enable` after the header */
  readonly nullableEnable: boolean;
  readonly usings: readonly CSharpUsingAliasDirectiveAst[];
  readonly members: readonly (CSharpNamespaceDeclarationAst | CSharpTypeDeclarationAst)[];
};
