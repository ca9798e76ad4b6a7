/**
 * Diagnostic types for ffigen
 */

import type { TypeId } from "../ir/types.js";

export type DiagnosticSeverity = "error" | "warning" | "info";

export type DiagnosticCode =
  | "FFG1001" // Enabled item references a type disabled for this backend
  | "FFG1002" // Generated symbol or host name collision
  | "FFG1003" // IR variant or combinator not supported in this position
  | "FFG1004" // Malformed or contradictory resolved attribute state
  | "FFG1005" // Registry construction failed
  | "FFG1006" // TypeId not present in the registry
  | "FFG6001" // Internal generator error
  // IR document loading errors (FFG9001-FFG9012)
  | "FFG9001" // IR file not found
  | "FFG9002" // Failed to read IR file
  | "FFG9003" // Invalid JSON in IR file
  | "FFG9004" // IR document must be an object
  | "FFG9005" // Unsupported IR document version
  | "FFG9006" // Missing or invalid 'types' field
  | "FFG9007" // Invalid type definition
  | "FFG9008" // Invalid method definition
  | "FFG9009" // Invalid field or variant definition
  | "FFG9010" // Invalid type reference
  | "FFG9011" // Invalid attributes
  | "FFG9012"; // Invalid identifier

/**
 * Error kinds reported by a generation run. Every diagnostic code maps to
 * exactly one kind.
 */
export type ErrorKind =
  | "UnresolvedTypeReference"
  | "NamingConflict"
  | "UnsupportedType"
  | "AttributeResolutionError"
  | "LoweringError"
  | "UnknownTypeId"
  | "InternalError";

export const DIAGNOSTIC_KINDS: Readonly<Record<DiagnosticCode, ErrorKind>> = {
  FFG1001: "UnresolvedTypeReference",
  FFG1002: "NamingConflict",
  FFG1003: "UnsupportedType",
  FFG1004: "AttributeResolutionError",
  FFG1005: "LoweringError",
  FFG1006: "UnknownTypeId",
  FFG6001: "InternalError",
  FFG9001: "LoweringError",
  FFG9002: "LoweringError",
  FFG9003: "LoweringError",
  FFG9004: "LoweringError",
  FFG9005: "LoweringError",
  FFG9006: "LoweringError",
  FFG9007: "LoweringError",
  FFG9008: "LoweringError",
  FFG9009: "LoweringError",
  FFG9010: "LoweringError",
  FFG9011: "LoweringError",
  FFG9012: "LoweringError",
};

/**
 * The IR item a diagnostic is about
 */
export type DiagnosticSubject = {
  readonly typeId: TypeId;
  /** Method, field or variant name inside the type */
  readonly member?: string;
};

export type Diagnostic = {
  readonly code: DiagnosticCode;
  readonly kind: ErrorKind;
  readonly severity: DiagnosticSeverity;
  readonly message: string;
  readonly subject?: DiagnosticSubject;
  readonly hint?: string;
};

export const createDiagnostic = (
  code: DiagnosticCode,
  severity: DiagnosticSeverity,
  message: string,
  subject?: DiagnosticSubject,
  hint?: string
): Diagnostic => ({
  code,
  kind: DIAGNOSTIC_KINDS[code],
  severity,
  message,
  subject,
  hint,
});

/**
 * Shorthand for the common error-severity case
 */
export const errorDiagnostic = (
  code: DiagnosticCode,
  message: string,
  subject?: DiagnosticSubject,
  hint?: string
): Diagnostic => createDiagnostic(code, "error", message, subject, hint);

export const isError = (diagnostic: Diagnostic): boolean =>
  diagnostic.severity === "error";

export const formatSubject = (subject: DiagnosticSubject): string =>
  subject.member ? `${subject.typeId}.${subject.member}` : subject.typeId;

export const formatDiagnostic = (diagnostic: Diagnostic): string => {
  const parts: string[] = [];

  if (diagnostic.subject) {
    parts.push(`${formatSubject(diagnostic.subject)}:`);
  }

  parts.push(`${diagnostic.severity} ${diagnostic.code}:`);
  parts.push(diagnostic.message);

  if (diagnostic.hint) {
    parts.push(`Hint: ${diagnostic.hint}`);
  }

  return parts.join(" ");
};

const compareText = (a: string, b: string): number =>
  a < b ? -1 : a > b ? 1 : 0;

/**
 * Deterministic ordering: by subject type, member, code, then message.
 * Subject-less diagnostics sort first.
 */
export const compareDiagnostics = (a: Diagnostic, b: Diagnostic): number =>
  compareText(a.subject?.typeId ?? "", b.subject?.typeId ?? "") ||
  compareText(a.subject?.member ?? "", b.subject?.member ?? "") ||
  compareText(a.code, b.code) ||
  compareText(a.message, b.message);

export const sortDiagnostics = (
  diagnostics: readonly Diagnostic[]
): readonly Diagnostic[] => [...diagnostics].sort(compareDiagnostics);
