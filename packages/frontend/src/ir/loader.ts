/**
 * IR document loader - reads and validates the JSON form of an IR.
 *
 * Validation here is structural (shapes, tags, identifiers). Cross-type
 * checks such as dangling references belong to the registry.
 */

import * as fs from "fs";
import type { Diagnostic, DiagnosticCode } from "../types/diagnostic.js";
import { errorDiagnostic } from "../types/diagnostic.js";
import type { Result } from "../types/result.js";
import { collectResults, error, ok } from "../types/result.js";
import { isIdentifier } from "./identifiers.js";
import { createRegistry } from "./registry.js";
import type { TypeRegistry } from "./registry.js";
import type {
  AttributeRename,
  AttributeRule,
  IrAttributes,
  IrEnumVariant,
  IrField,
  IrMethod,
  IrParam,
  IrSelf,
  IrSliceElement,
  IrTypeRef,
  TypeDef,
} from "./types.js";
import { EMPTY_ATTRIBUTES, isPrimitiveName } from "./types.js";

export const IR_VERSION = 1;

export type IrDocument = {
  readonly version: number;
  readonly library: string;
  readonly types: readonly TypeDef[];
};

type Parsed<T> = Result<T, readonly Diagnostic[]>;

type JsonObject = { readonly [key: string]: unknown };

const isRecord = (value: unknown): value is JsonObject =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const fail = <T>(code: DiagnosticCode, message: string): Parsed<T> =>
  error([errorDiagnostic(code, message)]);

const describeJson = (value: unknown): string =>
  Array.isArray(value) ? "array" : value === null ? "null" : typeof value;

const errorsOf = (...results: readonly Parsed<unknown>[]): readonly Diagnostic[] =>
  results.flatMap((result) => (result.ok ? [] : result.error));

const parseIdentifier = (value: unknown, context: string): Parsed<string> => {
  if (typeof value !== "string") {
    return fail(
      "FFG9012",
      `${context}: expected an identifier, got ${describeJson(value)}`
    );
  }
  if (!isIdentifier(value)) {
    return fail("FFG9012", `${context}: '${value}' is not a valid identifier`);
  }
  return ok(value);
};

const parseDocs = (
  value: unknown,
  code: DiagnosticCode,
  context: string
): Parsed<string | undefined> =>
  value === undefined || typeof value === "string"
    ? ok(value)
    : fail(code, `${context}.docs: expected a string, got ${describeJson(value)}`);

const parseFlag = (
  value: unknown,
  code: DiagnosticCode,
  context: string
): Parsed<boolean> => {
  if (value === undefined) return ok(false);
  if (typeof value === "boolean") return ok(value);
  return fail(code, `${context}: expected a boolean, got ${describeJson(value)}`);
};

/**
 * Parse an optional array; absent means empty
 */
const parseList = <T>(
  value: unknown,
  code: DiagnosticCode,
  context: string,
  parseItem: (item: unknown, itemContext: string) => Parsed<T>
): Parsed<readonly T[]> => {
  if (value === undefined) {
    return ok([]);
  }
  if (!Array.isArray(value)) {
    return fail(code, `${context}: expected an array, got ${describeJson(value)}`);
  }
  const items: readonly unknown[] = value;
  return collectResults(
    items.map((item, index) => parseItem(item, `${context}[${index}]`))
  );
};

// ============================================================
// Attributes
// ============================================================

const parseFeature = (value: unknown, context: string): Parsed<string> =>
  typeof value === "string"
    ? ok(value)
    : fail("FFG9011", `${context}: feature must be a string`);

const parseRule = (value: unknown, context: string): Parsed<AttributeRule> => {
  if (!isRecord(value)) {
    return fail("FFG9011", `${context}: rule must be an object`);
  }
  const backend = value["backend"];
  const outcome = value["outcome"];
  const features = parseList(
    value["features"],
    "FFG9011",
    `${context}.features`,
    parseFeature
  );

  if (typeof backend !== "string") {
    return fail("FFG9011", `${context}: 'backend' must be a string`);
  }
  if (outcome !== "enabled" && outcome !== "disabled") {
    return fail(
      "FFG9011",
      `${context}: 'outcome' must be "enabled" or "disabled"`
    );
  }
  if (!features.ok) {
    return features;
  }
  return ok({ backend, features: features.value, outcome });
};

const parseRename = (
  value: unknown,
  context: string
): Parsed<AttributeRename> => {
  if (!isRecord(value)) {
    return fail("FFG9011", `${context}: rename must be an object`);
  }
  const backend = value["backend"];
  const name = value["name"];
  if (typeof backend !== "string" || typeof name !== "string") {
    return fail(
      "FFG9011",
      `${context}: rename needs string 'backend' and 'name'`
    );
  }
  return ok({ backend, name });
};

const parseAttributes = (
  value: unknown,
  context: string
): Parsed<IrAttributes> => {
  if (value === undefined) {
    return ok(EMPTY_ATTRIBUTES);
  }
  if (!isRecord(value)) {
    return fail("FFG9011", `${context}.attributes: must be an object`);
  }
  const rules = parseList(
    value["rules"],
    "FFG9011",
    `${context}.attributes.rules`,
    parseRule
  );
  const renames = parseList(
    value["renames"],
    "FFG9011",
    `${context}.attributes.renames`,
    parseRename
  );
  if (!rules.ok || !renames.ok) {
    return error(errorsOf(rules, renames));
  }
  return ok({ rules: rules.value, renames: renames.value });
};

// ============================================================
// Type references
// ============================================================

const parseSliceElement = (
  value: unknown,
  context: string
): Parsed<IrSliceElement> => {
  if (!isRecord(value)) {
    return fail("FFG9010", `${context}: slice element must be an object`);
  }
  const encoding = value["encoding"];
  switch (encoding) {
    case "primitive": {
      const primitive = value["primitive"];
      return typeof primitive === "string" && isPrimitiveName(primitive)
        ? ok({ encoding, primitive })
        : fail("FFG9010", `${context}: unknown primitive '${String(primitive)}'`);
    }
    case "utf8":
    case "utf16":
      return ok({ encoding });
    case "strings": {
      const text = value["text"];
      return text === "utf8" || text === "utf16"
        ? ok({ encoding, text })
        : fail("FFG9010", `${context}: strings 'text' must be "utf8" or "utf16"`);
    }
    default:
      return fail(
        "FFG9010",
        `${context}: unknown slice encoding '${String(encoding)}'`
      );
  }
};

const parseTypeId = (value: unknown, context: string): Parsed<string> =>
  typeof value === "string" && value.length > 0
    ? ok(value)
    : fail("FFG9010", `${context}: 'id' must be a non-empty string`);

export const parseTypeRef = (
  value: unknown,
  context: string
): Parsed<IrTypeRef> => {
  if (!isRecord(value)) {
    return fail(
      "FFG9010",
      `${context}: type reference must be an object, got ${describeJson(value)}`
    );
  }

  const kind = value["kind"];
  switch (kind) {
    case "primitive": {
      const name = value["name"];
      return typeof name === "string" && isPrimitiveName(name)
        ? ok({ kind, name })
        : fail("FFG9010", `${context}: unknown primitive '${String(name)}'`);
    }
    case "alias":
    case "enum": {
      const id = parseTypeId(value["id"], context);
      return id.ok ? ok({ kind, id: id.value }) : id;
    }
    case "opaque": {
      const id = parseTypeId(value["id"], context);
      const ownership = value["ownership"];
      const mutable = parseFlag(value["mutable"], "FFG9010", `${context}.mutable`);
      if (ownership !== "owned" && ownership !== "borrowed") {
        return fail(
          "FFG9010",
          `${context}: 'ownership' must be "owned" or "borrowed"`
        );
      }
      if (!id.ok || !mutable.ok) {
        return error(errorsOf(id, mutable));
      }
      return ok({ kind, id: id.value, ownership, mutable: mutable.value });
    }
    case "struct": {
      const id = parseTypeId(value["id"], context);
      const passing = value["passing"] ?? "value";
      if (passing !== "value" && passing !== "reference") {
        return fail(
          "FFG9010",
          `${context}: 'passing' must be "value" or "reference"`
        );
      }
      return id.ok ? ok({ kind, id: id.value, passing }) : id;
    }
    case "slice": {
      const element = parseSliceElement(value["element"], `${context}.element`);
      const mutable = parseFlag(value["mutable"], "FFG9010", `${context}.mutable`);
      if (!element.ok || !mutable.ok) {
        return error(errorsOf(element, mutable));
      }
      return ok({ kind, element: element.value, mutable: mutable.value });
    }
    case "writeable":
    case "unit":
      return ok({ kind });
    case "nullable": {
      const inner = parseTypeRef(value["inner"], `${context}.inner`);
      return inner.ok ? ok({ kind, inner: inner.value }) : inner;
    }
    case "fallible": {
      const okRef = parseTypeRef(value["ok"], `${context}.ok`);
      const errRef = parseTypeRef(value["err"], `${context}.err`);
      if (!okRef.ok || !errRef.ok) {
        return error(errorsOf(okRef, errRef));
      }
      return ok({ kind, ok: okRef.value, err: errRef.value });
    }
    default:
      return fail(
        "FFG9010",
        `${context}: unknown type reference kind '${String(kind)}'`
      );
  }
};

// ============================================================
// Members
// ============================================================

const parseSelf = (
  value: unknown,
  context: string
): Parsed<IrSelf | undefined> => {
  if (value === undefined) {
    return ok(undefined);
  }
  if (!isRecord(value)) {
    return fail("FFG9008", `${context}.self: must be an object`);
  }
  const passing = value["passing"] ?? "reference";
  if (passing !== "value" && passing !== "reference") {
    return fail(
      "FFG9008",
      `${context}.self: 'passing' must be "value" or "reference"`
    );
  }
  const mutable = parseFlag(value["mutable"], "FFG9008", `${context}.self.mutable`);
  return mutable.ok ? ok({ passing, mutable: mutable.value }) : mutable;
};

const parseParam = (value: unknown, context: string): Parsed<IrParam> => {
  if (!isRecord(value)) {
    return fail("FFG9008", `${context}: parameter must be an object`);
  }
  const name = parseIdentifier(value["name"], `${context}.name`);
  const type = parseTypeRef(value["type"], `${context}.type`);
  if (!name.ok || !type.ok) {
    return error(errorsOf(name, type));
  }
  return ok({ name: name.value, type: type.value });
};

const parseLifetimes = (
  value: unknown,
  context: string
): Parsed<readonly string[] | undefined> =>
  value === undefined
    ? ok(undefined)
    : parseList(value, "FFG9008", `${context}.lifetimes`, (item, itemContext) =>
        typeof item === "string"
          ? ok(item)
          : fail<string>("FFG9008", `${itemContext}: must be a string`)
      );

const parseMethod = (value: unknown, context: string): Parsed<IrMethod> => {
  if (!isRecord(value)) {
    return fail("FFG9008", `${context}: method must be an object`);
  }

  const name = parseIdentifier(value["name"], `${context}.name`);
  const docs = parseDocs(value["docs"], "FFG9008", context);
  const self = parseSelf(value["self"], context);
  const params = parseList(value["params"], "FFG9008", `${context}.params`, parseParam);
  const returns =
    value["returns"] === undefined
      ? ok<IrTypeRef, readonly Diagnostic[]>({ kind: "unit" })
      : parseTypeRef(value["returns"], `${context}.returns`);
  const lifetimes = parseLifetimes(value["lifetimes"], context);
  const attributes = parseAttributes(value["attributes"], context);

  if (
    !name.ok ||
    !docs.ok ||
    !self.ok ||
    !params.ok ||
    !returns.ok ||
    !lifetimes.ok ||
    !attributes.ok
  ) {
    return error(
      errorsOf(name, docs, self, params, returns, lifetimes, attributes)
    );
  }

  return ok({
    name: name.value,
    ...(docs.value !== undefined ? { docs: docs.value } : {}),
    ...(self.value !== undefined ? { self: self.value } : {}),
    params: params.value,
    returns: returns.value,
    ...(lifetimes.value !== undefined ? { lifetimes: lifetimes.value } : {}),
    attributes: attributes.value,
  });
};

const parseField = (value: unknown, context: string): Parsed<IrField> => {
  if (!isRecord(value)) {
    return fail("FFG9009", `${context}: field must be an object`);
  }
  const name = parseIdentifier(value["name"], `${context}.name`);
  const docs = parseDocs(value["docs"], "FFG9009", context);
  const type = parseTypeRef(value["type"], `${context}.type`);
  if (!name.ok || !docs.ok || !type.ok) {
    return error(errorsOf(name, docs, type));
  }
  return ok({
    name: name.value,
    ...(docs.value !== undefined ? { docs: docs.value } : {}),
    type: type.value,
  });
};

const parseVariant = (
  value: unknown,
  context: string
): Parsed<IrEnumVariant> => {
  if (!isRecord(value)) {
    return fail("FFG9009", `${context}: variant must be an object`);
  }
  const name = parseIdentifier(value["name"], `${context}.name`);
  const docs = parseDocs(value["docs"], "FFG9009", context);
  const discriminant = value["value"];
  if (typeof discriminant !== "number" || !Number.isInteger(discriminant)) {
    return fail("FFG9009", `${context}: 'value' must be an integer`);
  }
  if (!name.ok || !docs.ok) {
    return error(errorsOf(name, docs));
  }
  return ok({
    name: name.value,
    ...(docs.value !== undefined ? { docs: docs.value } : {}),
    value: discriminant,
  });
};

// ============================================================
// Type definitions
// ============================================================

const parseTypeDef = (value: unknown, context: string): Parsed<TypeDef> => {
  if (!isRecord(value)) {
    return fail("FFG9007", `${context}: type definition must be an object`);
  }

  const id = value["id"];
  if (typeof id !== "string" || id.length === 0) {
    return fail("FFG9007", `${context}: 'id' must be a non-empty string`);
  }
  const where = `${context} (${id})`;
  const name = parseIdentifier(value["name"] ?? id, `${where}.name`);
  const docs = parseDocs(value["docs"], "FFG9007", where);
  const attributes = parseAttributes(value["attributes"], where);
  if (!name.ok || !docs.ok || !attributes.ok) {
    return error(errorsOf(name, docs, attributes));
  }

  const base = {
    id,
    name: name.value,
    ...(docs.value !== undefined ? { docs: docs.value } : {}),
    attributes: attributes.value,
  };

  const kind = value["kind"];
  switch (kind) {
    case "opaque": {
      const methods = parseList(value["methods"], "FFG9008", `${where}.methods`, parseMethod);
      return methods.ok ? ok({ ...base, kind, methods: methods.value }) : methods;
    }
    case "struct": {
      const fields = parseList(value["fields"], "FFG9009", `${where}.fields`, parseField);
      const methods = parseList(value["methods"], "FFG9008", `${where}.methods`, parseMethod);
      if (!fields.ok || !methods.ok) {
        return error(errorsOf(fields, methods));
      }
      return ok({ ...base, kind, fields: fields.value, methods: methods.value });
    }
    case "enum": {
      const variants = parseList(value["variants"], "FFG9009", `${where}.variants`, parseVariant);
      return variants.ok ? ok({ ...base, kind, variants: variants.value }) : variants;
    }
    case "primitive": {
      const primitive = value["primitive"];
      return typeof primitive === "string" && isPrimitiveName(primitive)
        ? ok({ ...base, kind, primitive })
        : fail("FFG9007", `${where}: unknown primitive '${String(primitive)}'`);
    }
    default:
      return fail("FFG9007", `${where}: unknown type kind '${String(kind)}'`);
  }
};

/**
 * Validate parsed JSON as an IR document. Every malformed item is reported.
 */
export const parseIrDocument = (
  data: unknown,
  source = "IR document"
): Parsed<IrDocument> => {
  if (!isRecord(data)) {
    return fail(
      "FFG9004",
      `${source} must be an object, got ${describeJson(data)}`
    );
  }

  const version = data["version"];
  if (version !== IR_VERSION) {
    return fail(
      "FFG9005",
      `Unsupported IR version '${String(version)}' in ${source} (expected ${IR_VERSION})`
    );
  }

  const library = parseIdentifier(data["library"] ?? "native", `${source}.library`);

  if (!Array.isArray(data["types"])) {
    return fail("FFG9006", `Missing or invalid 'types' field in ${source}`);
  }
  const types = parseList(data["types"], "FFG9006", "types", parseTypeDef);

  if (!library.ok || !types.ok) {
    return error(errorsOf(library, types));
  }

  return ok({ version, library: library.value, types: types.value });
};

/**
 * Read and validate an IR JSON file
 */
export const loadIrFile = (filePath: string): Parsed<IrDocument> => {
  if (!fs.existsSync(filePath)) {
    return fail("FFG9001", `IR file not found: ${filePath}`);
  }

  let content: string;
  try {
    content = fs.readFileSync(filePath, "utf-8");
  } catch (err) {
    return fail("FFG9002", `Failed to read IR file: ${String(err)}`);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (err) {
    return fail("FFG9003", `Invalid JSON in IR file: ${String(err)}`);
  }

  return parseIrDocument(parsed, filePath);
};

/**
 * Load an IR file and build its registry
 */
export const loadRegistry = (
  filePath: string
): Result<TypeRegistry, readonly Diagnostic[]> => {
  const document = loadIrFile(filePath);
  if (!document.ok) {
    return document;
  }
  return createRegistry(document.value.types, document.value.library);
};
