/**
 * Type mapper - pairs every IR type reference with its host-surface type
 * and its native marshaling representation, enforcing where each variant
 * may appear.
 */

import type {
  Diagnostic,
  DiagnosticSubject,
  FilteredSurface,
  IrTypeRef,
  Result,
  TypeDef,
  TypeId,
  TypeRegistry,
} from "@ffigen/frontend";
import { describeTypeRef, error, errorDiagnostic, ok } from "@ffigen/frontend";
import type { AbiType } from "../abi/types.js";
import type { HostType } from "./host-types.js";

/**
 * Where a type reference occurs
 */
export type TypePosition =
  | "param"
  | "return"
  | "field"
  | "okPayload"
  | "errPayload";

export type MappedType = {
  readonly ref: IrTypeRef;
  readonly host: HostType;
  readonly abi: AbiType;
};

export type MapContext = {
  readonly registry: TypeRegistry;
  readonly surface: FilteredSurface;
  readonly subject: DiagnosticSubject;
};

type Mapped = Result<MappedType, readonly Diagnostic[]>;

const POSITION_LABELS: Readonly<Record<TypePosition, string>> = {
  param: "a parameter",
  return: "a return type",
  field: "a struct field",
  okPayload: "a fallible success payload",
  errPayload: "a fallible error payload",
};

const unsupported = (
  ref: IrTypeRef,
  position: TypePosition,
  context: MapContext,
  reason: string
): Mapped =>
  error([
    errorDiagnostic(
      "FFG1003",
      `${describeTypeRef(ref)} is not supported as ${POSITION_LABELS[position]}: ${reason}`,
      context.subject
    ),
  ]);

/**
 * Resolve a TypeId that must be part of the enabled surface
 */
const resolveEnabled = (
  id: TypeId,
  context: MapContext
): Result<TypeDef, readonly Diagnostic[]> => {
  const resolved = context.registry.resolve(id);
  if (!resolved.ok) {
    return error([resolved.error]);
  }
  if (!context.surface.isEnabled(id)) {
    return error([
      errorDiagnostic(
        "FFG1001",
        `Type '${id}' is not available for backend '${context.surface.context.backend}'`,
        context.subject,
        "Enable the referenced type for this backend or disable the referencing item"
      ),
    ]);
  }
  return ok(resolved.value);
};

const mapNullable = (
  ref: Extract<IrTypeRef, { kind: "nullable" }>,
  position: TypePosition,
  context: MapContext
): Mapped => {
  const inner = ref.inner;
  switch (inner.kind) {
    case "nullable":
    case "fallible":
    case "writeable":
    case "unit":
      return unsupported(ref, position, context, `nullable cannot wrap ${inner.kind}`);
    case "struct":
      if (inner.passing === "reference") {
        return unsupported(ref, position, context, "struct references cannot be nullable");
      }
      break;
    default:
      break;
  }

  const mapped = mapTypeRef(inner, position, context);
  if (!mapped.ok) {
    return mapped;
  }

  const host: HostType = { kind: "optional", inner: mapped.value.host };
  const abi = mapped.value.abi;
  switch (abi.kind) {
    case "pointer":
      return ok({ ref, host, abi: { ...abi, nullable: true } });
    case "slice":
      return ok({ ref, host, abi: { ...abi, nullable: true } });
    case "scalar":
    case "alias":
    case "enum":
    case "struct":
      return ok({ ref, host, abi: { kind: "option", inner: abi } });
    default:
      throw new Error(`ICE: nullable over ABI kind '${abi.kind}'`);
  }
};

const mapFallible = (
  ref: Extract<IrTypeRef, { kind: "fallible" }>,
  position: TypePosition,
  context: MapContext
): Mapped => {
  if (position !== "return") {
    return unsupported(
      ref,
      position,
      context,
      "fallible values are only returned, never nested"
    );
  }

  const okMapped = mapTypeRef(ref.ok, "okPayload", context);
  const errMapped = mapTypeRef(ref.err, "errPayload", context);
  if (!okMapped.ok || !errMapped.ok) {
    return error([
      ...(okMapped.ok ? [] : okMapped.error),
      ...(errMapped.ok ? [] : errMapped.error),
    ]);
  }

  const payload = (abi: AbiType): AbiType | undefined =>
    abi.kind === "void" || abi.kind === "write" ? undefined : abi;

  const okAbi = payload(okMapped.value.abi);
  const errAbi = payload(errMapped.value.abi);

  return ok({
    ref,
    host: {
      kind: "outcome",
      ok: okMapped.value.host,
      err: errMapped.value.host,
    },
    abi: {
      kind: "result",
      ...(okAbi ? { ok: okAbi } : {}),
      ...(errAbi ? { err: errAbi } : {}),
    },
  });
};

/**
 * Map one type reference in the given position
 */
export const mapTypeRef = (
  ref: IrTypeRef,
  position: TypePosition,
  context: MapContext
): Mapped => {
  switch (ref.kind) {
    case "primitive":
      return ok({
        ref,
        host: { kind: "number", primitive: ref.name },
        abi: { kind: "scalar", primitive: ref.name },
      });

    case "alias": {
      const def = resolveEnabled(ref.id, context);
      if (!def.ok) return def;
      if (def.value.kind !== "primitive") {
        throw new Error(`ICE: alias '${ref.id}' resolved to ${def.value.kind}`);
      }
      const primitive = def.value.primitive;
      return ok({
        ref,
        host: { kind: "alias", typeId: ref.id, primitive },
        abi: { kind: "alias", typeId: ref.id, name: def.value.name, primitive },
      });
    }

    case "enum": {
      const def = resolveEnabled(ref.id, context);
      if (!def.ok) return def;
      return ok({
        ref,
        host: { kind: "enumeration", typeId: ref.id },
        abi: { kind: "enum", typeId: ref.id, name: def.value.name },
      });
    }

    case "opaque": {
      const def = resolveEnabled(ref.id, context);
      if (!def.ok) return def;
      if (position === "field" && ref.ownership === "owned") {
        return unsupported(ref, position, context, "struct fields may only borrow handles");
      }
      return ok({
        ref,
        host: {
          kind: "handle",
          typeId: ref.id,
          ownership: ref.ownership,
          mutable: ref.mutable,
        },
        abi: {
          kind: "pointer",
          typeId: ref.id,
          name: def.value.name,
          // Owned handles are never const in C
          mutable: ref.mutable || ref.ownership === "owned",
          nullable: false,
        },
      });
    }

    case "struct": {
      if (ref.passing === "reference" && position !== "param") {
        return unsupported(ref, position, context, "struct references are only parameters");
      }
      const def = resolveEnabled(ref.id, context);
      if (!def.ok) return def;
      return ok({
        ref,
        host: {
          kind: "record",
          typeId: ref.id,
          byReference: ref.passing === "reference",
        },
        abi:
          ref.passing === "reference"
            ? { kind: "structPointer", typeId: ref.id, name: def.value.name }
            : { kind: "struct", typeId: ref.id, name: def.value.name },
      });
    }

    case "slice": {
      const element = ref.element;
      const abi: AbiType = {
        kind: "slice",
        element,
        mutable: ref.mutable,
        nullable: false,
      };
      switch (element.encoding) {
        case "primitive":
          if (element.primitive === "bool") {
            return unsupported(ref, position, context, "bool has no portable buffer representation");
          }
          return ok({
            ref,
            host: {
              kind: "buffer",
              primitive: element.primitive,
              mutable: ref.mutable,
            },
            abi,
          });
        case "utf8":
        case "utf16":
          return ok({
            ref,
            host: { kind: "text", encoding: element.encoding },
            abi,
          });
        case "strings":
          if (position !== "param") {
            return unsupported(ref, position, context, "string lists are only parameters");
          }
          return ok({
            ref,
            host: { kind: "textList", encoding: element.text },
            abi,
          });
        default: {
          const exhaustive: never = element;
          void exhaustive;
          throw new Error("ICE: Unhandled slice encoding in mapTypeRef");
        }
      }
    }

    case "writeable":
      if (position !== "return" && position !== "okPayload") {
        return unsupported(
          ref,
          position,
          context,
          "writeables are only returned, directly or as a fallible success"
        );
      }
      return ok({ ref, host: { kind: "sink" }, abi: { kind: "write" } });

    case "nullable":
      return mapNullable(ref, position, context);

    case "fallible":
      return mapFallible(ref, position, context);

    case "unit":
      if (position === "param" || position === "field") {
        return unsupported(ref, position, context, "unit carries no value");
      }
      return ok({ ref, host: { kind: "unit" }, abi: { kind: "void" } });

    default: {
      const exhaustive: never = ref;
      void exhaustive;
      throw new Error("ICE: Unhandled type reference kind in mapTypeRef");
    }
  }
};

/**
 * Find a chain of by-value struct fields leading from a struct back to
 * itself. Returns the TypeIds along the cycle, or undefined.
 */
export const findValueCycle = (
  registry: TypeRegistry,
  start: TypeId
): readonly TypeId[] | undefined => {
  const visit = (
    id: TypeId,
    path: readonly TypeId[]
  ): readonly TypeId[] | undefined => {
    const resolved = registry.resolve(id);
    if (!resolved.ok || resolved.value.kind !== "struct") {
      return undefined;
    }
    for (const field of resolved.value.fields) {
      const inner = field.type.kind === "nullable" ? field.type.inner : field.type;
      if (inner.kind !== "struct" || inner.passing !== "value") continue;
      if (inner.id === start) {
        return [...path, inner.id];
      }
      if (path.includes(inner.id)) continue;
      const found = visit(inner.id, [...path, inner.id]);
      if (found) return found;
    }
    return undefined;
  };

  return visit(start, [start]);
};
