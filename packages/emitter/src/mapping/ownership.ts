/**
 * Ownership/lifetime tracking: how each opaque handle crosses a call.
 *
 * - copy: no handle involved, the value is copied
 * - borrow: the host passes its pointer and keeps ownership
 * - transfer: the host wrapper gives up its pointer to the native side
 * - adopt: a returned owned pointer gets a new owning wrapper
 * - view: a returned borrowed pointer gets a non-owning wrapper that keeps
 *   its lifetime sources reachable
 */

import type {
  Diagnostic,
  DiagnosticSubject,
  IrMethod,
  IrTypeRef,
  Result,
  TypeDef,
} from "@ffigen/frontend";
import { error, errorDiagnostic, ok } from "@ffigen/frontend";

export type Crossing =
  | { readonly mode: "copy" }
  | { readonly mode: "borrow" }
  | { readonly mode: "transfer" }
  | { readonly mode: "adopt" }
  | { readonly mode: "view"; readonly sources: readonly string[] };

export type MethodOwnership = {
  readonly self?: Crossing;
  readonly params: readonly Crossing[];
  readonly returns: Crossing;
  /** Borrow sources of borrowed handles in the return ("self" or params) */
  readonly lifetimeSources: readonly string[];
};

const COPY: Crossing = { mode: "copy" };

/**
 * Outermost opaque reference within a type, looking through nullable and
 * fallible payloads (success first)
 */
const handleIn = (
  ref: IrTypeRef
): Extract<IrTypeRef, { kind: "opaque" }> | undefined => {
  switch (ref.kind) {
    case "opaque":
      return ref;
    case "nullable":
      return handleIn(ref.inner);
    case "fallible":
      return handleIn(ref.ok) ?? handleIn(ref.err);
    default:
      return undefined;
  }
};

const hasBorrowedHandle = (ref: IrTypeRef): boolean => {
  switch (ref.kind) {
    case "opaque":
      return ref.ownership === "borrowed";
    case "nullable":
      return hasBorrowedHandle(ref.inner);
    case "fallible":
      return hasBorrowedHandle(ref.ok) || hasBorrowedHandle(ref.err);
    default:
      return false;
  }
};

export const paramCrossing = (ref: IrTypeRef): Crossing => {
  const handle = handleIn(ref);
  if (!handle) return COPY;
  return handle.ownership === "owned" ? { mode: "transfer" } : { mode: "borrow" };
};

/**
 * Opaque `self` taken by value is consumed; struct `self` is a copy
 */
export const selfCrossing = (owner: TypeDef, method: IrMethod): Crossing | undefined => {
  if (!method.self) return undefined;
  if (owner.kind !== "opaque") return COPY;
  return method.self.passing === "value" ? { mode: "transfer" } : { mode: "borrow" };
};

const defaultSources = (owner: TypeDef, method: IrMethod): readonly string[] => {
  if (owner.kind === "opaque" && method.self?.passing === "reference") {
    return ["self"];
  }
  return method.params
    .filter((param) => {
      const handle = handleIn(param.type);
      return handle !== undefined && handle.ownership === "borrowed";
    })
    .map((param) => param.name);
};

const validateSource = (
  source: string,
  owner: TypeDef,
  method: IrMethod,
  subject: DiagnosticSubject
): readonly Diagnostic[] => {
  const reject = (reason: string): readonly Diagnostic[] => [
    errorDiagnostic(
      "FFG1003",
      `Borrowed return cannot borrow from '${source}': ${reason}`,
      subject,
      "Borrowed returns may only borrow from self or borrowed opaque parameters"
    ),
  ];

  if (source === "self") {
    if (owner.kind !== "opaque") return reject("struct self is a copy");
    if (method.self?.passing !== "reference") return reject("self is consumed by the call");
    return [];
  }

  const param = method.params.find((candidate) => candidate.name === source);
  const handle = param ? handleIn(param.type) : undefined;
  if (!handle) return reject("it is not an opaque handle");
  if (handle.ownership === "owned") return reject("it is transferred to the native side");
  return [];
};

/**
 * Decide every crossing of one method
 */
export const planOwnership = (
  owner: TypeDef,
  method: IrMethod,
  subject: DiagnosticSubject
): Result<MethodOwnership, readonly Diagnostic[]> => {
  const self = selfCrossing(owner, method);
  const params = method.params.map((param) => paramCrossing(param.type));

  const returned = handleIn(method.returns);
  if (!returned) {
    return ok({ ...(self ? { self } : {}), params, returns: COPY, lifetimeSources: [] });
  }

  if (!hasBorrowedHandle(method.returns)) {
    return ok({
      ...(self ? { self } : {}),
      params,
      returns: { mode: "adopt" },
      lifetimeSources: [],
    });
  }

  const sources = method.lifetimes ?? defaultSources(owner, method);
  const diagnostics = sources.flatMap((source) =>
    validateSource(source, owner, method, subject)
  );
  if (diagnostics.length > 0) {
    return error(diagnostics);
  }

  return ok({
    ...(self ? { self } : {}),
    params,
    returns:
      returned.ownership === "owned"
        ? { mode: "adopt" }
        : { mode: "view", sources },
    lifetimeSources: sources,
  });
};
