/**
 * Contract between the output emitter and a host backend
 */

import type { BackendId, TypeId, TypeRegistry } from "@ffigen/frontend";
import type { LayoutContext } from "./abi/layout.js";
import type { AbiTarget } from "./abi/target.js";
import type { HostNaming } from "./plan/host-naming.js";
import type { TypePlan } from "./plan/plan.js";

export type ArtifactRole = "host" | "native" | "support";

/**
 * One generated file, relative to the output destination
 */
export type Artifact = {
  readonly path: string;
  readonly contents: string;
  readonly role: ArtifactRole;
  /** The TypeDef the file was generated for; absent for support files */
  readonly typeId?: TypeId;
};

export type EmitContext = {
  readonly registry: TypeRegistry;
  readonly library: string;
  readonly target: AbiTarget;
  readonly layout: LayoutContext;
  /** Successfully planned types */
  readonly plans: ReadonlyMap<TypeId, TypePlan>;
  /** Host name of every enabled type, planned or not */
  readonly hostNames: ReadonlyMap<TypeId, string>;
};

export type HostBackend = {
  readonly id: BackendId;
  readonly naming: HostNaming;
  readonly emitType: (plan: TypePlan, context: EmitContext) => readonly Artifact[];
  /** Files emitted once per run, over the successfully generated types */
  readonly emitSupport: (
    plans: readonly TypePlan[],
    context: EmitContext
  ) => readonly Artifact[];
};

export const hostNameOf = (context: EmitContext, typeId: TypeId): string => {
  const name = context.hostNames.get(typeId);
  if (name === undefined) {
    throw new Error(`ICE: No host name for type '${typeId}'`);
  }
  return name;
};

export const planOf = (context: EmitContext, typeId: TypeId): TypePlan => {
  const plan = context.plans.get(typeId);
  if (!plan) {
    throw new Error(`ICE: Type '${typeId}' was not planned`);
  }
  return plan;
};
