/**
 * Output emitter - runs one generation over a registry: filter, plan each
 * enabled type in isolation, check consistency across types, then emit the
 * host units, the native headers and the support files.
 */

import type {
  BackendId,
  Diagnostic,
  NamingPolicyConfig,
  Omission,
  TypeId,
  TypeRegistry,
} from "@ffigen/frontend";
import {
  errorDiagnostic,
  filterRegistry,
  isError,
  sortDiagnostics,
} from "@ffigen/frontend";
import type { AbiTargetName } from "./abi/target.js";
import { resolveTarget, supportedTargets } from "./abi/target.js";
import type { Artifact, EmitContext, HostBackend } from "./backend.js";
import { emitLibraryHeader, emitNativeType, NATIVE_DIRECTORY } from "./c/headers.js";
import { emitRuntimeHeader, RUNTIME_HEADER, SUPPORT_EXPORTS } from "./c/runtime-header.js";
import type { CSharpOptions } from "./csharp/backend.js";
import { createCSharpBackend } from "./csharp/backend.js";
import { createJsBackend } from "./js/backend.js";
import { buildLayoutTable } from "./plan/layouts.js";
import type { TypePlan } from "./plan/plan.js";
import { planType, typeHostName } from "./plan/plan.js";

export type GenerateOptions = {
  readonly backend: BackendId;
  readonly features?: readonly string[];
  /** ABI target override; defaults per backend */
  readonly target?: AbiTargetName;
  readonly naming?: NamingPolicyConfig;
  readonly csharp?: Partial<CSharpOptions>;
};

export type GenerationResult = {
  /** True when no error diagnostic was produced */
  readonly ok: boolean;
  /** Sorted by path */
  readonly artifacts: readonly Artifact[];
  readonly diagnostics: readonly Diagnostic[];
  readonly omitted: readonly Omission[];
  /** Enabled types whose artifacts were dropped, sorted */
  readonly failedTypes: readonly TypeId[];
};

const createBackend = (
  options: GenerateOptions,
  registry: TypeRegistry
): HostBackend => {
  switch (options.backend) {
    case "csharp":
      return createCSharpBackend(
        {
          namespace: options.csharp?.namespace ?? "Native",
          libraryName: options.csharp?.libraryName ?? registry.library,
        },
        options.naming
      );
    case "js":
      return createJsBackend(options.naming);
    default: {
      const exhaustive: never = options.backend;
      void exhaustive;
      throw new Error("ICE: Unhandled backend in createBackend");
    }
  }
};

const compareText = (a: string, b: string): number => (a < b ? -1 : a > b ? 1 : 0);

type Group = { readonly key: string; readonly typeIds: readonly TypeId[] };

const groupsOf = (
  entries: readonly { readonly key: string; readonly typeId: TypeId }[]
): readonly Group[] => {
  const byKey = new Map<string, TypeId[]>();
  for (const entry of entries) {
    byKey.set(entry.key, [...(byKey.get(entry.key) ?? []), entry.typeId]);
  }
  return [...byKey]
    .map(([key, typeIds]) => ({ key, typeIds: [...new Set(typeIds)].sort() }))
    .filter((group) => group.typeIds.length > 1);
};

/**
 * Collisions only visible across types: exported symbols, native names and
 * host type names. Every involved type is reported.
 */
const crossTypeConflicts = (
  plans: readonly TypePlan[],
  backend: HostBackend
): readonly Diagnostic[] => {
  const diagnostics: Diagnostic[] = [];
  const report = (typeIds: readonly TypeId[], message: string): void => {
    for (const typeId of typeIds) {
      diagnostics.push(errorDiagnostic("FFG1002", message, { typeId }));
    }
  };

  const symbols = plans.flatMap((plan) => [
    ...plan.methods.map((method) => ({ key: method.symbol, typeId: plan.def.id })),
    ...(plan.destructor ? [{ key: plan.destructor.symbol, typeId: plan.def.id }] : []),
  ]);
  for (const group of groupsOf(symbols)) {
    report(group.typeIds, `Symbol '${group.key}' is exported by types ${group.typeIds.join(", ")}`);
  }
  for (const entry of symbols) {
    if (SUPPORT_EXPORTS.includes(entry.key)) {
      report([entry.typeId], `Symbol '${entry.key}' collides with a runtime support export`);
    }
  }

  const nativeNames = plans.map((plan) => ({ key: plan.def.name, typeId: plan.def.id }));
  for (const group of groupsOf(nativeNames)) {
    report(group.typeIds, `Native name '${group.key}' is used by types ${group.typeIds.join(", ")}`);
  }

  const hostNames = plans.map((plan) => ({ key: plan.hostName, typeId: plan.def.id }));
  for (const group of groupsOf(hostNames)) {
    report(
      group.typeIds,
      `Host type name '${group.key}' is produced by types ${group.typeIds.join(", ")}`
    );
  }
  for (const entry of hostNames) {
    if (backend.naming.reservedTypeNames.includes(entry.key)) {
      report([entry.typeId], `Host type name '${entry.key}' is reserved by the ${backend.id} runtime`);
    }
  }

  return diagnostics;
};

const emitType = (
  plan: TypePlan,
  backend: HostBackend,
  context: EmitContext
): { readonly artifacts: readonly Artifact[]; readonly diagnostics: readonly Diagnostic[] } => {
  try {
    return {
      artifacts: [...backend.emitType(plan, context), ...emitNativeType(plan, context)],
      diagnostics: [],
    };
  } catch (cause) {
    return {
      artifacts: [],
      diagnostics: [
        errorDiagnostic(
          "FFG6001",
          cause instanceof Error ? cause.message : String(cause),
          { typeId: plan.def.id },
          "This is a generator bug; please report it with the IR document"
        ),
      ],
    };
  }
};

/**
 * Generate bindings for one backend. A pure function of the registry and
 * the options.
 */
export const generateBindings = (
  registry: TypeRegistry,
  options: GenerateOptions
): GenerationResult => {
  const target = resolveTarget(options.backend, options.target);
  if (!target) {
    return {
      ok: false,
      artifacts: [],
      diagnostics: [
        errorDiagnostic(
          "FFG1003",
          `ABI target '${options.target ?? ""}' is not supported by backend '${options.backend}'`,
          undefined,
          `Supported targets: ${supportedTargets(options.backend).join(", ")}`
        ),
      ],
      omitted: [],
      failedTypes: [],
    };
  }

  const surface = filterRegistry(registry, {
    backend: options.backend,
    features: options.features ?? [],
  });
  const backend = createBackend(options, registry);
  const layouts = buildLayoutTable(registry, surface, target);

  const diagnostics: Diagnostic[] = [...surface.diagnostics];
  const failed = new Set<TypeId>(
    surface.diagnostics.flatMap((d) => (d.subject ? [d.subject.typeId] : []))
  );

  const planned: TypePlan[] = [];
  for (const enabled of surface.types) {
    const result = planType(enabled, {
      registry,
      surface,
      layouts,
      naming: backend.naming,
    });
    if (result.ok) {
      planned.push(result.value);
    } else {
      diagnostics.push(...result.error);
      failed.add(enabled.def.id);
    }
  }

  const conflicts = crossTypeConflicts(planned, backend);
  diagnostics.push(...conflicts);
  for (const conflict of conflicts) {
    if (conflict.subject) failed.add(conflict.subject.typeId);
  }

  const hostNames = new Map(
    surface.types.map(({ def }) => [def.id, typeHostName(def, backend.naming)] as const)
  );
  const successful = planned.filter((plan) => !failed.has(plan.def.id));
  const context: EmitContext = {
    registry,
    library: registry.library,
    target,
    layout: layouts.context,
    plans: new Map(successful.map((plan) => [plan.def.id, plan] as const)),
    hostNames,
  };

  const artifacts: Artifact[] = [];
  const emitted: TypePlan[] = [];
  for (const plan of successful) {
    const result = emitType(plan, backend, context);
    if (result.diagnostics.length > 0) {
      diagnostics.push(...result.diagnostics);
      failed.add(plan.def.id);
    } else {
      artifacts.push(...result.artifacts);
      emitted.push(plan);
    }
  }

  const byPath = groupsOf(
    artifacts.flatMap((artifact) =>
      artifact.typeId !== undefined ? [{ key: artifact.path, typeId: artifact.typeId }] : []
    )
  );
  for (const group of byPath) {
    for (const typeId of group.typeIds) {
      diagnostics.push(
        errorDiagnostic("FFG1002", `Output path '${group.key}' is produced by more than one type`, {
          typeId,
        })
      );
      failed.add(typeId);
    }
  }

  const generated = emitted.filter((plan) => !failed.has(plan.def.id));
  artifacts.push(
    {
      path: `${NATIVE_DIRECTORY}/${RUNTIME_HEADER}`,
      contents: emitRuntimeHeader(target),
      role: "support",
    },
    {
      path: `${NATIVE_DIRECTORY}/${registry.library}_bindings.h`,
      contents: emitLibraryHeader(generated, registry.library),
      role: "support",
    },
    ...backend.emitSupport(generated, context)
  );

  const kept = artifacts
    .filter((artifact) => artifact.typeId === undefined || !failed.has(artifact.typeId))
    .sort((a, b) => compareText(a.path, b.path));
  const sorted = sortDiagnostics(diagnostics);

  return {
    ok: !sorted.some(isError),
    artifacts: kept,
    diagnostics: sorted,
    omitted: surface.omitted,
    failedTypes: [...failed].sort(),
  };
};
