/**
 * Attribute filter - decides per backend and feature set which IR items are
 * part of the generated surface.
 *
 * Pure functions over the resolved rule values carried by each item.
 */

import type {
  Diagnostic,
  DiagnosticSubject,
} from "../types/diagnostic.js";
import { errorDiagnostic } from "../types/diagnostic.js";
import type { Result } from "../types/result.js";
import { error, ok } from "../types/result.js";
import { isIdentifier } from "../ir/identifiers.js";
import type { TypeRegistry } from "../ir/registry.js";
import type {
  AttributeRule,
  BackendId,
  IrAttributes,
  IrMethod,
  TypeDef,
  TypeId,
} from "../ir/types.js";
import { isBackendId, methodsOf } from "../ir/types.js";

export type FilterContext = {
  readonly backend: BackendId;
  readonly features: readonly string[];
};

/**
 * An item left out of the surface. Never an error.
 */
export type Omission = {
  readonly subject: DiagnosticSubject;
  readonly reason: "disabled";
};

export type EnabledType = {
  readonly def: TypeDef;
  /** Enabled methods, in declaration order */
  readonly methods: readonly IrMethod[];
};

export type FilteredSurface = {
  readonly context: FilterContext;
  /** Enabled types, sorted by TypeId */
  readonly types: readonly EnabledType[];
  readonly omitted: readonly Omission[];
  /** AttributeResolutionError diagnostics */
  readonly diagnostics: readonly Diagnostic[];
  readonly isEnabled: (id: TypeId) => boolean;
};

const validateRule = (
  rule: AttributeRule,
  subject: DiagnosticSubject
): readonly Diagnostic[] => {
  const diagnostics: Diagnostic[] = [];

  if (rule.backend !== "*" && !isBackendId(rule.backend)) {
    diagnostics.push(
      errorDiagnostic(
        "FFG1004",
        `Attribute rule names unknown backend '${rule.backend}'`,
        subject
      )
    );
  }

  const seen = new Set<string>();
  for (const feature of rule.features) {
    if (feature.length === 0) {
      diagnostics.push(
        errorDiagnostic("FFG1004", "Attribute rule has an empty feature name", subject)
      );
    } else if (seen.has(feature)) {
      diagnostics.push(
        errorDiagnostic(
          "FFG1004",
          `Attribute rule lists feature '${feature}' twice`,
          subject
        )
      );
    }
    seen.add(feature);
  }

  return diagnostics;
};

/**
 * Check an item's attribute state for malformed rules and renames
 */
export const validateAttributes = (
  attributes: IrAttributes,
  subject: DiagnosticSubject
): readonly Diagnostic[] => {
  const diagnostics: Diagnostic[] = attributes.rules.flatMap((rule) =>
    validateRule(rule, subject)
  );

  const renamed = new Set<string>();
  for (const rename of attributes.renames) {
    if (!isBackendId(rename.backend)) {
      diagnostics.push(
        errorDiagnostic(
          "FFG1004",
          `Rename names unknown backend '${rename.backend}'`,
          subject
        )
      );
      continue;
    }
    if (renamed.has(rename.backend)) {
      diagnostics.push(
        errorDiagnostic(
          "FFG1004",
          `More than one rename for backend '${rename.backend}'`,
          subject
        )
      );
    }
    renamed.add(rename.backend);
    if (!isIdentifier(rename.name)) {
      diagnostics.push(
        errorDiagnostic(
          "FFG1004",
          `Rename '${rename.name}' is not a valid identifier`,
          subject
        )
      );
    }
  }

  return diagnostics;
};

const applies = (rule: AttributeRule, context: FilterContext): boolean =>
  (rule.backend === "*" || rule.backend === context.backend) &&
  rule.features.every((feature) => context.features.includes(feature));

const specificity = (rule: AttributeRule): readonly [number, number] => [
  rule.backend === "*" ? 0 : 1,
  rule.features.length,
];

const compareSpecificity = (a: AttributeRule, b: AttributeRule): number => {
  const [backendA, featuresA] = specificity(a);
  const [backendB, featuresB] = specificity(b);
  return backendA !== backendB ? backendA - backendB : featuresA - featuresB;
};

/**
 * Resolve whether an item is enabled. The most specific applicable rules
 * decide (backend-specific over wildcard, then more features over fewer);
 * with no applicable rule the item is enabled.
 */
export const resolveEnabled = (
  attributes: IrAttributes,
  context: FilterContext,
  subject: DiagnosticSubject
): Result<boolean, readonly Diagnostic[]> => {
  const malformed = validateAttributes(attributes, subject);
  if (malformed.length > 0) {
    return error(malformed);
  }

  const applicable = attributes.rules.filter((rule) => applies(rule, context));
  const top = applicable.reduce<readonly AttributeRule[]>((best, rule) => {
    const first = best[0];
    if (!first) return [rule];
    const order = compareSpecificity(rule, first);
    return order > 0 ? [rule] : order === 0 ? [...best, rule] : best;
  }, []);

  const outcomes = new Set(top.map((rule) => rule.outcome));
  if (outcomes.size > 1) {
    return error([
      errorDiagnostic(
        "FFG1004",
        `Contradictory attribute rules for backend '${context.backend}'`,
        subject,
        "Equally specific rules must agree on enabled/disabled"
      ),
    ]);
  }

  return ok(!outcomes.has("disabled"));
};

/**
 * Host-surface name override for the given backend, if any
 */
export const renameFor = (
  attributes: IrAttributes,
  backend: BackendId
): string | undefined =>
  attributes.renames.find((rename) => rename.backend === backend)?.name;

/**
 * Resolve the enabled surface of a registry. Disabled types and methods are
 * listed in `omitted`; malformed or contradictory attribute state is
 * reported per item and keeps the item out of the surface.
 */
export const filterRegistry = (
  registry: TypeRegistry,
  context: FilterContext
): FilteredSurface => {
  const types: EnabledType[] = [];
  const omitted: Omission[] = [];
  const diagnostics: Diagnostic[] = [];

  for (const def of registry.allTypes()) {
    const subject = { typeId: def.id };
    const enabled = resolveEnabled(def.attributes, context, subject);
    if (!enabled.ok) {
      diagnostics.push(...enabled.error);
      continue;
    }
    if (!enabled.value) {
      omitted.push({ subject, reason: "disabled" });
      continue;
    }

    const methods: IrMethod[] = [];
    for (const method of methodsOf(def)) {
      const methodSubject = { typeId: def.id, member: method.name };
      const methodEnabled = resolveEnabled(
        method.attributes,
        context,
        methodSubject
      );
      if (!methodEnabled.ok) {
        diagnostics.push(...methodEnabled.error);
      } else if (methodEnabled.value) {
        methods.push(method);
      } else {
        omitted.push({ subject: methodSubject, reason: "disabled" });
      }
    }

    types.push({ def, methods });
  }

  const enabledIds = new Set(types.map((type) => type.def.id));

  return {
    context,
    types,
    omitted,
    diagnostics,
    isEnabled: (id) => enabledIds.has(id),
  };
};
