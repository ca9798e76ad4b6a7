/**
 * Type planning - runs the mapper, the formatter and the ownership tracker
 * over one enabled TypeDef and fixes every name, type, crossing and
 * signature the emitters need.
 */

import type {
  Diagnostic,
  DiagnosticSubject,
  EnabledType,
  FilteredSurface,
  IrEnumVariant,
  IrField,
  IrMethod,
  IrParam,
  IrSelf,
  Result,
  TypeDef,
  TypeId,
  TypeRegistry,
} from "@ffigen/frontend";
import {
  error,
  errorDiagnostic,
  methodTypeRefs,
  namedRefsOf,
  ok,
  renameFor,
} from "@ffigen/frontend";
import type { StructLayout } from "../abi/layout.js";
import { structLayoutOf } from "../abi/layout.js";
import type { AbiType } from "../abi/types.js";
import type { MapContext, MappedType } from "../mapping/mapper.js";
import { mapTypeRef } from "../mapping/mapper.js";
import type { Crossing } from "../mapping/ownership.js";
import { planOwnership } from "../mapping/ownership.js";
import type { HostNaming } from "./host-naming.js";
import { hostNameFor } from "./host-naming.js";
import type { LayoutTable } from "./layouts.js";
import { valueStructsIn } from "./layouts.js";
import type { CollisionItem } from "./naming-collisions.js";
import { collisionDiagnostics } from "./naming-collisions.js";
import type { AbiSignature, ReturnConvention } from "./symbols.js";
import {
  checkNativeNames,
  destructorSignature,
  formatSignature,
  returnConvention,
  selfAbi,
  symbolName,
} from "./symbols.js";

export type PlanContext = {
  readonly registry: TypeRegistry;
  readonly surface: FilteredSurface;
  readonly layouts: LayoutTable;
  readonly naming: HostNaming;
};

export type SelfPlan = {
  readonly self: IrSelf;
  readonly abi: AbiType;
  readonly crossing: Crossing;
};

export type ParamPlan = {
  readonly param: IrParam;
  readonly hostName: string;
  readonly mapped: MappedType;
  readonly crossing: Crossing;
};

export type ReturnPlan = {
  readonly mapped: MappedType;
  readonly crossing: Crossing;
  readonly convention: ReturnConvention;
};

export type MethodPlan = {
  readonly method: IrMethod;
  readonly symbol: string;
  readonly hostName: string;
  readonly self?: SelfPlan;
  readonly params: readonly ParamPlan[];
  readonly returns: ReturnPlan;
  /** Borrow sources kept alive by views in the return */
  readonly lifetimeSources: readonly string[];
  readonly signature: AbiSignature;
};

export type FieldPlan = {
  readonly field: IrField;
  readonly hostName: string;
  readonly mapped: MappedType;
  readonly offset: number;
};

export type VariantPlan = {
  readonly variant: IrEnumVariant;
  readonly hostName: string;
};

export type TypePlan = {
  readonly def: TypeDef;
  readonly hostName: string;
  readonly methods: readonly MethodPlan[];
  readonly fields: readonly FieldPlan[];
  readonly variants: readonly VariantPlan[];
  /** Present for structs */
  readonly layout?: StructLayout;
  /** Present for opaque types */
  readonly destructor?: AbiSignature;
  /** Other TypeIds the generated unit refers to, sorted */
  readonly dependencies: readonly TypeId[];
};

export const typeHostName = (def: TypeDef, naming: HostNaming): string =>
  renameFor(def.attributes, naming.backend) ??
  hostNameFor(naming, "types", def.name);

const methodHostName = (method: IrMethod, naming: HostNaming): string =>
  renameFor(method.attributes, naming.backend) ??
  hostNameFor(naming, "methods", method.name);

const requireLayouts = (
  abis: readonly AbiType[],
  layouts: LayoutTable,
  subject: DiagnosticSubject
): readonly Diagnostic[] => {
  const missing = [
    ...new Set(abis.flatMap(valueStructsIn).filter((id) => !layouts.fields.has(id))),
  ];
  return missing.map((id) =>
    errorDiagnostic(
      "FFG1003",
      `Struct '${id}' cannot be passed by value: its layout is unavailable`,
      subject
    )
  );
};

const planMethod = (
  def: TypeDef,
  method: IrMethod,
  context: PlanContext
): Result<MethodPlan, readonly Diagnostic[]> => {
  const subject = { typeId: def.id, member: method.name };
  const mapContext: MapContext = {
    registry: context.registry,
    surface: context.surface,
    subject,
  };
  const diagnostics: Diagnostic[] = [];

  if (def.kind === "struct" && method.self?.mutable) {
    diagnostics.push(
      errorDiagnostic(
        "FFG1003",
        `Mutable self is not supported on struct '${def.id}': struct receivers are copies`,
        subject
      )
    );
  }

  const params: MappedType[] = [];
  for (const param of method.params) {
    const mapped = mapTypeRef(param.type, "param", mapContext);
    if (mapped.ok) {
      params.push(mapped.value);
    } else {
      diagnostics.push(...mapped.error);
    }
  }

  const returns = mapTypeRef(method.returns, "return", mapContext);
  if (!returns.ok) {
    diagnostics.push(...returns.error);
  }

  const ownership = planOwnership(def, method, subject);
  if (!ownership.ok) {
    diagnostics.push(...ownership.error);
  }

  if (diagnostics.length > 0 || !returns.ok || !ownership.ok) {
    return error(diagnostics);
  }

  const self = method.self ? selfAbi(def, method.self) : undefined;
  const layoutProblems = requireLayouts(
    [
      ...(self ? [self] : []),
      ...params.map((param) => param.abi),
      returns.value.abi,
    ],
    context.layouts,
    subject
  );
  if (layoutProblems.length > 0) {
    return error(layoutProblems);
  }

  const paramPlans = method.params.map((param, index): ParamPlan => {
    const mapped = params[index];
    const crossing = ownership.value.params[index];
    if (!mapped || !crossing) {
      throw new Error(`ICE: Parameter '${param.name}' lost during planning`);
    }
    return {
      param,
      hostName: context.naming.escapeParameter(
        hostNameFor(context.naming, "parameters", param.name)
      ),
      mapped,
      crossing,
    };
  });

  const symbol = symbolName(def, method);
  const selfCrossing = ownership.value.self;

  return ok({
    method,
    symbol,
    hostName: methodHostName(method, context.naming),
    ...(method.self && self && selfCrossing
      ? { self: { self: method.self, abi: self, crossing: selfCrossing } }
      : {}),
    params: paramPlans,
    returns: {
      mapped: returns.value,
      crossing: ownership.value.returns,
      convention: returnConvention(returns.value, context.layouts.context),
    },
    lifetimeSources: ownership.value.lifetimeSources,
    signature: formatSignature(
      symbol,
      self,
      paramPlans.map((param) => ({ name: param.param.name, abi: param.mapped.abi })),
      returns.value,
      context.layouts.context
    ),
  });
};

const memberCollisions = (
  plan: Omit<TypePlan, "dependencies">,
  naming: HostNaming
): readonly Diagnostic[] => {
  const subject = { typeId: plan.def.id };
  const reserved: CollisionItem[] = naming
    .reservedMembers(plan.hostName, plan.def.kind)
    .map((name) => ({ original: name, host: name, kind: "generated" }));

  const members: CollisionItem[] = [
    ...reserved,
    ...plan.methods.map((m) => ({
      original: m.method.name,
      host: m.hostName,
      kind: "method",
    })),
    ...plan.fields.map((f) => ({
      original: f.field.name,
      host: f.hostName,
      kind: "field",
    })),
    ...plan.variants.map((v) => ({
      original: v.variant.name,
      host: v.hostName,
      kind: "variant",
    })),
  ];

  const diagnostics: Diagnostic[] = [
    ...collisionDiagnostics(members, `type ${plan.hostName} members`, subject),
  ];

  for (const method of plan.methods) {
    const methodSubject = { typeId: plan.def.id, member: method.method.name };
    diagnostics.push(
      ...collisionDiagnostics(
        method.params.map((p) => ({
          original: p.param.name,
          host: p.hostName,
          kind: "parameter",
        })),
        `method ${method.hostName} parameters`,
        methodSubject
      )
    );

    const prefix = naming.reservedParameterPrefix;
    if (prefix === undefined) continue;
    for (const param of method.params) {
      if (param.hostName.startsWith(prefix)) {
        diagnostics.push(
          errorDiagnostic(
            "FFG1002",
            `Parameter '${param.param.name}' maps to '${param.hostName}', which uses the reserved prefix '${prefix}'`,
            methodSubject
          )
        );
      }
    }
  }

  return diagnostics;
};

const dependenciesOf = (
  def: TypeDef,
  methods: readonly IrMethod[]
): readonly TypeId[] => {
  const refs = [
    ...(def.kind === "struct" ? def.fields.map((field) => field.type) : []),
    ...methods.flatMap(methodTypeRefs),
  ];
  const ids = new Set(
    refs
      .flatMap(namedRefsOf)
      .map((ref) => ref.id)
      .filter((id) => id !== def.id)
  );
  return [...ids].sort();
};

/**
 * Plan one enabled type. Any error fails the whole type.
 */
export const planType = (
  enabled: EnabledType,
  context: PlanContext
): Result<TypePlan, readonly Diagnostic[]> => {
  const { def, methods } = enabled;
  const diagnostics: Diagnostic[] = [...checkNativeNames(def, methods)];
  const hostName = typeHostName(def, context.naming);

  let fields: readonly FieldPlan[] = [];
  let layout: StructLayout | undefined;
  if (def.kind === "struct") {
    const mapped = context.layouts.fields.get(def.id);
    if (mapped) {
      layout = structLayoutOf(def.id, context.layouts.context);
      const offsets = layout.offsets;
      fields = def.fields.map((field, index): FieldPlan => {
        const fieldType = mapped[index];
        const offset = offsets[index];
        if (!fieldType || offset === undefined) {
          throw new Error(`ICE: Field '${field.name}' lost during layout`);
        }
        return {
          field,
          hostName: hostNameFor(context.naming, "fields", field.name),
          mapped: fieldType,
          offset,
        };
      });
    } else {
      diagnostics.push(...(context.layouts.failures.get(def.id) ?? []));
    }
  }

  const variants: readonly VariantPlan[] =
    def.kind === "enum"
      ? def.variants.map((variant) => ({
          variant,
          hostName: hostNameFor(context.naming, "enumMembers", variant.name),
        }))
      : [];

  const methodPlans: MethodPlan[] = [];
  for (const method of methods) {
    const planned = planMethod(def, method, context);
    if (planned.ok) {
      methodPlans.push(planned.value);
    } else {
      diagnostics.push(...planned.error);
    }
  }

  const partial = {
    def,
    hostName,
    methods: methodPlans,
    fields,
    variants,
    ...(layout ? { layout } : {}),
    ...(def.kind === "opaque" ? { destructor: destructorSignature(def) } : {}),
  };
  diagnostics.push(...memberCollisions(partial, context.naming));

  if (diagnostics.length > 0) {
    return error(diagnostics);
  }

  return ok({ ...partial, dependencies: dependenciesOf(def, methods) });
};
