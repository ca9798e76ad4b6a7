/**
 * ffigen emitter - ABI mapping, type planning and the C, C# and JavaScript
 * binding emitters
 */

export * from "./abi/target.js";
export * from "./abi/types.js";
export * from "./abi/layout.js";

export type { HostType } from "./mapping/host-types.js";
export type { MappedType } from "./mapping/mapper.js";
export type { Crossing } from "./mapping/ownership.js";

export type {
  FieldPlan,
  MethodPlan,
  ParamPlan,
  ReturnPlan,
  SelfPlan,
  TypePlan,
  VariantPlan,
} from "./plan/plan.js";
export type { AbiParam, AbiSignature, ReturnConvention } from "./plan/symbols.js";
export { destructorSymbol, symbolName } from "./plan/symbols.js";

export type { Artifact, ArtifactRole, EmitContext, HostBackend } from "./backend.js";
export { NATIVE_DIRECTORY } from "./c/headers.js";
export { RUNTIME_HEADER, SUPPORT_EXPORTS } from "./c/runtime-header.js";
export type { CSharpOptions } from "./csharp/backend.js";

export * from "./generate.js";
