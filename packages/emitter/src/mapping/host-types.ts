/**
 * Host-surface representation of IR types, shared by every host backend.
 * Backends turn these into concrete language types; TypeIds are resolved
 * to host names through the run's plan.
 */

import type {
  IrOpaqueRef,
  PrimitiveName,
  TextEncoding,
  TypeId,
} from "@ffigen/frontend";

export type HostType =
  | { readonly kind: "unit" }
  | { readonly kind: "number"; readonly primitive: PrimitiveName }
  | {
      readonly kind: "alias";
      readonly typeId: TypeId;
      readonly primitive: PrimitiveName;
    }
  | { readonly kind: "enumeration"; readonly typeId: TypeId }
  | {
      readonly kind: "handle";
      readonly typeId: TypeId;
      readonly ownership: IrOpaqueRef["ownership"];
      readonly mutable: boolean;
    }
  | {
      readonly kind: "record";
      readonly typeId: TypeId;
      readonly byReference: boolean;
    }
  | {
      readonly kind: "buffer";
      readonly primitive: PrimitiveName;
      readonly mutable: boolean;
    }
  | { readonly kind: "text"; readonly encoding: TextEncoding }
  | { readonly kind: "textList"; readonly encoding: TextEncoding }
  /** Accumulated writeable output, surfaced as a string */
  | { readonly kind: "sink" }
  | { readonly kind: "optional"; readonly inner: HostType }
  | {
      readonly kind: "outcome";
      readonly ok: HostType;
      readonly err: HostType;
    };
