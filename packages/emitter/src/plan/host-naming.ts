/**
 * Host naming conventions a backend supplies to planning
 */

import type {
  BackendId,
  NamingDefaults,
  NamingPolicyBucket,
  NamingPolicyConfig,
  TypeDefKind,
} from "@ffigen/frontend";
import { applyNamingPolicy, resolveNamingPolicy } from "@ffigen/frontend";

export type HostNaming = {
  readonly backend: BackendId;
  readonly defaults: NamingDefaults;
  readonly config?: NamingPolicyConfig;
  /** Make a parameter name a legal host identifier */
  readonly escapeParameter: (name: string) => string;
  /** Members the generated host type declares on its own */
  readonly reservedMembers: (
    typeHostName: string,
    kind: TypeDefKind
  ) => readonly string[];
  /** Names taken by the support artifacts of the run */
  readonly reservedTypeNames: readonly string[];
  /** Prefix of generated locals that parameters may not start with */
  readonly reservedParameterPrefix?: string;
};

export const hostNameFor = (
  naming: HostNaming,
  bucket: NamingPolicyBucket,
  name: string
): string =>
  applyNamingPolicy(
    name,
    resolveNamingPolicy(naming.config, bucket, naming.defaults)
  );
