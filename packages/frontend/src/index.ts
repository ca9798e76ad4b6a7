/**
 * ffigen frontend - IR model, type registry, IR loader and attribute filter
 */

export * from "./types/diagnostic.js";
export * from "./types/result.js";

export * from "./ir/types.js";
export * from "./ir/identifiers.js";
export * from "./ir/type-refs.js";
export * from "./ir/registry.js";
export * from "./ir/loader.js";
export * as ir from "./ir/builders.js";

export * from "./attributes/filter.js";
export * from "./resolver/naming-policy.js";
