export type NamingPolicy = "clr" | "camel" | "none";

export const NAMING_POLICIES: readonly NamingPolicy[] = ["clr", "camel", "none"];

export const isNamingPolicy = (value: string): value is NamingPolicy =>
  NAMING_POLICIES.some((policy) => policy === value);

export type NamingPolicyConfig = {
  readonly all?: NamingPolicy;
  readonly types?: NamingPolicy;
  readonly methods?: NamingPolicy;
  readonly fields?: NamingPolicy;
  readonly enumMembers?: NamingPolicy;
  readonly parameters?: NamingPolicy;
};

export type NamingPolicyBucket = Exclude<keyof NamingPolicyConfig, "all">;

export const NAMING_POLICY_BUCKETS: readonly NamingPolicyBucket[] = [
  "types",
  "methods",
  "fields",
  "enumMembers",
  "parameters",
];

/**
 * Per-bucket defaults a host backend starts from
 */
export type NamingDefaults = Readonly<Record<NamingPolicyBucket, NamingPolicy>>;

export const resolveNamingPolicy = (
  config: NamingPolicyConfig | undefined,
  bucket: NamingPolicyBucket,
  defaults: NamingDefaults
): NamingPolicy => {
  if (config?.all) return config.all;
  return config?.[bucket] ?? defaults[bucket];
};

const splitIntoWords = (name: string): readonly string[] => {
  const tokens = name.split(/[-_]+/g).filter((t) => t.length > 0);
  const words: string[] = [];

  for (const token of tokens) {
    const matches =
      token.match(/[A-Z]+(?![a-z])|[A-Z]?[a-z]+|[0-9]+/g) ?? [];
    if (matches.length === 0) {
      words.push(token);
    } else {
      words.push(...matches);
    }
  }

  return words;
};

const toPascalWord = (word: string): string => {
  if (word.length === 0) return "";
  return `${word.charAt(0).toUpperCase()}${word.slice(1)}`;
};

/**
 * Apply a naming policy to a native identifier.
 *
 * - `none`: keep the native spelling
 * - `clr`: word-based PascalCase (`add_two` -> `AddTwo`)
 * - `camel`: word-based camelCase (`add_two` -> `addTwo`)
 */
export const applyNamingPolicy = (
  name: string,
  policy: NamingPolicy
): string => {
  if (policy === "none") {
    return name;
  }

  const words = splitIntoWords(name);
  if (words.length === 0) return "";

  const pascal = words.map(toPascalWord).join("");
  if (policy === "clr") {
    return pascal;
  }

  const [first = "", ...rest] = words;
  return [first.toLowerCase(), ...rest.map(toPascalWord)].join("");
};
