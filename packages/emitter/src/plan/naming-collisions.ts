import type { Diagnostic, DiagnosticSubject } from "@ffigen/frontend";
import { errorDiagnostic } from "@ffigen/frontend";

export type CollisionItem = {
  readonly original: string;
  readonly host: string;
  readonly kind: string;
};

/**
 * Report every host identifier that more than one distinct item maps to
 */
export const collisionDiagnostics = (
  items: readonly CollisionItem[],
  scope: string,
  subject: DiagnosticSubject
): readonly Diagnostic[] => {
  const byHost = new Map<string, CollisionItem[]>();
  for (const item of items) {
    const existing = byHost.get(item.host) ?? [];
    byHost.set(item.host, [...existing, item]);
  }

  const diagnostics: Diagnostic[] = [];
  for (const [host, group] of byHost) {
    const distinct = [
      ...new Map(group.map((g) => [`${g.kind}:${g.original}`, g])).values(),
    ];
    if (distinct.length <= 1) continue;

    const details = distinct
      .sort((a, b) =>
        a.original === b.original
          ? a.kind.localeCompare(b.kind)
          : a.original.localeCompare(b.original)
      )
      .map((g) => `${g.original} (${g.kind})`)
      .join(", ");

    diagnostics.push(
      errorDiagnostic(
        "FFG1002",
        `Naming policy collision in ${scope}: ${details} all map to host identifier '${host}'`,
        subject,
        "Rename one declaration or add a rename for this backend"
      )
    );
  }

  return diagnostics;
};
