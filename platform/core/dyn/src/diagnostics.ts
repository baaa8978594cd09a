import type { Location } from "./location";
import type { Path } from "./path";

export type Severity = "warning" | "error";

/**
 * Non-fatal finding produced while normalizing a value tree. Error
 * diagnostics may carry the typed error that describes them.
 */
export interface Diagnostic {
  readonly severity: Severity;
  readonly summary: string;
  readonly path: Path;
  readonly location: Location;
  readonly error?: Error;
}

export function filterDiagnostics(
  diagnostics: readonly Diagnostic[],
  severity: Severity,
): Diagnostic[] {
  return diagnostics.filter((diagnostic) => diagnostic.severity === severity);
}
