import type { Diagnostics } from "@r2vscene/core";

/** Print recorded errors and warnings the way `check` and `convert` show them. */
export function printDiagnostics(diagnostics: Diagnostics): void {
  const { errors, warnings } = diagnostics;

  if (errors.length > 0) {
    console.error(`\n${errors.length} error(s):`);
    for (const err of errors) {
      console.error(`  ✗ [${err.code}] ${err.message}`);
      if (err.suggestion) {
        console.error(`    → ${err.suggestion}`);
      }
    }
  }

  if (warnings.length > 0) {
    console.warn(`\n${warnings.length} warning(s):`);
    for (const warn of warnings) {
      console.warn(`  ⚠ [${warn.code}] ${warn.message}`);
      if (warn.suggestion) {
        console.warn(`    → ${warn.suggestion}`);
      }
    }
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
