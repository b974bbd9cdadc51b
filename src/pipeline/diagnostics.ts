import type { Diagnostic } from "../trace/types.js";
import { assertNever } from "../trace/types.js";
import { logger } from "../util/logging.js";

export function reportDiagnostics(diagnostics: Diagnostic[]): void {
  diagnostics.forEach((diagnostic) => {
    switch (diagnostic.kind) {
      case "malformed-record":
        logger.debug(diagnostic.message);
        break;
      case "unmatched-death":
      case "orphan-timestamp":
        logger.warn(`WARNING: ${diagnostic.message}`);
        break;
      default:
        assertNever(diagnostic.kind);
    }
  });
}
