import type { Diagnostic } from "../outcome/diagnostic";
import type { Logger } from "./logger";

export function emitDiagnostics(diagnostics: readonly Diagnostic[], logger: Logger): void {
  for (const diag of diagnostics) {
    switch (diag.severity) {
      case "error":
        logger.error(diag.message);
        break;
      case "warning":
        logger.warn(diag.message);
        break;
      case "info":
        logger.info(diag.message);
        break;
    }
  }
}
