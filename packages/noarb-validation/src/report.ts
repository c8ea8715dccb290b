import {
  ValidationHaltError,
  type ValidationOutcome,
  type ValidationReport,
  type ValidationStatus,
} from "@core-types";

export type GateLogger = Pick<Console, "warn">;

const SEVERITY: Record<ValidationStatus, number> = { PASS: 0, WARN: 1, HALT: 2 };
const MARK: Record<ValidationStatus, string> = { PASS: "✓", WARN: "⚠", HALT: "✗" };

/** Worst status wins: any HALT → HALT, else any WARN → WARN, else PASS. */
export function overallStatus(outcomes: readonly ValidationOutcome[]): ValidationStatus {
  return outcomes.reduce<ValidationStatus>(
    (worst, o) => (SEVERITY[o.status] > SEVERITY[worst] ? o.status : worst),
    "PASS"
  );
}

export function buildReport(outcomes: readonly ValidationOutcome[]): ValidationReport {
  return Object.freeze({ status: overallStatus(outcomes), outcomes: Object.freeze([...outcomes]) });
}

export const passed = (report: ValidationReport): boolean => report.status !== "HALT";

export const haltedOutcomes = (report: ValidationReport): ValidationOutcome[] =>
  report.outcomes.filter((o) => o.status === "HALT");

export const warnedOutcomes = (report: ValidationReport): ValidationOutcome[] =>
  report.outcomes.filter((o) => o.status === "WARN");

export function formatOutcome(o: ValidationOutcome): string {
  return `[${MARK[o.status]}] ${o.check}: ${o.message}`;
}

export function formatReport(report: ValidationReport): string {
  const count = (s: ValidationStatus) => report.outcomes.filter((o) => o.status === s).length;
  return [
    `ValidationReport: ${report.status}`,
    `  Halted: ${count("HALT")}  Warned: ${count("WARN")}  Passed: ${count("PASS")}`,
    ...report.outcomes.map((o) => `    ${formatOutcome(o)}`),
  ].join("\n");
}

/**
 * Policy helper for callers that want HALT to stop them: logs every WARN and
 * throws ValidationHaltError if anything halted. Returns the report otherwise.
 */
export function ensureValid(report: ValidationReport, logger: GateLogger = console): ValidationReport {
  for (const o of warnedOutcomes(report)) {
    logger.warn(`⚠️ ${formatOutcome(o)}`);
  }
  const halted = haltedOutcomes(report);
  if (halted.length > 0) {
    throw new ValidationHaltError(halted.map(formatOutcome));
  }
  return report;
}
