import { ExecutionUnit } from '@faultline/observability-context';
import type { ErrorReport, ErrorReporter } from './logged-error-adapter';
import { TerminationKind, renderReason } from './event-builder';
import { parseV8Stack } from './stacktrace';

/**
 * Thrown to end a monitored unit with an exit reason that is not an exception
 */
export class UnitExit extends Error {
  constructor(readonly reason: unknown) {
    super(`unit exited: ${renderReason(reason)}`);
    this.name = 'UnitExit';
  }
}

export type UnitOutcome<T> =
  | { ok: true; value: T }
  | { ok: false; kind: TerminationKind; reason: unknown };

export interface MonitorOptions {
  /** Where abnormal terminations are reported */
  reporter: ErrorReporter;
  /** Breadcrumb bound of the unit's context */
  maxBreadcrumbs?: number;
}

function terminationReport(unit: ExecutionUnit, thrown: unknown): ErrorReport {
  const context = unit.peekContext();

  if (thrown instanceof UnitExit) {
    return {
      category: 'crash_report',
      unitId: unit.id,
      errorInfo: { kind: 'exit', reason: thrown.reason, stacktrace: parseV8Stack(thrown.stack) },
      context,
    };
  }

  if (thrown instanceof Error) {
    return {
      category: 'crash_report',
      unitId: unit.id,
      errorInfo: {
        kind: 'error',
        failure: { reason: thrown, stacktrace: parseV8Stack(thrown.stack) },
      },
      context,
    };
  }

  return {
    category: 'crash_report',
    unitId: unit.id,
    errorInfo: { kind: 'throw', reason: thrown },
    context,
  };
}

/**
 * Run `fn` as a monitored execution unit with a context of its own.
 *
 * An abnormal end is reported to `options.reporter` and comes back as
 * `{ ok: false }`; the returned promise does not reject.
 */
export async function monitor<T>(
  unitId: string,
  fn: (unit: ExecutionUnit) => T | Promise<T>,
  options: MonitorOptions,
): Promise<UnitOutcome<T>> {
  const unit = new ExecutionUnit(unitId, options.maxBreadcrumbs);

  try {
    return { ok: true, value: await fn(unit) };
  } catch (thrown) {
    const report = terminationReport(unit, thrown);
    options.reporter.handleReport(report);
    return {
      ok: false,
      kind: report.errorInfo.kind,
      reason: thrown instanceof UnitExit ? thrown.reason : thrown,
    };
  }
}
