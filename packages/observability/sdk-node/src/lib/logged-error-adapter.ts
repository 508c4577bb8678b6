import type { CaptureResult } from '@faultline/observability-contracts';
import { DiagnosticContext } from '@faultline/observability-context';
import type { Logger } from '@faultline/observability-logger';
import type { FaultlineClient } from './client';
import type { TerminationKind } from './event-builder';
import type { NativeFrame } from './stacktrace';

type ReportStacktrace = NativeFrame[] | string;

/**
 * `{kind, {reason, stacktrace}, unitStack}`: the failure and the stack it was
 * raised with travel together
 */
export interface NestedErrorInfo {
  kind: TerminationKind;
  failure: { reason: unknown; stacktrace: ReportStacktrace };
  unitStack?: unknown;
}

/**
 * `{kind, reason, stacktrace}`
 */
export interface FlatErrorInfo {
  kind: TerminationKind;
  reason: unknown;
  stacktrace?: ReportStacktrace;
}

export type ErrorInfo = NestedErrorInfo | FlatErrorInfo;

/**
 * A failure reported by the host's error-reporting facility
 */
export interface ErrorReport {
  category: 'crash_report' | 'uncaught_exception' | 'unhandled_rejection' | (string & {});
  /** Identifier of the unit that failed */
  unitId: string;
  errorInfo: ErrorInfo;
  /** Diagnostic context of the failed unit, if it had one */
  context?: DiagnosticContext;
}

/**
 * Anything that accepts error reports
 */
export interface ErrorReporter {
  handleReport(report: unknown): CaptureResult | null;
}

/**
 * The part of `process` the adapter listens on
 */
export interface ProcessEvents {
  on(event: string, listener: (...args: never[]) => void): unknown;
  off(event: string, listener: (...args: never[]) => void): unknown;
  exit(code: number): void;
}

class AdapterParseError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'AdapterParseError';
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

function isStacktrace(value: unknown): value is ReportStacktrace {
  return typeof value === 'string' || Array.isArray(value);
}

function readErrorInfo(info: unknown): { kind: TerminationKind; reason: unknown; stacktrace?: ReportStacktrace } {
  if (!isRecord(info)) {
    throw new AdapterParseError('error info is not an object');
  }
  const kind = info['kind'];
  if (typeof kind !== 'string') {
    throw new AdapterParseError('error info has no kind');
  }

  const failure = info['failure'];
  if (isRecord(failure) && 'reason' in failure) {
    const nestedStack = failure['stacktrace'];
    if (isStacktrace(nestedStack)) {
      return { kind, reason: failure['reason'], stacktrace: nestedStack };
    }
  }

  if (!('reason' in info)) {
    throw new AdapterParseError('error info has neither a failure nor a reason');
  }

  const stacktrace = info['stacktrace'];
  if (stacktrace !== undefined && !isStacktrace(stacktrace)) {
    throw new AdapterParseError('stacktrace is neither frames nor text');
  }
  return { kind, reason: info['reason'], stacktrace };
}

/**
 * Turns error reports into captures tagged with the `logger` source.
 * A report it cannot read is logged and dropped; it never throws.
 */
export class LoggedErrorAdapter implements ErrorReporter {
  private readonly logger: Logger;
  private attachedTo: ProcessEvents | null = null;
  private readonly onUncaught = (error: Error): void => {
    void this.reportCrash(error);
  };
  private readonly onRejection = (reason: unknown): void => {
    this.handleReport({
      category: 'unhandled_rejection',
      unitId: 'main',
      errorInfo: { kind: 'throw', reason },
    });
  };

  constructor(private readonly client: FaultlineClient) {
    this.logger = client.getLogger().child({ component: 'logged-error-adapter' });
  }

  handleReport(report: unknown): CaptureResult | null {
    try {
      if (!isRecord(report)) {
        throw new AdapterParseError('report is not an object');
      }
      const unitId = report['unitId'];
      if (typeof unitId !== 'string') {
        throw new AdapterParseError('report has no unit id');
      }

      const { kind, reason, stacktrace } = readErrorInfo(report['errorInfo']);
      const context = report['context'];
      const category = report['category'];

      return this.client.captureTermination(reason, stacktrace, {
        kind,
        source: 'logger',
        context: context instanceof DiagnosticContext ? context : undefined,
        extra: {
          unit_id: unitId,
          report_category: typeof category === 'string' ? category : 'unknown',
        },
      });
    } catch (err) {
      const errorType = err instanceof Error ? err.name : typeof err;
      const reason = err instanceof Error ? err.message : String(err);
      this.logger.warn(`Unable to notify collector! ${errorType}: ${reason}`);
      return null;
    }
  }

  /**
   * Report uncaught exceptions and unhandled rejections of `proc`.
   *
   * An uncaught exception is captured, in-flight sends are flushed (bounded
   * by the configured timeout) and the process then exits with code 1.
   * Listening for `unhandledRejection` stops Node from crashing on them.
   */
  attach(proc: ProcessEvents = process, options: { unhandledRejections?: boolean } = {}): void {
    if (this.attachedTo) {
      return;
    }

    proc.on('uncaughtException', this.onUncaught);
    if (options.unhandledRejections ?? true) {
      proc.on('unhandledRejection', this.onRejection);
    }
    this.attachedTo = proc;
  }

  detach(): void {
    if (!this.attachedTo) {
      return;
    }

    this.attachedTo.off('uncaughtException', this.onUncaught);
    this.attachedTo.off('unhandledRejection', this.onRejection);
    this.attachedTo = null;
  }

  private async reportCrash(error: Error): Promise<void> {
    const proc = this.attachedTo;

    try {
      this.handleReport({
        category: 'uncaught_exception',
        unitId: 'main',
        errorInfo: { kind: 'error', reason: error },
      });
      this.logger.error('Uncaught exception, exiting', error);

      if (!(await this.client.flush())) {
        this.logger.warn('Exiting before every event was sent');
      }
    } finally {
      proc?.exit(1);
    }
  }
}
