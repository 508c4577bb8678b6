import * as path from 'path';
import { inspect } from 'util';
import { v4 as uuidv4 } from 'uuid';
import {
  CaptureSource,
  Event,
  ExceptionValue,
  Frame,
  PLATFORM,
  Severity,
  UserContext,
} from '@faultline/observability-contracts';
import type { DiagnosticContext } from '@faultline/observability-context';
import type { Logger } from '@faultline/observability-logger';
import type { ResolvedConfig } from './config';
import type { SourceContextResolver } from './source-context';
import { NativeFrame, parseLineno, parseTextStacktrace, parseV8Stack } from './stacktrace';

/**
 * How an execution unit ended. `exit` is the default for non-exception reasons.
 */
export type TerminationKind = 'exit' | 'throw' | 'error' | (string & {});

/**
 * Options accepted by every build path
 */
export interface BuildOptions {
  /** Context of the execution unit the failure belongs to */
  context?: DiagnosticContext;
  /** Frames to use instead of the exception's own stack */
  stacktrace?: NativeFrame[] | string;
  level?: Severity;
  tags?: Record<string, string>;
  extra?: Record<string, unknown>;
  user?: UserContext;
  source?: CaptureSource;
}

export interface TerminationOptions extends BuildOptions {
  kind?: TerminationKind;
}

export type BuildResult =
  | { kind: 'event'; event: Event }
  | { kind: 'unparsable'; message: string }
  | { kind: 'suppressed' };

interface EventDraft {
  message: string | null;
  exception: ExceptionValue[];
  frames: NativeFrame[];
  culprit: string | null;
  extra: Record<string, unknown>;
}

const UNPARSABLE_MESSAGE = 'Unable to parse as exception, ignoring...';

function emptyDraft(): EventDraft {
  return { message: null, exception: [], frames: [], culprit: null, extra: {} };
}

/**
 * Type name of an error; subclasses that keep the default `name` report their class
 */
export function exceptionType(error: Error): string {
  const ctorName = error.constructor?.name;
  if (error.name === 'Error' && ctorName && ctorName !== 'Error') {
    return ctorName;
  }
  return error.name || ctorName || 'Error';
}

/**
 * Render a termination reason the way it appears in an exit banner
 */
export function renderReason(reason: unknown): string {
  if (typeof reason === 'symbol') {
    return `:${reason.description ?? ''}`;
  }
  if (typeof reason === 'string') {
    return reason;
  }
  return inspect(reason, { depth: 4, breakLength: Infinity });
}

function moduleFromFilename(filename: string, rootPath: string): string | null {
  if (filename.startsWith('node:') || filename === '<unknown>') {
    return null;
  }

  const normalized = filename.replace(/\\/g, '/');
  let base: string;

  const nodeModulesIndex = normalized.lastIndexOf('node_modules/');
  if (nodeModulesIndex !== -1) {
    base = normalized.slice(nodeModulesIndex + 'node_modules/'.length);
  } else if (path.isAbsolute(filename) && filename.startsWith(rootPath)) {
    base = path.relative(rootPath, filename).replace(/\\/g, '/');
  } else {
    base = path.basename(normalized);
  }

  return base.replace(/\.[^./]+$/, '').split('/').join('.') || null;
}

/**
 * Turns exceptions, terminations, messages and text traces into finished events
 */
export class EventBuilder {
  constructor(
    private readonly config: ResolvedConfig,
    private readonly logger: Logger,
    private readonly sourceResolver?: SourceContextResolver,
  ) {}

  buildFromException(exception: unknown, options: BuildOptions = {}): BuildResult {
    return this.finalize(this.draftFromThrown(exception, 'throw', options.stacktrace), options);
  }

  buildFromTermination(
    reason: unknown,
    stacktrace?: NativeFrame[] | string,
    options: TerminationOptions = {},
  ): BuildResult {
    const kind = options.kind || 'exit';
    const draft = this.draftFromThrown(reason, kind, stacktrace ?? options.stacktrace);
    return this.finalize(draft, options);
  }

  buildFromMessage(text: string, options: BuildOptions = {}): BuildResult {
    const draft = emptyDraft();
    draft.message = text.length > 0 ? text : null;
    this.applyStacktrace(draft, options.stacktrace);
    return this.finalize(draft, options);
  }

  /**
   * Build from a rendered report when no structured data is available
   */
  buildFromText(text: string, options: BuildOptions = {}): BuildResult {
    const draft = emptyDraft();
    this.applyStacktrace(draft, text);
    return this.finalize(draft, options);
  }

  private draftFromThrown(
    thrown: unknown,
    kind: TerminationKind,
    stacktrace: NativeFrame[] | string | undefined,
  ): EventDraft {
    const draft = emptyDraft();

    if (thrown instanceof Error) {
      draft.exception = [{ type: exceptionType(thrown), value: thrown.message }];
      draft.message = thrown.message || null;
      this.applyStacktrace(draft, stacktrace ?? parseV8Stack(thrown.stack));
      return draft;
    }

    if (thrown !== undefined && thrown !== null) {
      const value = `** (${kind}) ${renderReason(thrown)}`;
      draft.exception = [{ type: kind, value }];
      draft.message = value;
    }

    this.applyStacktrace(draft, stacktrace);
    return draft;
  }

  private applyStacktrace(draft: EventDraft, stacktrace: NativeFrame[] | string | undefined): void {
    if (stacktrace === undefined) {
      return;
    }

    if (typeof stacktrace !== 'string') {
      draft.frames = stacktrace;
      return;
    }

    const trace = parseTextStacktrace(stacktrace);
    draft.frames = trace.frames;
    draft.culprit = draft.culprit || trace.culprit;
    draft.extra = { ...trace.extra, ...draft.extra };
    if (draft.exception.length === 0) {
      draft.exception = trace.exception;
    }
    if (draft.message === null) {
      draft.message = trace.message;
    }
  }

  private isInApp(filename: string, module: string | null, app: string | null): boolean {
    if (module && this.config.inAppModuleWhitelist.some((prefix) => module.startsWith(prefix))) {
      return true;
    }
    if (app && this.config.notInAppApps.includes(app)) {
      return false;
    }
    return !this.config.notInAppPatterns.some((pattern) => filename.includes(pattern));
  }

  private toFrame(native: NativeFrame): Frame | null {
    const lineno = parseLineno(native.lineno);
    if (lineno === null) {
      return null;
    }

    const module =
      native.module !== undefined
        ? native.module
        : moduleFromFilename(native.filename, this.config.rootSourceCodePath);

    return {
      filename: native.filename,
      function: native.function || '<anonymous>',
      module,
      lineno,
      colno: native.colno ?? null,
      absPath: path.isAbsolute(native.filename) ? native.filename : null,
      contextLine: null,
      preContext: null,
      postContext: null,
      inApp: this.isInApp(native.filename, module, native.app ?? null),
      vars: {},
    };
  }

  private attachSourceContext(frame: Frame): void {
    if (!this.sourceResolver || !frame.inApp) {
      return;
    }

    const window = this.sourceResolver.resolve(
      frame.absPath ?? frame.filename,
      frame.lineno,
      this.config.contextLines,
    );
    if (window) {
      frame.contextLine = window.contextLine;
      frame.preContext = window.preContext;
      frame.postContext = window.postContext;
    }
  }

  private finalize(draft: EventDraft, options: BuildOptions): BuildResult {
    if (draft.message === null && draft.exception.length === 0) {
      return { kind: 'unparsable', message: UNPARSABLE_MESSAGE };
    }

    const frames: Frame[] = [];
    for (const native of draft.frames) {
      const frame = this.toFrame(native);
      if (frame) {
        frames.push(frame);
      }
    }

    if (this.config.enableSourceCodeContext) {
      frames.forEach((frame) => this.attachSourceContext(frame));
    }

    const snapshot = options.context?.snapshot();
    const innermost = frames[frames.length - 1];

    const event: Event = {
      eventId: uuidv4().replace(/-/g, ''),
      timestamp: new Date().toISOString(),
      message: draft.message,
      exception: draft.exception,
      stacktrace: { frames },
      level: options.level || 'error',
      platform: PLATFORM,
      culprit: draft.culprit || innermost?.function || null,
      tags: { ...this.config.tags, ...options.tags, ...snapshot?.tags },
      extra: { ...draft.extra, ...options.extra, ...snapshot?.extra },
      breadcrumbs: snapshot?.breadcrumbs || [],
      user: { ...options.user, ...snapshot?.user },
      serverName: this.config.serverName,
      release: this.config.release,
      environment: this.config.environmentName,
    };

    return this.runBeforeSend(event);
  }

  private runBeforeSend(event: Event): BuildResult {
    const hook = this.config.beforeSend;
    if (!hook) {
      return { kind: 'event', event };
    }

    let processed: Event | null;
    try {
      processed = hook(event);
    } catch (err) {
      this.logger.warn('beforeSend hook failed, sending event unmodified', {
        eventId: event.eventId,
        error: err instanceof Error ? err.message : String(err),
      });
      return { kind: 'event', event };
    }

    if (!processed) {
      return { kind: 'suppressed' };
    }
    if (processed.message === null && processed.exception.length === 0) {
      return { kind: 'unparsable', message: UNPARSABLE_MESSAGE };
    }
    return { kind: 'event', event: processed };
  }
}
