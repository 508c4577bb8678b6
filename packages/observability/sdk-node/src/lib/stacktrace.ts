import type { ExceptionValue } from '@faultline/observability-contracts';

/**
 * A stack location as the runtime or a report hands it over, before it is
 * turned into an event Frame
 */
export interface NativeFrame {
  filename: string;
  function?: string;
  lineno: number | string;
  colno?: number | null;
  module?: string | null;
  /** Owning application or library, when the trace names one */
  app?: string | null;
}

/**
 * What the text state machine extracted from a rendered stack trace
 */
export interface TextTrace {
  message: string | null;
  exception: ExceptionValue[];
  /** Outer to inner (innermost call last) */
  frames: NativeFrame[];
  culprit: string | null;
  extra: Record<string, string>;
}

export type LineClass =
  | { kind: 'header'; message: string }
  | { kind: 'summary'; type: string; value: string; message: string }
  | { kind: 'frame'; frame: NativeFrame }
  | { kind: 'metadata'; key: string; value: string }
  | { kind: 'ignored' };

const HEADER_PATTERN = /^Error in (?:process|unit) /;
const SUMMARY_PATTERN = /^(?:\s*\*\* )?\((.+?)\) (.+)$/;
const FRAME_PATTERN = /^(?:\((.+?)\) )?(.+?):(\d+): (.+)$/;

/** Report labels and the extra key each one is stored under */
const METADATA_LABELS: ReadonlyArray<[string, string]> = [
  ['Last message: ', 'last_message'],
  ['State: ', 'state'],
  ['Function: ', 'function'],
  ['Args: ', 'args'],
];

/**
 * Positive safe-integer line number, or null
 */
export function parseLineno(lineno: number | string): number | null {
  const value = typeof lineno === 'number' ? lineno : Number(lineno.trim());
  if (!Number.isSafeInteger(value) || value < 1) {
    return null;
  }
  return value;
}

/**
 * Classify one line of a rendered stack trace
 */
export function classifyLine(line: string): LineClass {
  if (HEADER_PATTERN.test(line)) {
    return { kind: 'header', message: line };
  }

  const summary = SUMMARY_PATTERN.exec(line);
  if (summary) {
    const [, type, value] = summary;
    return { kind: 'summary', type, value, message: `(${type}) ${value}` };
  }

  const trimmed = line.trim();

  if (/^\s/.test(line)) {
    const match = FRAME_PATTERN.exec(trimmed);
    if (match) {
      const [, app, filename, lineno, fn] = match;
      if (parseLineno(lineno) === null) {
        return { kind: 'ignored' };
      }
      return {
        kind: 'frame',
        frame: { filename, lineno, function: fn, app: app || null },
      };
    }
  }

  for (const [label, key] of METADATA_LABELS) {
    if (trimmed.startsWith(label)) {
      return { kind: 'metadata', key, value: trimmed.slice(label.length) };
    }
  }

  return { kind: 'ignored' };
}

/**
 * Run the line classifier over a rendered stack trace and accumulate the result
 */
export function parseTextStacktrace(text: string): TextTrace {
  const trace: TextTrace = {
    message: null,
    exception: [],
    frames: [],
    culprit: null,
    extra: {},
  };

  for (const line of text.split(/\r?\n/)) {
    const entry = classifyLine(line);

    switch (entry.kind) {
      case 'header':
        trace.message = entry.message;
        break;
      case 'summary':
        trace.message = entry.message;
        trace.exception = [{ type: entry.type, value: entry.value }];
        trace.culprit = null;
        break;
      case 'frame':
        if (!trace.culprit && entry.frame.function) {
          trace.culprit = entry.frame.function;
        }
        // traces list the innermost call first
        trace.frames.unshift(entry.frame);
        break;
      case 'metadata':
        if (!(entry.key in trace.extra)) {
          trace.extra[entry.key] = entry.value;
        }
        break;
      case 'ignored':
        break;
    }
  }

  return trace;
}

const V8_FRAME_PATTERN = /at\s+(?:(.+?)\s+\()?(?:(.+?):(\d+):(\d+))\)?/;

/**
 * Parse a V8 `error.stack` into frames, outer to inner (innermost call last)
 */
export function parseV8Stack(stack?: string): NativeFrame[] {
  if (!stack) return [];

  const frames: NativeFrame[] = [];

  for (const line of stack.split('\n')) {
    if (!/^\s+at\s/.test(line)) {
      continue;
    }

    const match = V8_FRAME_PATTERN.exec(line);
    if (match) {
      frames.unshift({
        function: match[1] || '<anonymous>',
        filename: match[2] || '<unknown>',
        lineno: parseInt(match[3] || '0', 10),
        colno: parseInt(match[4] || '0', 10),
      });
    }
  }

  return frames;
}
