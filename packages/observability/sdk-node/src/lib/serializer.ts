import type { Event, Frame, WireEvent, WireFrame } from '@faultline/observability-contracts';

function toWireFrame(frame: Frame): WireFrame {
  return {
    filename: frame.filename,
    function: frame.function,
    module: frame.module,
    lineno: frame.lineno,
    colno: frame.colno,
    abs_path: frame.absPath,
    context_line: frame.contextLine,
    pre_context: frame.preContext,
    post_context: frame.postContext,
    in_app: frame.inApp,
    vars: frame.vars,
  };
}

/**
 * Map an event onto the submission body
 */
export function toWireEvent(event: Event): WireEvent {
  return {
    event_id: event.eventId,
    message: event.message,
    timestamp: event.timestamp,
    level: event.level,
    platform: event.platform,
    culprit: event.culprit,
    server_name: event.serverName,
    release: event.release,
    environment: event.environment,
    tags: event.tags,
    extra: event.extra,
    breadcrumbs: event.breadcrumbs,
    user: event.user,
    exception: event.exception.map(({ type, value, module }) =>
      module ? { type, value, module } : { type, value },
    ),
    stacktrace: {
      frames: event.stacktrace.frames.map(toWireFrame),
    },
  };
}

/**
 * Plain JSON value for `value`. Bigints become strings, errors their name and
 * message, and a reference back to an enclosing object becomes '[CIRCULAR]'.
 */
function toJsonValue(value: unknown, ancestors: object[]): unknown {
  if (typeof value === 'bigint') {
    return value.toString();
  }
  if (value instanceof Error) {
    return { name: value.name, message: value.message };
  }
  if (typeof value !== 'object' || value === null) {
    return value;
  }
  if (ancestors.includes(value)) {
    return '[CIRCULAR]';
  }

  ancestors.push(value);
  try {
    if (Array.isArray(value)) {
      return value.map((item) => toJsonValue(item, ancestors));
    }
    if ('toJSON' in value && typeof value.toJSON === 'function') {
      return toJsonValue(value.toJSON(), ancestors);
    }
    const result: Record<string, unknown> = {};
    for (const [key, entry] of Object.entries(value)) {
      result[key] = toJsonValue(entry, ancestors);
    }
    return result;
  } finally {
    ancestors.pop();
  }
}

/**
 * JSON body for one event
 */
export function serializeEvent(event: Event): string {
  return JSON.stringify(toJsonValue(toWireEvent(event), []));
}
