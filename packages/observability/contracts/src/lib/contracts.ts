/**
 * Contracts for the Faultline SDK
 * Defines the core data structures shared by the capture pipeline
 */

/**
 * Severity levels for events and breadcrumbs
 */
export type Severity = 'debug' | 'info' | 'warning' | 'error' | 'fatal';

/**
 * Platform identifier reported with every event
 */
export const PLATFORM = 'node';

/**
 * One stack location, stored outer to inner (innermost call last)
 */
export interface Frame {
  filename: string;
  function: string;
  module: string | null;
  /** Always a positive integer */
  lineno: number;
  colno: number | null;
  absPath: string | null;
  contextLine: string | null;
  preContext: string[] | null;
  postContext: string[] | null;
  /** False for runtime and dependency frames */
  inApp: boolean;
  vars: Record<string, unknown>;
}

/**
 * Exception entry of an event
 */
export interface ExceptionValue {
  type: string;
  value: string;
  module?: string;
}

/**
 * Breadcrumb for tracking events leading up to an error
 */
export interface Breadcrumb {
  timestamp: string;
  category: string;
  message?: string;
  level?: Severity;
  type?: 'default' | 'http' | 'navigation' | 'error' | 'debug' | 'query';
  data?: Record<string, unknown>;
}

/**
 * User information
 */
export interface UserContext {
  id?: string;
  email?: string;
  username?: string;
  ipAddress?: string;
  [key: string]: unknown;
}

/**
 * One captured failure
 */
export interface Event {
  /** 32 hex characters, generated when the event is finalized */
  eventId: string;
  /** ISO 8601, UTC */
  timestamp: string;
  message: string | null;
  exception: ExceptionValue[];
  stacktrace: {
    frames: Frame[];
  };
  level: Severity;
  platform: string;
  culprit: string | null;
  tags: Record<string, string>;
  extra: Record<string, unknown>;
  breadcrumbs: Breadcrumb[];
  user: UserContext;
  serverName: string | null;
  release: string | null;
  environment: string | null;
}

/**
 * Frame as it appears in the submitted JSON body
 */
export interface WireFrame {
  filename: string;
  function: string;
  module: string | null;
  lineno: number;
  colno: number | null;
  abs_path: string | null;
  context_line: string | null;
  pre_context: string[] | null;
  post_context: string[] | null;
  in_app: boolean;
  vars: Record<string, unknown>;
}

/**
 * Event submission body for `POST {endpoint}/api/{project}/store/`
 */
export interface WireEvent {
  event_id: string;
  message: string | null;
  timestamp: string;
  level: Severity;
  platform: string;
  culprit: string | null;
  server_name: string | null;
  release: string | null;
  environment: string | null;
  tags: Record<string, string>;
  extra: Record<string, unknown>;
  breadcrumbs: Breadcrumb[];
  user: UserContext;
  exception: ExceptionValue[];
  stacktrace: {
    frames: WireFrame[];
  };
}

/**
 * Where a capture came from. Direct captures carry none unless the caller sets one.
 */
export type CaptureSource = 'logger' | 'direct' | (string & {});

/**
 * Outcome of one delivery attempt
 */
export type TransportResult =
  | { ok: true; id: string }
  | { ok: false; reason: string; status?: number };

/**
 * Awaitable outcome of a dispatched send. Never rejects.
 */
export type DispatchHandle = Promise<TransportResult>;

/**
 * Why an otherwise valid event was not sent
 */
export type ExclusionReason =
  | 'disabled'
  | 'environment'
  | 'filter'
  | 'sample_rate'
  | 'before_send';

/**
 * Result of a capture call
 */
export type CaptureResult =
  | { status: 'sent'; event: Event; handle: DispatchHandle }
  | { status: 'excluded'; reason: ExclusionReason }
  | { status: 'unparsable'; message: string };
