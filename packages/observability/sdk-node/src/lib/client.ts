import type { CaptureResult, CaptureSource, Event } from '@faultline/observability-contracts';
import { DiagnosticContext, ExecutionUnit } from '@faultline/observability-context';
import type { Logger } from '@faultline/observability-logger';
import { FaultlineOptions, ResolvedConfig, resolveConfig } from './config';
import { Dispatcher } from './dispatcher';
import type { ParsedDsn } from './dsn';
import {
  BuildOptions,
  BuildResult,
  EventBuilder,
  TerminationOptions,
} from './event-builder';
import { EventGate } from './event-gate';
import { SourceContextResolver } from './source-context';
import type { NativeFrame } from './stacktrace';
import { HttpTransport, Transport } from './transport';

export type CaptureOptions = BuildOptions;

export interface ClientDependencies {
  /** Uniform [0, 1) source for the sampler */
  random?: () => number;
}

/**
 * Faultline Client
 *
 * Builds events from failures, decides whether to send them and hands the
 * ones that pass to a detached send. Capture calls never wait on the network.
 */
export class FaultlineClient {
  private readonly config: ResolvedConfig;
  private readonly logger: Logger;
  private readonly builder: EventBuilder;
  private readonly gate: EventGate;
  private readonly transport: Transport;
  private readonly dispatcher: Dispatcher | null;
  private readonly sourceResolver: SourceContextResolver | undefined;

  constructor(options: FaultlineOptions = {}, dependencies: ClientDependencies = {}) {
    this.config = resolveConfig(options);
    this.logger = this.config.logger.child({ component: 'client' });

    if (this.config.enableSourceCodeContext) {
      this.sourceResolver = new SourceContextResolver({
        rootPath: this.config.rootSourceCodePath,
        pattern: this.config.sourceCodePattern,
        excludePatterns: this.config.sourceCodeExcludePatterns,
        logger: this.logger,
      });
    }

    this.builder = new EventBuilder(this.config, this.logger, this.sourceResolver);
    this.gate = new EventGate(this.config, this.logger, dependencies.random);
    this.transport = this.config.transport || new HttpTransport();
    this.dispatcher = this.config.dsn
      ? new Dispatcher(
          this.transport,
          this.config.dsn,
          this.config,
          this.config.logger.child({ component: 'dispatcher' }),
        )
      : null;
  }

  /**
   * Capture a thrown value. The event is sent in the background; await
   * `handle` on a `sent` result to learn the delivery outcome.
   */
  captureException(exception: unknown, options: CaptureOptions = {}): CaptureResult {
    return this.capture(
      () => this.builder.buildFromException(exception, options),
      options.source,
      exception,
    );
  }

  /**
   * Capture a free-text message
   */
  captureMessage(message: string, options: CaptureOptions = {}): CaptureResult {
    return this.capture(() => this.builder.buildFromMessage(message, options), options.source);
  }

  /**
   * Capture the abnormal end of an execution unit
   */
  captureTermination(
    reason: unknown,
    stacktrace?: NativeFrame[] | string,
    options: TerminationOptions = {},
  ): CaptureResult {
    return this.capture(
      () => this.builder.buildFromTermination(reason, stacktrace, options),
      options.source,
      reason,
    );
  }

  /**
   * Capture a rendered failure report
   */
  captureText(text: string, options: CaptureOptions = {}): CaptureResult {
    return this.capture(() => this.builder.buildFromText(text, options), options.source, text);
  }

  /**
   * New context bounded by the configured `maxBreadcrumbs`
   */
  createContext(): DiagnosticContext {
    return new DiagnosticContext(this.config.maxBreadcrumbs);
  }

  /**
   * New execution unit whose context is bounded by the configured `maxBreadcrumbs`
   */
  createUnit(id?: string): ExecutionUnit {
    return new ExecutionUnit(id, this.config.maxBreadcrumbs);
  }

  /**
   * Read every configured source file into the context cache
   */
  preloadSourceContext(): number {
    return this.sourceResolver ? this.sourceResolver.preload() : 0;
  }

  /**
   * Wait for in-flight sends, at most `timeoutMs`
   */
  flush(timeoutMs?: number): Promise<boolean> {
    return this.dispatcher ? this.dispatcher.flush(timeoutMs) : Promise.resolve(true);
  }

  async close(timeoutMs?: number): Promise<boolean> {
    const flushed = await this.flush(timeoutMs);
    await this.transport.close?.();
    return flushed;
  }

  isEnabled(): boolean {
    return this.dispatcher !== null;
  }

  getDsn(): ParsedDsn | null {
    return this.config.dsn;
  }

  getConfig(): ResolvedConfig {
    return this.config;
  }

  getLogger(): Logger {
    return this.config.logger;
  }

  private capture(
    build: () => BuildResult,
    source: CaptureSource | undefined,
    original?: unknown,
  ): CaptureResult {
    if (!this.dispatcher) {
      return { status: 'excluded', reason: 'disabled' };
    }

    const result = build();

    if (result.kind === 'unparsable') {
      this.logger.debug(result.message, { source });
      return { status: 'unparsable', message: result.message };
    }
    if (result.kind === 'suppressed') {
      this.logger.debug('Event dropped by beforeSend', { source });
      return { status: 'excluded', reason: 'before_send' };
    }

    const event: Event = result.event;
    const decision = this.gate.shouldSend(event, source, original);
    if (!decision.send) {
      this.logger.debug('Event excluded', { eventId: event.eventId, reason: decision.reason });
      return { status: 'excluded', reason: decision.reason };
    }

    return { status: 'sent', event, handle: this.dispatcher.dispatch(event) };
  }
}

let defaultClient: FaultlineClient | null = null;

/**
 * Configure the process-wide client
 */
export function init(options: FaultlineOptions = {}): FaultlineClient {
  defaultClient = new FaultlineClient(options);
  return defaultClient;
}

/**
 * Get the process-wide client
 * @throws Error if init() has not been called
 */
export function getClient(): FaultlineClient {
  if (!defaultClient) {
    throw new Error('Faultline client not configured. Call init() first.');
  }
  return defaultClient;
}

/**
 * Capture with the process-wide client
 */
export function captureException(exception: unknown, options?: CaptureOptions): CaptureResult {
  return getClient().captureException(exception, options);
}

/**
 * Capture a message with the process-wide client
 */
export function captureMessage(message: string, options?: CaptureOptions): CaptureResult {
  return getClient().captureMessage(message, options);
}
