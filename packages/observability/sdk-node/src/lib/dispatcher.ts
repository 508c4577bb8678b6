import type { DispatchHandle, Event, TransportResult } from '@faultline/observability-contracts';
import type { Logger } from '@faultline/observability-logger';
import type { ResolvedConfig } from './config';
import type { ParsedDsn } from './dsn';
import type { Transport } from './transport';

/**
 * Runs every send as its own detached task. A send that throws or rejects
 * resolves its handle to a failure; nothing reaches the capturing caller.
 */
export class Dispatcher {
  private readonly inFlight = new Set<DispatchHandle>();

  constructor(
    private readonly transport: Transport,
    private readonly dsn: ParsedDsn,
    private readonly config: ResolvedConfig,
    private readonly logger: Logger,
  ) {}

  dispatch(event: Event): DispatchHandle {
    const handle: DispatchHandle = new Promise<void>((resolve) => setImmediate(resolve))
      .then(() => this.transport.send(event, this.dsn, this.config))
      .catch((err: unknown): TransportResult => ({
        ok: false,
        reason: `transport crashed: ${err instanceof Error ? err.message : String(err)}`,
      }))
      .then((result) => this.settle(event, result));

    this.inFlight.add(handle);
    void handle.finally(() => this.inFlight.delete(handle));
    return handle;
  }

  /**
   * Number of sends not yet settled
   */
  pending(): number {
    return this.inFlight.size;
  }

  /**
   * Wait for in-flight sends, at most `timeoutMs`. Resolves true when all settled.
   */
  async flush(timeoutMs = this.config.timeout): Promise<boolean> {
    if (this.inFlight.size === 0) {
      return true;
    }

    let timer: NodeJS.Timeout | undefined;
    const timedOut = new Promise<boolean>((resolve) => {
      timer = setTimeout(() => resolve(false), timeoutMs);
    });
    const settled = Promise.all([...this.inFlight]).then(() => true);

    try {
      return await Promise.race([settled, timedOut]);
    } finally {
      clearTimeout(timer);
    }
  }

  private settle(event: Event, result: TransportResult): TransportResult {
    if (result.ok) {
      this.logger.debug('Event sent', { eventId: event.eventId, id: result.id });
    } else {
      this.logger.warn('Failed to send event', {
        eventId: event.eventId,
        reason: result.reason,
        status: result.status,
      });
    }

    const afterSend = this.config.afterSend;
    if (afterSend) {
      try {
        afterSend(event, result);
      } catch (err) {
        this.logger.debug('afterSend hook failed', {
          eventId: event.eventId,
          error: err instanceof Error ? err.message : String(err),
        });
      }
    }

    return result;
  }
}
