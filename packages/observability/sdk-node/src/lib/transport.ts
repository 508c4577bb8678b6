import { Agent, Dispatcher, fetch } from 'undici';
import type { Event, TransportResult } from '@faultline/observability-contracts';
import type { ResolvedConfig } from './config';
import { ParsedDsn, storeUrl } from './dsn';
import { serializeEvent } from './serializer';

export const SDK_NAME = 'faultline-node';
export const SDK_VERSION = '1.0.0';
export const PROTOCOL_VERSION = 5;

/**
 * Delivers one event. Implementations report failures as values.
 */
export interface Transport {
  send(event: Event, dsn: ParsedDsn, config: ResolvedConfig): Promise<TransportResult>;
  close?(): Promise<void>;
}

/**
 * Value of the `X-Sentry-Auth` header
 */
export function authorizationHeader(dsn: ParsedDsn, now: Date = new Date()): string {
  const parts = [
    `sentry_version=${PROTOCOL_VERSION}`,
    `sentry_client=${SDK_NAME}/${SDK_VERSION}`,
    `sentry_timestamp=${Math.floor(now.getTime() / 1000)}`,
    `sentry_key=${dsn.publicKey}`,
  ];
  if (dsn.secretKey) {
    parts.push(`sentry_secret=${dsn.secretKey}`);
  }
  return `Sentry ${parts.join(', ')}`;
}

export interface HttpTransportOptions {
  /** Use this dispatcher instead of a pool built from the config */
  dispatcher?: Dispatcher;
}

function assignedId(body: string): string | null {
  try {
    const parsed: unknown = JSON.parse(body);
    if (typeof parsed === 'object' && parsed !== null && 'id' in parsed) {
      const id = parsed.id;
      return typeof id === 'string' || typeof id === 'number' ? String(id) : null;
    }
  } catch {
    return null;
  }
  return null;
}

/**
 * Posts events to the collector's store endpoint. One attempt, no retry.
 */
export class HttpTransport implements Transport {
  private dispatcher: Dispatcher | null;
  private ownsDispatcher = false;

  constructor(options: HttpTransportOptions = {}) {
    this.dispatcher = options.dispatcher || null;
  }

  async send(event: Event, dsn: ParsedDsn, config: ResolvedConfig): Promise<TransportResult> {
    const body = serializeEvent(event);
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), config.timeout);

    try {
      const response = await fetch(storeUrl(dsn), {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          'User-Agent': `${SDK_NAME}/${SDK_VERSION}`,
          'X-Sentry-Auth': authorizationHeader(dsn),
        },
        body,
        signal: controller.signal,
        dispatcher: this.getDispatcher(config),
      });

      const text = await response.text();
      if (!response.ok) {
        return { ok: false, reason: `HTTP ${response.status}`, status: response.status };
      }

      return { ok: true, id: assignedId(text) || event.eventId };
    } catch (err) {
      return { ok: false, reason: err instanceof Error ? err.message : String(err) };
    } finally {
      clearTimeout(timeoutId);
    }
  }

  async close(): Promise<void> {
    if (this.dispatcher && this.ownsDispatcher) {
      await this.dispatcher.close();
      this.dispatcher = null;
      this.ownsDispatcher = false;
    }
  }

  private getDispatcher(config: ResolvedConfig): Dispatcher {
    if (!this.dispatcher) {
      this.dispatcher = new Agent({
        connections: config.poolSize,
        headersTimeout: config.timeout,
        bodyTimeout: config.timeout,
      });
      this.ownsDispatcher = true;
    }
    return this.dispatcher;
  }
}
