import type { CaptureSource, Event, ExclusionReason } from '@faultline/observability-contracts';
import type { Logger } from '@faultline/observability-logger';
import type { ResolvedConfig } from './config';

export type GateDecision = { send: true } | { send: false; reason: ExclusionReason };

/**
 * Environment gate, filter predicate and sampler, applied in that order
 */
export class EventGate {
  constructor(
    private readonly config: ResolvedConfig,
    private readonly logger: Logger,
    private readonly random: () => number = Math.random,
  ) {}

  /**
   * @param original - the raw exception the event was built from; message
   *   captures have none and skip the filter
   */
  shouldSend(event: Event, source: CaptureSource | undefined, original?: unknown): GateDecision {
    if (!this.config.includedEnvironments.includes(this.config.environmentName)) {
      return { send: false, reason: 'environment' };
    }

    if (original !== undefined && this.isExcluded(event, source, original)) {
      return { send: false, reason: 'filter' };
    }

    if (!this.sampled()) {
      return { send: false, reason: 'sample_rate' };
    }

    return { send: true };
  }

  /**
   * Keep iff a uniform draw falls below the sample rate
   */
  sampled(): boolean {
    return this.random() < this.config.sampleRate;
  }

  private isExcluded(event: Event, source: CaptureSource | undefined, original: unknown): boolean {
    try {
      return this.config.filter.excludeException(original, source);
    } catch (err) {
      this.logger.warn('Event filter failed, keeping event', {
        eventId: event.eventId,
        error: err instanceof Error ? err.message : String(err),
      });
      return false;
    }
  }
}
