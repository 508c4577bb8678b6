import type { ExclusionReason, TransportResult } from '@faultline/observability-contracts';
import type { FaultlineClient } from './client';

export class RuntimeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'RuntimeError';
  }
}

export type TestEventOutcome =
  | { sent: true; result: TransportResult }
  | { sent: false; reason: ExclusionReason | 'unparsable' };

/**
 * Log the client configuration, then send one test event and wait for its
 * delivery. Nothing is sent when the environment is not included.
 */
export async function sendTestEvent(client: FaultlineClient): Promise<TestEventOutcome> {
  const config = client.getConfig();
  const logger = client.getLogger().child({ component: 'test-event' });
  const dsn = config.dsn;

  logger.info('Client configuration', {
    server: dsn ? dsn.endpointUrl : null,
    projectId: dsn ? dsn.projectId : null,
    publicKey: dsn ? dsn.publicKey : null,
    includedEnvironments: [...config.includedEnvironments],
    environmentName: config.environmentName,
    poolSize: config.poolSize,
    timeout: config.timeout,
  });

  if (!config.includedEnvironments.includes(config.environmentName)) {
    logger.info(
      `${config.environmentName} is not in [${config.includedEnvironments.join(', ')}] so no test event will be sent`,
    );
    return { sent: false, reason: 'environment' };
  }

  logger.info('Sending test event...');
  const capture = client.captureException(new RuntimeError('Testing sending event'));

  if (capture.status === 'unparsable') {
    return { sent: false, reason: 'unparsable' };
  }
  if (capture.status === 'excluded') {
    return { sent: false, reason: capture.reason };
  }

  const result = await capture.handle;
  if (result.ok) {
    logger.info('Test event sent!', { id: result.id });
  } else {
    logger.warn('Test event failed', { reason: result.reason });
  }
  return { sent: true, result };
}
