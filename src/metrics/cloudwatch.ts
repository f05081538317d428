import {
  CloudWatchClient,
  PutMetricDataCommand,
  StandardUnit,
  MetricDatum,
} from '@aws-sdk/client-cloudwatch';
import { serverConfig } from '../config/server.js';

// CloudWatch namespace for all gateway metrics
const NAMESPACE = 'DocsEditGateway';

// Publish interval: 60 seconds
const PUBLISH_INTERVAL_MS = 60 * 1000;

export interface DocsOperationCounters {
  batchesSubmitted: number;
  requestsSubmitted: number;
  boundaryRetries: number;
  serviceErrors: number;
}

const counters: DocsOperationCounters = {
  batchesSubmitted: 0,
  requestsSubmitted: 0,
  boundaryRetries: 0,
  serviceErrors: 0,
};

// Track previous values for delta calculations
let previous: DocsOperationCounters = { ...counters };

// CloudWatch client (uses default credential chain - ECS task role in production)
const cloudwatch = new CloudWatchClient({
  region: serverConfig.awsRegion,
});

// Interval handle for graceful shutdown
let publishInterval: NodeJS.Timeout | null = null;

export function recordBatch(requestCount: number): void {
  counters.batchesSubmitted++;
  counters.requestsSubmitted += requestCount;
}

export function recordBoundaryRetry(): void {
  counters.boundaryRetries++;
}

export function recordServiceError(): void {
  counters.serviceErrors++;
}

/**
 * Get current counters snapshot
 */
export function getOperationCounters(): DocsOperationCounters {
  return { ...counters };
}

/**
 * Publish counter deltas to CloudWatch
 */
async function publishMetrics(): Promise<void> {
  try {
    const current = getOperationCounters();
    const timestamp = new Date();

    const metricData: MetricDatum[] = [
      {
        MetricName: 'BatchesSubmitted',
        Value: current.batchesSubmitted - previous.batchesSubmitted,
        Unit: StandardUnit.Count,
        Timestamp: timestamp,
      },
      {
        MetricName: 'RequestsSubmitted',
        Value: current.requestsSubmitted - previous.requestsSubmitted,
        Unit: StandardUnit.Count,
        Timestamp: timestamp,
      },
      {
        MetricName: 'BoundaryRetries',
        Value: current.boundaryRetries - previous.boundaryRetries,
        Unit: StandardUnit.Count,
        Timestamp: timestamp,
      },
      {
        MetricName: 'ServiceErrors',
        Value: current.serviceErrors - previous.serviceErrors,
        Unit: StandardUnit.Count,
        Timestamp: timestamp,
      },
    ];

    previous = current;

    await cloudwatch.send(new PutMetricDataCommand({
      Namespace: NAMESPACE,
      MetricData: metricData,
    }));

    console.log(`[CloudWatch] Published ${metricData.length} metrics: batches=${current.batchesSubmitted}, requests=${current.requestsSubmitted}, retries=${current.boundaryRetries}, errors=${current.serviceErrors}`);
  } catch (error) {
    // Metrics are not critical
    console.error('[CloudWatch] Failed to publish metrics:', error);
  }
}

/**
 * Start publishing metrics to CloudWatch at regular intervals
 */
export function startMetricsPublishing(): void {
  // Skip in development (no AWS credentials)
  if (serverConfig.nodeEnv !== 'production') {
    console.log('[CloudWatch] Metrics publishing disabled (not in production)');
    return;
  }

  console.log(`[CloudWatch] Starting metrics publishing every ${PUBLISH_INTERVAL_MS / 1000}s to namespace: ${NAMESPACE}`);

  publishInterval = setInterval(() => {
    void publishMetrics();
  }, PUBLISH_INTERVAL_MS);
}

/**
 * Stop publishing metrics and flush the last deltas (for graceful shutdown)
 */
export async function stopMetricsPublishing(): Promise<void> {
  if (publishInterval) {
    console.log('[CloudWatch] Stopping metrics publishing');
    clearInterval(publishInterval);
    publishInterval = null;
    await publishMetrics();
  }
}
