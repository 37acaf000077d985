/**
 * CloudWatch Metrics Utilities
 *
 * Provides functions to emit custom CloudWatch metrics for draft commits,
 * season transitions and store throttling.
 */

import { CloudWatchClient, PutMetricDataCommand, MetricDatum } from '@aws-sdk/client-cloudwatch';
import { loadEnvironmentConfig } from '../config/environment';

/**
 * CloudWatch client instance
 * Reused across Lambda invocations for connection pooling
 */
const cloudWatchClient = new CloudWatchClient({
  region: loadEnvironmentConfig().awsRegion,
});

/**
 * Namespace for custom metrics
 */
const METRIC_NAMESPACE = 'Deadpool/Engine';

/**
 * Metric names
 */
export enum MetricName {
  DRAFT_COMMIT_LATENCY = 'DraftCommitLatency',
  SEASON_TRANSITION_DURATION = 'SeasonTransitionDuration',
  STORE_THROTTLE = 'StoreThrottle',
}

/**
 * Metric units
 */
export enum MetricUnit {
  MILLISECONDS = 'Milliseconds',
  COUNT = 'Count',
}

/**
 * Metric dimensions for filtering and grouping
 */
export interface MetricDimensions {
  operation_type?: string;
  outcome?: string;
  year?: string;
  [key: string]: string | undefined;
}

/**
 * Emit a custom CloudWatch metric
 *
 * Failures are logged and swallowed; metrics never break the caller.
 */
export async function emitMetric(
  metricName: MetricName,
  value: number,
  unit: MetricUnit,
  dimensions?: MetricDimensions
): Promise<void> {
  try {
    const metricData: MetricDatum = {
      MetricName: metricName,
      Value: value,
      Unit: unit,
      Timestamp: new Date(),
    };

    if (dimensions) {
      metricData.Dimensions = Object.entries(dimensions).flatMap(([name, dimensionValue]) =>
        dimensionValue === undefined ? [] : [{ Name: name, Value: dimensionValue }]
      );
    }

    await cloudWatchClient.send(
      new PutMetricDataCommand({
        Namespace: METRIC_NAMESPACE,
        MetricData: [metricData],
      })
    );
  } catch (error) {
    console.error('Failed to emit CloudWatch metric', {
      metricName,
      value,
      unit,
      dimensions,
      error: error instanceof Error ? error.message : 'Unknown error',
    });
  }
}

/**
 * Emit draft commit latency metric, dimensioned by outcome
 */
export async function emitDraftCommitLatency(
  year: number,
  outcome: string,
  latencyMs: number
): Promise<void> {
  await emitMetric(MetricName.DRAFT_COMMIT_LATENCY, latencyMs, MetricUnit.MILLISECONDS, {
    year: String(year),
    outcome,
    operation_type: 'draft_commit',
  });
}

/**
 * Emit season transition duration metric
 */
export async function emitSeasonTransitionDuration(
  fromYear: number,
  toYear: number,
  dryRun: boolean,
  durationMs: number
): Promise<void> {
  await emitMetric(MetricName.SEASON_TRANSITION_DURATION, durationMs, MetricUnit.MILLISECONDS, {
    transition: `${fromYear}_TO_${toYear}`,
    dry_run: String(dryRun),
    operation_type: 'season_transition',
  });
}

/**
 * Emit a store throttle event after the SDK gave up retrying
 */
export async function emitStoreThrottle(operation: string): Promise<void> {
  await emitMetric(MetricName.STORE_THROTTLE, 1, MetricUnit.COUNT, {
    operation_type: operation,
  });
}
