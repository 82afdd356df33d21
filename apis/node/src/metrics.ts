import type { Attributes } from "@opentelemetry/api";
import {
  AggregationTemporality,
  DataPointType,
  MetricReader,
  type ResourceMetrics,
} from "@opentelemetry/sdk-metrics";

export type MetricValue = number | { count: number; sum: number };

function seriesName(name: string, attributes: Attributes): string {
  const labels = Object.entries(attributes)
    .filter(([, value]) => value !== undefined)
    .map(([key, value]) => `${key}="${String(value)}"`);
  return labels.length > 0 ? `${name}{${labels.join(",")}}` : name;
}

// One entry per series, named the way Prometheus prints them.
export function flattenMetrics(
  resourceMetrics: ResourceMetrics,
): Record<string, MetricValue> {
  const out: Record<string, MetricValue> = {};
  for (const scope of resourceMetrics.scopeMetrics) {
    for (const metric of scope.metrics) {
      const name = metric.descriptor.name;
      switch (metric.dataPointType) {
        case DataPointType.SUM:
        case DataPointType.GAUGE:
          for (const point of metric.dataPoints) {
            out[seriesName(name, point.attributes)] = point.value;
          }
          break;
        case DataPointType.HISTOGRAM:
        case DataPointType.EXPONENTIAL_HISTOGRAM:
          for (const point of metric.dataPoints) {
            out[seriesName(name, point.attributes)] = {
              count: point.value.count,
              sum: point.value.sum ?? 0,
            };
          }
          break;
      }
    }
  }
  return out;
}

/**
 * Collects on demand instead of on a timer, so the HTTP server can answer
 * `GET /metrics` with current values.
 */
export class SnapshotMetricReader extends MetricReader {
  constructor() {
    super({
      aggregationTemporalitySelector: (_instrumentType) =>
        AggregationTemporality.CUMULATIVE,
    });
  }

  async snapshot(): Promise<Record<string, MetricValue>> {
    const { resourceMetrics, errors } = await this.collect();
    for (const error of errors) {
      console.warn("Error while collecting metrics", error);
    }
    return flattenMetrics(resourceMetrics);
  }

  override async onForceFlush(): Promise<void> {
    // nothing is buffered
  }

  override async onShutdown(): Promise<void> {
    // do nothing
  }
}
