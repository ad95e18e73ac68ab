import type { EntityId } from '../../lib/ids/entity-id';
import type { Metric } from './metric.definition';

/** Summary of the metrics filed under one entity, entity type or tag. */
export interface MetricStat {
  entityId?: EntityId;
  entityType?: string;
  tag?: string;
  /** createdAt of the oldest and newest metric counted. */
  fromTime: string;
  toTime: string;
  count: number;
  sum: number;
  min: number;
  max: number;
  mean: number;
  median: number;
  /** Population standard deviation. */
  stdDev: number;
}

export type MetricStatSubject = Pick<MetricStat, 'entityId' | 'entityType' | 'tag'>;

/** Undefined for an empty list. */
export function calculateStats(
  metrics: ReadonlyArray<Metric>,
  subject: MetricStatSubject = {},
): MetricStat | undefined {
  if (metrics.length === 0) return undefined;
  const values = metrics.map((m) => m.value).sort((a, b) => a - b);
  const times = metrics.map((m) => m.createdAt).sort();
  const count = values.length;
  const sum = values.reduce((acc, v) => acc + v, 0);
  const mean = sum / count;
  const mid = Math.floor(count / 2);
  const median = count % 2 === 0 ? (values[mid - 1] + values[mid]) / 2 : values[mid];
  const variance = values.reduce((acc, v) => acc + (v - mean) ** 2, 0) / count;
  return {
    ...subject,
    fromTime: times[0],
    toTime: times[times.length - 1],
    count,
    sum,
    min: values[0],
    max: values[count - 1],
    mean,
    median,
    stdDev: Math.sqrt(variance),
  };
}
