import { Registry, Counter, Histogram, LabelValues, MetricValue } from 'prom-client';
import { KeySource } from '../../types/dto.js';

export interface MetricsSnapshot {
  segmentsCompleted: number;
  segmentsFailed: number;
  bytesWritten: number;
  keyResolutions: Partial<Record<KeySource, number>>;
  runs: { success: number; error: number };
  timestamp: string;
}

function sumValues<T extends string>(
  values: MetricValue<T>[],
  matches: (labels: LabelValues<T>) => boolean = () => true,
): number {
  return values
    .filter(v => matches(v.labels))
    .reduce((sum, v) => sum + v.value, 0);
}

/**
 * Métricas de una descarga. Cada instancia tiene su propio registro, de modo
 * que dos ejecuciones (o dos tests) no comparten contadores.
 */
export class DownloadMetrics {
  public readonly registry = new Registry();

  private readonly segmentsProcessed = new Counter({
    name: 'segments_processed_total',
    help: 'Total number of processed segments',
    labelNames: ['status'] as const,
    registers: [this.registry],
  });

  private readonly segmentBytes = new Counter({
    name: 'segment_bytes_total',
    help: 'Total number of bytes appended to the output',
    registers: [this.registry],
  });

  private readonly segmentDuration = new Histogram({
    name: 'segment_duration_seconds',
    help: 'Fetch, decrypt and append duration per segment in seconds',
    labelNames: ['encrypted'] as const,
    buckets: [0.05, 0.1, 0.25, 0.5, 1, 2, 5, 10, 30],
    registers: [this.registry],
  });

  private readonly keyResolutions = new Counter({
    name: 'key_resolutions_total',
    help: 'Total number of resolved decryption keys by source',
    labelNames: ['source'] as const,
    registers: [this.registry],
  });

  private readonly downloadRuns = new Counter({
    name: 'download_runs_total',
    help: 'Total number of download runs',
    labelNames: ['status'] as const,
    registers: [this.registry],
  });

  recordSegment(status: 'completed' | 'failed', bytes: number, durationMs: number, encrypted: boolean): void {
    this.segmentsProcessed.inc({ status });
    if (bytes > 0) {
      this.segmentBytes.inc(bytes);
    }
    this.segmentDuration.observe({ encrypted: encrypted.toString() }, durationMs / 1000);
  }

  recordKeyResolution(source: KeySource): void {
    this.keyResolutions.inc({ source });
  }

  recordRun(status: 'success' | 'error'): void {
    this.downloadRuns.inc({ status });
  }

  async getMetrics(): Promise<string> {
    return this.registry.metrics();
  }

  async getSnapshot(): Promise<MetricsSnapshot> {
    const [segments, bytes, keys, runs] = await Promise.all([
      this.segmentsProcessed.get(),
      this.segmentBytes.get(),
      this.keyResolutions.get(),
      this.downloadRuns.get(),
    ]);

    const keyResolutions: Partial<Record<KeySource, number>> = {};
    for (const value of keys.values) {
      const source = value.labels['source'];
      if (source === 'override' || source === 'cache' || source === 'cache-absolute' || source === 'network') {
        keyResolutions[source] = (keyResolutions[source] ?? 0) + value.value;
      }
    }

    return {
      segmentsCompleted: sumValues(segments.values, labels => labels.status === 'completed'),
      segmentsFailed: sumValues(segments.values, labels => labels.status === 'failed'),
      bytesWritten: sumValues(bytes.values),
      keyResolutions,
      runs: {
        success: sumValues(runs.values, labels => labels.status === 'success'),
        error: sumValues(runs.values, labels => labels.status === 'error'),
      },
      timestamp: new Date().toISOString(),
    };
  }
}
