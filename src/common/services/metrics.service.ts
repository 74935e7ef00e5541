import { Injectable } from '@nestjs/common';
import { LoggerService } from '../logger/logger.service';

export interface HistogramSummary {
  count: number;
  sum: number;
  avg: number;
  min: number;
  max: number;
}

export interface ValidationMetricsSummary {
  passed: number;
  failed: number;
  failedByStep: Record<string, number>;
  durationMs: HistogramSummary | null;
}

const HISTOGRAM_LIMIT = 1000;

@Injectable()
export class MetricsService {
  private counters: Map<string, number> = new Map();
  private histograms: Map<string, number[]> = new Map();

  constructor(private readonly logger: LoggerService) {}

  recordValidation(passed: boolean, step: string, durationMs: number): void {
    if (passed) {
      this.incrementCounter('validation.passed');
    } else {
      this.incrementCounter('validation.failed', 1, { step });
    }
    this.recordHistogram('validation.duration', durationMs);

    this.logger.debug('Recorded validation outcome', 'MetricsService', {
      passed,
      step,
      durationMs,
    });
  }

  incrementCounter(name: string, value: number = 1, tags?: Record<string, string>): void {
    const key = this.getMetricKey(name, tags);
    this.counters.set(key, (this.counters.get(key) || 0) + value);
  }

  getCounter(name: string, tags?: Record<string, string>): number {
    return this.counters.get(this.getMetricKey(name, tags)) || 0;
  }

  recordHistogram(name: string, value: number): void {
    const values = this.histograms.get(name) || [];
    values.push(value);

    // Keep only the most recent values
    if (values.length > HISTOGRAM_LIMIT) {
      values.shift();
    }

    this.histograms.set(name, values);
  }

  getHistogramSummary(name: string): HistogramSummary | null {
    const values = this.histograms.get(name);
    if (!values || values.length === 0) {
      return null;
    }

    const sum = values.reduce((total, value) => total + value, 0);
    return {
      count: values.length,
      sum,
      avg: sum / values.length,
      min: Math.min(...values),
      max: Math.max(...values),
    };
  }

  getValidationSummary(): ValidationMetricsSummary {
    const failedByStep: Record<string, number> = {};
    const prefix = 'validation.failed{';

    for (const [key, count] of this.counters) {
      if (!key.startsWith(prefix)) continue;
      const step = key.slice(prefix.length, -1).replace(/^step=/, '');
      failedByStep[step] = count;
    }

    return {
      passed: this.getCounter('validation.passed'),
      failed: Object.values(failedByStep).reduce((total, count) => total + count, 0),
      failedByStep,
      durationMs: this.getHistogramSummary('validation.duration'),
    };
  }

  reset(): void {
    this.counters.clear();
    this.histograms.clear();
  }

  private getMetricKey(name: string, tags?: Record<string, string>): string {
    if (!tags || Object.keys(tags).length === 0) {
      return name;
    }

    const tagString = Object.entries(tags)
      .sort(([a], [b]) => a.localeCompare(b))
      .map(([key, value]) => `${key}=${value}`)
      .join(',');

    return `${name}{${tagString}}`;
  }
}
