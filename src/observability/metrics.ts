/**
 * Lightweight Prometheus-compatible metrics — no external dependencies
 *
 * Exposes /metrics in Prometheus text format:
 * - HTTP request latency histogram
 * - Transaction commit/rollback counters
 * - Mint, burn and membership counters
 * - Issuer count, block height and supply gauges
 */

import { NextFunction, Request, Response } from 'express';

interface Histogram {
  help: string;
  buckets: number[];
  counts: number[];  // One per bucket, cumulative counts are derived on render
  sum: number;
  count: number;
}

export class MetricsCollector {
  private counters: Map<string, { value: number; help: string }> = new Map();
  private gauges: Map<string, { value: number; help: string }> = new Map();
  private histograms: Map<string, Histogram> = new Map();

  constructor() {
    this.registerCounter('issuance_http_requests_total', 'Total HTTP requests');
    this.registerCounter('issuance_tx_committed_total', 'Transactions committed');
    this.registerCounter('issuance_tx_rolled_back_total', 'Transactions rolled back');
    this.registerCounter('issuance_mints_total', 'Successful mint operations');
    this.registerCounter('issuance_burns_total', 'Successful burn operations');
    this.registerCounter('issuance_authorizations_total', 'Issuer authorizations');
    this.registerCounter('issuance_deauthorizations_total', 'Issuer removals');

    this.registerGauge('issuance_issuers', 'Currently authorized issuers');
    this.registerGauge('issuance_block_height', 'Current block height');
    this.registerGauge('issuance_total_supply', 'Ledger total supply');
    this.registerGauge('issuance_uptime_seconds', 'Process uptime in seconds');

    this.registerHistogram('issuance_http_request_duration_seconds', 'HTTP request duration', [
      0.005, 0.01, 0.025, 0.05, 0.1, 0.25, 0.5, 1, 2.5,
    ]);
  }

  registerCounter(name: string, help: string): void {
    if (!this.counters.has(name)) {
      this.counters.set(name, { value: 0, help });
    }
  }

  registerGauge(name: string, help: string): void {
    if (!this.gauges.has(name)) {
      this.gauges.set(name, { value: 0, help });
    }
  }

  registerHistogram(name: string, help: string, buckets: number[]): void {
    if (!this.histograms.has(name)) {
      this.histograms.set(name, {
        help,
        buckets: [...buckets].sort((a, b) => a - b),
        counts: new Array<number>(buckets.length).fill(0),
        sum: 0,
        count: 0,
      });
    }
  }

  incCounter(name: string, amount: number = 1): void {
    const counter = this.counters.get(name);
    if (counter) counter.value += amount;
  }

  getCounter(name: string): number {
    return this.counters.get(name)?.value ?? 0;
  }

  setGauge(name: string, value: number): void {
    const gauge = this.gauges.get(name);
    if (gauge) gauge.value = value;
  }

  observeHistogram(name: string, value: number): void {
    const hist = this.histograms.get(name);
    if (!hist) return;
    hist.sum += value;
    hist.count++;
    const idx = hist.buckets.findIndex((upper) => value <= upper);
    if (idx >= 0) hist.counts[idx]++;
  }

  /**
   * Express middleware to track request latency and count
   */
  httpMiddleware() {
    return (_req: Request, res: Response, next: NextFunction): void => {
      const start = process.hrtime.bigint();
      this.incCounter('issuance_http_requests_total');

      res.on('finish', () => {
        const durationNs = Number(process.hrtime.bigint() - start);
        this.observeHistogram('issuance_http_request_duration_seconds', durationNs / 1e9);
      });

      next();
    };
  }

  /**
   * Render all metrics in Prometheus exposition format
   */
  render(): string {
    const lines: string[] = [];

    for (const [name, c] of this.counters) {
      lines.push(`# HELP ${name} ${c.help}`);
      lines.push(`# TYPE ${name} counter`);
      lines.push(`${name} ${c.value}`);
    }

    this.setGauge('issuance_uptime_seconds', Math.round(process.uptime()));

    for (const [name, g] of this.gauges) {
      lines.push(`# HELP ${name} ${g.help}`);
      lines.push(`# TYPE ${name} gauge`);
      lines.push(`${name} ${g.value}`);
    }

    for (const [name, h] of this.histograms) {
      lines.push(`# HELP ${name} ${h.help}`);
      lines.push(`# TYPE ${name} histogram`);
      let cumulative = 0;
      h.buckets.forEach((upper, i) => {
        cumulative += h.counts[i];
        lines.push(`${name}_bucket{le="${upper}"} ${cumulative}`);
      });
      lines.push(`${name}_bucket{le="+Inf"} ${h.count}`);
      lines.push(`${name}_sum ${h.sum}`);
      lines.push(`${name}_count ${h.count}`);
    }

    return lines.join('\n') + '\n';
  }
}

// Singleton
export const metrics = new MetricsCollector();
