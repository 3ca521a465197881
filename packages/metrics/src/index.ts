import { collectDefaultMetrics, Counter, Gauge, Histogram, Registry } from 'prom-client';

export type { Counter, Gauge, Histogram } from 'prom-client';

const registry = new Registry();
collectDefaultMetrics({ register: registry });

export type CounterOpts = {
  name: string;
  help: string;
  labelNames?: string[];
};

export function registerCounter(opts: CounterOpts): Counter<string> {
  return new Counter({ ...opts, registers: [registry] });
}

export type GaugeOpts = CounterOpts;

export function registerGauge(opts: GaugeOpts): Gauge<string> {
  return new Gauge({ ...opts, registers: [registry] });
}

export type HistogramOpts = CounterOpts & {
  buckets?: number[];
};

export function registerHistogram(opts: HistogramOpts): Histogram<string> {
  return new Histogram({ ...opts, registers: [registry] });
}

export function getRegistry(): Registry {
  return registry;
}
