/**
 * Tiny Prometheus-style metrics registry with labeled series.
 * No deps; rendered on demand by exportMetrics().
 */

type Labels = Record<string, string>;

function formatLabels(labels: Labels): string {
  const parts = Object.entries(labels)
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
    .map(([k, v]) => `${k}="${v}"`);
  return parts.length ? `{${parts.join(',')}}` : '';
}

/** One series per distinct label set, in first-seen order. */
abstract class LabeledMetric<S> {
  private readonly series = new Map<string, { labels: Labels; state: S }>();

  protected constructor(
    protected readonly name: string,
    private readonly help: string,
    private readonly type: 'counter' | 'histogram',
  ) {}

  protected abstract fresh(): S;
  protected abstract lines(state: S, labels: Labels): string[];

  // rendered labels double as the series key
  protected seriesFor(labels: Labels): S {
    const key = formatLabels(labels);
    let s = this.series.get(key);
    if (!s) {
      s = { labels, state: this.fresh() };
      this.series.set(key, s);
    }
    return s.state;
  }

  protected peek(labels: Labels): S | undefined {
    return this.series.get(formatLabels(labels))?.state;
  }

  export(): string {
    const out = [`# HELP ${this.name} ${this.help}`, `# TYPE ${this.name} ${this.type}`];
    for (const { labels, state } of this.series.values()) out.push(...this.lines(state, labels));
    return out.join('\n') + '\n';
  }

  protected line(suffix: string, labels: Labels, value: number): string {
    return `${this.name}${suffix}${formatLabels(labels)} ${value}`;
  }
}

interface HistogramState { counts: number[]; sum: number; count: number }

export class LabeledHistogram extends LabeledMetric<HistogramState> {
  // seconds; timers dispatched by a healthy loop land in the first few buckets
  private readonly bounds: number[];

  constructor(name: string, help: string, buckets?: number[]) {
    super(name, help, 'histogram');
    this.bounds = buckets ?? [0.001, 0.005, 0.01, 0.025, 0.05, 0.1, 0.25, 0.5, 1, 2.5, 5];
  }

  observe(value: number, labels: Labels = {}): void {
    const s = this.seriesFor(labels);
    const slot = this.bounds.findIndex((le) => value <= le);
    s.counts[slot === -1 ? this.bounds.length : slot]++;
    s.sum += value;
    s.count++;
  }

  protected fresh(): HistogramState {
    return { counts: new Array<number>(this.bounds.length + 1).fill(0), sum: 0, count: 0 };
  }

  protected lines({ counts, sum, count }: HistogramState, labels: Labels): string[] {
    let cum = 0;
    const out = counts.map((n, i) => {
      cum += n;
      const le = i < this.bounds.length ? String(this.bounds[i]) : '+Inf';
      return this.line('_bucket', { ...labels, le }, cum);
    });
    out.push(this.line('_sum', labels, sum), this.line('_count', labels, count));
    return out;
  }
}

export class LabeledCounter extends LabeledMetric<{ value: number }> {
  constructor(name: string, help: string) {
    super(name, help, 'counter');
  }

  inc(labels: Labels = {}, by = 1): void {
    this.seriesFor(labels).value += by;
  }

  get(labels: Labels = {}): number {
    return this.peek(labels)?.value ?? 0;
  }

  protected fresh(): { value: number } { return { value: 0 }; }

  protected lines({ value }: { value: number }, labels: Labels): string[] {
    return [this.line('', labels, value)];
  }
}

export const metrics = {
  fireLateness: new LabeledHistogram('timerqueue_fire_lateness_seconds', 'Time between a timer deadline and its dispatch in seconds'),
  outcomes: new LabeledCounter('timerqueue_timers_total', 'Timers completed, by outcome'),
};

export function exportMetrics(): string {
  return metrics.fireLateness.export() + metrics.outcomes.export();
}
