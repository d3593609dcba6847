import type { ProviderName } from "../domain/types.js";

type LabelSet = Record<string, string>;

function escapeLabelValue(value: string): string {
  return value.replace(/\\/g, "\\\\").replace(/\n/g, "\\n").replace(/"/g, '\\"');
}

function formatLabels(labelNames: readonly string[], values: readonly string[], extra: LabelSet = {}): string {
  const pairs = labelNames.map((name, index) => [name, values[index] ?? ""] as const);
  const all = [...pairs, ...Object.entries(extra)];
  if (all.length === 0) {
    return "";
  }
  return `{${all.map(([name, value]) => `${name}="${escapeLabelValue(value)}"`).join(",")}}`;
}

abstract class Metric<TSample> {
  protected readonly samples = new Map<string, { values: string[]; sample: TSample }>();

  constructor(
    protected readonly name: string,
    private readonly help: string,
    private readonly type: "counter" | "histogram",
    protected readonly labelNames: readonly string[],
  ) {}

  protected sampleFor(labels: LabelSet, create: () => TSample): TSample {
    const values = this.labelNames.map((name) => labels[name] ?? "");
    const key = JSON.stringify(values);
    const existing = this.samples.get(key);
    if (existing) {
      return existing.sample;
    }
    const sample = create();
    this.samples.set(key, { values, sample });
    return sample;
  }

  render(): string[] {
    const lines = [`# HELP ${this.name} ${this.help}`, `# TYPE ${this.name} ${this.type}`];
    for (const { values, sample } of this.samples.values()) {
      lines.push(...this.renderSample(values, sample));
    }
    return lines;
  }

  protected abstract renderSample(values: string[], sample: TSample): string[];
}

class Counter extends Metric<{ total: number }> {
  constructor(name: string, help: string, labelNames: readonly string[]) {
    super(name, help, "counter", labelNames);
  }

  inc(labels: LabelSet, value = 1): void {
    this.sampleFor(labels, () => ({ total: 0 })).total += value;
  }

  protected renderSample(values: string[], sample: { total: number }): string[] {
    return [`${this.name}${formatLabels(this.labelNames, values)} ${sample.total}`];
  }
}

interface HistogramSample {
  count: number;
  sum: number;
  buckets: number[];
}

class Histogram extends Metric<HistogramSample> {
  constructor(
    name: string,
    help: string,
    labelNames: readonly string[],
    private readonly bounds: readonly number[],
  ) {
    super(name, help, "histogram", labelNames);
  }

  observe(labels: LabelSet, value: number): void {
    const sample = this.sampleFor(labels, () => ({ count: 0, sum: 0, buckets: this.bounds.map(() => 0) }));
    sample.count += 1;
    sample.sum += value;
    this.bounds.forEach((bound, index) => {
      if (value <= bound) {
        sample.buckets[index] = (sample.buckets[index] ?? 0) + 1;
      }
    });
  }

  protected renderSample(values: string[], sample: HistogramSample): string[] {
    const lines = this.bounds.map(
      (bound, index) =>
        `${this.name}_bucket${formatLabels(this.labelNames, values, { le: String(bound) })} ${sample.buckets[index] ?? 0}`,
    );
    lines.push(`${this.name}_bucket${formatLabels(this.labelNames, values, { le: "+Inf" })} ${sample.count}`);
    lines.push(`${this.name}_sum${formatLabels(this.labelNames, values)} ${sample.sum}`);
    lines.push(`${this.name}_count${formatLabels(this.labelNames, values)} ${sample.count}`);
    return lines;
  }
}

export type ProviderCallOutcomeLabel = "succeeded" | "declined" | "failed" | "unsupported" | "timeout" | "error";
export type WebhookOutcomeLabel = "applied" | "noop" | "deferred" | "unmatched" | "ignored" | "rejected";

export class ProcessorMetricsRegistry {
  private readonly httpRequests = new Counter(
    "ppc_http_requests_total",
    "HTTP requests handled, by route, method and status code.",
    ["method", "route", "status_code"],
  );
  private readonly httpDuration = new Histogram(
    "ppc_http_request_duration_seconds",
    "HTTP request duration in seconds, by route and method.",
    ["method", "route"],
    [0.005, 0.01, 0.025, 0.05, 0.1, 0.25, 0.5, 1, 2, 5],
  );
  private readonly providerCalls = new Counter(
    "ppc_provider_calls_total",
    "Outbound provider calls, by provider, operation and outcome.",
    ["provider", "operation", "outcome"],
  );
  private readonly circuitRejections = new Counter(
    "ppc_circuit_rejections_total",
    "Calls refused because the provider circuit was open.",
    ["provider"],
  );
  private readonly webhooks = new Counter(
    "ppc_webhooks_total",
    "Inbound provider webhook events, by provider and outcome.",
    ["provider", "outcome"],
  );

  recordHttpRequest(method: string, route: string, statusCode: number, durationSeconds: number): void {
    const verb = method.toUpperCase();
    this.httpRequests.inc({ method: verb, route, status_code: String(statusCode) });
    this.httpDuration.observe({ method: verb, route }, durationSeconds);
  }

  recordProviderCall(provider: ProviderName, operation: string, outcome: ProviderCallOutcomeLabel): void {
    this.providerCalls.inc({ provider, operation, outcome });
  }

  recordCircuitRejection(provider: ProviderName): void {
    this.circuitRejections.inc({ provider });
  }

  recordWebhook(provider: ProviderName, outcome: WebhookOutcomeLabel): void {
    this.webhooks.inc({ provider, outcome });
  }

  renderPrometheus(): string {
    const lines = [
      ...this.httpRequests.render(),
      ...this.httpDuration.render(),
      ...this.providerCalls.render(),
      ...this.circuitRejections.render(),
      ...this.webhooks.render(),
    ];
    return `${lines.join("\n")}\n`;
  }
}
