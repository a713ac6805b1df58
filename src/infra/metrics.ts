import type { NotificationDeliveryOutcome } from "../application/notification-dispatcher.js";
import type { WebhookOutcome } from "../domain/types.js";

type LabelSet = Record<string, string>;

function escapeLabelValue(value: string): string {
  return value.replace(/\\/g, "\\\\").replace(/\n/g, "\\n").replace(/"/g, '\\"');
}

function formatLabels(labels: LabelSet): string {
  const entries = Object.entries(labels);
  if (entries.length === 0) {
    return "";
  }
  return `{${entries.map(([name, value]) => `${name}="${escapeLabelValue(value)}"`).join(",")}}`;
}

abstract class LabeledMetric<TState> {
  protected readonly series = new Map<string, { labels: LabelSet; state: TState }>();

  constructor(
    protected readonly name: string,
    private readonly help: string,
    private readonly type: "counter" | "histogram",
    private readonly labelNames: string[],
  ) {}

  protected entry(labels: LabelSet, initial: () => TState): TState {
    const ordered: LabelSet = {};
    for (const labelName of this.labelNames) {
      ordered[labelName] = labels[labelName] ?? "";
    }
    const key = JSON.stringify(Object.values(ordered));
    let existing = this.series.get(key);
    if (!existing) {
      existing = { labels: ordered, state: initial() };
      this.series.set(key, existing);
    }
    return existing.state;
  }

  render(): string[] {
    const lines = [`# HELP ${this.name} ${this.help}`, `# TYPE ${this.name} ${this.type}`];
    for (const { labels, state } of this.series.values()) {
      lines.push(...this.renderSeries(labels, state));
    }
    return lines;
  }

  protected abstract renderSeries(labels: LabelSet, state: TState): string[];
}

class CounterMetric extends LabeledMetric<{ value: number }> {
  constructor(name: string, help: string, labelNames: string[]) {
    super(name, help, "counter", labelNames);
  }

  inc(labels: LabelSet, value = 1): void {
    this.entry(labels, () => ({ value: 0 })).value += value;
  }

  protected override renderSeries(labels: LabelSet, state: { value: number }): string[] {
    return [`${this.name}${formatLabels(labels)} ${state.value}`];
  }
}

interface HistogramState {
  count: number;
  sum: number;
  buckets: number[];
}

class HistogramMetric extends LabeledMetric<HistogramState> {
  constructor(name: string, help: string, labelNames: string[], private readonly bounds: number[]) {
    super(name, help, "histogram", labelNames);
  }

  observe(labels: LabelSet, value: number): void {
    const state = this.entry(labels, () => ({ count: 0, sum: 0, buckets: this.bounds.map(() => 0) }));
    state.count += 1;
    state.sum += value;
    this.bounds.forEach((bound, index) => {
      if (value <= bound) {
        state.buckets[index] = (state.buckets[index] ?? 0) + 1;
      }
    });
  }

  protected override renderSeries(labels: LabelSet, state: HistogramState): string[] {
    const lines = this.bounds.map(
      (bound, index) => `${this.name}_bucket${formatLabels({ ...labels, le: String(bound) })} ${state.buckets[index] ?? 0}`,
    );
    lines.push(`${this.name}_bucket${formatLabels({ ...labels, le: "+Inf" })} ${state.count}`);
    lines.push(`${this.name}_sum${formatLabels(labels)} ${state.sum}`);
    lines.push(`${this.name}_count${formatLabels(labels)} ${state.count}`);
    return lines;
  }
}

export class BrokerMetricsRegistry {
  private readonly httpRequests = new CounterMetric(
    "broker_http_requests_total",
    "Total number of HTTP requests handled by route, method, and status code.",
    ["method", "route", "status_code"],
  );
  private readonly httpDuration = new HistogramMetric(
    "broker_http_request_duration_seconds",
    "HTTP request duration in seconds by route and method.",
    ["method", "route"],
    [0.005, 0.01, 0.025, 0.05, 0.1, 0.25, 0.5, 1, 2, 5],
  );
  private readonly initializations = new CounterMetric(
    "broker_payment_initializations_total",
    "Payment initialization attempts by provider and outcome code.",
    ["provider", "outcome"],
  );
  private readonly webhooks = new CounterMetric(
    "broker_webhooks_total",
    "Provider webhooks by provider, outcome, and reason.",
    ["provider", "status", "reason"],
  );
  private readonly notifications = new CounterMetric(
    "broker_app_notifications_total",
    "Caller application notification deliveries by outcome.",
    ["outcome"],
  );

  recordHttpRequest(method: string, route: string, statusCode: number, durationSeconds: number): void {
    const normalizedMethod = method.toUpperCase();
    this.httpRequests.inc({ method: normalizedMethod, route, status_code: String(statusCode) });
    this.httpDuration.observe({ method: normalizedMethod, route }, durationSeconds);
  }

  /** `outcome` is "initialized" or the failure code. */
  recordInitialization(provider: string, outcome: string): void {
    this.initializations.inc({ provider, outcome });
  }

  recordWebhook(provider: string, outcome: WebhookOutcome): void {
    this.webhooks.inc({
      provider: provider.toLowerCase(),
      status: outcome.status,
      reason: outcome.status === "processed" ? "" : outcome.reason,
    });
  }

  recordNotification(outcome: NotificationDeliveryOutcome): void {
    this.notifications.inc({ outcome });
  }

  renderPrometheus(): string {
    const lines = [
      ...this.httpRequests.render(),
      ...this.httpDuration.render(),
      ...this.initializations.render(),
      ...this.webhooks.render(),
      ...this.notifications.render(),
    ];
    return `${lines.join("\n")}\n`;
  }
}
