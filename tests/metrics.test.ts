import { describe, expect, it } from "vitest";
import { statusForFailure } from "../src/api/failure-status.js";
import { BrokerMetricsRegistry } from "../src/infra/metrics.js";

describe("BrokerMetricsRegistry", () => {
  it("renders counters and histograms in Prometheus text format", () => {
    const metrics = new BrokerMetricsRegistry();
    metrics.recordHttpRequest("get", "/health/live", 200, 0.02);
    metrics.recordHttpRequest("GET", "/health/live", 200, 0.3);
    metrics.recordInitialization("paystack", "initialized");
    metrics.recordWebhook("PayStack", { status: "ignored", reason: "already_processed", reference: "PB_x" });
    metrics.recordNotification("delivered");
    metrics.recordNotification("delivered");

    const lines = metrics.renderPrometheus().split("\n");

    expect(lines).toContain('broker_http_requests_total{method="GET",route="/health/live",status_code="200"} 2');
    expect(lines).toContain('broker_http_request_duration_seconds_bucket{method="GET",route="/health/live",le="0.01"} 0');
    expect(lines).toContain('broker_http_request_duration_seconds_bucket{method="GET",route="/health/live",le="0.025"} 1');
    expect(lines).toContain('broker_http_request_duration_seconds_bucket{method="GET",route="/health/live",le="0.5"} 2');
    expect(lines).toContain('broker_http_request_duration_seconds_bucket{method="GET",route="/health/live",le="+Inf"} 2');
    expect(lines).toContain('broker_http_request_duration_seconds_count{method="GET",route="/health/live"} 2');
    expect(lines).toContain('broker_payment_initializations_total{provider="paystack",outcome="initialized"} 1');
    expect(lines).toContain('broker_webhooks_total{provider="paystack",status="ignored",reason="already_processed"} 1');
    expect(lines).toContain('broker_app_notifications_total{outcome="delivered"} 2');
    expect(lines).toContain("# TYPE broker_app_notifications_total counter");
  });

  it("escapes label values", () => {
    const metrics = new BrokerMetricsRegistry();
    metrics.recordInitialization('pay"stack', "initialized");

    expect(metrics.renderPrometheus()).toContain(
      'broker_payment_initializations_total{provider="pay\\"stack",outcome="initialized"} 1',
    );
  });
});

describe("statusForFailure", () => {
  it.each([
    ["AMOUNT_NOT_POSITIVE", 422],
    ["INVALID_EMAIL_FORMAT", 422],
    ["UNSUPPORTED_PROVIDER", 422],
    ["ALREADY_PROCESSED", 409],
    ["DUPLICATE_KEY", 409],
    ["TIMEOUT_ERROR", 504],
    ["NETWORK_ERROR", 502],
    ["PROVIDER_AUTH_ERROR", 502],
    ["MALFORMED_PROVIDER_RESPONSE", 502],
    ["DATABASE_ERROR", 500],
    ["INTERNAL_ERROR", 500],
  ])("maps %s to %i", (code, status) => {
    expect(statusForFailure({ code, message: "test" })).toBe(status);
  });
});
