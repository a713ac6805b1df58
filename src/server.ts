import Fastify, { type FastifyInstance, type FastifyRequest } from "fastify";
import { Pool } from "pg";
import { GatewayRegistry } from "./application/gateway-registry.js";
import { AppNotificationDispatcher } from "./application/notification-dispatcher.js";
import { PaymentOrchestrator } from "./application/payment-orchestrator.js";
import type { FetchLike } from "./adapters/http/fetch.js";
import { HttpNotificationSender } from "./adapters/http/notification-sender.js";
import { InMemoryPaymentStore } from "./adapters/inmemory/payment-store.js";
import { PostgresPaymentStore } from "./adapters/postgres/payment-store.js";
import { PaystackClient } from "./adapters/providers/paystack/paystack-client.js";
import { PaystackGateway } from "./adapters/providers/paystack/paystack-gateway.js";
import { statusForFailure } from "./api/failure-status.js";
import { parseInitializePaymentInput } from "./api/validators.js";
import { AppError } from "./infra/app-error.js";
import { SystemClock, type ClockPort } from "./infra/clock.js";
import { loadRuntimeConfig, type RuntimeConfig } from "./infra/config.js";
import { makeLogger, type Logger } from "./infra/logger.js";
import { BrokerMetricsRegistry } from "./infra/metrics.js";
import type { NotificationSenderPort } from "./ports/notification-sender.js";
import type { PaymentGatewayPort } from "./ports/payment-gateway.js";
import type { PaymentStorePort } from "./ports/payment-store.js";

/** Collaborators that replace the configured ones, mostly for tests. */
export interface AppDependencies {
  logger?: Logger;
  clock?: ClockPort;
  store?: PaymentStorePort;
  gateways?: PaymentGatewayPort[];
  notificationSender?: NotificationSenderPort;
  fetch?: FetchLike;
}

const UNAUTHENTICATED_PREFIXES = ["/health/", "/api/webhooks/"];

function requireBearerApiKey(headers: FastifyRequest["headers"], validApiKeys: ReadonlySet<string>): void {
  const authorization = headers.authorization;
  if (typeof authorization !== "string" || !authorization.startsWith("Bearer ")) {
    throw new AppError(401, "MISSING_API_KEY", "Authorization header with Bearer API key is required.");
  }
  const token = authorization.slice("Bearer ".length).trim();
  if (!token || !validApiKeys.has(token)) {
    throw new AppError(401, "INVALID_API_KEY", "Invalid API key.");
  }
}

function readHeader(headers: FastifyRequest["headers"], name: string): string {
  const value = headers[name];
  if (Array.isArray(value)) {
    return value[0] ?? "";
  }
  return value ?? "";
}

function createStore(config: RuntimeConfig): PaymentStorePort {
  if (config.paymentBackend !== "postgres") {
    return new InMemoryPaymentStore();
  }
  if (!config.postgresUrl) {
    throw new AppError(500, "invalid_runtime_config", "Postgres payment backend requested without PostgreSQL.");
  }
  return new PostgresPaymentStore(new Pool({ connectionString: config.postgresUrl }));
}

function createGateways(config: RuntimeConfig, logger: Logger, fetchImpl?: FetchLike): PaymentGatewayPort[] {
  const client = new PaystackClient({
    baseUrl: config.paystack.baseUrl,
    secretKey: config.paystack.secretKey,
    timeoutMs: config.paystack.timeoutMs,
    ...(fetchImpl ? { fetch: fetchImpl } : {}),
  });
  return [new PaystackGateway(client, { secretKey: config.paystack.secretKey }, logger)];
}

export function buildApp(
  config: RuntimeConfig = loadRuntimeConfig(),
  dependencies: AppDependencies = {},
): FastifyInstance {
  const app = Fastify({ logger: false });
  const logger = dependencies.logger ?? makeLogger(config.logLevel);
  const metrics = new BrokerMetricsRegistry();
  const validApiKeys = new Set<string>(config.apiKeys);
  const requestStartedAt = new WeakMap<FastifyRequest, bigint>();
  const closeActions: Array<() => Promise<void>> = [];

  const clock = dependencies.clock ?? new SystemClock();
  const store = dependencies.store ?? createStore(config);
  closeActions.push(async () => {
    await store.close?.();
  });

  const gateways = new GatewayRegistry(
    dependencies.gateways ?? createGateways(config, logger, dependencies.fetch),
  );
  const notifier = new AppNotificationDispatcher(
    dependencies.notificationSender ?? new HttpNotificationSender(dependencies.fetch),
    clock,
    logger.child({ component: "notifications" }),
    {
      maxAttempts: config.notifications.maxAttempts,
      timeoutMs: config.notifications.timeoutMs,
      ...(config.notifications.signingSecret ? { signingSecret: config.notifications.signingSecret } : {}),
      onOutcome: (outcome) => metrics.recordNotification(outcome),
    },
  );
  // Runs before the store closes so in-flight notifications still see their payment.
  closeActions.push(() => notifier.drain());

  const orchestrator = new PaymentOrchestrator(
    store,
    gateways,
    notifier,
    clock,
    logger.child({ component: "orchestrator" }),
    { maxAmount: config.maxPaymentAmount },
  );

  app.get("/health/live", async (_, reply) => {
    return reply.status(200).send({ status: "ok" });
  });

  app.get("/health/ready", async (_, reply) => {
    try {
      await store.ping?.();
    } catch (error) {
      logger.warn({ err: error }, "Readiness check failed");
      return reply.status(503).send({ status: "unavailable" });
    }
    return reply.status(200).send({ status: "ready", providers: gateways.providers() });
  });

  app.addHook("onRequest", async (request, reply) => {
    requestStartedAt.set(request, process.hrtime.bigint());
    reply.header("X-Request-Id", request.id);
    if (UNAUTHENTICATED_PREFIXES.some((prefix) => request.url.startsWith(prefix))) {
      return;
    }
    if (config.metricsEnabled && request.url === "/metrics") {
      return;
    }
    requireBearerApiKey(request.headers, validApiKeys);
  });

  app.addHook("onResponse", async (request, reply) => {
    const startedAt = requestStartedAt.get(request);
    const durationSeconds = startedAt === undefined ? 0 : Number(process.hrtime.bigint() - startedAt) / 1e9;
    const route = request.routeOptions.url ?? "unmatched";
    logger.info(
      { requestId: request.id, method: request.method, route, statusCode: reply.statusCode, durationSeconds },
      "request completed",
    );
    if (config.metricsEnabled) {
      metrics.recordHttpRequest(request.method, route, reply.statusCode, durationSeconds);
    }
  });

  app.post("/api/payments/initialize", async (request, reply) => {
    const input = parseInitializePaymentInput(request.body);
    const result = await orchestrator.initializePayment(input);
    metrics.recordInitialization(input.provider, result.ok ? "initialized" : result.error.code);
    if (!result.ok) {
      return reply.status(statusForFailure(result.error)).send({
        error: result.error.message,
        errorCode: result.error.code,
      });
    }
    return reply.status(200).send(result.value);
  });

  // Webhook bodies stay raw: signatures cover the exact bytes received.
  void app.register(async (webhooks) => {
    webhooks.removeAllContentTypeParsers();
    webhooks.addContentTypeParser("*", { parseAs: "buffer" }, (_request, body, done) => {
      done(null, body);
    });

    webhooks.post<{ Params: { provider: string } }>("/api/webhooks/:provider", async (request, reply) => {
      const providerName = request.params.provider;
      const rawPayload = Buffer.isBuffer(request.body) ? request.body : Buffer.alloc(0);
      const gateway = gateways.findByName(providerName);
      const signature = gateway ? readHeader(request.headers, gateway.signatureHeader) : "";

      logger.info({ provider: providerName, length: rawPayload.length }, "Webhook received");
      const outcome = await orchestrator.handleWebhook(providerName, rawPayload, signature);
      metrics.recordWebhook(gateway?.provider ?? "unknown", outcome);

      // Acknowledged whatever the outcome; providers redeliver anything else.
      return reply.status(200).send({ received: true, processed: outcome.status === "processed" });
    });
  });

  if (config.metricsEnabled) {
    app.get("/metrics", async (_request, reply) => {
      return reply
        .header("Content-Type", "text/plain; version=0.0.4; charset=utf-8")
        .status(200)
        .send(metrics.renderPrometheus());
    });
  }

  app.setNotFoundHandler(async (_, reply) => {
    return reply.status(404).send({ error: "Route not found.", errorCode: "RESOURCE_NOT_FOUND" });
  });

  app.setErrorHandler(async (error, request, reply) => {
    if (error instanceof AppError) {
      return reply.status(error.statusCode).send({
        error: error.message,
        errorCode: error.code,
        requestId: request.id,
      });
    }
    if (typeof error.statusCode === "number" && error.statusCode >= 400 && error.statusCode < 500) {
      return reply.status(error.statusCode).send({
        error: error.message,
        errorCode: "INVALID_REQUEST_BODY",
        requestId: request.id,
      });
    }
    logger.error({ err: error, requestId: request.id }, "Unhandled error");
    return reply.status(500).send({
      error: "Unexpected error.",
      errorCode: "INTERNAL_SERVER_ERROR",
      requestId: request.id,
    });
  });

  app.addHook("onClose", async () => {
    for (const closeAction of [...closeActions].reverse()) {
      await closeAction();
    }
  });

  return app;
}
