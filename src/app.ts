import fastify from "fastify";
import path from "node:path";
import { env } from "./config/env";
import { sendCaughtError } from "./http/api-error";
import { PluginCallbackAdapter } from "./modules/plugin/callback-adapter";
import { pluginRoutes } from "./modules/plugin/routes";
import { type DeviceStatusCache, deviceStatusCache } from "./services/device-status-cache";
import { metricsService } from "./services/metrics-service";
import { PluginError } from "./services/plugin-error";
import { type FetchLike, RemotePlatformClient } from "./services/remote-platform-client";
import type { DeviceStatusPublisher } from "./services/status-publisher";

export type AppDependencies = {
  statusPublisher: DeviceStatusPublisher;
  cache?: DeviceStatusCache;
  fetchImpl?: FetchLike;
  formAssetDir?: string;
  logger?: boolean;
};

export function buildApp(deps: AppDependencies) {
  const app = fastify({
    logger: deps.logger ?? { level: env.LOG_LEVEL },
    requestIdHeader: "x-request-id",
    requestIdLogLabel: "request_id",
    trustProxy: env.TRUST_PROXY
  });

  const cache = deps.cache ?? deviceStatusCache;
  const callbacks = new PluginCallbackAdapter({
    logger: app.log,
    cache,
    statusPublisher: deps.statusPublisher,
    formAssetDir: deps.formAssetDir ?? path.resolve(process.cwd(), env.FORM_ASSET_DIR),
    remoteClient: new RemotePlatformClient({
      timeoutMs: env.REMOTE_TIMEOUT_MS,
      fetchImpl: deps.fetchImpl,
      logger: app.log
    })
  });

  // Framework-level failures (unparsable bodies, oversized payloads) still answer in the host envelope.
  app.setErrorHandler((error, request, reply) => {
    const statusCode = error.statusCode ?? 500;
    if (statusCode >= 400 && statusCode < 500) {
      request.log.warn({ err: error }, "request_rejected");
      const unparsable =
        error instanceof SyntaxError || (typeof error.code === "string" && error.code.startsWith("FST_ERR_CTP"));
      const rejection = unparsable
        ? new PluginError(statusCode, "decode_error", "Request body could not be parsed.", { reason: error.message })
        : new PluginError(statusCode, "validation_error", "Invalid request.", { reason: error.message });
      return sendCaughtError(reply, rejection);
    }

    request.log.error({ err: error }, "request_failed");
    return sendCaughtError(reply, error);
  });

  app.get("/health", async () => {
    return {
      status: "ok",
      uptime_seconds: process.uptime(),
      mqtt_connected: deps.statusPublisher.isConnected(),
      cached_devices: cache.size(),
      now: new Date().toISOString()
    };
  });

  app.get("/metrics", async (_request, reply) => {
    const uptime = process.uptime().toFixed(3);
    reply.type("text/plain; version=0.0.4");
    return [
      "# HELP device_adapter_uptime_seconds Process uptime in seconds.",
      "# TYPE device_adapter_uptime_seconds gauge",
      `device_adapter_uptime_seconds ${uptime}`,
      "# HELP device_adapter_cached_devices Devices held in the status cache.",
      "# TYPE device_adapter_cached_devices gauge",
      `device_adapter_cached_devices ${cache.size()}`,
      "# HELP device_adapter_mqtt_connected Whether the status publisher is connected.",
      "# TYPE device_adapter_mqtt_connected gauge",
      `device_adapter_mqtt_connected ${deps.statusPublisher.isConnected() ? 1 : 0}`,
      metricsService.renderPrometheus()
    ].join("\n");
  });

  app.register(pluginRoutes, { prefix: "/api/v1", callbacks });

  app.addHook("onReady", async () => {
    await deps.statusPublisher.start(app.log);
  });

  app.addHook("onClose", async () => {
    await deps.statusPublisher.stop();
  });

  return app;
}
