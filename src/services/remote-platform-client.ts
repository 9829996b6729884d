import { z } from "zod";
import type { LoggerLike } from "../utils/logger";
import { type MetricsService, metricsService } from "./metrics-service";
import { PluginError } from "./plugin-error";
import type { Credential } from "./voucher-codec";

export type FetchLike = (url: string, init: RequestInit) => Promise<Response>;

/**
 * Fields forwarded to `/device/list` exactly as the host sent them.
 */
export type DeviceListFilter = {
  voucher: string;
  service_identifier: string;
  page: number;
  page_size: number;
};

export type RemoteDeviceItem = {
  device_name: string;
  device_number: string;
  description: string;
};

export type RemoteDeviceList = {
  total: number;
  list: RemoteDeviceItem[];
};

export type RemoteDeviceDetail = {
  device_name: string;
  device_number: string;
  device_description: string;
};

type RemoteOperation = "list_devices" | "get_device_detail";

type RemoteHttpRequest = {
  operation: RemoteOperation;
  url: string;
  headers: Record<string, string>;
  body: string;
  logContext: Record<string, unknown>;
};

type RemoteEnvelope = {
  code: number;
  msg: string;
};

const remoteString = z
  .string()
  .nullish()
  .transform((value) => value ?? "");

const remoteCode = z.number().int().optional().default(0);

const deviceListResponseSchema = z.object({
  code: remoteCode,
  msg: remoteString,
  data: z
    .object({
      total: z
        .number()
        .int()
        .nullish()
        .transform((value) => value ?? 0),
      list: z
        .array(
          z.object({
            device_name: remoteString,
            device_number: remoteString,
            description: remoteString
          })
        )
        .nullish()
        .transform((value) => value ?? [])
    })
    .nullish()
});

const deviceDetailResponseSchema = z.object({
  code: remoteCode,
  msg: remoteString,
  data: z
    .object({
      device_name: remoteString,
      device_number: remoteString,
      device_description: remoteString
    })
    .nullish()
});

function describeFailure(error: unknown, timeoutMs: number): string {
  // AbortSignal.timeout rejects with a DOMException named TimeoutError.
  if (typeof error === "object" && error !== null && "name" in error && error.name === "TimeoutError") {
    return `timed out after ${timeoutMs}ms`;
  }
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

/**
 * Stateless client for the third-party device platform. Each call is scoped by
 * the credential it is given, runs once under a timeout and either resolves
 * with a typed result or rejects with a classified {@link PluginError}.
 */
export class RemotePlatformClient {
  private readonly timeoutMs: number;
  private readonly fetchImpl: FetchLike;
  private readonly logger: LoggerLike | null;
  private readonly metrics: MetricsService;

  constructor(options: {
    timeoutMs: number;
    fetchImpl?: FetchLike;
    logger?: LoggerLike;
    metrics?: MetricsService;
  }) {
    this.timeoutMs = options.timeoutMs;
    this.fetchImpl = options.fetchImpl ?? ((url, init) => fetch(url, init));
    this.logger = options.logger ?? null;
    this.metrics = options.metrics ?? metricsService;
  }

  async listDevices(credential: Credential, filter: DeviceListFilter): Promise<RemoteDeviceList> {
    const response = await this.execute(
      {
        operation: "list_devices",
        url: `${credential.remoteBaseUrl}/device/list`,
        headers: {
          "Content-Type": "application/json",
          "x-token": credential.secret
        },
        body: JSON.stringify({
          voucher: filter.voucher,
          service_identifier: filter.service_identifier,
          page: filter.page,
          page_size: filter.page_size
        }),
        logContext: {
          service_identifier: filter.service_identifier,
          page: filter.page,
          page_size: filter.page_size
        }
      },
      deviceListResponseSchema
    );

    return {
      total: response.data?.total ?? 0,
      list: response.data?.list ?? []
    };
  }

  async getDeviceDetail(credential: Credential, deviceCode: string): Promise<RemoteDeviceDetail> {
    const response = await this.execute(
      {
        operation: "get_device_detail",
        url: `${credential.remoteBaseUrl}/device/bind`,
        headers: {
          "Content-Type": "application/json"
        },
        body: JSON.stringify({
          secret: credential.secret,
          agent_id: credential.agentId,
          external_api_key: credential.externalApiKey,
          device_code: deviceCode
        }),
        logContext: {
          device_code: deviceCode,
          agent_id: credential.agentId
        }
      },
      deviceDetailResponseSchema
    );

    return {
      device_name: response.data?.device_name ?? "",
      device_number: response.data?.device_number ?? "",
      device_description: response.data?.device_description ?? ""
    };
  }

  private async execute<T extends RemoteEnvelope>(
    request: RemoteHttpRequest,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>
  ): Promise<T> {
    const started = Date.now();
    this.logger?.info(
      {
        operation: request.operation,
        url: request.url,
        ...request.logContext
      },
      "remote_platform_request"
    );

    let status: number;
    let ok: boolean;
    let text: string;
    try {
      const response = await this.fetchImpl(request.url, {
        method: "POST",
        headers: request.headers,
        body: request.body,
        signal: AbortSignal.timeout(this.timeoutMs)
      });
      status = response.status;
      ok = response.ok;
      text = await response.text();
    } catch (error) {
      this.observe(request.operation, "transport_error", started);
      const reason = describeFailure(error, this.timeoutMs);
      throw new PluginError(502, "transport_error", `Remote platform request failed: ${reason}`, {
        operation: request.operation,
        url: request.url
      });
    }

    this.logger?.info(
      {
        operation: request.operation,
        status_code: status,
        body: text
      },
      "remote_platform_response"
    );

    if (!ok) {
      this.observe(request.operation, "decode_error", started);
      throw new PluginError(502, "decode_error", `Remote platform responded with HTTP ${status}.`, {
        operation: request.operation,
        status_code: status
      });
    }

    let payload: unknown;
    try {
      payload = JSON.parse(text);
    } catch {
      this.observe(request.operation, "decode_error", started);
      throw new PluginError(502, "decode_error", "Remote platform response is not valid JSON.", {
        operation: request.operation
      });
    }

    const parsed = schema.safeParse(payload);
    if (!parsed.success) {
      this.observe(request.operation, "decode_error", started);
      throw new PluginError(502, "decode_error", "Remote platform response has an unexpected shape.", {
        operation: request.operation,
        issues: parsed.error.flatten()
      });
    }

    if (parsed.data.code !== 0) {
      this.observe(request.operation, "remote_logic_error", started);
      throw new PluginError(502, "remote_logic_error", `Remote platform error: ${parsed.data.msg}`, {
        operation: request.operation,
        remote_code: parsed.data.code,
        remote_msg: parsed.data.msg
      });
    }

    this.observe(request.operation, "ok", started);
    return parsed.data;
  }

  private observe(
    operation: RemoteOperation,
    result: "ok" | "transport_error" | "decode_error" | "remote_logic_error",
    started: number
  ): void {
    this.metrics.observeRemoteCall({
      operation,
      result,
      latencyMs: Date.now() - started
    });
  }
}
