import { z } from "zod";
import type { DeviceStatusCache } from "../../services/device-status-cache";
import { SERVICE_VOUCHER_FORM_FILE, readFormConfig } from "../../services/form-config-store";
import { type MetricsService, metricsService } from "../../services/metrics-service";
import { PluginError } from "../../services/plugin-error";
import type { RemotePlatformClient } from "../../services/remote-platform-client";
import type { DeviceStatusPublisher } from "../../services/status-publisher";
import { decodeVoucher, missingCredentialFields } from "../../services/voucher-codec";
import type { LoggerLike } from "../../utils/logger";

export const SUCCESS_CODE = 200;
export const SUCCESS_MESSAGE = "success";

export type FormConfigRequest = {
  protocol_type: string;
  device_type: string;
  form_type: string;
};

export type DeviceDisconnectRequest = {
  device_id: string;
};

export type NotificationRequest = {
  message_type: string;
  message: string;
};

export type DeviceListRequest = {
  voucher: string;
  service_identifier: string;
  page: number;
  page_size: number;
};

export type DeviceInfoRequest = {
  device_code: string;
  voucher: string;
};

export type DeviceItem = {
  device_name: string;
  device_number: string;
  description: string;
};

export type Envelope<T> = {
  code: number;
  message: string;
  data: T;
};

export type DeviceListEnvelope = Envelope<{
  total: number;
  list: DeviceItem[];
}>;

export type DeviceInfoEnvelope = Envelope<DeviceItem>;

/**
 * The five callbacks the host framework dispatches into this plugin.
 */
export interface PluginCallbacks {
  getFormConfig(request: FormConfigRequest): Promise<unknown>;
  deviceDisconnect(request: DeviceDisconnectRequest): Promise<void>;
  notification(request: NotificationRequest): Promise<void>;
  getDeviceList(request: DeviceListRequest): Promise<DeviceListEnvelope>;
  getDeviceInfo(request: DeviceInfoRequest): Promise<DeviceInfoEnvelope>;
}

const MESSAGE_TYPE_SERVICE_CONFIG_CHANGED = "1";
const MESSAGE_TYPE_DEVICE_CONFIG_CHANGED = "2";

const deviceConfigChangedSchema = z.object({
  device_id: z.string().optional(),
  device_number: z.string().optional(),
  device_name: z.string().optional(),
  description: z.string().optional(),
  status: z.enum(["0", "1"]).optional()
});

export type PluginCallbackAdapterOptions = {
  logger: LoggerLike;
  remoteClient: RemotePlatformClient;
  cache: DeviceStatusCache;
  statusPublisher: DeviceStatusPublisher;
  formAssetDir: string;
  metrics?: MetricsService;
};

export class PluginCallbackAdapter implements PluginCallbacks {
  private readonly logger: LoggerLike;
  private readonly remoteClient: RemotePlatformClient;
  private readonly cache: DeviceStatusCache;
  private readonly statusPublisher: DeviceStatusPublisher;
  private readonly formAssetDir: string;
  private readonly metrics: MetricsService;

  constructor(options: PluginCallbackAdapterOptions) {
    this.logger = options.logger;
    this.remoteClient = options.remoteClient;
    this.cache = options.cache;
    this.statusPublisher = options.statusPublisher;
    this.formAssetDir = options.formAssetDir;
    this.metrics = options.metrics ?? metricsService;
  }

  getFormConfig(request: FormConfigRequest): Promise<unknown> {
    return this.run("get_form_config", { ...request }, async () => {
      switch (request.form_type) {
        case "CFG":
        case "VCR":
          return null;
        case "SVCR":
          return readFormConfig(this.formAssetDir, SERVICE_VOUCHER_FORM_FILE, this.logger);
        default:
          throw new PluginError(400, "unsupported_form_type", `Unsupported form type: ${request.form_type}`, {
            form_type: request.form_type
          });
      }
    });
  }

  deviceDisconnect(request: DeviceDisconnectRequest): Promise<void> {
    return this.run("device_disconnect", { device_id: request.device_id }, async () => {
      // The cache is keyed by device number, not by the host's device id.
      const identity = this.cache.getById(request.device_id);
      if (identity) {
        this.cache.clearByNumber(identity.deviceNumber);
      } else {
        this.logger.info({ device_id: request.device_id }, "device_cache_miss");
      }

      try {
        await this.statusPublisher.publishDeviceStatus(request.device_id, "offline");
        this.metrics.observeStatusPush("ok");
      } catch (error) {
        this.metrics.observeStatusPush("error");
        throw error;
      }
    });
  }

  notification(request: NotificationRequest): Promise<void> {
    return this.run("notification", { message_type: request.message_type }, async () => {
      const message = parseNotificationMessage(request.message);

      switch (request.message_type) {
        case MESSAGE_TYPE_SERVICE_CONFIG_CHANGED:
          this.logger.info({ message }, "service_config_changed");
          return;
        case MESSAGE_TYPE_DEVICE_CONFIG_CHANGED:
          this.applyDeviceConfigChange(message);
          return;
        default:
          this.logger.warn({ message_type: request.message_type }, "notification_type_unknown");
      }
    });
  }

  getDeviceList(request: DeviceListRequest): Promise<DeviceListEnvelope> {
    return this.run(
      "get_device_list",
      {
        service_identifier: request.service_identifier,
        page: request.page,
        page_size: request.page_size
      },
      async () => {
        const credential = decodeVoucher(request.voucher);
        const missing = missingCredentialFields(credential, ["remoteBaseUrl", "secret"]);
        if (missing.length > 0) {
          throw new PluginError(400, "validation_error", `Voucher is missing required fields: ${missing.join(", ")}`, {
            missing
          });
        }

        const result = await this.remoteClient.listDevices(credential, {
          voucher: request.voucher,
          service_identifier: request.service_identifier,
          page: request.page,
          page_size: request.page_size
        });

        return {
          code: SUCCESS_CODE,
          message: SUCCESS_MESSAGE,
          data: {
            total: result.total,
            list: result.list.map((device) => ({
              device_name: device.device_name,
              device_number: device.device_number,
              description: device.description
            }))
          }
        };
      }
    );
  }

  getDeviceInfo(request: DeviceInfoRequest): Promise<DeviceInfoEnvelope> {
    return this.run("get_device_info", { device_code: request.device_code }, async () => {
      if (!request.device_code) {
        throw new PluginError(400, "validation_error", "Device code must not be empty.");
      }
      if (!request.voucher) {
        throw new PluginError(400, "validation_error", "Voucher must not be empty.");
      }

      const credential = decodeVoucher(request.voucher);
      const missing = missingCredentialFields(credential, [
        "remoteBaseUrl",
        "secret",
        "agentId",
        "externalApiKey"
      ]);
      if (missing.length > 0) {
        throw new PluginError(400, "validation_error", `Voucher is missing required fields: ${missing.join(", ")}`, {
          missing
        });
      }

      const detail = await this.remoteClient.getDeviceDetail(credential, request.device_code);
      return {
        code: SUCCESS_CODE,
        message: SUCCESS_MESSAGE,
        data: {
          device_name: detail.device_name,
          device_number: detail.device_number,
          description: detail.device_description
        }
      };
    });
  }

  private applyDeviceConfigChange(message: Record<string, unknown>): void {
    const parsed = deviceConfigChangedSchema.safeParse(message);
    const change = parsed.success ? parsed.data : null;
    const deviceNumber = change?.device_number;
    if (!change || !deviceNumber) {
      this.logger.info({ message }, "device_config_changed");
      return;
    }

    if (change.device_id) {
      this.cache.remember({
        deviceId: change.device_id,
        deviceNumber,
        deviceName: change.device_name ?? "",
        description: change.description ?? ""
      });
    } else {
      this.cache.clearByNumber(deviceNumber);
    }
    if (change.status) {
      this.cache.setStatus(deviceNumber, change.status === "1" ? "online" : "offline");
    }

    this.logger.info(
      {
        device_id: change.device_id ?? null,
        device_number: deviceNumber,
        status: change.status ?? null
      },
      "device_config_changed"
    );
  }

  private async run<T>(
    callback: string,
    context: Record<string, unknown>,
    fn: () => Promise<T>
  ): Promise<T> {
    this.logger.info({ callback, ...context }, "callback_received");
    try {
      const result = await fn();
      this.metrics.observeCallback({ callback, result: "ok" });
      return result;
    } catch (error) {
      this.metrics.observeCallback({ callback, result: "error" });
      this.logger.error({ err: error, callback, ...context }, "callback_failed");
      throw error;
    }
  }
}

function parseNotificationMessage(raw: string): Record<string, unknown> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new PluginError(400, "decode_error", "Notification message is not valid JSON.", {
      reason: error instanceof Error ? error.message : String(error)
    });
  }

  const result = z.record(z.unknown()).safeParse(parsed);
  if (!result.success) {
    throw new PluginError(400, "decode_error", "Notification message must be a JSON object.");
  }
  return result.data;
}
