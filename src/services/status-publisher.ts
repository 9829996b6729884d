import { connect, type IClientOptions, type MqttClient } from "mqtt";
import type { LoggerLike } from "../utils/logger";
import type { DeviceStatus } from "./device-status-cache";
import { PluginError } from "./plugin-error";

export interface DeviceStatusPublisher {
  start(logger: LoggerLike): Promise<void>;
  stop(): Promise<void>;
  isConnected(): boolean;
  publishDeviceStatus(deviceId: string, status: DeviceStatus): Promise<void>;
}

export type MqttStatusPublisherOptions = {
  url: string;
  clientId: string;
  username?: string;
  password?: string;
  connectTimeoutMs: number;
  publishTimeoutMs: number;
  protocolVersion?: 4 | 5;
};

export function statusTopic(deviceId: string): string {
  return `devices/status/${deviceId}`;
}

export function statusPayload(status: DeviceStatus): string {
  return status === "online" ? "1" : "0";
}

/**
 * Pushes device online/offline signals to the platform broker.
 */
export class MqttStatusPublisher implements DeviceStatusPublisher {
  private client: MqttClient | null = null;
  private logger: LoggerLike | null = null;

  constructor(private readonly options: MqttStatusPublisherOptions) {}

  async start(logger: LoggerLike): Promise<void> {
    this.logger = logger;
    if (this.client) {
      return;
    }

    const connectOptions: IClientOptions = {
      clientId: this.options.clientId,
      username: this.options.username,
      password: this.options.password,
      protocolVersion: this.options.protocolVersion ?? 4,
      clean: true,
      reconnectPeriod: 5000,
      connectTimeout: this.options.connectTimeoutMs
    };
    const client = connect(this.options.url, connectOptions);
    this.client = client;

    client.on("connect", () => {
      this.logger?.info(
        {
          mqtt_url: this.options.url,
          client_id: this.options.clientId
        },
        "mqtt_connected"
      );
    });
    client.on("close", () => {
      this.logger?.warn({ mqtt_url: this.options.url }, "mqtt_disconnected");
    });
    client.on("error", (error) => {
      this.logger?.warn({ err: error }, "mqtt_client_error");
    });
  }

  // Forced: an unacknowledged in-flight publish must not hold shutdown open.
  async stop(): Promise<void> {
    const client = this.client;
    this.client = null;
    if (client) {
      await client.endAsync(true);
    }
  }

  isConnected(): boolean {
    return this.client?.connected ?? false;
  }

  async publishDeviceStatus(deviceId: string, status: DeviceStatus): Promise<void> {
    const client = this.client;
    if (!client || !client.connected) {
      throw new PluginError(503, "status_push_failed", "MQTT client is not connected.", {
        device_id: deviceId
      });
    }

    const topic = statusTopic(deviceId);
    const timeoutMs = this.options.publishTimeoutMs;
    let timer: NodeJS.Timeout | undefined;
    try {
      await new Promise<void>((resolve, reject) => {
        timer = setTimeout(() => {
          reject(
            new PluginError(504, "status_push_failed", `Device status publish timed out after ${timeoutMs}ms.`, {
              device_id: deviceId,
              topic
            })
          );
        }, timeoutMs);

        client.publish(topic, statusPayload(status), { qos: 1 }, (error) => {
          if (error) {
            reject(
              new PluginError(502, "status_push_failed", `Failed to publish device status: ${error.message}`, {
                device_id: deviceId,
                topic
              })
            );
            return;
          }
          resolve();
        });
      });
    } finally {
      clearTimeout(timer);
    }
  }
}
