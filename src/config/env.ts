import "dotenv/config";
import { z } from "zod";

const envSchema = z.object({
  NODE_ENV: z.enum(["development", "test", "production"]).default("development"),
  HOST: z.string().default("0.0.0.0"),
  PORT: z.coerce.number().int().positive().default(8503),
  LOG_LEVEL: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).default("info"),
  TRUST_PROXY: z
    .string()
    .optional()
    .default("false")
    .transform((value) => value === "true"),
  REMOTE_TIMEOUT_MS: z.coerce.number().int().min(100).max(120000).default(10000),
  FORM_ASSET_DIR: z.string().default("./assets"),
  PLATFORM_MQTT_URL: z.string().url().default("mqtt://127.0.0.1:1883"),
  PLATFORM_MQTT_USERNAME: z.string().optional(),
  PLATFORM_MQTT_PASSWORD: z.string().optional(),
  PLATFORM_MQTT_CLIENT_ID: z.string().default("device-adapter-plugin"),
  PLATFORM_MQTT_CONNECT_TIMEOUT_MS: z.coerce.number().int().min(1000).max(120000).default(30000),
  PLATFORM_MQTT_PUBLISH_TIMEOUT_MS: z.coerce.number().int().min(100).max(120000).default(5000),
  PLATFORM_MQTT_PROTOCOL_VERSION: z
    .enum(["4", "5"])
    .default("4")
    .transform((value): 4 | 5 => (value === "5" ? 5 : 4))
});

export const env = envSchema.parse(process.env);
