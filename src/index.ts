import { env } from "./config/env";
import { buildApp } from "./app";
import { MqttStatusPublisher } from "./services/status-publisher";

async function start() {
  const statusPublisher = new MqttStatusPublisher({
    url: env.PLATFORM_MQTT_URL,
    clientId: env.PLATFORM_MQTT_CLIENT_ID,
    username: env.PLATFORM_MQTT_USERNAME,
    password: env.PLATFORM_MQTT_PASSWORD,
    connectTimeoutMs: env.PLATFORM_MQTT_CONNECT_TIMEOUT_MS,
    publishTimeoutMs: env.PLATFORM_MQTT_PUBLISH_TIMEOUT_MS,
    protocolVersion: env.PLATFORM_MQTT_PROTOCOL_VERSION
  });

  const app = buildApp({ statusPublisher });
  await app.listen({
    host: env.HOST,
    port: env.PORT
  });
}

start().catch((error) => {
  // eslint-disable-next-line no-console
  console.error(error);
  process.exit(1);
});
