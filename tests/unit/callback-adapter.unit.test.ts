import assert from "node:assert/strict";
import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";
import test from "node:test";
import { PluginCallbackAdapter } from "../../src/modules/plugin/callback-adapter";
import { DeviceStatusCache } from "../../src/services/device-status-cache";
import { MetricsService } from "../../src/services/metrics-service";
import { PluginError } from "../../src/services/plugin-error";
import { RemotePlatformClient } from "../../src/services/remote-platform-client";
import { encodeVoucher } from "../../src/services/voucher-codec";
import {
  FakeStatusPublisher,
  createFakeFetch,
  createRecordingLogger,
  jsonResponse,
  type FakeFetch
} from "../support/fakes";

const ASSET_DIR = path.resolve(__dirname, "../../assets");

const fullVoucher = encodeVoucher({
  remoteBaseUrl: "http://remote.test",
  secret: "test-secret",
  authType: "",
  agentId: "agent-1",
  externalApiKey: "test-api-key"
});

function buildAdapter(options?: { fetchImpl?: FakeFetch; formAssetDir?: string }) {
  const logger = createRecordingLogger();
  const metrics = new MetricsService();
  const cache = new DeviceStatusCache();
  const statusPublisher = new FakeStatusPublisher();
  const fetchImpl =
    options?.fetchImpl ?? createFakeFetch(() => jsonResponse({ code: 0, msg: "", data: { total: 0, list: [] } }));
  const adapter = new PluginCallbackAdapter({
    logger,
    metrics,
    cache,
    statusPublisher,
    formAssetDir: options?.formAssetDir ?? ASSET_DIR,
    remoteClient: new RemotePlatformClient({ timeoutMs: 1000, fetchImpl, metrics })
  });
  return { adapter, logger, metrics, cache, statusPublisher, fetchImpl };
}

function hasCode(code: string) {
  return (error: unknown) => error instanceof PluginError && error.code === code;
}

test("form config: CFG and VCR yield null, unknown types are rejected", async () => {
  const { adapter } = buildAdapter();

  assert.equal(await adapter.getFormConfig({ protocol_type: "p", device_type: "1", form_type: "CFG" }), null);
  assert.equal(await adapter.getFormConfig({ protocol_type: "p", device_type: "1", form_type: "VCR" }), null);
  await assert.rejects(
    adapter.getFormConfig({ protocol_type: "p", device_type: "1", form_type: "XYZ" }),
    (error: unknown) => {
      assert.ok(error instanceof PluginError);
      assert.equal(error.code, "unsupported_form_type");
      assert.equal(error.message, "Unsupported form type: XYZ");
      return true;
    }
  );
});

test("form config: SVCR returns the bundled service voucher schema", async () => {
  const { adapter } = buildAdapter();

  const schema = await adapter.getFormConfig({ protocol_type: "p", device_type: "1", form_type: "SVCR" });
  assert.ok(Array.isArray(schema));
  assert.deepEqual(
    schema.map((field: { dataKey: string }) => field.dataKey),
    ["ServerURL", "Secret", "AgentId", "ExternalApiKey"]
  );
});

test("form config: SVCR degrades to null when the asset is absent or corrupt", async () => {
  const dir = await mkdtemp(path.join(tmpdir(), "form-assets-"));
  try {
    const missing = buildAdapter({ formAssetDir: dir });
    assert.equal(
      await missing.adapter.getFormConfig({ protocol_type: "p", device_type: "1", form_type: "SVCR" }),
      null
    );
    assert.equal(missing.logger.entries.at(-1)?.msg, "form_config_read_failed");

    await writeFile(path.join(dir, "form_service_voucher.json"), "{ not json", "utf8");
    const corrupt = buildAdapter({ formAssetDir: dir });
    assert.equal(
      await corrupt.adapter.getFormConfig({ protocol_type: "p", device_type: "1", form_type: "SVCR" }),
      null
    );
    assert.equal(corrupt.metrics.callbackTotal("get_form_config", "ok"), 1);
  } finally {
    await rm(dir, { recursive: true, force: true });
  }
});

test("disconnect: clears the cache entry by device number and publishes offline", async () => {
  const { adapter, cache, statusPublisher } = buildAdapter();
  cache.remember({ deviceId: "dev-1", deviceNumber: "SN-001", deviceName: "Speaker", description: "" });

  await adapter.deviceDisconnect({ device_id: "dev-1" });

  assert.equal(cache.getById("dev-1"), null);
  assert.equal(cache.getByNumber("SN-001"), null);
  assert.deepEqual(statusPublisher.published, [{ deviceId: "dev-1", status: "offline" }]);
});

test("disconnect: a cache miss still publishes exactly once", async () => {
  const { adapter, statusPublisher } = buildAdapter();

  await adapter.deviceDisconnect({ device_id: "unknown-device" });

  assert.deepEqual(statusPublisher.published, [{ deviceId: "unknown-device", status: "offline" }]);
});

test("disconnect: a failed publish is surfaced after the cache is cleared", async () => {
  const { adapter, cache, statusPublisher, metrics, logger } = buildAdapter();
  cache.remember({ deviceId: "dev-1", deviceNumber: "SN-001", deviceName: "", description: "" });
  const failure = new PluginError(503, "status_push_failed", "MQTT client is not connected.");
  statusPublisher.failWith = failure;

  await assert.rejects(adapter.deviceDisconnect({ device_id: "dev-1" }), (error: unknown) => error === failure);

  assert.equal(statusPublisher.published.length, 1);
  assert.equal(cache.getByNumber("SN-001"), null);
  assert.equal(metrics.callbackTotal("device_disconnect", "error"), 1);
  const last = logger.entries.at(-1);
  assert.equal(last?.level, "error");
  assert.equal(last?.msg, "callback_failed");
});

test("notification: unknown message types succeed with a warning", async () => {
  const { adapter, logger } = buildAdapter();

  await adapter.notification({ message_type: "9", message: "{}" });

  const warning = logger.entries.find((entry) => entry.level === "warn");
  assert.equal(warning?.msg, "notification_type_unknown");
  assert.deepEqual(warning?.obj, { message_type: "9" });
});

test("notification: a message that is not a JSON object is a decode error", async () => {
  const { adapter } = buildAdapter();

  await assert.rejects(adapter.notification({ message_type: "1", message: "not-json" }), hasCode("decode_error"));
  await assert.rejects(adapter.notification({ message_type: "1", message: "[1,2]" }), hasCode("decode_error"));
  await assert.rejects(adapter.notification({ message_type: "9", message: "" }), hasCode("decode_error"));
});

test("notification: device config change refreshes identity and status", async () => {
  const { adapter, cache } = buildAdapter();

  await adapter.notification({
    message_type: "2",
    message: JSON.stringify({ device_id: "dev-1", device_number: "SN-001", device_name: "Speaker", status: "1" })
  });

  assert.deepEqual(cache.getById("dev-1"), {
    deviceId: "dev-1",
    deviceNumber: "SN-001",
    deviceName: "Speaker",
    description: ""
  });
  assert.equal(cache.getByNumber("SN-001")?.status, "online");

  await adapter.notification({ message_type: "2", message: JSON.stringify({ device_number: "SN-001" }) });
  assert.equal(cache.getById("dev-1"), null);
  assert.equal(cache.size(), 0);
});

test("notification: service config change is accepted without touching the cache", async () => {
  const { adapter, cache } = buildAdapter();
  cache.remember({ deviceId: "dev-1", deviceNumber: "SN-001", deviceName: "", description: "" });

  await adapter.notification({ message_type: "1", message: JSON.stringify({ service_identifier: "svc-1" }) });

  assert.equal(cache.size(), 1);
});

test("device list: forwards the host fields and reshapes items", async () => {
  const fetchImpl = createFakeFetch(() =>
    jsonResponse({
      code: 0,
      msg: "ok",
      data: {
        total: 1,
        list: [{ device_name: "Speaker", device_number: "SN-001", description: "hall", owner: "someone" }]
      }
    })
  );
  const { adapter } = buildAdapter({ fetchImpl });

  const envelope = await adapter.getDeviceList({
    voucher: fullVoucher,
    service_identifier: "svc-1",
    page: 2,
    page_size: 5
  });

  assert.deepEqual(envelope, {
    code: 200,
    message: "success",
    data: {
      total: 1,
      list: [{ device_name: "Speaker", device_number: "SN-001", description: "hall" }]
    }
  });
  assert.equal(fetchImpl.calls[0].url, "http://remote.test/device/list");
  assert.deepEqual(fetchImpl.calls[0].body, {
    voucher: fullVoucher,
    service_identifier: "svc-1",
    page: 2,
    page_size: 5
  });
});

test("device list: voucher decode failures happen before any remote call", async () => {
  const { adapter, fetchImpl } = buildAdapter();

  await assert.rejects(
    adapter.getDeviceList({ voucher: "not-json", service_identifier: "", page: 1, page_size: 10 }),
    hasCode("decode_error")
  );
  await assert.rejects(
    adapter.getDeviceList({ voucher: "{\"Secret\":\"test-secret\"}", service_identifier: "", page: 1, page_size: 10 }),
    (error: unknown) => {
      assert.ok(error instanceof PluginError);
      assert.equal(error.code, "validation_error");
      assert.equal(error.message, "Voucher is missing required fields: ServerURL");
      return true;
    }
  );
  assert.equal(fetchImpl.calls.length, 0);
});

test("device list: remote failures propagate instead of producing an envelope", async () => {
  const fetchImpl = createFakeFetch(() => jsonResponse({ code: 3, msg: "service disabled" }));
  const { adapter } = buildAdapter({ fetchImpl });

  await assert.rejects(
    adapter.getDeviceList({ voucher: fullVoucher, service_identifier: "svc-1", page: 1, page_size: 10 }),
    hasCode("remote_logic_error")
  );
});

test("device info: empty device code or voucher fails validation with zero remote calls", async () => {
  const { adapter, fetchImpl } = buildAdapter();

  await assert.rejects(adapter.getDeviceInfo({ device_code: "", voucher: fullVoucher }), (error: unknown) => {
    assert.ok(error instanceof PluginError);
    assert.equal(error.code, "validation_error");
    assert.equal(error.message, "Device code must not be empty.");
    return true;
  });
  await assert.rejects(adapter.getDeviceInfo({ device_code: "CODE-1", voucher: "" }), (error: unknown) => {
    assert.ok(error instanceof PluginError);
    assert.equal(error.code, "validation_error");
    assert.equal(error.message, "Voucher must not be empty.");
    return true;
  });
  assert.equal(fetchImpl.calls.length, 0);
});

test("device info: a voucher without AgentId fails validation naming the field", async () => {
  const { adapter, fetchImpl } = buildAdapter();
  const voucher = encodeVoucher({
    remoteBaseUrl: "http://remote.test",
    secret: "test-secret",
    authType: "",
    agentId: "",
    externalApiKey: "test-api-key"
  });

  await assert.rejects(adapter.getDeviceInfo({ device_code: "CODE-1", voucher }), (error: unknown) => {
    assert.ok(error instanceof PluginError);
    assert.equal(error.code, "validation_error");
    assert.equal(error.message, "Voucher is missing required fields: AgentId");
    assert.deepEqual(error.details, { missing: ["AgentId"] });
    return true;
  });
  assert.equal(fetchImpl.calls.length, 0);
});

test("device info: remote code 5 surfaces the remote message", async () => {
  const fetchImpl = createFakeFetch(() => jsonResponse({ code: 5, msg: "not found" }));
  const { adapter } = buildAdapter({ fetchImpl });

  await assert.rejects(adapter.getDeviceInfo({ device_code: "CODE-1", voucher: fullVoucher }), (error: unknown) => {
    assert.ok(error instanceof PluginError);
    assert.ok(error.message.includes("not found"));
    return true;
  });
  assert.equal(fetchImpl.calls.length, 1);
});

test("device info: success maps the bind response into the host envelope", async () => {
  const fetchImpl = createFakeFetch(() =>
    jsonResponse({
      code: 0,
      msg: "ok",
      data: { device_name: "Speaker", device_number: "SN-001", device_description: "hall" }
    })
  );
  const { adapter, metrics } = buildAdapter({ fetchImpl });

  const envelope = await adapter.getDeviceInfo({ device_code: "CODE-1", voucher: fullVoucher });

  assert.deepEqual(envelope, {
    code: 200,
    message: "success",
    data: { device_name: "Speaker", device_number: "SN-001", description: "hall" }
  });
  assert.equal(fetchImpl.calls[0].url, "http://remote.test/device/bind");
  assert.equal(metrics.callbackTotal("get_device_info", "ok"), 1);
});

test("device info: a voucher carrying ThingsPanelApiKey reaches the bind call", async () => {
  const fetchImpl = createFakeFetch(() =>
    jsonResponse({
      code: 0,
      msg: "ok",
      data: { device_name: "Lamp", device_number: "SN-002", device_description: "" }
    })
  );
  const { adapter } = buildAdapter({ fetchImpl });
  const voucher = JSON.stringify({
    ServerURL: "http://remote.test",
    Secret: "test-secret",
    AgentId: "agent-1",
    ThingsPanelApiKey: "test-api-key"
  });

  const envelope = await adapter.getDeviceInfo({ device_code: "CODE-2", voucher });

  assert.deepEqual(envelope.data, { device_name: "Lamp", device_number: "SN-002", description: "" });
  assert.deepEqual(fetchImpl.calls[0].body, {
    secret: "test-secret",
    agent_id: "agent-1",
    external_api_key: "test-api-key",
    device_code: "CODE-2"
  });
});
