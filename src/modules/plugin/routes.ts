import type { FastifyInstance } from "fastify";
import { z } from "zod";
import { sendApiError, sendCaughtError } from "../../http/api-error";
import { type PluginCallbacks, SUCCESS_CODE, SUCCESS_MESSAGE } from "./callback-adapter";

export type PluginRoutesOptions = {
  callbacks: PluginCallbacks;
};

const formConfigQuerySchema = z.object({
  protocol_type: z.string().default(""),
  device_type: z.string().default(""),
  form_type: z.string().default("")
});

const deviceDisconnectSchema = z.object({
  device_id: z.string().min(1)
});

const notificationSchema = z.object({
  message_type: z.string().min(1),
  message: z.string()
});

// Page fields must be integers; bounds are left to the remote platform.
const deviceListQuerySchema = z.object({
  voucher: z.string(),
  service_identifier: z.string().default(""),
  page: z.coerce.number().int(),
  page_size: z.coerce.number().int()
});

const deviceInfoQuerySchema = z.object({
  device_code: z.string().default(""),
  voucher: z.string().default("")
});

export async function pluginRoutes(server: FastifyInstance, options: PluginRoutesOptions): Promise<void> {
  const { callbacks } = options;

  server.get("/form/config", async (request, reply) => {
    const parsed = formConfigQuerySchema.safeParse(request.query);
    if (!parsed.success) {
      return sendApiError(reply, 400, "validation_error", "Invalid form config query.", parsed.error.flatten());
    }

    try {
      const data = await callbacks.getFormConfig(parsed.data);
      return { code: SUCCESS_CODE, message: SUCCESS_MESSAGE, data: data ?? null };
    } catch (error) {
      return sendCaughtError(reply, error);
    }
  });

  server.post("/device/disconnect", async (request, reply) => {
    const parsed = deviceDisconnectSchema.safeParse(request.body);
    if (!parsed.success) {
      return sendApiError(reply, 400, "validation_error", "Invalid disconnect payload.", parsed.error.flatten());
    }

    try {
      await callbacks.deviceDisconnect(parsed.data);
      return { code: SUCCESS_CODE, message: SUCCESS_MESSAGE, data: null };
    } catch (error) {
      return sendCaughtError(reply, error);
    }
  });

  server.post("/notify/event", async (request, reply) => {
    const parsed = notificationSchema.safeParse(request.body);
    if (!parsed.success) {
      return sendApiError(reply, 400, "validation_error", "Invalid notification payload.", parsed.error.flatten());
    }

    try {
      await callbacks.notification(parsed.data);
      return { code: SUCCESS_CODE, message: SUCCESS_MESSAGE, data: null };
    } catch (error) {
      return sendCaughtError(reply, error);
    }
  });

  server.get("/plugin/device/list", async (request, reply) => {
    const parsed = deviceListQuerySchema.safeParse(request.query);
    if (!parsed.success) {
      return sendApiError(reply, 400, "validation_error", "Invalid device list query.", parsed.error.flatten());
    }

    try {
      return await callbacks.getDeviceList(parsed.data);
    } catch (error) {
      return sendCaughtError(reply, error);
    }
  });

  server.get("/plugin/device/info", async (request, reply) => {
    const parsed = deviceInfoQuerySchema.safeParse(request.query);
    if (!parsed.success) {
      return sendApiError(reply, 400, "validation_error", "Invalid device info query.", parsed.error.flatten());
    }

    try {
      return await callbacks.getDeviceInfo(parsed.data);
    } catch (error) {
      return sendCaughtError(reply, error);
    }
  });
}
