import type { FastifyReply } from "fastify";
import { metricsService } from "../services/metrics-service";
import { PluginError } from "../services/plugin-error";

export type ApiErrorDescriptor = {
  statusCode: number;
  code: string;
  message: string;
  details?: unknown;
};

export function describeError(error: unknown): ApiErrorDescriptor {
  if (error instanceof PluginError) {
    return {
      statusCode: error.statusCode,
      code: error.code,
      message: error.message,
      details: error.details
    };
  }
  return {
    statusCode: 500,
    code: "internal_error",
    message: "Internal server error."
  };
}

export function sendApiError(
  reply: FastifyReply,
  statusCode: number,
  code: string,
  message: string,
  details?: unknown
) {
  metricsService.observeApiError({ statusCode, code });
  return reply.code(statusCode).send({
    code: statusCode,
    message,
    data: null,
    error: code,
    details: details ?? null,
    request_id: reply.request.id
  });
}

export function sendCaughtError(reply: FastifyReply, error: unknown) {
  const descriptor = describeError(error);
  return sendApiError(reply, descriptor.statusCode, descriptor.code, descriptor.message, descriptor.details);
}
