export type PluginErrorCode =
  | "validation_error"
  | "decode_error"
  | "transport_error"
  | "remote_logic_error"
  | "unsupported_form_type"
  | "status_push_failed";

export class PluginError extends Error {
  constructor(
    public readonly statusCode: number,
    public readonly code: PluginErrorCode,
    message: string,
    public readonly details?: unknown
  ) {
    super(message);
    this.name = "PluginError";
  }
}

export function isPluginError(error: unknown, code?: PluginErrorCode): error is PluginError {
  if (!(error instanceof PluginError)) {
    return false;
  }
  return code === undefined || error.code === code;
}
