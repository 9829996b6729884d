import { readFile } from "node:fs/promises";
import path from "node:path";
import type { LoggerLike } from "../utils/logger";

export const SERVICE_VOUCHER_FORM_FILE = "form_service_voucher.json";

// Read on every call so asset edits show up without a restart. A missing or
// corrupt file yields null; the host renders no form instead of failing.
export async function readFormConfig(assetDir: string, fileName: string, logger: LoggerLike): Promise<unknown> {
  const filePath = path.resolve(assetDir, fileName);

  let raw: string;
  try {
    raw = await readFile(filePath, "utf8");
  } catch (error) {
    logger.warn({ err: error, path: filePath }, "form_config_read_failed");
    return null;
  }

  try {
    const parsed: unknown = JSON.parse(raw);
    logger.info({ path: filePath }, "form_config_loaded");
    return parsed;
  } catch (error) {
    logger.warn({ err: error, path: filePath }, "form_config_decode_failed");
    return null;
  }
}
