import { z } from "zod";
import { PluginError } from "./plugin-error";

/**
 * Per-tenant credential carried as a JSON string in every inbound callback.
 * Absent keys decode to empty strings; callers check what their flow needs.
 */
export type Credential = {
  remoteBaseUrl: string;
  secret: string;
  authType: string;
  agentId: string;
  externalApiKey: string;
};

const voucherField = z.string().optional().default("");

const voucherSchema = z.object({
  ServerURL: voucherField,
  Secret: voucherField,
  AuthType: voucherField,
  AgentId: voucherField,
  ExternalApiKey: voucherField,
  // Key written by earlier host releases; read when ExternalApiKey is empty.
  ThingsPanelApiKey: voucherField
});

type VoucherWire = z.input<typeof voucherSchema>;

const CREDENTIAL_WIRE_KEYS: Record<keyof Credential, keyof VoucherWire> = {
  remoteBaseUrl: "ServerURL",
  secret: "Secret",
  authType: "AuthType",
  agentId: "AgentId",
  externalApiKey: "ExternalApiKey"
};

export function decodeVoucher(raw: string): Credential {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new PluginError(400, "decode_error", "Voucher is not valid JSON.", {
      reason: error instanceof Error ? error.message : String(error)
    });
  }

  const result = voucherSchema.safeParse(parsed);
  if (!result.success) {
    throw new PluginError(400, "decode_error", "Voucher has an invalid shape.", result.error.flatten());
  }

  return {
    remoteBaseUrl: result.data.ServerURL,
    secret: result.data.Secret,
    authType: result.data.AuthType,
    agentId: result.data.AgentId,
    externalApiKey: result.data.ExternalApiKey || result.data.ThingsPanelApiKey
  };
}

export function encodeVoucher(credential: Credential): string {
  return JSON.stringify({
    ServerURL: credential.remoteBaseUrl,
    Secret: credential.secret,
    AuthType: credential.authType,
    AgentId: credential.agentId,
    ExternalApiKey: credential.externalApiKey
  } satisfies VoucherWire);
}

/**
 * Returns the wire names of the required credential fields that are empty.
 */
export function missingCredentialFields(
  credential: Credential,
  required: ReadonlyArray<keyof Credential>
): string[] {
  return required
    .filter((field) => credential[field].trim().length === 0)
    .map((field) => CREDENTIAL_WIRE_KEYS[field]);
}
