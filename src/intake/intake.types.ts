import type { StageChangeNotification } from "#/schemas";

export interface WebhookRequest {
  /** Raw body, exactly as received */
  body: string;
  headers: Record<string, string | undefined>;
}

export type IntakeRejection = "unauthorized" | "invalid";

export type IntakeResult =
  | { ok: true; notification: StageChangeNotification }
  | { ok: false; reason: IntakeRejection; message: string; details?: string[] };

export interface IntakeOptions {
  /** Shared secret; every request is rejected without one */
  secret?: string;
  signatureHeader: string;
}
