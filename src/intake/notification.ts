/**
 * Stage-change notification intake
 *
 * Authenticates a webhook request and reads the model it concerns. The
 * notification is only a trigger: the engine re-reads both registries, so
 * nothing in the payload besides the model name decides what happens.
 */

import { safeParseJson, type ParseResult } from "#/friendly-errors";
import { StageChangeNotificationSchema, type StageChangeNotification } from "#/schemas";
import type { IntakeOptions, IntakeResult, WebhookRequest } from "./intake.types";
import { verifySignature } from "./signature";

/**
 * Parse a notification body without authenticating it
 *
 * @example parseNotification('{"model_name":"churn_model","to_stage":"production"}')
 *   → { success: true, data: { modelName: "churn_model", newStage: "Production", ... } }
 */
export function parseNotification(body: string): ParseResult<StageChangeNotification> {
  return safeParseJson(body, StageChangeNotificationSchema, "notification");
}

/**
 * Header value by case-insensitive name
 */
export function getHeader(headers: Record<string, string | undefined>, name: string): string | undefined {
  const wanted = name.toLowerCase();
  for (const [key, value] of Object.entries(headers)) {
    if (key.toLowerCase() === wanted) return value;
  }
  return undefined;
}

export function readWebhook(request: WebhookRequest, options: IntakeOptions): IntakeResult {
  if (!options.secret) {
    return { ok: false, reason: "unauthorized", message: "Webhook secret is not configured" };
  }

  const signature = getHeader(request.headers, options.signatureHeader);
  if (!signature) {
    return { ok: false, reason: "unauthorized", message: `Missing ${options.signatureHeader} header` };
  }
  if (!verifySignature(request.body, signature, options.secret)) {
    return { ok: false, reason: "unauthorized", message: `${options.signatureHeader} does not match the request body` };
  }

  const parsed = parseNotification(request.body);
  if (!parsed.success) {
    return { ok: false, reason: "invalid", message: parsed.error.message, details: parsed.error.details };
  }
  return { ok: true, notification: parsed.data };
}
