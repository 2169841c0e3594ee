/**
 * Sync Service
 *
 * Turns notifications into reconciliation passes. Notifications for a model
 * whose pass is still waiting for the lease join that pass instead of
 * queueing another one; the pass re-reads everything, so it covers them.
 *
 * Failures never escape: results are logged, fatal ones sent to the alert sink.
 */

import type { Logger } from "#/core";
import { ResolutionError, errorMessage, isSyncError } from "#/errors";
import { formatReport } from "#/formatters";
import { readWebhook, type IntakeOptions, type WebhookRequest } from "#/intake";
import type { ReconciliationEngine } from "#/reconcile/engine";
import type { ReconcileResult, ReconcileTrigger } from "#/reconcile/reconcile.types";
import { LogAlertSink, alertsFor, type AlertSink } from "./alerts";

export interface SyncServiceOptions {
  webhook: IntakeOptions;
  alerts?: AlertSink;
}

export interface WebhookResponse {
  status: 202 | 400 | 401;
  body: { message: string; details?: string[] };
}

interface PendingPass {
  result: Promise<ReconcileResult>;
  /** Notification ids covered by the pass, the first one included */
  notificationIds: string[];
}

export class SyncService {
  private engine: ReconciliationEngine;
  private logger: Logger;
  private alerts: AlertSink;
  private webhook: IntakeOptions;
  /** Passes not yet holding their model's lease, by model name */
  private waiting = new Map<string, PendingPass>();
  private inFlight = new Set<Promise<unknown>>();

  constructor(engine: ReconciliationEngine, logger: Logger, options: SyncServiceOptions) {
    this.engine = engine;
    this.logger = logger;
    this.alerts = options.alerts ?? new LogAlertSink(logger);
    this.webhook = options.webhook;
  }

  /**
   * Authenticate a webhook and start (or join) a pass for its model.
   * The pass runs in the background.
   */
  handleWebhook(request: WebhookRequest): WebhookResponse {
    const intake = readWebhook(request, this.webhook);
    if (!intake.ok) {
      this.logger.warn("Webhook rejected", { reason: intake.reason, error: intake.message, details: intake.details });
      return {
        status: intake.reason === "unauthorized" ? 401 : 400,
        body: { message: intake.message, details: intake.details },
      };
    }

    const { notification } = intake;
    if (notification.event) {
      this.logger.debug("Webhook received", { event: notification.event, modelName: notification.modelName });
    }
    this.track(this.submit(notification));
    return { status: 202, body: { message: `Reconciliation scheduled for ${notification.modelName}` } };
  }

  /**
   * Start a pass for a trigger, or join the pass already waiting for the
   * model's lease
   */
  submit(trigger: ReconcileTrigger): Promise<ReconcileResult> {
    const { modelName } = trigger;
    const waiting = this.waiting.get(modelName);
    if (waiting) {
      if (trigger.notificationId) waiting.notificationIds.push(trigger.notificationId);
      this.logger.info("Notification coalesced into a waiting pass", {
        modelName,
        notificationId: trigger.notificationId,
      });
      return waiting.result;
    }

    const notificationIds = trigger.notificationId ? [trigger.notificationId] : [];
    let pending: PendingPass | undefined;
    const leaveWaiting = () => {
      if (pending && this.waiting.get(modelName) === pending) this.waiting.delete(modelName);
    };

    const result = this.engine
      .reconcile(trigger, { onLeaseAcquired: leaveWaiting })
      .catch((err: unknown): ReconcileResult => {
        const error = isSyncError(err)
          ? err
          : new ResolutionError(`Reconciliation of ${modelName} failed: ${errorMessage(err)}`, { cause: err });
        return { ok: false, modelName, error };
      })
      .then(async (outcome) => {
        leaveWaiting();
        await this.publish(outcome, trigger.notificationId, notificationIds);
        return outcome;
      });

    pending = { result, notificationIds };
    this.waiting.set(modelName, pending);
    return result;
  }

  /** Number of passes waiting for a lease */
  get waitingPasses(): number {
    return this.waiting.size;
  }

  /**
   * Resolves once every pass started through handleWebhook has finished
   */
  async idle(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.all([...this.inFlight]);
    }
  }

  private track(pass: Promise<unknown>): void {
    this.inFlight.add(pass);
    void pass.finally(() => this.inFlight.delete(pass));
  }

  private async publish(result: ReconcileResult, notificationId: string | undefined, covered: string[]): Promise<void> {
    if (result.ok) {
      this.logger.info(formatReport(result.report), {
        modelName: result.report.modelName,
        notificationIds: covered,
        mutations: result.report.mutations,
      });
    } else {
      this.logger.error("Reconciliation pass failed", {
        modelName: result.modelName,
        notificationIds: covered,
        kind: result.error.kind,
        error: result.error.message,
      });
    }

    for (const alert of alertsFor(result, notificationId)) {
      try {
        await this.alerts.send(alert);
      } catch (err) {
        this.logger.error("Alert delivery failed", { modelName: alert.modelName, error: errorMessage(err) });
      }
    }
  }
}
