/**
 * Operator alerts
 *
 * Fatal run failures need a human (bad artifact, missing permission, unknown
 * flavor); retryable ones heal on a later pass and are only logged.
 */

import type { Logger } from "#/core";
import type { ReconcileResult } from "#/reconcile/reconcile.types";

export interface Alert {
  modelName: string;
  notificationId?: string;
  runId?: string;
  /** Failed step, or "resolve" when the whole pass failed */
  operation: string;
  kind: string;
  message: string;
}

export interface AlertSink {
  send(alert: Alert): Promise<void>;
}

/**
 * Default sink: one error log entry per alert
 */
export class LogAlertSink implements AlertSink {
  private logger: Logger;

  constructor(logger: Logger) {
    this.logger = logger;
  }

  async send(alert: Alert): Promise<void> {
    this.logger.error(`Sync alert: ${alert.message}`, { alert: true, ...alert });
  }
}

/**
 * Alerts raised by a pass: its fatal run failures, or the pass itself when
 * it could not resolve state
 */
export function alertsFor(result: ReconcileResult, notificationId?: string): Alert[] {
  if (!result.ok) {
    return [
      {
        modelName: result.modelName,
        notificationId,
        operation: "resolve",
        kind: result.error.kind,
        message: result.error.message,
      },
    ];
  }

  const { report } = result;
  return report.fatalFailures.map((outcome) => ({
    modelName: report.modelName,
    notificationId: report.notificationId,
    runId: outcome.runId,
    operation: outcome.operation ?? "reconcile",
    kind: outcome.error?.kind ?? "registration",
    message: outcome.error?.message ?? `Run ${outcome.runId} failed`,
  }));
}
