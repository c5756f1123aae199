import { decodeAlarmEvent } from "./events/decoder";
import { errorMessage } from "./errors";
import type { MaintenanceGate } from "./maintenance/gate";
import type { Notifier } from "./notify/discord";
import type { RemediationDispatcher } from "./remediation/dispatcher";
import { failedOutcome, skippedOutcome } from "./remediation/outcome";
import type {
  InvocationResult,
  MaintenanceStatus,
  RemediationEvent,
  RemediationOutcome,
  TerminalState,
} from "./types";

export interface OrchestratorSettings {
  /** Remediation procedure (SSM document) sent to the resource. */
  procedureName: string;
}

export interface OrchestratorDeps {
  gate: MaintenanceGate;
  dispatcher: RemediationDispatcher;
  notifier: Notifier;
  clock?: () => Date;
}

export interface Orchestrator {
  handle(payload: unknown): Promise<InvocationResult>;
}

/**
 * Handles one alarm state change end to end. Holds no state between calls,
 * so concurrent and repeated invocations are independent.
 *
 * Lookup failures are fail-closed: the resource is not touched and the
 * skip is reported as "lookup failed".
 */
export function createOrchestrator(
  settings: OrchestratorSettings,
  deps: OrchestratorDeps,
): Orchestrator {
  const clock = deps.clock ?? (() => new Date());

  async function report(
    state: TerminalState,
    event: RemediationEvent,
    status: MaintenanceStatus | null,
    outcome: RemediationOutcome,
  ): Promise<InvocationResult> {
    const notification = await deps.notifier.notify(event, status, outcome);
    console.log("Remediation invocation finished", {
      state,
      resourceId: event.resourceId,
      alarmName: event.alarmName,
      commandId: outcome.commandId,
      notified: notification.delivered,
    });
    return { state, event, outcome, notification };
  }

  return {
    async handle(payload: unknown): Promise<InvocationResult> {
      let event: RemediationEvent;
      try {
        event = decodeAlarmEvent(payload, clock());
      } catch (err) {
        console.error("Rejected alarm event", { error: errorMessage(err) });
        return { state: "Rejected", error: errorMessage(err) };
      }

      if (event.newState !== "ALARM") {
        console.log("Ignoring non-alarm state", {
          resourceId: event.resourceId,
          alarmName: event.alarmName,
          newState: event.newState,
        });
        return { state: "Ignored", event };
      }

      let status: MaintenanceStatus;
      try {
        status = await deps.gate.check(event.resourceId);
      } catch (err) {
        console.warn("Maintenance lookup failed, skipping remediation", {
          resourceId: event.resourceId,
          error: errorMessage(err),
        });
        return report("SkippedError", event, null, skippedOutcome("lookup failed", errorMessage(err)));
      }

      if (status.inMaintenance) {
        return report("SkippedMaintenance", event, status, skippedOutcome("maintenance mode"));
      }

      let outcome: RemediationOutcome;
      try {
        outcome = await deps.dispatcher.dispatch(
          event.resourceId,
          settings.procedureName,
          event.alarmName,
        );
      } catch (err) {
        console.error("Remediation dispatch failed", {
          resourceId: event.resourceId,
          procedureName: settings.procedureName,
          error: errorMessage(err),
        });
        outcome = failedOutcome(errorMessage(err));
      }

      return report(outcome.succeeded ? "Remediated" : "DispatchFailed", event, status, outcome);
    },
  };
}
