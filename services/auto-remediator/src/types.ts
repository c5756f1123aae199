export const ALARM_STATES = ["OK", "ALARM", "INSUFFICIENT_DATA"] as const;

export type AlarmState = (typeof ALARM_STATES)[number];

/**
 * One alarm state change, decoded from whatever the event bus delivered.
 */
export interface RemediationEvent {
  readonly resourceId: string;
  readonly alarmName: string;
  readonly newState: AlarmState;
  readonly reason: string;
  /** ISO-8601 time the alarm changed state. */
  readonly timestamp: string;
}

export interface MaintenanceStatus {
  resourceId: string;
  inMaintenance: boolean;
}

export type SkipReason = "maintenance mode" | "lookup failed";

/**
 * `attempted` is false exactly when `skipReason` is set. `commandId` is only
 * present for an attempted command that the channel accepted.
 */
export interface RemediationOutcome {
  attempted: boolean;
  /** null when nothing was attempted. */
  succeeded: boolean | null;
  commandId: string | null;
  skipReason: SkipReason | null;
  error?: string;
}

export interface NotifyResult {
  delivered: boolean;
  status?: number;
  error?: string;
}

export type TerminalState =
  | "Rejected"
  | "Ignored"
  | "SkippedError"
  | "SkippedMaintenance"
  | "Remediated"
  | "DispatchFailed";

export interface InvocationResult {
  state: TerminalState;
  event?: RemediationEvent;
  outcome?: RemediationOutcome;
  notification?: NotifyResult;
  error?: string;
}
