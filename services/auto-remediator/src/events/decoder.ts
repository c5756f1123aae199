import { MalformedEventError } from "../errors";
import type { RemediationEvent } from "../types";
import {
  alarmStateChangeSchema,
  flatAlarmEventSchema,
  type AlarmStateChangeEvent,
} from "./types";

const INSTANCE_DIMENSION = "InstanceId";

/**
 * Decode an alarm state change into a RemediationEvent.
 *
 * Accepts the EventBridge envelope or a flat `{ resourceId, newState, ... }`
 * record. Does not filter on state.
 */
export function decodeAlarmEvent(payload: unknown, now: Date = new Date()): RemediationEvent {
  const envelope = alarmStateChangeSchema.safeParse(payload);
  if (envelope.success) {
    return fromEnvelope(envelope.data, now);
  }

  const flat = flatAlarmEventSchema.safeParse(payload);
  if (flat.success) {
    return Object.freeze({
      resourceId: flat.data.resourceId,
      alarmName: flat.data.alarmName ?? "unknown",
      newState: flat.data.newState,
      reason: flat.data.reason ?? "N/A",
      timestamp: flat.data.timestamp ?? now.toISOString(),
    });
  }

  throw new MalformedEventError(
    `Unrecognized alarm event: ${flat.error.issues.map((i) => `${i.path.join(".") || "<root>"}: ${i.message}`).join("; ")}`,
  );
}

function fromEnvelope(event: AlarmStateChangeEvent, now: Date): RemediationEvent {
  const { detail } = event;
  const resourceId = findInstanceId(event);
  if (!resourceId) {
    throw new MalformedEventError(
      `Alarm ${detail.alarmName ?? "unknown"} has no ${INSTANCE_DIMENSION} metric dimension`,
    );
  }

  return Object.freeze({
    resourceId,
    alarmName: detail.alarmName ?? "unknown",
    newState: detail.state.value,
    reason: detail.state.reason ?? "N/A",
    timestamp: event.time ?? detail.state.timestamp ?? now.toISOString(),
  });
}

function findInstanceId(event: AlarmStateChangeEvent): string | undefined {
  const metrics = event.detail.configuration?.metrics ?? [];
  for (const metric of metrics) {
    const id = metric.metricStat?.metric.dimensions[INSTANCE_DIMENSION];
    if (id) return id;
  }
  return undefined;
}
