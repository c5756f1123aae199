import { z } from "zod";
import { ALARM_STATES } from "../types";

const alarmStateSchema = z.enum(ALARM_STATES);

// Optional fields fall back to undefined on a bad value; only the resource
// id and the state can reject an event.
const optionalString = z.string().optional().catch(undefined);

const metricSchema = z
  .object({
    id: optionalString,
    metricStat: z
      .object({
        metric: z
          .object({
            namespace: optionalString,
            name: optionalString,
            dimensions: z.record(z.string()).default({}),
          })
          .passthrough(),
      })
      .passthrough()
      .optional()
      .catch(undefined),
  })
  .passthrough();

/**
 * "CloudWatch Alarm State Change" event as delivered by EventBridge.
 */
export const alarmStateChangeSchema = z
  .object({
    "detail-type": optionalString,
    source: optionalString,
    time: optionalString,
    region: optionalString,
    detail: z
      .object({
        alarmName: optionalString,
        state: z
          .object({
            value: alarmStateSchema,
            reason: optionalString,
            timestamp: optionalString,
          })
          .passthrough(),
        previousState: z
          .object({ value: optionalString })
          .passthrough()
          .optional()
          .catch(undefined),
        configuration: z
          .object({
            metrics: z.array(metricSchema).default([]),
          })
          .passthrough()
          .optional(),
      })
      .passthrough(),
  })
  .passthrough();

/**
 * Already-normalized trigger, e.g. from a test harness or a relay.
 */
export const flatAlarmEventSchema = z
  .object({
    resourceId: z.string().min(1),
    alarmName: optionalString,
    newState: alarmStateSchema,
    reason: optionalString,
    timestamp: optionalString,
  })
  .passthrough();

export type AlarmStateChangeEvent = z.infer<typeof alarmStateChangeSchema>;
export type FlatAlarmEvent = z.infer<typeof flatAlarmEventSchema>;
