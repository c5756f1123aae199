import { NotifyError, errorMessage } from "../errors";
import type {
  MaintenanceStatus,
  NotifyResult,
  RemediationEvent,
  RemediationOutcome,
} from "../types";

export interface Notifier {
  /** Best effort: resolves with delivered=false instead of throwing. */
  notify(
    event: RemediationEvent,
    status: MaintenanceStatus | null,
    outcome: RemediationOutcome,
  ): Promise<NotifyResult>;
}

export interface DiscordEmbed {
  title: string;
  description: string;
  color: number;
  fields: Array<{ name: string; value: string; inline: boolean }>;
  timestamp: string;
}

export interface DiscordWebhookPayload {
  username: string;
  embeds: DiscordEmbed[];
}

export interface MessageContext {
  procedureName: string;
  region: string;
  username: string;
  now: Date;
}

export const EMBED_COLORS = {
  remediated: 15158332,
  failed: 10038562,
  maintenance: 16776960,
  lookupFailed: 15105570,
} as const;

export function secondsSince(timestamp: string, now: Date): number | null {
  const then = Date.parse(timestamp);
  if (Number.isNaN(then)) return null;
  return Math.max(0, Math.floor((now.getTime() - then) / 1000));
}

function headline(
  outcome: RemediationOutcome,
  procedureName: string,
): { title: string; color: number; action: string } {
  if (outcome.skipReason === "maintenance mode") {
    return {
      title: "⚠️ Maintenance Mode Detected",
      color: EMBED_COLORS.maintenance,
      action: "**Action:** Automation skipped to avoid interference.",
    };
  }
  if (outcome.skipReason === "lookup failed") {
    return {
      title: "❓ Maintenance Lookup Failed",
      color: EMBED_COLORS.lookupFailed,
      action: `**Action:** Automation skipped, maintenance status unknown${outcome.error ? ` (${outcome.error})` : ""}.`,
    };
  }
  if (outcome.succeeded && outcome.commandId) {
    return {
      title: "🚨 Auto-Remediation Triggered",
      color: EMBED_COLORS.remediated,
      action: `**Remediation:** Triggered \`${procedureName}\` (command \`${outcome.commandId}\`).`,
    };
  }
  return {
    title: "❌ Auto-Remediation Failed",
    color: EMBED_COLORS.failed,
    action: `**Remediation:** \`${procedureName}\` was not dispatched${outcome.error ? `: ${outcome.error}` : ""}.`,
  };
}

function maintenanceLabel(status: MaintenanceStatus | null): string {
  if (status === null) return "unknown";
  return status.inMaintenance ? "on" : "off";
}

export function formatDiscordMessage(
  event: RemediationEvent,
  status: MaintenanceStatus | null,
  outcome: RemediationOutcome,
  ctx: MessageContext,
): DiscordWebhookPayload {
  const { title, color, action } = headline(outcome, ctx.procedureName);
  const elapsed = secondsSince(event.timestamp, ctx.now);

  const description = [
    `**Cause of Downtime:** \`${event.reason}\``,
    `**Time Since Detection:** \`${elapsed === null ? "unknown" : `${elapsed} seconds`}\``,
    action,
  ].join("\n");

  return {
    username: ctx.username,
    embeds: [
      {
        title,
        description,
        color,
        fields: [
          { name: "Instance ID", value: `\`${event.resourceId}\``, inline: true },
          { name: "Alarm", value: `\`${event.alarmName}\``, inline: true },
          { name: "Region", value: `\`${ctx.region}\``, inline: true },
          { name: "Maintenance", value: `\`${maintenanceLabel(status)}\``, inline: true },
        ],
        timestamp: ctx.now.toISOString(),
      },
    ],
  };
}

export interface DiscordNotifierOptions {
  webhookUrl: string;
  procedureName: string;
  region: string;
  username?: string;
  timeoutMs?: number;
  clock?: () => Date;
}

export function createDiscordNotifier(options: DiscordNotifierOptions): Notifier {
  const username = options.username ?? "Cloud Janitor";
  const timeoutMs = options.timeoutMs ?? 5000;
  const clock = options.clock ?? (() => new Date());

  return {
    async notify(event, status, outcome): Promise<NotifyResult> {
      const payload = formatDiscordMessage(event, status, outcome, {
        procedureName: options.procedureName,
        region: options.region,
        username,
        now: clock(),
      });

      try {
        const res = await fetch(options.webhookUrl, {
          method: "POST",
          headers: { "Content-Type": "application/json" },
          body: JSON.stringify(payload),
          signal: AbortSignal.timeout(timeoutMs),
        });
        if (!res.ok) {
          const body = await res.text();
          throw new NotifyError(`Webhook responded ${res.status}: ${body}`, res.status);
        }
        return { delivered: true, status: res.status };
      } catch (err) {
        const notifyErr =
          err instanceof NotifyError
            ? err
            : new NotifyError(`Webhook delivery failed: ${errorMessage(err)}`, undefined, { cause: err });
        console.error("Notification not delivered", {
          resourceId: event.resourceId,
          alarmName: event.alarmName,
          error: notifyErr.message,
        });
        const result: NotifyResult = { delivered: false, error: notifyErr.message };
        if (notifyErr.status !== undefined) result.status = notifyErr.status;
        return result;
      }
    },
  };
}
