import { getConfig } from "./config";
import { createRemediationService } from "./service";
import type { InvocationResult } from "./types";

// Built at cold start so a missing setting fails the init phase, not each event.
const service = createRemediationService(getConfig());

/**
 * Lambda entry point for EventBridge alarm state changes. A rejected event
 * is returned rather than thrown so it is not redelivered.
 */
export async function handler(event: unknown): Promise<InvocationResult> {
  return service.handle(event);
}
