import type { RemediationOutcome, SkipReason } from "../types";

export function skippedOutcome(reason: SkipReason, error?: string): RemediationOutcome {
  const outcome: RemediationOutcome = {
    attempted: false,
    succeeded: null,
    commandId: null,
    skipReason: reason,
  };
  if (error !== undefined) outcome.error = error;
  return outcome;
}

export function acceptedOutcome(commandId: string): RemediationOutcome {
  return { attempted: true, succeeded: true, commandId, skipReason: null };
}

export function failedOutcome(error: string): RemediationOutcome {
  return { attempted: true, succeeded: false, commandId: null, skipReason: null, error };
}
