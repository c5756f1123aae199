import { SendCommandCommand, type SSMClient } from "@aws-sdk/client-ssm";
import { DispatchError, errorMessage } from "../errors";
import type { RemediationOutcome } from "../types";
import { acceptedOutcome, failedOutcome } from "./outcome";

export interface RemediationDispatcher {
  /**
   * Send the named procedure to the resource. Resolves once the channel has
   * accepted or rejected the command; does not wait for it to run.
   * Rejects with DispatchError on transport or permission failure.
   */
  dispatch(resourceId: string, procedureName: string, alarmName?: string): Promise<RemediationOutcome>;
}

// SSM rejects comments longer than this.
const MAX_COMMENT_LENGTH = 100;

export function commandComment(alarmName?: string): string {
  const comment = alarmName
    ? `Triggered by alarm ${alarmName}`
    : "Triggered by alarm auto-remediation";
  return comment.slice(0, MAX_COMMENT_LENGTH);
}

export function createSsmDispatcher(ssm: SSMClient): RemediationDispatcher {
  return {
    async dispatch(
      resourceId: string,
      procedureName: string,
      alarmName?: string,
    ): Promise<RemediationOutcome> {
      let commandId: string | undefined;
      try {
        const res = await ssm.send(
          new SendCommandCommand({
            InstanceIds: [resourceId],
            DocumentName: procedureName,
            Comment: commandComment(alarmName),
          }),
        );
        commandId = res.Command?.CommandId;
      } catch (err) {
        throw new DispatchError(
          resourceId,
          `Failed to send ${procedureName} to ${resourceId}: ${errorMessage(err)}`,
          { cause: err },
        );
      }

      if (!commandId) {
        return failedOutcome(`${procedureName} was not accepted for ${resourceId}`);
      }
      return acceptedOutcome(commandId);
    },
  };
}
