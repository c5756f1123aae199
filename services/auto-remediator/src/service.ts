import { EC2Client } from "@aws-sdk/client-ec2";
import { SSMClient } from "@aws-sdk/client-ssm";
import type { Config } from "./config";
import { createEc2MaintenanceGate } from "./maintenance/gate";
import { createDiscordNotifier } from "./notify/discord";
import { createOrchestrator, type Orchestrator } from "./orchestrator";
import { createSsmDispatcher } from "./remediation/dispatcher";

/**
 * Wire the orchestrator to EC2, SSM and the Discord webhook.
 */
export function createRemediationService(config: Config): Orchestrator {
  const region = config.AWS_REGION;

  return createOrchestrator(
    { procedureName: config.SSM_DOCUMENT_NAME },
    {
      gate: createEc2MaintenanceGate(new EC2Client({ region }), config.MAINTENANCE_TAG_KEY),
      dispatcher: createSsmDispatcher(new SSMClient({ region })),
      notifier: createDiscordNotifier({
        webhookUrl: config.DISCORD_WEBHOOK_URL,
        procedureName: config.SSM_DOCUMENT_NAME,
        region,
        username: config.NOTIFIER_USERNAME,
      }),
    },
  );
}
