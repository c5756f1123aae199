import { DescribeInstancesCommand, type EC2Client, type Reservation } from "@aws-sdk/client-ec2";
import { LookupError, errorMessage } from "../errors";
import type { MaintenanceStatus } from "../types";

export interface MaintenanceGate {
  check(resourceId: string): Promise<MaintenanceStatus>;
}

const TRUTHY_FLAGS = new Set(["true", "yes", "on", "1", "enabled"]);

/**
 * Interpret a maintenance tag value. Anything other than a recognised
 * truthy string (including an absent tag) means "not in maintenance".
 */
export function parseMaintenanceFlag(value: string | undefined): boolean {
  if (value === undefined) return false;
  return TRUTHY_FLAGS.has(value.trim().toLowerCase());
}

/**
 * Reads the maintenance tag straight from EC2 on every call.
 */
export function createEc2MaintenanceGate(
  ec2: EC2Client,
  tagKey = "Maintenance",
): MaintenanceGate {
  return {
    async check(resourceId: string): Promise<MaintenanceStatus> {
      let reservations: Reservation[];
      try {
        const res = await ec2.send(new DescribeInstancesCommand({ InstanceIds: [resourceId] }));
        reservations = res.Reservations ?? [];
      } catch (err) {
        throw new LookupError(
          resourceId,
          `Failed to describe instance ${resourceId}: ${errorMessage(err)}`,
          { cause: err },
        );
      }

      const instance = reservations
        .flatMap((r) => r.Instances ?? [])
        .find((i) => i.InstanceId === resourceId);
      if (!instance) {
        throw new LookupError(resourceId, `Instance ${resourceId} not found`);
      }

      const tag = instance.Tags?.find((t) => t.Key === tagKey);
      return {
        resourceId,
        inMaintenance: parseMaintenanceFlag(tag?.Value),
      };
    },
  };
}
