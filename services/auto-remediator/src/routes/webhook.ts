import { Hono } from "hono";
import { getConfig } from "../config";
import { createRemediationService } from "../service";

const webhookRoute = new Hono();

/**
 * POST /webhook/alarm
 * Receives CloudWatch alarm state changes via an EventBridge API destination.
 */
webhookRoute.post("/webhook/alarm", async (c) => {
  const config = getConfig();

  if (config.WEBHOOK_SECRET) {
    const auth = c.req.header("authorization");
    if (auth !== `Bearer ${config.WEBHOOK_SECRET}`) {
      return c.json({ error: "Unauthorized" }, 401);
    }
  }

  let body: unknown;
  try {
    body = await c.req.json();
  } catch {
    return c.json({ error: "Invalid JSON" }, 400);
  }

  const result = await createRemediationService(config).handle(body);
  if (result.state === "Rejected") {
    return c.json({ error: "Invalid payload", details: result.error }, 400);
  }

  return c.json(result);
});

export { webhookRoute };
