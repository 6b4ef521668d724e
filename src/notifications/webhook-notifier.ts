import { logger } from "../config/logger.js";
import { errorMessage, NotificationError } from "../lifecycle/errors.js";
import type { LifecycleNotifier } from "../lifecycle/types.js";

/**
 * Publishes the run summary to a webhook.
 *
 * The summary is also written to the logger, so a run without a webhook
 * still leaves the same text behind.
 */
export class WebhookNotifier implements LifecycleNotifier {
  private readonly webhookUrl: string;

  constructor(options: { webhookUrl: string }) {
    this.webhookUrl = options.webhookUrl;
  }

  async notify(text: string): Promise<void> {
    logger.info(`Snapshot lifecycle report\n${text}`);

    let response: Response;
    try {
      response = await fetch(this.webhookUrl, {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify({ type: "snapshot_lifecycle_report", text }),
      });
    } catch (err) {
      throw new NotificationError(`Webhook error: ${errorMessage(err)}`, err);
    }

    if (!response.ok) {
      throw new NotificationError(`Webhook failed: ${response.status} ${response.statusText}`);
    }
  }
}
