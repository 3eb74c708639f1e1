import type { PlayConsoleClient } from "../../infra/play/client";
import type { WebhookSender } from "../../infra/http/webhook";

export type FlowDependencies = {
  /** Builds an authorized Play Console client from a key file path. */
  createClient: (keyFile: string) => PlayConsoleClient;
  sendWebhook: WebhookSender;
  now?: () => Date;
};
