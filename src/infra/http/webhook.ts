/**
 * Incoming-webhook delivery.
 *
 * `sendWebhook` never throws: transport failures and unexpected statuses are
 * returned as structured results and the caller decides whether they fail
 * the run.
 */

export type WebhookResult = {
  success: boolean;
  status?: number;
  body?: string;
  error?: string;
};

const ACCEPTED_STATUSES = new Set([200, 202]);

export async function sendWebhook(
  url: string,
  payload: unknown,
  timeoutMs = 10_000
): Promise<WebhookResult> {
  try {
    const response = await fetch(url, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify(payload),
      signal: AbortSignal.timeout(timeoutMs),
    });
    const body = await response.text();

    if (ACCEPTED_STATUSES.has(response.status)) {
      return { success: true, status: response.status, body };
    }

    return {
      success: false,
      status: response.status,
      body,
      error: `HTTP ${response.status}: ${body || response.statusText}`,
    };
  } catch (error: unknown) {
    return {
      success: false,
      error: error instanceof Error ? error.message : String(error),
    };
  }
}

export type WebhookSender = typeof sendWebhook;
