import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { fileURLToPath } from "node:url";

export const STEP_MANIFEST_PATH = fileURLToPath(
  new URL("../../step.yml", import.meta.url)
);

export const SERVICE_ACCOUNT_KEY = JSON.stringify({
  type: "service_account",
  project_id: "test-project",
  client_email: "ci@test-project.iam.gserviceaccount.com",
  private_key: "test-private-key",
});

export const WEBHOOK_URL =
  "https://example.webhook.office.com/webhookb2/test-token";

export async function makeTempDir(): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), "rollout-messenger-test-"));
}

export async function writeKeyFile(dir: string): Promise<string> {
  const keyFile = path.join(dir, "service-account.json");
  await fs.writeFile(keyFile, SERVICE_ACCOUNT_KEY);
  return keyFile;
}
