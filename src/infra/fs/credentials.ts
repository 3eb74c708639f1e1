import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";

import { z } from "zod";

import { CredentialsError } from "../../core/errors";

export const CREDENTIALS_FILE_NAME = "credentials.json";

const serviceAccountKeySchema = z
  .object({
    type: z.literal("service_account"),
    client_email: z.string().min(1),
    private_key: z.string().min(1),
  })
  .passthrough();

export type ServiceAccountKey = z.infer<typeof serviceAccountKeySchema>;

export function parseServiceAccountKey(content: string): ServiceAccountKey {
  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch {
    throw new CredentialsError(
      "Service account key content is not valid JSON"
    );
  }

  const result = serviceAccountKeySchema.safeParse(parsed);
  if (!result.success) {
    const fields = result.error.issues
      .map((issue) => issue.path.join("."))
      .filter((field) => field.length > 0);
    throw new CredentialsError(
      `Service account key is missing or has invalid fields: ${fields.join(", ")}`
    );
  }
  return result.data;
}

/**
 * Writes the key content to a private temporary file, runs `work` with its
 * path and removes the file afterwards, whether `work` succeeds or not.
 */
export async function withCredentialsFile<TResult>(
  content: string,
  work: (credentialsPath: string) => Promise<TResult>
): Promise<TResult> {
  parseServiceAccountKey(content);

  const dir = await fs.mkdtemp(path.join(os.tmpdir(), "rollout-messenger-"));
  const credentialsPath = path.join(dir, CREDENTIALS_FILE_NAME);
  try {
    await fs.writeFile(credentialsPath, content, { mode: 0o600 });
    return await work(credentialsPath);
  } finally {
    await fs.rm(dir, { recursive: true, force: true });
  }
}

export async function assertReadableKeyFile(keyFile: string): Promise<void> {
  let content: string;
  try {
    content = await fs.readFile(keyFile, "utf8");
  } catch {
    throw new CredentialsError(
      `Cannot read service account key file ${keyFile}`
    );
  }
  parseServiceAccountKey(content);
}
