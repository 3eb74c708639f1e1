import { parse as parseYaml } from "yaml";
import { z } from "zod";

import type { HaltAction } from "../../core/card/types";
import { InputError } from "../../core/errors";
import type { StepManifest } from "../../infra/manifest/step-manifest";
import {
  DEFAULT_INCREASE_TIME,
  type InputName,
  type RawInputs,
  inputNames,
  isInputName,
} from "./options";

export type CredentialsSource =
  | { kind: "content"; content: string }
  | { kind: "file"; path: string };

export type StepInputs = {
  track: string;
  rolloutIncreaseSteps: string;
  packageName: string;
  teamsWebhookUrl: string;
  credentials: CredentialsSource;
  increaseTime: string;
  haltActions: HaltAction[];
  dryRun: boolean;
  reportPath?: string;
};

const haltActionsSchema = z.array(
  z.object({
    title: z.string().min(1),
    url: z.string().url(),
    icon_url: z.string().url().optional(),
  })
);

function nonEmpty(value: string | undefined): string | undefined {
  if (value === undefined) {
    return undefined;
  }
  return value.trim() === "" ? undefined : value;
}

/**
 * Layers input sources: explicit (flags and positionals) over environment
 * variables named like the manifest inputs, over manifest defaults.
 *
 * The two credential inputs resolve as a pair: an explicit key file path
 * shadows key content coming from the environment.
 */
export function mergeInputSources(
  explicit: RawInputs,
  env: NodeJS.ProcessEnv,
  manifest: StepManifest
): RawInputs {
  const defaults = new Map(
    manifest.inputs.map((input) => [input.name, input.defaultValue])
  );
  const merged: RawInputs = {};
  for (const name of inputNames) {
    const value =
      nonEmpty(explicit[name]) ?? nonEmpty(env[name]) ?? defaults.get(name);
    if (value !== undefined) {
      merged[name] = value;
    }
  }

  if (
    nonEmpty(explicit.service_account_json_key_path) !== undefined &&
    nonEmpty(explicit.service_account_json_key_content) === undefined
  ) {
    delete merged.service_account_json_key_content;
  }
  return merged;
}

export function findMissingInputs(
  raw: RawInputs,
  manifest: StepManifest
): InputName[] {
  const missing: InputName[] = manifest.inputs
    .filter((input) => input.isRequired)
    .map((input) => input.name)
    .filter(isInputName)
    .filter((name) => nonEmpty(raw[name]) === undefined);

  if (
    nonEmpty(raw.service_account_json_key_content) === undefined &&
    nonEmpty(raw.service_account_json_key_path) === undefined
  ) {
    missing.push("service_account_json_key_path");
  }
  return missing;
}

export function parseHaltActions(raw: string | undefined): HaltAction[] {
  const value = nonEmpty(raw);
  if (value === undefined) {
    return [];
  }

  let parsed: unknown;
  try {
    parsed = parseYaml(value);
  } catch (error: unknown) {
    const message = error instanceof Error ? error.message : "Unknown error";
    throw new InputError(`halt_actions is not valid YAML: ${message}`);
  }
  if (parsed === null) {
    return [];
  }

  const result = haltActionsSchema.safeParse(parsed);
  if (!result.success) {
    throw new InputError(
      "halt_actions must be a list of { title, url, icon_url? } entries"
    );
  }
  return result.data.map((action) => ({
    title: action.title,
    url: action.url,
    ...(action.icon_url ? { iconUrl: action.icon_url } : {}),
  }));
}

export function parseBooleanInput(
  name: InputName,
  raw: string | undefined
): boolean {
  const value = (raw ?? "").trim().toLowerCase();
  if (value === "" || value === "no" || value === "false" || value === "0") {
    return false;
  }
  if (value === "yes" || value === "true" || value === "1") {
    return true;
  }
  throw new InputError(`${name} must be yes or no, got "${raw}"`);
}

function parseWebhookUrl(raw: string): string {
  let url: URL;
  try {
    url = new URL(raw);
  } catch {
    throw new InputError("teams_webhook_url is not a valid URL");
  }
  if (url.protocol !== "https:" && url.protocol !== "http:") {
    throw new InputError("teams_webhook_url must be an http(s) URL");
  }
  return raw;
}

export function finalizeInputs(
  raw: RawInputs,
  manifest: StepManifest
): StepInputs {
  const missing = findMissingInputs(raw, manifest);
  if (missing.length > 0) {
    throw new InputError(`Missing required inputs: ${missing.join(", ")}`);
  }

  const content = nonEmpty(raw.service_account_json_key_content);
  const keyPath = nonEmpty(raw.service_account_json_key_path);
  let credentials: CredentialsSource;
  if (content !== undefined) {
    credentials = { kind: "content", content };
  } else if (keyPath !== undefined) {
    credentials = { kind: "file", path: keyPath };
  } else {
    throw new InputError(
      "Missing required inputs: service_account_json_key_path"
    );
  }

  return {
    track: (raw.track ?? "").trim(),
    rolloutIncreaseSteps: raw.rollout_increase_steps ?? "",
    packageName: (raw.package_name ?? "").trim(),
    teamsWebhookUrl: parseWebhookUrl((raw.teams_webhook_url ?? "").trim()),
    credentials,
    increaseTime: nonEmpty(raw.increase_time) ?? DEFAULT_INCREASE_TIME,
    haltActions: parseHaltActions(raw.halt_actions),
    dryRun: parseBooleanInput("dry_run", raw.dry_run),
    ...(nonEmpty(raw.report_path) ? { reportPath: raw.report_path } : {}),
  };
}

export const REDACTED = "[REDACTED]";

export function maskUrl(raw: string): string {
  try {
    return `${new URL(raw).origin}/${REDACTED}`;
  } catch {
    return REDACTED;
  }
}

/** One `name: value` line per resolved input, with secrets masked. */
export function describeInputs(
  inputs: StepInputs,
  manifest: StepManifest
): string[] {
  const sensitive = new Set(
    manifest.inputs
      .filter((input) => input.isSensitive)
      .map((input) => input.name)
  );
  let credentials: string;
  if (inputs.credentials.kind === "content") {
    const shown = sensitive.has("service_account_json_key_content")
      ? REDACTED
      : "<inline>";
    credentials = `service_account_json_key_content: ${shown}`;
  } else {
    credentials = `service_account_json_key_path: ${inputs.credentials.path}`;
  }

  return [
    `track: ${inputs.track}`,
    `rollout_increase_steps: ${inputs.rolloutIncreaseSteps}`,
    `package_name: ${inputs.packageName}`,
    `teams_webhook_url: ${maskUrl(inputs.teamsWebhookUrl)}`,
    credentials,
    `increase_time: ${inputs.increaseTime}`,
    `halt_actions: ${inputs.haltActions.length}`,
    `dry_run: ${inputs.dryRun ? "yes" : "no"}`,
  ];
}
