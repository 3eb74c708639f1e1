export const trackValues = ["production", "beta", "alpha", "internal"] as const;
export type KnownTrack = (typeof trackValues)[number];

export const inputNames = [
  "track",
  "rollout_increase_steps",
  "package_name",
  "teams_webhook_url",
  "service_account_json_key_content",
  "service_account_json_key_path",
  "increase_time",
  "halt_actions",
  "dry_run",
  "report_path",
] as const;
export type InputName = (typeof inputNames)[number];

/** Positional arguments, in the order the step has always passed them. */
export const positionalInputs: readonly InputName[] = [
  "track",
  "rollout_increase_steps",
  "package_name",
  "teams_webhook_url",
  "service_account_json_key_path",
];

export const valueFlags: Readonly<Record<string, InputName>> = {
  track: "track",
  steps: "rollout_increase_steps",
  "package-name": "package_name",
  "webhook-url": "teams_webhook_url",
  "credentials-file": "service_account_json_key_path",
  "increase-time": "increase_time",
  "halt-actions": "halt_actions",
  report: "report_path",
};

export const DEFAULT_INCREASE_TIME = "11 AM today";

export type RawInputs = Partial<Record<InputName, string>>;

export function isInputName(value: string): value is InputName {
  return (inputNames as readonly string[]).includes(value);
}
