import {
  type InputName,
  type KnownTrack,
  type RawInputs,
  trackValues,
} from "../config/options";
import type { ClackUi } from "../ui/clack-ui";

const trackHints: Record<KnownTrack, string | undefined> = {
  production: undefined,
  beta: "Open testing",
  alpha: "Closed testing",
  internal: "Internal testing",
};

type TextPrompt = { message: string; placeholder: string };

const textPrompts: Partial<Record<InputName, TextPrompt>> = {
  rollout_increase_steps: {
    message: "Rollout increase steps",
    placeholder: "1,20,50,100",
  },
  package_name: {
    message: "Package name",
    placeholder: "com.example.app",
  },
  teams_webhook_url: {
    message: "Teams webhook URL",
    placeholder: "https://example.webhook.office.com/…",
  },
  service_account_json_key_path: {
    message: "Service account JSON key file",
    placeholder: "./service-account.json",
  },
};

/**
 * Asks for each missing input in turn. Resolves with `null` as soon as one
 * prompt is cancelled.
 */
export async function promptMissingInputs(
  ui: ClackUi,
  missing: readonly InputName[]
): Promise<RawInputs | null> {
  const answers: RawInputs = {};

  for (const name of missing) {
    if (name === "track") {
      const track = await ui.selectOne<KnownTrack>(
        "Track",
        trackValues.map((value) => ({
          value,
          label: value,
          hint: trackHints[value],
        }))
      );
      if (track === null) {
        return null;
      }
      answers.track = track;
      continue;
    }

    const prompt = textPrompts[name] ?? { message: name, placeholder: "" };
    const value = await ui.askText(prompt.message, prompt.placeholder);
    if (value === null) {
      return null;
    }
    answers[name] = value;
  }

  return answers;
}
