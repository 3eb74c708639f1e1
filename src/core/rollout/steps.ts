import { RolloutStepsError } from "../errors";

const INTEGER_PATTERN = /^[+-]?\d+$/;

/**
 * Parses a rollout step list such as `1,20,50,100` into user fractions
 * (`[0.01, 0.2, 0.5, 1]`), the unit the Play Console reports rollouts in.
 *
 * Every entry must be an integer percentage in `[0, 100]` and strictly
 * greater than the one before it.
 */
export function parseRolloutSteps(raw: string): number[] {
  const entries = raw.split(",").map((entry) => entry.trim());
  if (!entries.every((entry) => INTEGER_PATTERN.test(entry))) {
    throw new RolloutStepsError(
      "Rollout steps must be comma-separated numbers only (e.g., 1,20,50,100)"
    );
  }

  const steps = entries.map((entry) => Number.parseInt(entry, 10));
  if (steps.some((step) => step < 0 || step > 100)) {
    throw new RolloutStepsError("All rollout steps must be between 0 and 100.");
  }

  for (let index = 1; index < steps.length; index += 1) {
    if (steps[index - 1] >= steps[index]) {
      throw new RolloutStepsError(
        "Each rollout step must be strictly greater than the previous (e.g., 1,20,50,100)."
      );
    }
  }

  return steps.map((step) => step / 100);
}

export function nextRolloutStep(
  steps: readonly number[],
  currentFraction: number
): number | null {
  return steps.find((step) => step > currentFraction) ?? null;
}

/** `0.2` → `"20"`, `0.005` → `"0.5"`. */
export function formatPercent(fraction: number): string {
  const percent = Math.round(fraction * 100 * 100) / 100;
  return String(percent);
}
