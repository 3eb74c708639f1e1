import { PlayConsoleError } from "../errors";
import { nextRolloutStep } from "./steps";
import type { RolloutDecision, TrackInfo, TrackRelease } from "./types";

export function evaluateTrack(
  trackInfo: TrackInfo,
  steps: readonly number[]
): RolloutDecision[] {
  return (trackInfo.releases ?? []).map((release) =>
    evaluateRelease(release, steps)
  );
}

export function evaluateRelease(
  release: TrackRelease,
  steps: readonly number[]
): RolloutDecision {
  switch (release.status) {
    case "completed":
      return { kind: "completed", release };
    case "halted":
      return { kind: "halted", release };
    case "draft":
      return { kind: "draft", release };
    case "inProgress":
      break;
    default:
      return { kind: "unknown-status", release };
  }

  if (release.userFraction === undefined) {
    throw new PlayConsoleError(
      `Release ${describeRelease(release)} is in progress but reports no user fraction`
    );
  }

  const from = release.userFraction;
  const to = nextRolloutStep(steps, from);
  if (to === null) {
    return { kind: "at-maximum", release, from };
  }
  return { kind: "increase", release, from, to };
}

export function describeRelease(release: TrackRelease): string {
  if (release.name) {
    return `"${release.name}"`;
  }
  if (release.versionCodes && release.versionCodes.length > 0) {
    return `(version codes ${release.versionCodes.join(", ")})`;
  }
  return "<unnamed>";
}
