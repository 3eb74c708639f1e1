import type {
  NotificationStatus,
  RolloutReport,
  RolloutReportRelease,
} from "../../../../core/report/types";
import { formatPercent } from "../../../../core/rollout/steps";
import type { RolloutDecision } from "../../../../core/rollout/types";

export type DecisionOutcome = {
  decision: RolloutDecision;
  notification: NotificationStatus;
  notificationError?: string;
};

export function buildReportRelease(
  outcome: DecisionOutcome
): RolloutReportRelease {
  const { decision } = outcome;
  const from =
    decision.kind === "increase" || decision.kind === "at-maximum"
      ? formatPercent(decision.from)
      : null;
  const to = decision.kind === "increase" ? formatPercent(decision.to) : null;

  return {
    name: decision.release.name ?? null,
    status: decision.release.status,
    versionCodes: decision.release.versionCodes ?? [],
    decision: decision.kind,
    fromPercent: from,
    toPercent: to,
    notification: outcome.notification,
    ...(outcome.notificationError
      ? { notificationError: outcome.notificationError }
      : {}),
  };
}

export function buildRolloutReport(options: {
  generatedAt: string;
  packageName: string;
  track: string;
  steps: readonly number[];
  dryRun: boolean;
  outcomes: readonly DecisionOutcome[];
}): RolloutReport {
  return {
    generatedAt: options.generatedAt,
    packageName: options.packageName,
    track: options.track,
    stepsPercent: options.steps.map(formatPercent),
    dryRun: options.dryRun,
    releases: options.outcomes.map(buildReportRelease),
  };
}
