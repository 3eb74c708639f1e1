import type { RolloutDecisionKind } from "../rollout/types";

export type NotificationStatus = "sent" | "failed" | "dry-run" | "skipped";

export type RolloutReportRelease = {
  name: string | null;
  status: string;
  versionCodes: string[];
  decision: RolloutDecisionKind;
  fromPercent: string | null;
  toPercent: string | null;
  notification: NotificationStatus;
  notificationError?: string;
};

export type RolloutReport = {
  generatedAt: string;
  packageName: string;
  track: string;
  stepsPercent: string[];
  dryRun: boolean;
  releases: RolloutReportRelease[];
};
