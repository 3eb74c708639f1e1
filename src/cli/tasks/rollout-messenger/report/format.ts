import type {
  RolloutReport,
  RolloutReportRelease,
} from "../../../../core/report/types";

export function formatRolloutSummary(report: RolloutReport): string {
  const lines: string[] = [
    `Package: ${report.packageName}`,
    `Track: ${report.track}`,
    `Steps: ${report.stepsPercent.map((step) => `${step}%`).join(", ")}`,
  ];

  if (report.releases.length === 0) {
    lines.push("No releases on this track.");
    return lines.join("\n");
  }

  for (const release of report.releases) {
    lines.push(formatReleaseLine(release));
  }
  return lines.join("\n");
}

function formatReleaseLine(release: RolloutReportRelease): string {
  const name = release.name ?? "<unnamed>";
  let detail: string;
  if (release.fromPercent !== null && release.toPercent !== null) {
    detail = `${release.fromPercent}% → ${release.toPercent}%`;
  } else if (release.fromPercent !== null) {
    detail = `${release.fromPercent}% (no higher step)`;
  } else {
    detail = release.decision;
  }
  return `- ${name} [${release.status}]: ${detail}, notification ${release.notification}`;
}
