import { namedMembers } from "../analysis/standup.js";
import { averageVelocity } from "../analysis/velocity.js";
import type {
  AnalysisFailure,
  ImpedimentReport,
  SprintHealthAnalysis,
  StandupDigest,
  VelocityAnalysis,
} from "../types.js";

const MAX_BLOCKERS_SHOWN = 3;
const MAX_VELOCITY_ROWS = 5;

function healthIcon(score: number): string {
  if (score > 70) return "🟢";
  if (score > 40) return "🟡";
  return "🔴";
}

function truncate(text: string, max: number): string {
  return text.length > max ? `${text.slice(0, max)}...` : text;
}

function bullets(items: readonly string[]): string[] {
  return items.map((i) => `- ${i}`);
}

export function formatSprintHealth({ sprint, result }: SprintHealthAnalysis): string {
  if (result.status === "no-issues") {
    return [`## Sprint Health Analysis — ${sprint.name}`, "", "No issues found in sprint"].join("\n");
  }

  const lines = [
    `## Sprint Health Analysis — ${sprint.name}`,
    "",
    `**Health Score: ${result.healthScore}/100** ${healthIcon(result.healthScore)}`,
    "",
    "### Progress Metrics",
    `- **Issues**: ${result.completedIssues}/${result.totalIssues} (${result.progressPercentage}%)`,
    `- **Story Points**: ${result.completedStoryPoints}/${result.totalStoryPoints} (${result.storyPointProgress}%)`,
    "",
    "### Blockers",
    result.blockers.length > 0
      ? `**${result.blockers.length} Active Blockers**`
      : "✅ No active blockers",
  ];

  for (const blocker of result.blockers.slice(0, MAX_BLOCKERS_SHOWN)) {
    lines.push(`- ${blocker.key}: ${blocker.summary || "No summary"}`);
  }

  if (result.recommendations.length > 0) {
    lines.push("", "### Recommendations", ...bullets(result.recommendations));
  }

  return lines.join("\n");
}

export function formatVelocity({ trend, prediction }: VelocityAnalysis): string {
  const lines = ["## Velocity Analysis", "", "### Recent Sprint Velocities"];

  if (trend.length === 0) {
    lines.push("_No closed sprints found_");
  }
  for (const point of trend.slice(-MAX_VELOCITY_ROWS)) {
    lines.push(`- **${point.sprintName}**: ${point.velocity} story points`);
  }

  lines.push("", `**Average Velocity**: ${averageVelocity(trend).toFixed(1)} story points`);

  if (prediction.status === "predicted") {
    lines.push(
      "",
      "### Next Sprint Predictions",
      `- **Conservative**: ${prediction.conservative} story points`,
      `- **Realistic**: ${prediction.realistic} story points`,
      `- **Optimistic**: ${prediction.optimistic} story points`,
      "",
      `**Confidence Level**: ${prediction.confidence} (${prediction.sampleSize} sprints)`,
    );
  } else {
    lines.push("", `_${prediction.message}_`);
  }

  return lines.join("\n");
}

export function formatStandup(digest: StandupDigest): string {
  const lines = [
    `## Daily Standup Report - ${digest.date}`,
    "",
    "### Team Summary",
    `- **Active Members**: ${digest.activeMembers}`,
    `- **Work in Progress**: ${digest.totalInProgress} items`,
    "",
    "### Team Updates",
  ];

  for (const [member, update] of namedMembers(digest)) {
    lines.push("", `**${member}**:`);
    if (update.completedYesterday.length > 0) {
      lines.push("  ✅ *Completed yesterday*:");
      for (const item of update.completedYesterday) {
        lines.push(`    - ${item.key}: ${truncate(item.summary, 50)}`);
      }
    }
    if (update.inProgress.length > 0) {
      lines.push("  🔄 *Working on today*:");
      for (const item of update.inProgress) {
        lines.push(`    - ${item.key}: ${truncate(item.summary, 50)}`);
      }
    }
  }

  return lines.join("\n");
}

export function formatImpediments(report: ImpedimentReport): string {
  const { categories } = report;
  const lines = [
    "## Impediment Analysis",
    "",
    "### Summary",
    `- **Total Impediments**: ${report.total}`,
    `- **By Category**: Technical (${categories.technical}), External (${categories.external}), Process (${categories.process}), Resource (${categories.resource})`,
  ];

  if (report.impediments.length > 0) {
    lines.push("", "### Active Impediments");
    for (const imp of report.impediments) {
      lines.push(
        `- **${imp.key}** (${imp.category}): ${truncate(imp.summary, 60)}`,
        `  *Assigned to: ${imp.assignee} | Priority: ${imp.priority}*`,
      );
    }
  } else {
    lines.push("", "✅ No impediments in the open sprint");
  }

  if (report.resolutionStrategies.length > 0) {
    lines.push("", "### Resolution Strategies", ...bullets(report.resolutionStrategies));
  }

  return lines.join("\n");
}

const FAILURE_LABELS: Record<AnalysisFailure["kind"], string> = {
  "gateway-unavailable": "Ticket backend unavailable",
  "gateway-error": "Ticket backend error",
  "no-data": "No data",
};

export function formatFailure(failure: AnalysisFailure): string {
  return `❌ ${FAILURE_LABELS[failure.kind]}: ${failure.message}`;
}

export function formatHelp(): string {
  return `## Sprint Analyst - How can I help?

I can assist you with:

**Sprint Analysis** - Check sprint health, progress, and get recommendations
*Try: "What's our sprint status?" or "How is sprint 42 doing?"*

**Velocity Tracking** - Analyze team velocity trends and capacity planning
*Try: "Show me our velocity trends" or "What's our capacity for the next iteration?"*

**Standup Facilitation** - Generate daily standup reports and team coordination
*Try: "Generate today's standup report" or "Prepare the daily meeting"*

**Impediment Management** - Identify blockers and resolution strategies
*Try: "What blockers do we have?" or "Show me current impediments"*

What would you like to explore?`;
}
