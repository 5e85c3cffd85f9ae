import type { DriftReport } from "./protocol.js";

export type ReportFormat = "markdown" | "json";

export function exitCodeFor(report: DriftReport): 0 | 1 {
  return report.violations.length === 0 ? 0 : 1;
}

export function renderMarkdown(report: DriftReport): string {
  if (report.violations.length === 0) {
    return [
      "## Contract check passed",
      "",
      `No contract violations across ${report.changes.length} field change(s).`,
      "",
    ].join("\n");
  }

  const lines = [
    "## Contract violations detected",
    "",
    `**Total violations:** ${report.violations.length}`,
    "",
  ];
  report.violations.forEach((v, i) => {
    lines.push(`- **Violation ${i + 1}:** Field \`${v.field}\` [${v.kind}]`);
    lines.push(`  - **Schema:** ${v.schema}`);
    lines.push(`  - **Issue:** ${v.details}`);
  });
  lines.push(
    "",
    "**Recommended actions:**",
    "- Review the model changes for contract consistency",
    "- Update the contract to match the code, or revert the field change",
    ""
  );
  return lines.join("\n");
}

export function renderJson(report: DriftReport): string {
  return JSON.stringify({ changes: report.changes, violations: report.violations }, null, 2) + "\n";
}

export function render(report: DriftReport, format: ReportFormat): string {
  return format === "json" ? renderJson(report) : renderMarkdown(report);
}
