import {
  existsSync,
  mkdirSync,
  readdirSync,
  statSync,
  unlinkSync,
  writeFileSync,
} from "node:fs";
import { basename, extname, join } from "node:path";
import type { ReportConfig } from "../../core/domain/entities/config.entity.js";
import type { RunCommand } from "../../core/domain/types.js";

export interface RunReport {
  runId: string;
  command: RunCommand;
  startedAt: string;
  finishedAt: string;
  options: Record<string, boolean>;
  totalItems: number;
  counters: Record<string, number>;
  orphans?: string[];
}

const REPORT_EXTENSIONS = [".json", ".md"];
const REPORT_BASE = /^report_[^_]+_(.+)$/;

/** The run id of a report base name (`report_<command>_<runId>`). */
function reportRunId(base: string): string | null {
  return REPORT_BASE.exec(base)?.[1] ?? null;
}

export function markdownReport(report: RunReport): string {
  const title = report.command === "sync" ? "Sync report" : "Verify report";
  const enabled = Object.entries(report.options)
    .filter(([, on]) => on)
    .map(([name]) => name);
  const lines = [
    `# ${title}: ${report.runId}`,
    "",
    `- Started: ${report.startedAt}`,
    `- Finished: ${report.finishedAt}`,
    `- Options: ${enabled.length > 0 ? enabled.join(", ") : "none"}`,
    `- Attachments: ${report.totalItems}`,
    "",
    "| Counter | Value |",
    "| --- | ---: |",
    ...Object.entries(report.counters).map(
      ([name, value]) => `| ${name} | ${value} |`,
    ),
  ];
  if (report.orphans && report.orphans.length > 0) {
    lines.push("", "## Orphan keys", "");
    for (const key of report.orphans) lines.push(`- \`${key}\``);
  }
  return lines.join("\n") + "\n";
}

/**
 * Keep the newest `retainCount` report sets (json + md sharing a base name).
 * Zero keeps everything.
 */
export function pruneOldReports(outDir: string, retainCount: number): void {
  if (retainCount <= 0) return;
  const files = readdirSync(outDir, { withFileTypes: true }).filter(
    (e) =>
      e.isFile() &&
      REPORT_EXTENSIONS.includes(extname(e.name)) &&
      reportRunId(basename(e.name, extname(e.name))) !== null,
  );
  const baseToMtime = new Map<string, number>();
  for (const e of files) {
    const base = basename(e.name, extname(e.name));
    const mtime = statSync(join(outDir, e.name)).mtimeMs;
    const existing = baseToMtime.get(base);
    if (existing === undefined || mtime > existing) baseToMtime.set(base, mtime);
  }
  // Newest first; run ids start with their timestamp, which breaks mtime ties.
  const basesByAge = [...baseToMtime.entries()].sort(
    (a, b) =>
      b[1] - a[1] ||
      (reportRunId(b[0]) ?? "").localeCompare(reportRunId(a[0]) ?? "") ||
      b[0].localeCompare(a[0]),
  );
  const toKeep = new Set(
    basesByAge.slice(0, retainCount).map(([base]) => base),
  );
  for (const e of files) {
    const base = basename(e.name, extname(e.name));
    if (toKeep.has(base)) continue;
    try {
      unlinkSync(join(outDir, e.name));
    } catch (err) {
      console.error(`[Reports] Could not prune ${e.name}:`, err);
    }
  }
}

/** Writes one report set and returns the paths written. */
export function writeReports(config: ReportConfig, report: RunReport): string[] {
  const outDir = config.outputDir;
  if (!existsSync(outDir)) mkdirSync(outDir, { recursive: true });

  const base = `report_${report.command}_${report.runId}`;
  const written: string[] = [];
  if (config.formats.includes("json")) {
    const path = join(outDir, `${base}.json`);
    writeFileSync(path, JSON.stringify(report, null, 2), "utf-8");
    written.push(path);
  }
  if (config.formats.includes("markdown")) {
    const path = join(outDir, `${base}.md`);
    writeFileSync(path, markdownReport(report), "utf-8");
    written.push(path);
  }
  pruneOldReports(outDir, config.retainCount);
  return written;
}
