import { encode } from "@toon-format/toon";
import type { RegistryListing } from "../core/registry.js";
import type { SyncAllResult, SyncOutcome } from "../core/sync.js";
import type { VerificationReport, VerifyAllResult } from "../core/verify.js";
import type { RebalancePlan } from "../core/rebalance.js";
import type { RenameFailure, RenameRecord } from "./errors.js";

// ─── Output format enum ─────────────────────────────────────────────

export type OutputFormat = "toon" | "json" | "table";

/**
 * Determine the output format from CLI flags.
 * Priority: --json > --table > default (toon).
 */
export function resolveFormat(opts: {
  json?: boolean;
  table?: boolean;
}): OutputFormat {
  if (opts.json) return "json";
  if (opts.table) return "table";
  return "toon";
}

/**
 * Render a structured value as JSON or TOON, or hand off to `table` for
 * the human-readable form.
 */
export function render(
  value: unknown,
  format: OutputFormat,
  table: () => string,
): string {
  switch (format) {
    case "json":
      return JSON.stringify(value, null, 2);
    case "toon":
      return encode(value);
    case "table":
      return table();
  }
}

const ok = (label: string) => `✓ ${label}`;
const bad = (label: string) => `✗ ${label}`;
const warn = (label: string) => `⚠ ${label}`;

// ─── Registry listing ────────────────────────────────────────────────

export function formatListing(listing: RegistryListing, format: OutputFormat): string {
  const objects = listing.map(([source, entry]) => ({
    source,
    mirrors: entry.mirrors,
    lastSync: entry.lastSync,
    hash: entry.hash,
  }));

  return render(objects, format, () => {
    if (listing.length === 0) return "No sources registered.";
    const lines: string[] = [];
    for (const [source, entry] of listing) {
      const hash = entry.hash ? entry.hash.slice(0, 12) : "-";
      lines.push(`${source}  (last sync: ${entry.lastSync}, hash: ${hash})`);
      if (entry.mirrors.length === 0) {
        lines.push("  (no mirrors)");
      }
      for (const mirror of entry.mirrors) {
        lines.push(`  → ${mirror}`);
      }
    }
    return lines.join("\n");
  });
}

// ─── Sync ────────────────────────────────────────────────────────────

function outcomeLines(outcome: SyncOutcome): string[] {
  if (outcome.status === "failed") {
    return [bad(`${outcome.source}: ${outcome.error}`)];
  }
  const lines = [
    (outcome.ok ? ok : warn)(`${outcome.source} (${outcome.hash.slice(0, 12)})`),
  ];
  for (const m of outcome.mirrors) {
    lines.push(m.ok ? `  ✓ ${m.path}` : `  ✗ ${m.error ?? m.path}`);
  }
  return lines;
}

export function formatSyncAll(result: SyncAllResult, format: OutputFormat): string {
  return render(result, format, () => {
    if (result.outcomes.length === 0) return "No sources registered.";
    const synced = result.outcomes.filter((o) => o.status === "synced").length;
    return [
      ...result.outcomes.flatMap(outcomeLines),
      "",
      `${synced}/${result.outcomes.length} source(s) synced`,
    ].join("\n");
  });
}

// ─── Verify ──────────────────────────────────────────────────────────

function reportLines(report: VerificationReport): string[] {
  const lines = [(report.allInSync ? ok : bad)(report.source)];
  if (report.sourceError) {
    lines.push(`  source unreadable: ${report.sourceError}`);
  }
  if (report.neverSynced) {
    lines.push("  never synced");
  } else if (report.sourceChangedSinceSync) {
    lines.push(`  source changed since last sync (${report.lastSync})`);
  }
  for (const m of report.mirrors) {
    const detail = m.error ? ` (${m.error})` : "";
    lines.push(`  ${m.status.padEnd(10)} ${m.path}${detail}`);
  }
  return lines;
}

export function formatVerifyAll(result: VerifyAllResult, format: OutputFormat): string {
  return render(result, format, () => {
    if (result.reports.length === 0) return "No sources registered.";
    const clean = result.reports.filter((r) => r.allInSync).length;
    return [
      ...result.reports.flatMap(reportLines),
      "",
      `${clean}/${result.reports.length} source(s) in sync`,
    ].join("\n");
  });
}

// ─── Rebalance ───────────────────────────────────────────────────────

export function formatPlan(p: RebalancePlan, format: OutputFormat): string {
  const changes = p.steps.filter((s) => !s.unchanged);
  const value = {
    dir: p.dir,
    start: p.start,
    files: p.steps.length,
    changes: changes.map((s) => ({ from: s.from, to: s.to })),
  };

  return render(value, format, () => {
    if (p.steps.length === 0) return `No tagged files in ${p.dir}.`;
    if (changes.length === 0) return `${p.dir} is already balanced (${p.steps.length} file(s)).`;

    const width = Math.max(...changes.map((s) => s.from.length));
    return [
      `${changes.length} of ${p.steps.length} file(s) in ${p.dir} will be renamed:`,
      ...changes.map((s) => `  ${s.from.padEnd(width)}  →  ${s.to}`),
    ].join("\n");
  });
}

export function formatRenames(
  renamed: RenameRecord[],
  pending: RenameRecord[],
  failures: RenameFailure[],
  format: OutputFormat,
): string {
  return render({ renamed, pending, failures }, format, () => {
    const lines = [ok(`${renamed.length} rename(s) done`)];
    if (failures.length > 0) {
      lines.push(bad(`${failures.length} rename(s) failed`));
      for (const f of failures) lines.push(`  ${f.from}: ${f.error}`);
    }
    if (pending.length > 0) {
      lines.push(warn(`${pending.length} file(s) still pending`));
      for (const r of pending) lines.push(`  ${r.from}  →  ${r.to}`);
    }
    return lines.join("\n");
  });
}
