/**
 * Display utilities for CLI output formatting
 */

import chalk from "chalk";
import CliTable3 from "cli-table3";

import type {
  Collection,
  ImportedEventSummary,
  SyncIssue,
  SyncSummary,
} from "../../types/index.js";

function formatDate(date: Date | undefined): string {
  return date !== undefined ? (date.toISOString().split("T")[0] ?? "") : "-";
}

function truncate(text: string, max: number): string {
  return text.length > max ? text.slice(0, max - 3) + "..." : text;
}

/**
 * Label/value rows of a sync summary, in display order
 */
export function summaryRows(summary: SyncSummary): [string, string][] {
  const seconds =
    (summary.finishedAt.getTime() - summary.startedAt.getTime()) / 1000;

  return [
    ["Candidate pulses", String(summary.candidates)],
    ["Already imported", String(summary.alreadyImported)],
    ["Newly imported", String(summary.newlyImported)],
    ["Failed imports", String(summary.failed)],
    ["Ledger check errors", String(summary.ledgerErrors)],
    ["Indicators created", String(summary.indicatorsCreated)],
    ["Indicators reused", String(summary.indicatorsReused)],
    ["Indicators skipped", String(summary.indicatorsSkipped)],
    ["Indicators failed", String(summary.indicatorsFailed)],
    ["Relationships created", String(summary.edgesCreated)],
    ["Duration", `${seconds.toFixed(1)}s`],
  ];
}

export function formatIssue(issue: SyncIssue): string {
  return `${issue.collectionId ?? "(no id)"}: ${issue.message}`;
}

/**
 * Split run errors into those the next scheduled run may clear and those
 * that need someone to look at them
 */
export function partitionIssues(issues: SyncIssue[]): {
  retryable: SyncIssue[];
  permanent: SyncIssue[];
} {
  return {
    retryable: issues.filter((i) => i.retryable),
    permanent: issues.filter((i) => !i.retryable),
  };
}

function printIssues(heading: string, issues: SyncIssue[]): void {
  if (issues.length === 0) {
    return;
  }
  console.log(heading);
  for (const issue of issues.slice(0, 20)) {
    console.log(`  ${formatIssue(issue)}`);
  }
  if (issues.length > 20) {
    console.log(`  ... and ${String(issues.length - 20)} more`);
  }
}

/**
 * Display the aggregate counts of a sync run, followed by any errors
 */
export function displaySyncSummary(summary: SyncSummary): void {
  const table = new CliTable3({
    head: [chalk.cyan("Sync summary"), chalk.cyan("Count")],
    colWidths: [26, 12],
  });

  for (const row of summaryRows(summary)) {
    table.push(row);
  }

  console.log(table.toString());

  const { retryable, permanent } = partitionIssues(summary.errors);
  printIssues(
    chalk.bold.red(`\nNeeds attention (${String(permanent.length)}):`),
    permanent
  );
  printIssues(
    chalk.bold.yellow(`\nWill be retried next run (${String(retryable.length)}):`),
    retryable
  );
}

/**
 * Display subscribed pulses in a formatted table
 */
export function displayCollectionsTable(collections: Collection[]): void {
  const table = new CliTable3({
    head: [
      chalk.cyan("ID"),
      chalk.cyan("Title"),
      chalk.cyan("Modified"),
      chalk.cyan("Indicators"),
    ],
    colWidths: [28, 56, 12, 12],
    wordWrap: true,
  });

  for (const c of collections) {
    table.push([
      chalk.green(c.id),
      truncate(c.title, 52),
      formatDate(c.modifiedAt),
      String(c.indicators.length),
    ]);
  }

  console.log(table.toString());
}

/**
 * Display one pulse with its indicators grouped by type
 */
export function displayCollection(collection: Collection): void {
  console.log(chalk.bold(`\n${collection.title}`));
  console.log(`  ID:        ${collection.id}`);
  console.log(`  Author:    ${collection.author ?? "-"}`);
  console.log(`  Created:   ${formatDate(collection.createdAt)}`);
  console.log(`  Modified:  ${formatDate(collection.modifiedAt)}`);
  console.log(`  Tags:      ${collection.tags.join(", ") || "-"}`);

  if (collection.references.length > 0) {
    console.log("  References:");
    for (const ref of collection.references) {
      console.log(`    ${ref}`);
    }
  }

  if (collection.description !== "") {
    console.log(`\n${collection.description}`);
  }

  const byType = new Map<string, number>();
  for (const indicator of collection.indicators) {
    byType.set(indicator.type, (byType.get(indicator.type) ?? 0) + 1);
  }

  const table = new CliTable3({
    head: [chalk.cyan("Indicator type"), chalk.cyan("Count")],
  });
  for (const [type, count] of [...byType.entries()].sort((a, b) =>
    a[0].localeCompare(b[0])
  )) {
    table.push([type, String(count)]);
  }
  console.log(table.toString());
}

/**
 * Display imported pulses (one row per ticket)
 */
export function displayImportsTable(imports: ImportedEventSummary[]): void {
  const table = new CliTable3({
    head: [
      chalk.cyan("Pulse"),
      chalk.cyan("Event"),
      chalk.cyan("Title"),
      chalk.cyan("Indicators"),
      chalk.cyan("Imported"),
    ],
    colWidths: [28, 10, 48, 12, 12],
    wordWrap: true,
  });

  for (const row of imports) {
    table.push([
      chalk.green(row.ticketNumber),
      row.eventId,
      truncate(row.title, 44),
      String(row.indicatorCount),
      formatDate(row.importedAt),
    ]);
  }

  console.log(table.toString());
}
