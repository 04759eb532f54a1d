import { describe, it, expect } from "vitest";

import {
  formatIssue,
  partitionIssues,
  summaryRows,
} from "../../../src/cli/utils/display.js";

import type { SyncSummary } from "../../../src/types/index.js";

describe("summaryRows", () => {
  it("should list every counter in display order", () => {
    const summary: SyncSummary = {
      candidates: 5,
      alreadyImported: 2,
      newlyImported: 2,
      failed: 1,
      ledgerErrors: 0,
      indicatorsCreated: 7,
      indicatorsReused: 3,
      indicatorsSkipped: 1,
      indicatorsFailed: 0,
      edgesCreated: 10,
      errors: [
        { collectionId: "p5", message: "createEvent failed: boom", retryable: true },
      ],
      startedAt: new Date("2026-06-15T10:00:00.000Z"),
      finishedAt: new Date("2026-06-15T10:00:02.500Z"),
    };

    expect(summaryRows(summary)).toEqual([
      ["Candidate pulses", "5"],
      ["Already imported", "2"],
      ["Newly imported", "2"],
      ["Failed imports", "1"],
      ["Ledger check errors", "0"],
      ["Indicators created", "7"],
      ["Indicators reused", "3"],
      ["Indicators skipped", "1"],
      ["Indicators failed", "0"],
      ["Relationships created", "10"],
      ["Duration", "2.5s"],
    ]);
  });
});

describe("partitionIssues", () => {
  it("should separate retryable issues from the rest", () => {
    const transient = { collectionId: "p1", message: "connection reset", retryable: true };
    const rejected = { collectionId: "p2", message: "value too long", retryable: false };
    const unreadable = { message: "Unreadable pulse: /id: Expected string", retryable: false };

    expect(partitionIssues([transient, rejected, unreadable])).toEqual({
      retryable: [transient],
      permanent: [rejected, unreadable],
    });
  });
});

describe("formatIssue", () => {
  it("should prefix the pulse id", () => {
    expect(
      formatIssue({ collectionId: "p1", message: "connection reset", retryable: true })
    ).toBe("p1: connection reset");
  });

  it("should mark issues without an id", () => {
    expect(formatIssue({ message: "Unreadable pulse: bad", retryable: false })).toBe(
      "(no id): Unreadable pulse: bad"
    );
  });
});
