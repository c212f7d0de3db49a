/**
 * Conversion Tracker
 * Unified tracking for stats and issues
 */

import { ZodError } from "zod";
import { isConversionError } from "../errors";
import type { RepairStageName } from "../xml/stages";

// ============================================================================
// Types
// ============================================================================

// Type-safe reasons for each issue type
export type FileIssueReason =
  | "not-found"
  | "unsupported-format"
  | "schema-mismatch"
  | "malformed-document"
  | "read-error"
  | "write-error";
export type ResourceIssueReason =
  | "invalid-json"
  | "schema-validation"
  | "read-error";
export type EdgeIssueReason = "missing-endpoint" | "dangling";

// Discriminated union - each type has its own subset of reasons
export interface FileIssue {
  type: "file";
  path: string;
  reason: FileIssueReason;
  details?: string;
}

export interface RepairIssue {
  type: "repair";
  path: string;
  stage: RepairStageName;
}

export interface EdgeIssue {
  type: "edge";
  path: string;
  reason: EdgeIssueReason;
  text: string;
}

export interface ResourceIssue {
  type: "resource";
  path: string;
  reason: ResourceIssueReason;
  details?: string;
}

export type Issue = FileIssue | RepairIssue | EdgeIssue | ResourceIssue;
export type IssueType = Issue["type"];
export type IssueOf<T extends IssueType> = Extract<Issue, { type: T }>;

export interface ProcessingStats {
  // File counts
  totalFiles: number;
  successfulFiles: number;
  failedFiles: number;

  // Graph counts
  nodes: number;
  edges: number;
  discardedEdges: number;
  danglingEdges: number;

  // Documents that needed the repair ladder
  repairedFiles: number;

  // All issues
  issues: Issue[];

  // Timing
  duration: number;
}

// ============================================================================
// Error Mapping (private)
// ============================================================================

interface IssueInfo<T> {
  reason: T;
  details: string;
}

function mapResourceError(error: unknown): IssueInfo<ResourceIssueReason> {
  if (error instanceof ZodError) {
    return {
      reason: "schema-validation",
      details: error.issues.map((e) => e.message).join("; "),
    };
  }
  if (error instanceof SyntaxError) {
    return {
      reason: "invalid-json",
      details: error.message,
    };
  }
  if (error instanceof Error) {
    return {
      reason: "read-error",
      details: error.message,
    };
  }
  return {
    reason: "read-error",
    details: String(error),
  };
}

function mapFileError(error: unknown): IssueInfo<FileIssueReason> {
  if (isConversionError(error)) {
    const reason: FileIssueReason =
      error.kind === "file-not-found" ? "not-found" : error.kind;
    return { reason, details: error.message };
  }

  const details = error instanceof Error ? error.message : String(error);

  if (error instanceof Error && "code" in error) {
    if (error.code === "ENOENT") {
      return { reason: "not-found", details };
    }
    if (error.code === "EACCES" || error.code === "EPERM") {
      return { reason: "write-error", details };
    }
  }

  return { reason: "read-error", details };
}

// ============================================================================
// Tracker Class
// ============================================================================

export class Tracker {
  private totalFiles = 0;
  private successfulFiles = 0;
  private failedFiles = 0;
  private nodes = 0;
  private edges = 0;
  private discardedEdges = 0;
  private danglingEdges = 0;
  private repairedFiles = 0;
  private issues: Issue[] = [];
  private startTime = new Date();

  // ============================================================================
  // Stat counters
  // ============================================================================

  setTotalFiles(count: number): void {
    this.totalFiles = count;
  }

  incrementSuccessful(): void {
    this.successfulFiles++;
  }

  incrementFailed(): void {
    this.failedFiles++;
  }

  addGraph(nodes: number, edges: number): void {
    this.nodes += nodes;
    this.edges += edges;
  }

  // ============================================================================
  // Issue tracking
  // ============================================================================

  /**
   * Track an issue from an error, auto-detecting the reason based on error type
   */
  trackError(path: string, error: unknown, type: "file" | "resource"): void {
    switch (type) {
      case "file": {
        const { reason, details } = mapFileError(error);
        this.issues.push({ type: "file", path, reason, details });
        break;
      }
      case "resource": {
        const { reason, details } = mapResourceError(error);
        this.issues.push({ type: "resource", path, reason, details });
        break;
      }
    }
  }

  trackRepair(path: string, stage: RepairStageName): void {
    this.repairedFiles++;
    this.issues.push({ type: "repair", path, stage });
  }

  trackEdgeIssue(path: string, text: string, reason: EdgeIssueReason): void {
    if (reason === "dangling") {
      this.danglingEdges++;
    } else {
      this.discardedEdges++;
    }
    this.issues.push({ type: "edge", path, reason, text });
  }

  // ============================================================================
  // Issue getters
  // ============================================================================

  getIssues<T extends IssueType>(type: T): IssueOf<T>[] {
    return this.issues.filter((i): i is IssueOf<T> => i.type === type);
  }

  // ============================================================================
  // Results
  // ============================================================================

  /**
   * Get final processing statistics
   */
  getStats(): ProcessingStats {
    const duration = Date.now() - this.startTime.getTime();

    return {
      totalFiles: this.totalFiles,
      successfulFiles: this.successfulFiles,
      failedFiles: this.failedFiles,
      nodes: this.nodes,
      edges: this.edges,
      discardedEdges: this.discardedEdges,
      danglingEdges: this.danglingEdges,
      repairedFiles: this.repairedFiles,
      issues: this.issues,
      duration,
    };
  }
}
