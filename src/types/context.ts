/**
 * Conversion context - flows through every module
 * Carries configuration and the shared tracker/logger instead of module-level state
 */

import type { ConversionConfig } from "./config";
import type { Tracker } from "../utils/tracker";
import type { Logger } from "../utils/logger";

// Re-export types from tracker
export type {
  Issue,
  IssueType,
  IssueOf,
  FileIssue,
  RepairIssue,
  EdgeIssue,
  ResourceIssue,
  FileIssueReason,
  EdgeIssueReason,
  ResourceIssueReason,
  ProcessingStats,
} from "../utils/tracker";

export interface ConversionContext {
  // Input - provided at initialization
  config: ConversionConfig;

  // Unified tracking for stats and issues
  tracker: Tracker;

  logger: Logger;

  verbose?: boolean;
}
