/**
 * Repair stage contract
 */

import type { ParseFailure } from "../../types";

export type RepairStageName = "escape" | "structural" | "last-resort";

export interface RepairContext {
  // Namespace injected on a <graphml> root that declares none
  namespace: string;
  // Failure reported by the parse attempt just before this stage
  previousFailure: ParseFailure | null;
}

export interface RepairStage {
  name: RepairStageName;
  description: string;
  apply(text: string, context: RepairContext): string;
}
