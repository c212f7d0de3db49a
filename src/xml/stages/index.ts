/**
 * Repair stages, in order of increasing invasiveness
 */

import { escapeStage } from "./escape";
import { structuralStage } from "./structural";
import { lastResortStage } from "./last-resort";
import type { RepairStage } from "./types";

export const REPAIR_STAGES: readonly RepairStage[] = [
  escapeStage,
  structuralStage,
  lastResortStage,
];

export type { RepairStage, RepairStageName, RepairContext } from "./types";
export { escapeStage, escapeText, escapeTextContent } from "./escape";
export {
  structuralStage,
  stripUnprintable,
  repairDeclaration,
  injectDefaultNamespace,
  closeUnclosedTags,
  completeTruncatedReferences,
  DEFAULT_DECLARATION,
} from "./structural";
export {
  lastResortStage,
  normalizeReferences,
  repairMojibake,
  reescapeLine,
} from "./last-resort";
