/**
 * Barrel file — exports all tool definitions for flatslab.
 *
 * Each tool follows the pattern: createXxxToolDefinition() → ToolDefinition
 */

// ─── Structural ─────────────────────────────────────────────────────────────
import { createFlatSlabAnalysisToolDefinition } from "./structural/flat-slab-analysis.js";
import { createFlatSlabCriteriaToolDefinition } from "./structural/flat-slab-criteria.js";
import { createFlatSlabDdmToolDefinition } from "./structural/flat-slab-ddm.js";
import { createFlatSlabEfmToolDefinition } from "./structural/flat-slab-efm.js";

// ─── Re-export all individual creators ──────────────────────────────────────
export {
  createFlatSlabAnalysisToolDefinition,
  createFlatSlabCriteriaToolDefinition,
  createFlatSlabDdmToolDefinition,
  createFlatSlabEfmToolDefinition,
};

// ─── Convenience: build all tools at once ───────────────────────────────────

export function createAllToolDefinitions() {
  return [
    createFlatSlabCriteriaToolDefinition(),
    createFlatSlabDdmToolDefinition(),
    createFlatSlabEfmToolDefinition(),
    createFlatSlabAnalysisToolDefinition(),
  ];
}
