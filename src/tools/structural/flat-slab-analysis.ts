/**
 * Complete flat slab run for one column: criteria, DDM and EFM on a single
 * prepared record.
 */

import {
  FLAT_SLAB_PARAMETERS,
  analyzeFlatSlab,
  parseFlatSlabArgs,
  roundForReport,
} from "./flat-slab/index.js";

export function createFlatSlabAnalysisToolDefinition() {
  return {
    name: "flat_slab_analysis",
    label: "Flat Slab Full Analysis",
    description:
      "Run the complete flat slab workflow for one column and its panels: ACI 318 design criteria, " +
      "Direct Design Method moments, reinforcement and punching shear, and Equivalent Frame Method " +
      "stiffnesses. Returns the normalized input record, every result and the combined warnings.",
    parameters: FLAT_SLAB_PARAMETERS,
    execute: async (
      _toolCallId: string,
      args: unknown,
    ): Promise<{
      content: Array<{ type: string; text: string }>;
      details?: unknown;
    }> => {
      const analysis = analyzeFlatSlab(parseFlatSlabArgs(args));
      const { criteria, ddm } = analysis;

      const recommended_method = criteria.ddm_applicable.applicable ? "DDM" : "EFM";
      const result = roundForReport({ ...analysis, recommended_method });

      return {
        content: [{ type: "text", text: JSON.stringify(result, null, 2) }],
        details: {
          recommended_method,
          thickness_ok: criteria.min_thickness.passed,
          Mo_kNm: ddm.Mo_kNm,
          warning_count: analysis.warnings.length,
        },
      };
    },
  };
}
