/**
 * Flat slab design criteria tool.
 *
 * Checks ACI 318 minimum thickness, drop panel proportions and the Direct
 * Design Method limits for one column/panel case, and says whether DDM or
 * only EFM may be used.
 */

import {
  FLAT_SLAB_PARAMETERS,
  parseFlatSlabArgs,
  prepareGeometry,
  roundForReport,
  validateCriteria,
} from "./flat-slab/index.js";

export function createFlatSlabCriteriaToolDefinition() {
  return {
    name: "flat_slab_criteria",
    label: "Flat Slab Design Criteria",
    description:
      "Check a flat slab panel against ACI 318 design criteria: minimum thickness (Table 8.3.1.1), " +
      "drop panel depth and extent, and the Direct Design Method applicability limits (panel ratio, " +
      "live/dead load ratio, successive span difference). Inputs use cm, m, ksc and kg/m².",
    parameters: FLAT_SLAB_PARAMETERS,
    execute: async (
      _toolCallId: string,
      args: unknown,
    ): Promise<{
      content: Array<{ type: string; text: string }>;
      details?: unknown;
    }> => {
      const record = prepareGeometry(parseFlatSlabArgs(args));
      const criteria = validateCriteria(record);

      const result = roundForReport({
        location: record.panel.location,
        L1_m: record.geometry.L1_m,
        L2_m: record.geometry.L2_m,
        h_slab_cm: record.geometry.h_slab_m * 100,
        ...criteria,
        recommended_method: criteria.ddm_applicable.applicable ? "DDM" : "EFM",
      });

      return {
        content: [{ type: "text", text: JSON.stringify(result, null, 2) }],
        details: {
          thickness_ok: criteria.min_thickness.passed,
          ddm_applicable: criteria.ddm_applicable.applicable,
          warning_count: criteria.warnings.length,
        },
      };
    },
  };
}
