/**
 * Flat slab Direct Design Method tool: static moment, column/middle strip
 * moments, reinforcement per strip and punching shear at one column.
 */

import {
  FLAT_SLAB_PARAMETERS,
  checkDdmApplicability,
  parseFlatSlabArgs,
  prepareGeometry,
  roundForReport,
  runDdm,
} from "./flat-slab/index.js";

export function createFlatSlabDdmToolDefinition() {
  return {
    name: "flat_slab_ddm",
    label: "Flat Slab DDM Design",
    description:
      "Design a flat slab (flat plate or with drop panels) by the ACI 318 Direct Design Method. " +
      "Computes the total static moment Mo, distributes it to exterior negative, positive and " +
      "interior negative moments and to column and middle strips, sizes the bottom/top " +
      "reinforcement for each strip (with a bar spacing suggestion) and checks two-way punching " +
      "shear at the column face and, when present, the drop panel face.",
    parameters: FLAT_SLAB_PARAMETERS,
    execute: async (
      _toolCallId: string,
      args: unknown,
    ): Promise<{
      content: Array<{ type: string; text: string }>;
      details?: unknown;
    }> => {
      const record = prepareGeometry(parseFlatSlabArgs(args));
      const applicability = checkDdmApplicability(record);
      const ddm = runDdm(record);

      const warnings = [
        ...applicability.violations.map((v) => `DDM not applicable: ${v}`),
        ...ddm.warnings,
      ];
      const overall_status =
        ddm.rebar.some((s) => s.status === "FAIL") || ddm.shear.some((s) => s.status === "FAIL")
          ? "FAIL"
          : "PASS";

      const result = roundForReport({
        ...ddm,
        wu_kgm2: record.loads.wu_kgm2,
        ddm_applicable: applicability.applicable,
        warnings,
        overall_status,
      });

      return {
        content: [{ type: "text", text: JSON.stringify(result, null, 2) }],
        details: {
          case_name: ddm.case_name,
          Mo_kNm: ddm.Mo_kNm,
          ddm_applicable: applicability.applicable,
          overall_status,
        },
      };
    },
  };
}
