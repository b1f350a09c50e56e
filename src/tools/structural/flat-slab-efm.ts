/**
 * Flat slab Equivalent Frame Method stiffness tool.
 */

import {
  FLAT_SLAB_PARAMETERS,
  parseFlatSlabArgs,
  prepareGeometry,
  roundForReport,
  runEfm,
} from "./flat-slab/index.js";

export function createFlatSlabEfmToolDefinition() {
  return {
    name: "flat_slab_efm",
    label: "Flat Slab EFM Stiffness",
    description:
      "Compute Equivalent Frame Method member stiffnesses for a flat slab joint per ACI 318 " +
      "Section 8.11: slab-beam Ks, column Kc above and below (4EI/L fixed or 3EI/L pinned far end), " +
      "torsional member Kt, equivalent column Kec and the joint distribution factors. Use when " +
      "the Direct Design Method limits are not met. Stiffnesses are in N·m/rad.",
    parameters: FLAT_SLAB_PARAMETERS,
    execute: async (
      _toolCallId: string,
      args: unknown,
    ): Promise<{
      content: Array<{ type: string; text: string }>;
      details?: unknown;
    }> => {
      const record = prepareGeometry(parseFlatSlabArgs(args));
      const efm = runEfm(record);

      return {
        content: [{ type: "text", text: JSON.stringify(roundForReport(efm), null, 2) }],
        details: {
          joint_type: efm.concept.joint_type,
          DF_slab: efm.DF_slab,
          DF_col: efm.DF_col,
        },
      };
    },
  };
}
