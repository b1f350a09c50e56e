import { validateCriteria } from "./criteria.js";
import { runDdm } from "./ddm.js";
import { runEfm } from "./efm.js";
import { prepareGeometry } from "./geometry.js";
import type { CriteriaReport, DdmResult, FlatSlabInput, NormalizedRecord, StiffnessSet } from "./types.js";
import { DEFAULT_UNITS, type UnitsConfig } from "./units.js";

export interface FlatSlabAnalysis {
  record: NormalizedRecord;
  criteria: CriteriaReport;
  ddm: DdmResult;
  efm: StiffnessSet;
  warnings: string[];
}

/**
 * Full run: prepare once, then validate, DDM and EFM on the same record. DDM
 * is computed even when its applicability limits are violated; the violations
 * show up in `warnings` and the caller decides whether to rely on EFM.
 */
export function analyzeFlatSlab(input: FlatSlabInput, units: UnitsConfig = DEFAULT_UNITS): FlatSlabAnalysis {
  const record = prepareGeometry(input, units);
  const criteria = validateCriteria(record);
  const ddm = runDdm(record);
  const efm = runEfm(record);

  return {
    record,
    criteria,
    ddm,
    efm,
    warnings: [...criteria.warnings, ...ddm.warnings],
  };
}
