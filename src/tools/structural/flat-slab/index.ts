export { analyzeFlatSlab, type FlatSlabAnalysis } from "./analyze.js";
export {
  checkDdmApplicability,
  checkDropPanel,
  checkMinThickness,
  thicknessDenominator,
  validateCriteria,
} from "./criteria.js";
export {
  barAreaCm2,
  checkPunchingShear,
  designFlexure,
  getColStripPercent,
  getMomentCoefficients,
  runDdm,
  solveReinforcementRatio,
  torsionConstant,
  torsionalStiffnessRatio,
  type Outcome,
  type StripMomentLocation,
} from "./ddm.js";
export { equivalentColumnStiffness, runEfm } from "./efm.js";
export { FlatSlabInputError } from "./errors.js";
export { STEEL_GRADE_PROPERTIES, prepareGeometry } from "./geometry.js";
export { FLAT_SLAB_PARAMETERS, parseFlatSlabArgs } from "./input.js";
export { lerp, lerpTable, roundForReport } from "./interpolate.js";
export type * from "./types.js";
export {
  BAR_NAMES,
  COLUMN_LOCATIONS,
  FAR_END_CONDITIONS,
  JOINT_TYPES,
  STEEL_GRADES,
} from "./types.js";
export { DEFAULT_UNITS, concreteModulusMpa, mpaToPa, paToMpa, type UnitsConfig } from "./units.js";
