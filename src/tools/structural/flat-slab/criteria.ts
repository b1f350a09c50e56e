/**
 * ACI 318 design criteria for flat slabs: minimum thickness (Table 8.3.1.1),
 * drop panel proportions (8.2.4) and Direct Design Method limits (8.10.2).
 *
 * Every check returns its verdict together with the threshold it used. None of
 * them throw, and a failing check never stops the others from running.
 */

import type {
  CriteriaReport,
  CriterionResult,
  DdmApplicability,
  MinThicknessResult,
  NormalizedRecord,
} from "./types.js";

// ─── Constants ───────────────────────────────────────────────────────────────

/** Values this close to a limit count as meeting it */
const LIMIT_TOLERANCE = 1e-9;

const MAX_PANEL_RATIO = 2.0;
const MAX_LOAD_RATIO = 2.0;
const MAX_SPAN_DIFFERENCE = 1 / 3;

// ─── Helpers ─────────────────────────────────────────────────────────────────

function fmt(value: number, decimals: number = 2): string {
  return Number.isFinite(value) ? value.toFixed(decimals) : String(value);
}

/** Pass when `actual >= limit` (within tolerance). */
function atLeast(name: string, actual: number, limit: number, unit: string, decimals: number = 2): CriterionResult {
  const passed = actual >= limit - LIMIT_TOLERANCE;
  return {
    name,
    passed,
    actual,
    limit,
    margin: actual - limit,
    message: passed
      ? `${name}: ${fmt(actual, decimals)} ${unit} >= ${fmt(limit, decimals)} ${unit}`
      : `${name}: ${fmt(actual, decimals)} ${unit} < required ${fmt(limit, decimals)} ${unit}`,
  };
}

/** Pass when `actual <= limit` (within tolerance). */
function atMost(name: string, actual: number, limit: number): CriterionResult {
  const passed = actual <= limit + LIMIT_TOLERANCE;
  return {
    name,
    passed,
    actual,
    limit,
    margin: limit - actual,
    message: passed
      ? `${name}: ${fmt(actual)} <= ${fmt(limit)}`
      : `${name}: ${fmt(actual)} > ${fmt(limit)} (ACI limit)`,
  };
}

// ─── Minimum thickness ───────────────────────────────────────────────────────

/**
 * ACI 318 Table 8.3.1.1 denominator for slabs without interior beams.
 *
 * | panel                      | no drop | drop |
 * |----------------------------|---------|------|
 * | exterior, no edge beam     | 30      | 33   |
 * | exterior, with edge beam   | 33      | 36   |
 * | interior                   | 33      | 36   |
 */
export function thicknessDenominator(isExterior: boolean, hasDrop: boolean, hasEdgeBeam: boolean): 30 | 33 | 36 {
  const stiffEdge = !isExterior || hasEdgeBeam;
  if (hasDrop) return stiffEdge ? 36 : 33;
  return stiffEdge ? 33 : 30;
}

export function checkMinThickness(record: NormalizedRecord): MinThicknessResult {
  const { geometry, panel, materials } = record;
  const isExterior = panel.location !== "interior";
  const denominator = thicknessDenominator(isExterior, geometry.has_drop, panel.has_edge_beam);

  const caseParts = [
    isExterior ? "Exterior panel" : "Interior panel",
    geometry.has_drop ? "with drop panel" : "without drop panel",
  ];
  if (isExterior) {
    caseParts.push(panel.has_edge_beam ? "with edge beam" : "without edge beam");
  }

  // Longer clear span governs
  const Ln = Math.max(geometry.L1_m - geometry.c1_m, geometry.L2_m - geometry.c2_m);
  const fy_factor = 0.8 + materials.fy_nominal_mpa / 1400;
  const h_computed = (Ln * fy_factor) / denominator;
  const h_absolute_min = geometry.has_drop ? 0.1 : 0.125;
  const h_required = Math.max(h_computed, h_absolute_min);
  const h_provided = geometry.h_slab_m;
  const passed = h_provided >= h_required - LIMIT_TOLERANCE;

  return {
    passed,
    case_name: caseParts.join(", "),
    denominator,
    Ln_m: Ln,
    fy_factor,
    h_computed_m: h_computed,
    h_absolute_min_m: h_absolute_min,
    h_required_m: h_required,
    h_provided_m: h_provided,
    margin_m: h_provided - h_required,
    message: `Min required: ${fmt(h_required * 100)} cm, provided ${fmt(h_provided * 100)} cm (ACI Table 8.3.1.1, Ln/${denominator})`,
  };
}

// ─── Drop panel ──────────────────────────────────────────────────────────────

/**
 * Drop panel projection must be at least h_slab/4 and it must extend L/6 from
 * the column centreline each way (total width L/3) in both directions.
 * Returns an empty list when there is no drop panel.
 */
export function checkDropPanel(record: NormalizedRecord): CriterionResult[] {
  const { geometry } = record;
  if (!geometry.has_drop) return [];

  return [
    atLeast("Drop depth", geometry.h_drop_m * 100, (geometry.h_slab_m / 4) * 100, "cm"),
    atLeast("Drop width W1", geometry.drop_w1_m, geometry.L1_m / 3, "m"),
    atLeast("Drop width W2", geometry.drop_w2_m, geometry.L2_m / 3, "m"),
  ];
}

// ─── Direct Design Method limits ─────────────────────────────────────────────

function spanDifference(a: number, b: number): number {
  const longer = Math.max(a, b);
  return (longer - Math.min(a, b)) / longer;
}

export function checkDdmApplicability(record: NormalizedRecord): DdmApplicability {
  const { geometry, loads } = record;
  const checks: CriterionResult[] = [];

  const longSide = Math.max(geometry.L1_m, geometry.L2_m);
  const shortSide = Math.min(geometry.L1_m, geometry.L2_m);
  checks.push(atMost("Panel ratio (long/short)", longSide / shortSide, MAX_PANEL_RATIO));

  let loadRatio = 0;
  if (loads.dead_pa > 0) {
    loadRatio = loads.live_pa / loads.dead_pa;
  } else if (loads.live_pa > 0) {
    loadRatio = Infinity;
  }
  checks.push(atMost("Load ratio (LL/DL)", loadRatio, MAX_LOAD_RATIO));

  // Successive spans: only where both neighbours exist
  const { spans } = geometry;
  if (spans.L1_left_m > 0 && spans.L1_right_m > 0) {
    checks.push(
      atMost("Successive span difference L1", spanDifference(spans.L1_left_m, spans.L1_right_m), MAX_SPAN_DIFFERENCE),
    );
  }
  if (spans.L2_top_m > 0 && spans.L2_bottom_m > 0) {
    checks.push(
      atMost("Successive span difference L2", spanDifference(spans.L2_top_m, spans.L2_bottom_m), MAX_SPAN_DIFFERENCE),
    );
  }

  const violations = checks.filter((c) => !c.passed).map((c) => c.message);
  return { applicable: violations.length === 0, checks, violations };
}

// ─── Report ──────────────────────────────────────────────────────────────────

export function validateCriteria(record: NormalizedRecord): CriteriaReport {
  const min_thickness = checkMinThickness(record);
  const drop_panel = checkDropPanel(record);
  const ddm_applicable = checkDdmApplicability(record);

  const warnings = ddm_applicable.violations.map((v) => `DDM not applicable: ${v}`);
  if (!min_thickness.passed) {
    warnings.push(
      `Slab thickness ${fmt(min_thickness.h_provided_m * 100)} cm is below the ACI minimum ` +
        `${fmt(min_thickness.h_required_m * 100)} cm; deflections must be computed.`,
    );
  }
  for (const check of drop_panel) {
    if (!check.passed) warnings.push(`Drop panel: ${check.message}`);
  }

  return {
    min_thickness,
    drop_panel,
    ddm_applicable,
    efm_applicable: {
      applicable: true,
      notes: ["EFM is applicable for this geometry."],
    },
    warnings,
  };
}
