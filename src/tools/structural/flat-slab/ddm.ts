/**
 * Direct Design Method (ACI 318 Section 8.10) for flat slabs without interior
 * beams.
 *
 * Pipeline: total static moment → longitudinal coefficients → column strip /
 * middle strip split → flexural design of each strip location → two-way
 * (punching) shear at the column and drop panel faces.
 *
 * Numeric domain problems never throw: a section that cannot be designed is
 * returned with status FAIL and As = 0, a failing shear perimeter is reported
 * as a warning, and the remaining locations are still evaluated.
 */

import { lerp, lerpTable } from "./interpolate.js";
import type {
  BarName,
  ColumnLocation,
  DdmResult,
  MomentCoefficients,
  MomentComponent,
  MomentComponentName,
  NormalizedRecord,
  PanelCase,
  RebarSection,
  ShearCheckResult,
  ShearPerimeter,
  SpanInput,
  StripName,
} from "./types.js";
import { CM2_PER_M2 } from "./units.js";

// ─── Constants ───────────────────────────────────────────────────────────────

const PHI_FLEXURE = 0.9;
const PHI_SHEAR = 0.75;
const COVER_M = 0.03;
/** Rn above this fraction of fc' is treated as an over-reinforced section */
const RN_CEILING_RATIO = 0.35;
const MIN_CLEAR_SPAN_RATIO = 0.65;
const MAX_BAR_SPACING_CM = 45;
const BETA_T_LIMIT = 2.5;

export const BAR_DIAMETERS_MM: Record<BarName, number> = {
  DB10: 10,
  DB12: 12,
  DB16: 16,
  DB20: 20,
  DB25: 25,
};

export function barAreaCm2(bar: BarName): number {
  const d_cm = BAR_DIAMETERS_MM[bar] / 10;
  return (Math.PI * d_cm * d_cm) / 4;
}

// ─── Result type ─────────────────────────────────────────────────────────────

export type Outcome<T> = { ok: true; value: T } | { ok: false; reason: string };

// ─── Longitudinal distribution (ACI 8.10.4) ──────────────────────────────────

export function getMomentCoefficients(panel: PanelCase): MomentCoefficients {
  if (!panel.is_end_span) {
    return { neg_ext: 0.65, pos: 0.35, neg_int: 0.65, description: "Interior span" };
  }
  if (panel.fully_restrained_edge) {
    return { neg_ext: 0.65, pos: 0.35, neg_int: 0.65, description: "End span, exterior edge fully restrained" };
  }
  if (panel.has_edge_beam) {
    return { neg_ext: 0.3, pos: 0.5, neg_int: 0.7, description: "End span, with edge beam" };
  }
  return { neg_ext: 0.26, pos: 0.52, neg_int: 0.7, description: "End span, no edge beam (flat plate)" };
}

// ─── Transverse distribution (ACI 8.10.5, 8.10.6) ────────────────────────────

export type StripMomentLocation = "interior_negative" | "exterior_negative" | "positive";

interface StripTable {
  /** Column strip share at αf1·l2/l1 = 0 for each l2/l1 breakpoint */
  alpha0: readonly number[];
  /** Column strip share at αf1·l2/l1 ≥ 1.0 */
  alpha1: readonly number[];
}

const L2_L1_POINTS = [0.5, 1.0, 2.0] as const;

const INTERIOR_NEGATIVE: StripTable = { alpha0: [0.75, 0.75, 0.75], alpha1: [0.9, 0.75, 0.45] };
const POSITIVE: StripTable = { alpha0: [0.6, 0.6, 0.6], alpha1: [0.9, 0.75, 0.45] };
/**
 * Exterior negative share once βt ≥ 2.5; at βt = 0 the column strip takes it
 * all. Without beams the share rises from 75% at l2/l1 ≤ 1 to 90% at l2/l1 = 2.
 */
const EXTERIOR_NEGATIVE_STIFF: StripTable = { alpha0: [0.75, 0.75, 0.9], alpha1: [0.9, 0.75, 0.45] };

function tableShare(table: StripTable, l2_l1: number, alpha_f1: number): number {
  const alphaTerm = alpha_f1 * l2_l1;
  const atZero = lerpTable(l2_l1, L2_L1_POINTS, table.alpha0);
  const atOne = lerpTable(l2_l1, L2_L1_POINTS, table.alpha1);
  return lerp(alphaTerm, 0, atZero, 1, atOne);
}

/**
 * Fraction of a moment component assigned to the column strip.
 *
 * Interpolates linearly over l2/l1 in [0.5, 2.0] and αf1·l2/l1 in [0, 1]; the
 * exterior negative share is a second interpolation over βt in [0, 2.5]
 * between 1.0 and the l2/l1 value. All inputs are clamped to their ranges.
 */
export function getColStripPercent(
  location: StripMomentLocation,
  l2_l1: number,
  alpha_f1: number,
  beta_t: number,
): number {
  switch (location) {
    case "interior_negative":
      return tableShare(INTERIOR_NEGATIVE, l2_l1, alpha_f1);
    case "positive":
      return tableShare(POSITIVE, l2_l1, alpha_f1);
    case "exterior_negative": {
      const stiff = tableShare(EXTERIOR_NEGATIVE_STIFF, l2_l1, alpha_f1);
      return lerp(beta_t, 0, 1.0, BETA_T_LIMIT, stiff);
    }
  }
}

/** St. Venant torsion constant of a rectangle, C = (1 − 0.63x/y)·x³·y/3 with x ≤ y. */
export function torsionConstant(a: number, b: number): number {
  const x = Math.min(a, b);
  const y = Math.max(a, b);
  if (y <= 0) return 0;
  return ((1 - (0.63 * x) / y) * Math.pow(x, 3) * y) / 3;
}

/**
 * βt = Ecb·C / (2·Ecs·Is) for the edge beam, with beam and slab of the same
 * concrete. Zero when there is no edge beam.
 */
export function torsionalStiffnessRatio(record: NormalizedRecord): { C_m4: number; beta_t: number } {
  const beam = record.panel.edge_beam;
  if (!record.panel.has_edge_beam || !beam) {
    return { C_m4: 0, beta_t: 0 };
  }
  const { L2_m, h_slab_m } = record.geometry;
  const C = torsionConstant(beam.width_m, beam.depth_m);
  const Is = (L2_m * Math.pow(h_slab_m, 3)) / 12;
  return { C_m4: C, beta_t: C / (2 * Is) };
}

function splitComponent(coefficient: number, Mo: number, cs_pct: number): MomentComponent {
  const total = coefficient * Mo;
  const cs = total * cs_pct;
  return { coefficient, total_Nm: total, cs_pct, cs_Nm: cs, ms_Nm: total - cs };
}

// ─── Flexural design ─────────────────────────────────────────────────────────

/**
 * ρ = (0.85fc'/fy)·(1 − √(1 − 2Rn/(0.85fc'))), or the reason it has no
 * solution for this Rn.
 */
export function solveReinforcementRatio(Rn: number, fc: number, fy: number): Outcome<number> {
  if (Rn > RN_CEILING_RATIO * fc) {
    return { ok: false, reason: `Rn exceeds ${RN_CEILING_RATIO}·fc' limit: increase thickness` };
  }
  const radicand = 1 - (2 * Rn) / (0.85 * fc);
  if (radicand < 0) {
    return { ok: false, reason: "Section too small for moment (no real solution)" };
  }
  return { ok: true, value: ((0.85 * fc) / fy) * (1 - Math.sqrt(radicand)) };
}

export interface FlexureParams {
  location: string;
  component: MomentComponentName;
  strip: StripName;
  Mu_Nm: number;
  b_m: number;
  h_m: number;
  fc_pa: number;
  fy_pa: number;
  rho_min: number;
  bar: BarName;
}

function suggestBars(As_cm2: number, b_m: number, h_m: number, bar: BarName): { count: number; spacing_cm: number } {
  const b_cm = b_m * 100;
  const s_max_cm = Math.min(2 * h_m * 100, MAX_BAR_SPACING_CM);
  const count = Math.max(Math.ceil(As_cm2 / barAreaCm2(bar)), Math.ceil(b_cm / s_max_cm), 1);
  return { count, spacing_cm: Math.floor(b_cm / count) };
}

export function designFlexure(params: FlexureParams): RebarSection {
  const { Mu_Nm, b_m, h_m, fc_pa, fy_pa, rho_min, bar } = params;
  const d = h_m - COVER_M;
  const As_min_m2 = rho_min * b_m * h_m;
  const base = {
    location: params.location,
    component: params.component,
    strip: params.strip,
    Mu_Nm,
    width_m: b_m,
    h_m,
    depth_m: d,
    As_min_cm2: As_min_m2 * CM2_PER_M2,
    bar,
  };

  const fail = (Rn: number, reason: string): RebarSection => ({
    ...base,
    Rn_pa: Rn,
    rho: 0,
    As_required_cm2: 0,
    status: "FAIL",
    bar_count: 0,
    spacing_cm: 0,
    suggestion: reason,
  });

  if (d <= 0) {
    return fail(Infinity, "Effective depth is not positive: increase thickness");
  }

  const Rn = Math.abs(Mu_Nm) / (PHI_FLEXURE * b_m * d * d);
  const solved = solveReinforcementRatio(Rn, fc_pa, fy_pa);
  if (!solved.ok) {
    return fail(Rn, solved.reason);
  }

  const As_calc_m2 = solved.value * b_m * d;
  const minGoverns = As_min_m2 > As_calc_m2;
  const As_m2 = minGoverns ? As_min_m2 : As_calc_m2;
  const As_cm2 = As_m2 * CM2_PER_M2;
  const { count, spacing_cm } = suggestBars(As_cm2, b_m, h_m, bar);

  return {
    ...base,
    Rn_pa: Rn,
    rho: solved.value,
    As_required_cm2: As_cm2,
    status: minGoverns ? "MIN_STEEL" : "OK",
    bar_count: count,
    spacing_cm,
    suggestion: `${count}-${bar} @ ${spacing_cm} cm`,
  };
}

// ─── Two-way shear (ACI 22.6) ────────────────────────────────────────────────

export interface PunchingParams {
  perimeter: ShearPerimeter;
  location: ColumnLocation;
  /** Loaded area dimensions (column or drop panel) along L1 and L2 */
  a1_m: number;
  a2_m: number;
  d_m: number;
  wu_kgm2: number;
  tributary_m2: number;
  fc_ksc: number;
}

const ALPHA_S: Record<ColumnLocation, 20 | 30 | 40> = {
  interior: 40,
  edge: 30,
  corner: 20,
};

function criticalSection(location: ColumnLocation, a1: number, a2: number, d: number): { bo: number; area: number } {
  switch (location) {
    case "interior": {
      const b1 = a1 + d;
      const b2 = a2 + d;
      return { bo: 2 * b1 + 2 * b2, area: b1 * b2 };
    }
    case "edge": {
      // Free edge is parallel to the c2 face
      const b1 = a1 + d / 2;
      const b2 = a2 + d;
      return { bo: 2 * b1 + b2, area: b1 * b2 };
    }
    case "corner": {
      const b1 = a1 + d / 2;
      const b2 = a2 + d / 2;
      return { bo: b1 + b2, area: b1 * b2 };
    }
  }
}

/**
 * Punching shear in kg/cm units:
 *   vc = min(1.06√fc', 0.53(1 + 2/β)√fc', 0.265(αs·d/bo + 2)√fc')   (ksc)
 *   φVc = 0.75·vc·bo·d
 */
export function checkPunchingShear(params: PunchingParams): ShearCheckResult {
  const { perimeter, location, a1_m, a2_m, d_m, wu_kgm2, tributary_m2, fc_ksc } = params;
  const alpha_s = ALPHA_S[location];
  const { bo, area } = criticalSection(location, a1_m, a2_m, Math.max(d_m, 0));
  const Vu = wu_kgm2 * Math.max(tributary_m2 - area, 0);
  const beta = Math.max(a1_m, a2_m) / Math.min(a1_m, a2_m);

  const bo_cm = bo * 100;
  const d_cm = d_m * 100;
  let vc = 0;
  if (d_cm > 0 && bo_cm > 0) {
    const sqrtFc = Math.sqrt(fc_ksc);
    vc = Math.min(
      1.06 * sqrtFc,
      0.53 * (1 + 2 / beta) * sqrtFc,
      0.265 * ((alpha_s * d_cm) / bo_cm + 2) * sqrtFc,
    );
  }
  const phi_Vc = d_cm > 0 ? PHI_SHEAR * vc * bo_cm * d_cm : 0;
  const ratio = phi_Vc > 0 ? Vu / phi_Vc : Infinity;

  return {
    perimeter,
    bo_m: bo,
    d_m,
    beta,
    alpha_s,
    Vu_kg: Vu,
    vc_ksc: vc,
    phi_Vc_kg: phi_Vc,
    ratio,
    status: Vu <= phi_Vc ? "PASS" : "FAIL",
  };
}

/** Loaded area around the column: half of each adjacent span in both directions. */
function tributaryArea(spans: Readonly<SpanInput>): number {
  const along1 = (spans.L1_left_m + spans.L1_right_m) / 2;
  const along2 = (spans.L2_top_m + spans.L2_bottom_m) / 2;
  return along1 * along2;
}

// ─── Main DDM function ───────────────────────────────────────────────────────

const COMPONENT_LABELS: Record<MomentComponentName, string> = {
  neg_ext: "Exterior negative",
  pos: "Positive",
  neg_int: "Interior negative",
};

export function runDdm(record: NormalizedRecord): DdmResult {
  const { geometry, loads, materials, panel, units } = record;
  const { L1_m: L1, L2_m: L2 } = geometry;
  const warnings: string[] = [];
  const notes: string[] = [];

  // ── Static moment ──────────────────────────────────────────────────────
  const Ln_floor = MIN_CLEAR_SPAN_RATIO * L1;
  const Ln_clamped = geometry.Ln_m < Ln_floor;
  const Ln = Ln_clamped ? Ln_floor : geometry.Ln_m;
  if (Ln_clamped) {
    notes.push(
      `Clear span ${geometry.Ln_m.toFixed(2)} m is less than 0.65·L1; using Ln = ${Ln.toFixed(2)} m (ACI 8.10.3.2).`,
    );
  }
  const Mo = (loads.wu_pa * L2 * Ln * Ln) / 8;

  // ── Longitudinal and transverse distribution ───────────────────────────
  const coefficients = getMomentCoefficients(panel);
  const l2_l1 = L2 / L1;
  const alpha_f1 = 0;
  const { C_m4, beta_t } = torsionalStiffnessRatio(record);

  const exteriorIsContinuous = !panel.is_end_span || panel.fully_restrained_edge;
  const csNegExt = exteriorIsContinuous
    ? getColStripPercent("interior_negative", l2_l1, alpha_f1, beta_t)
    : getColStripPercent("exterior_negative", l2_l1, alpha_f1, beta_t);

  const moments = {
    Mo_Nm: Mo,
    neg_ext: splitComponent(coefficients.neg_ext, Mo, csNegExt),
    pos: splitComponent(coefficients.pos, Mo, getColStripPercent("positive", l2_l1, alpha_f1, beta_t)),
    neg_int: splitComponent(coefficients.neg_int, Mo, getColStripPercent("interior_negative", l2_l1, alpha_f1, beta_t)),
  };

  // ── Flexure per strip location ─────────────────────────────────────────
  const column_strip_m = 0.5 * Math.min(L1, L2);
  const middle_strip_m = L2 - column_strip_m;
  const rho_min = materials.steel_grade === "SD30" ? 0.002 : 0.0018;

  const rebar: RebarSection[] = [];
  for (const component of ["neg_ext", "pos", "neg_int"] as const) {
    const m = moments[component];
    for (const strip of ["column", "middle"] as const) {
      const thickened = geometry.has_drop && strip === "column" && component !== "pos";
      const section = designFlexure({
        location: `${COMPONENT_LABELS[component]}, ${strip} strip`,
        component,
        strip,
        Mu_Nm: strip === "column" ? m.cs_Nm : m.ms_Nm,
        b_m: strip === "column" ? column_strip_m : middle_strip_m,
        h_m: thickened ? geometry.h_at_drop_m : geometry.h_slab_m,
        fc_pa: materials.fc_pa,
        fy_pa: materials.fy_pa,
        rho_min,
        bar: record.main_bar,
      });
      if (section.status === "FAIL") {
        warnings.push(`${section.location}: ${section.suggestion}`);
      }
      rebar.push(section);
    }
  }

  // ── Punching shear ─────────────────────────────────────────────────────
  const tributary = tributaryArea(geometry.spans);
  const shear: ShearCheckResult[] = [
    checkPunchingShear({
      perimeter: "column_face",
      location: panel.location,
      a1_m: geometry.c1_m,
      a2_m: geometry.c2_m,
      d_m: geometry.h_at_drop_m - COVER_M,
      wu_kgm2: loads.wu_kgm2,
      tributary_m2: tributary,
      fc_ksc: materials.fc_ksc,
    }),
  ];
  if (geometry.has_drop) {
    shear.push(
      checkPunchingShear({
        perimeter: "drop_panel_face",
        location: panel.location,
        a1_m: geometry.drop_w1_m,
        a2_m: geometry.drop_w2_m,
        d_m: geometry.h_slab_m - COVER_M,
        wu_kgm2: loads.wu_kgm2,
        tributary_m2: tributary,
        fc_ksc: materials.fc_ksc,
      }),
    );
  }
  for (const check of shear) {
    if (check.status === "FAIL") {
      const where = check.perimeter === "column_face" ? "column face" : "drop panel face";
      warnings.push(
        `Punching shear fails at ${where}: Vu = ${check.Vu_kg.toFixed(0)} kg > φVc = ${check.phi_Vc_kg.toFixed(0)} kg`,
      );
    }
  }

  return {
    case_name: coefficients.description,
    Ln_used_m: Ln,
    Ln_clamped,
    Mo_Nm: Mo,
    Mo_kNm: Mo / 1000,
    Mo_kgm: Mo / units.g,
    coefficients,
    l2_l1,
    alpha_f1,
    torsion_constant_m4: C_m4,
    beta_t,
    moments,
    strips: { column_strip_m, middle_strip_m },
    rebar,
    shear,
    warnings,
    notes,
  };
}
