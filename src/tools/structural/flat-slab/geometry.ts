/**
 * Geometry preparer: turns raw flat slab input (cm, m, ksc, kg/m²) into the
 * normalized SI record every engine consumes.
 *
 * Pure transform. Invalid input raises FlatSlabInputError before any
 * engineering value is computed.
 */

import { FlatSlabInputError } from "./errors.js";
import type {
  ColumnSegment,
  ColumnSegmentInput,
  FlatSlabInput,
  NormalizedRecord,
  PanelCase,
  SpanInput,
  SteelGrade,
  StiffnessConcept,
} from "./types.js";
import { DEFAULT_UNITS, concreteModulusMpa, mpaToPa, type UnitsConfig } from "./units.js";

// ─── Constants ───────────────────────────────────────────────────────────────

/** Thai standard deformed bar grades (TIS 24) */
export const STEEL_GRADE_PROPERTIES: Record<SteelGrade, { fy_ksc: number; fy_nominal_mpa: number }> = {
  SD30: { fy_ksc: 3000, fy_nominal_mpa: 300 },
  SD40: { fy_ksc: 4000, fy_nominal_mpa: 400 },
  SD50: { fy_ksc: 5000, fy_nominal_mpa: 500 },
};

// ─── Validation helpers ──────────────────────────────────────────────────────

function requireFinite(value: number, field: string): number {
  if (!Number.isFinite(value)) {
    throw new FlatSlabInputError(field, "must be a finite number.");
  }
  return value;
}

function requirePositive(value: number, field: string): number {
  if (requireFinite(value, field) <= 0) {
    throw new FlatSlabInputError(field, "must be a positive number.");
  }
  return value;
}

function requireNonNegative(value: number, field: string): number {
  if (requireFinite(value, field) < 0) {
    throw new FlatSlabInputError(field, "must be a non-negative number.");
  }
  return value;
}

function requireZero(value: number, field: string, reason: string): void {
  if (requireFinite(value, field) !== 0) {
    throw new FlatSlabInputError(field, `must be 0 (${reason}).`);
  }
}

// ─── Spans ───────────────────────────────────────────────────────────────────

function validateSpans(input: FlatSlabInput): SpanInput {
  const { spans, location } = input;
  requirePositive(spans.L1_right_m, "spans.L1_right_m");
  requirePositive(spans.L2_top_m, "spans.L2_top_m");

  switch (location) {
    case "interior":
      requirePositive(spans.L1_left_m, "spans.L1_left_m");
      requirePositive(spans.L2_bottom_m, "spans.L2_bottom_m");
      break;
    case "edge":
      requireZero(spans.L1_left_m, "spans.L1_left_m", "edge column has no left span");
      requirePositive(spans.L2_bottom_m, "spans.L2_bottom_m");
      break;
    case "corner":
      requireZero(spans.L1_left_m, "spans.L1_left_m", "corner column has no left span");
      requireZero(spans.L2_bottom_m, "spans.L2_bottom_m", "corner column has no bottom span");
      break;
  }

  return { ...spans };
}

function transverseWidth(spans: SpanInput): number {
  const present = [spans.L2_top_m, spans.L2_bottom_m].filter((l) => l > 0);
  return present.reduce((sum, l) => sum + l, 0) / present.length;
}

// ─── Columns ─────────────────────────────────────────────────────────────────

function kFactor(segment: ColumnSegmentInput): 3 | 4 {
  return segment.far_end === "pinned" ? 3 : 4;
}

function buildConcept(input: FlatSlabInput, upper: ColumnSegment, lower: ColumnSegment): StiffnessConcept {
  const isRoof = input.joint_type === "roof";
  const parts: string[] = [];
  if (!isRoof) {
    parts.push(`Top: ${upper.far_end} (${upper.k_factor}EI/L)`);
  }
  parts.push(`Bot: ${lower.far_end} (${lower.k_factor}EI/L)`);

  return {
    joint_type: input.joint_type,
    rotation_resistance: parts.join(" + "),
    unbalanced_moment_distribution: isRoof
      ? "To bottom column only"
      : "Distributed to top and bottom columns",
  };
}

// ─── Preparer ────────────────────────────────────────────────────────────────

export function prepareGeometry(input: FlatSlabInput, units: UnitsConfig = DEFAULT_UNITS): NormalizedRecord {
  const cm = units.m_per_cm;

  // ── Geometry ───────────────────────────────────────────────────────────
  const spans = validateSpans(input);
  const L1 = Math.max(spans.L1_left_m, spans.L1_right_m);
  const L2 = transverseWidth(spans);

  const c1 = requirePositive(input.column.c1_cm, "column.c1_cm") * cm;
  const c2 = requirePositive(input.column.c2_cm, "column.c2_cm") * cm;
  if (c1 >= L1) {
    throw new FlatSlabInputError("column.c1_cm", `column dimension ${c1} m must be smaller than span L1 = ${L1} m.`);
  }
  if (c2 >= L2) {
    throw new FlatSlabInputError("column.c2_cm", `column dimension ${c2} m must be smaller than span L2 = ${L2} m.`);
  }

  const h_slab = requirePositive(input.h_slab_cm, "h_slab_cm") * cm;

  const drop = input.drop_panel;
  let h_drop = 0;
  let drop_w1 = 0;
  let drop_w2 = 0;
  if (drop) {
    h_drop = requirePositive(drop.depth_cm, "drop_panel.depth_cm") * cm;
    drop_w1 = requirePositive(drop.width1_m, "drop_panel.width1_m");
    drop_w2 = requirePositive(drop.width2_m, "drop_panel.width2_m");
    if (drop_w1 <= c1) {
      throw new FlatSlabInputError("drop_panel.width1_m", "drop panel must be wider than the column (c1).");
    }
    if (drop_w2 <= c2) {
      throw new FlatSlabInputError("drop_panel.width2_m", "drop panel must be wider than the column (c2).");
    }
  }

  // ── Materials ──────────────────────────────────────────────────────────
  const fc_ksc = requirePositive(input.materials.fc_ksc, "materials.fc_ksc");
  const fc_mpa = fc_ksc * units.mpa_per_ksc;
  const grade = STEEL_GRADE_PROPERTIES[input.materials.steel_grade];

  // ── Loads ──────────────────────────────────────────────────────────────
  const sdl_kgm2 = requireNonNegative(input.loads.superimposed_dead_kgm2, "loads.superimposed_dead_kgm2");
  const ll_kgm2 = requireNonNegative(input.loads.live_kgm2, "loads.live_kgm2");
  const lf_dead = requirePositive(input.loads.factors.dead, "loads.factors.dead");
  const lf_live = requirePositive(input.loads.factors.live, "loads.factors.live");

  const self_weight_pa = input.loads.auto_self_weight
    ? h_slab * units.concrete_density_kgm3 * units.g
    : 0;
  const superimposed_dead_pa = sdl_kgm2 * units.g;
  const dead_pa = self_weight_pa + superimposed_dead_pa;
  const live_pa = ll_kgm2 * units.g;
  const wu_pa = lf_dead * dead_pa + lf_live * live_pa;

  // ── Panel case ─────────────────────────────────────────────────────────
  const isEndSpan = input.location !== "interior";
  let edgeBeam: PanelCase["edge_beam"] = null;
  if (isEndSpan && input.edge_beam) {
    edgeBeam = {
      width_m: requirePositive(input.edge_beam.width_cm, "edge_beam.width_cm") * cm,
      depth_m: requirePositive(input.edge_beam.depth_cm, "edge_beam.depth_cm") * cm,
    };
  }
  const panel: PanelCase = {
    location: input.location,
    has_edge_beam: edgeBeam !== null,
    edge_beam: edgeBeam,
    fully_restrained_edge: isEndSpan && input.fully_restrained_edge,
    is_end_span: isEndSpan,
  };

  // ── Column stiffness inputs ────────────────────────────────────────────
  const isRoof = input.joint_type === "roof";
  const upper: ColumnSegment = {
    height_m: isRoof ? 0 : requireNonNegative(input.upper_column.height_m, "upper_column.height_m"),
    far_end: input.upper_column.far_end,
    k_factor: kFactor(input.upper_column),
  };
  const lower: ColumnSegment = {
    height_m: requireNonNegative(input.lower_column.height_m, "lower_column.height_m"),
    far_end: input.lower_column.far_end,
    k_factor: kFactor(input.lower_column),
  };

  // ── Cantilever balancing moments (informational) ───────────────────────
  const cant_left = requireNonNegative(input.cantilever.left_m, "cantilever.left_m");
  const cant_right = requireNonNegative(input.cantilever.right_m, "cantilever.right_m");
  if (cant_left > 0 && spans.L1_left_m > 0) {
    throw new FlatSlabInputError("cantilever.left_m", "a left cantilever requires an exterior column with no left span.");
  }
  const w_line = wu_pa * L2;

  return {
    geometry: {
      L1_m: L1,
      L2_m: L2,
      Ln_m: L1 - c1,
      c1_m: c1,
      c2_m: c2,
      h_slab_m: h_slab,
      h_drop_m: h_drop,
      h_at_drop_m: h_slab + h_drop,
      has_drop: drop !== null,
      drop_w1_m: drop_w1,
      drop_w2_m: drop_w2,
      spans,
    },
    materials: {
      fc_ksc,
      fc_mpa,
      fc_pa: fc_ksc * units.pa_per_ksc,
      steel_grade: input.materials.steel_grade,
      fy_ksc: grade.fy_ksc,
      fy_mpa: grade.fy_ksc * units.mpa_per_ksc,
      fy_pa: grade.fy_ksc * units.pa_per_ksc,
      fy_nominal_mpa: grade.fy_nominal_mpa,
      Ec_pa: mpaToPa(concreteModulusMpa(fc_mpa)),
    },
    loads: {
      self_weight_pa,
      superimposed_dead_pa,
      dead_pa,
      live_pa,
      wu_pa,
      wu_kgm2: wu_pa / units.g,
      factors: { dead: lf_dead, live: lf_live },
    },
    panel,
    columns: {
      Ic_m4: (c2 * Math.pow(c1, 3)) / 12,
      upper,
      lower,
    },
    cantilever: {
      left_m: cant_left,
      right_m: cant_right,
      M_left_Nm: (w_line * cant_left * cant_left) / 2,
      M_right_Nm: (w_line * cant_right * cant_right) / 2,
    },
    concept: buildConcept(input, upper, lower),
    main_bar: input.main_bar,
    units,
  };
}
