/**
 * Value records shared by the flat slab engine.
 *
 * Everything the preparer and the engines return is a read-only record built
 * fresh per call. Field names carry their unit as a suffix.
 */

import type { UnitsConfig } from "./units.js";

// ─── Enumerations ────────────────────────────────────────────────────────────

export type ColumnLocation = "interior" | "edge" | "corner";
export type FarEndCondition = "fixed" | "pinned";
export type JointType = "intermediate" | "roof";
export type SteelGrade = "SD30" | "SD40" | "SD50";
export type BarName = "DB10" | "DB12" | "DB16" | "DB20" | "DB25";

export const COLUMN_LOCATIONS: readonly ColumnLocation[] = ["interior", "edge", "corner"];
export const FAR_END_CONDITIONS: readonly FarEndCondition[] = ["fixed", "pinned"];
export const JOINT_TYPES: readonly JointType[] = ["intermediate", "roof"];
export const STEEL_GRADES: readonly SteelGrade[] = ["SD30", "SD40", "SD50"];
export const BAR_NAMES: readonly BarName[] = ["DB10", "DB12", "DB16", "DB20", "DB25"];

// ─── Raw input ───────────────────────────────────────────────────────────────

export interface SpanInput {
  L1_left_m: number;
  L1_right_m: number;
  L2_top_m: number;
  L2_bottom_m: number;
}

export interface DropPanelInput {
  /** Projection below the slab soffit */
  depth_cm: number;
  width1_m: number;
  width2_m: number;
}

export interface ColumnSegmentInput {
  height_m: number;
  far_end: FarEndCondition;
}

export interface FlatSlabInput {
  location: ColumnLocation;
  spans: SpanInput;
  column: { c1_cm: number; c2_cm: number };
  h_slab_cm: number;
  drop_panel: DropPanelInput | null;
  materials: { fc_ksc: number; steel_grade: SteelGrade };
  loads: {
    superimposed_dead_kgm2: number;
    live_kgm2: number;
    auto_self_weight: boolean;
    factors: { dead: number; live: number };
  };
  edge_beam: { width_cm: number; depth_cm: number } | null;
  fully_restrained_edge: boolean;
  joint_type: JointType;
  upper_column: ColumnSegmentInput;
  lower_column: ColumnSegmentInput;
  cantilever: { left_m: number; right_m: number };
  main_bar: BarName;
}

// ─── Normalized record ───────────────────────────────────────────────────────

export interface SlabGeometry {
  readonly L1_m: number;
  readonly L2_m: number;
  /** Geometric clear span L1 − c1, before the 0.65·L1 floor */
  readonly Ln_m: number;
  readonly c1_m: number;
  readonly c2_m: number;
  readonly h_slab_m: number;
  readonly h_drop_m: number;
  readonly h_at_drop_m: number;
  readonly has_drop: boolean;
  readonly drop_w1_m: number;
  readonly drop_w2_m: number;
  readonly spans: Readonly<SpanInput>;
}

export interface SlabMaterials {
  readonly fc_ksc: number;
  readonly fc_mpa: number;
  readonly fc_pa: number;
  readonly steel_grade: SteelGrade;
  readonly fy_ksc: number;
  readonly fy_mpa: number;
  readonly fy_pa: number;
  readonly fy_nominal_mpa: number;
  readonly Ec_pa: number;
}

export interface SlabLoads {
  readonly self_weight_pa: number;
  readonly superimposed_dead_pa: number;
  readonly dead_pa: number;
  readonly live_pa: number;
  readonly wu_pa: number;
  readonly wu_kgm2: number;
  readonly factors: Readonly<{ dead: number; live: number }>;
}

export interface EdgeBeam {
  readonly width_m: number;
  readonly depth_m: number;
}

export interface PanelCase {
  readonly location: ColumnLocation;
  readonly has_edge_beam: boolean;
  readonly edge_beam: EdgeBeam | null;
  readonly fully_restrained_edge: boolean;
  readonly is_end_span: boolean;
}

export interface ColumnSegment {
  readonly height_m: number;
  readonly far_end: FarEndCondition;
  readonly k_factor: 3 | 4;
}

export interface ColumnStiffnessInputs {
  readonly Ic_m4: number;
  readonly upper: ColumnSegment;
  readonly lower: ColumnSegment;
}

export interface CantileverMoments {
  readonly left_m: number;
  readonly right_m: number;
  readonly M_left_Nm: number;
  readonly M_right_Nm: number;
}

export interface StiffnessConcept {
  readonly joint_type: JointType;
  readonly rotation_resistance: string;
  readonly unbalanced_moment_distribution: string;
}

export interface NormalizedRecord {
  readonly geometry: SlabGeometry;
  readonly materials: SlabMaterials;
  readonly loads: SlabLoads;
  readonly panel: PanelCase;
  readonly columns: ColumnStiffnessInputs;
  readonly cantilever: CantileverMoments;
  readonly concept: StiffnessConcept;
  readonly main_bar: BarName;
  readonly units: UnitsConfig;
}

// ─── Criteria ────────────────────────────────────────────────────────────────

export interface CriterionResult {
  readonly name: string;
  readonly passed: boolean;
  readonly actual: number;
  readonly limit: number;
  /** Signed distance from the limit, positive on the safe side */
  readonly margin: number;
  readonly message: string;
}

export interface MinThicknessResult {
  readonly passed: boolean;
  readonly case_name: string;
  readonly denominator: 30 | 33 | 36;
  readonly Ln_m: number;
  readonly fy_factor: number;
  readonly h_computed_m: number;
  readonly h_absolute_min_m: number;
  readonly h_required_m: number;
  readonly h_provided_m: number;
  readonly margin_m: number;
  readonly message: string;
}

export interface DdmApplicability {
  readonly applicable: boolean;
  readonly checks: readonly CriterionResult[];
  readonly violations: readonly string[];
}

export interface CriteriaReport {
  readonly min_thickness: MinThicknessResult;
  readonly drop_panel: readonly CriterionResult[];
  readonly ddm_applicable: DdmApplicability;
  readonly efm_applicable: { readonly applicable: true; readonly notes: readonly string[] };
  readonly warnings: readonly string[];
}

// ─── DDM ─────────────────────────────────────────────────────────────────────

export type MomentComponentName = "neg_ext" | "pos" | "neg_int";
export type StripName = "column" | "middle";
export type RebarStatus = "OK" | "MIN_STEEL" | "FAIL";
export type CheckStatus = "PASS" | "FAIL";

export interface MomentCoefficients {
  readonly neg_ext: number;
  readonly pos: number;
  readonly neg_int: number;
  readonly description: string;
}

export interface MomentComponent {
  readonly coefficient: number;
  readonly total_Nm: number;
  /** Column-strip share in [0, 1] */
  readonly cs_pct: number;
  readonly cs_Nm: number;
  readonly ms_Nm: number;
}

export interface MomentSet {
  readonly Mo_Nm: number;
  readonly neg_ext: MomentComponent;
  readonly pos: MomentComponent;
  readonly neg_int: MomentComponent;
}

export interface RebarSection {
  readonly location: string;
  readonly component: MomentComponentName;
  readonly strip: StripName;
  readonly Mu_Nm: number;
  readonly width_m: number;
  readonly h_m: number;
  readonly depth_m: number;
  readonly Rn_pa: number;
  readonly rho: number;
  readonly As_min_cm2: number;
  readonly As_required_cm2: number;
  readonly status: RebarStatus;
  readonly bar: BarName;
  readonly bar_count: number;
  readonly spacing_cm: number;
  readonly suggestion: string;
}

export type ShearPerimeter = "column_face" | "drop_panel_face";

export interface ShearCheckResult {
  readonly perimeter: ShearPerimeter;
  readonly bo_m: number;
  readonly d_m: number;
  readonly beta: number;
  readonly alpha_s: 20 | 30 | 40;
  readonly Vu_kg: number;
  readonly vc_ksc: number;
  readonly phi_Vc_kg: number;
  readonly ratio: number;
  readonly status: CheckStatus;
}

export interface DdmResult {
  readonly case_name: string;
  readonly Ln_used_m: number;
  readonly Ln_clamped: boolean;
  readonly Mo_Nm: number;
  readonly Mo_kNm: number;
  readonly Mo_kgm: number;
  readonly coefficients: MomentCoefficients;
  readonly l2_l1: number;
  readonly alpha_f1: number;
  readonly torsion_constant_m4: number;
  readonly beta_t: number;
  readonly moments: MomentSet;
  readonly strips: { readonly column_strip_m: number; readonly middle_strip_m: number };
  readonly rebar: readonly RebarSection[];
  readonly shear: readonly ShearCheckResult[];
  readonly warnings: readonly string[];
  readonly notes: readonly string[];
}

// ─── EFM ─────────────────────────────────────────────────────────────────────

export interface StiffnessSet {
  readonly Ec_pa: number;
  readonly Is_m4: number;
  readonly Ic_m4: number;
  readonly torsion_section: { readonly x_m: number; readonly y_m: number };
  readonly C_m4: number;
  readonly Ks: number;
  readonly k_up: 3 | 4;
  readonly k_lo: 3 | 4;
  readonly Kc_up: number;
  readonly Kc_lo: number;
  readonly Sum_Kc: number;
  readonly torsion_arms: 1 | 2;
  readonly Kt: number;
  readonly Kec: number;
  readonly DF_slab: number;
  readonly DF_col: number;
  readonly concept: StiffnessConcept;
  readonly cantilever: CantileverMoments;
  readonly notes: readonly string[];
}
