/**
 * Equivalent Frame Method member stiffnesses (ACI 318 Section 8.11).
 *
 * Produces the slab, column, torsional member and equivalent column
 * stiffnesses and the joint distribution factors. The frame analysis itself
 * is left to the caller.
 *
 * All stiffnesses are in N·m/rad.
 */

import { torsionConstant } from "./ddm.js";
import type { NormalizedRecord, StiffnessSet } from "./types.js";

/** 1/Kec = 1/ΣKc + 1/Kt; a zero term gives a fully flexible joint (Kec = 0). */
export function equivalentColumnStiffness(sumKc: number, Kt: number): number {
  if (sumKc > 0 && Kt > 0) {
    return 1 / (1 / sumKc + 1 / Kt);
  }
  return 0;
}

export function runEfm(record: NormalizedRecord): StiffnessSet {
  const { geometry, materials, columns, panel } = record;
  const { L1_m: L1, L2_m: L2, c1_m: c1, c2_m: c2, h_slab_m: h } = geometry;
  const Ec = materials.Ec_pa;
  const notes: string[] = [];

  // Slab-beam: gross section over the full design strip, far end fixed
  const Is = (L2 * Math.pow(h, 3)) / 12;
  const Ks = (4 * Ec * Is) / L1;

  // Columns
  const { upper, lower, Ic_m4: Ic } = columns;
  const Kc_up = upper.height_m > 0 ? (upper.k_factor * Ec * Ic) / upper.height_m : 0;
  const Kc_lo = lower.height_m > 0 ? (lower.k_factor * Ec * Ic) / lower.height_m : 0;
  const Sum_Kc = Kc_up + Kc_lo;
  if (record.concept.joint_type === "roof") {
    notes.push("Roof joint: no upper column, unbalanced moment goes to the lower column only.");
  }

  // Torsional member (ACI R8.11.5): slab strip h × c1, or the edge beam where present
  const beam = panel.edge_beam;
  const section = panel.has_edge_beam && beam
    ? { x_m: Math.min(beam.width_m, beam.depth_m), y_m: Math.max(beam.width_m, beam.depth_m) }
    : { x_m: Math.min(h, c1), y_m: Math.max(h, c1) };
  const C = torsionConstant(section.x_m, section.y_m);

  const torsion_arms: 1 | 2 = panel.location === "interior" ? 2 : 1;
  const Kt_one_arm = (9 * Ec * C) / (L2 * Math.pow(1 - c2 / L2, 3));
  const Kt = torsion_arms * Kt_one_arm;

  const Kec = equivalentColumnStiffness(Sum_Kc, Kt);
  if (Kec === 0) {
    notes.push("Equivalent column stiffness is zero: joint treated as fully flexible.");
  }

  const sumJoint = Ks + Kec;
  const DF_slab = sumJoint > 0 ? Ks / sumJoint : 0;
  const DF_col = sumJoint > 0 ? Kec / sumJoint : 0;

  const { cantilever } = record;
  if (cantilever.M_left_Nm > 0 || cantilever.M_right_Nm > 0) {
    notes.push("Cantilever balancing moments are reported only; they are not deducted from the unbalanced joint moment.");
  }

  return {
    Ec_pa: Ec,
    Is_m4: Is,
    Ic_m4: Ic,
    torsion_section: section,
    C_m4: C,
    Ks,
    k_up: upper.k_factor,
    k_lo: lower.k_factor,
    Kc_up,
    Kc_lo,
    Sum_Kc,
    torsion_arms,
    Kt,
    Kec,
    DF_slab,
    DF_col,
    concept: record.concept,
    cantilever,
    notes,
  };
}
