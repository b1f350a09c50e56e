import { describe, expect, it } from "vitest";
import {
  barAreaCm2,
  checkPunchingShear,
  designFlexure,
  getColStripPercent,
  getMomentCoefficients,
  runDdm,
  solveReinforcementRatio,
  torsionConstant,
  torsionalStiffnessRatio,
} from "./ddm.js";
import { prepareGeometry } from "./geometry.js";
import { edgeFlatPlate, interiorFlatPlate } from "./test-fixtures.js";
import type { PanelCase } from "./types.js";

const FC_240_PA = 240 * 98066.5;
const FY_SD40_PA = 4000 * 98066.5;

function panel(overrides: Partial<PanelCase>): PanelCase {
  return {
    location: "edge",
    has_edge_beam: false,
    edge_beam: null,
    fully_restrained_edge: false,
    is_end_span: true,
    ...overrides,
  };
}

describe("getMomentCoefficients", () => {
  it("uses 0.65 / 0.35 / 0.65 for an interior span", () => {
    const c = getMomentCoefficients(panel({ location: "interior", is_end_span: false }));
    expect([c.neg_ext, c.pos, c.neg_int]).toEqual([0.65, 0.35, 0.65]);
    expect(c.description).toBe("Interior span");
  });

  it("uses the flat plate end span row without an edge beam", () => {
    const c = getMomentCoefficients(panel({}));
    expect([c.neg_ext, c.pos, c.neg_int]).toEqual([0.26, 0.52, 0.7]);
  });

  it("uses the edge beam end span row", () => {
    const c = getMomentCoefficients(panel({ has_edge_beam: true, edge_beam: { width_m: 0.3, depth_m: 0.5 } }));
    expect([c.neg_ext, c.pos, c.neg_int]).toEqual([0.3, 0.5, 0.7]);
  });

  it("uses the fully restrained row ahead of the edge beam row", () => {
    const c = getMomentCoefficients(
      panel({ fully_restrained_edge: true, has_edge_beam: true, edge_beam: { width_m: 0.3, depth_m: 0.5 } }),
    );
    expect([c.neg_ext, c.pos, c.neg_int]).toEqual([0.65, 0.35, 0.65]);
    expect(c.description).toBe("End span, exterior edge fully restrained");
  });

  it("sums to at least 1.0 of Mo across the span", () => {
    for (const p of [panel({}), panel({ has_edge_beam: true }), panel({ is_end_span: false })]) {
      const c = getMomentCoefficients(p);
      expect((c.neg_ext + c.neg_int) / 2 + c.pos).toBeGreaterThanOrEqual(0.999);
    }
  });
});

describe("getColStripPercent", () => {
  it("gives 75% interior negative and 60% positive for flat plates", () => {
    for (const ratio of [0.5, 1, 2]) {
      expect(getColStripPercent("interior_negative", ratio, 0, 0)).toBe(0.75);
      expect(getColStripPercent("positive", ratio, 0, 0)).toBe(0.6);
    }
  });

  it("interpolates on αf1·l2/l1 with stiff beams", () => {
    // αf1·l2/l1 = 0.5: halfway between the flat plate and stiff beam values
    expect(getColStripPercent("interior_negative", 0.5, 1, 0)).toBeCloseTo(0.825, 12);
    expect(getColStripPercent("interior_negative", 0.5, 2, 0)).toBe(0.9);
    expect(getColStripPercent("interior_negative", 2, 1, 0)).toBe(0.45);
    expect(getColStripPercent("positive", 1.5, 1, 0)).toBeCloseTo(0.6, 12);
  });

  it("gives the whole exterior negative moment to the column strip at βt = 0", () => {
    expect(getColStripPercent("exterior_negative", 1, 0, 0)).toBe(1);
  });

  it("interpolates the exterior negative share on βt", () => {
    expect(getColStripPercent("exterior_negative", 1, 0, 1.25)).toBeCloseTo(0.875, 12);
    expect(getColStripPercent("exterior_negative", 1, 0, 2.5)).toBe(0.75);
    expect(getColStripPercent("exterior_negative", 1, 0, 10)).toBe(0.75);
  });

  it("raises the stiff-edge exterior share with l2/l1 above 1", () => {
    expect(getColStripPercent("exterior_negative", 0.5, 0, 2.5)).toBe(0.75);
    expect(getColStripPercent("exterior_negative", 1.5, 0, 2.5)).toBeCloseTo(0.825, 12);
    expect(getColStripPercent("exterior_negative", 2, 0, 2.5)).toBe(0.9);
    expect(getColStripPercent("exterior_negative", 2, 0, 2.5)).toBeGreaterThan(
      getColStripPercent("exterior_negative", 1, 0, 2.5),
    );
    // βt halfway: midpoint between 100% and 90%
    expect(getColStripPercent("exterior_negative", 2, 0, 1.25)).toBeCloseTo(0.95, 12);
  });

  it("clamps l2/l1 outside the table", () => {
    expect(getColStripPercent("interior_negative", 0.2, 5, 0)).toBe(0.9);
    expect(getColStripPercent("interior_negative", 3, 1, 0)).toBe(0.45);
  });
});

describe("torsion", () => {
  it("computes C with x as the shorter side", () => {
    // (1 − 0.63·0.3/0.5)·0.3³·0.5/3
    expect(torsionConstant(0.3, 0.5)).toBeCloseTo(0.002799, 9);
    expect(torsionConstant(0.5, 0.3)).toBeCloseTo(0.002799, 9);
    expect(torsionConstant(0, 0)).toBe(0);
  });

  it("returns βt = 0 without an edge beam", () => {
    expect(torsionalStiffnessRatio(prepareGeometry(edgeFlatPlate()))).toEqual({ C_m4: 0, beta_t: 0 });
  });

  it("computes βt = C / (2·Is) for an edge beam", () => {
    const { beta_t } = torsionalStiffnessRatio(prepareGeometry(edgeFlatPlate({ edge_beam: { width_cm: 30, depth_cm: 50 } })));
    // Is = 6 × 0.2³ / 12 = 0.004
    expect(beta_t).toBeCloseTo(0.349875, 6);
  });
});

describe("solveReinforcementRatio", () => {
  it("solves the quadratic for a moderate Rn", () => {
    const outcome = solveReinforcementRatio(1e6, 20e6, 400e6);
    expect(outcome.ok).toBe(true);
    if (outcome.ok) {
      const expected = ((0.85 * 20e6) / 400e6) * (1 - Math.sqrt(1 - 2e6 / (0.85 * 20e6)));
      expect(outcome.value).toBeCloseTo(expected, 12);
    }
  });

  it("refuses Rn above 0.35·fc'", () => {
    const outcome = solveReinforcementRatio(8e6, 20e6, 400e6);
    expect(outcome).toEqual({ ok: false, reason: "Rn exceeds 0.35·fc' limit: increase thickness" });
  });
});

describe("designFlexure", () => {
  const base = {
    location: "Positive, middle strip",
    component: "pos" as const,
    strip: "middle" as const,
    b_m: 3,
    h_m: 0.2,
    fc_pa: FC_240_PA,
    fy_pa: FY_SD40_PA,
    rho_min: 0.0018,
    bar: "DB12" as const,
  };

  it("falls back to minimum steel for a light moment", () => {
    const section = designFlexure({ ...base, Mu_Nm: 31148 });
    expect(section.status).toBe("MIN_STEEL");
    expect(section.depth_m).toBeCloseTo(0.17, 12);
    expect(section.As_required_cm2).toBeCloseTo(10.8, 9);
    expect(section.bar_count).toBe(10);
    expect(section.spacing_cm).toBe(30);
    expect(section.suggestion).toBe("10-DB12 @ 30 cm");
  });

  it("fails with zero steel when the section is too thin", () => {
    const section = designFlexure({ ...base, Mu_Nm: 5e6 });
    expect(section.status).toBe("FAIL");
    expect(section.As_required_cm2).toBe(0);
    expect(section.bar_count).toBe(0);
    expect(section.suggestion).toBe("Rn exceeds 0.35·fc' limit: increase thickness");
  });

  it("fails when the slab is no deeper than the cover", () => {
    const section = designFlexure({ ...base, Mu_Nm: 1000, h_m: 0.03 });
    expect(section.status).toBe("FAIL");
    expect(section.As_required_cm2).toBe(0);
  });

  it("keeps the bar spacing within 2h", () => {
    const section = designFlexure({ ...base, Mu_Nm: 0, h_m: 0.15, rho_min: 0 });
    // 300 cm / 30 cm maximum spacing
    expect(section.bar_count).toBe(10);
    expect(section.spacing_cm).toBe(30);
  });

  it("never decreases As as Mu grows until the section fails", () => {
    let previous = 0;
    let failed = false;
    for (let Mu = 0; Mu <= 1_000_000; Mu += 20_000) {
      const section = designFlexure({ ...base, strip: "column", Mu_Nm: Mu });
      if (section.status === "FAIL") {
        failed = true;
        continue;
      }
      expect(failed).toBe(false);
      expect(section.As_required_cm2).toBeGreaterThanOrEqual(previous);
      previous = section.As_required_cm2;
    }
    expect(failed).toBe(true);
  });

  it("reports the DB12 area", () => {
    expect(barAreaCm2("DB12")).toBeCloseTo(1.130973, 6);
  });
});

describe("checkPunchingShear", () => {
  it("passes the interior column face of the reference slab", () => {
    const result = checkPunchingShear({
      perimeter: "column_face",
      location: "interior",
      a1_m: 0.5,
      a2_m: 0.5,
      d_m: 0.17,
      wu_kgm2: 1000,
      tributary_m2: 36,
      fc_ksc: 240,
    });
    expect(result.bo_m).toBeCloseTo(2.68, 12);
    expect(result.alpha_s).toBe(40);
    expect(result.beta).toBe(1);
    expect(result.vc_ksc).toBeCloseTo(1.06 * Math.sqrt(240), 9);
    expect(result.Vu_kg).toBeCloseTo(35551.1, 6);
    expect(result.phi_Vc_kg).toBeCloseTo(56112.09, 1);
    expect(result.status).toBe("PASS");
  });

  it("uses a three-sided perimeter at an edge column", () => {
    const result = checkPunchingShear({
      perimeter: "column_face",
      location: "edge",
      a1_m: 0.5,
      a2_m: 0.5,
      d_m: 0.2,
      wu_kgm2: 1000,
      tributary_m2: 18,
      fc_ksc: 240,
    });
    // 2 × (0.5 + 0.1) + (0.5 + 0.2)
    expect(result.bo_m).toBeCloseTo(1.9, 12);
    expect(result.alpha_s).toBe(30);
  });

  it("uses a two-sided perimeter at a corner column", () => {
    const result = checkPunchingShear({
      perimeter: "column_face",
      location: "corner",
      a1_m: 0.4,
      a2_m: 0.6,
      d_m: 0.2,
      wu_kgm2: 1000,
      tributary_m2: 9,
      fc_ksc: 240,
    });
    expect(result.bo_m).toBeCloseTo(1.2, 12);
    expect(result.alpha_s).toBe(20);
    expect(result.beta).toBeCloseTo(1.5, 12);
  });

  it("fails under a heavy load", () => {
    const result = checkPunchingShear({
      perimeter: "column_face",
      location: "interior",
      a1_m: 0.5,
      a2_m: 0.5,
      d_m: 0.17,
      wu_kgm2: 3000,
      tributary_m2: 36,
      fc_ksc: 240,
    });
    expect(result.status).toBe("FAIL");
    expect(result.ratio).toBeGreaterThan(1);
  });
});

describe("runDdm", () => {
  it("designs the interior reference slab", () => {
    const ddm = runDdm(prepareGeometry(interiorFlatPlate()));

    expect(ddm.case_name).toBe("Interior span");
    expect(ddm.Ln_used_m).toBeCloseTo(5.5, 12);
    expect(ddm.Ln_clamped).toBe(false);
    expect(ddm.Mo_kgm).toBeCloseTo(22687.5, 6);
    expect(ddm.Mo_kNm).toBeCloseTo(222.488372, 5);
    expect(ddm.l2_l1).toBe(1);
    expect(ddm.alpha_f1).toBe(0);
    expect(ddm.beta_t).toBe(0);
    expect(ddm.strips).toEqual({ column_strip_m: 3, middle_strip_m: 3 });

    expect(ddm.moments.neg_int.cs_pct).toBe(0.75);
    expect(ddm.moments.pos.cs_pct).toBe(0.6);
    expect(ddm.moments.neg_ext.cs_pct).toBe(0.75);
    expect(ddm.moments.neg_int.total_Nm).toBeCloseTo(0.65 * ddm.Mo_Nm, 6);

    expect(ddm.rebar.map((s) => s.location)).toEqual([
      "Exterior negative, column strip",
      "Exterior negative, middle strip",
      "Positive, column strip",
      "Positive, middle strip",
      "Interior negative, column strip",
      "Interior negative, middle strip",
    ]);
    const negIntColumn = ddm.rebar[4];
    expect(negIntColumn?.status).toBe("OK");
    expect(negIntColumn?.As_required_cm2).toBeCloseTo(18.748, 2);
    expect(negIntColumn?.suggestion).toBe("17-DB12 @ 17 cm");
    expect(ddm.rebar[3]?.status).toBe("MIN_STEEL");
    expect(ddm.rebar[3]?.suggestion).toBe("10-DB12 @ 30 cm");

    expect(ddm.shear).toHaveLength(1);
    expect(ddm.shear[0]?.status).toBe("PASS");
    expect(ddm.warnings).toEqual([]);
    expect(ddm.notes).toEqual([]);
  });

  it("splits each moment fully between the strips", () => {
    const ddm = runDdm(prepareGeometry(interiorFlatPlate()));
    for (const name of ["neg_ext", "pos", "neg_int"] as const) {
      const m = ddm.moments[name];
      expect(m.cs_Nm + m.ms_Nm).toBeCloseTo(m.total_Nm, 6);
    }
  });

  it("clamps the clear span to 0.65·L1 for very large columns", () => {
    const ddm = runDdm(prepareGeometry(interiorFlatPlate({ column: { c1_cm: 250, c2_cm: 50 } })));
    expect(ddm.Ln_clamped).toBe(true);
    expect(ddm.Ln_used_m).toBeCloseTo(3.9, 12);
    expect(ddm.notes).toEqual(["Clear span 3.50 m is less than 0.65·L1; using Ln = 3.90 m (ACI 8.10.3.2)."]);
  });

  it("never uses a clear span below 0.65·L1", () => {
    for (const span of [1.2, 2, 4.5, 6, 9]) {
      const ddm = runDdm(
        prepareGeometry(interiorFlatPlate({ spans: { L1_left_m: span, L1_right_m: span, L2_top_m: 6, L2_bottom_m: 6 } })),
      );
      expect(ddm.Ln_used_m).toBeGreaterThanOrEqual(0.65 * span - 1e-12);
      expect(ddm.notes.length).toBe(ddm.Ln_clamped ? 1 : 0);
    }
  });

  it("loads the column with half of each unequal adjacent span", () => {
    const ddm = runDdm(
      prepareGeometry(interiorFlatPlate({ spans: { L1_left_m: 4, L1_right_m: 6, L2_top_m: 6, L2_bottom_m: 6 } })),
    );
    // (4 + 6)/2 × 6 = 30 m², less the 0.67 × 0.67 m critical section
    expect(ddm.shear[0]?.Vu_kg).toBeCloseTo(29551.1, 6);
    expect(ddm.shear[0]?.status).toBe("PASS");
  });

  it("puts the whole exterior negative moment in the column strip at a flat plate edge", () => {
    const ddm = runDdm(prepareGeometry(edgeFlatPlate()));
    expect(ddm.case_name).toBe("End span, no edge beam (flat plate)");
    expect(ddm.moments.neg_ext.cs_pct).toBe(1);
    expect(ddm.moments.neg_ext.ms_Nm).toBe(0);
  });

  it("reduces the exterior column strip share with an edge beam", () => {
    const ddm = runDdm(prepareGeometry(edgeFlatPlate({ edge_beam: { width_cm: 30, depth_cm: 50 } })));
    expect(ddm.case_name).toBe("End span, with edge beam");
    expect(ddm.moments.neg_ext.cs_pct).toBeCloseTo(0.9650125, 6);
  });

  it("checks both shear perimeters with a drop panel", () => {
    const ddm = runDdm(prepareGeometry(interiorFlatPlate({ drop_panel: { depth_cm: 10, width1_m: 2, width2_m: 2 } })));
    expect(ddm.shear.map((s) => s.perimeter)).toEqual(["column_face", "drop_panel_face"]);
    expect(ddm.shear[0]?.d_m).toBeCloseTo(0.27, 12);
    expect(ddm.shear[1]?.d_m).toBeCloseTo(0.17, 12);
    // Column strip negative sections use the thickened section
    expect(ddm.rebar[0]?.h_m).toBeCloseTo(0.3, 12);
    expect(ddm.rebar[2]?.h_m).toBeCloseTo(0.2, 12);
  });

  it("warns about failing sections and shear without throwing", () => {
    const ddm = runDdm(
      prepareGeometry(
        interiorFlatPlate({
          h_slab_cm: 12,
          loads: { superimposed_dead_kgm2: 3000, live_kgm2: 0, auto_self_weight: false, factors: { dead: 1, live: 1 } },
        }),
      ),
    );
    expect(ddm.rebar.some((s) => s.status === "FAIL")).toBe(true);
    expect(ddm.shear[0]?.status).toBe("FAIL");
    expect(ddm.warnings.some((w) => w.startsWith("Punching shear fails at column face: Vu = "))).toBe(true);
    for (const s of ddm.rebar) {
      if (s.status === "FAIL") expect(s.As_required_cm2).toBe(0);
    }
  });
});
