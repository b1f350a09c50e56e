import { describe, expect, it } from "vitest";
import { FlatSlabInputError } from "./structural/flat-slab/index.js";
import {
  createAllToolDefinitions,
  createFlatSlabAnalysisToolDefinition,
  createFlatSlabCriteriaToolDefinition,
  createFlatSlabDdmToolDefinition,
  createFlatSlabEfmToolDefinition,
} from "./index.js";

const referenceArgs = {
  location: "interior",
  spans: { L1_left_m: 6, L1_right_m: 6, L2_top_m: 6, L2_bottom_m: 6 },
  column: { c1_cm: 50, c2_cm: 50 },
  h_slab_cm: 20,
  materials: { fc_ksc: 240, steel_grade: "SD40" },
  loads: {
    superimposed_dead_kgm2: 1000,
    live_kgm2: 0,
    auto_self_weight: false,
    factors: { dead: 1, live: 1 },
  },
};

function parseText(result: { content: Array<{ type: string; text: string }> }) {
  const first = result.content[0];
  expect(first?.type).toBe("text");
  return JSON.parse(first?.text ?? "null");
}

describe("createAllToolDefinitions", () => {
  it("registers the four flat slab tools", () => {
    expect(createAllToolDefinitions().map((t) => t.name)).toEqual([
      "flat_slab_criteria",
      "flat_slab_ddm",
      "flat_slab_efm",
      "flat_slab_analysis",
    ]);
  });

  it("shares one parameter schema", () => {
    for (const tool of createAllToolDefinitions()) {
      expect(tool.parameters.required).toEqual(["location", "spans", "column", "h_slab_cm", "loads"]);
    }
  });
});

describe("flat_slab_criteria", () => {
  it("recommends DDM for a regular panel", async () => {
    const result = await createFlatSlabCriteriaToolDefinition().execute("call-1", referenceArgs);
    const report = parseText(result);
    expect(report.recommended_method).toBe("DDM");
    expect(report.min_thickness.case_name).toBe("Interior panel, without drop panel");
    expect(report.min_thickness.denominator).toBe(33);
    expect(result.details).toEqual({ thickness_ok: true, ddm_applicable: true, warning_count: 0 });
  });

  it("recommends EFM when the load ratio is too high", async () => {
    const result = await createFlatSlabCriteriaToolDefinition().execute("call-2", {
      ...referenceArgs,
      loads: { superimposed_dead_kgm2: 100, live_kgm2: 500, auto_self_weight: false },
    });
    expect(parseText(result).recommended_method).toBe("EFM");
  });
});

describe("flat_slab_ddm", () => {
  it("returns rounded moments and reinforcement", async () => {
    const result = await createFlatSlabDdmToolDefinition().execute("call-3", referenceArgs);
    const ddm = parseText(result);
    expect(ddm.case_name).toBe("Interior span");
    expect(ddm.Mo_kgm).toBe(22687.5);
    expect(ddm.strips).toEqual({ column_strip_m: 3, middle_strip_m: 3 });
    expect(ddm.rebar[3].suggestion).toBe("10-DB12 @ 30 cm");
    expect(ddm.rebar[4].suggestion).toBe("17-DB12 @ 17 cm");
    expect(ddm.overall_status).toBe("PASS");
    expect(result.details).toMatchObject({ case_name: "Interior span", ddm_applicable: true, overall_status: "PASS" });
  });

  it("throws an input error for bad arguments", async () => {
    await expect(createFlatSlabDdmToolDefinition().execute("call-4", { ...referenceArgs, h_slab_cm: -5 })).rejects.toThrow(
      FlatSlabInputError,
    );
  });
});

describe("flat_slab_efm", () => {
  it("returns distribution factors", async () => {
    const result = await createFlatSlabEfmToolDefinition().execute("call-5", referenceArgs);
    const efm = parseText(result);
    expect(efm.torsion_arms).toBe(2);
    expect(efm.DF_slab).toBe(0.4852);
    expect(result.details).toMatchObject({ joint_type: "intermediate" });
  });
});

describe("flat_slab_analysis", () => {
  it("returns every part of the run", async () => {
    const result = await createFlatSlabAnalysisToolDefinition().execute("call-6", referenceArgs);
    const analysis = parseText(result);
    expect(Object.keys(analysis)).toEqual(["record", "criteria", "ddm", "efm", "warnings", "recommended_method"]);
    expect(analysis.record.geometry.L1_m).toBe(6);
    expect(analysis.recommended_method).toBe("DDM");
    expect(result.details).toMatchObject({ recommended_method: "DDM", thickness_ok: true, warning_count: 0 });
  });
});
