import type { FlatSlabInput } from "./types.js";

/**
 * Interior column of a 6 m × 6 m flat plate: 50 × 50 cm column, 20 cm slab,
 * f'c 240 ksc, SD40, 1000 kg/m² dead only, unit load factors, so wu is
 * exactly 1000 kg/m².
 */
export function interiorFlatPlate(overrides: Partial<FlatSlabInput> = {}): FlatSlabInput {
  return {
    location: "interior",
    spans: { L1_left_m: 6, L1_right_m: 6, L2_top_m: 6, L2_bottom_m: 6 },
    column: { c1_cm: 50, c2_cm: 50 },
    h_slab_cm: 20,
    drop_panel: null,
    materials: { fc_ksc: 240, steel_grade: "SD40" },
    loads: {
      superimposed_dead_kgm2: 1000,
      live_kgm2: 0,
      auto_self_weight: false,
      factors: { dead: 1, live: 1 },
    },
    edge_beam: null,
    fully_restrained_edge: false,
    joint_type: "intermediate",
    upper_column: { height_m: 3, far_end: "pinned" },
    lower_column: { height_m: 3, far_end: "pinned" },
    cantilever: { left_m: 0, right_m: 0 },
    main_bar: "DB12",
    ...overrides,
  };
}

/** Same slab at an edge column: the free edge is on the left. */
export function edgeFlatPlate(overrides: Partial<FlatSlabInput> = {}): FlatSlabInput {
  return interiorFlatPlate({
    location: "edge",
    spans: { L1_left_m: 0, L1_right_m: 6, L2_top_m: 6, L2_bottom_m: 6 },
    ...overrides,
  });
}
