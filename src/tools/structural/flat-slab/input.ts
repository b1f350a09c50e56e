/**
 * Argument parsing and JSON schema shared by the flat slab tools.
 *
 * Tool arguments arrive as loosely typed JSON. They are converted here, with
 * defaults for everything an engineer would normally leave alone; anything
 * missing or non-numeric raises FlatSlabInputError naming the field.
 */

import { FlatSlabInputError } from "./errors.js";
import {
  BAR_NAMES,
  COLUMN_LOCATIONS,
  FAR_END_CONDITIONS,
  JOINT_TYPES,
  STEEL_GRADES,
  type ColumnSegmentInput,
  type FlatSlabInput,
} from "./types.js";

// ─── Defaults ────────────────────────────────────────────────────────────────

const DEFAULTS = {
  fc_ksc: 280,
  steel_grade: "SD40",
  auto_self_weight: true,
  factor_dead: 1.4,
  factor_live: 1.7,
  joint_type: "intermediate",
  storey_height_m: 3.0,
  far_end: "pinned",
  main_bar: "DB12",
} as const;

// ─── Helpers ─────────────────────────────────────────────────────────────────

type Args = Record<string, unknown>;

function isRecord(value: unknown): value is Args {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isMissing(value: unknown): boolean {
  return value === undefined || value === null;
}

function objectArg(parent: Args, key: string, path: string): Args {
  const value = parent[key];
  if (isMissing(value)) return {};
  if (!isRecord(value)) {
    throw new FlatSlabInputError(path, "must be an object.");
  }
  return value;
}

function numberArg(parent: Args, key: string, path: string, fallback?: number): number {
  const value = parent[key];
  if (isMissing(value) || value === "") {
    if (fallback === undefined) {
      throw new FlatSlabInputError(path, "is required.");
    }
    return fallback;
  }
  const num = typeof value === "number" ? value : typeof value === "string" ? Number(value) : NaN;
  if (!Number.isFinite(num)) {
    throw new FlatSlabInputError(path, `must be a number (got ${JSON.stringify(value)}).`);
  }
  return num;
}

function booleanArg(parent: Args, key: string, path: string, fallback: boolean): boolean {
  const value = parent[key];
  if (isMissing(value)) return fallback;
  if (typeof value !== "boolean") {
    throw new FlatSlabInputError(path, "must be true or false.");
  }
  return value;
}

function enumArg<T extends string>(parent: Args, key: string, path: string, allowed: readonly T[], fallback?: T): T {
  const value = parent[key];
  if (isMissing(value)) {
    if (fallback === undefined) {
      throw new FlatSlabInputError(path, `is required (one of ${allowed.join(", ")}).`);
    }
    return fallback;
  }
  const match = allowed.find((option) => option === value);
  if (match === undefined) {
    throw new FlatSlabInputError(path, `must be one of ${allowed.join(", ")}.`);
  }
  return match;
}

function columnSegmentArg(parent: Args, key: string): ColumnSegmentInput {
  const raw = objectArg(parent, key, key);
  return {
    height_m: numberArg(raw, "height_m", `${key}.height_m`, DEFAULTS.storey_height_m),
    far_end: enumArg(raw, "far_end", `${key}.far_end`, FAR_END_CONDITIONS, DEFAULTS.far_end),
  };
}

// ─── Parser ──────────────────────────────────────────────────────────────────

export function parseFlatSlabArgs(args: unknown): FlatSlabInput {
  const params: Args = isRecord(args) ? args : {};

  const spans = objectArg(params, "spans", "spans");
  const column = objectArg(params, "column", "column");
  const materials = objectArg(params, "materials", "materials");
  const loads = objectArg(params, "loads", "loads");
  const factors = objectArg(loads, "factors", "loads.factors");
  const cantilever = objectArg(params, "cantilever", "cantilever");

  let drop_panel: FlatSlabInput["drop_panel"] = null;
  if (!isMissing(params.drop_panel)) {
    const drop = objectArg(params, "drop_panel", "drop_panel");
    drop_panel = {
      depth_cm: numberArg(drop, "depth_cm", "drop_panel.depth_cm"),
      width1_m: numberArg(drop, "width1_m", "drop_panel.width1_m"),
      width2_m: numberArg(drop, "width2_m", "drop_panel.width2_m"),
    };
  }

  let edge_beam: FlatSlabInput["edge_beam"] = null;
  if (!isMissing(params.edge_beam)) {
    const beam = objectArg(params, "edge_beam", "edge_beam");
    edge_beam = {
      width_cm: numberArg(beam, "width_cm", "edge_beam.width_cm"),
      depth_cm: numberArg(beam, "depth_cm", "edge_beam.depth_cm"),
    };
  }

  return {
    location: enumArg(params, "location", "location", COLUMN_LOCATIONS),
    spans: {
      L1_left_m: numberArg(spans, "L1_left_m", "spans.L1_left_m", 0),
      L1_right_m: numberArg(spans, "L1_right_m", "spans.L1_right_m"),
      L2_top_m: numberArg(spans, "L2_top_m", "spans.L2_top_m"),
      L2_bottom_m: numberArg(spans, "L2_bottom_m", "spans.L2_bottom_m", 0),
    },
    column: {
      c1_cm: numberArg(column, "c1_cm", "column.c1_cm"),
      c2_cm: numberArg(column, "c2_cm", "column.c2_cm"),
    },
    h_slab_cm: numberArg(params, "h_slab_cm", "h_slab_cm"),
    drop_panel,
    materials: {
      fc_ksc: numberArg(materials, "fc_ksc", "materials.fc_ksc", DEFAULTS.fc_ksc),
      steel_grade: enumArg(materials, "steel_grade", "materials.steel_grade", STEEL_GRADES, DEFAULTS.steel_grade),
    },
    loads: {
      superimposed_dead_kgm2: numberArg(loads, "superimposed_dead_kgm2", "loads.superimposed_dead_kgm2"),
      live_kgm2: numberArg(loads, "live_kgm2", "loads.live_kgm2"),
      auto_self_weight: booleanArg(loads, "auto_self_weight", "loads.auto_self_weight", DEFAULTS.auto_self_weight),
      factors: {
        dead: numberArg(factors, "dead", "loads.factors.dead", DEFAULTS.factor_dead),
        live: numberArg(factors, "live", "loads.factors.live", DEFAULTS.factor_live),
      },
    },
    edge_beam,
    fully_restrained_edge: booleanArg(params, "fully_restrained_edge", "fully_restrained_edge", false),
    joint_type: enumArg(params, "joint_type", "joint_type", JOINT_TYPES, DEFAULTS.joint_type),
    upper_column: columnSegmentArg(params, "upper_column"),
    lower_column: columnSegmentArg(params, "lower_column"),
    cantilever: {
      left_m: numberArg(cantilever, "left_m", "cantilever.left_m", 0),
      right_m: numberArg(cantilever, "right_m", "cantilever.right_m", 0),
    },
    main_bar: enumArg(params, "main_bar", "main_bar", BAR_NAMES, DEFAULTS.main_bar),
  };
}

// ─── JSON schema ─────────────────────────────────────────────────────────────

const columnSegmentSchema = (which: string) => ({
  type: "object",
  description: `${which} column (ignored for the upper column at a roof joint).`,
  properties: {
    height_m: { type: "number", description: "Storey height in m (default 3.0)." },
    far_end: {
      type: "string",
      enum: [...FAR_END_CONDITIONS],
      description: 'Far end condition: "fixed" (4EI/L) or "pinned" (3EI/L). Default "pinned".',
    },
  },
});

export const FLAT_SLAB_PARAMETERS = {
  type: "object",
  properties: {
    location: {
      type: "string",
      enum: [...COLUMN_LOCATIONS],
      description: "Plan location of the column: interior (4 panels), edge (3 panels, free edge on the left), corner (2 panels).",
    },
    spans: {
      type: "object",
      description: "Centre-to-centre spans around the column in m. L1 is the analysis direction.",
      properties: {
        L1_left_m: { type: "number", description: "Span to the left (0 at edge and corner columns)." },
        L1_right_m: { type: "number", description: "Span to the right." },
        L2_top_m: { type: "number", description: "Transverse span above." },
        L2_bottom_m: { type: "number", description: "Transverse span below (0 at corner columns)." },
      },
      required: ["L1_right_m", "L2_top_m"],
    },
    column: {
      type: "object",
      description: "Column section in cm.",
      properties: {
        c1_cm: { type: "number", description: "Dimension along L1 (analysis direction)." },
        c2_cm: { type: "number", description: "Dimension along L2 (transverse)." },
      },
      required: ["c1_cm", "c2_cm"],
    },
    h_slab_cm: { type: "number", description: "Slab thickness in cm." },
    drop_panel: {
      type: "object",
      description: "Drop panel, omit for a flat plate.",
      properties: {
        depth_cm: { type: "number", description: "Projection below the slab soffit in cm." },
        width1_m: { type: "number", description: "Total width along L1 in m." },
        width2_m: { type: "number", description: "Total width along L2 in m." },
      },
      required: ["depth_cm", "width1_m", "width2_m"],
    },
    materials: {
      type: "object",
      properties: {
        fc_ksc: { type: "number", description: "Concrete strength f'c in ksc (default 280)." },
        steel_grade: {
          type: "string",
          enum: [...STEEL_GRADES],
          description: 'Reinforcement grade (default "SD40").',
        },
      },
    },
    loads: {
      type: "object",
      properties: {
        superimposed_dead_kgm2: { type: "number", description: "Superimposed dead load in kg/m²." },
        live_kgm2: { type: "number", description: "Live load in kg/m²." },
        auto_self_weight: {
          type: "boolean",
          description: "Add slab self weight (2400 kg/m³) to the dead load (default true).",
        },
        factors: {
          type: "object",
          properties: {
            dead: { type: "number", description: "Dead load factor (default 1.4)." },
            live: { type: "number", description: "Live load factor (default 1.7)." },
          },
        },
      },
      required: ["superimposed_dead_kgm2", "live_kgm2"],
    },
    edge_beam: {
      type: "object",
      description: "Spandrel beam at an edge or corner column; ignored at interior columns.",
      properties: {
        width_cm: { type: "number" },
        depth_cm: { type: "number" },
      },
      required: ["width_cm", "depth_cm"],
    },
    fully_restrained_edge: {
      type: "boolean",
      description: "Exterior edge fully restrained (e.g. monolithic with a wall). Default false.",
    },
    joint_type: {
      type: "string",
      enum: [...JOINT_TYPES],
      description: 'Slab-column joint: "intermediate" floor or "roof" (no upper column). Default "intermediate".',
    },
    upper_column: columnSegmentSchema("Upper"),
    lower_column: columnSegmentSchema("Lower"),
    cantilever: {
      type: "object",
      description: "Overhang lengths in m; balancing moments are reported for information only.",
      properties: {
        left_m: { type: "number" },
        right_m: { type: "number" },
      },
    },
    main_bar: {
      type: "string",
      enum: [...BAR_NAMES],
      description: 'Bar size used for the spacing suggestion (default "DB12").',
    },
  },
  required: ["location", "spans", "column", "h_slab_cm", "loads"],
};
