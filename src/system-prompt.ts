/**
 * System prompt builder for the flatslab assistant.
 */
import fs from "node:fs";
import os from "node:os";
import path from "node:path";

// ─── Context file loading ────────────────────────────────────────────────────

const CONTEXT_FILE_NAMES = [
  "CONTEXT.md",
  "INSTRUCTIONS.md",
  "INSTRUCTIONS.txt",
  ".flatslab/CONTEXT.md",
];

export type ContextFile = { path: string; content: string };

export function loadContextFiles(workspaceDir: string): ContextFile[] {
  const files: ContextFile[] = [];
  for (const name of CONTEXT_FILE_NAMES) {
    const filePath = path.join(workspaceDir, name);
    if (!fs.existsSync(filePath)) continue;
    const content = fs.readFileSync(filePath, "utf-8").trim();
    if (content) {
      files.push({ path: name, content });
    }
  }
  return files;
}

// ─── Runtime info ────────────────────────────────────────────────────────────

export type RuntimeInfo = {
  host: string;
  os: string;
  arch: string;
  node: string;
  shell: string;
  model: string;
  provider: string;
};

export function detectRuntime(provider: string, modelId: string): RuntimeInfo {
  return {
    host: os.hostname(),
    os: process.platform,
    arch: process.arch,
    node: process.version,
    shell: path.basename(process.env.SHELL ?? "bash"),
    model: modelId,
    provider,
  };
}

// ─── Tool summaries ──────────────────────────────────────────────────────────

const CORE_TOOL_SUMMARIES: Record<string, string> = {
  // Built-in
  read: "Read file contents",
  write: "Create or overwrite files",
  edit: "Make precise edits to files",
  bash: "Run shell commands",
  // Flat slab
  flat_slab_criteria: "Check ACI 318 minimum thickness, drop panel proportions and Direct Design Method limits",
  flat_slab_ddm: "Direct Design Method: static moment, strip moments, reinforcement per strip, punching shear",
  flat_slab_efm: "Equivalent Frame Method stiffnesses: Ks, Kc, Kt, Kec and joint distribution factors",
  flat_slab_analysis: "Full flat slab run: criteria, DDM and EFM for one column with combined warnings",
};

// ─── System prompt builder ───────────────────────────────────────────────────

export function buildSystemPrompt(params: {
  workspaceDir: string;
  runtime: RuntimeInfo;
  toolNames: string[];
  contextFiles: ContextFile[];
}): string {
  const { workspaceDir, runtime, toolNames, contextFiles } = params;

  // Tool lines
  const toolLines = toolNames
    .map((name) => {
      const summary = CORE_TOOL_SUMMARIES[name];
      return summary ? `- ${name}: ${summary}` : `- ${name}`;
    })
    .filter(Boolean);

  const userTimezone = Intl.DateTimeFormat().resolvedOptions().timeZone;
  const now = new Date();
  const currentTime = now.toLocaleString("en-US", {
    timeZone: userTimezone,
    dateStyle: "full",
    timeStyle: "long",
  });

  const lines = [
    "You are flatslab, a structural engineering assistant for reinforced concrete flat slabs (flat plates and slabs with drop panels).",
    "You design and check slab-column panels to ACI 318 with the flat_slab_* tools: minimum thickness, drop panels, Direct Design Method moments and reinforcement, punching shear and Equivalent Frame Method stiffnesses.",
    "Inputs use cm for sections, m for spans, ksc for concrete strength and kg/m² for loads. State the assumptions you make for any value the user did not give.",
    "When the Direct Design Method limits are violated, say so and base the recommendation on the EFM stiffnesses instead.",
    "",
    "## Tools",
    "Call tools by their exact names:",
    toolLines.join("\n"),
    "",
    "## Reporting results",
    "Lead with the governing checks: slab thickness, punching shear ratio and any reinforcement section marked FAIL.",
    "Quote the moments, steel areas and bar suggestions the tools return rather than recomputing them.",
    "If a tool rejects an input, name the field it reported and ask for a corrected value.",
    "",
    "## Workspace",
    `Your working directory is: ${workspaceDir}`,
    "Write calculation notes or input sets here only when the user asks for a record of the design.",
    "",
    "## Current Date & Time",
    `Time zone: ${userTimezone}`,
    `Current time: ${currentTime}`,
    "",
  ];

  // Context files
  if (contextFiles.length > 0) {
    lines.push(
      "# Project Context",
      "",
      "The following project context files have been loaded:",
      "",
    );
    for (const file of contextFiles) {
      lines.push(`## ${file.path}`, "", file.content, "");
    }
  }

  // Runtime
  const runtimeParts = [
    runtime.host ? `host=${runtime.host}` : "",
    runtime.os ? `os=${runtime.os} (${runtime.arch})` : "",
    runtime.node ? `node=${runtime.node}` : "",
    runtime.model ? `model=${runtime.provider}/${runtime.model}` : "",
    runtime.shell ? `shell=${runtime.shell}` : "",
  ].filter(Boolean);

  lines.push("## Runtime", `Runtime: ${runtimeParts.join(" | ")}`);

  return lines.filter((line) => line !== undefined).join("\n");
}
