#!/usr/bin/env node
/**
 * flatslab: terminal assistant for reinforced concrete flat slab design.
 *
 * Runs a PI SDK agent session per prompt with the flat slab tools registered.
 */
import {
  loadDotEnv,
  ensureDirs,
  ensureApiKeyInEnv,
  envKeysFor,
  resolveModelAndAuth,
  resolveSessionFile,
  applySystemPromptToSession,
  extractToolCalls,
  DEFAULT_PROVIDER,
  DEFAULT_MODEL,
  AGENT_DIR,
} from "./shared.js";

// Load env before any other imports that might need keys
loadDotEnv();

import readline from "node:readline/promises";
import { stdin, stdout } from "node:process";
import {
  createAgentSession,
  SessionManager,
  SettingsManager,
} from "@mariozechner/pi-coding-agent";
import { streamSimple } from "@mariozechner/pi-ai";
import {
  buildSystemPrompt,
  detectRuntime,
  loadContextFiles,
} from "./system-prompt.js";
import { createAllToolDefinitions } from "./tools/index.js";

// ─── Logging ─────────────────────────────────────────────────────────────────

const dim = (text: string) => `\x1b[2m${text}\x1b[0m`;
const red = (text: string) => `\x1b[31m${text}\x1b[0m`;

function logError(err: unknown) {
  if (err instanceof Error) {
    console.error(red(`Error: ${err.message}`));
    if (err.cause) {
      console.error(dim(String(err.cause)));
    }
  } else {
    console.error(red(`Error: ${String(err)}`));
  }
}

// ─── REPL ────────────────────────────────────────────────────────────────────

async function main() {
  ensureDirs();

  const provider = DEFAULT_PROVIDER;
  const modelId = DEFAULT_MODEL;
  const workspaceDir = process.cwd();
  let sessionId = `flatslab-${Date.now()}`;
  let sessionFile = resolveSessionFile(sessionId);

  if (!ensureApiKeyInEnv(provider)) {
    const envKey = envKeysFor(provider)[0];
    console.error(`No API key found for ${provider}.`);
    console.error(`Set ${envKey} in the environment or in .env.`);
    process.exit(1);
  }

  const { model, authStorage, modelRegistry } = resolveModelAndAuth(provider, modelId);

  const runtime = detectRuntime(provider, modelId);
  const contextFiles = loadContextFiles(workspaceDir);
  const toolDefinitions = createAllToolDefinitions();
  // Plain JSON-schema tool objects; the SDK's ToolDefinition expects TypeBox schemas.
  const customTools: any[] = toolDefinitions;
  const customToolNames = toolDefinitions.map((t) => t.name);

  // The PI SDK provides these built-in tools (read, bash, edit, write are default active)
  const builtInToolNames = ["read", "bash", "edit", "write"];
  const allToolNames = [...builtInToolNames, ...customToolNames];

  const systemPrompt = buildSystemPrompt({
    workspaceDir,
    runtime,
    toolNames: allToolNames,
    contextFiles,
  });
  const contextSummary = contextFiles.length > 0 ? contextFiles.map((f) => f.path).join(", ") : "none";

  console.log(dim("┌ flatslab"));
  console.log(dim(`│ model: ${provider}/${modelId}`));
  console.log(dim(`│ workspace: ${workspaceDir}`));
  console.log(dim(`│ session: ${sessionId}`));
  console.log(dim(`│ context: ${contextSummary}`));
  console.log(dim(`│ tools: ${allToolNames.join(", ")}`));
  console.log(dim("└ /new /status /quit"));
  console.log();

  const rl = readline.createInterface({ input: stdin, output: stdout });

  while (true) {
    let input: string;
    try {
      input = await rl.question("\x1b[1m> \x1b[0m");
    } catch (err) {
      // readline rejects once stdin is closed
      if (err instanceof Error && "code" in err && err.code === "ERR_USE_AFTER_CLOSE") break;
      throw err;
    }

    const trimmed = input.trim();
    if (!trimmed) continue;

    // Slash commands
    if (trimmed === "/quit" || trimmed === "/exit") break;
    if (trimmed === "/new") {
      sessionId = `flatslab-${Date.now()}`;
      sessionFile = resolveSessionFile(sessionId);
      console.log(dim(`New session: ${sessionId}`) + "\n");
      continue;
    }
    if (trimmed === "/status") {
      console.log(dim(`Model: ${provider}/${modelId}`));
      console.log(dim(`Session: ${sessionId}`));
      console.log(dim(`Workspace: ${workspaceDir}`));
      console.log(dim(`Context files: ${contextSummary}`) + "\n");
      continue;
    }

    // Run agent
    const startTime = Date.now();
    try {
      const sessionManager = SessionManager.open(sessionFile);
      const settingsManager = SettingsManager.create(workspaceDir, AGENT_DIR);

      const { session } = await createAgentSession({
        cwd: workspaceDir,
        agentDir: AGENT_DIR,
        authStorage,
        modelRegistry,
        model,
        customTools,
        sessionManager,
        settingsManager,
      });

      // Override the SDK's default system prompt with ours
      applySystemPromptToSession(session, systemPrompt);

      session.agent.streamFn = streamSimple;

      try {
        await session.prompt(trimmed);

        // Check for silent errors
        const agentError = session.agent.state.error;
        if (agentError) {
          console.error(red(`Agent error: ${agentError}`));
        }

        const toolCalls = extractToolCalls(session.messages);
        if (toolCalls.length > 0) {
          console.log(dim(`[tools: ${toolCalls.join(", ")}]`));
        }

        const text = session.getLastAssistantText();
        if (text) {
          console.log(text);
        }

        const elapsed = ((Date.now() - startTime) / 1000).toFixed(1);
        console.log(dim(`(${elapsed}s)`) + "\n");
      } finally {
        session.dispose();
      }
    } catch (err) {
      logError(err);
      console.log();
    }
  }

  rl.close();
  console.log(dim("Bye."));
  process.exit(0);
}

main().catch((err) => {
  console.error("Fatal:", err);
  process.exit(1);
});
