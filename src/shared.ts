/**
 * Setup code for the flatslab CLI: environment, directories, auth and model
 * resolution.
 */
import fs from "node:fs";
import path from "node:path";
import os from "node:os";
import {
  AuthStorage,
  ModelRegistry,
  type AgentSession,
} from "@mariozechner/pi-coding-agent";
import type { AgentMessage } from "@mariozechner/pi-agent-core";

// ─── .env loading ────────────────────────────────────────────────────────────

export function loadDotEnv(cwd: string = process.cwd()) {
  const envPath = path.join(cwd, ".env");
  if (!fs.existsSync(envPath)) return;

  const content = fs.readFileSync(envPath, "utf-8");
  for (const line of content.split("\n")) {
    const trimmed = line.trim();
    if (!trimmed || trimmed.startsWith("#")) continue;
    const eqIdx = trimmed.indexOf("=");
    if (eqIdx === -1) continue;
    const key = trimmed.slice(0, eqIdx).trim();
    const value = trimmed.slice(eqIdx + 1).trim();
    if (key && !(key in process.env)) {
      process.env[key] = value;
    }
  }
}

// Load .env immediately so env vars are available for module-level constants
loadDotEnv();

// ─── Configuration ───────────────────────────────────────────────────────────

export const FLATSLAB_HOME = path.join(os.homedir(), ".flatslab");
export const AGENT_ID = process.env.FLATSLAB_AGENT ?? "main";
export const AGENT_DIR = path.join(FLATSLAB_HOME, "agents", AGENT_ID, "agent");
export const MODELS_JSON = path.join(AGENT_DIR, "models.json");
export const AUTH_PROFILES_JSON = path.join(AGENT_DIR, "auth-profiles.json");
export const SESSION_DIR = path.join(FLATSLAB_HOME, "state", "sessions");

export const DEFAULT_PROVIDER = process.env.FLATSLAB_PROVIDER ?? "anthropic";
export const DEFAULT_MODEL = process.env.FLATSLAB_MODEL ?? "claude-sonnet-4-20250514";

// ─── Ensure directories ─────────────────────────────────────────────────────

export function ensureDirs() {
  for (const dir of [FLATSLAB_HOME, AGENT_DIR, SESSION_DIR]) {
    fs.mkdirSync(dir, { recursive: true });
  }
}

// ─── Auth ────────────────────────────────────────────────────────────────────

type AuthProfile = { type: string; provider: string; token?: string };
type AuthProfiles = {
  profiles?: Record<string, AuthProfile>;
  lastGood?: Record<string, string>;
};

export function findProfileToken(data: AuthProfiles, provider: string): string | undefined {
  const profiles = data.profiles ?? {};

  const lastGoodKey = data.lastGood?.[provider];
  const lastGood = lastGoodKey ? profiles[lastGoodKey] : undefined;
  if (lastGood?.token) {
    return lastGood.token;
  }

  for (const profile of Object.values(profiles)) {
    if (profile.provider === provider && profile.token) {
      return profile.token;
    }
  }
  return undefined;
}

function loadApiKeyFromProfiles(provider: string): string | undefined {
  if (!fs.existsSync(AUTH_PROFILES_JSON)) return undefined;

  const raw = fs.readFileSync(AUTH_PROFILES_JSON, "utf-8");
  let data: AuthProfiles;
  try {
    data = JSON.parse(raw);
  } catch (err) {
    throw new Error(`Cannot parse ${AUTH_PROFILES_JSON}`, { cause: err });
  }
  return findProfileToken(data, provider);
}

export const ENV_KEY_MAP: Record<string, string[]> = {
  anthropic: ["ANTHROPIC_API_KEY"],
  openai: ["OPENAI_API_KEY"],
  google: ["GOOGLE_API_KEY", "GEMINI_API_KEY"],
  groq: ["GROQ_API_KEY"],
  xai: ["XAI_API_KEY"],
  mistral: ["MISTRAL_API_KEY"],
  openrouter: ["OPENROUTER_API_KEY"],
  cerebras: ["CEREBRAS_API_KEY"],
};

export function envKeysFor(provider: string): string[] {
  return ENV_KEY_MAP[provider] ?? [`${provider.toUpperCase()}_API_KEY`];
}

export function ensureApiKeyInEnv(provider: string): boolean {
  const envKeys = envKeysFor(provider);

  for (const envKey of envKeys) {
    if (process.env[envKey]) return true;
  }

  const apiKey = loadApiKeyFromProfiles(provider);
  if (apiKey && envKeys[0]) {
    process.env[envKeys[0]] = apiKey;
    return true;
  }

  return false;
}

// ─── Model resolution ────────────────────────────────────────────────────────

export function resolveModelAndAuth(provider: string, modelId: string) {
  const authJsonPath = path.join(AGENT_DIR, "auth.json");
  const authStorage = new AuthStorage(authJsonPath);
  const modelRegistry = new ModelRegistry(authStorage, MODELS_JSON);

  const model = modelRegistry.find(provider, modelId);
  if (!model) {
    throw new Error(
      `Unknown model ${provider}/${modelId}. Add it to ${MODELS_JSON} or set FLATSLAB_PROVIDER and FLATSLAB_MODEL.`,
    );
  }

  return { model, authStorage, modelRegistry };
}

// ─── Session management ──────────────────────────────────────────────────────

export function resolveSessionFile(sessionId: string): string {
  return path.join(SESSION_DIR, `${sessionId}.json`);
}

// ─── System prompt override ──────────────────────────────────────────────────

export function applySystemPromptToSession(session: AgentSession, systemPrompt: string) {
  session.agent.setSystemPrompt(systemPrompt);
  // The SDK rebuilds its own prompt on tool changes; pin ours instead.
  const mutable = session as unknown as {
    _baseSystemPrompt?: string;
    _rebuildSystemPrompt?: (toolNames: string[]) => string;
  };
  mutable._baseSystemPrompt = systemPrompt;
  mutable._rebuildSystemPrompt = () => systemPrompt;
}

// ─── Helpers ─────────────────────────────────────────────────────────────────

/** Names of the tools the assistant called, in call order. */
export function extractToolCalls(messages: AgentMessage[]): string[] {
  const toolCalls: string[] = [];
  for (const msg of messages) {
    if (msg.role !== "assistant") continue;
    for (const part of msg.content) {
      if (part.type === "toolCall") {
        toolCalls.push(part.name);
      }
    }
  }
  return toolCalls;
}
