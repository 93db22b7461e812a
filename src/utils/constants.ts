import path from "path";

function readInt(name: string, fallback: number): number {
  const parsed = Number.parseInt(process.env[name] ?? "", 10);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
}

// Server
export const PORT = readInt("PORT", 3000);

// File System Paths
export const PROFILE_PATH = path.resolve(
  process.env.PROFILE_PATH || "profile_structure.json",
);
export const OUTPUT_DIR = path.resolve(process.env.OUTPUT_DIR || "output");
export const UPLOAD_DIR = path.resolve(process.env.UPLOAD_DIR || "uploads");

// Completion backend
export const LLM_BACKEND = process.env.LLM_BACKEND || "gemini";
export const LLM_MODEL = process.env.LLM_MODEL || "";
export const COMPLETION_TIMEOUT_MS = readInt("COMPLETION_TIMEOUT_MS", 120_000);
export const DEFAULT_TEMPERATURE = 0.3;
export const DEFAULT_MAX_TOKENS = 1200;

// Google Gemini Configuration
export const GEMINI_API_KEY = process.env.GEMINI_API_KEY || "";
export const GEMINI_MODEL_NAME = "gemini-2.0-flash";

// Anthropic Configuration
export const ANTHROPIC_API_KEY = process.env.ANTHROPIC_API_KEY || "";
export const CLAUDE_MODEL_NAME = "claude-3-5-sonnet-latest";

// Ollama Configuration
export const OLLAMA_URL = process.env.OLLAMA_URL || "http://localhost:11434";
export const OLLAMA_MODEL_NAME = "mistral";

// Limits
export const MAX_PROFILE_TEXT_CHARS = 3000;
export const MAX_OFFER_CHARS_FOR_TITLE = 1000;
export const MAX_JOB_TITLE_LENGTH = 50;
export const FALLBACK_EXPERIENCE_COUNT = 2;
export const MAX_UPLOAD_BYTES = 10 * 1024 * 1024; // 10 MB
