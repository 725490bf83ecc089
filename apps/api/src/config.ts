import { config as loadEnv } from "dotenv";
import { resolve } from "path";

// Load .env from project root
loadEnv({ path: resolve(process.cwd(), ".env") });

export type CollisionPolicy = "first-wins" | "reject";

export type LLMProviderName = "anthropic" | "openai";

export interface Config {
  nodeEnv: string;
  logLevel: string;

  // LLM
  llmProvider: LLMProviderName;
  llmModel?: string;
  anthropicApiKey?: string;
  openaiApiKey?: string;

  // Conversation context
  contextWindow: number;
  classifierContextTurns: number;

  // Intent resolution
  classifierMinConfidence: number;
  classifierTimeoutMs: number;

  // Handler execution
  handlerTimeoutMs: number;

  // Registry
  keywordCollisionPolicy: CollisionPolicy;
  handlerOverridesPath?: string;
}

export interface ConfigValidationIssue {
  key: string;
  reason: string;
}

export interface ConfigValidationResult {
  ok: boolean;
  errors: ConfigValidationIssue[];
  warnings: ConfigValidationIssue[];
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  return {
    nodeEnv: env.NODE_ENV || "development",
    logLevel: env.LOG_LEVEL || "info",

    llmProvider: parseProvider(env.LLM_PROVIDER),
    llmModel: env.LLM_MODEL || undefined,
    anthropicApiKey: env.ANTHROPIC_API_KEY,
    openaiApiKey: env.OPENAI_API_KEY,

    contextWindow: parseInt(env.CONTEXT_WINDOW || "30", 10),
    classifierContextTurns: parseInt(env.CLASSIFIER_CONTEXT_TURNS || "10", 10),

    classifierMinConfidence: parseFloat(env.CLASSIFIER_MIN_CONFIDENCE || "0.5"),
    classifierTimeoutMs: parseInt(env.CLASSIFIER_TIMEOUT_MS || "15000", 10),

    handlerTimeoutMs: parseInt(env.HANDLER_TIMEOUT_MS || "30000", 10),

    keywordCollisionPolicy: env.KEYWORD_COLLISION_POLICY === "reject" ? "reject" : "first-wins",
    handlerOverridesPath: env.HANDLER_OVERRIDES_PATH || undefined,
  };
}

export const config = loadConfig();

export function validateConfig(currentConfig: Config = config): ConfigValidationResult {
  const errors: ConfigValidationIssue[] = [];
  const warnings: ConfigValidationIssue[] = [];

  const positiveInts: Array<[string, number]> = [
    ["CONTEXT_WINDOW", currentConfig.contextWindow],
    ["CLASSIFIER_CONTEXT_TURNS", currentConfig.classifierContextTurns],
    ["CLASSIFIER_TIMEOUT_MS", currentConfig.classifierTimeoutMs],
    ["HANDLER_TIMEOUT_MS", currentConfig.handlerTimeoutMs],
  ];
  for (const [key, value] of positiveInts) {
    if (!Number.isInteger(value) || value <= 0) {
      errors.push({ key, reason: `Must be a positive integer, got ${value}.` });
    }
  }

  const confidence = currentConfig.classifierMinConfidence;
  if (!Number.isFinite(confidence) || confidence < 0 || confidence > 1) {
    errors.push({
      key: "CLASSIFIER_MIN_CONFIDENCE",
      reason: `Must be a number between 0 and 1, got ${confidence}.`,
    });
  }

  const providerKey = currentConfig.llmProvider === "anthropic"
    ? currentConfig.anthropicApiKey
    : currentConfig.openaiApiKey;
  if (!providerKey) {
    warnings.push({
      key: currentConfig.llmProvider === "anthropic" ? "ANTHROPIC_API_KEY" : "OPENAI_API_KEY",
      reason: "Intent classification is disabled; unmatched requests will ask for clarification.",
    });
  }

  return {
    ok: errors.length === 0,
    errors,
    warnings,
  };
}

function parseProvider(value?: string): LLMProviderName {
  return value?.trim().toLowerCase() === "openai" ? "openai" : "anthropic";
}
