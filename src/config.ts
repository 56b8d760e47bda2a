/**
 * config.ts — Environment validation using Zod
 *
 * loadConfig() is called once by the entry point. Invalid input raises a
 * ConfigError carrying every issue so the caller can print them all at once.
 * Secrets live in .env only — never in code or logs.
 */

import { z } from "zod";
import "dotenv/config";
import { ConfigError } from "./errors.js";

export const logLevelSchema = z.enum(["debug", "info", "warn", "error"]);

const flag = (fallback: "true" | "false") =>
    z
        .string()
        .transform((v) => v === "true" || v === "1")
        .default(fallback);

const millis = (fallback: string) =>
    z
        .string()
        .regex(/^\d+$/, "must be a whole number of milliseconds")
        .transform(Number)
        .default(fallback);

const envSchema = z.object({
    /** Model id served by the OpenAI-compatible endpoint */
    LOCAL_LLM_MODEL: z.string().min(1, "LOCAL_LLM_MODEL is required"),

    /** Base URL of the chat-completions server (LM Studio by default) */
    LOCAL_LLM_BASE_URL: z.string().url().default("http://localhost:1234/v1"),

    /** Bearer token; local servers accept anything */
    LOCAL_LLM_API_KEY: z.string().min(1).default("not-needed"),

    /** Ceiling for a single completion request */
    LLM_TIMEOUT_MS: millis("300000"),

    /** Language the assistant writes its answers in */
    ASSISTANT_LANGUAGE: z.string().min(1).default("English"),

    /** Comma-separated phrases that end the console session */
    EXIT_PHRASES: z
        .string()
        .default("exit,quit,salir")
        .transform((v) =>
            v
                .split(",")
                .map((p) => p.trim().toLowerCase())
                .filter((p) => p.length > 0)
        ),

    /** Log level */
    LOG_LEVEL: logLevelSchema.default("info"),

    // ── MCP Tool Bridge ───────────────────────────────────────────────────────

    /** Spawn the bundled document server alongside configured servers */
    DOCS_SERVER_ENABLED: flag("true"),

    /** Path to mcp-servers.json (relative to the working directory) */
    MCP_SERVERS_CONFIG: z.string().default("./mcp-servers.json"),

    /** Per-server budget for connecting and listing tools */
    MCP_CONNECT_TIMEOUT_MS: millis("15000"),
});

export type Config = z.infer<typeof envSchema>;

/**
 * Validate an environment map. `CLAUDE_MODEL` is accepted as a fallback name
 * for the model so older .env files keep working.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
    const source = {
        ...env,
        LOCAL_LLM_MODEL: env.LOCAL_LLM_MODEL || env.CLAUDE_MODEL,
    };
    const result = envSchema.safeParse(source);
    if (!result.success) {
        throw new ConfigError(
            result.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`)
        );
    }
    return result.data;
}
