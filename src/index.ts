#!/usr/bin/env node
/**
 * index.ts — tool-relay entry point
 *
 * Validates config, connects the MCP servers, runs the console.
 * The MCP connections are released on every exit path, including SIGTERM.
 */

import { DispatchLoop } from "./agent/dispatch.js";
import { consoleObserver, runConsole } from "./cli/console.js";
import { loadConfig, type Config } from "./config.js";
import { ConfigError } from "./errors.js";
import { logger } from "./logger.js";
import { DOCS_SERVER_NAME, documentServerConfig, loadServersConfig, withToolHub } from "./mcp/manager.js";
import type { McpServerConfig } from "./mcp/types.js";
import { ModelGateway } from "./providers/gateway.js";
import { createOpenAIBackend } from "./providers/openai-provider.js";

function readConfig(): Config {
    try {
        return loadConfig();
    } catch (err) {
        if (!(err instanceof ConfigError)) throw err;
        console.error("❌ Invalid environment configuration:\n");
        for (const issue of err.issues) {
            console.error(`  • ${issue}`);
        }
        console.error("\nCopy .env.example to .env and fill in your values.\n");
        process.exit(1);
    }
}

async function main() {
    const config = readConfig();
    logger.setLevel(config.LOG_LEVEL);

    logger.info("🚀 tool-relay starting up…", {
        model: config.LOCAL_LLM_MODEL,
        baseURL: config.LOCAL_LLM_BASE_URL,
    });

    const gateway = new ModelGateway(
        createOpenAIBackend({
            apiKey: config.LOCAL_LLM_API_KEY,
            baseURL: config.LOCAL_LLM_BASE_URL,
            timeoutMs: config.LLM_TIMEOUT_MS,
        }),
        config.LOCAL_LLM_MODEL
    );

    const servers: McpServerConfig[] = [
        ...(config.DOCS_SERVER_ENABLED ? [documentServerConfig({ LOG_LEVEL: config.LOG_LEVEL })] : []),
        ...loadServersConfig(config.MCP_SERVERS_CONFIG),
    ];

    const shutdown = new AbortController();
    process.once("SIGTERM", () => {
        logger.info("Received SIGTERM, shutting down…");
        shutdown.abort();
    });

    await withToolHub(
        servers,
        async (hub) => {
            const catalog = await hub.listTools();
            if (catalog.length === 0) {
                logger.warn("No MCP tools available; the model can only answer directly");
            }
            process.stdout.write(`🔧 Available tools:\n${catalog.map((t) => `  - ${t.name}`).join("\n")}\n`);

            const loop = new DispatchLoop({
                model: gateway,
                tools: hub,
                catalog,
                language: config.ASSISTANT_LANGUAGE,
                observer: consoleObserver(process.stdout),
            });

            await runConsole({
                loop,
                commands: { catalog, model: gateway, documents: hub.client(DOCS_SERVER_NAME) },
                exitPhrases: config.EXIT_PHRASES,
                signal: shutdown.signal,
            });
        },
        config.MCP_CONNECT_TIMEOUT_MS
    );
}

main().catch((err) => {
    console.error("Fatal error:", err);
    process.exit(1);
});
