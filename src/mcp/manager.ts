/**
 * mcp/manager.ts — McpToolHub: every MCP server connection of one session
 *
 * Usage:
 *   await withToolHub(configs, async (hub) => {
 *       hub.listTools();            // tools across all connected servers
 *       hub.callTool(name, args);   // routed to the server that advertised `name`
 *       hub.getStatus();            // per-server connection status
 *   });                             // always disconnected afterwards
 *
 * The hub is acquired once at startup and released on every exit path.
 */

import { existsSync, readFileSync } from "node:fs";
import { extname, resolve } from "node:path";
import { fileURLToPath } from "node:url";
import { ToolExecutionError, errorMessage } from "../errors.js";
import { logger } from "../logger.js";
import type { ToolArguments, ToolDescriptor, ToolProvider, ToolResult } from "../tools/types.js";
import { McpClientWrapper } from "./client.js";
import type { McpServerConfig, McpServerStatus, McpServersFile } from "./types.js";

export const DOCS_SERVER_NAME = "docs";

// ── Config loading ────────────────────────────────────────────────────────────

function isServersFile(value: unknown): value is McpServersFile {
    return (
        typeof value === "object" &&
        value !== null &&
        "servers" in value &&
        Array.isArray(value.servers)
    );
}

/** Read mcp-servers.json; a missing or unreadable file yields no servers */
export function loadServersConfig(configPath: string): McpServerConfig[] {
    const fullPath = resolve(configPath);

    if (!existsSync(fullPath)) {
        logger.info(`[MCP] Config file not found at ${fullPath} — only built-in servers will be loaded`);
        return [];
    }

    try {
        const parsed: unknown = JSON.parse(readFileSync(fullPath, "utf-8"));
        if (!isServersFile(parsed)) {
            logger.error(`[MCP] ${fullPath} has no "servers" array`);
            return [];
        }
        const servers = parsed.servers.filter((s) => !s.disabled);
        logger.info(`[MCP] Loaded ${servers.length} server(s) from ${fullPath}`);
        return servers;
    } catch (err) {
        logger.error("[MCP] Failed to parse mcp-servers.json", { error: errorMessage(err) });
        return [];
    }
}

/**
 * Config for the bundled document server, spawned with the current Node
 * binary. When running from sources (tsx) the server is loaded the same way.
 */
export function documentServerConfig(env: Record<string, string> = {}): McpServerConfig {
    const entry = fileURLToPath(new URL("../docs/main" + extname(fileURLToPath(import.meta.url)), import.meta.url));
    const args = entry.endsWith(".ts") ? ["--import", "tsx", entry] : [entry];
    return {
        name: DOCS_SERVER_NAME,
        transport: "stdio",
        command: process.execPath,
        args,
        env,
        description: "In-memory document store (read, edit, prompts)",
    };
}

// ── Hub ───────────────────────────────────────────────────────────────────────

export class McpToolHub implements ToolProvider {
    private readonly clients: McpClientWrapper[];

    private constructor(clients: McpClientWrapper[]) {
        this.clients = clients;
    }

    /** Connect every server concurrently. Servers that fail stay registered for status reporting. */
    static async open(configs: McpServerConfig[], connectTimeoutMs?: number): Promise<McpToolHub> {
        logger.info(`[MCP] Initialising ${configs.length} server(s)…`);
        const clients = configs.map((cfg) => new McpClientWrapper(cfg, connectTimeoutMs));
        await Promise.all(clients.map((c) => c.connect()));

        const hub = new McpToolHub(clients);
        const connected = clients.filter((c) => c.connected).length;
        logger.info(`[MCP] Ready — ${connected}/${clients.length} server(s) connected`);
        return hub;
    }

    /** Wrap clients that are already connected (used by tests with in-memory transports) */
    static fromClients(clients: McpClientWrapper[]): McpToolHub {
        return new McpToolHub(clients);
    }

    client(name: string): McpClientWrapper | undefined {
        return this.clients.find((c) => c.name === name && c.connected);
    }

    /** Tools across connected servers; the first server advertising a name owns it */
    async listTools(): Promise<ToolDescriptor[]> {
        const seen = new Set<string>();
        const all: ToolDescriptor[] = [];
        for (const client of this.clients) {
            if (!client.connected) continue;
            for (const tool of client.tools) {
                if (seen.has(tool.name)) {
                    logger.warn(`[MCP] Tool "${tool.name}" from "${client.name}" is shadowed by an earlier server`);
                    continue;
                }
                seen.add(tool.name);
                all.push(tool);
            }
        }
        return all;
    }

    async callTool(name: string, args: ToolArguments): Promise<ToolResult> {
        const owner = this.clients.find((c) => c.connected && c.tools.some((t) => t.name === name));
        if (!owner) {
            const available = (await this.listTools()).map((t) => t.name).join(", ") || "none";
            throw new ToolExecutionError(name, `Unknown tool "${name}". Available: ${available}`);
        }
        return owner.callTool(name, args);
    }

    getStatus(): McpServerStatus[] {
        return this.clients.map((c) => {
            const status: McpServerStatus = {
                name: c.name,
                transport: c.config.transport,
                connected: c.connected,
                toolCount: c.tools.length,
            };
            if (c.error !== undefined) {
                status.error = c.error;
            }
            return status;
        });
    }

    /** Disconnect all servers cleanly */
    async close(): Promise<void> {
        if (this.clients.length === 0) return;
        logger.info("[MCP] Shutting down MCP connections…");
        await Promise.all(this.clients.map((c) => c.disconnect()));
    }
}

/** Open a hub, run `fn` with it, and close it whatever happens */
export async function withToolHub<T>(
    configs: McpServerConfig[],
    fn: (hub: McpToolHub) => Promise<T>,
    connectTimeoutMs?: number
): Promise<T> {
    const hub = await McpToolHub.open(configs, connectTimeoutMs);
    try {
        return await fn(hub);
    } finally {
        await hub.close();
    }
}
