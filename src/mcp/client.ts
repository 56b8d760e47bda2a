/**
 * mcp/client.ts — Thin wrapper around @modelcontextprotocol/sdk
 *
 * Supports:
 *   - stdio transport: spawns a child process (the bundled document server, local servers)
 *   - streamable HTTP transport: connects to a remote endpoint
 *
 * Each McpClientWrapper manages a single server connection. The hub creates
 * one per configured server. Tests connect it through an in-memory transport.
 */

import { Client } from "@modelcontextprotocol/sdk/client/index.js";
import { StdioClientTransport, getDefaultEnvironment } from "@modelcontextprotocol/sdk/client/stdio.js";
import { StreamableHTTPClientTransport } from "@modelcontextprotocol/sdk/client/streamableHttp.js";
import type { Transport } from "@modelcontextprotocol/sdk/shared/transport.js";
import { ToolExecutionError, errorMessage } from "../errors.js";
import { logger } from "../logger.js";
import type { ConversationTurn } from "../providers/types.js";
import { toolResultToText } from "../tools/bridge.js";
import type { ToolArguments, ToolDescriptor, ToolResult } from "../tools/types.js";
import type { McpServerConfig, PromptDescriptor, PromptSource, ResourceReader } from "./types.js";

const DEFAULT_CONNECT_TIMEOUT_MS = 15_000;

/** Replace ${VAR} references with values from the environment */
export function resolveEnvVars(
    vars: Record<string, string> | undefined,
    source: NodeJS.ProcessEnv = process.env
): Record<string, string> {
    const resolved: Record<string, string> = {};
    for (const [key, value] of Object.entries(vars ?? {})) {
        resolved[key] = value.replace(/\$\{([A-Za-z_][A-Za-z0-9_]*)\}/g, (_, name: string) => source[name] ?? "");
    }
    return resolved;
}

async function withTimeout<T>(work: Promise<T>, ms: number, label: string): Promise<T> {
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_, reject) => {
        timer = setTimeout(() => reject(new Error(`${label} timeout after ${ms}ms`)), ms);
    });
    try {
        return await Promise.race([work, timeout]);
    } finally {
        clearTimeout(timer);
    }
}

export class McpClientWrapper implements ResourceReader, PromptSource {
    private client: Client | null = null;
    private _tools: ToolDescriptor[] = [];
    private _connected = false;
    private _error: string | undefined;

    constructor(
        private readonly cfg: McpServerConfig,
        private readonly connectTimeoutMs = DEFAULT_CONNECT_TIMEOUT_MS
    ) { }

    get name(): string {
        return this.cfg.name;
    }

    get config(): McpServerConfig {
        return this.cfg;
    }

    get connected(): boolean {
        return this._connected;
    }

    get error(): string | undefined {
        return this._error;
    }

    get tools(): ToolDescriptor[] {
        return this._tools;
    }

    /**
     * Connect to the server and discover its tools. Failures are logged and
     * recorded in `error`; the wrapper stays disconnected.
     */
    async connect(transport?: Transport): Promise<void> {
        try {
            this.client = new Client(
                { name: "tool-relay", version: "0.1.0" },
                { capabilities: {} }
            );

            await withTimeout(
                this.client.connect(transport ?? this.buildTransport()),
                this.connectTimeoutMs,
                "Connection"
            );
            this._tools = await withTimeout(this.discoverTools(), this.connectTimeoutMs, "Tool discovery");

            this._connected = true;
            this._error = undefined;

            logger.info(`[MCP] Connected to "${this.cfg.name}"`, {
                transport: this.cfg.transport,
                tools: this._tools.length,
            });
        } catch (err) {
            this._connected = false;
            this._error = errorMessage(err);
            logger.error(`[MCP] Failed to connect to "${this.cfg.name}"`, {
                error: this._error,
            });
            await this.disconnect();
        }
    }

    /** Disconnect; a failing close is logged, not raised */
    async disconnect(): Promise<void> {
        const client = this.client;
        this.client = null;
        this._connected = false;
        this._tools = [];
        if (!client) return;
        try {
            await client.close();
        } catch (err) {
            logger.warn(`[MCP] Error while closing "${this.cfg.name}"`, { error: errorMessage(err) });
        }
    }

    /**
     * Call a tool on this server. Resolves with the raw result; rejects with a
     * ToolExecutionError when the call fails or the server flags the result
     * as an error.
     */
    async callTool(toolName: string, args: ToolArguments): Promise<ToolResult> {
        const client = this.requireClient(toolName);

        let result: ToolResult;
        try {
            result = await client.callTool({ name: toolName, arguments: args });
        } catch (err) {
            throw new ToolExecutionError(toolName, errorMessage(err), { cause: err });
        }

        if (result["isError"] === true) {
            throw new ToolExecutionError(toolName, toolResultToText(result));
        }
        return result;
    }

    /** JSON resources are decoded; text resources come back as strings */
    async readResource(uri: string): Promise<unknown> {
        const client = this.requireClient();
        const result = await client.readResource({ uri });
        const resource = result.contents[0];
        if (!resource) return null;

        if ("text" in resource && typeof resource.text === "string") {
            if (resource.mimeType === "application/json") {
                return JSON.parse(resource.text) as unknown;
            }
            return resource.text;
        }
        return resource;
    }

    async listPrompts(): Promise<PromptDescriptor[]> {
        const client = this.requireClient();
        const result = await client.listPrompts();
        return result.prompts.map((p) => ({
            name: p.name,
            description: p.description ?? "",
            arguments: (p.arguments ?? []).map((a) => ({ name: a.name, required: a.required ?? false })),
        }));
    }

    /** Fetch a prompt and return its messages as conversation turns */
    async getPrompt(name: string, args: Record<string, string>): Promise<ConversationTurn[]> {
        const client = this.requireClient();
        const result = await client.getPrompt({ name, arguments: args });
        return result.messages.map((m) => ({
            role: m.role,
            content: m.content.type === "text" ? m.content.text : m.content,
        }));
    }

    // ── Private helpers ──────────────────────────────────────────────────────

    private requireClient(toolName?: string): Client {
        if (this.client && this._connected) return this.client;
        const message = `MCP server "${this.cfg.name}" is not connected${this._error ? `: ${this._error}` : ""}`;
        if (toolName !== undefined) throw new ToolExecutionError(toolName, message);
        throw new Error(message);
    }

    private buildTransport(): Transport {
        const { transport, command, args, env, url } = this.cfg;

        if (transport === "stdio") {
            if (!command) {
                throw new Error(`Server "${this.cfg.name}" uses stdio but has no "command" configured`);
            }
            return new StdioClientTransport({
                command,
                args: args ?? [],
                env: { ...getDefaultEnvironment(), ...resolveEnvVars(env) },
            });
        }

        if (transport === "streamable_http") {
            if (!url) {
                throw new Error(`Server "${this.cfg.name}" uses streamable_http but has no "url" configured`);
            }
            return new StreamableHTTPClientTransport(new URL(url), {
                requestInit: {
                    headers: resolveEnvVars(env),
                },
            });
        }

        throw new Error(`Unknown transport "${String(transport)}" for server "${this.cfg.name}"`);
    }

    private async discoverTools(): Promise<ToolDescriptor[]> {
        if (!this.client) return [];
        const response = await this.client.listTools();
        return response.tools.map((t) => ({
            name: t.name,
            description: t.description ?? "",
        }));
    }
}
