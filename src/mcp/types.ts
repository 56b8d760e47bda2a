/**
 * mcp/types.ts — Shared types for the MCP tool hub
 */

import type { ConversationTurn } from "../providers/types.js";

/** How to connect to an MCP server */
export type McpTransport = "stdio" | "streamable_http";

/** Per-server configuration read from mcp-servers.json */
export interface McpServerConfig {
    /** Unique name, used in logs and status output */
    name: string;
    /** Transport protocol to use */
    transport: McpTransport;
    /** [stdio] Executable to spawn (e.g. "node", "npx") */
    command?: string;
    /** [stdio] Arguments to the command */
    args?: string[];
    /** [stdio] Extra environment variables; [streamable_http] request headers. Supports ${VAR} substitution. */
    env?: Record<string, string>;
    /** [streamable_http] URL of the MCP endpoint */
    url?: string;
    /** Human-readable description shown by /tools */
    description?: string;
    /** Whether to skip this server at runtime (default: false) */
    disabled?: boolean;
}

/** Root shape of mcp-servers.json */
export interface McpServersFile {
    servers: McpServerConfig[];
}

export interface PromptDescriptor {
    name: string;
    description: string;
    /** Argument names in declaration order */
    arguments: Array<{ name: string; required: boolean }>;
}

export interface ResourceReader {
    readResource(uri: string): Promise<unknown>;
}

export interface PromptSource {
    listPrompts(): Promise<PromptDescriptor[]>;
    getPrompt(name: string, args: Record<string, string>): Promise<ConversationTurn[]>;
}

/** Runtime status of a single MCP server connection */
export interface McpServerStatus {
    name: string;
    transport: McpTransport;
    connected: boolean;
    toolCount: number;
    error?: string;
}
