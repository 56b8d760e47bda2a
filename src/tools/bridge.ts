/**
 * tools/bridge.ts — Tool Execution Bridge
 *
 * Runs one tool through the provider and reduces whatever comes back to a
 * single string. Provider errors are not caught here; the dispatch loop
 * decides what a failed call means for the turn.
 */

import type { ToolArguments, ToolProvider, ToolResult } from "./types.js";

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === "object" && value !== null && !Array.isArray(value);
}

function asText(value: unknown): string {
    return typeof value === "string" ? value : JSON.stringify(value);
}

/**
 * Preference order: structuredContent.result, then the first text block,
 * then the content list as JSON, then the whole result as JSON.
 */
export function toolResultToText(result: ToolResult): string {
    const structured = result["structuredContent"];
    if (isRecord(structured) && Object.hasOwn(structured, "result")) {
        return asText(structured["result"]);
    }

    const content = result["content"];
    if (Array.isArray(content) && content.length > 0) {
        for (const block of content) {
            if (!isRecord(block) || block["type"] !== "text") continue;
            const text = block["text"];
            if (typeof text === "string") return text;
        }
        return JSON.stringify(content);
    }

    return JSON.stringify(result);
}

export async function executeTool(
    provider: Pick<ToolProvider, "callTool">,
    toolName: string,
    args: ToolArguments
): Promise<string> {
    const result = await provider.callTool(toolName, args);
    return toolResultToText(result);
}
