import type { ToolDescriptor } from "./types.js";

/** Render tools as "- name: description" lines for a system prompt */
export function formatToolCatalog(tools: readonly ToolDescriptor[]): string {
    return tools.map((t) => `- ${t.name}: ${t.description ?? ""}`).join("\n");
}
