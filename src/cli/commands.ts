/**
 * cli/commands.ts — Slash commands of the console
 *
 *   /help               list commands
 *   /tools              tools advertised to the model
 *   /docs               ids of the documents on the document server
 *   /prompts            prompts offered by the document server
 *   /<prompt> <args…>   run a server prompt through the model
 */

import { DOCUMENT_LIST_URI } from "../docs/server.js";
import type { PromptSource, ResourceReader } from "../mcp/types.js";
import type { ChatModel } from "../providers/types.js";
import { formatToolCatalog } from "../tools/catalog.js";
import type { ToolDescriptor } from "../tools/types.js";

export interface CommandContext {
    catalog: readonly ToolDescriptor[];
    model: ChatModel;
    /** Absent when the document server is disabled or failed to connect */
    documents?: ResourceReader & PromptSource;
}

const HELP = [
    "Commands:",
    "  /tools              list the tools the model can call",
    "  /docs               list document ids",
    "  /prompts            list document prompts",
    "  /<prompt> <doc_id>  run a document prompt, e.g. /summarize report.pdf",
    "Anything else, including /lines matching no command, is sent to the model.",
].join("\n");

const NO_DOCUMENTS = "Document server is not available.";

/** Run a slash command. Returns null when the line is not a command and belongs to the model. */
export async function runCommand(line: string, ctx: CommandContext): Promise<string | null> {
    if (!line.startsWith("/")) return null;

    const [head = "", ...args] = line.slice(1).trim().split(/\s+/);
    const name = head.toLowerCase();

    switch (name) {
        case "help":
            return HELP;
        case "tools":
            return ctx.catalog.length > 0 ? formatToolCatalog(ctx.catalog) : "(no tools available)";
        case "docs": {
            if (!ctx.documents) return NO_DOCUMENTS;
            const ids = await ctx.documents.readResource(DOCUMENT_LIST_URI);
            if (!Array.isArray(ids)) return JSON.stringify(ids);
            return ids.length > 0 ? ids.map((id) => `- ${String(id)}`).join("\n") : "(no documents)";
        }
        case "prompts": {
            if (!ctx.documents) return NO_DOCUMENTS;
            const prompts = await ctx.documents.listPrompts();
            if (prompts.length === 0) return "(no prompts)";
            return prompts
                .map((p) => {
                    const params = p.arguments.map((a) => `<${a.name}>`).join(" ");
                    return `- /${p.name}${params ? ` ${params}` : ""}: ${p.description}`;
                })
                .join("\n");
        }
        default:
            return runPrompt(name, args, ctx);
    }
}

async function runPrompt(name: string, positional: string[], ctx: CommandContext): Promise<string | null> {
    if (!ctx.documents) return null;

    const prompt = (await ctx.documents.listPrompts()).find((p) => p.name === name);
    if (!prompt) return null;

    const missing = prompt.arguments.slice(positional.length).filter((a) => a.required);
    if (missing.length > 0) {
        return `Usage: /${prompt.name} ${prompt.arguments.map((a) => `<${a.name}>`).join(" ")}`;
    }

    const args: Record<string, string> = {};
    prompt.arguments.forEach((a, i) => {
        const value = positional[i];
        if (value !== undefined) args[a.name] = value;
    });

    const turns = await ctx.documents.getPrompt(prompt.name, args);
    const reply = await ctx.model.chat(turns);
    return reply.content;
}
