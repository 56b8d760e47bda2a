/**
 * docs/server.ts — MCP server exposing a DocumentStore
 *
 * Tools:     read_doc_contents, edit_document
 * Resources: docs://documents (JSON list of ids), docs://documents/{doc_id}
 * Prompts:   rewrite_markdown, summarize, format
 */

import { McpServer, ResourceTemplate } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import type { DocumentStore } from "./store.js";

export const DOCUMENT_LIST_URI = "docs://documents";

function requireDocument(store: DocumentStore, docId: string): string {
    const content = store.get(docId);
    if (content === undefined) {
        throw new Error(`Doc with id ${docId} not found`);
    }
    return content;
}

function textResult(text: string) {
    return { content: [{ type: "text" as const, text }] };
}

function userPrompt(text: string) {
    return { messages: [{ role: "user" as const, content: { type: "text" as const, text } }] };
}

const docIdArg = (description: string) => ({ doc_id: z.string().describe(description) });

export function createDocumentServer(store: DocumentStore): McpServer {
    const server = new McpServer({ name: "documents", version: "0.1.0" });

    // ── Tools ────────────────────────────────────────────────────────────────

    server.registerTool(
        "read_doc_contents",
        {
            description: "Read the contents of a document and return it as a string.",
            inputSchema: docIdArg("Id of the document to read"),
        },
        async ({ doc_id }) => textResult(requireDocument(store, doc_id))
    );

    server.registerTool(
        "edit_document",
        {
            description: "Edit a document by replacing a string in the document's content with a new string.",
            inputSchema: {
                ...docIdArg("Id of the document that will be edited"),
                old_str: z.string().min(1).describe("The exact text to replace (case and whitespace must match)."),
                new_str: z.string().describe("The new text to insert in place of the old text."),
            },
        },
        async ({ doc_id, old_str, new_str }) => {
            const edited = requireDocument(store, doc_id).replaceAll(old_str, () => new_str);
            store.put(doc_id, edited);
            return textResult(edited);
        }
    );

    // ── Resources ────────────────────────────────────────────────────────────

    server.registerResource(
        "documents",
        DOCUMENT_LIST_URI,
        { description: "Ids of every available document", mimeType: "application/json" },
        async (uri) => ({
            contents: [{ uri: uri.href, mimeType: "application/json", text: JSON.stringify(store.list()) }],
        })
    );

    server.registerResource(
        "document",
        new ResourceTemplate(`${DOCUMENT_LIST_URI}/{doc_id}`, { list: undefined }),
        { description: "Contents of a single document", mimeType: "text/plain" },
        async (uri, { doc_id }) => {
            const id = Array.isArray(doc_id) ? doc_id.join("/") : doc_id;
            return {
                contents: [{ uri: uri.href, mimeType: "text/plain", text: requireDocument(store, decodeURIComponent(id)) }],
            };
        }
    );

    // ── Prompts ──────────────────────────────────────────────────────────────

    server.registerPrompt(
        "rewrite_markdown",
        {
            description: "Rewrite a document using clear, well-structured Markdown.",
            argsSchema: docIdArg("Id of the document to rewrite in Markdown"),
        },
        ({ doc_id }) =>
            userPrompt(
                "You are an expert technical writer. Rewrite the following document " +
                "using clear, well-structured Markdown. Keep the meaning but improve " +
                "organization and readability. Use headings, bullet points, and tables " +
                "when appropriate.\n\n" +
                `DOCUMENT CONTENT:\n${requireDocument(store, doc_id)}`
            )
    );

    server.registerPrompt(
        "summarize",
        {
            description: "Summarize a document in a concise way.",
            argsSchema: docIdArg("Id of the document to summarize"),
        },
        ({ doc_id }) =>
            userPrompt(
                "Summarize the following document in a concise paragraph, " +
                "highlighting the most important technical and business points:\n\n" +
                `DOCUMENT CONTENT:\n${requireDocument(store, doc_id)}`
            )
    );

    server.registerPrompt(
        "format",
        {
            description: "Rewrites the contents of the document in Markdown format.",
            argsSchema: docIdArg("Id of the document to format in Markdown"),
        },
        ({ doc_id }) =>
            userPrompt(
                "Your goal is to reformat a document using clean, professional Markdown syntax.\n\n" +
                "Instructions:\n" +
                "- Add clear headings and subheadings with '#', '##', etc.\n" +
                "- Use bullet lists and numbered lists where they make sense.\n" +
                "- Use code blocks for technical snippets.\n" +
                "- Keep the meaning of the document, but improve structure and clarity.\n\n" +
                "Here is the document you must reformat:\n\n" +
                requireDocument(store, doc_id)
            )
    );

    return server;
}
