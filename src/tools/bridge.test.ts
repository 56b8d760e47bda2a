import { describe, expect, it, vi } from "vitest";
import { formatToolCatalog } from "./catalog.js";
import { executeTool, toolResultToText } from "./bridge.js";
import type { ToolProvider } from "./types.js";

describe("toolResultToText", () => {
    it("prefers structuredContent.result", () => {
        const result = {
            content: [{ type: "text", text: "from content" }],
            structuredContent: { result: "from structured" },
        };
        expect(toolResultToText(result)).toBe("from structured");
    });

    it("renders a non-string structured result as JSON", () => {
        expect(toolResultToText({ structuredContent: { result: { pages: 3 } } })).toBe('{"pages":3}');
    });

    it("returns the first text block", () => {
        const result = {
            content: [
                { type: "image", data: "AAA", mimeType: "image/png" },
                { type: "text", text: "first text" },
                { type: "text", text: "second text" },
            ],
        };
        expect(toolResultToText(result)).toBe("first text");
    });

    it("falls back to the content list as JSON when no block is text", () => {
        const result = { content: [{ type: "image", data: "AAA" }] };
        expect(toolResultToText(result)).toBe('[{"type":"image","data":"AAA"}]');
    });

    it("falls back to the whole result as JSON", () => {
        expect(toolResultToText({ content: [], isError: false })).toBe('{"content":[],"isError":false}');
        expect(toolResultToText({ toolResult: "legacy" })).toBe('{"toolResult":"legacy"}');
    });
});

describe("executeTool", () => {
    it("calls the provider once and reduces the result", async () => {
        const callTool = vi.fn(async () => ({ content: [{ type: "text", text: "doc body" }] }));
        const provider: ToolProvider = { listTools: async () => [], callTool };

        await expect(executeTool(provider, "read_doc_contents", { doc_id: "report.pdf" })).resolves.toBe("doc body");
        expect(callTool).toHaveBeenCalledTimes(1);
        expect(callTool).toHaveBeenCalledWith("read_doc_contents", { doc_id: "report.pdf" });
    });

    it("propagates provider errors", async () => {
        const provider: ToolProvider = {
            listTools: async () => [],
            callTool: async () => {
                throw new Error("boom");
            },
        };
        await expect(executeTool(provider, "x", {})).rejects.toThrow("boom");
    });
});

describe("formatToolCatalog", () => {
    it("renders one line per tool in order", () => {
        const text = formatToolCatalog([
            { name: "read_doc_contents", description: "Read a document." },
            { name: "no_description" },
        ]);
        expect(text).toBe("- read_doc_contents: Read a document.\n- no_description: ");
    });

    it("renders an empty catalog as an empty string", () => {
        expect(formatToolCatalog([])).toBe("");
    });
});
