import { describe, expect, it, vi } from "vitest";
import { GatewayError, ToolExecutionError } from "../errors.js";
import type { AssistantReply, ChatModel, ChatOptions, ConversationTurn } from "../providers/types.js";
import type { ToolArguments, ToolDescriptor, ToolProvider, ToolResult } from "../tools/types.js";
import { DispatchLoop } from "./dispatch.js";

const CATALOG: ToolDescriptor[] = [
    { name: "read_doc_contents", description: "Read the contents of a document." },
    { name: "edit_document", description: "Replace text in a document." },
];

function assistant(content: string): AssistantReply {
    return { role: "assistant", content, stopReason: "end" };
}

/** Model that answers each call with the next scripted reply */
function scriptedModel(...replies: Array<string | Error>) {
    const queue = [...replies];
    const chat = vi.fn(async (_turns: readonly ConversationTurn[], _options?: ChatOptions) => {
        const next = queue.shift();
        if (next === undefined) throw new Error("no scripted reply left");
        if (next instanceof Error) throw next;
        return assistant(next);
    });
    const model: ChatModel = { chat };
    return { model, chat };
}

function fakeTools(impl?: (name: string, args: ToolArguments) => Promise<ToolResult>) {
    const callTool = vi.fn<(name: string, args: ToolArguments) => Promise<ToolResult>>(
        impl ?? (async (name) => ({ content: [{ type: "text", text: `output of ${name}` }] }))
    );
    const tools: ToolProvider = { listTools: async () => CATALOG, callTool };
    return { tools, callTool };
}

describe("DispatchLoop", () => {
    it("answers directly without touching tools", async () => {
        const { model, chat } = scriptedModel('```json\n{"answer": "Paris"}\n```');
        const { tools, callTool } = fakeTools();
        const loop = new DispatchLoop({ model, tools, catalog: CATALOG });

        await expect(loop.handleTurn("Capital of France?")).resolves.toEqual({ kind: "answer", text: "Paris" });
        expect(callTool).not.toHaveBeenCalled();
        expect(chat).toHaveBeenCalledTimes(1);
        expect(loop.phase).toBe("awaiting_input");
    });

    it("decides at temperature 0 with the catalog in the system instruction", async () => {
        const { model, chat } = scriptedModel('{"answer": "hi"}');
        const loop = new DispatchLoop({ model, tools: fakeTools().tools, catalog: CATALOG });

        await loop.handleTurn("hello");

        const [turns, options] = chat.mock.calls[0] ?? [];
        expect(turns).toEqual([{ role: "user", content: "hello" }]);
        expect(options?.temperature).toBe(0);
        expect(options?.system).toContain("- read_doc_contents: Read the contents of a document.");
        expect(options?.system).toContain('{"tool": "<tool_name>", "arguments": { ... }}');
    });

    it("reports malformed replies with the raw text and keeps going", async () => {
        const { model } = scriptedModel("Lo siento, no puedo ayudar.", '{"answer": "second turn"}');
        const { tools, callTool } = fakeTools();
        const loop = new DispatchLoop({ model, tools, catalog: CATALOG });

        await expect(loop.handleTurn("?")).resolves.toEqual({
            kind: "malformed",
            rawText: "Lo siento, no puedo ayudar.",
            candidate: "Lo siento, no puedo ayudar.",
        });
        expect(loop.phase).toBe("awaiting_input");
        await expect(loop.handleTurn("again")).resolves.toEqual({ kind: "answer", text: "second turn" });
        expect(callTool).not.toHaveBeenCalled();
    });

    it("reports JSON without tool or answer as unrecognized", async () => {
        const { model } = scriptedModel('{"status": "thinking"}');
        const loop = new DispatchLoop({ model, tools: fakeTools().tools, catalog: CATALOG });

        await expect(loop.handleTurn("?")).resolves.toEqual({
            kind: "unrecognized",
            rawText: '{"status": "thinking"}',
            value: { status: "thinking" },
        });
    });

    it("executes the tool and synthesizes a final answer", async () => {
        const { model, chat } = scriptedModel(
            '{"tool": "read_doc_contents", "arguments": {"doc_id": "report.pdf"}}',
            "The report is about a condenser tower."
        );
        const { tools, callTool } = fakeTools(async () => ({
            content: [{ type: "text", text: "The report details the state of a 20m condenser tower." }],
        }));
        const onToolCall = vi.fn();
        const onToolResult = vi.fn();
        const loop = new DispatchLoop({ model, tools, catalog: CATALOG, observer: { onToolCall, onToolResult } });

        const outcome = await loop.handleTurn("What is report.pdf about?");

        expect(outcome).toEqual({
            kind: "tool_answer",
            tool: "read_doc_contents",
            arguments: { doc_id: "report.pdf" },
            toolOutput: "The report details the state of a 20m condenser tower.",
            text: "The report is about a condenser tower.",
        });
        expect(callTool).toHaveBeenCalledWith("read_doc_contents", { doc_id: "report.pdf" });
        expect(onToolCall).toHaveBeenCalledWith("read_doc_contents", { doc_id: "report.pdf" });
        expect(onToolResult).toHaveBeenCalledWith(
            "read_doc_contents",
            "The report details the state of a 20m condenser tower."
        );

        const [synthesisTurns, synthesisOptions] = chat.mock.calls[1] ?? [];
        expect(synthesisOptions).toEqual({
            system:
                "You are an assistant that answers clearly and directly in English. " +
                "You cannot call tools in this reply: answer only from the tool result you are given, " +
                "in natural text without JSON.",
            temperature: 0,
        });
        expect(synthesisTurns).toEqual([
            {
                role: "user",
                content:
                    "Original question from the user:\n" +
                    "What is report.pdf about?\n" +
                    "\n" +
                    "Result of the tool 'read_doc_contents':\n" +
                    "The report details the state of a 20m condenser tower.\n" +
                    "\n" +
                    "Use this result to answer the user. Do not call any tools again. " +
                    "Reply ONLY with natural text in English, without JSON.",
            },
        ]);
    });

    it("invokes the tool with canonical argument names", async () => {
        const { model } = scriptedModel(
            '{"tool":"edit_document","arguments":{"old_string":"foo","new_striing":"bar"}}',
            "Done."
        );
        const { tools, callTool } = fakeTools();
        const loop = new DispatchLoop({ model, tools, catalog: CATALOG });

        await loop.handleTurn("replace foo with bar");

        expect(callTool).toHaveBeenCalledTimes(1);
        expect(callTool.mock.calls[0]?.[1]).toStrictEqual({ old_str: "foo", new_str: "bar" });
    });

    it("reports a failing tool by name and skips synthesis", async () => {
        const { model, chat } = scriptedModel('{"tool": "unknown_tool", "arguments": {}}');
        const { tools } = fakeTools(async (name) => {
            throw new ToolExecutionError(name, `Unknown tool "${name}"`);
        });
        const loop = new DispatchLoop({ model, tools, catalog: CATALOG });

        await expect(loop.handleTurn("do something odd")).resolves.toEqual({
            kind: "tool_failed",
            tool: "unknown_tool",
            arguments: {},
            reason: 'Unknown tool "unknown_tool"',
        });
        expect(chat).toHaveBeenCalledTimes(1);
        expect(loop.phase).toBe("awaiting_input");
    });

    it("makes exactly one synthesis call per successful tool turn", async () => {
        const { model, chat } = scriptedModel(
            '{"tool": "read_doc_contents", "arguments": {"doc_id": "plan.md"}}',
            "first answer",
            '{"tool": "read_doc_contents", "arguments": {"doc_id": "spec.txt"}}',
            "second answer"
        );
        const { tools, callTool } = fakeTools();
        const loop = new DispatchLoop({ model, tools, catalog: CATALOG });

        const first = await loop.handleTurn("plan?");
        expect(chat).toHaveBeenCalledTimes(2);
        expect(callTool).toHaveBeenCalledTimes(1);

        const second = await loop.handleTurn("spec?");
        expect(chat).toHaveBeenCalledTimes(4);
        expect(callTool).toHaveBeenCalledTimes(2);

        expect(first).toMatchObject({ kind: "tool_answer", text: "first answer", toolOutput: "output of read_doc_contents" });
        expect(second).toMatchObject({ kind: "tool_answer", text: "second answer", arguments: { doc_id: "spec.txt" } });
    });

    it("turns a gateway failure while deciding into model_unavailable", async () => {
        const { model } = scriptedModel(new GatewayError("Completion request failed: 503"), '{"answer": "back"}');
        const loop = new DispatchLoop({ model, tools: fakeTools().tools, catalog: CATALOG });

        await expect(loop.handleTurn("hi")).resolves.toEqual({
            kind: "model_unavailable",
            phase: "deciding",
            reason: "Completion request failed: 503",
        });
        await expect(loop.handleTurn("hi again")).resolves.toEqual({ kind: "answer", text: "back" });
    });

    it("turns a gateway failure while synthesizing into model_unavailable", async () => {
        const { model } = scriptedModel(
            '{"tool": "read_doc_contents", "arguments": {"doc_id": "plan.md"}}',
            new GatewayError("Completion request failed: timeout")
        );
        const loop = new DispatchLoop({ model, tools: fakeTools().tools, catalog: CATALOG });

        await expect(loop.handleTurn("plan?")).resolves.toEqual({
            kind: "model_unavailable",
            phase: "synthesizing",
            reason: "Completion request failed: timeout",
        });
        expect(loop.phase).toBe("awaiting_input");
    });

    it("lets unexpected model errors propagate", async () => {
        const { model } = scriptedModel(new TypeError("bug"));
        const loop = new DispatchLoop({ model, tools: fakeTools().tools, catalog: CATALOG });

        await expect(loop.handleTurn("hi")).rejects.toThrow("bug");
        expect(loop.phase).toBe("awaiting_input");
    });

    it("rejects a turn that starts before the previous one finished", async () => {
        let release: (reply: AssistantReply) => void = () => undefined;
        const model: ChatModel = {
            chat: () => new Promise<AssistantReply>((resolve) => {
                release = resolve;
            }),
        };
        const loop = new DispatchLoop({ model, tools: fakeTools().tools, catalog: CATALOG });

        const first = loop.handleTurn("slow");
        expect(loop.phase).toBe("deciding");
        await expect(loop.handleTurn("impatient")).rejects.toThrow(
            "Cannot start a turn while the previous one is deciding"
        );

        release(assistant('{"answer": "finally"}'));
        await expect(first).resolves.toEqual({ kind: "answer", text: "finally" });
    });

    it("writes answers in the configured language", async () => {
        const { model, chat } = scriptedModel('{"answer": "Hola"}');
        const loop = new DispatchLoop({ model, tools: fakeTools().tools, catalog: CATALOG, language: "Spanish" });

        await loop.handleTurn("hola");

        expect(chat.mock.calls[0]?.[1]?.system).toContain("written in Spanish");
    });
});
