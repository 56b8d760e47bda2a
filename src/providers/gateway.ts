/**
 * providers/gateway.ts — Model Gateway
 *
 * Normalizes a conversation into a completion request and the reply into an
 * AssistantReply. Reasoning models served locally tend to prefix their answer
 * with a [THINK]...[/THINK] (or <think>...</think>) block; that markup never
 * reaches the caller.
 */

import { GatewayError, errorMessage } from "../errors.js";
import { logger } from "../logger.js";
import type {
    AssistantReply,
    ChatModel,
    ChatOptions,
    CompletionBackend,
    CompletionMessage,
    CompletionRequest,
    CompletionResponse,
    ContentBlock,
    ConversationTurn,
    MessageContent,
    StopReason,
} from "./types.js";

export const REASONING_MARKERS: ReadonlyArray<readonly [string, string]> = [
    ["[THINK]", "[/THINK]"],
    ["<think>", "</think>"],
];

const TOOL_FINISH_REASONS = new Set(["tool_calls", "function_call"]);

function escapeRegExp(text: string): string {
    return text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

const REASONING_PATTERNS = REASONING_MARKERS.map(
    ([start, end]) => new RegExp(`${escapeRegExp(start)}[\\s\\S]*?${escapeRegExp(end)}`, "g")
);

/** Remove every reasoning block, then trim */
export function stripReasoning(text: string): string {
    let cleaned = text;
    for (const pattern of REASONING_PATTERNS) {
        cleaned = cleaned.replace(pattern, "");
    }
    return cleaned.trim();
}

function blockToText(block: ContentBlock): string {
    if (typeof block === "string") return block;
    if ("text" in block) {
        const text = block["text"];
        if (text === undefined || text === null) return "";
        return typeof text === "string" ? text : JSON.stringify(text);
    }
    return JSON.stringify(block);
}

function isBlockList(content: unknown): content is readonly ContentBlock[] {
    return Array.isArray(content);
}

/**
 * Reduce any supported content shape to plain text. Blocks without a `text`
 * field are kept as their JSON form rather than dropped.
 */
export function contentToText(content: MessageContent): string {
    if (content === null || content === undefined) return "";
    if (isBlockList(content)) {
        if (content.length === 0) return JSON.stringify(content);
        return content.map(blockToText).join("\n");
    }
    return blockToText(content);
}

export function toStopReason(finishReason: string | null | undefined): StopReason {
    return finishReason && TOOL_FINISH_REASONS.has(finishReason) ? "tool_use" : "end";
}

function coerceMessage(message: AssistantReply | MessageContent): string {
    if (isAssistantReply(message)) return message.content;
    return contentToText(message);
}

function isAssistantReply(value: AssistantReply | MessageContent): value is AssistantReply {
    if (typeof value !== "object" || value === null || isBlockList(value)) return false;
    return value["role"] === "assistant" && typeof value["content"] === "string" && "stopReason" in value;
}

export function addUserMessage(turns: ConversationTurn[], message: AssistantReply | MessageContent): void {
    turns.push({ role: "user", content: coerceMessage(message) });
}

export function addAssistantMessage(turns: ConversationTurn[], message: AssistantReply | MessageContent): void {
    turns.push({ role: "assistant", content: coerceMessage(message) });
}

export class ModelGateway implements ChatModel {
    constructor(
        private readonly backend: CompletionBackend,
        readonly model: string
    ) { }

    async chat(turns: readonly ConversationTurn[], options: ChatOptions = {}): Promise<AssistantReply> {
        const messages: CompletionMessage[] = [];
        if (options.system) {
            messages.push({ role: "system", content: options.system });
        }
        for (const turn of turns) {
            messages.push({ role: turn.role, content: contentToText(turn.content) });
        }

        const stop = options.stopSequences ?? [];
        const response = await this.send({
            model: this.model,
            messages,
            temperature: options.temperature ?? 1,
            ...(stop.length > 0 ? { stop } : {}),
        });

        const choice = response.choices[0];
        if (!choice) throw new GatewayError(`Model "${this.model}" returned no choices`);

        return {
            role: "assistant",
            content: stripReasoning(choice.message.content ?? ""),
            stopReason: toStopReason(choice.finish_reason),
        };
    }

    private async send(request: CompletionRequest): Promise<CompletionResponse> {
        try {
            return await this.backend.complete(request);
        } catch (err) {
            logger.warn("[llm] Completion request failed", { model: this.model, error: errorMessage(err) });
            throw new GatewayError(`Completion request failed: ${errorMessage(err)}`, { cause: err });
        }
    }
}
