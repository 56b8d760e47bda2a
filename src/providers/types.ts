/**
 * providers/types.ts — Conversation shapes shared by the gateway and its callers
 *
 * Content arrives in whatever shape the caller has at hand: a plain string,
 * a single block (e.g. {type: "text", text: "..."}) or a list of blocks. The
 * gateway reduces all of them to plain text before anything leaves the process.
 */

export type Role = "system" | "user" | "assistant";

export type ContentBlock = string | Readonly<Record<string, unknown>>;

export type MessageContent = ContentBlock | readonly ContentBlock[] | null | undefined;

export interface ConversationTurn {
    role: Role;
    content: MessageContent;
}

/** "tool_use" when the provider reported a native function call, "end" otherwise */
export type StopReason = "tool_use" | "end";

export interface AssistantReply {
    role: "assistant";
    /** Plain text with reasoning markup removed */
    content: string;
    stopReason: StopReason;
}

export interface ChatOptions {
    system?: string;
    temperature?: number;
    stopSequences?: string[];
}

/** What the dispatch loop needs from a model */
export interface ChatModel {
    chat(turns: readonly ConversationTurn[], options?: ChatOptions): Promise<AssistantReply>;
}

// ── Wire shapes for OpenAI-compatible completion servers ─────────────────────

export interface CompletionMessage {
    role: Role;
    content: string;
}

export interface CompletionRequest {
    model: string;
    messages: CompletionMessage[];
    temperature: number;
    stop?: string[];
}

export interface CompletionResponse {
    choices: Array<{
        message: { content: string | null };
        finish_reason: string | null;
    }>;
}

/** One network round trip; transport failures reject */
export interface CompletionBackend {
    complete(request: CompletionRequest): Promise<CompletionResponse>;
}
