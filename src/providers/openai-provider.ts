/**
 * providers/openai-provider.ts — OpenAI-compatible completion backend
 *
 * LM Studio, Ollama, vLLM and the hosted OpenAI API all speak the same
 * chat-completions format; only the baseURL differs. Tool calling is left to
 * the JSON directive protocol, so no `tools` are ever sent.
 */

import OpenAI from "openai";
import type { ChatCompletionMessageParam } from "openai/resources/chat/completions";
import type { CompletionBackend, CompletionMessage, CompletionResponse } from "./types.js";
import { logger } from "../logger.js";

export interface OpenAIBackendOptions {
    apiKey: string;
    baseURL: string;
    timeoutMs: number;
}

function toOpenAIMessage(message: CompletionMessage): ChatCompletionMessageParam {
    switch (message.role) {
        case "system":
            return { role: "system", content: message.content };
        case "user":
            return { role: "user", content: message.content };
        case "assistant":
            return { role: "assistant", content: message.content };
    }
}

/** Wrap an already-built client. Tests hand in a stub here. */
export function createCompletionBackend(client: OpenAI): CompletionBackend {
    return {
        async complete(request): Promise<CompletionResponse> {
            logger.debug("[llm] complete()", {
                model: request.model,
                msgs: request.messages.length,
                temperature: request.temperature,
            });

            const response = await client.chat.completions.create({
                model: request.model,
                messages: request.messages.map(toOpenAIMessage),
                temperature: request.temperature,
                ...(request.stop ? { stop: request.stop } : {}),
            });

            return response;
        },
    };
}

/** Factory — called with live config values so keys are read after .env loads */
export function createOpenAIBackend(options: OpenAIBackendOptions): CompletionBackend {
    const client = new OpenAI({
        apiKey: options.apiKey,
        baseURL: options.baseURL,
        timeout: options.timeoutMs,
        maxRetries: 0,
    });
    return createCompletionBackend(client);
}
