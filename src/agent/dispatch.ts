/**
 * agent/dispatch.ts — The dispatch loop
 *
 * One user turn runs through at most three steps:
 *   1. Deciding     — the model answers or names exactly one tool (temperature 0)
 *   2. Executing    — the tool runs through the provider
 *   3. Synthesizing — a second model call turns the tool output into prose
 *
 * There is no loop-back: a turn makes at most one tool call and at most two
 * model calls. Every outcome, including model non-compliance and failures,
 * is returned as a TurnOutcome so the caller can keep accepting input.
 */

import { GatewayError, errorMessage } from "../errors.js";
import { logger } from "../logger.js";
import type { ChatModel } from "../providers/types.js";
import { DEFAULT_ARGUMENT_ALIASES, type ArgumentAliasTable } from "../tools/aliases.js";
import { executeTool } from "../tools/bridge.js";
import type { ToolArguments, ToolDescriptor, ToolProvider } from "../tools/types.js";
import { interpretReply } from "./interpreter.js";
import { buildDecisionPrompt, buildSynthesisSystemPrompt, buildSynthesisUserPrompt } from "./prompts.js";

export type TurnPhase = "awaiting_input" | "deciding" | "answering" | "executing" | "synthesizing";

export type TurnOutcome =
    | { kind: "answer"; text: string }
    | { kind: "malformed"; rawText: string; candidate: string }
    | { kind: "unrecognized"; rawText: string; value: unknown }
    | { kind: "tool_failed"; tool: string; arguments: ToolArguments; reason: string }
    | { kind: "tool_answer"; tool: string; arguments: ToolArguments; toolOutput: string; text: string }
    | { kind: "model_unavailable"; phase: "deciding" | "synthesizing"; reason: string };

export interface DispatchObserver {
    onToolCall?(tool: string, args: ToolArguments): void;
    onToolResult?(tool: string, output: string): void;
}

export interface DispatchOptions {
    model: ChatModel;
    tools: ToolProvider;
    /** Catalog advertised to the model; fixed for the session */
    catalog: readonly ToolDescriptor[];
    aliases?: ArgumentAliasTable;
    language?: string;
    observer?: DispatchObserver;
}

export class DispatchLoop {
    private _phase: TurnPhase = "awaiting_input";
    private readonly decisionPrompt: string;
    private readonly toolNames: ReadonlySet<string>;
    private readonly aliases: ArgumentAliasTable;
    private readonly language: string;

    constructor(private readonly opts: DispatchOptions) {
        this.language = opts.language ?? "English";
        this.aliases = opts.aliases ?? DEFAULT_ARGUMENT_ALIASES;
        this.toolNames = new Set(opts.catalog.map((t) => t.name));
        this.decisionPrompt = buildDecisionPrompt(opts.catalog, this.language);
    }

    get phase(): TurnPhase {
        return this._phase;
    }

    /** Process one user turn to completion. Turns never overlap. */
    async handleTurn(userText: string): Promise<TurnOutcome> {
        if (this._phase !== "awaiting_input") {
            throw new Error(`Cannot start a turn while the previous one is ${this._phase}`);
        }
        try {
            return await this.runTurn(userText);
        } finally {
            this.enter("awaiting_input");
        }
    }

    private async runTurn(userText: string): Promise<TurnOutcome> {
        this.enter("deciding");
        let rawText: string;
        try {
            const reply = await this.opts.model.chat([{ role: "user", content: userText }], {
                system: this.decisionPrompt,
                temperature: 0,
            });
            rawText = reply.content;
        } catch (err) {
            return this.modelUnavailable("deciding", err);
        }

        const directive = interpretReply(rawText, this.toolNames, this.aliases);
        switch (directive.kind) {
            case "malformed":
                logger.info("Model reply was not valid JSON");
                return directive;
            case "unrecognized":
                logger.info("Model reply had neither 'tool' nor 'answer'");
                return directive;
            case "answer":
                this.enter("answering");
                return { kind: "answer", text: directive.text };
            case "tool_call":
                if (!directive.known) {
                    logger.warn(`Model asked for a tool that is not in the catalog: ${directive.name}`);
                }
                return this.runTool(userText, directive.name, directive.arguments);
        }
    }

    private async runTool(question: string, tool: string, args: ToolArguments): Promise<TurnOutcome> {
        this.enter("executing");
        this.opts.observer?.onToolCall?.(tool, args);
        logger.info(`Executing tool ${tool}`, { args });

        let toolOutput: string;
        try {
            toolOutput = await executeTool(this.opts.tools, tool, args);
        } catch (err) {
            const reason = errorMessage(err);
            logger.warn(`Tool ${tool} failed`, { reason });
            return { kind: "tool_failed", tool, arguments: args, reason };
        }
        this.opts.observer?.onToolResult?.(tool, toolOutput);
        logger.debug("Tool result", { tool, chars: toolOutput.length });

        this.enter("synthesizing");
        try {
            const reply = await this.opts.model.chat(
                [{ role: "user", content: buildSynthesisUserPrompt(question, tool, toolOutput, this.language) }],
                { system: buildSynthesisSystemPrompt(this.language), temperature: 0 }
            );
            return { kind: "tool_answer", tool, arguments: args, toolOutput, text: reply.content };
        } catch (err) {
            return this.modelUnavailable("synthesizing", err);
        }
    }

    /** Only gateway failures are recoverable; anything else is a bug and propagates */
    private modelUnavailable(phase: "deciding" | "synthesizing", err: unknown): TurnOutcome {
        if (!(err instanceof GatewayError)) throw err;
        logger.error(`Model unavailable while ${phase}`, { error: err.message });
        return { kind: "model_unavailable", phase, reason: err.message };
    }

    private enter(phase: TurnPhase): void {
        if (this._phase !== phase) logger.debug(`[dispatch] ${this._phase} → ${phase}`);
        this._phase = phase;
    }
}
