/**
 * cli/console.ts — Interactive line console
 *
 * Reads one line at a time and finishes each turn before reading the next.
 * An exit phrase, end of input, Ctrl+C or the abort signal ends the session.
 */

import { createInterface } from "node:readline";
import type { DispatchLoop, DispatchObserver } from "../agent/dispatch.js";
import { errorMessage } from "../errors.js";
import { logger } from "../logger.js";
import { runCommand, type CommandContext } from "./commands.js";
import { renderOutcome } from "./render.js";

export interface ConsoleOptions {
    loop: Pick<DispatchLoop, "handleTurn">;
    commands: CommandContext;
    exitPhrases: readonly string[];
    input?: NodeJS.ReadableStream;
    output?: NodeJS.WritableStream;
    signal?: AbortSignal;
}

/** Prints tool activity between the decision and the final answer */
export function consoleObserver(output: NodeJS.WritableStream): DispatchObserver {
    return {
        onToolCall(tool, args) {
            output.write(`\n⚙️ Model requested tool ${tool} with args=${JSON.stringify(args)}\n`);
        },
        onToolResult(tool, text) {
            output.write(`\n📄 Result of tool ${tool}:\n${text}\n\n`);
        },
    };
}

export async function runConsole(opts: ConsoleOptions): Promise<void> {
    const output = opts.output ?? process.stdout;
    const rl = createInterface({
        input: opts.input ?? process.stdin,
        output,
        ...(opts.signal ? { signal: opts.signal } : {}),
    });
    rl.on("SIGINT", () => rl.close());

    const write = (text: string) => output.write(`${text}\n`);
    write(`\nAsk a question. Type /help for commands, '${opts.exitPhrases[0] ?? "exit"}' to quit.\n`);

    rl.setPrompt("> ");
    rl.prompt();
    try {
        for await (const rawLine of rl) {
            const line = rawLine.trim();
            if (line.length === 0) {
                rl.prompt();
                continue;
            }
            if (opts.exitPhrases.includes(line.toLowerCase())) {
                write("👋 Bye.");
                break;
            }

            try {
                const commandOutput = await runCommand(line, opts.commands);
                const text = commandOutput ?? renderOutcome(await opts.loop.handleTurn(line));
                write(`\n${text}\n`);
            } catch (err) {
                logger.error("Turn failed", { error: errorMessage(err) });
                write(`\n❌ ${errorMessage(err)}\n`);
            }
            rl.prompt();
        }
    } finally {
        // Leaving the loop early does not detach readline from its input
        rl.close();
    }
}
