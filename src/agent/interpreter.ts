/**
 * agent/interpreter.ts — Response Interpreter
 *
 * Turns one free-text model reply into a Directive. Models wrap their JSON
 * inconsistently, so extraction tries a ```json fence, then any fence holding
 * an object, then the whole reply. Non-compliant replies are ordinary results,
 * never exceptions.
 */

import { DEFAULT_ARGUMENT_ALIASES, normalizeArguments, type ArgumentAliasTable } from "../tools/aliases.js";
import type { ToolArguments } from "../tools/types.js";

export type Directive =
    | { kind: "tool_call"; name: string; arguments: ToolArguments; known: boolean }
    | { kind: "answer"; text: string }
    /** The candidate text was not JSON */
    | { kind: "malformed"; rawText: string; candidate: string }
    /** Valid JSON with neither a usable "tool" nor "answer" */
    | { kind: "unrecognized"; rawText: string; value: unknown };

const JSON_FENCE = /```json\s*(\{.*\})\s*```/s;
const ANY_FENCE = /```\s*(\{.*\})\s*```/s;

export function extractJsonCandidate(text: string): string {
    const stripped = text.trim();
    const match = JSON_FENCE.exec(stripped) ?? ANY_FENCE.exec(stripped);
    if (match?.[1] !== undefined) return match[1].trim();
    return stripped;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
    return typeof value === "object" && value !== null && !Array.isArray(value);
}

function parseJson(text: string): { ok: true; value: unknown } | { ok: false } {
    try {
        return { ok: true, value: JSON.parse(text) as unknown };
    } catch {
        return { ok: false };
    }
}

export function interpretReply(
    rawText: string,
    toolNames: ReadonlySet<string>,
    aliases: ArgumentAliasTable = DEFAULT_ARGUMENT_ALIASES
): Directive {
    const candidate = extractJsonCandidate(rawText);
    const parsed = parseJson(candidate);
    if (!parsed.ok) return { kind: "malformed", rawText, candidate };

    const value = parsed.value;
    const unrecognized: Directive = { kind: "unrecognized", rawText, value };
    if (!isPlainObject(value)) return unrecognized;

    if (Object.hasOwn(value, "tool")) {
        const name = value["tool"];
        const args = value["arguments"] ?? {};
        if (typeof name !== "string" || name.length === 0 || !isPlainObject(args)) {
            return unrecognized;
        }
        return {
            kind: "tool_call",
            name,
            arguments: normalizeArguments(name, args, aliases),
            known: toolNames.has(name),
        };
    }

    if (Object.hasOwn(value, "answer")) {
        const answer = value["answer"];
        return { kind: "answer", text: typeof answer === "string" ? answer : JSON.stringify(answer) };
    }

    return unrecognized;
}
