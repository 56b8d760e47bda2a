/**
 * cli/render.ts — Console text for each turn outcome
 */

import type { TurnOutcome } from "../agent/dispatch.js";

export function renderOutcome(outcome: TurnOutcome): string {
    switch (outcome.kind) {
        case "answer":
        case "tool_answer":
            return outcome.text;
        case "malformed": {
            const text = `[Model replied without valid JSON. Raw reply:]\n${outcome.rawText}`;
            if (outcome.candidate === outcome.rawText.trim()) return text;
            return `${text}\n[Tried to parse as JSON:]\n${outcome.candidate}`;
        }
        case "unrecognized":
            return `[Model returned JSON without 'answer' or 'tool':]\n${JSON.stringify(outcome.value)}`;
        case "tool_failed":
            return `❌ Error calling tool ${outcome.tool}: ${outcome.reason}`;
        case "model_unavailable":
            return `⚠️ Model request failed while ${outcome.phase}: ${outcome.reason}`;
    }
}
