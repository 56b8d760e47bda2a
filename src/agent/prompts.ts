/**
 * agent/prompts.ts — System and user prompts for the two model calls of a turn
 */

import { formatToolCatalog } from "../tools/catalog.js";
import type { ToolDescriptor } from "../tools/types.js";

export function buildDecisionPrompt(tools: readonly ToolDescriptor[], language: string): string {
    return `You are an assistant that can call external tools by replying with JSON.

You have access to these tools:

${formatToolCatalog(tools)}

MANDATORY response protocol:
- To use a tool, reply ONLY with a JSON object of this form:
  {"tool": "<tool_name>", "arguments": { ... }}

  Example:
  {"tool": "read_doc_contents", "arguments": {"doc_id": "report.pdf"}}

- If you already have the final answer for the user, reply ONLY with:
  {"answer": "<your answer for the user, written in ${language}>"}

- Do NOT write any text outside the JSON.
- Do NOT explain the JSON.
- Do NOT add comments.
- Do NOT wrap the JSON in code fences such as \`\`\`json; reply with bare JSON.
Valid JSON only.`;
}

export function buildSynthesisSystemPrompt(language: string): string {
    return (
        `You are an assistant that answers clearly and directly in ${language}. ` +
        "You cannot call tools in this reply: answer only from the tool result you are given, " +
        "in natural text without JSON."
    );
}

export function buildSynthesisUserPrompt(
    question: string,
    toolName: string,
    toolOutput: string,
    language: string
): string {
    return [
        "Original question from the user:",
        question,
        "",
        `Result of the tool '${toolName}':`,
        toolOutput,
        "",
        "Use this result to answer the user. Do not call any tools again. " +
        `Reply ONLY with natural text in ${language}, without JSON.`,
    ].join("\n");
}
