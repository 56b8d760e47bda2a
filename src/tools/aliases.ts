/**
 * tools/aliases.ts — Argument-name normalization
 *
 * Small local models rarely reproduce parameter names exactly ("old_string",
 * "new_striing", ...). Each entry maps a tool's canonical parameter to the
 * aliases accepted for it, highest priority first. Supporting a new tool is a
 * table entry, not a new branch.
 */

import type { ToolArguments } from "./types.js";

export type ArgumentAliasTable = Readonly<Record<string, Readonly<Record<string, readonly string[]>>>>;

export const DEFAULT_ARGUMENT_ALIASES = {
    edit_document: {
        old_str: ["old_string", "old"],
        new_str: ["new_string", "new_striing", "new"],
    },
} as const satisfies ArgumentAliasTable;

/**
 * Return a copy of `args` using canonical names only.
 *
 * A canonical parameter that is missing takes the value of the first alias
 * present. Alias keys left over afterwards are dropped. Parameters the model
 * did not supply under any name stay absent.
 */
export function normalizeArguments(
    toolName: string,
    args: ToolArguments,
    table: ArgumentAliasTable = DEFAULT_ARGUMENT_ALIASES
): ToolArguments {
    const normalized: ToolArguments = { ...args };
    const params = Object.hasOwn(table, toolName) ? table[toolName] : undefined;
    if (!params) return normalized;

    for (const [canonical, aliases] of Object.entries(params)) {
        if (!Object.hasOwn(normalized, canonical)) {
            const alias = aliases.find((a) => Object.hasOwn(normalized, a));
            if (alias !== undefined) {
                normalized[canonical] = normalized[alias];
            }
        }
        for (const alias of aliases) {
            if (!Object.hasOwn(params, alias)) delete normalized[alias];
        }
    }
    return normalized;
}
