/**
 * tools/types.ts — The tool-provider boundary as seen by the dispatch loop
 */

/** A tool advertised by a provider. Read-only for the session. */
export interface ToolDescriptor {
    name: string;
    description?: string;
}

/** Arguments after JSON parsing; values are whatever the model produced */
export type ToolArguments = Record<string, unknown>;

/** Raw result payload of a provider call. Reduced to text by the bridge. */
export type ToolResult = Readonly<Record<string, unknown>>;

export interface ToolProvider {
    listTools(): Promise<ToolDescriptor[]>;
    /** Rejects when the tool is unknown, the arguments are invalid or the tool itself fails */
    callTool(name: string, args: ToolArguments): Promise<ToolResult>;
}
