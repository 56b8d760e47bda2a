/**
 * errors.ts — Failure types that cross module boundaries
 */

/** The completion endpoint could not be reached or answered with a non-2xx status */
export class GatewayError extends Error {
    constructor(message: string, options?: ErrorOptions) {
        super(message, options);
        this.name = "GatewayError";
    }
}

/** A tool provider rejected or failed a call */
export class ToolExecutionError extends Error {
    constructor(
        readonly toolName: string,
        message: string,
        options?: ErrorOptions
    ) {
        super(message, options);
        this.name = "ToolExecutionError";
    }
}

export class ConfigError extends Error {
    constructor(readonly issues: string[]) {
        super(`Invalid environment configuration:\n${issues.map((i) => `  • ${i}`).join("\n")}`);
        this.name = "ConfigError";
    }
}

export function errorMessage(err: unknown): string {
    return err instanceof Error ? err.message : String(err);
}
