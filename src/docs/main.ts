/**
 * docs/main.ts — Document server entry point (stdio transport)
 *
 * Spawned by the hub as a child process; stdout carries the protocol, logs go
 * to stderr.
 */

import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { errorMessage } from "../errors.js";
import { logger } from "../logger.js";
import { createDocumentServer } from "./server.js";
import { InMemoryDocumentStore } from "./store.js";

async function main() {
    const store = new InMemoryDocumentStore();
    const server = createDocumentServer(store);
    const transport = new StdioServerTransport();

    const shutdown = () => {
        server.close().then(
            () => process.exit(0),
            (err: unknown) => {
                logger.error("[docs] Error during shutdown", { error: errorMessage(err) });
                process.exit(1);
            }
        );
    };
    process.once("SIGINT", shutdown);
    process.once("SIGTERM", shutdown);

    await server.connect(transport);
    logger.debug("[docs] Document server listening on stdio", { documents: store.list().length });
}

main().catch((err) => {
    logger.error("[docs] Fatal error during startup", { error: errorMessage(err) });
    process.exit(1);
});
