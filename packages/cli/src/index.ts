#!/usr/bin/env -S node --import tsx
/**
 * @portico/cli
 *
 * Command line entry point for portico.
 *
 * Commands:
 * - portico serve  -- Accept connections with the reference echo handler
 *
 * @module @portico/cli
 */

import { defineCommand, runMain } from "citty";
import { serveCommand } from "./commands/serve.ts";

const main = defineCommand({
    meta: {
        name: "portico",
        version: "0.1.0",
        description: "Connection-accepting server front end",
    },
    subCommands: {
        serve: serveCommand,
    },
});

await runMain(main);
