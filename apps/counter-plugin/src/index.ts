/**
 * @fileoverview Counter Plugin - Main Entry Point
 *
 * Started by the controller application with
 * `-port <n> -pluginUUID <id> -registerEvent <name>`.
 *
 * @module counter-plugin
 */

// Load .env before anything reads DECK_* variables
import "dotenv/config";

import { dirname, join } from "path";
import { fileURLToPath } from "url";
import { runPlugin } from "@deckhost/runtime";
import { createCounterPlugin } from "./plugin.js";

const __dirname = dirname(fileURLToPath(import.meta.url));

async function main(): Promise<void> {
    await runPlugin(createCounterPlugin(), {
        configPath: join(__dirname, "..", "config", "runtime.yml"),
        pluginDirs: [join(__dirname, "..", "user", "plugins")],
    });
}

main().catch((error: unknown) => {
    console.error("[FATAL] Plugin stopped:", error);
    process.exit(1);
});
