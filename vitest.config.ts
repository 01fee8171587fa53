import { fileURLToPath } from "url";
import { defineConfig } from "vitest/config";

export default defineConfig({
    resolve: {
        alias: {
            "@deckhost/runtime": fileURLToPath(new URL("./packages/runtime/src/index.ts", import.meta.url)),
        },
    },
    test: {
        include    : ["packages/*/src/**/*.test.ts", "apps/*/src/**/*.test.ts"],
        environment: "node",
    },
});
