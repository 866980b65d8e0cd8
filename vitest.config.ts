import { defineConfig } from "vitest/config";

export default defineConfig({
    test: {
        include: ["src/**/*.spec.ts"],
        env: {
            LOOMGRAPH_LOG_LEVEL: "silent",
        },
    },
});
