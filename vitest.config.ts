import { defineConfig } from "vitest/config";

export default defineConfig({
    test: {
        environment: "node",
        include: ["packages/*/test/**/*.test.ts", "apps/*/test/**/*.test.ts"],
        exclude: ["node_modules", "dist"],
        env: {
            LOG_LEVEL: "silent",
            RATE_LIMIT_MAX: "10000",
        },
    },
});
