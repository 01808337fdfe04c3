import { defineConfig } from "vitest/config";

export default defineConfig({
    test: {
        include: ["src/**/__tests__/**/*.test.ts"],
        environment: "node",
        globals: false,
        testTimeout: 10000,
        coverage: {
            provider: "v8",
            reporter: ["text", "html"],
            include: ["src/**/*.ts"],
            exclude: ["src/**/__tests__/**", "src/cli.ts", "src/index.ts"],
        },
    },
});
