import { defineConfig } from "vitest/config";

export default defineConfig({
    test: {
        globals: true,
        environment: "node",
        include: ["tests/**/*.test.ts"],
        testTimeout: 20000,
        // Per-call info/debug logs stay out of test output; warnings still show.
        env: {
            CASH_LOGISTICS_LOG_LEVEL: "warn",
        },
        coverage: {
            // Run with: npm run test:coverage
            provider: "v8",
            reporter: ["text", "html"],
            include: ["src/**/*.ts"],
            // Worker-thread code runs outside the instrumented process.
            exclude: ["src/index.ts", "src/services/statement-worker.ts", "src/services/statement-runner.ts"],
            thresholds: {
                "src/services/**": {
                    statements: 80,
                    branches: 70,
                    functions: 80,
                    lines: 80,
                },
            },
        },
    },
});
