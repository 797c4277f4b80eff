import { defineConfig } from "vitest/config";

export default defineConfig({
    test: {
        environment: "node",
        include: ["index.test.ts", "packages/*/src/**/*.test.ts", "packages/*/tests/**/*.test.ts"],
        server: {
            deps: {
                // clipanion's ESM build uses directory imports that Node's resolver rejects
                inline: ["clipanion"],
            },
        },
    },
});
