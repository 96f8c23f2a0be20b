import { defineConfig } from "vitest/config";

export default defineConfig({
    test: {
        // Explicit imports from vitest in every test file
        globals: false,
        include: ["test/**/*.test.ts"],
        environment: "node",
        setupFiles: ["./test/setup.ts"]
    }
});
