/**
 * vitest.config.ts
 *
 * Test runner configuration: server tests run in a plain Node environment.
 */

import {defineConfig} from "vitest/config";

export default defineConfig({
    test: {
        include: ["server/tests/**/*.test.ts"],
        environment: "node",
    },
});
