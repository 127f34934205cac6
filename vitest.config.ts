import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    globals: false,
    // Router layers touch window.history and window.location
    environment: "happy-dom",
    environmentOptions: {
      happyDOM: { url: "http://localhost:3000/" },
    },
    include: ["packages/*/src/**/*.test.ts"],
    exclude: ["**/node_modules/**", "**/dist/**"],
  },
});
