import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["packages/**/*.spec.ts"],
    exclude: ["**/node_modules/**", "**/dist/**", "**/coverage/**"],
    env: {
      FX_MODELS_API_KEY: "",
      FX_MODELS_BASE_URL: "",
      FX_MODELS_TIMEOUT_MS: "",
    },
  },
});
