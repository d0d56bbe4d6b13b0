import { defineConfig } from "vitest/config";
import react from "@vitejs/plugin-react";

const repository = process.env.GITHUB_REPOSITORY?.split("/")[1];
const base = repository ? `/${repository}/` : "/";

export default defineConfig({
  plugins: [react()],
  base,
  test: {
    include: ["src/**/*.test.{ts,tsx}"],
    setupFiles: ["src/test/setup.ts"],
  },
});
