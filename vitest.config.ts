import { defineConfig } from "vitest/config";
import react from "@vitejs/plugin-react-swc";

export default defineConfig({
  plugins: [react()],
  test: {
    // web tests opt into jsdom per file
    environment: "node",
    include: ["src/**/*.test.ts", "web/src/**/*.test.tsx"],
    setupFiles: ["./vitest.setup.ts"],
  },
});
