import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["test/**/*.test.ts"],
    alias: [
      {
        find: /^(\.{1,2}\/.+)\.js$/,
        replacement: "$1.ts",
      },
    ],
  },
});
