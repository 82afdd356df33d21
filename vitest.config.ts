import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

const resolvePath = (path: string) =>
  fileURLToPath(new URL(path, import.meta.url));

export default defineConfig({
  resolve: {
    alias: [
      { find: /^@lib\/(.*)$/, replacement: resolvePath("./packages/proxy/src/$1") },
      { find: /^@schema$/, replacement: resolvePath("./packages/proxy/schema/index.ts") },
      { find: /^@schema\/(.*)$/, replacement: resolvePath("./packages/proxy/schema/$1") },
    ],
  },
  test: {
    include: ["packages/*/{src,schema,utils}/**/*.test.ts", "apis/*/src/**/*.test.ts"],
    environment: "node",
    testTimeout: 15000,
  },
});
