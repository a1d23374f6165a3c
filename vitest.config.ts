import path from "node:path";
import { fileURLToPath } from "node:url";

import { defineConfig } from "vitest/config";

const dirname = path.dirname(fileURLToPath(import.meta.url));

const resolveFromRoot = (...segments: string[]) => path.resolve(dirname, ...segments);

export default defineConfig({
  resolve: {
    alias: {
      "@pyc-atlas/core": resolveFromRoot("packages/core/src/index.ts"),
      "@pyc-atlas/versions": resolveFromRoot("packages/versions/src/index.ts"),
      "@pyc-atlas/opcodes": resolveFromRoot("packages/opcodes/src/index.ts"),
      "@pyc-atlas/registry": resolveFromRoot("packages/registry/src/index.ts"),
    },
  },
  test: {
    include: ["packages/*/tests/**/*.test.ts"],
  },
});
