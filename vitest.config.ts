import path from "node:path";

// Keep this config dependency-free (no `vitest/config` import) so the type-check
// does not need Vitest's config types to open this file.
export default {
  resolve: {
    alias: [
      // "@/lib/..." style imports, same as tsconfig paths
      { find: /^@\//, replacement: `${path.resolve(__dirname, ".")}/` },
    ],
  },
  test: {
    environment: "node",
    include: ["tests/**/*.test.ts"],
  },
};
