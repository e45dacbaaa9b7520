// No `vitest/config` import, so the type-check does not need Vitest's config
// types; Vitest reads this file at runtime.
export default {
  test: {
    environment: "node",
    include: ["tests/**/*.test.ts"],
  },
};
