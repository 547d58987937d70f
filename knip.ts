import type { KnipConfig } from "knip";

export default {
  workspaces: {
    ".": {
      entry: ["eslint.config.ts", "knip.ts"],
    },
    "packages/*": {
      entry: ["src/index.ts"],
      vitest: true,
    },
  },
} satisfies KnipConfig;
