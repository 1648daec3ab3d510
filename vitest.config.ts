import { defineConfig } from "vitest/config";
import { fileURLToPath } from "node:url";

const fromRoot = (p: string) => fileURLToPath(new URL(p, import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      "#types": fromRoot("./src/types/index.ts"),
      "#config": fromRoot("./src/config/index.ts"),
      "#models": fromRoot("./src/models"),
      "#helpers": fromRoot("./src/helpers"),
      "#catalog": fromRoot("./src/catalog"),
    },
  },
  test: {
    include: ["test/**/*.test.ts"],
  },
});
