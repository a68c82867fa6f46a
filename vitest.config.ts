import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

const pkg = (name: string) => fileURLToPath(new URL(`./packages/@vireo/${name}/src/index.ts`, import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      "@vireo/core": pkg("core"),
      "@vireo/compiler": pkg("compiler"),
    },
  },
  test: {
    environment: "node",
    include: ["packages/@vireo/*/tests/**/*.spec.ts"],
  },
});
