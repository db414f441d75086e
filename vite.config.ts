import { defineConfig } from "vite";
import { resolve } from "node:path";
import { fileURLToPath } from "node:url";

const projectRoot = fileURLToPath(new URL(".", import.meta.url));
const packagesRoot = resolve(projectRoot, "packages");

export default defineConfig({
  resolve: {
    alias: {
      "@tyclass/lib": resolve(packagesRoot, "lib/src/lib"),
    },
  },
});
