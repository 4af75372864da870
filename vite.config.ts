import { defineConfig } from "vite";
import { fileURLToPath } from "node:url";

const distDir = fileURLToPath(new URL("./dist/demo", import.meta.url));
const projectDir = fileURLToPath(new URL(".", import.meta.url));

export default defineConfig({
  root: "demo",
  base: "./",
  build: {
    outDir: distDir,
    emptyOutDir: true,
  },
  server: {
    fs: {
      allow: [projectDir],
    },
  },
});
