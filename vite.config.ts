import { defineConfig } from "vite";

export default defineConfig({
  root: "dev",
  server: {
    open: true,
  },
  build: {
    outDir: "../dist-demo",
    emptyOutDir: true,
  },
});
