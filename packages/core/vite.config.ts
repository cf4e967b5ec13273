import { defineConfig } from "vite";
import { fileURLToPath } from "node:url";
import dts from "vite-plugin-dts";

export default defineConfig({
  plugins: [
    dts({
      include: ["src/**/*"],
      exclude: ["src/test/**/*"],
      rollupTypes: true
    })
  ],
  build: {
    lib: {
      entry: fileURLToPath(new URL("./src/index.ts", import.meta.url)),
      name: "SatbComposer",
      formats: ["es"],
      fileName: () => "index.js"
    },
    outDir: "dist",
    emptyOutDir: true,
    rollupOptions: {
      external: ["zod"],
      output: {
        exports: "named"
      }
    },
    sourcemap: true
  }
});
