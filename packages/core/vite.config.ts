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
      name: "Meterloom",
      formats: ["es", "umd"],
      fileName: (format) => (format === "es" ? "index.js" : "meterloom.umd.js")
    },
    outDir: "dist",
    emptyOutDir: true,
    rollupOptions: {
      output: {
        exports: "named"
      }
    },
    sourcemap: true
  }
});
