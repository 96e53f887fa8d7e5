import path from "path"
import { fileURLToPath } from "url"
import { defineConfig } from "vite"
import dts from "vite-plugin-dts"

const packageDir = path.dirname(fileURLToPath(import.meta.url))
const resolvePath = (str: string) => path.resolve(packageDir, str)

export default defineConfig({
  build: {
    target: "node20",
    lib: {
      entry: resolvePath("./src/index.ts"),
      name: "json-doc-engine",
    },
    sourcemap: "inline",
    minify: false,

    rollupOptions: {
      external: ["fast-deep-equal/es6", "immer", "jsonc-parser", "nanoid", "pino", "zod"],

      output: [
        {
          format: "esm",
          entryFileNames: "json-doc-engine.esm.mjs",
        },
      ],
    },
  },
  plugins: [
    dts({
      tsconfigPath: resolvePath("../../tsconfig.json"),
      outDir: resolvePath("./dist/types"),
    }),
  ],
})
