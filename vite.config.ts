/// <reference types="vitest/config" />

import path from "path";

import { defineConfig } from "vite";
import dtsPlugin from "vite-plugin-dts";

import type { ModuleFormat, OutputOptions } from "rollup";
import terser from "@rollup/plugin-terser";

const formats: ModuleFormat[] = ["es", "iife"];
const output: OutputOptions[] = formats.map((format) => ({
    format,

    entryFileNames: `index${format === "iife" ? "" : ".[format]"}.min.js`,

    name: "MF",
    exports: "named",
    globals: { pino: "pino" },

    plugins: [terser()]
}));

export default defineConfig({
    test: {
        include: ["tests/unit/**/*.ts"],
        env: { FRACTION_LOG_LEVEL: "silent" }
    },
    build: {
        outDir: path.join(__dirname, "dist"),

        emptyOutDir: true,

        sourcemap: true,
        rollupOptions: { output, external: ["pino"] },

        lib: { entry: path.join(__dirname, "src/index.ts") }
    },

    plugins: [dtsPlugin({
        root: __dirname,
        tsconfigPath: "tsconfig.lib.json",

        rollupTypes: true
    })]
});
