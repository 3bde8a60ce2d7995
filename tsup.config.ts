import { defineConfig } from 'tsup'

export default defineConfig({
    entry: {
        cli: 'packages/tui/src/cli.ts',
    },
    outDir: 'dist',
    format: ['esm'],
    target: 'node20',
    dts: false,
    clean: true,
    minify: false,
    sourcemap: false,
    splitting: false,
    bundle: true,
    noExternal: [/^@gridline\//],
    banner: {
        js: '#!/usr/bin/env node',
    },
})
