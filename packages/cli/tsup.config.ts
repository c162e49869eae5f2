import { defineConfig } from 'tsup';

export default defineConfig([
    {
        entry: ['src/index.ts'],
        format: ['esm'],
        outDir: 'dist',
        platform: 'node',
        clean: true,
        banner: { js: '#!/usr/bin/env node' },
        external: ['@modelvault/core'],
    },
]);
