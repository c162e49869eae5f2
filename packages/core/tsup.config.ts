import { defineConfig } from 'tsup';

export default defineConfig([
    {
        entry: ['src/**/*.ts', '!src/**/*.test.ts', '!src/**/test-utils.ts'],
        format: ['esm'],
        outDir: 'dist',
        dts: false,
        platform: 'node',
        bundle: false,
        clean: true,
        // The bundled catalog is read from disk beside the store module
        onSuccess: 'cp src/catalog/default-catalog.json dist/catalog/default-catalog.json',
    },
]);
