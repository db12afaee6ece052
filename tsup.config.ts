import { defineConfig } from 'tsup';

export default defineConfig({
    entry: {
        index: 'src/index.ts',
    },
    format: ['esm', 'cjs'],
    dts: true,
    sourcemap: false,
    clean: true,
    minify: false,
    treeshake: true,
    outDir: 'dist',
    platform: 'node',
    target: 'node20',
    skipNodeModulesBundle: true
});
