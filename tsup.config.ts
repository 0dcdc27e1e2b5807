import { defineConfig } from 'tsup';

export default defineConfig({
    entry: {
        index: 'src/index.ts',
    },
    format: ['esm', 'cjs'],
    dts: true,
    sourcemap: false,
    clean: true,
    minify: true,
    treeshake: true,
    outDir: 'dist',
    target: 'node20',
    skipNodeModulesBundle: true
});
