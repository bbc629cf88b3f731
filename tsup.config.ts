import { defineConfig } from 'tsup';

export default defineConfig({
    entry: {
        index: 'src/index.ts',
        cli: 'src/cli.ts',
    },
    format: ['esm'],
    target: 'node20',
    dts: {
        entry: 'src/index.ts',
    },
    splitting: false,
    clean: true,
});
