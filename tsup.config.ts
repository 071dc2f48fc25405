import { defineConfig } from 'tsup';

export default defineConfig({
    entry: ['src/index.ts'],
    format: ['cjs', 'esm'],
    dts: true,
    clean: true,
    sourcemap: true,
    minify: false,
    platform: 'node',
    target: 'node20',
    // Native and pooled-I/O dependencies stay external; consumers install them.
    external: [
        'better-sqlite3',
        'pino',
        'pino-pretty',
        'undici',
        'zod'
    ],
});
