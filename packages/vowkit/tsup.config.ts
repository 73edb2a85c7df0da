import { defineConfig } from 'tsup';

export default defineConfig({
  entry: {
    // Main entry point (namespace, default runtime, createVowRuntime)
    index: 'src/index.ts',

    // =========================================================================
    // Granular entry points
    // =========================================================================
    core: 'src/core-entry.ts',
    scheduler: 'src/scheduler-entry.ts',

    // =========================================================================
    // Integrations
    // =========================================================================
    otel: 'src/otel-entry.ts',

    // =========================================================================
    // Tools
    // =========================================================================
    testing: 'src/testing-entry.ts',
  },
  format: ['cjs', 'esm'],
  dts: true,
  clean: true,
  splitting: false,
  sourcemap: true,
  external: ['@opentelemetry/api'],
});
