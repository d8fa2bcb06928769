import { defineConfig } from 'tsup';

// Runtime dependencies stay external; path aliases are resolved from tsconfig.json and bundled
const externalDependencies = [
  'chalk',
  'commander',
  'js-yaml',
  'winston'
];

export default defineConfig([
  // API build
  {
    entry: {
      index: 'sdk/index.ts'
    },
    format: ['cjs', 'esm'],
    platform: 'node',
    target: 'node20',
    dts: false,
    clean: true,
    sourcemap: true,
    outDir: 'dist',
    outExtension({ format }) {
      return {
        js: format === 'cjs' ? '.cjs' : '.mjs'
      };
    },
    external: externalDependencies
  },
  // CLI build
  {
    entry: {
      pipeshell: 'bin/pipeshell.ts'
    },
    format: 'cjs',
    platform: 'node',
    target: 'node20',
    dts: false,
    clean: false,
    sourcemap: true,
    outDir: 'dist',
    outExtension() {
      return {
        js: '.cjs'
      };
    },
    external: externalDependencies
  }
]);
