import { defineConfig } from 'tsup';
import type { Options } from 'tsup';

// Define common external dependencies to ensure consistency across builds
const externalDependencies = [
  'chalk',
  'commander',
  'js-yaml',
  'shell-quote',
  'winston'
];

type EsbuildOptions = Parameters<NonNullable<Options['esbuildOptions']>>[0];

const getEsbuildOptions = (options: EsbuildOptions): EsbuildOptions => {
  options.alias = {
    '@core': './core',
    '@interpreter': './interpreter',
    '@cli': './cli',
    '@api': './api'
  };
  options.platform = 'node';
  options.resolveExtensions = ['.ts', '.js', '.json'];
  options.target = 'node20';
  return options;
};

export default defineConfig([
  // API build
  {
    entry: {
      index: 'api/index.ts'
    },
    format: ['cjs'],
    dts: false,
    clean: true,
    sourcemap: true,
    splitting: false,
    outDir: 'dist',
    tsconfig: 'tsconfig.json',
    external: externalDependencies,
    esbuildOptions(options) {
      return getEsbuildOptions(options);
    }
  },
  // CLI build
  {
    entry: {
      cli: 'bin/pipewright.ts'
    },
    format: 'cjs',
    dts: false,
    clean: false,
    sourcemap: true,
    outDir: 'dist',
    tsconfig: 'tsconfig.json',
    external: externalDependencies,
    banner: {
      js: '#!/usr/bin/env node'
    },
    esbuildOptions(options) {
      return getEsbuildOptions(options);
    }
  }
]);
