import { defineConfig } from 'tsup';

export default defineConfig({
  // Entry points - what to build
  entry: {
    cli: 'src/cli/index.ts', // CLI entry -> dist/cli.js
    index: 'src/index.ts', // Library entry -> dist/index.js
  },

  // Output format - ESM for modern Node.js
  format: ['esm'],

  // Generate TypeScript declaration files
  dts: true,

  sourcemap: true,

  // Clean dist/ before each build
  clean: true,

  target: 'node20',

  // Read by the CLI's --version; keep in step with package.json
  env: {
    CLI_VERSION: '0.1.0',
  },

  // Makes ./dist/cli.js directly executable
  banner: {
    js: '#!/usr/bin/env node',
  },

  // Dependencies are installed via npm, not bundled
  external: [
    'better-sqlite3',
    'pdfjs-dist',
    'openai',
    'commander',
    'chalk',
    'ora',
    'zod',
  ],
});
