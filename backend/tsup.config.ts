import { defineConfig } from 'tsup';

export default defineConfig({
  entry: ['backend/src/handlers/**/*.ts'],
  outDir: 'dist/lambda',
  format: ['esm'],
  target: 'node20',
  splitting: false,
  sourcemap: true,
  clean: true,
  bundle: true,
  minify: true,
  // Provided by the Lambda Node.js 20 runtime
  external: ['@aws-sdk/*'],
  esbuildOptions(options) {
    options.mainFields = ['module', 'main'];
  },
});
