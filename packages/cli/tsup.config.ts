import { defineConfig, type Options } from 'tsup';

/**
 * Workspace packages export their TypeScript sources, so they are bundled into
 * the binary. Third-party dependencies stay external and load from node_modules.
 */
export const WORKSPACE_PACKAGES = /^@wexport\//;

export const cliBuildOptions: Options = {
  entry: { wexport: 'src/bin/wexport.ts' },
  format: ['esm'],
  platform: 'node',
  target: 'node20',
  dts: false,
  sourcemap: true,
  clean: true,
  outDir: 'dist',
  splitting: false,
  skipNodeModulesBundle: true,
  noExternal: [WORKSPACE_PACKAGES],
  outExtension() {
    return { js: '.js' };
  },
  tsconfig: '../../tsconfig.json',
};

export default defineConfig(cliBuildOptions);
