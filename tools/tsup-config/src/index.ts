import type { Options } from 'tsup';

/**
 * Build settings shared by the publishable packages.
 */
export const defineConfig = (options: Options = {}): Options => {
  return {
    entry: ['src/index.ts'],
    format: ['cjs', 'esm'],
    dts: true,
    clean: true,
    sourcemap: true,
    target: 'node20',
    ...options,
  };
};
