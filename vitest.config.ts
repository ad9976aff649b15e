import path from 'node:path';
import { defineConfig } from 'vitest/config';

import { defineConfig as defineBaseConfig } from './tools/vitest-config/src/index';

const baseConfig = defineBaseConfig();

const workspace = (relative: string): string =>
  path.resolve(__dirname, relative);

export default defineConfig({
  ...baseConfig,
  resolve: {
    alias: {
      '@pagecols/logger': workspace('tools/logger/src/index.ts'),
      '@pagecols/model': workspace('packages/model/src/index.ts'),
      '@pagecols/shared': workspace('packages/shared/src/index.ts'),
      '@pagecols/layout-engine': workspace(
        'packages/layout-engine/src/index.ts',
      ),
    },
  },
  test: {
    ...baseConfig.test,
    include: [
      'tools/*/src/**/*.test.ts',
      'packages/*/src/**/*.test.ts',
    ],
    coverage: {
      ...baseConfig.test?.coverage,
      provider: 'v8',
      include: ['tools/logger/src/**/*.ts', 'packages/*/src/**/*.ts'],
    },
  },
});
