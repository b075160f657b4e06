import { defineConfig } from 'vitest/config';

export default defineConfig({
  plugins: [
    {
      // Sources import siblings with .js endings (NodeNext); point Vite at the .ts files
      name: 'resolve-js-to-ts',
      resolveId(source, importer) {
        if (source.endsWith('.js') && importer && !source.includes('node_modules')) {
          const tsPath = source.replace(/\.js$/, '.ts');
          return this.resolve(tsPath, importer, { skipSelf: true });
        }
        return null;
      },
    },
  ],
  test: {
    include: ['src/**/*.test.ts'],
    globals: true,
    pool: 'forks',
    env: {
      CRM_BASE_URL: 'https://crm.test.local',
      CRM_ACCESS_TOKEN: 'test-token',
    },
  },
});
