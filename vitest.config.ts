import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

const srcDir = (name: string) => fileURLToPath(new URL(`./src/${name}`, import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      '#core': srcDir('core'),
      '#features': srcDir('features'),
      '#lib': srcDir('lib'),
      '#testing': srcDir('testing')
    }
  },
  test: {
    projects: [
      {
        extends: true,
        test: {
          include: ['src/**/*.{test,spec}.{ts,tsx}'],
          exclude: ['src/**/*.property.spec.ts'],
          name: 'unit',
          environment: 'node',
          setupFiles: ['./src/testing/setup.ts']
        }
      },
      {
        extends: true,
        test: {
          include: ['src/**/*.property.spec.ts'],
          name: 'property',
          environment: 'node',
          testTimeout: 120000,
          hookTimeout: 30000,
          setupFiles: ['./src/testing/setup.ts']
        }
      }
    ]
  }
});
