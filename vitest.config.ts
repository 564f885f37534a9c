import { defineConfig } from 'vitest/config';
import path, { dirname } from 'path';
import { fileURLToPath } from 'url';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

export default defineConfig({
  test: {
    globals: true,
    include: ['**/*.test.ts'],
    exclude: ['**/node_modules/**', '**/dist/**'],
    // Mocks the logger so no pino transports start during tests
    setupFiles: ['./server/src/ecs/systems/__tests__/setup.ts'],
  },
  resolve: {
    alias: {
      '#shared': path.resolve(__dirname, 'shared/index.ts'),
    },
  },
});
