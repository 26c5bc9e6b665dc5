import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['tests/**/test_*.ts', 'tests/**/*_test.ts'],
    environment: 'node',
  },
});
