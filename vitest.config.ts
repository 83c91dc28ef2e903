import {defineConfig} from 'vitest/config';

export default defineConfig({
  test: {
    onConsoleLog(log) {
      if (log.includes('is not below the largest value')) {
        return false;
      }
    },
    include: ['src/**/*.{test,spec}.?(c|m)[jt]s?(x)'],
    environment: 'node',
    typecheck: {
      enabled: false,
    },
  },
});
