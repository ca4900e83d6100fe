import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    testTimeout: 20000,
    hookTimeout: 20000,
    include: ['src/**/*.test.ts', 'tests/**/*.test.ts'],
    setupFiles: ['tests/setup.ts'],
    env: {
      // Keep host path overrides from a developer shell out of the test run.
      PROVISION_BASE_DIR: '',
      PROVISION_SYSTEMD_DIR: '',
      PROVISION_NGINX_DIR: ''
    }
  },
})
