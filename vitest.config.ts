import { fileURLToPath } from 'node:url'
import { defineConfig } from 'vitest/config'

/**
 * Maps the `#` subpath imports of package.json onto the TypeScript
 * sources, so the specs run without a build
 */
function subpath(prefix: string, directory: string) {
  return {
    find: new RegExp(`^#${prefix}/(.*)$`),
    replacement: fileURLToPath(new URL(`./${directory}/$1`, import.meta.url)),
  }
}

export default defineConfig({
  test: {
    include: ['tests/**/*.spec.ts'],
    environment: 'node',
  },
  resolve: {
    alias: [
      subpath('exceptions', 'app/exceptions'),
      subpath('models', 'app/models'),
      subpath('middleware', 'app/middleware'),
      subpath('services', 'app/services'),
      subpath('types', 'app/types'),
      subpath('validators', 'app/validators'),
      subpath('config', 'config'),
      subpath('database', 'database'),
      subpath('tests', 'tests'),
    ],
  },
})
