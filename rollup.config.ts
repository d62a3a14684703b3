// See: https://rollupjs.org/introduction/

import commonjs from '@rollup/plugin-commonjs'
import json from '@rollup/plugin-json'
import nodeResolve from '@rollup/plugin-node-resolve'
import typescript from '@rollup/plugin-typescript'
import { existsSync } from 'fs'

// Entry points bundled to review-app-scan/dist/<name>.js
// index: the Actions entry referenced by action.yml
// cli: the review-app-scan executable
const entries = [
  { input: 'review-app-scan/src/index.ts', file: 'review-app-scan/dist/index.js' },
  { input: 'review-app-scan/src/bin.ts', file: 'review-app-scan/dist/cli.js' }
]

const configs = entries
  .filter((entry) => existsSync(entry.input))
  .map((entry) => ({
    input: entry.input,
    output: {
      esModule: true,
      file: entry.file,
      format: 'es' as const,
      sourcemap: true
    },
    plugins: [
      json(),
      typescript({
        tsconfig: './tsconfig.json',
        compilerOptions: {
          noEmit: false,
          outDir: undefined,
          declaration: false
        }
      }),
      nodeResolve({ preferBuiltins: true }),
      commonjs()
    ]
  }))

export default configs
