import { defineConfig } from 'tsup'
import { parseLevel } from './src/core/types/level'
import { tripwireEsbuildPlugin } from './src/elision/esbuild-plugin'

export default defineConfig({
  entry: {
    'bin/run': 'bin/run.ts',
    'src/index': 'src/index.ts',
  },
  format: ['esm'],
  dts: true,
  splitting: false,
  sourcemap: false,
  clean: false,
  target: 'node20',
  esbuildPlugins: [tripwireEsbuildPlugin({ threshold: parseLevel(process.env.TRIPWIRE_LEVEL) })],
})
