import { defineConfig } from 'tsup'

export default defineConfig({
  entry: ['src/index.ts'],
  format: ['esm'],
  dts: true,
  sourcemap: true,
  external: ['@tapedeck/audio', '@tapedeck/utils', 'solid-js'],
})
