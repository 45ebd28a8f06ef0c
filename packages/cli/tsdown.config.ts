import { defineConfig } from 'tsdown/config'

export default defineConfig({
	entry: ['src/index.ts'],
	format: ['esm'],
	// the workspace core ships TypeScript sources, so it is bundled in
	noExternal: ['@calcvm/core'],
	hash: false,
	clean: true,
	minify: false,
	platform: 'node',
	sourcemap: true,
	treeshake: true,
})
