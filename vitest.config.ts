import { fileURLToPath } from 'node:url'
import { defineConfig } from 'vitest/config'

const pkg = (name: string) => fileURLToPath(new URL(`./packages/${name}/src/index.ts`, import.meta.url))

export default defineConfig({
	resolve: {
		alias: {
			'@pixel-codec/core': pkg('core'),
			'@pixel-codec/color': pkg('color'),
			'@pixel-codec/composite': pkg('composite'),
			'@pixel-codec/codecs': pkg('codecs'),
			'@pixel-codec/atlas': pkg('atlas'),
		},
	},
	test: {
		include: ['packages/*/src/**/*.test.ts', 'packages/*/test/**/*.test.ts'],
		environment: 'node',
	},
})
