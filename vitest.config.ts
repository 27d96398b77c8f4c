import { fileURLToPath } from 'node:url'
import { defineConfig } from 'vitest/config'

const pkg = (name: string): string => fileURLToPath(new URL(`./packages/${name}/src/index.ts`, import.meta.url))

export default defineConfig({
	resolve: {
		alias: {
			'@pixelflow/core': pkg('core'),
			'@pixelflow/noise': pkg('noise'),
			'@pixelflow/filter': pkg('filter'),
			'@pixelflow/edge': pkg('edge'),
		},
	},
	test: {
		include: ['packages/*/src/**/*.test.ts'],
	},
})
