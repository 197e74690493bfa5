import { defineConfig } from 'vitest/config'
import { fileURLToPath } from 'node:url'
import os from 'node:os'

const maxWorkersFromEnv = Number(process.env.VITEST_MAX_WORKERS)
const defaultWorkers = Math.min(4, Math.max(1, os.cpus().length))
const maxWorkers = Number.isFinite(maxWorkersFromEnv) && maxWorkersFromEnv > 0 ? maxWorkersFromEnv : defaultWorkers

export default defineConfig({
	resolve: {
		alias: {
			'@': fileURLToPath(new URL('./src', import.meta.url)),
		},
	},
	test: {
		include: ['tests/unit/**/*.test.ts'],
		maxWorkers,
		minWorkers: 1,
	},
})
