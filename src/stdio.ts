#!/usr/bin/env node
/**
 * Stdio entry point for the Tabular QA MCP Server
 *
 * Config priority: ENV > config/config.local.yaml > config/config.yaml
 * (see config/loadConfig.ts). A Postgres pool is created only when
 * database.name (DB_NAME) is set; CSV datasets work without one.
 *
 * Usage:
 *   DB_NAME=shop DB_USER=reader node dist/stdio.js
 */

import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js"
import pg from "pg"
import { errorMessage } from "./config.js"
import { loadConfig } from "./config/loadConfig.js"
import { createLogger } from "./logger.js"
import { createServer } from "./server.js"
import { createEngine } from "./tools.js"

async function main() {
	const config = loadConfig()
	const logger = createLogger(config.logging.level)

	const pool = config.database.name
		? new pg.Pool({
				host: config.database.host,
				port: config.database.port,
				database: config.database.name,
				user: config.database.user,
				password: config.database.password,
			})
		: null

	if (pool) {
		pool.on("error", (err) => logger.error("Idle Postgres client error", { error: err.message }))
		logger.info("Database configured", {
			host: config.database.host,
			port: config.database.port,
			database: config.database.name,
		})
	} else {
		logger.info("No database configured; CSV datasets only")
	}

	const engine = createEngine(config, { pool, logger })
	const server = createServer(engine)

	const transport = new StdioServerTransport()
	await server.connect(transport)

	logger.info("Tabular QA MCP Server running via stdio", {
		embedding_enabled: config.embedding.enabled,
		generation_enabled: config.generation.enabled,
		default_mode: config.routing.default_mode,
	})

	const shutdown = async () => {
		logger.info("Shutting down...")
		await server.close()
		if (pool) await pool.end()
		process.exit(0)
	}

	process.on("SIGINT", () => {
		shutdown().catch((err) => {
			logger.error("Shutdown failed", { error: errorMessage(err) })
			process.exit(1)
		})
	})
	process.on("SIGTERM", () => {
		shutdown().catch((err) => {
			logger.error("Shutdown failed", { error: errorMessage(err) })
			process.exit(1)
		})
	})
}

main().catch((error) => {
	console.error("[ERROR] Fatal error:", errorMessage(error))
	process.exit(1)
})
