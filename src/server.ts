/**
 * MCP server: registers the tool handlers with zod input schemas.
 *
 * Tools:
 *   ask_question        route + answer one question
 *   compare_strategies  answer under force-rag and force-traditional
 *   index_database      introspect Postgres and index the schema
 *   index_csv           parse a CSV (path or inline) and index it
 *   reindex_dataset     rebuild an index from its last source
 *   remove_dataset      drop a dataset's index
 *   retrieval_status    embedding capability and per-dataset index status
 */

import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js"
import type { CallToolResult } from "@modelcontextprotocol/sdk/types.js"
import { z } from "zod"
import { TabularQAError, errorMessage } from "./config.js"
import {
	askQuestion,
	compareStrategies,
	indexCsv,
	indexDatabase,
	reindexDataset,
	removeDataset,
	retrievalStatus,
	type Engine,
} from "./tools.js"

export const SERVER_NAME = "mcp-server-tabular-qa"
export const SERVER_VERSION = "0.1.0"

const historySchema = z
	.array(z.object({ question: z.string(), answer: z.string() }))
	.optional()
	.describe("Earlier turns, oldest first")

function jsonResult(value: unknown): CallToolResult {
	return { content: [{ type: "text", text: JSON.stringify(value, null, 2) }] }
}

/**
 * Runs a handler and turns thrown errors into an MCP error result.
 */
export async function runTool(engine: Engine, tool: string, handler: () => unknown): Promise<CallToolResult> {
	try {
		return jsonResult(await handler())
	} catch (err) {
		const type = err instanceof TabularQAError ? err.type : "internal"
		engine.logger.error("Tool failed", { tool, type, error: errorMessage(err) })
		return {
			content: [{ type: "text", text: JSON.stringify({ error: errorMessage(err), type }, null, 2) }],
			isError: true,
		}
	}
}

export function createServer(engine: Engine): McpServer {
	const server = new McpServer({ name: SERVER_NAME, version: SERVER_VERSION })

	server.tool(
		"ask_question",
		"Answer a natural-language question about an indexed dataset. Routes to SQL/statistics or to retrieval-augmented generation.",
		{
			question: z.string().min(1),
			dataset_id: z.string().min(1),
			mode: z.string().optional().describe("auto | force-rag | force-traditional"),
			history: historySchema,
		},
		async (args) => runTool(engine, "ask_question", () => askQuestion(engine, args)),
	)

	server.tool(
		"compare_strategies",
		"Answer a question under both forced modes (rag and traditional) for side-by-side comparison.",
		{
			question: z.string().min(1),
			dataset_id: z.string().min(1),
		},
		async (args) => runTool(engine, "compare_strategies", () => compareStrategies(engine, args)),
	)

	server.tool(
		"index_database",
		"Introspect the configured Postgres database and build a retrieval index of its schema.",
		{
			dataset_id: z.string().min(1),
			schemas: z.array(z.string()).optional(),
			exclude_tables: z.array(z.string()).optional(),
		},
		async (args) => runTool(engine, "index_database", () => indexDatabase(engine, args)),
	)

	server.tool(
		"index_csv",
		"Load a CSV file (by path or inline content) and build a retrieval index of it.",
		{
			dataset_id: z.string().min(1),
			path: z.string().optional(),
			content: z.string().optional(),
			name: z.string().optional(),
		},
		async (args) => runTool(engine, "index_csv", () => indexCsv(engine, args)),
	)

	server.tool(
		"reindex_dataset",
		"Rebuild a dataset's index from the source it was last indexed with.",
		{ dataset_id: z.string().min(1) },
		async (args) => runTool(engine, "reindex_dataset", () => reindexDataset(engine, args)),
	)

	server.tool(
		"remove_dataset",
		"Discard a dataset's index.",
		{ dataset_id: z.string().min(1) },
		async (args) => runTool(engine, "remove_dataset", () => removeDataset(engine, args)),
	)

	server.tool(
		"retrieval_status",
		"Report embedding availability, retrieval settings and per-dataset index status.",
		async () => runTool(engine, "retrieval_status", () => retrievalStatus(engine)),
	)

	return server
}
