/**
 * Unified config loader for Tabular QA.
 *
 * Precedence: ENV > config/config.local.yaml > config/config.yaml > built-in defaults
 */

import * as fs from "fs"
import * as path from "path"
import * as yaml from "js-yaml"
import { z } from "zod"
import { ConfigurationError, DEFAULTS } from "../config.js"
import { FORCED_MODES, type ForcedMode } from "../types.js"

// ── Schema ───────────────────────────────────────────────────────────

const forcedModeSchema = z.custom<ForcedMode>(
	(value) => typeof value === "string" && FORCED_MODES.some((mode) => mode === value),
	{ message: `routing.default_mode must be one of: ${FORCED_MODES.join(", ")}` },
)

const configSchema = z.object({
	database: z.object({
		host: z.string().default("localhost"),
		port: z.number().int().default(5432),
		name: z.string().default(""),
		user: z.string().default("postgres"),
		password: z.string().default(""),
		schemas: z.array(z.string()).default(["public"]),
	}).default({}),
	embedding: z.object({
		enabled: z.boolean().default(false),
		url: z.string().default("http://localhost:8001"),
		model: z.string().default("nomic-embed-text:latest"),
		timeout_ms: z.number().int().positive().default(30000),
		batch_size: z.number().int().positive().default(DEFAULTS.embeddingBatchSize),
	}).default({}),
	generation: z.object({
		enabled: z.boolean().default(false),
		url: z.string().default("http://localhost:8001"),
		model: z.string().default("llama3.1:8b"),
		timeout_ms: z.number().int().positive().default(60000),
		temperature: z.number().min(0).max(2).default(0.7),
		max_tokens: z.number().int().positive().default(1000),
		context_char_limit: z.number().int().positive().default(DEFAULTS.contextCharLimit),
		history_turns: z.number().int().min(0).default(DEFAULTS.historyTurns),
	}).default({}),
	retrieval: z.object({
		top_k: z.number().int().min(1).default(DEFAULTS.topK),
		min_score: z.number().min(0).max(1).default(DEFAULTS.minScore),
	}).default({}),
	chunking: z.object({
		sample_value_cap: z.number().int().min(1).default(DEFAULTS.sampleValueCap),
		max_row_samples: z.number().int().min(0).default(DEFAULTS.maxRowSamples),
		max_top_categories: z.number().int().min(1).default(DEFAULTS.maxTopCategories),
	}).default({}),
	sql: z.object({
		max_rows: z.number().int().min(1).default(DEFAULTS.maxRows),
		statement_timeout_ms: z.number().int().positive().default(DEFAULTS.statementTimeoutMs),
	}).default({}),
	routing: z.object({
		default_mode: forcedModeSchema.default("auto"),
	}).default({}),
	logging: z.object({
		level: z.string().default("info"),
	}).default({}),
})

export type TabularQAConfig = z.infer<typeof configSchema>

// ── YAML Loading ─────────────────────────────────────────────────────

type RawConfig = Record<string, unknown>

function isRecord(value: unknown): value is RawConfig {
	return value !== null && typeof value === "object" && !Array.isArray(value)
}

function findConfigDir(): string | null {
	// Walk up from cwd looking for config/config.yaml
	let dir = process.cwd()
	for (let i = 0; i < 10; i++) {
		const candidate = path.join(dir, "config", "config.yaml")
		if (fs.existsSync(candidate)) return path.join(dir, "config")
		const parent = path.dirname(dir)
		if (parent === dir) break
		dir = parent
	}
	return null
}

function loadYaml(filePath: string): RawConfig {
	if (!fs.existsSync(filePath)) return {}
	const raw = fs.readFileSync(filePath, "utf-8")
	const parsed: unknown = yaml.load(raw)
	return isRecord(parsed) ? parsed : {}
}

/** Deep merge b into a (b wins on conflicts). */
function deepMerge(a: RawConfig, b: RawConfig): RawConfig {
	const result: RawConfig = { ...a }
	for (const key of Object.keys(b)) {
		const left = a[key]
		const right = b[key]
		if (isRecord(right) && isRecord(left)) {
			result[key] = deepMerge(left, right)
		} else {
			result[key] = right
		}
	}
	return result
}

// ── Env Overlay ──────────────────────────────────────────────────────

/** Read env var, returning undefined if not set. */
function env(name: string): string | undefined {
	return process.env[name]
}
function envBool(name: string): boolean | undefined {
	const v = env(name)
	if (v === undefined) return undefined
	return v === "true" || v === "1"
}
function envInt(name: string): number | undefined {
	const v = env(name)
	if (v === undefined) return undefined
	const n = parseInt(v, 10)
	return isNaN(n) ? undefined : n
}
function envFloat(name: string): number | undefined {
	const v = env(name)
	if (v === undefined) return undefined
	const n = parseFloat(v)
	return isNaN(n) ? undefined : n
}
function envList(name: string): string[] | undefined {
	const v = env(name)
	if (v === undefined) return undefined
	return v.split(",").map((s) => s.trim()).filter((s) => s.length > 0)
}

function section(cfg: RawConfig, key: string): RawConfig {
	const existing = cfg[key]
	if (isRecord(existing)) return existing
	const created: RawConfig = {}
	cfg[key] = created
	return created
}

/** Apply env-var overrides on top of merged YAML. */
function applyEnvOverrides(cfg: RawConfig): void {
	// database
	const db = section(cfg, "database")
	db.host = env("DB_HOST") ?? db.host
	db.port = envInt("DB_PORT") ?? db.port
	db.name = env("DB_NAME") ?? db.name
	db.user = env("DB_USER") ?? db.user
	db.password = env("DB_PASSWORD") ?? db.password
	db.schemas = envList("DB_SCHEMAS") ?? db.schemas

	// embedding
	const e = section(cfg, "embedding")
	e.enabled = envBool("EMBEDDING_ENABLED") ?? e.enabled
	e.url = env("EMBEDDING_URL") ?? e.url
	e.model = env("EMBEDDING_MODEL") ?? e.model

	// generation
	const g = section(cfg, "generation")
	g.enabled = envBool("GENERATION_ENABLED") ?? g.enabled
	g.url = env("GENERATION_URL") ?? g.url
	g.model = env("LLM_MODEL") ?? g.model
	g.temperature = envFloat("TEMPERATURE") ?? g.temperature

	// retrieval
	const r = section(cfg, "retrieval")
	r.top_k = envInt("RAG_TOP_K") ?? r.top_k
	r.min_score = envFloat("RAG_MIN_SCORE") ?? r.min_score

	// routing
	const rt = section(cfg, "routing")
	rt.default_mode = env("ROUTING_MODE") ?? rt.default_mode

	// logging
	const l = section(cfg, "logging")
	l.level = env("LOG_LEVEL") ?? l.level
}

/** Drop keys left undefined by the env overlay so schema defaults apply. */
function pruneUndefined(cfg: RawConfig): RawConfig {
	const result: RawConfig = {}
	for (const [key, value] of Object.entries(cfg)) {
		if (value === undefined) continue
		result[key] = isRecord(value) ? pruneUndefined(value) : value
	}
	return result
}

export function parseConfig(raw: RawConfig): TabularQAConfig {
	const parsed = configSchema.safeParse(pruneUndefined(raw))
	if (!parsed.success) {
		const issues = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`)
		throw new ConfigurationError(`Invalid configuration: ${issues.join("; ")}`, { issues })
	}
	return parsed.data
}

// ── Singleton ────────────────────────────────────────────────────────

let _config: TabularQAConfig | null = null

export function loadConfig(): TabularQAConfig {
	if (_config) return _config

	const configDir = findConfigDir()
	let merged: RawConfig = {}

	if (configDir) {
		const base = loadYaml(path.join(configDir, "config.yaml"))
		const local = loadYaml(path.join(configDir, "config.local.yaml"))
		merged = deepMerge(base, local)
	}

	applyEnvOverrides(merged)
	_config = parseConfig(merged)
	return _config
}

export function getConfig(): TabularQAConfig {
	return _config ?? loadConfig()
}

/** Reset singleton (for tests). */
export function resetConfig(): void {
	_config = null
}
