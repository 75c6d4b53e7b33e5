/**
 * Leveled logger that writes to stderr (stdout is reserved for MCP protocol).
 *
 * Components take a Logger through their constructor; meta keys are snake_case.
 */

export type LogLevel = "debug" | "info" | "warn" | "error"

export type LogMeta = Record<string, unknown>

export interface Logger {
	debug(message: string, meta?: LogMeta): void
	info(message: string, meta?: LogMeta): void
	warn(message: string, meta?: LogMeta): void
	error(message: string, meta?: LogMeta): void
}

const LEVEL_ORDER: Record<LogLevel, number> = {
	debug: 10,
	info: 20,
	warn: 30,
	error: 40,
}

export function parseLogLevel(value: string | undefined): LogLevel {
	const lower = (value ?? "").toLowerCase()
	if (lower === "debug" || lower === "info" || lower === "warn" || lower === "error") {
		return lower
	}
	if (lower === "warning") return "warn"
	return "info"
}

export function createLogger(
	level: string = "info",
	write: (line: string) => void = (line) => console.error(line),
): Logger {
	const threshold = LEVEL_ORDER[parseLogLevel(level)]

	const emit = (lvl: LogLevel, message: string, meta?: LogMeta) => {
		if (LEVEL_ORDER[lvl] < threshold) return
		const tag = `[${lvl.toUpperCase()}]`
		write(meta && Object.keys(meta).length > 0 ? `${tag} ${message} ${JSON.stringify(meta)}` : `${tag} ${message}`)
	}

	return {
		debug: (message, meta) => emit("debug", message, meta),
		info: (message, meta) => emit("info", message, meta),
		warn: (message, meta) => emit("warn", message, meta),
		error: (message, meta) => emit("error", message, meta),
	}
}

/** Discards everything (tests, embedded use) */
export const silentLogger: Logger = {
	debug: () => {},
	info: () => {},
	warn: () => {},
	error: () => {},
}
