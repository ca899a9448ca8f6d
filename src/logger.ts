/**
 * Logger shape passed through every component.
 *
 * Writes to stderr so stdout stays free for whatever embeds the core.
 */

export type LogLevel = "debug" | "info" | "warn" | "error"

export type LogMeta = Record<string, unknown>

export interface Logger {
	info(message: string, meta?: LogMeta): void
	warn(message: string, meta?: LogMeta): void
	error(message: string, meta?: LogMeta): void
	debug(message: string, meta?: LogMeta): void
}

const LEVEL_ORDER: Record<LogLevel, number> = {
	debug: 10,
	info: 20,
	warn: 30,
	error: 40,
}

function formatMeta(meta?: LogMeta): string {
	if (!meta || Object.keys(meta).length === 0) return ""
	try {
		return " " + JSON.stringify(meta)
	} catch {
		return " [unserializable meta]"
	}
}

export function createStderrLogger(level: LogLevel = "info"): Logger {
	const threshold = LEVEL_ORDER[level]
	const write = (lvl: LogLevel, message: string, meta?: LogMeta) => {
		if (LEVEL_ORDER[lvl] < threshold) return
		console.error(`[${lvl.toUpperCase()}] ${message}${formatMeta(meta)}`)
	}
	return {
		info: (message, meta) => write("info", message, meta),
		warn: (message, meta) => write("warn", message, meta),
		error: (message, meta) => write("error", message, meta),
		debug: (message, meta) => write("debug", message, meta),
	}
}

/**
 * Bind context fields (run_id, entity_id, query_id...) to every record.
 * Fields passed at the call site win over bound ones.
 */
export function withLogContext(logger: Logger, context: LogMeta): Logger {
	const merge = (meta?: LogMeta): LogMeta => ({ ...context, ...meta })
	return {
		info: (message, meta) => logger.info(message, merge(meta)),
		warn: (message, meta) => logger.warn(message, merge(meta)),
		error: (message, meta) => logger.error(message, merge(meta)),
		debug: (message, meta) => logger.debug(message, merge(meta)),
	}
}

export const silentLogger: Logger = {
	info: () => {},
	warn: () => {},
	error: () => {},
	debug: () => {},
}
