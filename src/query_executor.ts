/**
 * Query Executor capability
 *
 * The reasoning core never talks to a query engine directly. It is handed a
 * QueryExecutor and treats each call as an opaque, awaited round trip. A
 * PostgreSQL implementation on pg is provided; anything that can submit SQL
 * and report rows or an error (an Athena submit/poll/fetch cycle, a test fake)
 * can stand in.
 */

import pg from "pg"
import type { Pool, PoolConfig } from "pg"
import { describeError } from "./errors.js"
import type { Logger } from "./logger.js"

// ============================================================================
// Types
// ============================================================================

export type QueryRow = Record<string, unknown>

export type QueryOutcome =
	| { status: "ok"; rows: QueryRow[] }
	| {
			status: "error"
			/** Engine-specific error class, e.g. "INVALID_FUNCTION_ARGUMENT" or a SQLSTATE */
			errorKind: string
			message: string
			code?: string
	  }
	| { status: "timeout"; elapsedMs: number }

export interface ExecuteOptions {
	timeoutMs: number
}

export interface QueryExecutor {
	execute(queryText: string, options: ExecuteOptions): Promise<QueryOutcome>
}

/** Minimal surface of a pg client (PoolClient satisfies it) */
export interface PgClientLike {
	query(text: string, values?: unknown[]): Promise<{ rows: unknown[] }>
	release(): void
}

/** Minimal surface of a pg pool (Pool satisfies it) */
export interface PgPoolLike {
	connect(): Promise<PgClientLike>
}

// ============================================================================
// Helpers
// ============================================================================

export function isQueryRow(value: unknown): value is QueryRow {
	return value !== null && typeof value === "object" && !Array.isArray(value)
}

/** Render a sampled cell as the raw string an engine would echo back */
export function cellToString(value: unknown): string | null {
	if (value === null || value === undefined) return null
	if (value instanceof Date) return value.toISOString()
	if (typeof value === "string") return value
	if (typeof value === "number" || typeof value === "bigint" || typeof value === "boolean") {
		return String(value)
	}
	return JSON.stringify(value)
}

/** Render the outcome's error text the way the investigator expects to read it */
export function outcomeErrorText(outcome: QueryOutcome): string {
	switch (outcome.status) {
		case "error":
			return `${outcome.errorKind}: ${outcome.message}`
		case "timeout":
			return `Query timed out after ${outcome.elapsedMs}ms`
		case "ok":
			return ""
	}
}

/**
 * Run a query with a caller-supplied timeout.
 *
 * The executor promise is raced against a timer; an executor that throws is
 * reported as an error outcome. The in-flight query is not cancelled.
 */
export async function executeWithTimeout(
	executor: QueryExecutor,
	queryText: string,
	timeoutMs: number,
	logger?: Logger,
): Promise<QueryOutcome> {
	const started = Date.now()
	let timer: NodeJS.Timeout | undefined

	const pending = executor.execute(queryText, { timeoutMs }).catch((error: unknown): QueryOutcome => {
		logger?.warn("Query executor threw instead of returning an outcome", { error: describeError(error) })
		return { status: "error", errorKind: "EXECUTOR_EXCEPTION", message: describeError(error) }
	})

	const timeout = new Promise<QueryOutcome>((resolve) => {
		timer = setTimeout(() => resolve({ status: "timeout", elapsedMs: Date.now() - started }), timeoutMs)
	})

	try {
		return await Promise.race([pending, timeout])
	} finally {
		clearTimeout(timer)
	}
}

// ============================================================================
// PostgreSQL Executor
// ============================================================================

/** SQLSTATE for statement_timeout cancellation */
const QUERY_CANCELED = "57014"

function pgErrorCode(error: unknown): string | undefined {
	if (error !== null && typeof error === "object" && "code" in error && typeof error.code === "string") {
		return error.code
	}
	return undefined
}

export class PgQueryExecutor implements QueryExecutor {
	private pool: PgPoolLike
	private logger: Logger

	constructor(pool: PgPoolLike, logger: Logger) {
		this.pool = pool
		this.logger = logger
	}

	async execute(queryText: string, options: ExecuteOptions): Promise<QueryOutcome> {
		const started = Date.now()
		let client: PgClientLike | null = null

		try {
			client = await this.pool.connect()
			await client.query(`SET statement_timeout = ${Math.max(1, Math.floor(options.timeoutMs))}`)
			const result = await client.query(queryText)
			const rows = result.rows.filter(isQueryRow)

			this.logger.debug("Query executed", { rows: rows.length, latency_ms: Date.now() - started })
			return { status: "ok", rows }
		} catch (error) {
			const code = pgErrorCode(error)
			if (code === QUERY_CANCELED) {
				return { status: "timeout", elapsedMs: Date.now() - started }
			}
			const message = error instanceof Error ? error.message : String(error)
			this.logger.debug("Query failed", { sqlstate: code, message })
			const errorKind = code && /^[0-9A-Z]{5}$/.test(code) ? `SQLSTATE ${code}` : "QUERY_FAILED"
			return { status: "error", errorKind, message, code }
		} finally {
			if (client) {
				await client.query("RESET statement_timeout").catch((error: unknown) => {
					this.logger.warn("Failed to reset statement_timeout", { error: describeError(error) })
				})
				client.release()
			}
		}
	}
}

export function createPgPool(config: PoolConfig): Pool {
	return new pg.Pool(config)
}
