/**
 * Error taxonomy for the reasoning core.
 *
 * Only SchemaLoadError is fatal to a run. KnowledgeParseError degrades a single
 * rule category, QueryExecutionError describes one failed query. Low-confidence
 * fixes and unresolvable gaps are report outcomes, not exceptions.
 */

export type QueryExecutionErrorKind =
	| "date_format_mismatch"
	| "type_mismatch"
	| "unknown_column"
	| "syntax_error"
	| "timeout"
	| "unclassified"

export class ReasoningCoreError extends Error {
	constructor(
		public code: string,
		message: string,
		public context?: Record<string, unknown>,
	) {
		super(message)
		this.name = "ReasoningCoreError"
	}
}

export class SchemaLoadError extends ReasoningCoreError {
	constructor(message: string, context?: Record<string, unknown>) {
		super("SCHEMA_LOAD", message, context)
		this.name = "SchemaLoadError"
	}
}

export class KnowledgeParseError extends ReasoningCoreError {
	constructor(
		public section: string,
		message: string,
		context?: Record<string, unknown>,
	) {
		super("KNOWLEDGE_PARSE", message, { section, ...context })
		this.name = "KnowledgeParseError"
	}
}

export class QueryExecutionError extends ReasoningCoreError {
	constructor(
		public kind: QueryExecutionErrorKind,
		message: string,
		context?: Record<string, unknown>,
	) {
		super("QUERY_EXECUTION", message, { kind, ...context })
		this.name = "QueryExecutionError"
	}
}

export class ConfigError extends ReasoningCoreError {
	constructor(message: string, context?: Record<string, unknown>) {
		super("CONFIG", message, context)
		this.name = "ConfigError"
	}
}

/** Render any thrown value as a log-friendly string. */
export function describeError(error: unknown): string {
	if (error instanceof Error) return `${error.name}: ${error.message}`
	return String(error)
}
