/**
 * Error text classification
 *
 * Maps engine error text (Trino/Athena and PostgreSQL wording, SQLSTATE
 * prefixes as rendered by the executor) to an error kind, and pulls the
 * offending literal, column or function out of the message.
 */

import type { ErrorKind } from "./reasoning_types.js"

// ============================================================================
// Patterns
// ============================================================================

interface ErrorPattern {
	kind: ErrorKind
	patterns: RegExp[]
}

/** First match wins */
const ERROR_PATTERNS: readonly ErrorPattern[] = [
	{
		kind: "date_format_mismatch",
		patterns: [
			/invalid format:/i,
			/is malformed at/i,
			/is too short/i,
			/cannot be cast to (date|time|timestamp)/i,
			/invalid input syntax for type (date|time|timestamp)/i,
			/date\/time field value out of range/i,
			/invalid value ".*" for "/i,
			/unparseable date/i,
			/SQLSTATE 2200[78]/,
		],
	},
	{
		kind: "type_mismatch",
		patterns: [
			/TYPE_MISMATCH/,
			/unexpected parameters \(/i,
			/cannot be applied to/i,
			/function [\w.]+\([^)]*\) does not exist/i,
			/operator does not exist/i,
			/is of type \S+( \w+)? but expression is of type/i,
			/invalid input syntax for type (integer|bigint|smallint|numeric|real|double|boolean)/i,
			/SQLSTATE 42(883|804)/,
			/SQLSTATE 22P02/,
		],
	},
	{
		kind: "unknown_column",
		patterns: [
			/COLUMN_NOT_FOUND/,
			/column '[^']+' cannot be resolved/i,
			/column "?[\w.]+"? (of relation "?\w+"? )?does not exist/i,
			/SQLSTATE 42703/,
		],
	},
	{
		kind: "syntax_error",
		patterns: [
			/mismatched input/i,
			/syntax error at or near/i,
			/SQLSTATE 42601/,
			/SYNTAX_ERROR/,
		],
	},
	{
		kind: "timeout",
		patterns: [
			/timed out/i,
			/statement timeout/i,
			/EXCEEDED_TIME_LIMIT/,
			/SQLSTATE 57014/,
		],
	},
]

export function classifyError(errorText: string): ErrorKind {
	for (const entry of ERROR_PATTERNS) {
		if (entry.patterns.some((p) => p.test(errorText))) return entry.kind
	}
	return "unclassified"
}

// ============================================================================
// Extraction
// ============================================================================

const LITERAL_PATTERNS: readonly RegExp[] = [
	/invalid format:\s*"([^"]*)"/i,
	/invalid format:\s*'([^']*)'/i,
	/invalid input syntax for type [\w ]+?:\s*"([^"]*)"/i,
	/date\/time field value out of range:\s*"([^"]*)"/i,
	/cannot be cast to \w+:\s*'?([^'\s]+)'?/i,
	/unparseable date:\s*"([^"]*)"/i,
]

/** The stored value an engine echoed back, if any */
export function extractOffendingLiteral(errorText: string): string | null {
	for (const pattern of LITERAL_PATTERNS) {
		const match = pattern.exec(errorText)
		if (match && match[1] !== "") return match[1]
	}
	return null
}

/**
 * Parse an unknown-column message for the column name and table/alias hint
 *
 * Formats:
 * - 'column "foo" does not exist'
 * - 'column "foo" of relation "bar" does not exist'
 * - 'column c.foo does not exist'
 * - "Column 'c.foo' cannot be resolved"
 */
export function parseUndefinedColumn(message: string): {
	column: string
	tableHint?: string
} | null {
	const trinoQualified = /column '(\w+)\.(\w+)' cannot be resolved/i.exec(message)
	if (trinoQualified) {
		return { column: trinoQualified[2], tableHint: trinoQualified[1] }
	}

	const trinoSimple = /column '(\w+)' cannot be resolved/i.exec(message)
	if (trinoSimple) {
		return { column: trinoSimple[1] }
	}

	const withRelation = /column "?([^"\s]+)"? of relation "?([^"\s]+)"? does not exist/i.exec(message)
	if (withRelation) {
		return { column: withRelation[1], tableHint: withRelation[2] }
	}

	const qualified = /column "?(\w+)\.(\w+)"? does not exist/i.exec(message)
	if (qualified) {
		return { column: qualified[2], tableHint: qualified[1] }
	}

	const simple = /column "?(\w+)"? does not exist/i.exec(message)
	if (simple) {
		return { column: simple[1] }
	}

	return null
}

/** Name of the function an engine complained about */
export function extractFunctionName(errorText: string): string | null {
	const patterns = [
		/for function (\w+)/i,
		/expected:\s*(\w+)\(/i,
		/function (\w+)\([^)]*\) does not exist/i,
	]
	for (const pattern of patterns) {
		const match = pattern.exec(errorText)
		if (match) return match[1].toLowerCase()
	}
	return null
}

/**
 * Argument types of the first expected signature in a Trino message:
 * "Expected: date_trunc(varchar(x), date)" -> ["varchar", "date"]
 * Type parameters are dropped wherever they appear: "timestamp(p) with time zone"
 * -> "timestamp with time zone".
 */
export function extractExpectedSignature(errorText: string): string[] | null {
	const match = /expected:\s*\w+\(((?:[^()]|\([^()]*\))*)\)/i.exec(errorText)
	if (!match) return null
	return match[1]
		.split(/,(?![^(]*\))/)
		.map((t) =>
			t
				.replace(/\([^()]*\)/g, "")
				.replace(/\s+/g, " ")
				.trim()
				.toLowerCase(),
		)
		.filter((t) => t.length > 0)
}
