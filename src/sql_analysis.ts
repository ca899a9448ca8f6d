/**
 * Lightweight SQL lexical analysis
 *
 * Recovers just enough structure from a failed query to point at the fields
 * involved: table aliases from FROM/JOIN, function-call expressions, and
 * qualified column references. Not a parser: it covers the flat
 * SELECT ... FROM ... JOIN ... WHERE shapes the pipeline generates and reports
 * anything else as an unsupported shape.
 */

// ============================================================================
// Types
// ============================================================================

export interface AliasMap {
	[alias: string]: string // alias -> table_name
}

export interface TableRef {
	/** Table name without database qualifier */
	table: string
	/** Table name as written, including any qualifier */
	qualified: string
	alias: string
}

export interface CallArgument {
	text: string
	start: number
	end: number
}

export interface CallExpression {
	/** Lowercased function name */
	name: string
	/** Full call text, name through closing parenthesis */
	text: string
	start: number
	end: number
	args: CallArgument[]
}

export interface ColumnRef {
	qualifier: string
	column: string
	text: string
	start: number
}

export interface FieldReference {
	/** Qualifier as written, or null for a bare column */
	qualifier: string | null
	column: string
	/** The column expression to parse or cast (CAST wrappers removed) */
	expression: string
}

export type UnsupportedShape = "subquery" | "cte" | "multi_statement"

// ============================================================================
// Helpers
// ============================================================================

const IDENT = "[a-zA-Z_][a-zA-Z0-9_]*"

const NON_ALIAS_KEYWORDS = new Set([
	"on", "where", "group", "order", "limit", "having", "join", "left", "right",
	"inner", "outer", "cross", "full", "natural", "and", "or", "using", "union",
	"offset", "window", "tablesample",
])

/** Words followed by "(" that are not function calls */
const NON_FUNCTION_WORDS = new Set([
	"in", "as", "and", "or", "not", "exists", "over", "from", "where", "on",
	"select", "values", "using", "when", "then", "else", "join", "by", "all", "any",
])

export function escapeRegex(str: string): string {
	return str.replace(/[.*+?^${}()|[\]\\]/g, "\\$&")
}

/**
 * Blank out string literals and comments, keeping every offset in place,
 * so structural scans never look inside quoted text.
 */
export function maskLiterals(sql: string): string {
	let out = ""
	let i = 0
	while (i < sql.length) {
		const ch = sql[i]
		if (ch === "'") {
			out += "'"
			i++
			while (i < sql.length) {
				if (sql[i] === "'" && sql[i + 1] === "'") {
					out += "  "
					i += 2
					continue
				}
				if (sql[i] === "'") break
				out += sql[i] === "\n" ? "\n" : " "
				i++
			}
			if (i < sql.length) {
				out += "'"
				i++
			}
			continue
		}
		if (ch === "-" && sql[i + 1] === "-") {
			while (i < sql.length && sql[i] !== "\n") {
				out += " "
				i++
			}
			continue
		}
		out += ch
		i++
	}
	return out
}

/** Index of the parenthesis closing the one at openIndex, or -1 */
function findClosingParen(masked: string, openIndex: number): number {
	let depth = 0
	for (let i = openIndex; i < masked.length; i++) {
		if (masked[i] === "(") depth++
		else if (masked[i] === ")") {
			depth--
			if (depth === 0) return i
		}
	}
	return -1
}

/** Split the argument list between two parentheses at top-level commas */
function splitArguments(sql: string, masked: string, innerStart: number, innerEnd: number): CallArgument[] {
	const args: CallArgument[] = []
	let depth = 0
	let segmentStart = innerStart

	const push = (end: number) => {
		const raw = sql.slice(segmentStart, end)
		const leading = raw.length - raw.trimStart().length
		const text = raw.trim()
		if (text) {
			args.push({ text, start: segmentStart + leading, end: segmentStart + leading + text.length })
		}
	}

	for (let i = innerStart; i < innerEnd; i++) {
		const ch = masked[i]
		if (ch === "(") depth++
		else if (ch === ")") depth--
		else if (ch === "," && depth === 0) {
			push(i)
			segmentStart = i + 1
		}
	}
	push(innerEnd)
	return args
}

// ============================================================================
// Table References
// ============================================================================

/**
 * Extract FROM/JOIN table references
 *
 * Patterns:
 * - FROM table_name [alias]
 * - FROM db.table_name [AS] alias
 * - JOIN table_name [AS] alias
 *
 * A table without an alias is addressable by its own name.
 */
export function extractTableRefs(sql: string): TableRef[] {
	const refs: TableRef[] = []
	const normalized = maskLiterals(sql).replace(/\s+/g, " ")
	const pattern = new RegExp(
		`\\b(?:FROM|JOIN)\\s+((?:${IDENT}\\.)?${IDENT})(?:\\s+(?:AS\\s+)?(${IDENT}))?`,
		"gi",
	)

	let match
	while ((match = pattern.exec(normalized)) !== null) {
		const qualified = match[1].toLowerCase()
		const table = qualified.includes(".") ? qualified.slice(qualified.lastIndexOf(".") + 1) : qualified
		const aliasCandidate = match[2]?.toLowerCase()
		const alias = aliasCandidate && !NON_ALIAS_KEYWORDS.has(aliasCandidate) ? aliasCandidate : table
		refs.push({ table, qualified, alias })
	}

	return refs
}

export function extractAliases(sql: string): AliasMap {
	const aliases: AliasMap = {}
	for (const ref of extractTableRefs(sql)) {
		aliases[ref.alias] = ref.table
		// The bare table name stays addressable alongside its alias
		if (!(ref.table in aliases)) aliases[ref.table] = ref.table
	}
	return aliases
}

// ============================================================================
// Expressions
// ============================================================================

/**
 * Find every function-call expression, nested calls included, in source order.
 * Pass names to keep only calls to those functions.
 */
export function findCallExpressions(sql: string, names?: ReadonlySet<string>): CallExpression[] {
	const masked = maskLiterals(sql)
	const calls: CallExpression[] = []
	const pattern = new RegExp(`\\b(${IDENT})\\s*\\(`, "g")

	let match
	while ((match = pattern.exec(masked)) !== null) {
		const name = match[1].toLowerCase()
		if (NON_FUNCTION_WORDS.has(name)) continue
		if (names && !names.has(name)) continue

		// A preceding "." means a qualified column, not a call
		if (match.index > 0 && masked[match.index - 1] === ".") continue

		const open = match.index + match[0].length - 1
		const close = findClosingParen(masked, open)
		if (close < 0) continue

		calls.push({
			name,
			text: sql.slice(match.index, close + 1),
			start: match.index,
			end: close + 1,
			args: splitArguments(sql, masked, open + 1, close),
		})
	}

	return calls
}

/** Every qualifier.column reference outside literals */
export function findQualifiedColumnRefs(sql: string): ColumnRef[] {
	const masked = maskLiterals(sql)
	const refs: ColumnRef[] = []
	const pattern = new RegExp(`(?<![\\w.])(${IDENT})\\.(${IDENT})(?![\\w.(])`, "g")

	let match
	while ((match = pattern.exec(masked)) !== null) {
		refs.push({
			qualifier: match[1].toLowerCase(),
			column: match[2],
			text: match[0],
			start: match.index,
		})
	}
	return refs
}

/** Does the query mention this column as a standalone identifier? */
export function mentionsBareColumn(sql: string, column: string): boolean {
	const pattern = new RegExp(`(?<![\\w.])${escapeRegex(column)}(?![\\w.(])`, "i")
	return pattern.test(maskLiterals(sql))
}

/**
 * Reduce a call argument to the column it reads.
 *
 * Accepts `alias.column`, `column`, and either of those wrapped in
 * `CAST(... AS type)`. Computed expressions return null.
 */
export function unwrapFieldArgument(argument: string): FieldReference | null {
	const text = argument.trim()

	const cast = /^(?:try_)?cast\s*\(\s*([\s\S]+?)\s+AS\s+[a-zA-Z_][\w\s(),]*\)$/i.exec(text)
	if (cast) {
		const inner = unwrapFieldArgument(cast[1])
		return inner ? { ...inner, expression: text } : null
	}

	const qualified = new RegExp(`^(${IDENT})\\.(${IDENT})$`).exec(text)
	if (qualified) {
		return { qualifier: qualified[1].toLowerCase(), column: qualified[2], expression: text }
	}

	const bare = new RegExp(`^(${IDENT})$`).exec(text)
	if (bare) {
		return { qualifier: null, column: bare[1], expression: text }
	}

	return null
}

/**
 * For CAST(x AS type) calls: the operand and the target type
 */
export function splitCastArgument(argument: string): { operand: string; targetType: string } | null {
	const match = /^([\s\S]+?)\s+AS\s+([a-zA-Z_][\w\s(),]*)$/i.exec(argument.trim())
	if (!match) return null
	return { operand: match[1].trim(), targetType: match[2].trim().toLowerCase() }
}

// ============================================================================
// Shape Detection
// ============================================================================

/**
 * Query shapes the lexical scan cannot resolve fields for.
 * Returns null for the flat shapes it handles.
 */
export function detectUnsupportedShape(sql: string): UnsupportedShape | null {
	const masked = maskLiterals(sql).trim().replace(/;\s*$/, "")

	if (masked.includes(";")) return "multi_statement"
	if (/^WITH\b/i.test(masked)) return "cte"
	if (/\(\s*SELECT\b/i.test(masked)) return "subquery"
	return null
}
