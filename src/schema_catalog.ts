/**
 * Schema Catalog
 *
 * Loads a tabular description of the target database (table, column, type)
 * and answers schema questions: which tables are scoped to a single entity,
 * how each of them references that entity, which columns look date-like, and
 * how to write count and sample queries for any table.
 *
 * The catalog is built once and is read-only afterwards; pass the same
 * instance to every investigator and orchestrator that needs it.
 */

import * as fs from "fs"
import { SchemaLoadError, describeError } from "./errors.js"
import type { ReasoningConfig } from "./config/loadConfig.js"
import type { PgPoolLike } from "./query_executor.js"
import type { ColumnSchema, EntityReferenceStyle, TableSchema, TableSummary } from "./reasoning_types.js"

// ============================================================================
// Types
// ============================================================================

export interface SchemaTriple {
	table_name: string
	column_name: string
	data_type: string
	ordinal_position?: number
}

export interface CatalogOptions {
	/** Qualifier prepended to table names in generated queries ("" = none) */
	database: string
	/** Substring that marks a column as referencing the scoped entity */
	entityKeyword: string
	/** Known reference column names, checked first and in order */
	referenceColumns: string[]
	/** Known reference columns that hold prefixed references */
	prefixedReferenceColumns: string[]
	referenceSuffixes: string[]
	referencePrefix: string
	dateVocabulary: string[]
	identifierSuffixes: string[]
	sampleLimit: number
}

export const DEFAULT_CATALOG_OPTIONS: CatalogOptions = {
	database: "",
	entityKeyword: "patient",
	referenceColumns: ["subject_reference", "patient_reference", "patient_id", "patient_fhir_id"],
	prefixedReferenceColumns: ["subject_reference", "patient_reference"],
	referenceSuffixes: ["_reference", "_id"],
	referencePrefix: "Patient/",
	dateVocabulary: ["date", "time", "period", "_at", "_on", "start", "end", "recorded", "issued"],
	identifierSuffixes: ["_id", "_reference", "_fhir_id", "_key"],
	sampleLimit: 20,
}

export function catalogOptionsFromConfig(schema: ReasoningConfig["schema"]): CatalogOptions {
	return {
		database: schema.database,
		entityKeyword: schema.entity_keyword,
		referenceColumns: schema.reference_columns,
		prefixedReferenceColumns: schema.prefixed_reference_columns,
		referenceSuffixes: schema.reference_suffixes,
		referencePrefix: schema.reference_prefix,
		dateVocabulary: schema.date_vocabulary,
		identifierSuffixes: schema.identifier_suffixes,
		sampleLimit: schema.sample_limit,
	}
}

const REQUIRED_HEADERS = ["table_name", "column_name", "data_type"] as const

const DATE_TYPE_PATTERN = /^(date|time|timestamp)/i

// ============================================================================
// Helpers
// ============================================================================

function quoteLiteral(value: string): string {
	return `'${value.replace(/'/g, "''")}'`
}

/** Double-quoted identifier; FHIR columns such as "end" are reserved words */
function quoteIdentifier(name: string): string {
	return `"${name.replace(/"/g, '""')}"`
}

function inferEntityReference(
	columns: readonly ColumnSchema[],
	options: CatalogOptions,
): { style: EntityReferenceStyle; column: string | null } {
	const prefixedNames = new Set(options.prefixedReferenceColumns.map((c) => c.toLowerCase()))
	const styleFor = (name: string): EntityReferenceStyle => {
		const lower = name.toLowerCase()
		if (prefixedNames.has(lower) || lower.endsWith("reference")) return "prefixed-reference"
		return "bare-id"
	}

	// Known reference column names win, in configured order
	for (const known of options.referenceColumns) {
		const match = columns.find((c) => c.name.toLowerCase() === known.toLowerCase())
		if (match) return { style: styleFor(match.name), column: match.name }
	}

	const keyword = options.entityKeyword.toLowerCase()
	for (const col of columns) {
		const lower = col.name.toLowerCase()
		if (lower.includes(keyword) && options.referenceSuffixes.some((s) => lower.endsWith(s.toLowerCase()))) {
			return { style: styleFor(col.name), column: col.name }
		}
	}

	return { style: "none", column: null }
}

function matchesDateVocabulary(columnName: string, vocabulary: string[]): boolean {
	const lower = columnName.toLowerCase()
	const words = lower.split("_").filter((w) => w.length > 0)
	return vocabulary.some((token) => {
		const t = token.toLowerCase()
		// "_at" / "_on" style tokens only count as a suffix
		if (t.startsWith("_")) return lower.endsWith(t)
		return words.some((w) => w.startsWith(t) || w.endsWith(t))
	})
}

/** Split one CSV record; doubled quotes inside a quoted field are a literal quote */
function parseCsvLine(line: string): string[] {
	const result: string[] = []
	let current = ""
	let inQuotes = false

	for (let i = 0; i < line.length; i++) {
		const ch = line[i]
		if (ch === '"') {
			if (inQuotes && line[i + 1] === '"') {
				current += '"'
				i++
			} else {
				inQuotes = !inQuotes
			}
		} else if (ch === "," && !inQuotes) {
			result.push(current.trim())
			current = ""
		} else {
			current += ch
		}
	}
	result.push(current.trim())
	return result
}

/**
 * Header-keyed records. Header names are lowercased; quoted fields may span
 * lines. Returns null when a quoted field is never closed.
 */
function parseCsv(content: string): { header: string[]; rows: Record<string, string>[] } | null {
	const lines = content.replace(/\r\n/g, "\n").split("\n")
	const header = parseCsvLine(lines[0]).map((h) => h.toLowerCase())
	const rows: Record<string, string>[] = []

	let currentLine = ""
	for (let i = 1; i < lines.length; i++) {
		currentLine += (currentLine ? "\n" : "") + lines[i]
		// A record is complete once its quotes balance
		const quoteCount = (currentLine.match(/"/g) ?? []).length
		if (quoteCount % 2 !== 0) continue
		if (currentLine.trim()) {
			const values = parseCsvLine(currentLine)
			const row: Record<string, string> = {}
			header.forEach((h, idx) => {
				row[h] = values[idx] ?? ""
			})
			rows.push(row)
		}
		currentLine = ""
	}
	return currentLine ? null : { header, rows }
}

function parseOrdinal(raw: string | undefined, source: string, rowNumber: number): number | undefined {
	if (raw === undefined || raw.trim() === "") return undefined
	const n = Number(raw)
	if (!Number.isInteger(n)) {
		throw new SchemaLoadError(`Invalid ordinal_position '${raw}' on row ${rowNumber}`, { source })
	}
	return n
}

// ============================================================================
// Catalog
// ============================================================================

export class SchemaCatalog {
	readonly options: Readonly<CatalogOptions>
	readonly source: string
	private readonly tables: ReadonlyMap<string, TableSchema>

	private constructor(tables: Map<string, TableSchema>, options: CatalogOptions, source: string) {
		this.tables = tables
		this.options = Object.freeze({ ...options })
		this.source = source
	}

	/**
	 * Build a catalog from (table, column, type) triples.
	 * All-or-nothing: any bad triple rejects the whole source.
	 */
	static fromTriples(
		triples: readonly SchemaTriple[],
		options: Partial<CatalogOptions> = {},
		source: string = "triples",
	): SchemaCatalog {
		const resolved: CatalogOptions = { ...DEFAULT_CATALOG_OPTIONS, ...options }
		if (triples.length === 0) {
			throw new SchemaLoadError("Schema source contains no columns", { source })
		}

		const grouped = new Map<string, { name: string; columns: ColumnSchema[]; seen: Set<string> }>()
		triples.forEach((triple, index) => {
			const tableName = triple.table_name.trim()
			const columnName = triple.column_name.trim()
			if (!tableName || !columnName) {
				throw new SchemaLoadError(`Row ${index + 1} is missing a table or column name`, { source })
			}

			const key = tableName.toLowerCase()
			const entry = grouped.get(key) ?? { name: tableName, columns: [], seen: new Set<string>() }
			const columnKey = columnName.toLowerCase()
			if (entry.seen.has(columnKey)) {
				throw new SchemaLoadError(`Duplicate column ${tableName}.${columnName}`, { source, row: index + 1 })
			}
			entry.seen.add(columnKey)
			entry.columns.push({
				name: columnName,
				declared_type: triple.data_type.trim(),
				ordinal_position: triple.ordinal_position ?? entry.columns.length + 1,
			})
			grouped.set(key, entry)
		})

		const tables = new Map<string, TableSchema>()
		for (const [key, entry] of grouped) {
			const columns = Object.freeze(
				[...entry.columns].sort((a, b) => a.ordinal_position - b.ordinal_position).map((c) => Object.freeze(c)),
			)
			const reference = inferEntityReference(columns, resolved)
			tables.set(
				key,
				Object.freeze({
					name: entry.name,
					columns,
					entity_reference_style: reference.style,
					entity_reference_column: reference.column,
				}),
			)
		}

		return new SchemaCatalog(tables, resolved, source)
	}

	/**
	 * Parse CSV text with a header row: table_name, column_name, data_type
	 * and optionally ordinal_position. Extra columns are ignored.
	 */
	static fromCsv(text: string, options: Partial<CatalogOptions> = {}, source: string = "csv"): SchemaCatalog {
		if (text.trim() === "") {
			throw new SchemaLoadError("Schema source is empty", { source })
		}

		const parsed = parseCsv(text.trim())
		if (!parsed) {
			throw new SchemaLoadError("Schema source is not valid CSV: unterminated quoted field", { source })
		}
		const missing = REQUIRED_HEADERS.filter((h) => !parsed.header.includes(h))
		if (missing.length > 0) {
			throw new SchemaLoadError(`Schema source is missing columns: ${missing.join(", ")}`, { source })
		}
		if (parsed.rows.length === 0) {
			throw new SchemaLoadError("Schema source has a header but no rows", { source })
		}

		const triples = parsed.rows.map((row, index) => ({
			table_name: row.table_name ?? "",
			column_name: row.column_name ?? "",
			data_type: row.data_type ?? "",
			ordinal_position: parseOrdinal(row.ordinal_position, source, index + 1),
		}))
		return SchemaCatalog.fromTriples(triples, options, source)
	}

	/** Load a schema CSV from disk */
	static load(csvPath: string, options: Partial<CatalogOptions> = {}): SchemaCatalog {
		let text: string
		try {
			text = fs.readFileSync(csvPath, "utf-8")
		} catch (error) {
			throw new SchemaLoadError(`Cannot read schema source: ${describeError(error)}`, { source: csvPath })
		}
		return SchemaCatalog.fromCsv(text, options, csvPath)
	}

	// ------------------------------------------------------------------------
	// Lookups
	// ------------------------------------------------------------------------

	listTables(): string[] {
		return [...this.tables.values()].map((t) => t.name).sort()
	}

	get size(): number {
		return this.tables.size
	}

	/** Case-insensitive; a "database.table" name resolves to its table */
	getTable(name: string): TableSchema | undefined {
		const lower = name.trim().toLowerCase()
		const direct = this.tables.get(lower)
		if (direct) return direct
		const dot = lower.lastIndexOf(".")
		return dot >= 0 ? this.tables.get(lower.slice(dot + 1)) : undefined
	}

	hasTable(name: string): boolean {
		return this.getTable(name) !== undefined
	}

	getColumn(table: string, column: string): ColumnSchema | null {
		const schema = this.getTable(table)
		if (!schema) return null
		const lower = column.toLowerCase()
		return schema.columns.find((c) => c.name.toLowerCase() === lower) ?? null
	}

	getColumnType(table: string, column: string): string | null {
		return this.getColumn(table, column)?.declared_type ?? null
	}

	/** Tables with at least one column whose name contains the fragment */
	findTablesWithColumn(fragment: string): string[] {
		const lower = fragment.toLowerCase()
		return [...this.tables.values()]
			.filter((t) => t.columns.some((c) => c.name.toLowerCase().includes(lower)))
			.map((t) => t.name)
			.sort()
	}

	/**
	 * Tables with an entity reference column, sorted by name.
	 * Structural only: no sampling happens here.
	 */
	findEntityScopedTables(): readonly TableSchema[] {
		return Object.freeze(
			[...this.tables.values()]
				.filter((t) => t.entity_reference_style !== "none")
				.sort((a, b) => a.name.localeCompare(b.name)),
		)
	}

	qualifiedName(table: TableSchema): string {
		return this.options.database ? `${this.options.database}.${table.name}` : table.name
	}

	// ------------------------------------------------------------------------
	// Query synthesis
	// ------------------------------------------------------------------------

	/**
	 * COUNT(*) of one entity's rows in a table.
	 * Returns null when the table is unknown or has no entity reference column:
	 * callers treat that as "not applicable".
	 */
	generateCountQuery(table: string, entityId: string): string | null {
		const schema = this.getTable(table)
		if (!schema || schema.entity_reference_style === "none" || !schema.entity_reference_column) {
			return null
		}

		const value = schema.entity_reference_style === "prefixed-reference"
			? `${this.options.referencePrefix}${entityId}`
			: entityId

		return `SELECT COUNT(*) AS count FROM ${this.qualifiedName(schema)} WHERE ${quoteIdentifier(schema.entity_reference_column)} = ${quoteLiteral(value)}`
	}

	/** DISTINCT non-null values of one column; null for unknown table or column */
	generateSampleQuery(table: string, column: string, limit: number = this.options.sampleLimit): string | null {
		const schema = this.getTable(table)
		if (!schema) return null
		const col = this.getColumn(schema.name, column)
		if (!col) return null

		const n = Math.max(1, Math.floor(limit))
		const ident = quoteIdentifier(col.name)
		return `SELECT DISTINCT ${ident} FROM ${this.qualifiedName(schema)} WHERE ${ident} IS NOT NULL LIMIT ${n}`
	}

	/**
	 * Advisory: columns that look date-like by name (or are declared as a
	 * date/time type). Null when the table is unknown.
	 */
	identifyDateColumns(table: string): string[] | null {
		const schema = this.getTable(table)
		if (!schema) return null

		return schema.columns
			.filter((col) => {
				if (DATE_TYPE_PATTERN.test(col.declared_type)) return true
				const lower = col.name.toLowerCase()
				if (this.options.identifierSuffixes.some((s) => lower.endsWith(s.toLowerCase()))) return false
				return matchesDateVocabulary(col.name, this.options.dateVocabulary)
			})
			.map((col) => col.name)
	}

	getTableSummary(table: string): TableSummary | null {
		const schema = this.getTable(table)
		if (!schema) return null
		return {
			table_name: schema.name,
			column_count: schema.columns.length,
			columns: schema.columns.map((c) => c.name),
			date_columns: this.identifyDateColumns(schema.name) ?? [],
			entity_reference_style: schema.entity_reference_style,
			entity_reference_column: schema.entity_reference_column,
		}
	}
}

// ============================================================================
// Live database source
// ============================================================================

/**
 * Build a catalog from a live PostgreSQL database's information_schema.
 */
export async function loadSchemaCatalogFromDatabase(
	pool: PgPoolLike,
	schemas: string[] = ["public"],
	options: Partial<CatalogOptions> = {},
): Promise<SchemaCatalog> {
	const query = `
		SELECT
			c.table_name,
			c.column_name,
			c.data_type,
			c.ordinal_position
		FROM information_schema.columns c
		WHERE c.table_schema = ANY($1)
		ORDER BY c.table_schema, c.table_name, c.ordinal_position
	`

	const client = await pool.connect().catch((error: unknown) => {
		throw new SchemaLoadError(`Cannot connect to schema source: ${describeError(error)}`, { schemas })
	})

	try {
		const result = await client.query(query, [schemas]).catch((error: unknown) => {
			throw new SchemaLoadError(`information_schema query failed: ${describeError(error)}`, { schemas })
		})

		const triples: SchemaTriple[] = []
		for (const row of result.rows) {
			if (row === null || typeof row !== "object") continue
			const record: Record<string, unknown> = { ...row }
			const ordinal = Number(record.ordinal_position)
			triples.push({
				table_name: String(record.table_name ?? ""),
				column_name: String(record.column_name ?? ""),
				data_type: String(record.data_type ?? ""),
				ordinal_position: Number.isInteger(ordinal) ? ordinal : undefined,
			})
		}

		return SchemaCatalog.fromTriples(triples, options, `information_schema:${schemas.join(",")}`)
	} finally {
		client.release()
	}
}
