/**
 * Query Failure Investigator
 *
 * Given a failed query and the engine's error text:
 * 1. Classify the error
 * 2. Resolve the implicated fields from the query text
 * 3. Sample the stored values of those fields (date and type failures)
 * 4. Analyze value shapes (date failures)
 * 5. Synthesize a fix and score it
 *
 * Investigation never throws: executor failures while sampling degrade the
 * report to "no sample available", and anything unexpected is logged and
 * reported as an investigation without a fix.
 */

import type { ReasoningConfig } from "./config/loadConfig.js"
import { describeError } from "./errors.js"
import { withLogContext } from "./logger.js"
import type { Logger } from "./logger.js"
import { buildColumnCandidates } from "./column_matching.js"
import { analyzeFormats, classifyDateShape, renderFallbackChain, sortShapes } from "./date_formats.js"
import {
	classifyError,
	extractExpectedSignature,
	extractFunctionName,
	extractOffendingLiteral,
	parseUndefinedColumn,
} from "./error_classifier.js"
import { cellToString, executeWithTimeout, outcomeErrorText } from "./query_executor.js"
import type { QueryExecutor, QueryRow } from "./query_executor.js"
import type {
	ColumnCandidate,
	DateShape,
	ErrorKind,
	FailureReport,
	FormatAnalysis,
	ImplicatedField,
	ReferenceStyleConfirmation,
	SampleStatus,
	SqlDialect,
	TableSchema,
} from "./reasoning_types.js"
import type { SchemaCatalog } from "./schema_catalog.js"
import {
	detectUnsupportedShape,
	extractTableRefs,
	findCallExpressions,
	findQualifiedColumnRefs,
	mentionsBareColumn,
	splitCastArgument,
	unwrapFieldArgument,
} from "./sql_analysis.js"
import type { CallArgument, CallExpression, FieldReference, TableRef } from "./sql_analysis.js"

// ============================================================================
// Configuration
// ============================================================================

export interface InvestigatorOptions {
	dialect: SqlDialect
	/** Used when investigate() is called without a threshold */
	autoFixThreshold: number
	minSamples: number
	thinSamplePenalty: number
	ambiguityPenalty: number
	maxAmbiguityPenalty: number
	unknownColumnConfidenceCap: number
	/** Maximum distinct fields sampled per investigation */
	maxFields: number
	sampleTimeoutMs: number
}

export const DEFAULT_INVESTIGATOR_OPTIONS: InvestigatorOptions = {
	dialect: "postgres",
	autoFixThreshold: 0.8,
	minSamples: 5,
	thinSamplePenalty: 0.15,
	ambiguityPenalty: 0.1,
	maxAmbiguityPenalty: 0.3,
	unknownColumnConfidenceCap: 0.6,
	maxFields: 3,
	sampleTimeoutMs: 30000,
}

export function investigatorOptionsFromConfig(config: ReasoningConfig): InvestigatorOptions {
	return {
		dialect: config.investigation.dialect,
		autoFixThreshold: config.orchestrator.auto_fix_threshold,
		minSamples: config.investigation.min_samples,
		thinSamplePenalty: config.investigation.thin_sample_penalty,
		ambiguityPenalty: config.investigation.ambiguity_penalty,
		maxAmbiguityPenalty: config.investigation.max_ambiguity_penalty,
		unknownColumnConfidenceCap: config.investigation.unknown_column_confidence_cap,
		maxFields: config.investigation.max_fields,
		sampleTimeoutMs: config.orchestrator.query_timeout_ms,
	}
}

const BASE_CONFIDENCE = {
	multi_format_date: 0.9,
	single_format_date: 0.75,
	unsampled_date: 0.4,
	type_mismatch: 0.7,
}

/** Functions whose first argument is a stored date/time string */
const DATE_FUNCTIONS = new Set([
	"date_parse",
	"parse_datetime",
	"from_iso8601_timestamp",
	"from_iso8601_date",
	"date",
	"to_date",
	"to_timestamp",
	"cast",
	"try_cast",
])

/** Functions that yield a date rather than a timestamp */
const DATE_RESULT_FUNCTIONS = new Set(["date", "to_date", "from_iso8601_date"])

/**
 * Argument types for functions whose errors omit the expected signature.
 * null = argument is not type-constrained. "number"/"string" are rendered per dialect.
 */
const FUNCTION_ARG_TYPES: Record<string, readonly (string | null)[]> = {
	date_trunc: [null, "timestamp"],
	date_part: [null, "timestamp"],
	date_format: ["timestamp", null],
	to_char: ["timestamp", null],
	year: ["timestamp"],
	month: ["timestamp"],
	day: ["timestamp"],
	day_of_week: ["timestamp"],
	date_add: [null, null, "timestamp"],
	date_diff: [null, "timestamp", "timestamp"],
	round: ["number", null],
	abs: ["number"],
	length: ["string"],
	lower: ["string"],
	upper: ["string"],
	trim: ["string"],
	substr: ["string", null, null],
	substring: ["string", null, null],
}

// ============================================================================
// Types
// ============================================================================

interface FieldCandidate {
	field: ImplicatedField
	/** Column expression the fix parses or casts */
	reference: FieldReference
	call: CallExpression
	argument: CallArgument
	expectedType: string | null
}

type SampleResult = { status: "sampled"; values: string[] } | { status: "unavailable"; reason: string }

type ReportDraft = Pick<FailureReport, "query_id" | "query_text" | "error_text" | "error_kind" | "explanation"> &
	Partial<
		Pick<
			FailureReport,
			| "implicated_fields"
			| "sample_values"
			| "sample_status"
			| "format_analysis"
			| "proposed_fix"
			| "fix_target"
			| "fix_candidates"
			| "confidence"
		>
	>

// ============================================================================
// Helpers
// ============================================================================

function fieldKey(field: ImplicatedField): string {
	return `${field.alias}.${field.column}`
}

function roundConfidence(value: number): number {
	return Math.round(Math.min(1, Math.max(0, value)) * 100) / 100
}

function renderType(type: string, dialect: SqlDialect): string {
	if (type === "number") return dialect === "trino" ? "double" : "numeric"
	if (type === "string") return "varchar"
	return type
}

function rowValue(row: QueryRow, column: string): unknown {
	const lower = column.toLowerCase()
	const key = Object.keys(row).find((k) => k.toLowerCase() === lower) ?? Object.keys(row)[0]
	return key === undefined ? null : row[key]
}

/** Rewrite one argument of a call, keeping the rest of the call text as written */
function replaceArgument(call: CallExpression, argument: CallArgument, replacement: string): string {
	const offset = argument.start - call.start
	return call.text.slice(0, offset) + replacement + call.text.slice(offset + argument.text.length)
}

function mentionsColumn(errorText: string, column: string): boolean {
	return new RegExp(`\\b${column.replace(/[^\w]/g, "")}\\b`, "i").test(errorText)
}

function finish(draft: ReportDraft, threshold: number): FailureReport {
	const proposedFix = draft.proposed_fix ?? null
	const confidence = proposedFix === null ? 0 : roundConfidence(draft.confidence ?? 0)
	return Object.freeze({
		query_id: draft.query_id,
		query_text: draft.query_text,
		error_text: draft.error_text,
		error_kind: draft.error_kind,
		implicated_fields: draft.implicated_fields ?? [],
		sample_values: draft.sample_values ?? {},
		sample_status: draft.sample_status ?? "not_applicable",
		format_analysis: draft.format_analysis ?? null,
		proposed_fix: proposedFix,
		fix_target: proposedFix === null ? null : draft.fix_target ?? null,
		fix_candidates: draft.fix_candidates ?? [],
		confidence,
		auto_fixable: proposedFix !== null && confidence > threshold,
		explanation: draft.explanation,
		investigated_at: new Date().toISOString(),
	})
}

// ============================================================================
// Investigator
// ============================================================================

export class QueryFailureInvestigator {
	private catalog: SchemaCatalog
	private executor: QueryExecutor
	private logger: Logger
	readonly options: Readonly<InvestigatorOptions>

	constructor(
		catalog: SchemaCatalog,
		executor: QueryExecutor,
		logger: Logger,
		options: Partial<InvestigatorOptions> = {},
	) {
		this.catalog = catalog
		this.executor = executor
		this.logger = logger
		this.options = Object.freeze({ ...DEFAULT_INVESTIGATOR_OPTIONS, ...options })
	}

	async investigate(
		queryId: string,
		queryText: string,
		errorText: string,
		autoFixThreshold: number = this.options.autoFixThreshold,
	): Promise<FailureReport> {
		const log = withLogContext(this.logger, { query_id: queryId })
		const kind = classifyError(errorText)
		const base = { query_id: queryId, query_text: queryText, error_text: errorText, error_kind: kind }

		log.info("Investigating query failure", { error_kind: kind })

		try {
			const report = await this.dispatch(base, kind, autoFixThreshold)
			log.info("Investigation complete", {
				error_kind: report.error_kind,
				confidence: report.confidence,
				auto_fixable: report.auto_fixable,
				fields: report.implicated_fields.length,
			})
			return report
		} catch (error) {
			log.error("Investigation failed", { error: describeError(error) })
			return finish({ ...base, explanation: `Investigation failed: ${describeError(error)}` }, autoFixThreshold)
		}
	}

	/** The report recorded for a query that timed out: nothing to investigate */
	buildTimeoutReport(queryId: string, queryText: string, elapsedMs: number): FailureReport {
		return finish(
			{
				query_id: queryId,
				query_text: queryText,
				error_text: `Query timed out after ${elapsedMs}ms`,
				error_kind: "timeout",
				explanation: `Query timed out after ${elapsedMs}ms; no error text to investigate and timeouts are not retried`,
			},
			this.options.autoFixThreshold,
		)
	}

	/** The report recorded when a query still fails after the last permitted fix */
	buildRetryLimitReport(queryId: string, queryText: string, errorText: string, maxRetryDepth: number): FailureReport {
		return finish(
			{
				query_id: queryId,
				query_text: queryText,
				error_text: errorText,
				error_kind: classifyError(errorText),
				explanation: `Still failing after ${maxRetryDepth} automatic fix attempt(s); retry limit reached, not investigated further`,
			},
			this.options.autoFixThreshold,
		)
	}

	private async dispatch(
		base: Pick<FailureReport, "query_id" | "query_text" | "error_text" | "error_kind">,
		kind: ErrorKind,
		threshold: number,
	): Promise<FailureReport> {
		const unsupported = this.unsupportedShapeReport(base, threshold)
		const tableRefs = extractTableRefs(base.query_text)

		switch (kind) {
			case "unclassified":
				return finish({ ...base, explanation: "Error text matched no known failure pattern; manual review needed" }, threshold)
			case "syntax_error":
				return finish({ ...base, explanation: "Syntax errors are not repaired automatically" }, threshold)
			case "timeout":
				return finish(
					{ ...base, explanation: "Engine reported a timeout; timeouts are not investigated or retried" },
					threshold,
				)
			case "date_format_mismatch":
				return unsupported ?? this.investigateDate(base, tableRefs, threshold)
			case "type_mismatch":
				return unsupported ?? this.investigateType(base, tableRefs, threshold)
			case "unknown_column":
				return unsupported ?? this.investigateUnknownColumn(base, tableRefs, threshold)
		}
	}

	private unsupportedShapeReport(
		base: Pick<FailureReport, "query_id" | "query_text" | "error_text" | "error_kind">,
		threshold: number,
	): FailureReport | null {
		const shape = detectUnsupportedShape(base.query_text)
		if (!shape) return null
		return finish(
			{
				...base,
				explanation: `Query shape not supported for field resolution (${shape}); classified as ${base.error_kind} without a fix`,
			},
			threshold,
		)
	}

	// ------------------------------------------------------------------------
	// Field resolution
	// ------------------------------------------------------------------------

	private resolveTable(reference: FieldReference, tableRefs: TableRef[]): { alias: string; table: string } | null {
		if (reference.qualifier !== null) {
			const ref = tableRefs.find((r) => r.alias === reference.qualifier || r.table === reference.qualifier)
			return ref ? { alias: reference.qualifier, table: ref.table } : null
		}

		if (tableRefs.length === 1) {
			return { alias: tableRefs[0].alias, table: tableRefs[0].table }
		}

		const owners = tableRefs.filter((r) => this.catalog.getColumn(r.table, reference.column) !== null)
		return owners.length === 1 ? { alias: owners[0].alias, table: owners[0].table } : null
	}

	private candidateFromArgument(
		call: CallExpression,
		argument: CallArgument,
		reference: FieldReference | null,
		tableRefs: TableRef[],
		expectedType: string | null,
	): FieldCandidate | null {
		if (!reference) return null
		const resolved = this.resolveTable(reference, tableRefs)
		if (!resolved) return null
		return {
			field: {
				alias: resolved.alias,
				table: resolved.table,
				column: reference.column,
				function_name: call.name,
				call_text: call.text,
			},
			reference,
			call,
			argument,
			expectedType,
		}
	}

	/**
	 * Keep the strongest candidates: those whose samples hold the echoed
	 * literal, else those whose column the error names, else all.
	 * Returns the group and how many other distinct fields share the top rank.
	 */
	private rankCandidates(
		candidates: FieldCandidate[],
		errorText: string,
		samples: Map<string, SampleResult>,
		literal: string | null,
	): { primary: FieldCandidate; ambiguity: number } {
		const strength = (c: FieldCandidate): number => {
			const sample = samples.get(fieldKey(c.field))
			if (literal !== null && sample?.status === "sampled" && sample.values.some((v) => v.trim() === literal.trim())) {
				return 2
			}
			return mentionsColumn(errorText, c.field.column) ? 1 : 0
		}

		const top = Math.max(...candidates.map(strength))
		const group = candidates.filter((c) => strength(c) === top)
		const distinctFields = new Set(group.map((c) => fieldKey(c.field)))
		return { primary: group[0], ambiguity: distinctFields.size - 1 }
	}

	private limitFields(candidates: FieldCandidate[], errorText: string): FieldCandidate[] {
		// Fields named in the error text are sampled first
		const ordered = [
			...candidates.filter((c) => mentionsColumn(errorText, c.field.column)),
			...candidates.filter((c) => !mentionsColumn(errorText, c.field.column)),
		]
		const keys: string[] = []
		for (const c of ordered) {
			const key = fieldKey(c.field)
			if (!keys.includes(key) && keys.length < this.options.maxFields) keys.push(key)
		}
		return candidates.filter((c) => keys.includes(fieldKey(c.field)))
	}

	private ambiguityPenalty(ambiguity: number): number {
		return Math.min(this.options.maxAmbiguityPenalty, this.options.ambiguityPenalty * ambiguity)
	}

	// ------------------------------------------------------------------------
	// Sampling
	// ------------------------------------------------------------------------

	private async sampleField(field: ImplicatedField): Promise<SampleResult> {
		const query = this.catalog.generateSampleQuery(field.table, field.column)
		if (!query) {
			return { status: "unavailable", reason: `${field.table}.${field.column} is not in the schema catalog` }
		}

		try {
			const outcome = await executeWithTimeout(this.executor, query, this.options.sampleTimeoutMs, this.logger)
			if (outcome.status !== "ok") {
				this.logger.warn("Sampling query failed", { field: fieldKey(field), error: outcomeErrorText(outcome) })
				return { status: "unavailable", reason: outcomeErrorText(outcome) }
			}

			const values: string[] = []
			for (const row of outcome.rows) {
				const value = cellToString(rowValue(row, field.column))
				if (value !== null && !values.includes(value)) values.push(value)
				if (values.length >= this.catalog.options.sampleLimit) break
			}
			return { status: "sampled", values }
		} catch (error) {
			this.logger.warn("Sampling threw", { field: fieldKey(field), error: describeError(error) })
			return { status: "unavailable", reason: describeError(error) }
		}
	}

	private async sampleCandidates(candidates: FieldCandidate[]): Promise<Map<string, SampleResult>> {
		const samples = new Map<string, SampleResult>()
		for (const c of candidates) {
			const key = fieldKey(c.field)
			if (!samples.has(key)) samples.set(key, await this.sampleField(c.field))
		}
		return samples
	}

	private summarizeSamples(samples: Map<string, SampleResult>): {
		sample_values: Record<string, string[]>
		sample_status: SampleStatus
	} {
		const sampleValues: Record<string, string[]> = {}
		let anySampled = false
		for (const [key, result] of samples) {
			if (result.status === "sampled") {
				sampleValues[key] = result.values
				anySampled = true
			}
		}
		return { sample_values: sampleValues, sample_status: anySampled ? "sampled" : "unavailable" }
	}

	// ------------------------------------------------------------------------
	// Date/time format mismatch
	// ------------------------------------------------------------------------

	private dateCandidates(queryText: string, tableRefs: TableRef[]): FieldCandidate[] {
		const candidates: FieldCandidate[] = []
		const seenCalls = new Set<string>()

		for (const call of findCallExpressions(queryText, DATE_FUNCTIONS)) {
			if (seenCalls.has(call.text) || call.args.length === 0) continue
			const argument = call.args[0]

			let reference: FieldReference | null
			if (call.name === "cast" || call.name === "try_cast") {
				const cast = splitCastArgument(argument.text)
				if (!cast || !/^(date|time|timestamp)/.test(cast.targetType)) continue
				reference = unwrapFieldArgument(cast.operand)
			} else {
				reference = unwrapFieldArgument(argument.text)
			}

			const candidate = this.candidateFromArgument(call, argument, reference, tableRefs, null)
			if (candidate) {
				seenCalls.add(call.text)
				candidates.push(candidate)
			}
		}

		return candidates
	}

	private dateFix(candidate: FieldCandidate, shapes: DateShape[]): string {
		const chain = renderFallbackChain(candidate.reference.expression, shapes, this.options.dialect)
		const call = candidate.call
		const castTarget = call.name === "cast" || call.name === "try_cast" ? splitCastArgument(candidate.argument.text)?.targetType : null
		const yieldsDate = DATE_RESULT_FUNCTIONS.has(call.name) || (castTarget?.startsWith("date") ?? false)
		return yieldsDate ? `CAST(${chain} AS date)` : chain
	}

	private async investigateDate(
		base: Pick<FailureReport, "query_id" | "query_text" | "error_text" | "error_kind">,
		tableRefs: TableRef[],
		threshold: number,
	): Promise<FailureReport> {
		const all = this.dateCandidates(base.query_text, tableRefs)
		if (all.length === 0) {
			return finish(
				{ ...base, explanation: "No date/time conversion over a resolvable column was found in the query" },
				threshold,
			)
		}

		const candidates = this.limitFields(all, base.error_text)
		const literal = extractOffendingLiteral(base.error_text)
		const samples = await this.sampleCandidates(candidates)
		const { primary, ambiguity } = this.rankCandidates(candidates, base.error_text, samples, literal)
		const summary = this.summarizeSamples(samples)
		const implicated = candidates.map((c) => c.field)
		const sample = samples.get(fieldKey(primary.field))
		const literalShape = literal !== null ? classifyDateShape(literal) : null

		// Nothing to look at: a generic parse, or one of the echoed value's shape
		if (sample?.status !== "sampled" || sample.values.length === 0) {
			const shapes: DateShape[] = literalShape ? [literalShape] : []
			return finish(
				{
					...base,
					...summary,
					implicated_fields: implicated,
					proposed_fix: this.dateFix(primary, shapes),
					fix_target: primary.call.text,
					confidence: BASE_CONFIDENCE.unsampled_date - this.ambiguityPenalty(ambiguity),
					explanation: `No sample available for ${fieldKey(primary.field)}; proposing a ${
						shapes.length ? shapes[0] : "generic timestamp"
					} parse`,
				},
				threshold,
			)
		}

		const analysis = this.withLiteralShape(analyzeFormats(sample.values), literalShape)
		if (analysis.detected_formats.length === 0) {
			return finish(
				{
					...base,
					...summary,
					implicated_fields: implicated,
					format_analysis: analysis,
					explanation: `Sampled values of ${fieldKey(primary.field)} match no known date/time shape`,
				},
				threshold,
			)
		}

		const multi = analysis.has_multiple_formats
		let confidence = multi ? BASE_CONFIDENCE.multi_format_date : BASE_CONFIDENCE.single_format_date
		if (sample.values.length < this.options.minSamples) confidence -= this.options.thinSamplePenalty
		confidence -= this.ambiguityPenalty(ambiguity)

		return finish(
			{
				...base,
				...summary,
				implicated_fields: implicated,
				format_analysis: analysis,
				proposed_fix: this.dateFix(primary, analysis.detected_formats),
				fix_target: primary.call.text,
				confidence,
				explanation: multi
					? `${fieldKey(primary.field)} mixes ${analysis.detected_formats.length} date/time shapes (${analysis.detected_formats.join(
							", ",
					  )}); parse each in turn`
					: `${fieldKey(primary.field)} holds ${analysis.detected_formats[0]} values; parse that shape explicitly`,
			},
			threshold,
		)
	}

	private withLiteralShape(analysis: FormatAnalysis, literalShape: DateShape | null): FormatAnalysis {
		if (!literalShape || analysis.detected_formats.includes(literalShape)) return analysis
		const detected = sortShapes([...analysis.detected_formats, literalShape])
		return { ...analysis, detected_formats: detected, has_multiple_formats: detected.length > 1 }
	}

	// ------------------------------------------------------------------------
	// Type mismatch
	// ------------------------------------------------------------------------

	private async investigateType(
		base: Pick<FailureReport, "query_id" | "query_text" | "error_text" | "error_kind">,
		tableRefs: TableRef[],
		threshold: number,
	): Promise<FailureReport> {
		const fnName = extractFunctionName(base.error_text)
		if (!fnName) {
			return finish({ ...base, explanation: "Type mismatch without a named function; no cast target known" }, threshold)
		}

		const signature = extractExpectedSignature(base.error_text)
		const all: FieldCandidate[] = []
		for (const call of findCallExpressions(base.query_text, new Set([fnName]))) {
			call.args.forEach((argument, index) => {
				const expected = signature?.[index] ?? FUNCTION_ARG_TYPES[fnName]?.[index] ?? null
				if (!expected) return
				const candidate = this.candidateFromArgument(
					call,
					argument,
					unwrapFieldArgument(argument.text),
					tableRefs,
					expected,
				)
				if (candidate) all.push(candidate)
			})
		}

		if (all.length === 0) {
			return finish(
				{ ...base, explanation: `No column argument of ${fnName}() could be resolved to a table` },
				threshold,
			)
		}

		const candidates = this.limitFields(all, base.error_text)
		const samples = await this.sampleCandidates(candidates)
		const { primary, ambiguity } = this.rankCandidates(candidates, base.error_text, samples, null)
		const sample = samples.get(fieldKey(primary.field))
		const sampleCount = sample?.status === "sampled" ? sample.values.length : 0
		const targetType = renderType(primary.expectedType ?? "varchar", this.options.dialect)

		let confidence = BASE_CONFIDENCE.type_mismatch
		if (sampleCount < this.options.minSamples) confidence -= this.options.thinSamplePenalty
		confidence -= this.ambiguityPenalty(ambiguity)

		return finish(
			{
				...base,
				...this.summarizeSamples(samples),
				implicated_fields: candidates.map((c) => c.field),
				proposed_fix: replaceArgument(primary.call, primary.argument, `CAST(${primary.argument.text} AS ${targetType})`),
				fix_target: primary.call.text,
				confidence,
				explanation: `${fnName}() expects ${targetType} for ${fieldKey(primary.field)}; cast it explicitly`,
			},
			threshold,
		)
	}

	// ------------------------------------------------------------------------
	// Unknown column
	// ------------------------------------------------------------------------

	private async investigateUnknownColumn(
		base: Pick<FailureReport, "query_id" | "query_text" | "error_text" | "error_kind">,
		tableRefs: TableRef[],
		threshold: number,
	): Promise<FailureReport> {
		const parsed = parseUndefinedColumn(base.error_text)
		if (!parsed) {
			return finish({ ...base, explanation: "Could not parse the unresolved column from the error text" }, threshold)
		}

		const column = parsed.column
		const hint = parsed.tableHint?.toLowerCase()
		const hintTable = hint ? tableRefs.find((r) => r.alias === hint || r.table === hint)?.table : undefined

		// Qualified references to the missing column, one per qualifier
		const targets: { field: ImplicatedField; text: string; qualifier: string | null }[] = []
		for (const ref of findQualifiedColumnRefs(base.query_text)) {
			if (ref.column.toLowerCase() !== column.toLowerCase()) continue
			if (hint && ref.qualifier !== hint) continue
			if (targets.some((t) => t.qualifier === ref.qualifier)) continue
			const resolved = this.resolveTable({ qualifier: ref.qualifier, column, expression: ref.text }, tableRefs)
			if (!resolved) continue
			targets.push({
				field: { alias: resolved.alias, table: resolved.table, column, function_name: null, call_text: null },
				text: ref.text,
				qualifier: ref.text.slice(0, ref.text.indexOf(".")),
			})
		}

		// A single-table query may name the column bare
		if (targets.length === 0 && tableRefs.length === 1 && mentionsBareColumn(base.query_text, column)) {
			const only = tableRefs[0]
			targets.push({
				field: { alias: only.alias, table: only.table, column, function_name: null, call_text: null },
				text: column,
				qualifier: null,
			})
		}

		const searchTables = this.tablesFor(targets.length ? targets.map((t) => t.field.table) : tableRefs.map((r) => r.table))
		const candidates = buildColumnCandidates(searchTables, column, hintTable)
		const implicated = targets.map((t) => t.field)

		if (targets.length === 0 || candidates.length === 0) {
			return finish(
				{
					...base,
					implicated_fields: implicated,
					fix_candidates: candidates,
					explanation:
						candidates.length === 0
							? `No column resembling '${column}' exists in the queried tables`
							: `'${column}' could not be tied to one table reference; see fix_candidates`,
				},
				threshold,
			)
		}

		const primary = targets[0]
		const inTable = candidates.filter((c) => c.table_name.toLowerCase() === primary.field.table.toLowerCase())
		const best: ColumnCandidate | undefined = inTable[0]
		if (!best) {
			return finish(
				{
					...base,
					implicated_fields: implicated,
					fix_candidates: candidates,
					explanation: `No column resembling '${column}' exists in ${primary.field.table}`,
				},
				threshold,
			)
		}

		const ties = inTable.filter((c) => c.match_score === best.match_score).length - 1
		const ambiguity = targets.length - 1 + ties
		const confidence =
			Math.min(best.match_score, this.options.unknownColumnConfidenceCap) - this.ambiguityPenalty(ambiguity)

		return finish(
			{
				...base,
				implicated_fields: implicated,
				fix_candidates: candidates,
				proposed_fix: primary.qualifier ? `${primary.qualifier}.${best.column_name}` : best.column_name,
				fix_target: primary.text,
				confidence,
				explanation: `'${column}' does not exist in ${primary.field.table}; nearest column is '${best.column_name}' (${best.match_type})`,
			},
			threshold,
		)
	}

	private tablesFor(names: string[]): TableSchema[] {
		const tables: TableSchema[] = []
		for (const name of names) {
			const table = this.catalog.getTable(name)
			if (table && !tables.includes(table)) tables.push(table)
		}
		return tables
	}

	// ------------------------------------------------------------------------
	// Reference style confirmation
	// ------------------------------------------------------------------------

	/**
	 * Sample a table's entity reference column and compare the stored value
	 * shape against the structural guess. Null for unknown or unscoped tables.
	 */
	async confirmReferenceStyle(table: string): Promise<ReferenceStyleConfirmation | null> {
		const schema = this.catalog.getTable(table)
		if (!schema || !schema.entity_reference_column) return null

		const field: ImplicatedField = {
			alias: schema.name,
			table: schema.name,
			column: schema.entity_reference_column,
			function_name: null,
			call_text: null,
		}
		const sample = await this.sampleField(field)
		const inferred = schema.entity_reference_style

		if (sample.status !== "sampled" || sample.values.length === 0) {
			return {
				table: schema.name,
				column: field.column,
				inferred_style: inferred,
				observed_style: "unknown",
				consistent: false,
				sample_count: 0,
			}
		}

		const prefix = this.catalog.options.referencePrefix
		const prefixed = sample.values.filter((v) => v.startsWith(prefix)).length
		const observed =
			prefixed === sample.values.length ? "prefixed-reference" : prefixed === 0 ? "bare-id" : "mixed"

		if (observed !== inferred) {
			this.logger.warn("Entity reference style differs from structural guess", {
				table: schema.name,
				inferred,
				observed,
			})
		}

		return {
			table: schema.name,
			column: field.column,
			inferred_style: inferred,
			observed_style: observed,
			consistent: observed === inferred,
			sample_count: sample.values.length,
		}
	}
}
