/**
 * Reasoning Orchestrator
 *
 * Per-entity control loop:
 * - executeWithInvestigation: run a query, investigate failures, apply
 *   auto-fixable fixes and retry up to a hard depth cap
 * - assessCompleteness / attemptGapFilling / runGapFilling: compare extracted
 *   record counts with live counts and request targeted re-extraction for
 *   the shortfall until coverage is complete, the cycle cap is hit, or a
 *   cycle resolves nothing
 *
 * One instance per entity and run. The catalog and investigator may be shared;
 * the orchestrator's own state (raw count cache, manual review queue) may not.
 */

import { v4 as uuidv4 } from "uuid"
import { ConfigError, QueryExecutionError, describeError } from "./errors.js"
import { withLogContext } from "./logger.js"
import type { Logger } from "./logger.js"
import type { QueryFailureInvestigator } from "./failure_investigator.js"
import { cellToString, executeWithTimeout, outcomeErrorText } from "./query_executor.js"
import type { QueryExecutor, QueryRow } from "./query_executor.js"
import type {
	CountFailure,
	CoverageAssessment,
	CoverageGap,
	FailureReport,
	GapFillingCycle,
	GapFillingRun,
	GapFillingTermination,
	GapPriority,
	ManualReviewItem,
	TableCoverage,
} from "./reasoning_types.js"
import type { ReportSink } from "./report_writer.js"
import type { SchemaCatalog } from "./schema_catalog.js"
import { escapeRegex } from "./sql_analysis.js"

// ============================================================================
// Collaborators
// ============================================================================

export interface GapRequest {
	entity_id: string
	table: string
	field: string
	event_reference: string | null
	priority: GapPriority
	missing_count: number
}

export type GapExtractionResult = { status: "found"; value: unknown } | { status: "not_found" }

/** Targeted re-extraction (document retrieval and prompting live elsewhere) */
export interface GapExtractor {
	extract(request: GapRequest): Promise<GapExtractionResult>
}

/** Where extracted values live; counts are keyed by table name */
export interface ExtractedDataStore {
	counts(): Promise<Record<string, number>>
	merge(gap: CoverageGap, value: unknown): Promise<void>
}

/** First rule whose `match` occurs in the table name decides field and priority */
export interface GapPriorityRule {
	match: string
	field: string
	priority: GapPriority
}

// ============================================================================
// Options & Results
// ============================================================================

export interface OrchestratorOptions {
	entityId: string
	autoFixThreshold: number
	maxRetryDepth: number
	queryTimeoutMs: number
	maxCycles: number
	maxGapsPerCycle: number
	gapPriorities: GapPriorityRule[]
}

export interface OrchestratorDeps {
	catalog: SchemaCatalog
	investigator: QueryFailureInvestigator
	executor: QueryExecutor
	extractor: GapExtractor
	store: ExtractedDataStore
	reports: ReportSink
	logger: Logger
}

export type ExecutionStatus = "ok" | "failed" | "timeout"

export interface ExecutionResult {
	status: ExecutionStatus
	rows: QueryRow[]
	/** Query text of the last attempt, with any applied fixes */
	final_query: string
	attempts: number
	reports: FailureReport[]
	manual_review: ManualReviewItem | null
}

const PRIORITY_RANK: Record<GapPriority, number> = {
	highest: 0,
	high: 1,
	medium: 2,
	low: 3,
}

const DEFAULT_GAP_FIELD = "records"

type RawCount = { status: "ok"; count: number } | { status: "failed"; error_text: string }

// ============================================================================
// Helpers
// ============================================================================

/**
 * Replace every standalone occurrence of `target` in the query.
 * Occurrences inside longer identifiers or qualified names are left alone.
 */
export function applyFix(queryText: string, target: string, replacement: string): string {
	const pattern = new RegExp(`(?<![\\w.])${escapeRegex(target)}(?![\\w])`, "g")
	return queryText.replace(pattern, () => replacement)
}

function validateOptions(options: OrchestratorOptions): void {
	if (!options.entityId.trim()) {
		throw new ConfigError("Orchestrator needs a non-empty entity id")
	}
	if (!(options.autoFixThreshold >= 0 && options.autoFixThreshold <= 1)) {
		throw new ConfigError("autoFixThreshold must be within [0, 1]", { value: options.autoFixThreshold })
	}
	if (!Number.isInteger(options.maxRetryDepth) || options.maxRetryDepth < 0) {
		throw new ConfigError("maxRetryDepth must be a non-negative integer", { value: options.maxRetryDepth })
	}
	if (!(options.queryTimeoutMs > 0)) {
		throw new ConfigError("queryTimeoutMs must be positive", { value: options.queryTimeoutMs })
	}
	if (!Number.isInteger(options.maxCycles) || options.maxCycles < 1) {
		throw new ConfigError("maxCycles must be a positive integer", { value: options.maxCycles })
	}
	if (!Number.isInteger(options.maxGapsPerCycle) || options.maxGapsPerCycle < 1) {
		throw new ConfigError("maxGapsPerCycle must be a positive integer", { value: options.maxGapsPerCycle })
	}
}

function round2(value: number): number {
	return Math.round(value * 100) / 100
}

// ============================================================================
// Orchestrator
// ============================================================================

export class ReasoningOrchestrator {
	readonly runId: string
	readonly options: Readonly<OrchestratorOptions>
	private deps: OrchestratorDeps
	private log: Logger

	private querySeq = 0
	private rawCounts = new Map<string, RawCount>()
	/** High-water mark of extracted counts per table */
	private extractedCounts = new Map<string, number>()
	private manualReview: ManualReviewItem[] = []
	private gapsAttempted = 0

	constructor(deps: OrchestratorDeps, options: OrchestratorOptions) {
		validateOptions(options)
		this.deps = deps
		this.options = Object.freeze({ ...options, gapPriorities: [...options.gapPriorities] })
		this.runId = uuidv4()
		this.log = withLogContext(deps.logger, { run_id: this.runId, entity_id: options.entityId })
	}

	/** Failures recorded for manual review so far in this run */
	get manualReviewQueue(): readonly ManualReviewItem[] {
		return this.manualReview
	}

	// ------------------------------------------------------------------------
	// Query execution with investigation
	// ------------------------------------------------------------------------

	async executeWithInvestigation(queryText: string, description: string): Promise<ExecutionResult> {
		const baseId = `${this.runId.slice(0, 8)}-q${++this.querySeq}`
		const reports: FailureReport[] = []
		let query = queryText
		let depth = 0

		const finish = (
			status: ExecutionStatus,
			review: Omit<ManualReviewItem, "description" | "query_text"> | null,
			rows: QueryRow[] = [],
		): ExecutionResult => {
			const item = review ? { ...review, description, query_text: query } : null
			if (item) {
				this.manualReview.push(item)
				this.log.warn("Query queued for manual review", { query_id: item.query_id, reason: item.reason })
			}
			return { status, rows, final_query: query, attempts: depth + 1, reports, manual_review: item }
		}

		while (true) {
			const queryId = depth === 0 ? baseId : `${baseId}-retry${depth}`
			const outcome = await executeWithTimeout(this.deps.executor, query, this.options.queryTimeoutMs, this.log)

			if (outcome.status === "ok") {
				this.log.info("Query succeeded", { query_id: queryId, description, rows: outcome.rows.length, depth })
				return finish("ok", null, outcome.rows)
			}

			if (outcome.status === "timeout") {
				const report = this.deps.investigator.buildTimeoutReport(queryId, query, outcome.elapsedMs)
				reports.push(report)
				this.deps.reports.writeFailureReport(report)
				return finish("timeout", { query_id: queryId, error_text: report.error_text, reason: "timeout" })
			}

			const errorText = outcomeErrorText(outcome)
			if (depth >= this.options.maxRetryDepth) {
				this.log.warn("Retry depth cap reached", { query_id: queryId, depth, error: errorText })
				const report = this.deps.investigator.buildRetryLimitReport(queryId, query, errorText, this.options.maxRetryDepth)
				reports.push(report)
				this.deps.reports.writeFailureReport(report)
				return finish("failed", { query_id: queryId, error_text: errorText, reason: "retry_limit_reached" })
			}

			const report = await this.deps.investigator.investigate(queryId, query, errorText, this.options.autoFixThreshold)
			reports.push(report)

			if (!report.auto_fixable || report.proposed_fix === null || report.fix_target === null) {
				this.deps.reports.writeFailureReport(report)
				return finish("failed", { query_id: queryId, error_text: errorText, reason: "low_confidence" })
			}

			const fixed = applyFix(query, report.fix_target, report.proposed_fix)
			if (fixed === query) {
				this.deps.reports.writeFailureReport(report)
				return finish("failed", { query_id: queryId, error_text: errorText, reason: "fix_not_applicable" })
			}

			this.log.info("Applying fix and retrying", {
				query_id: queryId,
				error_kind: report.error_kind,
				confidence: report.confidence,
				depth: depth + 1,
			})
			query = fixed
			depth++
		}
	}

	/**
	 * Rows of a query that must succeed. Same retry behaviour as
	 * executeWithInvestigation; a final failure is thrown with the kind of the
	 * last investigation.
	 */
	async queryRows(queryText: string, description: string): Promise<QueryRow[]> {
		const result = await this.executeWithInvestigation(queryText, description)
		if (result.status === "ok") return result.rows

		const kind = result.status === "timeout" ? "timeout" : (result.reports.at(-1)?.error_kind ?? "unclassified")
		throw new QueryExecutionError(kind, result.manual_review?.error_text ?? `Query failed: ${description}`, {
			query_id: result.manual_review?.query_id,
			reason: result.manual_review?.reason,
			attempts: result.attempts,
		})
	}

	// ------------------------------------------------------------------------
	// Completeness
	// ------------------------------------------------------------------------

	private async rawCount(table: string): Promise<RawCount | null> {
		const cached = this.rawCounts.get(table)
		if (cached) return cached

		const query = this.deps.catalog.generateCountQuery(table, this.options.entityId)
		if (!query) return null

		const outcome = await executeWithTimeout(this.deps.executor, query, this.options.queryTimeoutMs, this.log)
		let result: RawCount
		if (outcome.status !== "ok") {
			result = { status: "failed", error_text: outcomeErrorText(outcome) }
		} else {
			const first = outcome.rows[0]
			const text = first ? cellToString(first.count ?? Object.values(first)[0]) : null
			const count = text === null ? NaN : Number(text)
			result = Number.isFinite(count) && count >= 0
				? { status: "ok", count }
				: { status: "failed", error_text: "Count query returned no numeric count" }
		}

		if (result.status === "failed") {
			this.log.warn("Count query failed; table excluded for this run", { table, error: result.error_text })
		}
		this.rawCounts.set(table, result)
		return result
	}

	private gapShape(table: string): { field: string; priority: GapPriority } {
		const lower = table.toLowerCase()
		const rule = this.options.gapPriorities.find((r) => lower.includes(r.match.toLowerCase()))
		return rule ? { field: rule.field, priority: rule.priority } : { field: DEFAULT_GAP_FIELD, priority: "low" }
	}

	async assessCompleteness(extracted: Record<string, number>): Promise<CoverageAssessment> {
		const perTable: Record<string, TableCoverage> = {}
		const gaps: CoverageGap[] = []
		const failures: CountFailure[] = []
		let rawTotal = 0
		let coveredTotal = 0

		for (const table of this.deps.catalog.findEntityScopedTables()) {
			const raw = await this.rawCount(table.name)
			if (!raw) continue
			if (raw.status === "failed") {
				failures.push({ table: table.name, error_text: raw.error_text })
				continue
			}

			const reported = extracted[table.name] ?? extracted[table.name.toLowerCase()] ?? 0
			const extractedCount = Math.max(this.extractedCounts.get(table.name) ?? 0, reported)
			this.extractedCounts.set(table.name, extractedCount)

			perTable[table.name] = { raw_count: raw.count, extracted_count: extractedCount }
			rawTotal += raw.count
			coveredTotal += Math.min(extractedCount, raw.count)

			if (raw.count > 0 && extractedCount < raw.count) {
				gaps.push({
					table: table.name,
					...this.gapShape(table.name),
					event_reference: null,
					entity_id: this.options.entityId,
					raw_count: raw.count,
					extracted_count: extractedCount,
					missing_count: raw.count - extractedCount,
				})
			}
		}

		gaps.sort(
			(a, b) =>
				PRIORITY_RANK[a.priority] - PRIORITY_RANK[b.priority] ||
				b.missing_count - a.missing_count ||
				a.table.localeCompare(b.table),
		)

		const assessment: CoverageAssessment = Object.freeze({
			entity_id: this.options.entityId,
			per_table: Object.freeze(perTable),
			coverage_pct: rawTotal === 0 ? 100 : round2((100 * coveredTotal) / rawTotal),
			gaps: Object.freeze(gaps),
			count_failures: Object.freeze(failures),
			assessed_at: new Date().toISOString(),
		})

		this.log.info("Completeness assessed", {
			coverage_pct: assessment.coverage_pct,
			gaps: gaps.length,
			count_failures: failures.length,
		})
		return assessment
	}

	// ------------------------------------------------------------------------
	// Gap filling
	// ------------------------------------------------------------------------

	async attemptGapFilling(
		assessment: CoverageAssessment,
		maxGapsPerCycle: number = this.options.maxGapsPerCycle,
	): Promise<number> {
		let resolved = 0

		for (const gap of assessment.gaps.slice(0, Math.max(0, maxGapsPerCycle))) {
			this.gapsAttempted++
			const request: GapRequest = {
				entity_id: gap.entity_id,
				table: gap.table,
				field: gap.field,
				event_reference: gap.event_reference,
				priority: gap.priority,
				missing_count: gap.missing_count,
			}

			try {
				const result = await this.deps.extractor.extract(request)
				if (result.status === "found") {
					await this.deps.store.merge(gap, result.value)
					resolved++
					this.log.info("Gap resolved", { table: gap.table, field: gap.field })
				} else {
					this.log.info("Gap not found by re-extraction", { table: gap.table, field: gap.field })
				}
			} catch (error) {
				this.log.warn("Gap extraction failed", { table: gap.table, field: gap.field, error: describeError(error) })
			}
		}

		return resolved
	}

	async runGapFilling(signal?: AbortSignal): Promise<GapFillingRun> {
		const startedAt = new Date().toISOString()
		const cycles: GapFillingCycle[] = []
		let assessment: CoverageAssessment | null = null
		let termination: GapFillingTermination
		let resolvedTotal = 0
		const attemptedBefore = this.gapsAttempted

		this.log.info("Gap filling started", { max_cycles: this.options.maxCycles })

		while (true) {
			if (signal?.aborted) {
				termination = "cancelled"
				break
			}

			assessment = await this.assessCompleteness(await this.deps.store.counts())
			if (assessment.gaps.length === 0) {
				termination = "coverage_complete"
				break
			}
			if (cycles.length >= this.options.maxCycles) {
				termination = "max_cycles"
				break
			}

			const attempted = Math.min(assessment.gaps.length, this.options.maxGapsPerCycle)
			const resolved = await this.attemptGapFilling(assessment, this.options.maxGapsPerCycle)
			resolvedTotal += resolved
			cycles.push({
				cycle: cycles.length + 1,
				coverage_pct: assessment.coverage_pct,
				gaps_open: assessment.gaps.length,
				gaps_attempted: attempted,
				gaps_resolved: resolved,
			})

			if (resolved === 0) {
				termination = "no_progress"
				break
			}
		}

		const run: GapFillingRun = {
			run_id: this.runId,
			entity_id: this.options.entityId,
			cycles,
			final_assessment: assessment,
			termination,
			gaps_attempted: this.gapsAttempted - attemptedBefore,
			gaps_resolved: resolvedTotal,
			unresolved_gaps: assessment ? [...assessment.gaps] : [],
			manual_review: [...this.manualReview],
			started_at: startedAt,
			finished_at: new Date().toISOString(),
		}

		this.log.info("Gap filling finished", {
			termination,
			cycles: cycles.length,
			coverage_pct: assessment?.coverage_pct ?? null,
			gaps_resolved: resolvedTotal,
		})
		this.deps.reports.writeCoverageReport(run)
		return run
	}
}
