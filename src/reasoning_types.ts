/**
 * Shared record types for the reasoning core
 *
 * Defines:
 * - Schema catalog records (TableSchema, ColumnSchema)
 * - Failure investigation reports (FailureReport, FormatAnalysis)
 * - Completeness assessment records (CoverageAssessment, CoverageGap)
 *
 * Report records use snake_case fields: they are written to JSON for human
 * review as-is.
 */

import type { QueryExecutionErrorKind } from "./errors.js"

// ============================================================================
// Schema Catalog
// ============================================================================

export type EntityReferenceStyle = "none" | "bare-id" | "prefixed-reference"

export interface ColumnSchema {
	readonly name: string
	readonly declared_type: string
	readonly ordinal_position: number
}

export interface TableSchema {
	readonly name: string
	readonly columns: readonly ColumnSchema[]
	/** Inferred once at load time from column naming only */
	readonly entity_reference_style: EntityReferenceStyle
	/** Column the style was inferred from */
	readonly entity_reference_column: string | null
}

export interface TableSummary {
	table_name: string
	column_count: number
	columns: string[]
	date_columns: string[]
	entity_reference_style: EntityReferenceStyle
	entity_reference_column: string | null
}

// ============================================================================
// Failure Investigation
// ============================================================================

export type ErrorKind = QueryExecutionErrorKind

/**
 * Canonical date/time value shapes, most- to least-specific
 */
export type DateShape =
	| "datetime_fraction_offset" // 2018-08-07T10:30:00.123Z, 2018-08-07T10:30:00.123+02:00
	| "datetime_offset" // 2018-08-07T10:30:00Z, 2018-08-07T10:30:00-05:00
	| "datetime_fraction" // 2018-08-07T10:30:00.123
	| "datetime_local" // 2018-08-07T10:30:00
	| "datetime_space_fraction" // 2018-08-07 10:30:00.123
	| "datetime_space" // 2018-08-07 10:30:00
	| "date_only" // 2018-08-07
	| "us_date" // 08/07/2018

export type SqlDialect = "trino" | "postgres"

export interface ImplicatedField {
	alias: string
	table: string
	column: string
	/** Function wrapping the reference, null for a bare reference */
	function_name: string | null
	/** Full call expression text as it appears in the query */
	call_text: string | null
}

export interface FormatAnalysis {
	has_multiple_formats: boolean
	/** Unique shapes, most- to least-specific */
	detected_formats: DateShape[]
	sample_count: number
}

export interface ColumnCandidate {
	table_name: string
	column_name: string
	data_type: string
	match_type: "exact_lower" | "snake_normalized" | "prefix" | "suffix" | "fuzzy"
	match_score: number // 0.0 - 1.0
}

export type SampleStatus = "sampled" | "not_applicable" | "unavailable"

export interface FailureReport {
	readonly query_id: string
	readonly query_text: string
	readonly error_text: string
	readonly error_kind: ErrorKind
	readonly implicated_fields: readonly ImplicatedField[]
	/** "alias.column" → distinct raw values */
	readonly sample_values: Readonly<Record<string, readonly string[]>>
	readonly sample_status: SampleStatus
	readonly format_analysis: FormatAnalysis | null
	/** Replacement text for fix_target */
	readonly proposed_fix: string | null
	/** Exact query substring the fix replaces */
	readonly fix_target: string | null
	readonly fix_candidates: readonly ColumnCandidate[]
	readonly confidence: number
	readonly auto_fixable: boolean
	readonly explanation: string
	readonly investigated_at: string
}

export interface ReferenceStyleConfirmation {
	table: string
	column: string | null
	inferred_style: EntityReferenceStyle
	observed_style: EntityReferenceStyle | "mixed" | "unknown"
	consistent: boolean
	sample_count: number
}

// ============================================================================
// Completeness Assessment
// ============================================================================

export type GapPriority = "highest" | "high" | "medium" | "low"

export interface TableCoverage {
	raw_count: number
	extracted_count: number
}

export interface CoverageGap {
	table: string
	field: string
	/** Narrowest known reference to the missing records, null when only counts are known */
	event_reference: string | null
	priority: GapPriority
	entity_id: string
	raw_count: number
	extracted_count: number
	missing_count: number
}

export interface CountFailure {
	table: string
	error_text: string
}

export interface CoverageAssessment {
	readonly entity_id: string
	readonly per_table: Readonly<Record<string, TableCoverage>>
	readonly coverage_pct: number
	readonly gaps: readonly CoverageGap[]
	readonly count_failures: readonly CountFailure[]
	readonly assessed_at: string
}

export interface ManualReviewItem {
	query_id: string
	description: string
	query_text: string
	error_text: string
	reason: "low_confidence" | "retry_limit_reached" | "timeout" | "fix_not_applicable"
}

export type GapFillingTermination = "coverage_complete" | "max_cycles" | "no_progress" | "cancelled"

export interface GapFillingCycle {
	cycle: number
	coverage_pct: number
	gaps_open: number
	gaps_attempted: number
	gaps_resolved: number
}

export interface GapFillingRun {
	run_id: string
	entity_id: string
	cycles: GapFillingCycle[]
	final_assessment: CoverageAssessment | null
	termination: GapFillingTermination
	gaps_attempted: number
	gaps_resolved: number
	unresolved_gaps: CoverageGap[]
	manual_review: ManualReviewItem[]
	started_at: string
	finished_at: string
}
