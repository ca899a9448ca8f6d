/**
 * Date/time value shapes
 *
 * Classifies raw stored strings into canonical shapes, summarizes a sample,
 * and renders a fallback-chain parse expression per SQL dialect. The same
 * chain can be evaluated in process with parseWithFallbackChain.
 */

import { isValid, parse, parseISO } from "date-fns"
import type { DateShape, FormatAnalysis, SqlDialect } from "./reasoning_types.js"

// ============================================================================
// Shape Table
// ============================================================================

interface ShapeDefinition {
	tag: DateShape
	pattern: RegExp
	/** date_parse format, null when the shape carries an offset */
	trinoFormat: string | null
	/** to_timestamp template, null when the shape carries an offset */
	postgresTemplate: string | null
}

const OFFSET = "(Z|[+-]\\d{2}:?\\d{2})"

/** Ordered most- to least-specific */
const SHAPES: readonly ShapeDefinition[] = [
	{
		tag: "datetime_fraction_offset",
		pattern: new RegExp(`^\\d{4}-\\d{2}-\\d{2}T\\d{2}:\\d{2}:\\d{2}\\.\\d+${OFFSET}$`),
		trinoFormat: null,
		postgresTemplate: null,
	},
	{
		tag: "datetime_offset",
		pattern: new RegExp(`^\\d{4}-\\d{2}-\\d{2}T\\d{2}:\\d{2}:\\d{2}${OFFSET}$`),
		trinoFormat: null,
		postgresTemplate: null,
	},
	{
		tag: "datetime_fraction",
		pattern: /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}\.\d+$/,
		trinoFormat: "%Y-%m-%dT%H:%i:%s.%f",
		postgresTemplate: 'YYYY-MM-DD"T"HH24:MI:SS.US',
	},
	{
		tag: "datetime_local",
		pattern: /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}$/,
		trinoFormat: "%Y-%m-%dT%H:%i:%s",
		postgresTemplate: 'YYYY-MM-DD"T"HH24:MI:SS',
	},
	{
		tag: "datetime_space_fraction",
		pattern: /^\d{4}-\d{2}-\d{2} \d{2}:\d{2}:\d{2}\.\d+$/,
		trinoFormat: "%Y-%m-%d %H:%i:%s.%f",
		postgresTemplate: "YYYY-MM-DD HH24:MI:SS.US",
	},
	{
		tag: "datetime_space",
		pattern: /^\d{4}-\d{2}-\d{2} \d{2}:\d{2}:\d{2}$/,
		trinoFormat: "%Y-%m-%d %H:%i:%s",
		postgresTemplate: "YYYY-MM-DD HH24:MI:SS",
	},
	{
		tag: "date_only",
		pattern: /^\d{4}-\d{2}-\d{2}$/,
		trinoFormat: "%Y-%m-%d",
		postgresTemplate: "YYYY-MM-DD",
	},
	{
		tag: "us_date",
		pattern: /^\d{1,2}\/\d{1,2}\/\d{4}$/,
		trinoFormat: "%m/%d/%Y",
		postgresTemplate: "MM/DD/YYYY",
	},
]

const SHAPE_BY_TAG = new Map(SHAPES.map((s) => [s.tag, s]))

const SHAPE_RANK = new Map(SHAPES.map((s, index) => [s.tag, index]))

function shapeDefinition(tag: DateShape): ShapeDefinition {
	const definition = SHAPE_BY_TAG.get(tag)
	if (!definition) throw new Error(`Unknown date shape: ${tag}`)
	return definition
}

export function sortShapes(shapes: Iterable<DateShape>): DateShape[] {
	return [...new Set(shapes)].sort((a, b) => (SHAPE_RANK.get(a) ?? 0) - (SHAPE_RANK.get(b) ?? 0))
}

// ============================================================================
// Classification
// ============================================================================

export function classifyDateShape(value: string): DateShape | null {
	const trimmed = value.trim()
	for (const shape of SHAPES) {
		if (shape.pattern.test(trimmed)) return shape.tag
	}
	return null
}

/**
 * Summarize the shapes present in a sample.
 * Values matching no canonical shape are counted but not tagged.
 */
export function analyzeFormats(samples: readonly string[]): FormatAnalysis {
	const detected = new Set<DateShape>()
	for (const value of samples) {
		const shape = classifyDateShape(value)
		if (shape) detected.add(shape)
	}
	return {
		has_multiple_formats: detected.size > 1,
		detected_formats: sortShapes(detected),
		sample_count: samples.length,
	}
}

// ============================================================================
// Rendering
// ============================================================================

function quote(value: string): string {
	return `'${value.replace(/'/g, "''")}'`
}

function trinoParse(field: string, shape: ShapeDefinition): string {
	if (shape.trinoFormat === null) return `CAST(from_iso8601_timestamp(${field}) AS timestamp)`
	return `date_parse(${field}, ${quote(shape.trinoFormat)})`
}

function postgresParse(field: string, shape: ShapeDefinition): string {
	if (shape.postgresTemplate === null) return `(${field}::timestamptz AT TIME ZONE 'UTC')`
	return `to_timestamp(${field}, ${quote(shape.postgresTemplate)})::timestamp`
}

/**
 * Render a parse of `field` that tries each shape in turn and yields the
 * first success. One shape renders a single parse; none renders a plain cast.
 */
export function renderFallbackChain(field: string, shapes: readonly DateShape[], dialect: SqlDialect): string {
	const ordered = sortShapes(shapes).map(shapeDefinition)

	if (ordered.length === 0) {
		return dialect === "trino" ? `TRY(CAST(${field} AS timestamp))` : `CAST(${field} AS timestamp)`
	}

	if (dialect === "trino") {
		if (ordered.length === 1) return trinoParse(field, ordered[0])
		// Both offset shapes render the same term
		const terms = [...new Set(ordered.map((s) => `TRY(${trinoParse(field, s)})`))]
		return terms.length === 1 ? terms[0] : `COALESCE(${terms.join(", ")})`
	}

	if (ordered.length === 1) return postgresParse(field, ordered[0])
	const branches = ordered.map((s) => `WHEN ${field} ~ ${quote(s.pattern.source)} THEN ${postgresParse(field, s)}`)
	return `CASE ${branches.join(" ")} END`
}

// ============================================================================
// In-process evaluation
// ============================================================================

function parseShape(value: string, shape: DateShape): Date | null {
	const parsed = shape === "us_date" ? parse(value, "MM/dd/yyyy", new Date(0)) : parseISO(value)
	return isValid(parsed) ? parsed : null
}

/**
 * Evaluate a fallback chain in process: the first shape whose pattern
 * matches and whose parse yields a valid date wins. Null when none does.
 */
export function parseWithFallbackChain(value: string, shapes: readonly DateShape[]): Date | null {
	const trimmed = value.trim()
	for (const tag of sortShapes(shapes)) {
		const shape = shapeDefinition(tag)
		if (!shape.pattern.test(trimmed)) continue
		const parsed = parseShape(trimmed, tag)
		if (parsed) return parsed
	}
	return null
}
