/**
 * Column Candidate Matching
 *
 * Ranks a table's columns against a column name the engine could not
 * resolve: case-insensitive exact, underscore-normalized, prefix, suffix,
 * then Levenshtein similarity.
 */

import type { ColumnCandidate, TableSchema } from "./reasoning_types.js"

// ============================================================================
// Configuration
// ============================================================================

const MATCH_CONFIG = {
	/** Minimum score to include in candidates */
	minCandidateScore: 0.4,

	/** Maximum candidates to return */
	maxCandidates: 5,

	/** Minimum similarity for a fuzzy match */
	minFuzzySimilarity: 0.5,

	/** Boost for columns of the table the error named */
	hintedTableBoost: 0.15,

	matchScores: {
		exact_lower: 0.95,
		snake_normalized: 0.85,
		prefix: 0.7,
		suffix: 0.65,
		fuzzy: 0.6, // scaled by similarity
	},
}

// ============================================================================
// Helpers
// ============================================================================

function normalizeSnakeCase(str: string): string {
	return str.replace(/_/g, "")
}

export function levenshteinDistance(s1: string, s2: string): number {
	const m = s1.length
	const n = s2.length

	if (m === 0) return n
	if (n === 0) return m

	const d: number[][] = Array.from({ length: m + 1 }, () => new Array<number>(n + 1).fill(0))

	for (let i = 0; i <= m; i++) d[i][0] = i
	for (let j = 0; j <= n; j++) d[0][j] = j

	for (let i = 1; i <= m; i++) {
		for (let j = 1; j <= n; j++) {
			const cost = s1[i - 1] === s2[j - 1] ? 0 : 1
			d[i][j] = Math.min(
				d[i - 1][j] + 1, // deletion
				d[i][j - 1] + 1, // insertion
				d[i - 1][j - 1] + cost, // substitution
			)
		}
	}

	return d[m][n]
}

function scoreColumn(
	columnName: string,
	searchLower: string,
	searchNormalized: string,
): { matchType: ColumnCandidate["match_type"]; score: number } | null {
	const colLower = columnName.toLowerCase()

	if (colLower === searchLower) {
		return { matchType: "exact_lower", score: MATCH_CONFIG.matchScores.exact_lower }
	}
	if (normalizeSnakeCase(colLower) === searchNormalized) {
		return { matchType: "snake_normalized", score: MATCH_CONFIG.matchScores.snake_normalized }
	}
	if (colLower.startsWith(searchLower) || searchLower.startsWith(colLower)) {
		return { matchType: "prefix", score: MATCH_CONFIG.matchScores.prefix }
	}
	if (colLower.endsWith(searchLower) || searchLower.endsWith(colLower)) {
		return { matchType: "suffix", score: MATCH_CONFIG.matchScores.suffix }
	}

	const distance = levenshteinDistance(searchLower, colLower)
	const similarity = 1 - distance / Math.max(searchLower.length, colLower.length)
	if (similarity >= MATCH_CONFIG.minFuzzySimilarity) {
		return { matchType: "fuzzy", score: MATCH_CONFIG.matchScores.fuzzy * similarity }
	}
	return null
}

// ============================================================================
// Candidate Building
// ============================================================================

/**
 * Rank columns of the given tables against an unresolved column name.
 * Sorted by score descending, then table and column name.
 */
export function buildColumnCandidates(
	tables: readonly TableSchema[],
	undefinedColumn: string,
	tableHint?: string,
): ColumnCandidate[] {
	const candidates: ColumnCandidate[] = []
	const searchLower = undefinedColumn.toLowerCase()
	const searchNormalized = normalizeSnakeCase(searchLower)
	const hint = tableHint?.toLowerCase()

	for (const table of tables) {
		const isHintedTable = hint === table.name.toLowerCase()

		for (const col of table.columns) {
			// An exact match is not a correction
			if (col.name === undefinedColumn) continue

			const scored = scoreColumn(col.name, searchLower, searchNormalized)
			if (!scored) continue

			const score = isHintedTable ? Math.min(1.0, scored.score + MATCH_CONFIG.hintedTableBoost) : scored.score
			if (score < MATCH_CONFIG.minCandidateScore) continue

			candidates.push({
				table_name: table.name,
				column_name: col.name,
				data_type: col.declared_type,
				match_type: scored.matchType,
				match_score: Math.round(score * 1000) / 1000,
			})
		}
	}

	candidates.sort(
		(a, b) =>
			b.match_score - a.match_score ||
			a.table_name.localeCompare(b.table_name) ||
			a.column_name.localeCompare(b.column_name),
	)

	return candidates.slice(0, MATCH_CONFIG.maxCandidates)
}
