import { describe, it, expect } from "vitest"
import { buildColumnCandidates, levenshteinDistance } from "./column_matching.js"
import type { TableSchema } from "./reasoning_types.js"

const condition: TableSchema = {
	name: "condition",
	columns: [
		{ name: "subject_reference", declared_type: "varchar", ordinal_position: 1 },
		{ name: "onset_date_time", declared_type: "varchar", ordinal_position: 2 },
		{ name: "code_text", declared_type: "varchar", ordinal_position: 3 },
	],
	entity_reference_style: "prefixed-reference",
	entity_reference_column: "subject_reference",
}

describe("levenshteinDistance", () => {
	it("should count edits", () => {
		expect(levenshteinDistance("kitten", "sitting")).toBe(3)
		expect(levenshteinDistance("", "abc")).toBe(3)
	})
})

describe("buildColumnCandidates", () => {
	it("should match ignoring underscores", () => {
		const [best] = buildColumnCandidates([condition], "onset_datetime")
		expect(best).toEqual({
			table_name: "condition",
			column_name: "onset_date_time",
			data_type: "varchar",
			match_type: "snake_normalized",
			match_score: 0.85,
		})
	})

	it("should boost the hinted table", () => {
		const [best] = buildColumnCandidates([condition], "onset_datetime", "condition")
		expect(best.match_score).toBe(1)
	})

	it("should match case-insensitively", () => {
		const [best] = buildColumnCandidates([condition], "CODE_TEXT")
		expect(best.match_type).toBe("exact_lower")
		expect(best.column_name).toBe("code_text")
	})

	it("should never offer the unresolved name itself", () => {
		const candidates = buildColumnCandidates([condition], "code_text")
		expect(candidates.some((c) => c.column_name === "code_text")).toBe(false)
	})

	it("should return nothing for unrelated names", () => {
		expect(buildColumnCandidates([condition], "zzzz")).toEqual([])
	})
})
