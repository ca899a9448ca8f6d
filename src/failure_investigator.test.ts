import { describe, it, expect } from "vitest"
import { QueryFailureInvestigator } from "./failure_investigator.js"
import type { InvestigatorOptions } from "./failure_investigator.js"
import { parseWithFallbackChain } from "./date_formats.js"
import { silentLogger } from "./logger.js"
import { SchemaCatalog } from "./schema_catalog.js"
import type { QueryExecutor, QueryOutcome } from "./query_executor.js"

const CATALOG = SchemaCatalog.fromCsv(
	[
		"table_name,column_name,data_type",
		"condition,id,varchar",
		"condition,subject_reference,varchar",
		"condition,onset_date_time,varchar",
		"condition,recorded_date,varchar",
		"procedure,subject_reference,varchar",
		"procedure,performed_date_time,varchar",
		"procedure,code_text,varchar",
	].join("\n"),
)

const ONSET_SAMPLE = `SELECT DISTINCT "onset_date_time" FROM condition WHERE "onset_date_time" IS NOT NULL LIMIT 20`
const RECORDED_SAMPLE = `SELECT DISTINCT "recorded_date" FROM condition WHERE "recorded_date" IS NOT NULL LIMIT 20`
const PERFORMED_SAMPLE =
	`SELECT DISTINCT "performed_date_time" FROM procedure WHERE "performed_date_time" IS NOT NULL LIMIT 20`

interface FakeExecutor extends QueryExecutor {
	queries: string[]
}

/** Serves canned outcomes by exact query text; anything else fails */
function fakeExecutor(responses: Record<string, QueryOutcome>): FakeExecutor {
	const queries: string[] = []
	return {
		queries,
		execute: async (queryText) => {
			queries.push(queryText)
			return responses[queryText] ?? { status: "error", errorKind: "QUERY_FAILED", message: "unexpected query" }
		},
	}
}

function rows(column: string, values: string[]): QueryOutcome {
	return { status: "ok", rows: values.map((v) => ({ [column]: v })) }
}

function investigator(executor: QueryExecutor, options: Partial<InvestigatorOptions> = {}): QueryFailureInvestigator {
	return new QueryFailureInvestigator(CATALOG, executor, silentLogger, options)
}

describe("QueryFailureInvestigator", () => {
	describe("date/time format mismatch", () => {
		const query =
			"SELECT c.id, date_parse(c.onset_date_time, '%Y-%m-%d') AS onset FROM condition c WHERE c.subject_reference = 'Patient/p1'"

		it("should diagnose mixed shapes and propose a chain that parses each", async () => {
			const executor = fakeExecutor({
				[ONSET_SAMPLE]: rows("onset_date_time", ["2018-08-07", "2018-08-07T10:30:00Z"]),
			})
			const report = await investigator(executor, { dialect: "trino" }).investigate(
				"q1",
				query,
				"INVALID_FUNCTION_ARGUMENT: Invalid format: '2018-08-07' is too short",
			)

			expect(report.error_kind).toBe("date_format_mismatch")
			expect(report.implicated_fields).toEqual([
				{
					alias: "c",
					table: "condition",
					column: "onset_date_time",
					function_name: "date_parse",
					call_text: "date_parse(c.onset_date_time, '%Y-%m-%d')",
				},
			])
			expect(report.sample_values).toEqual({ "c.onset_date_time": ["2018-08-07", "2018-08-07T10:30:00Z"] })
			expect(report.sample_status).toBe("sampled")
			expect(report.format_analysis).toEqual({
				has_multiple_formats: true,
				detected_formats: ["datetime_offset", "date_only"],
				sample_count: 2,
			})
			expect(report.fix_target).toBe("date_parse(c.onset_date_time, '%Y-%m-%d')")
			expect(report.proposed_fix).toBe(
				"COALESCE(TRY(CAST(from_iso8601_timestamp(c.onset_date_time) AS timestamp)), TRY(date_parse(c.onset_date_time, '%Y-%m-%d')))",
			)
			// Two samples is below the thin-sample floor
			expect(report.confidence).toBe(0.75)
			expect(report.auto_fixable).toBe(false)

			const shapes = report.format_analysis?.detected_formats ?? []
			for (const value of ["2018-08-07", "2018-08-07T10:30:00Z", "2019-01-02", "2019-01-02T03:04:05+01:00"]) {
				expect(parseWithFallbackChain(value, shapes)).not.toBeNull()
			}
		})

		it("should score a well-sampled multi-format column at the top of the scale", async () => {
			const executor = fakeExecutor({
				[ONSET_SAMPLE]: rows("onset_date_time", [
					"2018-08-07",
					"2018-08-08",
					"2018-08-07T10:30:00Z",
					"2018-08-09T11:00:00Z",
					"2018-08-10",
				]),
			})
			const error = "Invalid format: '2018-08-07' is too short"

			const report = await investigator(executor).investigate("q1", query, error, 0.85)
			expect(report.confidence).toBe(0.9)
			expect(report.auto_fixable).toBe(true)

			const strict = await investigator(executor).investigate("q2", query, error, 0.9)
			expect(strict.confidence).toBe(0.9)
			expect(strict.auto_fixable).toBe(false)
		})

		it("should prefer the field whose samples hold the echoed literal", async () => {
			const twoFields =
				"SELECT date_parse(c.onset_date_time, '%Y-%m-%d'), date_parse(c.recorded_date, '%Y-%m-%d') FROM condition c"
			const executor = fakeExecutor({
				[ONSET_SAMPLE]: rows("onset_date_time", [
					"2020-01-01T00:00:00",
					"2020-01-02",
					"2020-01-03",
					"2020-01-04",
					"2020-01-05",
				]),
				[RECORDED_SAMPLE]: rows("recorded_date", ["2020-01-01", "2020-01-02", "2020-01-03", "2020-01-04", "2020-01-05"]),
			})

			const report = await investigator(executor).investigate(
				"q1",
				twoFields,
				'Invalid format: "2020-01-01T00:00:00" is malformed at "T00:00:00"',
			)

			expect(report.implicated_fields.map((f) => f.column)).toEqual(["onset_date_time", "recorded_date"])
			expect(report.fix_target).toBe("date_parse(c.onset_date_time, '%Y-%m-%d')")
			expect(report.proposed_fix).toBe(
				String.raw`CASE WHEN c.onset_date_time ~ '^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}$' THEN to_timestamp(c.onset_date_time, 'YYYY-MM-DD"T"HH24:MI:SS')::timestamp WHEN c.onset_date_time ~ '^\d{4}-\d{2}-\d{2}$' THEN to_timestamp(c.onset_date_time, 'YYYY-MM-DD')::timestamp END`,
			)
			expect(report.confidence).toBe(0.9)
		})

		it("should penalize equally likely fields", async () => {
			const twoFields =
				"SELECT date_parse(c.onset_date_time, '%Y-%m-%d'), date_parse(c.recorded_date, '%Y-%m-%d') FROM condition c"
			const mixed = ["2020-01-01T00:00:00Z", "2020-01-02", "2020-01-03", "2020-01-04", "2020-01-05"]
			const executor = fakeExecutor({
				[ONSET_SAMPLE]: rows("onset_date_time", mixed),
				[RECORDED_SAMPLE]: rows("recorded_date", mixed),
			})

			const report = await investigator(executor).investigate(
				"q1",
				twoFields,
				"SQLSTATE 22008: date/time field value out of range",
			)

			expect(report.fix_target).toBe("date_parse(c.onset_date_time, '%Y-%m-%d')")
			expect(report.confidence).toBe(0.8)
			expect(report.auto_fixable).toBe(false)
		})

		it("should degrade to an unsampled report when sampling throws", async () => {
			const executor: QueryExecutor = {
				execute: async () => {
					throw new Error("connection reset")
				},
			}

			const report = await investigator(executor).investigate("q1", query, "Invalid format: '2018-08-07' is too short")

			expect(report.sample_status).toBe("unavailable")
			expect(report.sample_values).toEqual({})
			expect(report.format_analysis).toBeNull()
			expect(report.proposed_fix).toBe("to_timestamp(c.onset_date_time, 'YYYY-MM-DD')::timestamp")
			expect(report.confidence).toBe(0.4)
			expect(report.auto_fixable).toBe(false)
		})

		it("should degrade when the sampling query times out", async () => {
			const executor: QueryExecutor = { execute: () => new Promise<QueryOutcome>(() => {}) }

			const report = await investigator(executor, { sampleTimeoutMs: 10 }).investigate(
				"q1",
				query,
				"SQLSTATE 22008: date/time field value out of range",
			)

			expect(report.sample_status).toBe("unavailable")
			expect(report.proposed_fix).toBe("CAST(c.onset_date_time AS timestamp)")
			expect(report.confidence).toBe(0.4)
		})

		it("should report no fix when samples match no known shape", async () => {
			const executor = fakeExecutor({ [ONSET_SAMPLE]: rows("onset_date_time", ["last week", "unknown"]) })

			const report = await investigator(executor).investigate("q1", query, "SQLSTATE 22007: bad date")

			expect(report.proposed_fix).toBeNull()
			expect(report.fix_target).toBeNull()
			expect(report.confidence).toBe(0)
			expect(report.format_analysis?.detected_formats).toEqual([])
		})
	})

	describe("type mismatch", () => {
		const query = "SELECT date_trunc('month', p.performed_date_time) FROM procedure p"

		it("should cast to the type of the expected signature", async () => {
			const executor = fakeExecutor({
				[PERFORMED_SAMPLE]: rows("performed_date_time", ["a", "b", "c", "d", "e"]),
			})

			const report = await investigator(executor, { dialect: "trino" }).investigate(
				"q1",
				query,
				"SYNTAX_ERROR: line 1:8: Unexpected parameters (varchar(5), varchar) for function date_trunc. Expected: date_trunc(varchar(x), date)",
			)

			expect(report.error_kind).toBe("type_mismatch")
			expect(report.fix_target).toBe("date_trunc('month', p.performed_date_time)")
			expect(report.proposed_fix).toBe("date_trunc('month', CAST(p.performed_date_time AS date))")
			expect(report.confidence).toBe(0.7)
		})

		it("should cast to a multi-word type without its type parameters", async () => {
			const executor = fakeExecutor({
				[PERFORMED_SAMPLE]: rows("performed_date_time", ["a", "b", "c", "d", "e"]),
			})

			const report = await investigator(executor, { dialect: "trino" }).investigate(
				"q1",
				"SELECT to_unixtime(p.performed_date_time) FROM procedure p",
				"SYNTAX_ERROR: line 1:8: Unexpected parameters (varchar) for function to_unixtime. Expected: to_unixtime(timestamp(p) with time zone)",
			)

			expect(report.error_kind).toBe("type_mismatch")
			expect(report.fix_target).toBe("to_unixtime(p.performed_date_time)")
			expect(report.proposed_fix).toBe("to_unixtime(CAST(p.performed_date_time AS timestamp with time zone))")
		})

		it("should fall back to the function table and penalize thin samples", async () => {
			const executor = fakeExecutor({
				[PERFORMED_SAMPLE]: rows("performed_date_time", ["2018-01-01", "2018-02-01"]),
			})

			const report = await investigator(executor).investigate(
				"q1",
				query,
				"SQLSTATE 42883: function date_trunc(unknown, text) does not exist",
			)

			expect(report.proposed_fix).toBe("date_trunc('month', CAST(p.performed_date_time AS timestamp))")
			expect(report.confidence).toBe(0.55)
		})
	})

	describe("unknown column", () => {
		it("should suggest the nearest column, capped low", async () => {
			const executor = fakeExecutor({})
			const report = await investigator(executor).investigate(
				"q1",
				"SELECT c.onset_datetime, c.id FROM condition c",
				"SYNTAX_ERROR: line 1:8: Column 'c.onset_datetime' cannot be resolved",
			)

			expect(report.error_kind).toBe("unknown_column")
			expect(report.fix_candidates[0].column_name).toBe("onset_date_time")
			expect(report.fix_target).toBe("c.onset_datetime")
			expect(report.proposed_fix).toBe("c.onset_date_time")
			expect(report.confidence).toBe(0.6)
			expect(report.auto_fixable).toBe(false)
			expect(report.sample_status).toBe("not_applicable")
			expect(executor.queries).toEqual([])
		})

		it("should handle a bare column in a single-table query", async () => {
			const report = await investigator(fakeExecutor({})).investigate(
				"q1",
				"SELECT onset_datetime FROM condition",
				'SQLSTATE 42703: column "onset_datetime" does not exist',
			)

			expect(report.fix_target).toBe("onset_datetime")
			expect(report.proposed_fix).toBe("onset_date_time")
			expect(report.confidence).toBe(0.6)
		})
	})

	describe("reports without a fix", () => {
		it("should leave unclassified failures for manual review", async () => {
			const executor = fakeExecutor({})
			const report = await investigator(executor).investigate("q1", "SELECT 1", "permission denied for table condition")

			expect(report.error_kind).toBe("unclassified")
			expect(report.proposed_fix).toBeNull()
			expect(report.confidence).toBe(0)
			expect(report.auto_fixable).toBe(false)
			expect(executor.queries).toEqual([])
		})

		it("should classify but not resolve unsupported query shapes", async () => {
			const executor = fakeExecutor({})
			const report = await investigator(executor).investigate(
				"q1",
				"SELECT date_parse(x.d, '%Y-%m-%d') FROM (SELECT onset_date_time AS d FROM condition) x",
				"Invalid format: '2018-08-07T10:30:00Z' is malformed at 'T10:30:00Z'",
			)

			expect(report.error_kind).toBe("date_format_mismatch")
			expect(report.implicated_fields).toEqual([])
			expect(report.proposed_fix).toBeNull()
			expect(report.explanation).toBe(
				"Query shape not supported for field resolution (subquery); classified as date_format_mismatch without a fix",
			)
			expect(executor.queries).toEqual([])
		})

		it("should build a timeout report without investigating", () => {
			const report = investigator(fakeExecutor({})).buildTimeoutReport("q1", "SELECT 1", 500)
			expect(report.error_kind).toBe("timeout")
			expect(report.error_text).toBe("Query timed out after 500ms")
			expect(report.confidence).toBe(0)
			expect(report.auto_fixable).toBe(false)
		})

		it("should build a retry limit report without sampling", () => {
			const executor = fakeExecutor({})
			const report = investigator(executor).buildRetryLimitReport(
				"q1-retry2",
				"SELECT onset_date_time FROM condition",
				"column \"onset_date_time\" does not exist",
				2,
			)

			expect(report.query_id).toBe("q1-retry2")
			expect(report.error_kind).toBe("unknown_column")
			expect(report.explanation).toBe(
				"Still failing after 2 automatic fix attempt(s); retry limit reached, not investigated further",
			)
			expect(report.proposed_fix).toBeNull()
			expect(report.confidence).toBe(0)
			expect(report.auto_fixable).toBe(false)
			expect(executor.queries).toEqual([])
		})
	})

	describe("confidence and auto_fixable", () => {
		it("should keep confidence in [0, 1] and auto_fixable iff confidence > threshold", async () => {
			const executor = fakeExecutor({
				[ONSET_SAMPLE]: rows("onset_date_time", ["2018-08-07", "2018-08-07T10:30:00Z"]),
			})
			const query = "SELECT date_parse(c.onset_date_time, '%Y-%m-%d') FROM condition c"
			const errors = [
				"Invalid format: '2018-08-07' is too short",
				"Column 'c.onset_date_time2' cannot be resolved",
				"permission denied",
			]

			for (const error of errors) {
				for (const threshold of [0, 0.5, 0.6, 0.75, 0.8, 1]) {
					const report = await investigator(executor).investigate("q", query, error, threshold)
					expect(report.confidence).toBeGreaterThanOrEqual(0)
					expect(report.confidence).toBeLessThanOrEqual(1)
					expect(report.auto_fixable).toBe(report.confidence > threshold)
				}
			}
		})
	})

	describe("confirmReferenceStyle", () => {
		const REFERENCE_SAMPLE =
			`SELECT DISTINCT "subject_reference" FROM condition WHERE "subject_reference" IS NOT NULL LIMIT 20`

		it("should confirm a consistent prefixed style", async () => {
			const executor = fakeExecutor({ [REFERENCE_SAMPLE]: rows("subject_reference", ["Patient/a", "Patient/b"]) })
			expect(await investigator(executor).confirmReferenceStyle("condition")).toEqual({
				table: "condition",
				column: "subject_reference",
				inferred_style: "prefixed-reference",
				observed_style: "prefixed-reference",
				consistent: true,
				sample_count: 2,
			})
		})

		it("should flag mixed storage", async () => {
			const executor = fakeExecutor({ [REFERENCE_SAMPLE]: rows("subject_reference", ["Patient/a", "b"]) })
			const result = await investigator(executor).confirmReferenceStyle("condition")
			expect(result?.observed_style).toBe("mixed")
			expect(result?.consistent).toBe(false)
		})

		it("should report unknown when sampling fails and null for unknown tables", async () => {
			const executor = fakeExecutor({})
			expect((await investigator(executor).confirmReferenceStyle("condition"))?.observed_style).toBe("unknown")
			expect(await investigator(executor).confirmReferenceStyle("nope")).toBeNull()
		})
	})
})
