import { describe, it, expect } from "vitest"
import {
	detectUnsupportedShape,
	extractAliases,
	extractTableRefs,
	findCallExpressions,
	findQualifiedColumnRefs,
	maskLiterals,
	mentionsBareColumn,
	splitCastArgument,
	unwrapFieldArgument,
} from "./sql_analysis.js"

describe("maskLiterals", () => {
	it("should blank string contents and keep offsets", () => {
		expect(maskLiterals("a 'b''c' d")).toBe("a '    ' d")
	})

	it("should blank line comments", () => {
		expect(maskLiterals("SELECT 1 -- x(\nFROM t")).toBe("SELECT 1" + " ".repeat(6) + "\nFROM t")
	})
})

describe("extractTableRefs", () => {
	it("should read qualified tables, aliases and AS", () => {
		const sql = "SELECT c.x FROM fhir_prd_db.condition c JOIN procedure AS p ON c.id = p.id WHERE c.y = 1"
		expect(extractTableRefs(sql)).toEqual([
			{ table: "condition", qualified: "fhir_prd_db.condition", alias: "c" },
			{ table: "procedure", qualified: "procedure", alias: "p" },
		])
	})

	it("should address an unaliased table by its name", () => {
		expect(extractAliases("SELECT * FROM condition WHERE x = 1")).toEqual({ condition: "condition" })
	})

	it("should ignore FROM inside string literals", () => {
		expect(extractTableRefs("SELECT 'from nowhere' FROM condition c")).toEqual([
			{ table: "condition", qualified: "condition", alias: "c" },
		])
	})
})

describe("findCallExpressions", () => {
	it("should return the call text and its arguments", () => {
		const calls = findCallExpressions("SELECT date_parse(c.onset, '%Y-%m-%d') FROM condition c")
		expect(calls).toHaveLength(1)
		expect(calls[0].name).toBe("date_parse")
		expect(calls[0].text).toBe("date_parse(c.onset, '%Y-%m-%d')")
		expect(calls[0].args.map((a) => a.text)).toEqual(["c.onset", "'%Y-%m-%d'"])
	})

	it("should find nested calls in source order", () => {
		const calls = findCallExpressions("SELECT date_trunc('day', date_parse(c.x, '%Y')) FROM t c")
		expect(calls.map((c) => c.name)).toEqual(["date_trunc", "date_parse"])
		expect(calls[0].args.map((a) => a.text)).toEqual(["'day'", "date_parse(c.x, '%Y')"])
	})

	it("should not split on commas or parentheses inside literals", () => {
		const calls = findCallExpressions("SELECT coalesce(c.a, 'x, (y') FROM t c")
		expect(calls[0].args.map((a) => a.text)).toEqual(["c.a", "'x, (y'"])
	})

	it("should skip keywords followed by a parenthesis", () => {
		expect(findCallExpressions("SELECT * FROM t c WHERE c.x IN ('a', 'b')")).toEqual([])
	})

	it("should filter by function name", () => {
		const sql = "SELECT upper(c.a), date_parse(c.b, '%Y') FROM t c"
		expect(findCallExpressions(sql, new Set(["date_parse"])).map((c) => c.text)).toEqual(["date_parse(c.b, '%Y')"])
	})
})

describe("findQualifiedColumnRefs", () => {
	it("should find references outside literals", () => {
		const refs = findQualifiedColumnRefs("SELECT c.onset FROM db.condition c WHERE c.note = 'a.b'")
		expect(refs.map((r) => r.text)).toEqual(["c.onset", "db.condition", "c.note"])
	})

	it("should detect bare column mentions", () => {
		expect(mentionsBareColumn("SELECT onset FROM condition", "onset")).toBe(true)
		expect(mentionsBareColumn("SELECT c.onset FROM condition c", "onset")).toBe(false)
	})
})

describe("unwrapFieldArgument", () => {
	it("should read qualified and bare columns", () => {
		expect(unwrapFieldArgument(" c.onset ")).toEqual({ qualifier: "c", column: "onset", expression: "c.onset" })
		expect(unwrapFieldArgument("onset")).toEqual({ qualifier: null, column: "onset", expression: "onset" })
	})

	it("should see through CAST and keep the cast as the expression", () => {
		expect(unwrapFieldArgument("CAST(c.onset AS varchar(10))")).toEqual({
			qualifier: "c",
			column: "onset",
			expression: "CAST(c.onset AS varchar(10))",
		})
	})

	it("should return null for computed expressions", () => {
		expect(unwrapFieldArgument("upper(c.x)")).toBeNull()
		expect(unwrapFieldArgument("c.a || c.b")).toBeNull()
	})

	it("should split CAST arguments", () => {
		expect(splitCastArgument("c.x AS timestamp")).toEqual({ operand: "c.x", targetType: "timestamp" })
	})
})

describe("detectUnsupportedShape", () => {
	it("should accept a single flat statement", () => {
		expect(detectUnsupportedShape("SELECT 1 FROM t;")).toBeNull()
		expect(detectUnsupportedShape("SELECT ';' FROM t")).toBeNull()
	})

	it("should flag multiple statements, CTEs and subqueries", () => {
		expect(detectUnsupportedShape("SELECT 1; SELECT 2")).toBe("multi_statement")
		expect(detectUnsupportedShape("WITH a AS (SELECT 1) SELECT * FROM a")).toBe("cte")
		expect(detectUnsupportedShape("SELECT * FROM (SELECT 1) t")).toBe("subquery")
	})
})
