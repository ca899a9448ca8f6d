import { describe, it, expect, beforeEach, afterEach } from "vitest"
import * as fs from "fs"
import * as path from "path"
import * as os from "os"
import { ConfigError } from "../errors.js"
import { deepMerge, getConfig, loadConfig, parseConfig, resetConfig } from "./loadConfig.js"

/**
 * Tests for the unified config loader.
 *
 * Strategy: create a temp directory with config/config.yaml (and optionally
 * config.local.yaml), chdir into it, and verify loadConfig() reads the right
 * values. Env-var overrides are tested by setting process.env before loading.
 */

let tmpDir: string
let originalCwd: string
const savedEnv: Record<string, string | undefined> = {}

// Env vars that the loader reads; saved and restored between tests
const ENV_VARS = [
	"DB_HOST", "DB_PORT", "DB_NAME", "DB_USER", "DB_PASSWORD",
	"SCHEMA_CSV_PATH", "KNOWLEDGE_REFERENCE_PATH", "SQL_DIALECT",
	"AUTO_FIX_THRESHOLD", "MAX_RETRY_DEPTH", "QUERY_TIMEOUT_MS",
	"GAP_MAX_CYCLES", "GAP_MAX_PER_CYCLE",
	"REPORT_DIR", "REPORTS_ENABLED", "LOG_LEVEL",
]

function writeYaml(dir: string, filename: string, content: string) {
	const configDir = path.join(dir, "config")
	fs.mkdirSync(configDir, { recursive: true })
	fs.writeFileSync(path.join(configDir, filename), content)
}

beforeEach(() => {
	resetConfig()
	for (const v of ENV_VARS) {
		savedEnv[v] = process.env[v]
		delete process.env[v]
	}
	tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "reasoning-config-test-"))
	originalCwd = process.cwd()
	process.chdir(tmpDir)
})

afterEach(() => {
	process.chdir(originalCwd)
	fs.rmSync(tmpDir, { recursive: true, force: true })
	for (const v of ENV_VARS) {
		if (savedEnv[v] === undefined) {
			delete process.env[v]
		} else {
			process.env[v] = savedEnv[v]
		}
	}
	resetConfig()
})

// ── Basic Loading ─────────────────────────────────────────────────────

describe("loadConfig basic YAML loading", () => {
	it("loads values from config/config.yaml", () => {
		writeYaml(tmpDir, "config.yaml", `
database:
  host: myhost
  port: 5433
  name: testdb
  user: testuser
  password: test-secret
schema:
  csv_path: fixtures/schema.csv
  database: clinical
knowledge:
  strict: true
investigation:
  dialect: trino
  min_samples: 3
orchestrator:
  auto_fix_threshold: 0.7
  max_retry_depth: 1
  gap_priorities:
    - match: condition
      field: diagnosis
      priority: highest
reports:
  enabled: false
logging:
  level: debug
`)
		const config = loadConfig()

		expect(config.database).toEqual({
			host: "myhost",
			port: 5433,
			name: "testdb",
			user: "testuser",
			password: "test-secret",
		})
		expect(config.schema.csv_path).toBe("fixtures/schema.csv")
		expect(config.schema.database).toBe("clinical")
		expect(config.knowledge.strict).toBe(true)
		expect(config.investigation.dialect).toBe("trino")
		expect(config.investigation.min_samples).toBe(3)
		expect(config.orchestrator.auto_fix_threshold).toBe(0.7)
		expect(config.orchestrator.max_retry_depth).toBe(1)
		expect(config.orchestrator.gap_priorities).toEqual([
			{ match: "condition", field: "diagnosis", priority: "highest" },
		])
		expect(config.reports.enabled).toBe(false)
		expect(config.logging.level).toBe("debug")
	})

	it("fills defaults for sections the file leaves out", () => {
		writeYaml(tmpDir, "config.yaml", "database:\n  host: myhost\n")
		const config = loadConfig()

		expect(config.database.port).toBe(5432)
		expect(config.knowledge.reference_path).toBe("data/who_cns5_reference.md")
		expect(config.investigation.dialect).toBe("postgres")
		expect(config.orchestrator.auto_fix_threshold).toBe(0.8)
		expect(config.orchestrator.max_cycles).toBe(3)
		expect(config.reports).toEqual({ enabled: true, dir: "reports" })
		expect(config.logging.level).toBe("info")
	})

	it("uses defaults when no config directory exists", () => {
		const config = loadConfig()
		expect(config.database.host).toBe("localhost")
		expect(config.schema.sample_limit).toBe(20)
		expect(config.orchestrator.gap_priorities).toEqual([])
	})

	it("treats an empty file as an empty document", () => {
		writeYaml(tmpDir, "config.yaml", "")
		expect(loadConfig().database.name).toBe("postgres")
	})

	it("rejects a file that is not a mapping", () => {
		writeYaml(tmpDir, "config.yaml", "- one\n- two\n")
		expect(() => loadConfig()).toThrow(ConfigError)
	})

	it("finds config/ in a parent directory", () => {
		writeYaml(tmpDir, "config.yaml", "database:\n  name: parentdb\n")
		const nested = path.join(tmpDir, "a", "b")
		fs.mkdirSync(nested, { recursive: true })
		process.chdir(nested)

		expect(loadConfig().database.name).toBe("parentdb")
	})

	it("caches the loaded config until reset", () => {
		writeYaml(tmpDir, "config.yaml", "database:\n  name: first\n")
		const first = loadConfig()
		writeYaml(tmpDir, "config.yaml", "database:\n  name: second\n")

		expect(getConfig()).toBe(first)
		expect(loadConfig().database.name).toBe("first")

		resetConfig()
		expect(getConfig().database.name).toBe("second")
	})
})

// ── Local Overlay ─────────────────────────────────────────────────────

describe("config.local.yaml overlay", () => {
	it("overrides base values without dropping siblings", () => {
		writeYaml(tmpDir, "config.yaml", `
database:
  host: basehost
  name: basedb
orchestrator:
  max_cycles: 4
  max_gaps_per_cycle: 2
`)
		writeYaml(tmpDir, "config.local.yaml", `
database:
  host: localhost-override
orchestrator:
  max_cycles: 6
`)
		const config = loadConfig()

		expect(config.database.host).toBe("localhost-override")
		expect(config.database.name).toBe("basedb")
		expect(config.orchestrator.max_cycles).toBe(6)
		expect(config.orchestrator.max_gaps_per_cycle).toBe(2)
	})

	it("replaces arrays rather than merging them", () => {
		writeYaml(tmpDir, "config.yaml", "schema:\n  reference_columns: [a, b]\n")
		writeYaml(tmpDir, "config.local.yaml", "schema:\n  reference_columns: [c]\n")

		expect(loadConfig().schema.reference_columns).toEqual(["c"])
	})
})

// ── Env Overrides ─────────────────────────────────────────────────────

describe("env-var overrides", () => {
	it("env wins over both YAML files", () => {
		writeYaml(tmpDir, "config.yaml", "database:\n  host: basehost\n")
		writeYaml(tmpDir, "config.local.yaml", "database:\n  host: localhost-override\n")
		process.env.DB_HOST = "envhost"

		expect(loadConfig().database.host).toBe("envhost")
	})

	it("parses numeric env vars", () => {
		process.env.DB_PORT = "6543"
		process.env.AUTO_FIX_THRESHOLD = "0.65"
		process.env.MAX_RETRY_DEPTH = "4"
		process.env.QUERY_TIMEOUT_MS = "1500"
		process.env.GAP_MAX_CYCLES = "2"
		process.env.GAP_MAX_PER_CYCLE = "7"
		const config = loadConfig()

		expect(config.database.port).toBe(6543)
		expect(config.orchestrator).toEqual({
			auto_fix_threshold: 0.65,
			max_retry_depth: 4,
			query_timeout_ms: 1500,
			max_cycles: 2,
			max_gaps_per_cycle: 7,
			gap_priorities: [],
		})
	})

	it("ignores numeric env vars that do not parse", () => {
		writeYaml(tmpDir, "config.yaml", "database:\n  port: 5433\n")
		process.env.DB_PORT = "not-a-port"

		expect(loadConfig().database.port).toBe(5433)
	})

	it("parses boolean env vars", () => {
		process.env.REPORTS_ENABLED = "0"
		expect(loadConfig().reports.enabled).toBe(false)

		resetConfig()
		process.env.REPORTS_ENABLED = "1"
		expect(loadConfig().reports.enabled).toBe(true)
	})

	it("reads paths, dialect and log level", () => {
		process.env.SCHEMA_CSV_PATH = "/srv/schema.csv"
		process.env.KNOWLEDGE_REFERENCE_PATH = "/srv/reference.md"
		process.env.SQL_DIALECT = "trino"
		process.env.REPORT_DIR = "/srv/reports"
		process.env.LOG_LEVEL = "WARN"
		const config = loadConfig()

		expect(config.schema.csv_path).toBe("/srv/schema.csv")
		expect(config.knowledge.reference_path).toBe("/srv/reference.md")
		expect(config.investigation.dialect).toBe("trino")
		expect(config.reports.dir).toBe("/srv/reports")
		expect(config.logging.level).toBe("warn")
	})

	it("rejects an unknown dialect", () => {
		process.env.SQL_DIALECT = "mysql"
		expect(() => loadConfig()).toThrow(ConfigError)
	})
})

// ── Validation ────────────────────────────────────────────────────────

describe("parseConfig validation", () => {
	it("returns a fully defaulted config for an empty document", () => {
		const config = parseConfig({})
		expect(config.investigation).toEqual({
			dialect: "postgres",
			min_samples: 5,
			thin_sample_penalty: 0.15,
			ambiguity_penalty: 0.1,
			max_ambiguity_penalty: 0.3,
			unknown_column_confidence_cap: 0.6,
			max_fields: 3,
		})
	})

	it("names every invalid field in the error", () => {
		expect(() =>
			parseConfig({ orchestrator: { auto_fix_threshold: 1.5 }, database: { port: -1 } }),
		).toThrow(/database\.port: .*; orchestrator\.auto_fix_threshold: /)
	})

	it("rejects an unknown gap priority", () => {
		const raw = { orchestrator: { gap_priorities: [{ match: "x", field: "y", priority: "urgent" }] } }
		expect(() => parseConfig(raw)).toThrow(ConfigError)
	})
})

describe("deepMerge", () => {
	it("merges nested objects and lets the right side win", () => {
		expect(deepMerge({ a: { x: 1, y: 2 }, b: 1 }, { a: { y: 3 }, c: 4 })).toEqual({
			a: { x: 1, y: 3 },
			b: 1,
			c: 4,
		})
	})

	it("skips undefined values on the right", () => {
		expect(deepMerge({ a: { x: 1 } }, { a: { x: undefined } })).toEqual({ a: { x: 1 } })
	})
})
