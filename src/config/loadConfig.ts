/**
 * Unified config loader for the reasoning core.
 *
 * Precedence: ENV > config/config.local.yaml > config/config.yaml
 *
 * The merged document is validated (and defaulted) by configSchema, so every
 * field of ReasoningConfig is present after loading.
 */

import * as fs from "fs"
import * as path from "path"
import * as yaml from "js-yaml"
import { z } from "zod"
import { ConfigError } from "../errors.js"

// ── Schema ───────────────────────────────────────────────────────────

const prioritySchema = z.enum(["highest", "high", "medium", "low"])

export const configSchema = z.object({
	database: z
		.object({
			host: z.string().default("localhost"),
			port: z.number().int().positive().default(5432),
			name: z.string().default("postgres"),
			user: z.string().default("postgres"),
			password: z.string().default(""),
		})
		.default({}),
	schema: z
		.object({
			csv_path: z.string().default("data/schema.csv"),
			database: z.string().default(""),
			entity_keyword: z.string().default("patient"),
			reference_columns: z.array(z.string()).default(["subject_reference", "patient_reference", "patient_id", "patient_fhir_id"]),
			prefixed_reference_columns: z.array(z.string()).default(["subject_reference", "patient_reference"]),
			reference_suffixes: z.array(z.string()).default(["_reference", "_id"]),
			reference_prefix: z.string().default("Patient/"),
			date_vocabulary: z.array(z.string()).default(["date", "time", "period", "_at", "_on", "start", "end", "recorded", "issued"]),
			identifier_suffixes: z.array(z.string()).default(["_id", "_reference", "_fhir_id", "_key"]),
			sample_limit: z.number().int().positive().default(20),
		})
		.default({}),
	knowledge: z
		.object({
			reference_path: z.string().default("data/who_cns5_reference.md"),
			strict: z.boolean().default(false),
			molecular_tokens: z.array(z.string()).default(["idh", "1p/19q", "h3", "braf", "fgfr", "myb", "mn1", "smarcb1", "mapk"]),
		})
		.default({}),
	investigation: z
		.object({
			dialect: z.enum(["trino", "postgres"]).default("postgres"),
			min_samples: z.number().int().nonnegative().default(5),
			thin_sample_penalty: z.number().min(0).max(1).default(0.15),
			ambiguity_penalty: z.number().min(0).max(1).default(0.1),
			max_ambiguity_penalty: z.number().min(0).max(1).default(0.3),
			unknown_column_confidence_cap: z.number().min(0).max(1).default(0.6),
			max_fields: z.number().int().positive().default(3),
		})
		.default({}),
	orchestrator: z
		.object({
			auto_fix_threshold: z.number().min(0).max(1).default(0.8),
			max_retry_depth: z.number().int().nonnegative().default(2),
			query_timeout_ms: z.number().int().positive().default(60000),
			max_cycles: z.number().int().positive().default(3),
			max_gaps_per_cycle: z.number().int().positive().default(5),
			gap_priorities: z
				.array(
					z.object({
						match: z.string(),
						field: z.string(),
						priority: prioritySchema,
					}),
				)
				.default([]),
		})
		.default({}),
	reports: z
		.object({
			enabled: z.boolean().default(true),
			dir: z.string().default("reports"),
		})
		.default({}),
	logging: z
		.object({
			level: z.enum(["debug", "info", "warn", "error"]).default("info"),
		})
		.default({}),
})

export type ReasoningConfig = z.infer<typeof configSchema>

// ── YAML Loading ─────────────────────────────────────────────────────

type PlainObject = Record<string, unknown>

function isPlainObject(value: unknown): value is PlainObject {
	return value !== null && typeof value === "object" && !Array.isArray(value)
}

function findConfigDir(): string | null {
	// Walk up from cwd looking for config/config.yaml
	let dir = process.cwd()
	for (let i = 0; i < 10; i++) {
		const candidate = path.join(dir, "config", "config.yaml")
		if (fs.existsSync(candidate)) return path.join(dir, "config")
		const parent = path.dirname(dir)
		if (parent === dir) break
		dir = parent
	}
	return null
}

function loadYaml(filePath: string): PlainObject {
	if (!fs.existsSync(filePath)) return {}
	const raw = fs.readFileSync(filePath, "utf-8")
	const parsed: unknown = yaml.load(raw)
	if (parsed === undefined || parsed === null) return {}
	if (!isPlainObject(parsed)) {
		throw new ConfigError(`Config file ${filePath} must contain a YAML mapping`)
	}
	return parsed
}

/** Deep merge b into a (b wins on conflicts). */
export function deepMerge(a: PlainObject, b: PlainObject): PlainObject {
	const result: PlainObject = { ...a }
	for (const key of Object.keys(b)) {
		const left = a[key]
		const right = b[key]
		if (isPlainObject(left) && isPlainObject(right)) {
			result[key] = deepMerge(left, right)
		} else if (right !== undefined) {
			result[key] = right
		}
	}
	return result
}

// ── Env Overlay ──────────────────────────────────────────────────────

function env(name: string): string | undefined {
	return process.env[name]
}
function envBool(name: string): boolean | undefined {
	const v = env(name)
	if (v === undefined) return undefined
	return v === "true" || v === "1"
}
function envInt(name: string): number | undefined {
	const v = env(name)
	if (v === undefined) return undefined
	const n = parseInt(v, 10)
	return isNaN(n) ? undefined : n
}
function envFloat(name: string): number | undefined {
	const v = env(name)
	if (v === undefined) return undefined
	const n = parseFloat(v)
	return isNaN(n) ? undefined : n
}

/** Collect env-var overrides as a partial config document. */
function envOverrides(): PlainObject {
	return {
		database: {
			host: env("DB_HOST"),
			port: envInt("DB_PORT"),
			name: env("DB_NAME"),
			user: env("DB_USER"),
			password: env("DB_PASSWORD"),
		},
		schema: {
			csv_path: env("SCHEMA_CSV_PATH"),
		},
		knowledge: {
			reference_path: env("KNOWLEDGE_REFERENCE_PATH"),
		},
		investigation: {
			dialect: env("SQL_DIALECT"),
		},
		orchestrator: {
			auto_fix_threshold: envFloat("AUTO_FIX_THRESHOLD"),
			max_retry_depth: envInt("MAX_RETRY_DEPTH"),
			query_timeout_ms: envInt("QUERY_TIMEOUT_MS"),
			max_cycles: envInt("GAP_MAX_CYCLES"),
			max_gaps_per_cycle: envInt("GAP_MAX_PER_CYCLE"),
		},
		reports: {
			dir: env("REPORT_DIR"),
			enabled: envBool("REPORTS_ENABLED"),
		},
		logging: {
			level: env("LOG_LEVEL")?.toLowerCase(),
		},
	}
}

/** Validate a raw config document, filling defaults. */
export function parseConfig(raw: unknown): ReasoningConfig {
	const result = configSchema.safeParse(raw)
	if (!result.success) {
		const issues = result.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`)
		throw new ConfigError(`Invalid configuration: ${issues.join("; ")}`, { issues })
	}
	return result.data
}

// ── Singleton ────────────────────────────────────────────────────────

let _config: ReasoningConfig | null = null

export function loadConfig(): ReasoningConfig {
	if (_config) return _config

	const configDir = findConfigDir()
	let merged: PlainObject = {}

	if (configDir) {
		const base = loadYaml(path.join(configDir, "config.yaml"))
		const local = loadYaml(path.join(configDir, "config.local.yaml"))
		merged = deepMerge(base, local)
	}

	merged = deepMerge(merged, envOverrides())
	_config = parseConfig(merged)
	return _config
}

export function getConfig(): ReasoningConfig {
	return _config ?? loadConfig()
}

/** Reset singleton (for tests). */
export function resetConfig(): void {
	_config = null
}
