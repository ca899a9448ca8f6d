/**
 * Clinical reasoning core
 *
 * Wires the schema catalog, failure investigator, knowledge base and report
 * sink from one ReasoningConfig. Callers supply the extraction side (a
 * GapExtractor and an ExtractedDataStore) per entity through
 * createOrchestrator().
 */

import { getConfig } from "./config/loadConfig.js"
import type { ReasoningConfig } from "./config/loadConfig.js"
import { QueryFailureInvestigator, investigatorOptionsFromConfig } from "./failure_investigator.js"
import { KnowledgeBase } from "./knowledge_base.js"
import { createStderrLogger } from "./logger.js"
import type { Logger } from "./logger.js"
import { PgQueryExecutor, createPgPool } from "./query_executor.js"
import type { QueryExecutor } from "./query_executor.js"
import { ReasoningOrchestrator } from "./reasoning_orchestrator.js"
import type { ExtractedDataStore, GapExtractor } from "./reasoning_orchestrator.js"
import { createReportSink } from "./report_writer.js"
import type { ReportSink } from "./report_writer.js"
import { SchemaCatalog, catalogOptionsFromConfig } from "./schema_catalog.js"

export * from "./errors.js"
export * from "./logger.js"
export * from "./reasoning_types.js"
export * from "./query_executor.js"
export * from "./schema_catalog.js"
export * from "./failure_investigator.js"
export * from "./knowledge_base.js"
export * from "./reasoning_orchestrator.js"
export * from "./report_writer.js"
export { analyzeFormats, classifyDateShape, parseWithFallbackChain, renderFallbackChain } from "./date_formats.js"
export { classifyError } from "./error_classifier.js"
export { configSchema, deepMerge, getConfig, loadConfig, parseConfig, resetConfig } from "./config/loadConfig.js"
export type { ReasoningConfig } from "./config/loadConfig.js"

export interface CoreOverrides {
	logger?: Logger
	/** Replaces the pg-backed executor (and skips opening a pool) */
	executor?: QueryExecutor
	catalog?: SchemaCatalog
	knowledge?: KnowledgeBase
	reports?: ReportSink
}

export interface ReasoningCore {
	readonly config: ReasoningConfig
	readonly logger: Logger
	readonly catalog: SchemaCatalog
	readonly knowledge: KnowledgeBase
	readonly investigator: QueryFailureInvestigator
	readonly executor: QueryExecutor
	readonly reports: ReportSink
	createOrchestrator(entityId: string, extractor: GapExtractor, store: ExtractedDataStore): ReasoningOrchestrator
	/** Release the database pool, if the core opened one */
	close(): Promise<void>
}

export function createReasoningCore(config: ReasoningConfig = getConfig(), overrides: CoreOverrides = {}): ReasoningCore {
	const logger = overrides.logger ?? createStderrLogger(config.logging.level)

	const catalog = overrides.catalog ?? SchemaCatalog.load(config.schema.csv_path, catalogOptionsFromConfig(config.schema))
	const knowledge =
		overrides.knowledge ??
		KnowledgeBase.load(config.knowledge.reference_path, {
			strict: config.knowledge.strict,
			molecularTokens: config.knowledge.molecular_tokens,
			logger,
		})

	let close = async (): Promise<void> => {}
	let executor = overrides.executor
	if (!executor) {
		const pool = createPgPool({
			host: config.database.host,
			port: config.database.port,
			database: config.database.name,
			user: config.database.user,
			password: config.database.password,
		})
		pool.on("error", (error) => {
			logger.error("Idle database client failed", { error: error.message })
		})
		executor = new PgQueryExecutor(pool, logger)
		close = () => pool.end()
	}

	const investigator = new QueryFailureInvestigator(catalog, executor, logger, investigatorOptionsFromConfig(config))
	const reports = overrides.reports ?? createReportSink(config.reports, logger)

	logger.info("Reasoning core ready", {
		tables: catalog.listTables().length,
		knowledge: knowledge.summary(),
		dialect: config.investigation.dialect,
	})

	const queryExecutor = executor
	return {
		config,
		logger,
		catalog,
		knowledge,
		investigator,
		executor: queryExecutor,
		reports,
		createOrchestrator(entityId, extractor, store) {
			return new ReasoningOrchestrator(
				{ catalog, investigator, executor: queryExecutor, extractor, store, reports, logger },
				{
					entityId,
					autoFixThreshold: config.orchestrator.auto_fix_threshold,
					maxRetryDepth: config.orchestrator.max_retry_depth,
					queryTimeoutMs: config.orchestrator.query_timeout_ms,
					maxCycles: config.orchestrator.max_cycles,
					maxGapsPerCycle: config.orchestrator.max_gaps_per_cycle,
					gapPriorities: config.orchestrator.gap_priorities,
				},
			)
		},
		close: () => close(),
	}
}
