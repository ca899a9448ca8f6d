/**
 * Report sinks
 *
 * Investigation reports (one per query that needs manual review) and coverage
 * reports (one per gap-filling run) are the only artifacts the core writes.
 * Sink failures are logged and never reach the caller.
 */

import * as fs from "fs"
import * as path from "path"
import type { ReasoningConfig } from "./config/loadConfig.js"
import { describeError } from "./errors.js"
import type { Logger } from "./logger.js"
import type { FailureReport, GapFillingRun } from "./reasoning_types.js"

export interface ReportSink {
	writeFailureReport(report: FailureReport): void
	writeCoverageReport(run: GapFillingRun): void
}

/** Keep file names to a safe character set */
function safeName(value: string): string {
	return value.replace(/[^\w.-]+/g, "_")
}

export class FileReportSink implements ReportSink {
	constructor(
		private dir: string,
		private logger: Logger,
	) {}

	writeFailureReport(report: FailureReport): void {
		this.write(path.join(this.dir, "investigations", `${safeName(report.query_id)}.json`), report)
	}

	writeCoverageReport(run: GapFillingRun): void {
		this.write(path.join(this.dir, "coverage", `${safeName(run.entity_id)}_${safeName(run.run_id)}.json`), run)
	}

	private write(file: string, body: FailureReport | GapFillingRun): void {
		try {
			fs.mkdirSync(path.dirname(file), { recursive: true })
			fs.writeFileSync(file, JSON.stringify(body, null, 2) + "\n")
			this.logger.debug("Report written", { file })
		} catch (error) {
			this.logger.error("Failed to write report", { file, error: describeError(error) })
		}
	}
}

export class MemoryReportSink implements ReportSink {
	readonly failureReports: FailureReport[] = []
	readonly coverageReports: GapFillingRun[] = []

	writeFailureReport(report: FailureReport): void {
		this.failureReports.push(report)
	}

	writeCoverageReport(run: GapFillingRun): void {
		this.coverageReports.push(run)
	}
}

export function createReportSink(config: ReasoningConfig["reports"], logger: Logger): ReportSink {
	if (!config.enabled) {
		logger.info("Report files disabled; keeping reports in memory")
		return new MemoryReportSink()
	}
	return new FileReportSink(config.dir, logger)
}
