/**
 * Domain Knowledge Base
 *
 * Parses a markdown reference document into tagged rules and validates
 * extracted diagnosis names against them:
 * - context rules: typical age range, locations and required secondary tests
 * - override rules: secondary findings that change a classification's grade or name
 * - nomenclature rules: obsolete names and their current terms
 *
 * Each `##` section has its own parser. A malformed section fails only its own
 * rule category; the issue is kept in `loadIssues` (or thrown in strict mode).
 */

import * as fs from "fs"
import { KnowledgeParseError, describeError } from "./errors.js"
import { silentLogger } from "./logger.js"
import type { Logger } from "./logger.js"

// ============================================================================
// Rule Types
// ============================================================================

export type AgeGroup = "adult" | "pediatric" | "any"

const AGE_GROUPS: readonly string[] = ["adult", "pediatric", "any"]

function isAgeGroup(value: string): value is AgeGroup {
	return AGE_GROUPS.includes(value)
}

export interface ContextConstraints {
	age_group: AgeGroup
	min_age: number | null
	max_age: number | null
	/** Normalized location tokens; empty = any location */
	locations: readonly string[]
}

export interface DiagnosisRule {
	kind: "context"
	name: string
	context_constraints: ContextConstraints
	required_secondary_tests: readonly string[]
	obsolete_aliases: readonly string[]
	note: string | null
}

export interface GradingOverrideRule {
	kind: "override"
	label: string
	/** Diagnosis the rule applies to; null = any diagnosis */
	applies_to: string | null
	trigger_markers: readonly string[]
	resulting_grade_or_name: string
	rationale: string
}

export interface NomenclatureRule {
	kind: "nomenclature"
	obsolete_term: string
	current_term: string
}

export type KnowledgeRule = DiagnosisRule | GradingOverrideRule | NomenclatureRule

// ============================================================================
// Result Types
// ============================================================================

export type MatchedVia = "exact" | "case_insensitive" | "obsolete_alias" | "none"

export interface OverrideMatch {
	matched_rule: string
	/** Findings that intersected the rule's triggers, in trigger order */
	triggered_by: string[]
	previous_value: string
	new_value: string
	rationale: string
}

export interface SuffixSuggestion {
	suffix: "NOS" | "NEC"
	annotated_name: string
	reason: string
}

export interface ValidationResult {
	valid: boolean
	warnings: string[]
	required_tests_missing: string[]
	suggested_rewrite: string | null
	override: OverrideMatch | null
	suffix_suggestion: SuffixSuggestion | null
	canonical_name: string | null
	matched_via: MatchedVia
}

export interface ClassificationContext {
	age?: number
	location?: string
	testsPerformed?: string[]
	secondaryFindings?: string[]
	secondaryTestingPerformed?: boolean
	secondaryResultsContradictory?: boolean
}

export interface KnowledgeSummary {
	principles: number
	context: number
	override: number
	nomenclature: number
	missing_sections: string[]
	issues: number
}

export interface KnowledgeBaseOptions {
	/** Throw the first parse issue instead of collecting it */
	strict?: boolean
	/** Name fragments that mark a classification as needing molecular testing */
	molecularTokens?: string[]
	logger?: Logger
	source?: string
}

const DEFAULT_MOLECULAR_TOKENS = ["idh", "1p/19q", "h3", "braf", "fgfr", "myb", "mn1", "smarcb1", "mapk"]

// ============================================================================
// Section Registry
// ============================================================================

const SECTION_TITLES = {
	principles: "Diagnostic Principles",
	context: "Context Applicability",
	override: "Molecular Grading Overrides",
	nomenclature: "Nomenclature Changes",
} as const

type SectionKey = keyof typeof SECTION_TITLES

const REQUIRED_SECTIONS: readonly SectionKey[] = ["context", "override", "nomenclature"]

interface SourceLine {
	line: number
	text: string
}

interface Section {
	title: string
	lines: SourceLine[]
}

interface TableRow {
	line: number
	cells: Map<string, string>
}

// ============================================================================
// Text Helpers
// ============================================================================

function normalizeTerm(value: string): string {
	return value.trim().replace(/\s+/g, " ").toLowerCase()
}

function normalizeLocation(value: string): string {
	return value.trim().toLowerCase().replace(/[\s-]+/g, "_")
}

const SUFFIX_PATTERN = /,\s*(NOS|NEC)\s*$/i

function stripSuffix(name: string): string {
	return name.replace(SUFFIX_PATTERN, "").trim()
}

function splitList(cell: string): string[] {
	return cell
		.split(";")
		.map((v) => v.trim())
		.filter((v) => v !== "" && v !== "*")
}

function sectionKey(heading: string): string {
	return heading
		.replace(/\*/g, "")
		.replace(/^section\s+\d+\s*:\s*/i, "")
		.trim()
		.toLowerCase()
}

function splitSections(text: string): Map<string, Section> {
	const sections = new Map<string, Section>()
	let current: Section | null = null

	text.split(/\r?\n/).forEach((raw, index) => {
		const heading = /^##\s+(.+?)\s*$/.exec(raw)
		if (heading) {
			current = { title: heading[1], lines: [] }
			const key = sectionKey(heading[1])
			if (!sections.has(key)) sections.set(key, current)
			return
		}
		// A level-one heading closes the current section
		if (/^#\s/.test(raw)) {
			current = null
			return
		}
		current?.lines.push({ line: index + 1, text: raw })
	})

	return sections
}

function splitRow(text: string): string[] {
	return text
		.trim()
		.replace(/^\|/, "")
		.replace(/\|$/, "")
		.split("|")
		.map((cell) => cell.trim())
}

/**
 * Read the first pipe table of a section. Header names are matched
 * case-insensitively; every required column must be present and every row
 * must have as many cells as the header.
 */
function parseTable(section: Section, sectionName: string, required: readonly string[]): TableRow[] {
	const tableLines = section.lines.filter((l) => l.text.trim().startsWith("|"))
	if (tableLines.length === 0) {
		throw new KnowledgeParseError(sectionName, "Section has no table")
	}

	const [headerLine, ...rest] = tableLines
	const header = splitRow(headerLine.text).map((h) => h.toLowerCase())
	const missing = required.filter((col) => !header.includes(col.toLowerCase()))
	if (missing.length > 0) {
		throw new KnowledgeParseError(sectionName, `Table is missing columns: ${missing.join(", ")}`, {
			line: headerLine.line,
		})
	}

	const rows: TableRow[] = []
	for (const entry of rest) {
		if (/^\|?[\s:|-]+\|?$/.test(entry.text.trim())) continue
		const cells = splitRow(entry.text)
		if (cells.length !== header.length) {
			throw new KnowledgeParseError(
				sectionName,
				`Row has ${cells.length} cells, header has ${header.length}`,
				{ line: entry.line },
			)
		}
		rows.push({ line: entry.line, cells: new Map(header.map((h, i): [string, string] => [h, cells[i]])) })
	}
	return rows
}

function cell(row: TableRow, column: string): string {
	return row.cells.get(column.toLowerCase()) ?? ""
}

function requiredCell(row: TableRow, column: string, sectionName: string): string {
	const value = cell(row, column)
	if (value === "") {
		throw new KnowledgeParseError(sectionName, `Empty '${column}' cell`, { line: row.line })
	}
	return value
}

function optionalAge(row: TableRow, column: string, sectionName: string): number | null {
	const value = cell(row, column)
	if (value === "") return null
	if (!/^\d+$/.test(value)) {
		throw new KnowledgeParseError(sectionName, `'${column}' must be a whole number of years, got '${value}'`, {
			line: row.line,
		})
	}
	return Number(value)
}

// ============================================================================
// Section Parsers
// ============================================================================

function parsePrinciples(section: Section): string[] {
	const principles: string[] = []
	for (const { text } of section.lines) {
		const bullet = /^\s*[-*]\s+(.+?)\s*$/.exec(text)
		if (bullet) principles.push(bullet[1])
	}
	return principles
}

function parseContextRules(section: Section): DiagnosisRule[] {
	const name = SECTION_TITLES.context
	const rows = parseTable(section, name, ["Diagnosis", "Age Group", "Min Age", "Max Age", "Locations", "Required Tests"])

	return rows.map((row) => {
		const ageGroup = cell(row, "Age Group").toLowerCase() || "any"
		if (!isAgeGroup(ageGroup)) {
			throw new KnowledgeParseError(name, `Unknown age group '${ageGroup}'`, { line: row.line })
		}
		const minAge = optionalAge(row, "Min Age", name)
		const maxAge = optionalAge(row, "Max Age", name)
		if (minAge !== null && maxAge !== null && minAge > maxAge) {
			throw new KnowledgeParseError(name, `Min Age ${minAge} exceeds Max Age ${maxAge}`, { line: row.line })
		}
		const note = cell(row, "Note")

		return {
			kind: "context",
			name: requiredCell(row, "Diagnosis", name),
			context_constraints: {
				age_group: ageGroup,
				min_age: minAge,
				max_age: maxAge,
				locations: splitList(cell(row, "Locations")).map(normalizeLocation),
			},
			required_secondary_tests: splitList(cell(row, "Required Tests")),
			obsolete_aliases: [],
			note: note === "" ? null : note,
		}
	})
}

function parseOverrideRules(section: Section): GradingOverrideRule[] {
	const name = SECTION_TITLES.override
	const rows = parseTable(section, name, ["Applies To", "Trigger Markers", "Result", "Rationale"])

	return rows.map((row) => {
		const appliesTo = cell(row, "Applies To")
		const markers = splitList(requiredCell(row, "Trigger Markers", name))
		if (markers.length === 0) {
			throw new KnowledgeParseError(name, "Rule has no trigger markers", { line: row.line })
		}
		const result = requiredCell(row, "Result", name)
		const target = appliesTo === "" || appliesTo === "*" ? null : appliesTo

		return {
			kind: "override",
			label: `${target ?? "any diagnosis"} -> ${result}`,
			applies_to: target,
			trigger_markers: markers,
			resulting_grade_or_name: result,
			rationale: requiredCell(row, "Rationale", name),
		}
	})
}

function parseNomenclatureRules(section: Section): NomenclatureRule[] {
	const name = SECTION_TITLES.nomenclature
	return parseTable(section, name, ["Obsolete Term", "Current Term"]).map((row) => ({
		kind: "nomenclature",
		obsolete_term: requiredCell(row, "Obsolete Term", name),
		current_term: requiredCell(row, "Current Term", name),
	}))
}

// ============================================================================
// Knowledge Base
// ============================================================================

interface Resolution {
	canonical: string
	rule: DiagnosisRule | null
	via: Exclude<MatchedVia, "none">
}

export class KnowledgeBase {
	readonly loadIssues: readonly KnowledgeParseError[]
	readonly missingSections: readonly string[]
	private readonly principleList: readonly string[]
	private readonly contextRules: readonly DiagnosisRule[]
	private readonly overrideRules: readonly GradingOverrideRule[]
	private readonly nomenclatureRules: readonly NomenclatureRule[]
	private readonly molecularTokens: readonly string[]
	/** Lowercased canonical name -> display name */
	private readonly canonicalNames = new Map<string, string>()
	/** Lowercased obsolete term -> current term */
	private readonly aliases = new Map<string, string>()

	private constructor(parts: {
		principles: string[]
		context: DiagnosisRule[]
		override: GradingOverrideRule[]
		nomenclature: NomenclatureRule[]
		issues: KnowledgeParseError[]
		missing: string[]
		molecularTokens: string[]
	}) {
		for (const rule of parts.nomenclature) {
			this.aliases.set(normalizeTerm(rule.obsolete_term), rule.current_term)
			this.canonicalNames.set(normalizeTerm(rule.current_term), rule.current_term)
		}

		// Attach aliases to the rule named by their current term
		this.contextRules = Object.freeze(
			parts.context.map((rule) => {
				this.canonicalNames.set(normalizeTerm(rule.name), rule.name)
				const aliases = parts.nomenclature
					.filter((n) => normalizeTerm(n.current_term) === normalizeTerm(rule.name))
					.map((n) => n.obsolete_term)
				return Object.freeze({
					...rule,
					context_constraints: Object.freeze({
						...rule.context_constraints,
						locations: Object.freeze([...rule.context_constraints.locations]),
					}),
					required_secondary_tests: Object.freeze([...rule.required_secondary_tests]),
					obsolete_aliases: Object.freeze(aliases),
				})
			}),
		)
		this.overrideRules = Object.freeze(parts.override.map((r) => Object.freeze({ ...r })))
		this.nomenclatureRules = Object.freeze(parts.nomenclature.map((r) => Object.freeze({ ...r })))
		this.principleList = Object.freeze([...parts.principles])
		this.loadIssues = Object.freeze([...parts.issues])
		this.missingSections = Object.freeze([...parts.missing])
		this.molecularTokens = Object.freeze(parts.molecularTokens.map((t) => t.toLowerCase()))
	}

	static parse(text: string, options: KnowledgeBaseOptions = {}): KnowledgeBase {
		const logger = options.logger ?? silentLogger
		const sections = splitSections(text)
		const issues: KnowledgeParseError[] = []
		const missing: string[] = []

		const record = (error: KnowledgeParseError): void => {
			if (options.strict) throw error
			issues.push(error)
			logger.warn("Knowledge section skipped", {
				section: error.section,
				error: error.message,
				source: options.source,
			})
		}

		function run<T>(key: SectionKey, parser: (section: Section) => T[]): T[] {
			const title = SECTION_TITLES[key]
			const section = sections.get(title.toLowerCase())
			if (!section) {
				if (REQUIRED_SECTIONS.includes(key)) {
					missing.push(title)
					record(new KnowledgeParseError(title, `Section '${title}' not found`))
				}
				return []
			}
			try {
				return parser(section)
			} catch (error) {
				if (error instanceof KnowledgeParseError) {
					record(error)
					return []
				}
				throw error
			}
		}

		const kb = new KnowledgeBase({
			principles: run("principles", parsePrinciples),
			context: run("context", parseContextRules),
			override: run("override", parseOverrideRules),
			nomenclature: run("nomenclature", parseNomenclatureRules),
			issues,
			missing,
			molecularTokens: options.molecularTokens ?? DEFAULT_MOLECULAR_TOKENS,
		})

		logger.info("Knowledge base loaded", { ...kb.summary(), source: options.source })
		return kb
	}

	static load(path: string, options: KnowledgeBaseOptions = {}): KnowledgeBase {
		let text: string
		try {
			text = fs.readFileSync(path, "utf-8")
		} catch (error) {
			throw new KnowledgeParseError("document", `Cannot read reference document: ${describeError(error)}`, {
				source: path,
			})
		}
		return KnowledgeBase.parse(text, { ...options, source: options.source ?? path })
	}

	// ------------------------------------------------------------------------
	// Content
	// ------------------------------------------------------------------------

	principles(): readonly string[] {
		return this.principleList
	}

	rules(): KnowledgeRule[] {
		return [...this.contextRules, ...this.overrideRules, ...this.nomenclatureRules]
	}

	summary(): KnowledgeSummary {
		return {
			principles: this.principleList.length,
			context: this.contextRules.length,
			override: this.overrideRules.length,
			nomenclature: this.nomenclatureRules.length,
			missing_sections: [...this.missingSections],
			issues: this.loadIssues.length,
		}
	}

	// ------------------------------------------------------------------------
	// Lookup
	// ------------------------------------------------------------------------

	private ruleFor(canonical: string): DiagnosisRule | null {
		const key = normalizeTerm(canonical)
		return this.contextRules.find((r) => normalizeTerm(r.name) === key) ?? null
	}

	/** Exact, then case-insensitive, then through the obsolete-alias map */
	private resolve(name: string): Resolution | null {
		const base = stripSuffix(name)

		const exact = [...this.canonicalNames.values()].find((n) => n === base)
		if (exact !== undefined) return { canonical: exact, rule: this.ruleFor(exact), via: "exact" }

		const folded = this.canonicalNames.get(normalizeTerm(base))
		if (folded !== undefined) return { canonical: folded, rule: this.ruleFor(folded), via: "case_insensitive" }

		const current = this.aliases.get(normalizeTerm(base))
		if (current !== undefined) return { canonical: current, rule: this.ruleFor(current), via: "obsolete_alias" }

		return null
	}

	// ------------------------------------------------------------------------
	// Operations
	// ------------------------------------------------------------------------

	validateClassification(name: string, context: ClassificationContext = {}): ValidationResult {
		const resolved = this.resolve(name)
		if (!resolved) {
			return {
				valid: false,
				warnings: [`'${name}' is not a recognized classification`],
				required_tests_missing: [],
				suggested_rewrite: null,
				override: null,
				suffix_suggestion: null,
				canonical_name: null,
				matched_via: "none",
			}
		}

		const { canonical, rule, via } = resolved
		const warnings: string[] = []

		if (via === "obsolete_alias") {
			warnings.push(`'${stripSuffix(name)}' is obsolete; current term is '${canonical}'`)
		}

		if (rule) {
			const { min_age, max_age, locations } = rule.context_constraints
			const note = rule.note ? ` (${rule.note})` : ""
			if (context.age !== undefined) {
				if (min_age !== null && context.age < min_age) {
					warnings.push(`Age ${context.age} is below the typical minimum of ${min_age} for ${canonical}${note}`)
				} else if (max_age !== null && context.age > max_age) {
					warnings.push(`Age ${context.age} is above the typical maximum of ${max_age} for ${canonical}${note}`)
				}
			}
			if (context.location !== undefined && locations.length > 0) {
				if (!locations.includes(normalizeLocation(context.location))) {
					warnings.push(
						`Location '${context.location}' is atypical for ${canonical} (typical: ${locations.join(", ")})`,
					)
				}
			}
		}

		const performed = new Set((context.testsPerformed ?? []).map(normalizeTerm))
		const requiredMissing = (rule?.required_secondary_tests ?? []).filter((t) => !performed.has(normalizeTerm(t)))

		const findings = context.secondaryFindings ?? []
		const override = findings.length > 0 ? this.checkOverride(canonical, findings)[0] ?? null : null

		const suffix =
			context.secondaryTestingPerformed !== undefined
				? this.suggestSuffix(canonical, context.secondaryTestingPerformed, context.secondaryResultsContradictory ?? false)
				: null

		return {
			valid: true,
			warnings,
			required_tests_missing: requiredMissing,
			suggested_rewrite: via === "obsolete_alias" ? canonical : null,
			override,
			suffix_suggestion: suffix,
			canonical_name: canonical,
			matched_via: via,
		}
	}

	/**
	 * Every override rule that applies to the (canonicalized) name and whose
	 * triggers intersect the findings, in rule definition order.
	 */
	checkOverride(name: string, findings: Iterable<string>): OverrideMatch[] {
		const canonical = this.resolve(name)?.canonical ?? stripSuffix(name)
		const target = normalizeTerm(canonical)
		const present = new Set([...findings].map(normalizeTerm))
		const matches: OverrideMatch[] = []

		for (const rule of this.overrideRules) {
			if (rule.applies_to !== null) {
				const ruleTarget = this.resolve(rule.applies_to)?.canonical ?? rule.applies_to
				if (normalizeTerm(ruleTarget) !== target) continue
			}
			const triggered = rule.trigger_markers.filter((m) => present.has(normalizeTerm(m)))
			if (triggered.length === 0) continue

			matches.push({
				matched_rule: rule.label,
				triggered_by: triggered,
				previous_value: canonical,
				new_value: rule.resulting_grade_or_name,
				rationale: rule.rationale,
			})
		}

		return matches
	}

	/**
	 * NOS when required secondary testing was not performed, NEC when it was
	 * performed but contradictory; null when the name needs no such testing
	 * or is already specified.
	 */
	suggestSuffix(name: string, testingPerformed: boolean, resultsContradictory: boolean): SuffixSuggestion | null {
		const resolved = this.resolve(name)
		const base = resolved?.canonical ?? stripSuffix(name)
		const lower = base.toLowerCase()
		const needsTesting =
			(resolved?.rule?.required_secondary_tests.length ?? 0) > 0 ||
			this.molecularTokens.some((token) => lower.includes(token))

		if (!needsTesting) return null
		if (!testingPerformed) {
			return {
				suffix: "NOS",
				annotated_name: `${base}, NOS`,
				reason: "Required secondary testing was not performed or failed",
			}
		}
		if (resultsContradictory) {
			return {
				suffix: "NEC",
				annotated_name: `${base}, NEC`,
				reason: "Secondary testing was performed but the results fit no defined type",
			}
		}
		return null
	}
}
