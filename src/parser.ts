import { DOMObject } from './env.js'
import { assertFatal, Exception, ExceptionLevel, ParserException, wrapException } from './exceptions.js'
import { extractField, extractText, firstNumber, parseTimestamp } from './extractor.js'
import { debug, error } from './log.js'
import { AbsenceCounters, GradeRecord } from './types.js'

/****************\
| Parser Results |
\****************/

export class ParserResult {
	exceptions: Exception[] = []

	/** Records a problem that was absorbed (absent field, skipped row). */
	report(exception: Exception, level = ExceptionLevel.Debug) {
		exception.level = level

		if(level >= ExceptionLevel.Error) error(`${exception.func}: ${exception.message}`, exception.details)
		else debug(`${exception.func}: ${exception.message}`, exception.details)

		this.exceptions.push(exception)
	}

	get fatal() {
		return this.exceptions.find(exception => exception.level === ExceptionLevel.Fatal)
	}
}

export class GradesParserResult extends ParserResult {
	grades = new Map<string, GradeRecord[]>()
	sectionFound = false
}

export class AbsencesParserResult extends ParserResult {
	absences: AbsenceCounters = { totalDays: 0, unexcusedDays: 0, totalHours: 0, unexcusedHours: 0 }
	lastUpdated?: number
	sectionFound = false
}

export class DashboardParserResult extends ParserResult {
	grades = new Map<string, GradeRecord[]>()
	absences: AbsenceCounters = { totalDays: 0, unexcusedDays: 0, totalHours: 0, unexcusedHours: 0 }
	lastUpdated?: number
}

/***********\
| Constants |
\***********/

const IGNORED_HEADINGS = [ 'notenspiegel', 'endnoten', 'legende', 'aktualisiert', 'fehltage', 'fehlstunden' ]

const ABSENCE_LABELS = new Map<string, keyof AbsenceCounters>([
	[ 'fehltage', 'totalDays' ],
	[ 'unentschuldigte fehltage', 'unexcusedDays' ],
	[ 'fehlstunden', 'totalHours' ],
	[ 'unentschuldigte fehlstunden', 'unexcusedHours' ],
])

const LAST_UPDATED_MARKER = 'aktualisiert am'

/*********\
| Helpers |
\*********/

type GradeColumns = {
	header: number
	date: number
	value: number
	comment: number
}

function toDOM(content: string | DOMObject) {
	return typeof content === 'string' ? DOMObject.parse(content) : content
}

/** Rows that belong to `table` itself, not to tables nested in its cells. */
function ownRows(table: DOMObject) {
	const rows = table.children('tr')
	for(const section of table.children('thead, tbody, tfoot')) rows.push(...section.children('tr'))
	return rows
}

function gradeColumns(rows: DOMObject[]): GradeColumns | undefined {
	const header = rows.findIndex(row => row.children('th').length > 0)
	if(header < 0) return undefined

	const labels = rows[header].children('th, td').map(cell => cell.text())

	const date = labels.findIndex(label => /^datum\b/i.test(label))
	const value = labels.findIndex(label => /^(zensur|note)$/i.test(label))
	if(date < 0 || value < 0) return undefined

	const comment = labels.findIndex(label => /^(bemerkung|kommentar|thema|art)\b/i.test(label))

	return { header, date, value, comment: comment >= 0 ? comment : value + 1 }
}

function isSubjectHeading(text: string) {
	const lower = text.toLowerCase()
	return text.length > 2 && !IGNORED_HEADINGS.some(ignored => lower.includes(ignored))
}

function isGradeTable(table: DOMObject | undefined) {
	return !!table && !!gradeColumns(ownRows(table))
}

/*********\
| Parsers |
\*********/

export const Parser = {
	/**
	 * Walks subject headings and grade tables in document order. Every table whose header
	 * names `Datum` and `Zensur` belongs to the closest heading before it; tables for the
	 * same subject are concatenated.
	 */
	parseGrades(content: string | DOMObject): GradesParserResult {
		const result = new GradesParserResult()

		try {
			const dom = toDOM(content)

			let subject: string | undefined

			for(const element of dom.querySelector('h1, h2, h3, h4, b, strong, table')) {
				if(element.tagName !== 'table') {
					if(isGradeTable(element.closest('table'))) continue

					const text = element.text()
					if(isSubjectHeading(text)) subject = text
					continue
				}

				const rows = ownRows(element)
				const columns = gradeColumns(rows)
				if(!columns) continue

				result.sectionFound = true

				if(!subject) {
					result.report(new ParserException('parseGrades', 'Grade table without subject heading', { rows: rows.length - columns.header - 1 }))
					continue
				}

				let history = result.grades.get(subject)
				if(!history) {
					history = []
					result.grades.set(subject, history)
				}

				for(let rowIndex = columns.header + 1; rowIndex < rows.length; rowIndex++) {
					const row = rows[rowIndex]
					const cells = row.children('td, th')
					if(cells.length == 0) continue

					const rawText = cells.map(cell => cell.text()).join(' | ')

					if(cells.some(cell => parseInt(cell.getAttribute('colspan') || '1') > 1)) {
						result.report(new ParserException('parseGrades', 'Skipped summary row', { subject, row: rowIndex, text: rawText }))
						continue
					}

					try {
						const date = extractField(row, { column: columns.date, shape: 'date' })
						const value = extractField(row, { column: columns.value, shape: 'token' })
						const comment = extractField(row, { column: columns.comment, shape: 'text' })

						const dateText = extractText(row, { column: columns.date })
						if(dateText && !date) result.report(new ParserException('parseGrades', 'Unparseable grade date', { subject, row: rowIndex, field: 'date', text: dateText }))

						if(date == undefined && value == undefined && comment == undefined) {
							result.report(new ParserException('parseGrades', 'Dropped row without extractable fields', { subject, row: rowIndex, text: rawText }))
							continue
						}

						if(value == undefined) result.report(new ParserException('parseGrades', 'Grade row without value', { subject, row: rowIndex, field: 'value' }))

						history.push({ date, value, comment: comment ?? '', rawText })
					} catch(exception) {
						result.report(wrapException('parseGrades', exception), ExceptionLevel.Error)
					}
				}
			}
		} catch(exception) {
			result.report(wrapException('parseGrades', exception), ExceptionLevel.Error)
		}

		return result
	},

	/**
	 * Reads the four absence counters from any table row labelled with one of them, plus
	 * the "aktualisiert am" timestamp. Each counter is independent; missing ones stay 0.
	 */
	parseAbsences(content: string | DOMObject, zone = 'Europe/Berlin'): AbsencesParserResult {
		const result = new AbsencesParserResult()

		try {
			const dom = toDOM(content)

			for(const row of dom.querySelector('tr')) {
				const cells = row.children('td, th')
				if(cells.length == 0) continue

				const label = cells[0].text().replace(/:$/, '').trim().toLowerCase()
				const counter = ABSENCE_LABELS.get(label)
				if(!counter) continue

				result.sectionFound = true

				const text = extractText(row, { column: 1 })
				const value = extractField(row, { column: 1, shape: 'integer' })
				if(value == undefined) {
					result.report(new ParserException('parseAbsences', 'Absence counter without value', { field: counter, text }))
					continue
				}

				if(!Number.isInteger(firstNumber(text))) result.report(new ParserException('parseAbsences', 'Fractional absence counter truncated', { field: counter, text, value }))

				result.absences[counter] = value
			}

			const text = dom.text()
			const markerIndex = text.toLowerCase().indexOf(LAST_UPDATED_MARKER)
			if(markerIndex >= 0) {
				const start = markerIndex + LAST_UPDATED_MARKER.length
				const candidate = text.substring(start, start + 40)

				result.lastUpdated = parseTimestamp(candidate, zone)
				if(result.lastUpdated == undefined) result.report(new ParserException('parseAbsences', 'Unparseable last update', { field: 'lastUpdated', text: candidate.trim() }))
			}
		} catch(exception) {
			result.report(wrapException('parseAbsences', exception), ExceptionLevel.Error)
		}

		return result
	},

	/**
	 * Parses a whole dashboard response. Only a body that is not HTML, or that carries
	 * neither a grade nor an absence section, is fatal.
	 */
	parseDashboard(content: string, zone = 'Europe/Berlin'): DashboardParserResult {
		const result = new DashboardParserResult()

		try {
			assertFatal(!!content && /<[a-z!]/i.test(content), new ParserException('parseDashboard', 'Response is not HTML', { length: content.length }))

			const dom = DOMObject.parse(content)

			const grades = Parser.parseGrades(dom)
			const absences = Parser.parseAbsences(dom, zone)

			result.exceptions.push(...grades.exceptions, ...absences.exceptions)

			assertFatal(grades.sectionFound || absences.sectionFound, new ParserException('parseDashboard', 'Neither grade nor absence section found', { length: content.length }))

			result.grades = grades.grades
			result.absences = absences.absences
			result.lastUpdated = absences.lastUpdated
		} catch(exception) {
			result.exceptions.push(wrapException('parseDashboard', exception))
		}

		return result
	},
} as const
