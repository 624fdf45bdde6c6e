import { DateTime } from 'luxon'
import { describe, expect, it } from 'vitest'
import { DOMObject } from '../../src/env.js'
import { extractField, extractText, firstNumber, numericValue, parseCalendarDate, parseTimestamp } from '../../src/extractor.js'

function berlin(year: number, month: number, day: number, hour = 0, minute = 0, second = 0) {
	return DateTime.fromObject({ year, month, day, hour, minute, second }, { zone: 'Europe/Berlin' }).toMillis()
}

describe('parseCalendarDate', () => {
	it('reads dotted dates', () => {
		expect(parseCalendarDate('01.09.2025')).toBe('2025-09-01')
		expect(parseCalendarDate('1.9.2025')).toBe('2025-09-01')
		expect(parseCalendarDate('01.09.25')).toBe('2025-09-01')
	})

	it('reads ISO dates', () => {
		expect(parseCalendarDate('2025-09-01')).toBe('2025-09-01')
		expect(parseCalendarDate('2025-9-1')).toBe('2025-09-01')
		expect(parseCalendarDate('2025-13-01')).toBeUndefined()
	})

	it('finds the date inside surrounding text', () => {
		expect(parseCalendarDate('Mo, 01.09.2025')).toBe('2025-09-01')
	})

	it('rejects dates that do not exist', () => {
		expect(parseCalendarDate('31.02.2025')).toBeUndefined()
	})

	it('returns nothing without a date', () => {
		expect(parseCalendarDate('n.b.')).toBeUndefined()
		expect(parseCalendarDate('')).toBeUndefined()
		expect(parseCalendarDate(undefined)).toBeUndefined()
	})
})

describe('parseTimestamp', () => {
	it('reads a date with time of day in the given zone', () => {
		expect(parseTimestamp('01.10.2025 14:30')).toBe(berlin(2025, 10, 1, 14, 30))
		expect(parseTimestamp('01.10.2025, 14:30:15')).toBe(berlin(2025, 10, 1, 14, 30, 15))
		expect(parseTimestamp('01.10.2025 um 9:05 Uhr')).toBe(berlin(2025, 10, 1, 9, 5))
	})

	it('reads a date alone as midnight', () => {
		expect(parseTimestamp('01.10.2025')).toBe(berlin(2025, 10, 1))
	})

	it('reads ISO timestamps', () => {
		expect(parseTimestamp('2025-10-01T14:30')).toBe(berlin(2025, 10, 1, 14, 30))
	})

	it('honours another zone', () => {
		expect(parseTimestamp('01.10.2025 14:30', 'UTC')).toBe(Date.UTC(2025, 9, 1, 14, 30))
	})

	it('returns nothing for free text', () => {
		expect(parseTimestamp('gestern')).toBeUndefined()
	})
})

describe('numericValue', () => {
	it('reads integers and decimals with either separator', () => {
		expect(numericValue('2')).toBe(2)
		expect(numericValue('2,5')).toBe(2.5)
		expect(numericValue('1.7')).toBe(1.7)
		expect(numericValue(' 3 ')).toBe(3)
	})

	it('rejects tendencies, placeholders and exponents', () => {
		expect(numericValue('2-')).toBeUndefined()
		expect(numericValue('n.b.')).toBeUndefined()
		expect(numericValue('—')).toBeUndefined()
		expect(numericValue('1e3')).toBeUndefined()
		expect(numericValue('')).toBeUndefined()
		expect(numericValue(undefined)).toBeUndefined()
	})
})

describe('firstNumber', () => {
	it('reads the first number with either separator', () => {
		expect(firstNumber('Fehlstunden: 12,5 Stunden')).toBe(12.5)
		expect(firstNumber('3 von 4')).toBe(3)
		expect(firstNumber('keine')).toBeUndefined()
	})
})

describe('extractField', () => {
	const [ row ] = DOMObject.parse('<table><tr><td>01.09.2025</td><td> 2 </td><td></td></tr></table>').querySelector('tr')

	it('coerces a cell to the requested shape', () => {
		expect(extractField(row, { column: 0, shape: 'date' })).toBe('2025-09-01')
		expect(extractField(row, { column: 1, shape: 'token' })).toBe('2')
		expect(extractField(row, { column: 1, shape: 'decimal' })).toBe(2)
	})

	it('is absent for empty or missing cells', () => {
		expect(extractField(row, { column: 2, shape: 'text' })).toBeUndefined()
		expect(extractField(row, { column: 5, shape: 'token' })).toBeUndefined()
		expect(extractField(undefined, { column: 0, shape: 'token' })).toBeUndefined()
	})

	it('is absent when the text does not fit the shape', () => {
		expect(extractField(row, { column: 0, shape: 'decimal' })).toBeUndefined()
	})

	it('locates elements by selector', () => {
		const dom = DOMObject.parse('<div><span class="value">2,5</span></div>')

		expect(extractField(dom, { selector: 'span.value', shape: 'decimal' })).toBe(2.5)
		expect(extractField(dom, { selector: 'span.missing', shape: 'decimal' })).toBeUndefined()
	})

	it('reads the first non-negative integer', () => {
		const [ days ] = DOMObject.parse('<p>Fehltage: 5 Tage</p>').querySelector('p')
		const [ hours ] = DOMObject.parse('<p>12,7</p>').querySelector('p')
		const [ negative ] = DOMObject.parse('<p>-3</p>').querySelector('p')

		expect(extractField(days, { shape: 'integer' })).toBe(5)
		expect(extractField(hours, { shape: 'integer' })).toBe(12)
		expect(extractField(negative, { shape: 'integer' })).toBeUndefined()
	})

	it('reads timestamps in the descriptor zone', () => {
		const [ span ] = DOMObject.parse('<span>01.10.2025 14:30</span>').querySelector('span')

		expect(extractField(span, { shape: 'timestamp', zone: 'UTC' })).toBe(Date.UTC(2025, 9, 1, 14, 30))
	})

	it('collapses whitespace in text', () => {
		const [ cell ] = DOMObject.parse('<table><tr><td>LK:\n  rationale   Zahlen</td></tr></table>').querySelector('td')

		expect(extractField(cell, { shape: 'text' })).toBe('LK: rationale Zahlen')
		expect(extractText(cell, {})).toBe('LK: rationale Zahlen')
	})
})
