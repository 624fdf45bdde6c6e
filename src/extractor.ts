import { DateTime } from 'luxon'
import { DOMObject, parseDate, parseISODate } from './env.js'
import { CalendarDate } from './types.js'

export type FieldShape = 'date' | 'timestamp' | 'token' | 'text' | 'decimal' | 'integer'

type FieldValue = {
	date: CalendarDate
	timestamp: number
	token: string
	text: string
	decimal: number
	integer: number
}

export type FieldDescriptor<S extends FieldShape> = {
	/** Element below the fragment; the fragment itself when omitted. */
	selector?: string
	/** Index among the fragment's direct `td`/`th` cells. */
	column?: number
	shape: S
	zone?: string
}

const DATE_TOKEN = /(\d{4}-\d{1,2}-\d{1,2})|(\d{1,2}\.\d{1,2}\.(?:\d{4}|\d{2}))(?![\d])/
const TIMESTAMP_TOKEN = /(\d{1,2}\.\d{1,2}\.(?:\d{4}|\d{2}))(?![\d])(?:\s*,?\s*(?:um\s+)?(\d{1,2}:\d{2}(?::\d{2})?))?/
const NUMERIC_TOKEN = /^[+-]?\d+(?:\.\d+)?$/

const DATE_FORMATS = [ 'd.M.yyyy', 'd.M.yy' ]
const TIME_FORMATS = [ 'H:mm:ss', 'H:mm' ]

function fromDotted(date: string, time: string | undefined, zone: string): DateTime | undefined {
	for(const dateFormat of DATE_FORMATS) {
		if(dateFormat.endsWith('yyyy') !== /\.\d{4}$/.test(date)) continue

		if(!time) return parseDate(date, dateFormat, zone)

		for(const timeFormat of TIME_FORMATS) {
			const parsed = parseDate(`${date} ${time}`, `${dateFormat} ${timeFormat}`, zone)
			if(parsed) return parsed
		}
	}

	return undefined
}

/**
 * First calendar date in `text` as `yyyy-MM-dd`. Accepts `d.M.yyyy`, `d.M.yy` and ISO dates.
 * Dates that do not exist (`31.02.2025`) are absent, not rolled over.
 */
export function parseCalendarDate(text: string | undefined): CalendarDate | undefined {
	if(!text) return undefined

	const match = DATE_TOKEN.exec(text)
	if(!match) return undefined

	const date = match[1] ? parseDate(match[1], 'yyyy-M-d', 'UTC') : fromDotted(match[2], undefined, 'UTC')
	return date?.toISODate() ?? undefined
}

/** Date with an optional time of day, in `zone`, as epoch milliseconds. */
export function parseTimestamp(text: string | undefined, zone = 'Europe/Berlin'): number | undefined {
	if(!text) return undefined

	const match = TIMESTAMP_TOKEN.exec(text)
	if(match) return fromDotted(match[1], match[2], zone)?.toMillis()

	const iso = /\d{4}-\d{2}-\d{2}(?:[T ]\d{2}:\d{2}(?::\d{2})?)?/.exec(text)
	return iso ? parseISODate(iso[0].replace(' ', 'T'), zone)?.toMillis() : undefined
}

/** Numeric reading of a grade token (`"2"`, `"2,5"`); tendency marks and placeholders are not numeric. */
export function numericValue(token: string | undefined): number | undefined {
	if(!token) return undefined

	const normalized = token.trim().replace(',', '.')
	return NUMERIC_TOKEN.test(normalized) ? parseFloat(normalized) : undefined
}

/** First number in `text`, decimal comma accepted. */
export function firstNumber(text: string | undefined): number | undefined {
	const match = text ? /-?\d+(?:[.,]\d+)?/.exec(text) : undefined
	return match ? parseFloat(match[0].replace(',', '.')) : undefined
}

function parseInteger(text: string) {
	const number = firstNumber(text)
	if(number == undefined) return undefined

	const value = Math.floor(number)
	return value >= 0 ? value : undefined
}

function coerce<S extends FieldShape>(text: string, shape: S, zone?: string): FieldValue[S] | undefined
function coerce(text: string, shape: FieldShape, zone?: string): FieldValue[FieldShape] | undefined {
	const trimmed = text.trim()
	if(!trimmed) return undefined

	switch(shape) {
		case 'date': return parseCalendarDate(trimmed)
		case 'timestamp': return parseTimestamp(trimmed, zone)
		case 'token': return trimmed
		case 'text': return trimmed.replace(/\s+/g, ' ')
		case 'decimal': return numericValue(trimmed)
		case 'integer': return parseInteger(trimmed)
	}
}

function locate(fragment: DOMObject, descriptor: FieldDescriptor<FieldShape>): DOMObject | undefined {
	let element: DOMObject | undefined = fragment

	if(descriptor.column != undefined) element = fragment.children('td, th')[descriptor.column]
	if(element && descriptor.selector) element = element.querySelector(descriptor.selector)[0]

	return element
}

/**
 * Locates one value in a markup fragment and coerces it to the descriptor's shape.
 * Returns `undefined` when the element is missing or its text does not fit the shape.
 */
export function extractField<S extends FieldShape>(fragment: DOMObject | undefined, descriptor: FieldDescriptor<S>): FieldValue[S] | undefined {
	if(!fragment) return undefined

	const element = locate(fragment, descriptor)
	if(!element) return undefined

	return coerce(element.text(), descriptor.shape, descriptor.zone)
}

/** Raw text of the located element, for diagnostics. */
export function extractText(fragment: DOMObject | undefined, descriptor: Omit<FieldDescriptor<FieldShape>, 'shape'>): string {
	if(!fragment) return ''

	return locate(fragment, { ...descriptor, shape: 'text' })?.text() ?? ''
}
