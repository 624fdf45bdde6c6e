import { numericValue } from './extractor.js'
import { AbsenceCounters, GradeRecord, Snapshot, SubjectSnapshot } from './types.js'

export function average(history: readonly GradeRecord[]): number | undefined {
	let total = 0
	let count = 0

	for(const record of history) {
		const value = numericValue(record.value)
		if(value == undefined) continue

		total += value
		count++
	}

	return count > 0 ? total / count : undefined
}

/** Latest dated record with a numeric value; on equal dates the later row wins. */
export function latest(history: readonly GradeRecord[]): GradeRecord | undefined {
	let result: GradeRecord | undefined

	for(const record of history) {
		if(!record.date || numericValue(record.value) == undefined) continue
		if(!result?.date || record.date >= result.date) result = record
	}

	return result
}

export function summarizeSubject(name: string, history: readonly GradeRecord[]): SubjectSnapshot {
	return {
		name: name,
		history: history,
		average: average(history),
		latest: latest(history),
	}
}

function deepFreeze<T>(value: T): T {
	if(value && typeof value === 'object' && !Object.isFrozen(value)) {
		Object.freeze(value)
		for(const child of Object.values(value)) deepFreeze(child)
	}

	return value
}

export function buildSnapshot(parsed: { grades: Map<string, GradeRecord[]>, absences: AbsenceCounters, lastUpdated?: number }, fetchedAt = Date.now()): Snapshot {
	const subjects: { [name: string]: SubjectSnapshot } = {}
	for(const [ name, history ] of parsed.grades) subjects[name] = summarizeSubject(name, history.map(record => ({ ...record })))

	return deepFreeze({
		fetchedAt: fetchedAt,
		lastUpdated: parsed.lastUpdated,
		subjects: subjects,
		absences: { ...parsed.absences },
	})
}
