import { DateTime } from 'luxon'
import { AbsenceCounters, Snapshot, SubjectSnapshot } from './types.js'

export type EntityState = string | number | undefined

export type EntityDescription = {
	key: string
	uniqueId: string
	name: string
	icon: string
	state: EntityState
	attributes: { [key: string]: unknown }
}

const NAME_PREFIX = 'Home.InfoPoint'

const ABSENCE_ENTITIES: { key: string, counter: keyof AbsenceCounters, name: string, icon: string }[] = [
	{ key: 'days', counter: 'totalDays', name: 'Absences (Days)', icon: 'mdi:calendar-remove' },
	{ key: 'unexcused_days', counter: 'unexcusedDays', name: 'Unexcused Absences (Days)', icon: 'mdi:calendar-alert' },
	{ key: 'hours', counter: 'totalHours', name: 'Absences (Hours)', icon: 'mdi:clock-remove' },
	{ key: 'unexcused_hours', counter: 'unexcusedHours', name: 'Unexcused Absences (Hours)', icon: 'mdi:clock-alert' },
]

function round(value: number | undefined) {
	return value == undefined ? undefined : Math.round(value * 100) / 100
}

function subjectEntity(entryId: string, subject: SubjectSnapshot): EntityDescription {
	return {
		key: `subject_${subject.name}`,
		uniqueId: `${entryId}_subject_${subject.name.replace(/ /g, '_')}`,
		name: `${NAME_PREFIX} ${subject.name}`,
		icon: 'mdi:book-open-variant',
		state: round(subject.average),
		attributes: {
			latest_grade_date: subject.latest?.date,
			latest_grade_value: subject.latest?.value,
			latest_grade_comment: subject.latest?.comment,
			history: subject.history,
		},
	}
}

/**
 * Everything a host shows for one account: the last portal update, the absence counters,
 * and one entity per subject whose state is the rounded average.
 */
export function describeEntities(snapshot: Snapshot | undefined, entryId: string, zone = 'Europe/Berlin'): EntityDescription[] {
	const entities: EntityDescription[] = []

	const lastUpdated = snapshot?.lastUpdated
	entities.push({
		key: 'last_update',
		uniqueId: `${entryId}_last_update`,
		name: `${NAME_PREFIX} Last Update`,
		icon: 'mdi:clock-outline',
		state: lastUpdated == undefined ? undefined : DateTime.fromMillis(lastUpdated, { zone }).toISO() ?? undefined,
		attributes: {},
	})

	for(const absence of ABSENCE_ENTITIES) {
		entities.push({
			key: absence.key,
			uniqueId: `${entryId}_absence_${absence.key}`,
			name: `${NAME_PREFIX} ${absence.name}`,
			icon: absence.icon,
			state: snapshot?.absences[absence.counter],
			attributes: {},
		})
	}

	for(const subject of Object.values(snapshot?.subjects ?? {})) entities.push(subjectEntity(entryId, subject))

	return entities
}
