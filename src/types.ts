export type Credentials = {
	url: string
	username: string
	password: string
}

/** ISO calendar date, `yyyy-MM-dd`. */
export type CalendarDate = string

export type GradeRecord = {
	date?: CalendarDate
	value?: string
	comment: string
	rawText: string
}

export type SubjectSnapshot = {
	name: string
	history: readonly GradeRecord[]
	/** Mean of the numeric grades; `undefined` when there are none. */
	average?: number
	latest?: GradeRecord
}

export type AbsenceCounters = {
	totalDays: number
	unexcusedDays: number
	totalHours: number
	unexcusedHours: number
}

export type Snapshot = {
	fetchedAt: number
	lastUpdated?: number
	subjects: { readonly [name: string]: SubjectSnapshot }
	absences: AbsenceCounters
}
