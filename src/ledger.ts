import { SchedulerError } from './errors'
import type { DayAssignments, Person, RoleName, ScheduleSlot, ScheduleTable } from './types'

export interface RoleAssignment {
	date: string
	person: Person | null
}

/** Day-by-day output of a generation run, kept in append order. */
export class ScheduleLedger {
	readonly roles: readonly RoleName[]
	private readonly days: { date: string; assignments: DayAssignments }[] = []
	private readonly seen = new Set<string>()

	constructor(roles: readonly RoleName[]) {
		this.roles = [...roles]
	}

	static fromTable(table: ScheduleTable): ScheduleLedger {
		const ledger = new ScheduleLedger(table.rows.map((r) => r.role))
		table.dates.forEach((date, i) => {
			const day: DayAssignments = {}
			for (const row of table.rows) day[row.role] = row.cells[i] ?? null
			ledger.append(date, day)
		})
		return ledger
	}

	get dates(): string[] {
		return this.days.map((d) => d.date)
	}

	append(date: string, assignments: DayAssignments): void {
		if (this.seen.has(date)) {
			throw new SchedulerError('DUPLICATE_DATE', `Date "${date}" is already in the schedule`)
		}
		const day: DayAssignments = {}
		for (const role of this.roles) day[role] = assignments[role] ?? null
		this.seen.add(date)
		this.days.push({ date, assignments: day })
	}

	assignmentsOn(date: string): DayAssignments | undefined {
		const day = this.days.find((d) => d.date === date)
		return day ? { ...day.assignments } : undefined
	}

	assignmentsOf(role: RoleName): RoleAssignment[] {
		return this.days.map((d) => ({ date: d.date, person: d.assignments[role] ?? null }))
	}

	slots(): ScheduleSlot[] {
		return this.days.flatMap((d) => this.roles.map((role) => ({ date: d.date, role, person: d.assignments[role] ?? null })))
	}

	toTable(): ScheduleTable {
		return {
			dates: this.dates,
			rows: this.roles.map((role) => ({ role, cells: this.days.map((d) => d.assignments[role] ?? null) })),
		}
	}

	/** Filled slots per role and person. */
	tally(): Record<RoleName, Record<Person, number>> {
		const out: Record<RoleName, Record<Person, number>> = {}
		for (const slot of this.slots()) {
			if (!slot.person) continue
			const byPerson = out[slot.role] ?? {}
			byPerson[slot.person] = (byPerson[slot.person] ?? 0) + 1
			out[slot.role] = byPerson
		}
		return out
	}
}

/**
 * History dates keep their positions and take the new run's cells where the
 * run covers them; dates new to the history follow in run order. Roles from
 * either side are kept, new run's first.
 */
export function mergeScheduleTables(history: ScheduleTable | null | undefined, next: ScheduleTable): ScheduleTable {
	if (!history) return { dates: [...next.dates], rows: next.rows.map((r) => ({ role: r.role, cells: [...r.cells] })) }

	const nextDates = new Set(next.dates)
	const historyDates = new Set(history.dates)
	const dates = [...history.dates, ...next.dates.filter((d) => !historyDates.has(d))]
	const roles = [...next.rows.map((r) => r.role), ...history.rows.map((r) => r.role)].filter((role, i, all) => all.indexOf(role) === i)

	const cellOf = (table: ScheduleTable, role: RoleName, date: string): Person | null => {
		const row = table.rows.find((r) => r.role === role)
		const index = table.dates.indexOf(date)
		if (!row || index < 0) return null
		return row.cells[index] ?? null
	}

	return {
		dates,
		rows: roles.map((role) => ({
			role,
			cells: dates.map((date) => (nextDates.has(date) ? cellOf(next, role, date) : cellOf(history, role, date))),
		})),
	}
}
