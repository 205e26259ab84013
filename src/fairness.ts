import type { Person, RoleName, ScheduleTable } from './types'

export interface SeedOptions {
	/** Dates whose cells are ignored, e.g. the dates about to be regenerated. */
	skipDates?: Iterable<string>
}

/**
 * Per-role assignment counts for one generation run. Counts only ever go up,
 * one step per recorded assignment.
 */
export class FairnessTracker {
	private readonly counts = new Map<RoleName, Map<Person, number>>()

	static fromSchedule(table: ScheduleTable, options?: SeedOptions): FairnessTracker {
		const tracker = new FairnessTracker()
		const skip = new Set(options?.skipDates ?? [])
		for (const row of table.rows) {
			row.cells.forEach((person, i) => {
				const date = table.dates[i]
				if (!person || date === undefined || skip.has(date)) return
				tracker.recordAssignment(row.role, person)
			})
		}
		return tracker
	}

	countOf(role: RoleName, person: Person): number {
		return this.counts.get(role)?.get(person) ?? 0
	}

	countsFor(role: RoleName, candidates: Iterable<Person>): Map<Person, number> {
		const result = new Map<Person, number>()
		for (const person of candidates) result.set(person, this.countOf(role, person))
		return result
	}

	/** Candidates sharing the lowest count for the role, in input order. */
	minimalCandidates(role: RoleName, candidates: Iterable<Person>): Set<Person> {
		const counts = this.countsFor(role, candidates)
		if (counts.size === 0) return new Set()
		const minimum = Math.min(...counts.values())
		return new Set(Array.from(counts.entries()).filter(([, c]) => c === minimum).map(([p]) => p))
	}

	recordAssignment(role: RoleName, person: Person): void {
		let byPerson = this.counts.get(role)
		if (!byPerson) {
			byPerson = new Map()
			this.counts.set(role, byPerson)
		}
		byPerson.set(person, (byPerson.get(person) ?? 0) + 1)
	}

	snapshot(): Record<RoleName, Record<Person, number>> {
		const out: Record<RoleName, Record<Person, number>> = {}
		for (const [role, byPerson] of this.counts) out[role] = Object.fromEntries(byPerson)
		return out
	}
}
