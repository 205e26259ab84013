import type { RoleCatalog } from './catalog'
import type { FairnessTracker } from './fairness'
import { pickUniform } from './sampling'
import type { RandomSource } from './sampling'
import type { DayAssignments, DayResult, Person, RoleDecision, RoleName } from './types'

export interface AssignmentEngineOptions {
	catalog: RoleCatalog
	tracker: FairnessTracker
	random: RandomSource
}

/**
 * Fills one date's roles greedily in priority order. Each role takes the
 * least-used eligible person for that role, breaking ties at random; the
 * choice is recorded on the tracker straight away so the next date sees it.
 */
export class AssignmentEngine {
	private readonly catalog: RoleCatalog
	private readonly tracker: FairnessTracker
	private readonly random: RandomSource

	constructor(options: AssignmentEngineOptions) {
		this.catalog = options.catalog
		this.tracker = options.tracker
		this.random = options.random
	}

	assign(date: string, available: Iterable<Person>): DayResult {
		const people = Array.from(new Set(available))
		const assignments: DayAssignments = {}
		const decisions: RoleDecision[] = []
		const assignedToday = new Set<Person>()
		const assigneeOf = new Map<RoleName, Person>()

		for (const role of this.catalog.roles) {
			assignments[role.name] = null

			const pool = people.filter((p) => !assignedToday.has(p))
			if (pool.length === 0) {
				decisions.push({ role: role.name, status: 'unassigned', reason: 'no-available' })
				continue
			}

			const excluded = new Set<Person>()
			for (const other of role.exclusiveWith) {
				const person = assigneeOf.get(other)
				if (person !== undefined) excluded.add(person)
			}
			const qualified = this.catalog.qualifiedPeople(role.name)
			const candidates = pool.filter((p) => qualified.has(p) && !excluded.has(p))
			if (candidates.length === 0) {
				decisions.push({ role: role.name, status: 'unassigned', reason: 'no-qualified' })
				continue
			}

			const counts = this.tracker.countsFor(role.name, candidates)
			const tied = Array.from(this.tracker.minimalCandidates(role.name, candidates))
			const chosen = tied.length === 1 ? tied[0] : pickUniform(tied, this.random)

			assignments[role.name] = chosen
			assignedToday.add(chosen)
			assigneeOf.set(role.name, chosen)
			this.tracker.recordAssignment(role.name, chosen)

			decisions.push({
				role: role.name,
				status: 'assigned',
				person: chosen,
				candidates,
				counts: Object.fromEntries(counts),
				minimum: Math.min(...counts.values()),
				tied,
			})
		}

		return { date, assignments, decisions }
	}
}
