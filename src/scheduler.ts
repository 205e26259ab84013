import { v4 as uuidv4 } from 'uuid'
import { RoleCatalog } from './catalog'
import { AssignmentEngine } from './engine'
import { SchedulerError } from './errors'
import { FairnessTracker } from './fairness'
import { ScheduleLedger } from './ledger'
import { DEFAULT_ROLES } from './roles'
import { createRandom } from './sampling'
import type { RandomSource } from './sampling'
import { availablePeopleOn } from './tables'
import type { AvailabilityTable, DayResult, QualificationTables, RoleDecision, RoleDefinition, RoleName, ScheduleTable } from './types'

const LOG_PREFIX = '[Scheduler]'

export interface GenerateScheduleOptions {
	availability: AvailabilityTable | null | undefined
	qualifications: QualificationTables
	roles?: readonly RoleDefinition[]
	/** Previously saved schedule whose counts carry into this run. */
	history?: ScheduleTable | null
	/** Overrides `seed` when given. */
	random?: RandomSource
	seed?: string
}

export interface ScheduleRun {
	runId: string
	seed?: string
	ledger: ScheduleLedger
	tracker: FairnessTracker
	decisions: Record<string, RoleDecision[]>
	unfillableRoles: RoleName[]
}

/**
 * Walks the dates once, in the order given. Date N is assigned against the
 * tracker as dates 1..N-1 left it, so results must be consumed in order.
 */
export function* scheduleDates(engine: AssignmentEngine, availability: AvailabilityTable): Generator<DayResult> {
	for (const date of availability.dates) {
		yield engine.assign(date, availablePeopleOn(availability, date))
	}
}

export function generateSchedule(options: GenerateScheduleOptions): ScheduleRun {
	const { availability } = options
	if (!availability) {
		console.error(LOG_PREFIX, 'No availability data provided')
		throw new SchedulerError('DATA_UNAVAILABLE', 'No availability data provided')
	}

	const repeated = availability.dates.find((date, i) => availability.dates.indexOf(date) !== i)
	if (repeated !== undefined) {
		throw new SchedulerError('INVALID_TABLE', `Date "${repeated}" appears twice in the availability table`)
	}

	const roles = options.roles ?? DEFAULT_ROLES
	const catalog = new RoleCatalog(roles, options.qualifications)
	const unfillableRoles = catalog.unfillableRoles()
	for (const role of unfillableRoles) {
		console.warn(LOG_PREFIX, 'Coverage gap: nobody is qualified', { role, pool: catalog.definition(role).pool })
	}

	const tracker = options.history
		? FairnessTracker.fromSchedule(options.history, { skipDates: availability.dates })
		: new FairnessTracker()
	const random = options.random ?? createRandom(options.seed)
	const engine = new AssignmentEngine({ catalog, tracker, random })
	const ledger = new ScheduleLedger(catalog.roles.map((r) => r.name))
	const decisions: Record<string, RoleDecision[]> = {}

	console.log(LOG_PREFIX, 'Generating schedule', {
		dates: availability.dates.length,
		people: availability.records.length,
		seeded: Boolean(options.history),
	})
	for (const day of scheduleDates(engine, availability)) {
		ledger.append(day.date, day.assignments)
		decisions[day.date] = day.decisions
	}

	return { runId: uuidv4(), seed: options.seed, ledger, tracker, decisions, unfillableRoles }
}
