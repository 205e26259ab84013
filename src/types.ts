export type Person = string
export type RoleName = string

/** Written into schedule tables for a slot nobody could fill. */
export const UNASSIGNED_MARKER = 'Unassigned'

export interface RoleDefinition {
	name: RoleName
	/** Qualification pool key; several roles may share one pool. */
	pool: string
	/** Roles whose same-date assignee may not take this role. */
	exclusiveWith: RoleName[]
}

export interface DayAvailability {
	date: string
	isAvailable: boolean
}

export interface AvailabilityRecord {
	person: Person
	days: DayAvailability[]
}

export interface AvailabilityTable {
	/** Date labels in the caller's order, which is trusted as chronological. */
	dates: string[]
	records: AvailabilityRecord[]
}

/** Pool key -> qualified people. A missing key means nobody qualifies. */
export type QualificationTables = Record<string, Person[]>

export type DayAssignments = Record<RoleName, Person | null>

export interface ScheduleSlot {
	date: string
	role: RoleName
	person: Person | null
}

export interface ScheduleRow {
	role: RoleName
	/** One cell per entry of ScheduleTable.dates. */
	cells: (Person | null)[]
}

export interface ScheduleTable {
	dates: string[]
	rows: ScheduleRow[]
}

export type UnassignedReason = 'no-available' | 'no-qualified'

export type RoleDecision =
	| {
			role: RoleName
			status: 'assigned'
			person: Person
			/** Eligible people in availability order. */
			candidates: Person[]
			/** Counts before this assignment. */
			counts: Record<Person, number>
			minimum: number
			tied: Person[]
	  }
	| {
			role: RoleName
			status: 'unassigned'
			reason: UnassignedReason
	  }

export interface DayResult {
	date: string
	assignments: DayAssignments
	decisions: RoleDecision[]
}

export type CoverageIssue = 'none' | 'limited'
