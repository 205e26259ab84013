import type { RoleCatalog } from './catalog'
import { availablePeopleOn } from './tables'
import type { AvailabilityTable, CoverageIssue, Person, RoleName } from './types'

export const DEFAULT_LIMITED_BELOW = 2

/** Qualified people available on the date, per role, before any assignment. */
export function roleAvailability(catalog: RoleCatalog, availability: AvailabilityTable, date: string): Record<RoleName, Person[]> {
	const available = availablePeopleOn(availability, date)
	const out: Record<RoleName, Person[]> = {}
	for (const role of catalog.roles) {
		const qualified = catalog.qualifiedPeople(role.name)
		out[role.name] = available.filter((p) => qualified.has(p))
	}
	return out
}

export function coverageIssues(
	catalog: RoleCatalog,
	availability: AvailabilityTable,
	date: string,
	limitedBelow = DEFAULT_LIMITED_BELOW,
): Record<RoleName, CoverageIssue> {
	const issues: Record<RoleName, CoverageIssue> = {}
	for (const [role, people] of Object.entries(roleAvailability(catalog, availability, date))) {
		if (people.length === 0) issues[role] = 'none'
		else if (people.length < limitedBelow) issues[role] = 'limited'
	}
	return issues
}

export function coverageCalendar(catalog: RoleCatalog, availability: AvailabilityTable): Record<string, Record<RoleName, number>> {
	const calendar: Record<string, Record<RoleName, number>> = {}
	for (const date of availability.dates) {
		const byRole = roleAvailability(catalog, availability, date)
		calendar[date] = Object.fromEntries(Object.entries(byRole).map(([role, people]) => [role, people.length]))
	}
	return calendar
}
