import { SchedulerError } from './errors'
import type { Person, QualificationTables, RoleDefinition, RoleName } from './types'

const EMPTY: ReadonlySet<Person> = new Set()

/**
 * Who may fill each role. Built once per run from the role definitions and
 * one qualification list per pool; read-only afterwards.
 */
export class RoleCatalog {
	readonly roles: readonly RoleDefinition[]
	private readonly byName = new Map<RoleName, RoleDefinition>()
	private readonly pools = new Map<string, ReadonlySet<Person>>()

	constructor(roles: readonly RoleDefinition[], qualifications: QualificationTables) {
		this.roles = roles.map((r) => ({ ...r, exclusiveWith: [...r.exclusiveWith] }))
		for (const role of this.roles) {
			this.byName.set(role.name, role)
			if (this.pools.has(role.pool)) continue
			const people = qualifications[role.pool] ?? []
			this.pools.set(role.pool, new Set(people.map((p) => p.trim()).filter(Boolean)))
		}
	}

	definition(role: RoleName): RoleDefinition {
		const def = this.byName.get(role)
		if (!def) throw new SchedulerError('UNKNOWN_ROLE', `Unknown role "${role}"`)
		return def
	}

	qualifiedPeople(role: RoleName): ReadonlySet<Person> {
		return this.pools.get(this.definition(role).pool) ?? EMPTY
	}

	/** Pool keys with no qualified people at all. */
	missingPools(): string[] {
		return Array.from(this.pools.entries())
			.filter(([, people]) => people.size === 0)
			.map(([pool]) => pool)
	}

	unfillableRoles(): RoleName[] {
		return this.roles.filter((r) => this.qualifiedPeople(r.name).size === 0).map((r) => r.name)
	}
}
