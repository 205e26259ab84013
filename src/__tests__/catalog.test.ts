import { describe, it, expect } from 'vitest'
import { RoleCatalog } from '../catalog'
import { isSchedulerError } from '../errors'
import { DEFAULT_ROLES } from '../roles'

describe('RoleCatalog', () => {
	const catalog = new RoleCatalog(DEFAULT_ROLES, {
		vocal_main: ['Ann', 'Ben'],
		vocal_sub: [' Cy ', 'Dee', ''],
		piano: [],
	})

	it('shares one pool between roles mapped to it', () => {
		expect(catalog.qualifiedPeople('vocal_sub1')).toEqual(new Set(['Cy', 'Dee']))
		expect(catalog.qualifiedPeople('vocal_sub2')).toBe(catalog.qualifiedPeople('vocal_sub1'))
	})

	it('treats absent and empty pools as nobody qualified', () => {
		expect(catalog.qualifiedPeople('piano').size).toBe(0)
		expect(catalog.qualifiedPeople('drum').size).toBe(0)
		expect(catalog.missingPools()).toEqual(['piano', 'drum', 'bass', 'pa', 'ppt'])
		expect(catalog.unfillableRoles()).toEqual(['piano', 'drum', 'bass', 'pa', 'ppt'])
	})

	it('keeps the priority order of the definitions', () => {
		expect(catalog.roles.map((r) => r.name)).toEqual([
			'vocal_main',
			'vocal_sub1',
			'vocal_sub2',
			'piano',
			'drum',
			'bass',
			'pa',
			'ppt',
		])
		expect(catalog.definition('vocal_sub2').exclusiveWith).toEqual(['vocal_sub1'])
	})

	it('rejects unknown roles', () => {
		let caught: unknown
		try {
			catalog.qualifiedPeople('organ')
		} catch (err) {
			caught = err
		}
		expect(isSchedulerError(caught, 'UNKNOWN_ROLE')).toBe(true)
	})
})
