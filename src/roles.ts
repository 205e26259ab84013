import { z } from 'zod'
import { SchedulerError } from './errors'
import type { RoleDefinition } from './types'

/**
 * Worship team roles in assignment priority order. The lead vocal goes first,
 * then the two backing vocals that share one pool and may not go to the same
 * person, then the independent instrument and support roles.
 */
export const DEFAULT_ROLES: readonly RoleDefinition[] = [
	{ name: 'vocal_main', pool: 'vocal_main', exclusiveWith: [] },
	{ name: 'vocal_sub1', pool: 'vocal_sub', exclusiveWith: ['vocal_sub2'] },
	{ name: 'vocal_sub2', pool: 'vocal_sub', exclusiveWith: ['vocal_sub1'] },
	{ name: 'piano', pool: 'piano', exclusiveWith: [] },
	{ name: 'drum', pool: 'drum', exclusiveWith: [] },
	{ name: 'bass', pool: 'bass', exclusiveWith: [] },
	{ name: 'pa', pool: 'pa', exclusiveWith: [] },
	{ name: 'ppt', pool: 'ppt', exclusiveWith: [] },
]

const roleDefinitionSchema = z.object({
	name: z.string().trim().min(1),
	pool: z.string().trim().min(1),
	exclusiveWith: z.array(z.string().trim().min(1)).default([]),
})

const roleDefinitionsSchema = z
	.array(roleDefinitionSchema)
	.min(1)
	.superRefine((roles, ctx) => {
		const names = new Set<string>()
		for (const [i, role] of roles.entries()) {
			if (names.has(role.name)) {
				ctx.addIssue({ code: z.ZodIssueCode.custom, path: [i, 'name'], message: `Duplicate role "${role.name}"` })
			}
			names.add(role.name)
		}
		for (const [i, role] of roles.entries()) {
			for (const other of role.exclusiveWith) {
				if (other === role.name) {
					ctx.addIssue({ code: z.ZodIssueCode.custom, path: [i, 'exclusiveWith'], message: `Role "${role.name}" cannot exclude itself` })
				} else if (!names.has(other)) {
					ctx.addIssue({ code: z.ZodIssueCode.custom, path: [i, 'exclusiveWith'], message: `Role "${role.name}" excludes unknown role "${other}"` })
				}
			}
		}
	})

export function validateRoleDefinitions(input: unknown): RoleDefinition[] {
	const parsed = roleDefinitionsSchema.safeParse(input)
	if (!parsed.success) {
		const detail = parsed.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`).join('; ')
		throw new SchedulerError('INVALID_ROLES', `Invalid role definitions: ${detail}`)
	}
	return parsed.data
}
