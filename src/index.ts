export { RoleCatalog } from './catalog'
export { loadConfig, loadEnvConfig } from './config'
export type { RotaConfig } from './config'
export { coverageCalendar, coverageIssues, roleAvailability, DEFAULT_LIMITED_BELOW } from './coverage'
export { AssignmentEngine } from './engine'
export type { AssignmentEngineOptions } from './engine'
export { SchedulerError, isSchedulerError, errorMessage } from './errors'
export type { SchedulerErrorCode } from './errors'
export { FairnessTracker } from './fairness'
export type { SeedOptions } from './fairness'
export * as sheets from './google'
export { ScheduleLedger, mergeScheduleTables } from './ledger'
export type { RoleAssignment } from './ledger'
export { DEFAULT_ROLES, validateRoleDefinitions } from './roles'
export { createRandom, pickUniform } from './sampling'
export type { RandomSource } from './sampling'
export { generateSchedule, scheduleDates } from './scheduler'
export type { GenerateScheduleOptions, ScheduleRun } from './scheduler'
export { createRotaStore } from './store'
export type { FileSources, RotaStore } from './store'
export {
	availablePeopleOn,
	memberCalendar,
	parseAvailabilityFlag,
	scheduleTableToRows,
	toAvailabilityTable,
	toQualificationList,
	toScheduleTable,
} from './tables'
export * from './types'
export * as csv from './utils/csv'
