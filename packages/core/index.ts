/**
 * @brewfile/core
 *
 * Package refs, configuration model and reconciliation. No I/O.
 */

export { renderBrewfile } from "./brewfile/render"
export type { ConfigurationParseResult } from "./config/parse"
export { coerceConfiguration, KNOWN_KEYS, parseConfiguration } from "./config/parse"
export { resolveMachine } from "./config/resolve"
export { serializeConfiguration, toConfigurationDocument } from "./config/serialize"
export type { PackageLocation, RemoveEverywhereResult } from "./config/transform"
export {
	addPackage,
	assignGroups,
	createEmptyConfiguration,
	createGroup,
	findPackage,
	groupsForMachine,
	hasPackage,
	removePackage,
	removePackageEverywhere,
} from "./config/transform"
export type {
	Configuration,
	DesiredPackage,
	DesiredState,
	Group,
	RawConfiguration,
	RawGroup,
} from "./config/types"
export { DEFAULT_CONFIG_VERSION } from "./config/types"
export type { ClassifyOptions, PackageMetadata } from "./package/classify"
export { classify, MAS_SEPARATOR, parseMasLiteral } from "./package/classify"
export type { GroupKey, HomebrewRef, MasRef, PackageKind, PackageRef } from "./package/types"
export {
	compareRefs,
	formatRef,
	GROUP_KEYS,
	KIND_LABELS,
	PACKAGE_KINDS,
	refKey,
	sameRef,
	sortRefs,
} from "./package/types"
export {
	isPlanEmpty,
	isQueryable,
	reconcile,
	toAdopt,
	toRemove,
} from "./reconcile/reconcile"
export { status } from "./reconcile/status"
export type {
	ActualState,
	EntryState,
	InventoryCapabilities,
	ReconciliationPlan,
	StatusEntry,
	StatusReport,
	StatusSection,
} from "./reconcile/types"
export type {
	AbsolutePath,
	GroupName,
	Hostname,
	MasId,
	NonEmptyString,
	PackageName,
} from "./types/branded"
export {
	coerceAbsolutePath,
	coerceGroupName,
	coerceHomebrewName,
	coerceHostname,
	coerceMasId,
	coerceNonEmpty,
	coercePackageName,
} from "./types/coerce"
export type {
	ActionError,
	BaseError,
	ClassifyError,
	ConfigError,
	ConfigNotFoundError,
	ConfigParseError,
	ConfigSchemaError,
	ConfigWriteError,
	CoreError,
	InstallFailedError,
	InvalidMasIdError,
	InventoryQueryFailedError,
	Result,
	UninstallFailedError,
	UnknownPackageError,
} from "./types/error"
