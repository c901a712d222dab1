/**
 * devtwin Domain Layer
 *
 * - registry: manifest discovery and provider construction
 * - snapshot / plan / apply / status: the reconciliation engines
 * - repository: init and git-backed history
 */

export type {
  TwinContext,
  ProviderKind,
  ProviderManifest,
  Action,
  ActionOutcome,
  PlanDocument,
  ConfigProvider,
  LogsProvider,
  LoadedProvider,
  ExecutionRecord,
  ProviderFailure,
  ProviderWarning,
  SnapshotResult,
  PlanSummary,
  PlanResult,
  ProviderApplyResult,
  ApplyResult,
  StatusReport
} from './types.js'
export { BaseConfigProvider, BaseLogsProvider, PLAN_EXECUTION_KEY, PROVIDER_KINDS } from './types.js'

export { buildContext } from './context.js'
export type { EngineOptions } from './engine.js'

export {
  ProviderTable,
  parseManifest,
  discoverManifests,
  resolveManifestRoot,
  assertFragmentOwnership,
  loadConfigProviders,
  loadLogsProviders,
  listProviders
} from './registry.js'
export type { ProviderRegistration, LoadProvidersOptions, ProviderListing } from './registry.js'

export { runSnapshot, rotateLogs } from './snapshot.js'
export type { SnapshotOptions } from './snapshot.js'

export { computePlan, readLatestPlan, summarizePlan, toPlanDocument, toAction } from './plan.js'

export { executePlan, appendExecutionRecords, failedOutcomes } from './apply.js'
export type { ExecutePlanOptions } from './apply.js'

export { computeStatus, driftedFragments, deepEqual } from './status.js'

export {
  initRepository,
  seedStateFromLive,
  commitSnapshot,
  pushRepository,
  pullRepository,
  getHistory,
  resetRepository,
  setupRemote
} from './repository.js'
export type { InitOptions, InitResult, CommitOptions, CommitResult, RemoteOptions } from './repository.js'
