export type { ContainerSnapshot, PodSnapshot, ResourceKind, ResourceLimits } from './workload';
export type { Finding, FindingRecord } from './finding';
export { createFinding, toFindingRecord } from './finding';
export type { ClusterApi, PodLister, PodPatch, PodPatcher } from './cluster';
export { ClusterConnectionError, CliUsageError, ConfigLoadError, SessionStateError } from './errors';
