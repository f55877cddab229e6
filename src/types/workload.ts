// Read-only view of the pods returned by the cluster, reduced to what the limits check needs

// "cpu" and "memory" are checked; other resource kinds pass through untouched
export type ResourceKind = 'cpu' | 'memory' | (string & {});

// Absent key, null and undefined all mean "no limit set"
export type ResourceLimits = Readonly<Record<string, unknown>>;

export interface ContainerSnapshot {
  readonly name: string;
  readonly limits?: ResourceLimits | undefined;
}

export interface PodSnapshot {
  readonly namespace: string;
  readonly name: string;
  readonly containers: readonly ContainerSnapshot[];
}
