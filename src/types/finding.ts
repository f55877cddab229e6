// One container that is missing at least one of its CPU / memory limits
export interface Finding {
  readonly namespace: string;
  readonly podName: string;
  readonly containerName: string;
  readonly missingCpuLimit: boolean;
  readonly missingMemoryLimit: boolean;
}

// Field names used by the structured (json) output, in output order
export interface FindingRecord {
  namespace: string;
  pod_name: string;
  container_name: string;
  missing_cpu_limit: boolean;
  missing_memory_limit: boolean;
}

export function createFinding(fields: Finding): Finding {
  return Object.freeze({
    namespace: fields.namespace,
    podName: fields.podName,
    containerName: fields.containerName,
    missingCpuLimit: fields.missingCpuLimit,
    missingMemoryLimit: fields.missingMemoryLimit
  });
}

export function toFindingRecord(finding: Finding): FindingRecord {
  return {
    namespace: finding.namespace,
    pod_name: finding.podName,
    container_name: finding.containerName,
    missing_cpu_limit: finding.missingCpuLimit,
    missing_memory_limit: finding.missingMemoryLimit
  };
}
