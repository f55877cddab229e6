import type { Logger } from '../logging/logger';
import { createFinding, type Finding } from '../types/finding';
import type { PodSnapshot, ResourceKind, ResourceLimits } from '../types/workload';

// Only presence matters: "0" and "" are limits, null and undefined are not
export function isLimitMissing(limits: ResourceLimits | undefined, kind: ResourceKind): boolean {
  if (!limits) return true;
  const value = limits[kind];
  return value === undefined || value === null;
}

// Walks pods and their containers in order, keeping every container missing a CPU or memory limit
export function evaluatePods(pods: readonly PodSnapshot[], logger?: Logger): Finding[] {
  const findings: Finding[] = [];

  for (const pod of pods) {
    for (const container of pod.containers) {
      const missingCpu = isLimitMissing(container.limits, 'cpu');
      const missingMemory = isLimitMissing(container.limits, 'memory');
      if (!missingCpu && !missingMemory) continue;

      findings.push(
        createFinding({
          namespace: pod.namespace,
          podName: pod.name,
          containerName: container.name,
          missingCpuLimit: missingCpu,
          missingMemoryLimit: missingMemory
        })
      );
      logger?.debug(
        `Found container with missing limits: ${pod.namespace}/${pod.name}/${container.name} ` +
          `(cpu: ${missingCpu}, memory: ${missingMemory})`
      );
    }
  }

  logger?.info(`Found ${findings.length} container(s) with missing resource limits`);
  return findings;
}
