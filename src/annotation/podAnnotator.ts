import { describeApiError } from '../cluster/apiErrors';
import type { Logger } from '../logging/logger';
import type { PodPatch, PodPatcher } from '../types/cluster';
import type { Finding } from '../types/finding';

export const WARNING_ANNOTATION = 'warning';

export type WarningValue = 'no-limits' | 'no-cpu-limit' | 'no-memory-limit';

// Pod-level OR of every finding that belongs to the pod
export interface PodSummary {
  namespace: string;
  podName: string;
  missingCpuLimit: boolean;
  missingMemoryLimit: boolean;
  containers: string[];
}

export interface AnnotationResult {
  succeeded: number;
  failed: number;
}

export function summarizePods(findings: readonly Finding[]): PodSummary[] {
  const pods = new Map<string, PodSummary>();

  for (const finding of findings) {
    const key = `${finding.namespace}/${finding.podName}`;
    let summary = pods.get(key);
    if (!summary) {
      summary = {
        namespace: finding.namespace,
        podName: finding.podName,
        missingCpuLimit: false,
        missingMemoryLimit: false,
        containers: []
      };
      pods.set(key, summary);
    }

    summary.missingCpuLimit ||= finding.missingCpuLimit;
    summary.missingMemoryLimit ||= finding.missingMemoryLimit;
    summary.containers.push(finding.containerName);
  }

  return [...pods.values()];
}

export function warningValueFor(
  summary: Pick<PodSummary, 'missingCpuLimit' | 'missingMemoryLimit'>
): WarningValue | undefined {
  if (summary.missingCpuLimit && summary.missingMemoryLimit) return 'no-limits';
  if (summary.missingCpuLimit) return 'no-cpu-limit';
  if (summary.missingMemoryLimit) return 'no-memory-limit';
  return undefined;
}

export function buildWarningPatch(value: WarningValue): PodPatch {
  return { metadata: { annotations: { [WARNING_ANNOTATION]: value } } };
}

async function annotatePod(summary: PodSummary, patcher: PodPatcher, logger: Logger): Promise<boolean> {
  const pod = `${summary.namespace}/${summary.podName}`;
  const value = warningValueFor(summary);
  if (!value) {
    logger.warn(`No missing limits to annotate for ${pod}`);
    return false;
  }

  try {
    await patcher.patchPod(summary.namespace, summary.podName, buildWarningPatch(value));
    logger.info(`Successfully annotated pod ${pod} with ${WARNING_ANNOTATION}=${value}`);
    return true;
  } catch (error: unknown) {
    logger.error(
      `Failed to annotate pod ${pod} (containers: ${summary.containers.join(', ')}): ${describeApiError(error)}`
    );
    return false;
  }
}

// One patch per distinct pod, a single attempt each; a failed pod never stops the others
export async function annotatePods(
  findings: readonly Finding[],
  patcher: PodPatcher,
  logger: Logger
): Promise<AnnotationResult> {
  const pods = summarizePods(findings);
  logger.info(`Annotating ${pods.length} pod(s) with warning labels`);

  const result: AnnotationResult = { succeeded: 0, failed: 0 };
  for (const summary of pods) {
    if (await annotatePod(summary, patcher, logger)) {
      result.succeeded++;
    } else {
      result.failed++;
    }
  }

  return result;
}
