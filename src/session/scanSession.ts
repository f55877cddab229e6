import type { KubeConfig } from '@kubernetes/client-node';
import { evaluatePods } from '../analysis/limitsEvaluator';
import { annotatePods, type AnnotationResult } from '../annotation/podAnnotator';
import { describeApiError } from '../cluster/apiErrors';
import { KubernetesClusterApi, type ConnectionStrategy } from '../cluster/k8sClient';
import type { Logger } from '../logging/logger';
import type { ClusterApi } from '../types/cluster';
import { ClusterConnectionError, SessionStateError } from '../types/errors';
import type { Finding } from '../types/finding';
import type { PodSnapshot } from '../types/workload';
import { formatFindings, type OutputFormat } from '../utils/reportFormatter';

export type SessionState =
  | 'disconnected'
  | 'connecting'
  | 'connected'
  | 'listing'
  | 'evaluated'
  | 'annotating'
  | 'reporting'
  | 'done'
  | 'failed';

export interface ScanResult {
  findings: Finding[];
  // false when the pod listing failed and the findings are empty for that reason
  complete: boolean;
}

export interface ScanOptions {
  namespace?: string | undefined;
  annotate: boolean;
  output: OutputFormat;
}

export interface ScanOutcome {
  exitCode: number;
  output?: string | undefined;
  result?: ScanResult | undefined;
  annotation?: AnnotationResult | undefined;
}

export interface ScanSessionOptions {
  strategies: ConnectionStrategy[];
  logger: Logger;
  createApi?: (kc: KubeConfig) => ClusterApi;
}

export class ScanSession {
  private currentState: SessionState = 'disconnected';
  private api: ClusterApi | undefined;
  private readonly strategies: ConnectionStrategy[];
  private readonly logger: Logger;
  private readonly createApi: (kc: KubeConfig) => ClusterApi;

  constructor(options: ScanSessionOptions) {
    this.strategies = options.strategies;
    this.logger = options.logger;
    this.createApi = options.createApi ?? (kc => new KubernetesClusterApi(kc));
  }

  get state(): SessionState {
    return this.currentState;
  }

  private expectState(operation: string, ...allowed: SessionState[]): void {
    if (!allowed.includes(this.currentState)) {
      throw new SessionStateError(operation, this.currentState);
    }
  }

  // First strategy that yields a usable config wins; no retries
  connect(): void {
    this.expectState('connect', 'disconnected');
    this.currentState = 'connecting';

    const attempts: string[] = [];
    for (const strategy of this.strategies) {
      try {
        const kc = strategy.connect();
        this.api = this.createApi(kc);
        this.currentState = 'connected';
        this.logger.info(`Successfully connected to Kubernetes cluster using ${strategy.name}`);
        return;
      } catch (error: unknown) {
        const message = error instanceof Error ? error.message : String(error);
        this.logger.debug(`Could not load ${strategy.name}: ${message}`);
        attempts.push(`${strategy.name}: ${message}`);
      }
    }

    this.currentState = 'failed';
    throw new ClusterConnectionError(attempts);
  }

  private requireApi(): ClusterApi {
    if (!this.api) throw new SessionStateError('use the cluster API', this.currentState);
    return this.api;
  }

  async scan(namespace?: string): Promise<ScanResult> {
    this.expectState('scan', 'connected');
    const api = this.requireApi();
    this.currentState = 'listing';

    if (namespace) {
      this.logger.info(`Checking pods in namespace: ${namespace}`);
    } else {
      this.logger.info('Checking pods across all namespaces');
    }

    let pods: PodSnapshot[];
    try {
      pods = await api.listPods(namespace);
    } catch (error: unknown) {
      this.logger.error(`Kubernetes API error while listing pods: ${describeApiError(error)}`);
      this.logger.warn('Scan incomplete: pods could not be listed, no findings will be reported');
      this.currentState = 'evaluated';
      return { findings: [], complete: false };
    }

    const findings = evaluatePods(pods, this.logger);
    this.currentState = 'evaluated';
    return { findings, complete: true };
  }

  async annotate(findings: readonly Finding[]): Promise<AnnotationResult> {
    this.expectState('annotate', 'evaluated');
    const api = this.requireApi();
    this.currentState = 'annotating';

    if (findings.length === 0) {
      this.logger.info('No pods with missing limits found - nothing to annotate');
      return { succeeded: 0, failed: 0 };
    }

    this.logger.info('Annotation mode enabled - adding warning annotations to pods');
    const result = await annotatePods(findings, api, this.logger);
    this.logger.info(`Annotation results: ${result.succeeded} successful, ${result.failed} failed`);
    if (result.failed > 0) {
      this.logger.warn(`${result.failed} pod(s) could not be annotated. Check logs for details.`);
    }
    return result;
  }

  report(findings: readonly Finding[], format: OutputFormat): string {
    this.expectState('report', 'evaluated', 'annotating');
    this.currentState = 'reporting';
    const output = formatFindings(format, findings);
    this.currentState = 'done';
    return output;
  }

  async run(options: ScanOptions): Promise<ScanOutcome> {
    this.logger.info('Starting Kubernetes pod resource limits check');

    try {
      this.connect();
    } catch (error: unknown) {
      if (!(error instanceof ClusterConnectionError)) throw error;
      this.logger.error(`Failed to connect to Kubernetes cluster: ${error.attempts.join('; ')}`);
      return { exitCode: 1 };
    }

    const result = await this.scan(options.namespace);
    const annotation = options.annotate ? await this.annotate(result.findings) : undefined;
    const output = this.report(result.findings, options.output);

    this.logger.info(
      result.complete
        ? 'Kubernetes pod resource limits check completed successfully'
        : 'Kubernetes pod resource limits check finished with an incomplete scan'
    );
    return { exitCode: 0, output, result, annotation };
  }
}
