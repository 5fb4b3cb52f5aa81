import type { IModelClient } from '../../core/interfaces/IModelClient.js';
import type { ModelRequest } from '../../core/entities/Model.js';
import { OrchestratorError, toOrchestratorError } from '../../core/errors.js';
import {
  buildAnomalyExplanationRequest,
  buildExecutiveSummaryRequest,
} from '../../core/prompt/reportPrompts.js';
import { RetryPolicy, SleepFn, DEFAULT_RETRY_POLICY } from '../../utils/retry.js';
import { DebugLog, noopDebugLog } from '../../utils/debug.js';
import { completeWithRetry, logModelFailure } from './modelCall.js';

export type ReportResult<T> =
  | { ok: true; value: T }
  | { ok: false; error: OrchestratorError };

export interface ExecutiveSummaryInput {
  datasetSummary: string;
  topAnomalies: unknown[];
}

export interface AnomalyInput {
  datasetSummary: string;
  row: Record<string, unknown>;
}

/**
 * The model is asked for strict JSON; anything else is passed back verbatim
 */
export type AnomalyExplanation =
  | { structured: true; data: unknown }
  | { structured: false; rawModelOutput: string };

export interface ReportServiceOptions {
  retryPolicy?: RetryPolicy;
  sleep?: SleepFn;
  debugLog?: DebugLog;
}

export function parseAnomalyExplanation(text: string): AnomalyExplanation {
  try {
    const data: unknown = JSON.parse(text);
    return { structured: true, data };
  } catch {
    return { structured: false, rawModelOutput: text };
  }
}

/**
 * Stateless single-call reports for the dashboard: an executive summary of the
 * top anomalies and a per-row explanation.
 */
export class ReportService {
  private readonly retryPolicy: RetryPolicy;
  private readonly debugLog: DebugLog;

  constructor(
    private modelClient: IModelClient,
    private options: ReportServiceOptions = {}
  ) {
    this.retryPolicy = options.retryPolicy ?? DEFAULT_RETRY_POLICY;
    this.debugLog = options.debugLog ?? noopDebugLog;
  }

  executiveSummary(input: ExecutiveSummaryInput, signal?: AbortSignal): Promise<ReportResult<string>> {
    const request = buildExecutiveSummaryRequest(input.datasetSummary, input.topAnomalies);
    return this.run('executive_summary', request, signal, (text) => text);
  }

  explainAnomaly(input: AnomalyInput, signal?: AbortSignal): Promise<ReportResult<AnomalyExplanation>> {
    const request = buildAnomalyExplanationRequest(input.datasetSummary, input.row);
    return this.run('explain_anomaly', request, signal, parseAnomalyExplanation);
  }

  private async run<T>(
    report: string,
    request: ModelRequest,
    signal: AbortSignal | undefined,
    toValue: (text: string) => T
  ): Promise<ReportResult<T>> {
    try {
      const completion = await completeWithRetry(this.modelClient, request, {
        retryPolicy: this.retryPolicy,
        sleep: this.options.sleep,
        signal,
        component: 'ReportService',
        context: { report },
      });
      this.debugLog(`[ReportService] ${report} answered after ${completion.attempts} attempt(s)`);
      return { ok: true, value: toValue(completion.text) };
    } catch (error) {
      logModelFailure('ReportService', { report }, error);
      return { ok: false, error: toOrchestratorError(error) };
    }
  }
}
