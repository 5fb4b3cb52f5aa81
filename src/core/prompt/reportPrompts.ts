import type { ModelRequest } from '../entities/Model.js';

/**
 * One-shot report requests over an analysed transaction dataset.
 * These carry no conversation history.
 */

export const EXECUTIVE_SUMMARY_MAX_TOKENS = 220;
export const ANOMALY_EXPLANATION_MAX_TOKENS = 350;

export const COMPLIANCE_OFFICER_PROMPT =
  'You are a senior AML compliance officer. Be concise and evidence-based.';
export const INVESTIGATOR_PROMPT = 'You are an AML investigator. Strict JSON only.';

export function buildExecutiveSummaryRequest(datasetSummary: string, topAnomalies: unknown[]): ModelRequest {
  const content = [
    'Write ONE executive summary paragraph (5-7 sentences) for a compliance manager.',
    'Mention: overall risk level, top patterns, evidence highlights (use transaction_id/account_id if present), and next steps.',
    'No bullet points.',
    '',
    'DATASET_SUMMARY:',
    datasetSummary,
    '',
    'TOP_ANOMALIES (JSON):',
    JSON.stringify(topAnomalies),
  ].join('\n');

  return {
    messages: [
      { role: 'system', content: COMPLIANCE_OFFICER_PROMPT },
      { role: 'user', content },
    ],
    maxTokens: EXECUTIVE_SUMMARY_MAX_TOKENS,
  };
}

export function buildAnomalyExplanationRequest(
  datasetSummary: string,
  row: Record<string, unknown>
): ModelRequest {
  const content = [
    'Explain why this specific transaction row is suspicious or not.',
    'Return STRICT JSON only:',
    '{',
    '  "verdict": "suspicious" | "not_suspicious" | "uncertain",',
    '  "why": string,',
    '  "evidence": string,',
    '  "follow_up_checks": [string]',
    '}',
    '',
    'DATASET_SUMMARY:',
    datasetSummary,
    '',
    'ROW (JSON):',
    JSON.stringify(row),
  ].join('\n');

  return {
    messages: [
      { role: 'system', content: INVESTIGATOR_PROMPT },
      { role: 'user', content },
    ],
    maxTokens: ANOMALY_EXPLANATION_MAX_TOKENS,
  };
}
