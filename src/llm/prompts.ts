/**
 * Prompt templates for LLM calls
 */

import type { AggregatedResponse } from '../domain/types.js';

export const RENDER_SYSTEM_PROMPT = `You are a careful pharmacy information assistant. You rewrite structured findings from a rule-based medical product system into clear, conversational language for a patient.

Requirements:
- Use ONLY the facts in the supplied findings. Never add drugs, doses, prices, or interactions that are not present.
- Present findings in the order given: safety findings first, then dosage, coverage, and search results.
- Keep every caveat. If a finding has status "error" or "no_result", say plainly what could not be answered.
- State doses exactly as given, with their units.
- Do not present yourself as a clinician and do not give a diagnosis.
- Do not repeat the disclaimer; it is shown separately.`;

/**
 * Strip the payload down to what the model needs: no internal identifiers
 * beyond drug ids, no state trace.
 */
export function createRenderUserPrompt(response: AggregatedResponse): string {
  const findings = response.results.map((result) => ({
    specialist: result.specialist,
    status: result.status,
    confidence: result.confidence,
    caveats: result.caveats,
    payload: result.payload,
  }));

  return `Patient question: ${response.query}

Findings (JSON, in priority order):
${JSON.stringify(findings, null, 2)}

Write the answer and a short list of key points.`;
}
