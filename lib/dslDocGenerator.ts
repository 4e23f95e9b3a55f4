/**
 * DSL Documentation Generator
 * Builds the DSL reference and the translator system prompt from the
 * indicator registry, so the prompt never drifts from what the compiler accepts
 */

import { COMPARISON_OPERATORS, INDICATOR_NAMES, PRICE_FIELDS } from '../spec/types';
import { formatIndicatorUsage, getIndicatorSignature } from '../features/registry';

export interface DSLDocumentation {
  fields: string[];
  indicators: string[];
  operators: string[];
  jsonFormat: string;
  criticalRules: string[];
  examples: string;
}

/**
 * Generate DSL documentation from the registry
 */
export function generateDSLDocumentation(): DSLDocumentation {
  return {
    fields: [...PRICE_FIELDS],
    indicators: INDICATOR_NAMES.map(
      (name) => `${formatIndicatorUsage(name)} - ${getIndicatorSignature(name).description}`
    ),
    operators: COMPARISON_OPERATORS.map((op) => (/^[A-Z_]+$/.test(op) ? op.toLowerCase() : op)),
    jsonFormat: JSON_FORMAT,
    criticalRules: CRITICAL_RULES,
    examples: EXAMPLES,
  };
}

/**
 * Generate the system prompt for natural language → JSON translation
 */
export function generateTranslationSystemPrompt(): string {
  const docs = generateDSLDocumentation();

  return `
You are a trading strategy parser. Convert natural language trading rules into structured JSON.

=== JSON FORMAT ===

${docs.jsonFormat}

=== AVAILABLE FIELDS ===

${docs.fields.join(', ')}

=== AVAILABLE INDICATORS ===

${docs.indicators.map((line) => `- ${line}`).join('\n')}

=== AVAILABLE OPERATORS ===

${docs.operators.join(', ')}

=== CRITICAL RULES ===

${docs.criticalRules.map((rule, i) => `${i + 1}. ${rule}`).join('\n')}

=== EXAMPLES ===

${docs.examples}
`;
}

/**
 * User message wrapping one natural language request
 */
export function generateTranslationUserPrompt(text: string): string {
  return `Parse this trading rule into JSON:

${text}

Return only the JSON output, no explanations.`;
}

// ============================================================================
// Static Documentation Sections
// ============================================================================

const JSON_FORMAT = `
{
  "entry": [
    {
      "left": "field or indicator expression",
      "operator": "comparison operator",
      "right": "value or expression",
      "connector": "AND or OR (optional, omit for last condition)"
    }
  ],
  "exit": [ ...same shape... ]
}
`.trim();

const CRITICAL_RULES = [
  'Use lowercase for field names',
  'Use exact indicator syntax: indicator_name(field, period)',
  'Use prev(field, N) for the value N bars ago (e.g. prev(high, 1) for yesterday\'s high)',
  'For "crosses above/below", use operator "crosses_above" or "crosses_below"',
  'Convert percentages to decimals (e.g. "30 percent" becomes 0.30)',
  'If entry or exit is not specified, use an empty array []',
  'Return ONLY valid JSON, no markdown, no explanations',
];

const EXAMPLES = `
Input: "Buy when close is above 20-day moving average and volume is above 1 million"
Output:
{
  "entry": [
    {"left": "close", "operator": ">", "right": "sma(close, 20)", "connector": "AND"},
    {"left": "volume", "operator": ">", "right": 1000000}
  ],
  "exit": []
}

Input: "Enter when price crosses above yesterday's high. Exit when RSI(14) is below 30"
Output:
{
  "entry": [
    {"left": "close", "operator": "crosses_above", "right": "prev(high, 1)"}
  ],
  "exit": [
    {"left": "rsi(close, 14)", "operator": "<", "right": 30}
  ]
}

Input: "Trigger entry when volume increases by more than 30 percent compared to last week"
Output:
{
  "entry": [
    {"left": "volume", "operator": ">", "right": "prev(volume, 7) * 1.30"}
  ],
  "exit": []
}
`.trim();
