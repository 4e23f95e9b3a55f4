/**
 * JSON strategy form → DSL text
 */
import { ConditionJson, StrategyJsonInput, validateStrategyJson } from '../spec/schema';

const OPERATOR_MAP: Record<string, string> = {
  '>': '>',
  '<': '<',
  '>=': '>=',
  '<=': '<=',
  '==': '==',
  crosses_above: 'CROSSES_ABOVE',
  crosses_below: 'CROSSES_BELOW',
};

// A name, optionally followed by the opening parenthesis of a call
const IDENTIFIER = /\b([A-Za-z_]\w*)(\s*\()?/g;

/**
 * Render the JSON form as DSL text:
 *
 *   ENTRY:
 *     close > SMA(close, 20) AND volume > 1000000
 *
 *   EXIT:
 *     RSI(close, 14) < 30
 *
 * An empty entry list renders TRUE and an empty exit list renders FALSE.
 */
export function renderDsl(input: StrategyJsonInput): string {
  const strategy = validateStrategyJson(input);

  return [
    'ENTRY:',
    `  ${strategy.entry.length > 0 ? renderConditions(strategy.entry) : 'TRUE'}`,
    '',
    'EXIT:',
    `  ${strategy.exit.length > 0 ? renderConditions(strategy.exit) : 'FALSE'}`,
  ].join('\n');
}

/**
 * Join conditions left to right; each condition's connector (default AND)
 * links it to the next one.
 */
export function renderConditions(conditions: readonly ConditionJson[]): string {
  const parts: string[] = [];
  conditions.forEach((condition, index) => {
    parts.push(
      `${formatTerm(condition.left)} ${formatOperator(condition.operator)} ${formatTerm(condition.right)}`
    );
    if (index < conditions.length - 1) {
      parts.push(condition.connector ?? 'AND');
    }
  });
  return parts.join(' ');
}

/** Indicator calls render uppercase (SMA, PREV), plain names lowercase */
export function formatTerm(term: string | number): string {
  if (typeof term === 'number') {
    return String(term);
  }
  return term
    .trim()
    .replace(IDENTIFIER, (_match: string, name: string, call: string | undefined) =>
      call ? `${name.toUpperCase()}${call}` : name.toLowerCase()
    );
}

export function formatOperator(operator: string): string {
  const normalized = operator.trim();
  return OPERATOR_MAP[normalized.toLowerCase()] ?? normalized.toUpperCase();
}
