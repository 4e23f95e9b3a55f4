/**
 * AST building and name validation
 * Parse tree → validated Strategy AST. Unknown names are rejected here,
 * never during evaluation.
 */
import {
  ARITHMETIC_OPERATORS,
  ArithmeticOperator,
  COMPARISON_OPERATORS,
  ComparisonOperator,
  ConditionNode,
  INDICATOR_NAMES,
  IndicatorNode,
  PRICE_FIELDS,
  Strategy,
  ValueNode,
} from '../spec/types';
import {
  formatIndicatorUsage,
  getIndicatorSignature,
  isIndicatorName,
  isPriceField,
} from '../features/registry';
import { ParseCondition, ParseTerm, ParseTree } from './expr';
import { StrategyValidationError } from './errors';

// ============================================================================
// Builder
// ============================================================================

export function buildStrategyAst(tree: ParseTree): Strategy {
  return deepFreeze({
    entry: buildCondition(tree.entry),
    exit: buildCondition(tree.exit),
  });
}

export function buildCondition(node: ParseCondition): ConditionNode {
  switch (node.kind) {
    case 'constant':
      return { type: 'literal', value: node.value };

    case 'logical': {
      const children = node.operands.map(buildCondition);
      // A single operand needs no wrapper
      if (children.length === 1) {
        return children[0];
      }
      return { type: 'combinator', kind: node.operator, children };
    }

    case 'comparison':
      return {
        type: 'comparison',
        operator: checkComparisonOperator(node.operator),
        left: buildValue(node.left),
        right: buildValue(node.right),
      };
  }
}

export function buildValue(node: ParseTerm): ValueNode {
  switch (node.kind) {
    case 'number':
      return {
        type: 'literal',
        value: node.value,
        numericType: node.integer ? 'int' : 'float',
      };

    case 'boolean':
      return { type: 'literal', value: node.value };

    case 'identifier':
      if (node.name === 'true' || node.name === 'false') {
        return { type: 'literal', value: node.name === 'true' };
      }
      if (!isPriceField(node.name)) {
        throw new StrategyValidationError(
          `Unknown field: ${node.name}. Valid fields: ${PRICE_FIELDS.join(', ')}`,
          node.name,
          PRICE_FIELDS
        );
      }
      return { type: 'field', name: node.name };

    case 'call':
      return buildIndicator(node.callee, node.args);

    case 'arithmetic':
      return {
        type: 'arithmetic',
        operator: checkArithmeticOperator(node.operator),
        left: buildValue(node.left),
        right: buildValue(node.right),
      };
  }
}

function buildIndicator(callee: string, rawArgs: ParseTerm[]): IndicatorNode {
  if (!isIndicatorName(callee)) {
    throw new StrategyValidationError(
      `Unknown indicator: ${callee}. Valid indicators: ${INDICATOR_NAMES.join(', ')}`,
      callee,
      INDICATOR_NAMES
    );
  }

  const signature = getIndicatorSignature(callee);
  const usage = formatIndicatorUsage(callee);

  if (rawArgs.length !== signature.params.length) {
    throw new StrategyValidationError(
      `Indicator ${callee} expects ${signature.params.length} arguments (${usage}), got ${rawArgs.length}`,
      callee,
      [usage]
    );
  }

  const args = rawArgs.map(buildValue);

  signature.params.forEach((param, index) => {
    if (param.kind !== 'period') return;

    const arg = args[index];
    if (arg.type !== 'literal' || typeof arg.value !== 'number') {
      const found = describeValue(arg);
      throw new StrategyValidationError(
        `Indicator ${callee}: ${param.name} must be a number, got ${found} (${usage})`,
        found,
        [usage]
      );
    }

    const minimum = param.minimum ?? 0;
    if (!Number.isFinite(arg.value) || Math.trunc(arg.value) < minimum) {
      throw new StrategyValidationError(
        `Indicator ${callee}: ${param.name} must be >= ${minimum}, got ${arg.value}`,
        String(arg.value),
        [usage]
      );
    }
  });

  return { type: 'indicator', name: callee, args };
}

// ============================================================================
// Operators
// ============================================================================

function checkComparisonOperator(operator: string): ComparisonOperator {
  const match = COMPARISON_OPERATORS.find((op) => op === operator);
  if (match === undefined) {
    throw new StrategyValidationError(
      `Unknown operator: ${operator}. Valid operators: ${COMPARISON_OPERATORS.join(', ')}`,
      operator,
      COMPARISON_OPERATORS
    );
  }
  return match;
}

function checkArithmeticOperator(operator: string): ArithmeticOperator {
  const match = ARITHMETIC_OPERATORS.find((op) => op === operator);
  if (match === undefined) {
    throw new StrategyValidationError(
      `Unknown arithmetic operator: ${operator}. Valid operators: ${ARITHMETIC_OPERATORS.join(', ')}`,
      operator,
      ARITHMETIC_OPERATORS
    );
  }
  return match;
}

// ============================================================================
// Helpers
// ============================================================================

function describeValue(node: ValueNode): string {
  switch (node.type) {
    case 'literal':
      return String(node.value);
    case 'field':
      return node.name;
    case 'indicator':
      return `${node.name}(...)`;
    case 'arithmetic':
      return `an arithmetic expression`;
  }
}

function deepFreeze<T extends object>(value: T): T {
  const children: unknown[] = Object.values(value);
  for (const child of children) {
    if (typeof child === 'object' && child !== null && !Object.isFrozen(child)) {
      deepFreeze(child);
    }
  }
  Object.freeze(value);
  return value;
}
