/**
 * DSL grammar: text → parse tree
 * Uses jsep for expression parsing with the DSL's word operators registered;
 * shape rules (conditions vs terms) are enforced while normalizing jsep output.
 */
import jsep from 'jsep';
import { StrategySyntaxError } from './errors';

// ============================================================================
// Operators
// ============================================================================

jsep.addBinaryOp('OR', 1);
jsep.addBinaryOp('AND', 2);
jsep.addBinaryOp('CROSSES_ABOVE', 7);
jsep.addBinaryOp('CROSSES_BELOW', 7);
// Only the keyword spellings combine conditions
jsep.removeBinaryOp('||');
jsep.removeBinaryOp('&&');

const LOGICAL_OPERATORS = new Set(['AND', 'OR']);

// Everything jsep parses at relational precedence lands in a comparison;
// the validator decides which of these the language accepts.
const RELATIONAL_OPERATORS = new Set([
  '>',
  '<',
  '>=',
  '<=',
  '==',
  '!=',
  '===',
  '!==',
  'CROSSES_ABOVE',
  'CROSSES_BELOW',
]);

const KEYWORD_PATTERN = /\b(and|or|crosses_above|crosses_below)\b/gi;
// A keyword glued to a number (1AND) has no word boundary before it
const GLUED_KEYWORD_PATTERN = /\d(?=(?:and|or|crosses_above|crosses_below)\b)/gi;
const SECTION_PATTERN = /\b(ENTRY|EXIT)\s*:/gi;

// ============================================================================
// Parse Tree
// ============================================================================

export type ParseTerm =
  | { kind: 'number'; value: number; raw: string; integer: boolean }
  | { kind: 'boolean'; value: boolean }
  | { kind: 'identifier'; name: string }
  | { kind: 'call'; callee: string; args: ParseTerm[] }
  | { kind: 'arithmetic'; operator: string; left: ParseTerm; right: ParseTerm };

export type ParseCondition =
  | { kind: 'logical'; operator: 'AND' | 'OR'; operands: ParseCondition[] }
  | { kind: 'comparison'; operator: string; left: ParseTerm; right: ParseTerm }
  | { kind: 'constant'; value: boolean };

export interface ParseTree {
  entry: ParseCondition;
  exit: ParseCondition;
}

type SectionName = 'ENTRY' | 'EXIT';

interface SectionMarker {
  name: SectionName;
  start: number;
  bodyStart: number;
}

// ============================================================================
// Parser
// ============================================================================

export function parseDsl(text: string): ParseTree {
  const markers = findSections(text);

  const leading = text.slice(0, markers[0].start);
  const strayIndex = leading.search(/\S/);
  if (strayIndex >= 0) {
    throw new StrategySyntaxError(
      `Unexpected "${leading[strayIndex]}" at position ${strayIndex}: expected ENTRY: section`,
      leading[strayIndex],
      strayIndex
    );
  }

  const [entry, exit] = markers;
  return {
    entry: parseSection(text, entry, exit.start),
    exit: parseSection(text, exit, text.length),
  };
}

function findSections(text: string): [SectionMarker, SectionMarker] {
  const found: SectionMarker[] = [];
  for (const match of text.matchAll(SECTION_PATTERN)) {
    const start = match.index ?? 0;
    found.push({
      name: match[1].toUpperCase() === 'ENTRY' ? 'ENTRY' : 'EXIT',
      start,
      bodyStart: start + match[0].length,
    });
  }

  const entries = found.filter((m) => m.name === 'ENTRY');
  const exits = found.filter((m) => m.name === 'EXIT');

  if (entries.length === 0) {
    throw new StrategySyntaxError('Missing ENTRY: section', null, null);
  }
  if (exits.length === 0) {
    throw new StrategySyntaxError('Missing EXIT: section', null, null);
  }
  if (entries.length > 1) {
    throw new StrategySyntaxError(
      `Duplicate ENTRY: section at position ${entries[1].start}`,
      'ENTRY:',
      entries[1].start
    );
  }
  if (exits.length > 1) {
    throw new StrategySyntaxError(
      `Duplicate EXIT: section at position ${exits[1].start}`,
      'EXIT:',
      exits[1].start
    );
  }
  if (exits[0].start < entries[0].start) {
    throw new StrategySyntaxError(
      `EXIT: section at position ${exits[0].start} must follow the ENTRY: section`,
      'EXIT:',
      exits[0].start
    );
  }

  return [entries[0], exits[0]];
}

interface SectionSource {
  body: string;
  /** Offsets in `body` where a separating space was inserted, ascending */
  insertions: number[];
}

/**
 * Prepare a section body for jsep: split keywords glued to numbers and
 * uppercase keywords. Only the inserted spaces move offsets.
 */
function prepareSection(raw: string): SectionSource {
  const insertions: number[] = [];
  const spaced = raw.replace(GLUED_KEYWORD_PATTERN, (digit: string, offset: number) => {
    insertions.push(offset + 1 + insertions.length);
    return `${digit} `;
  });
  return { body: spaced.replace(KEYWORD_PATTERN, (kw) => kw.toUpperCase()), insertions };
}

function originalOffset(source: SectionSource, index: number): number {
  return index - source.insertions.filter((inserted) => inserted < index).length;
}

function parseSection(text: string, marker: SectionMarker, end: number): ParseCondition {
  const source = prepareSection(text.slice(marker.bodyStart, end));
  const body = source.body;

  if (body.trim() === '') {
    throw new StrategySyntaxError(
      `Expected an expression after ${marker.name}: at position ${marker.bodyStart}`,
      `${marker.name}:`,
      marker.bodyStart
    );
  }

  let raw: jsep.Expression;
  try {
    raw = jsep(body);
  } catch (error) {
    const index = jsepErrorIndex(error);
    const position = index === null ? null : marker.bodyStart + originalOffset(source, index);
    const token = index === null ? null : (body[index] ?? 'end of input');
    const reason = jsepErrorDescription(error);
    throw new StrategySyntaxError(
      `Syntax error in ${marker.name} section` +
        (position === null ? '' : ` at position ${position}`) +
        `: ${reason}`,
      token,
      position,
      { cause: error }
    );
  }

  return normalizeCondition(raw, marker.name);
}

function jsepErrorIndex(error: unknown): number | null {
  if (error instanceof Error && 'index' in error && typeof error.index === 'number') {
    return error.index;
  }
  return null;
}

function jsepErrorDescription(error: unknown): string {
  if (error instanceof Error) {
    if ('description' in error && typeof error.description === 'string') {
      return error.description;
    }
    return error.message;
  }
  return String(error);
}

// ============================================================================
// Normalization (jsep → parse tree)
// ============================================================================

function isBinary(node: jsep.Expression): node is jsep.BinaryExpression {
  return node.type === 'BinaryExpression';
}

function isUnary(node: jsep.Expression): node is jsep.UnaryExpression {
  return node.type === 'UnaryExpression';
}

function isLiteral(node: jsep.Expression): node is jsep.Literal {
  return node.type === 'Literal';
}

function isIdentifier(node: jsep.Expression): node is jsep.Identifier {
  return node.type === 'Identifier';
}

function isCall(node: jsep.Expression): node is jsep.CallExpression {
  return node.type === 'CallExpression';
}

function normalizeCondition(node: jsep.Expression, section: SectionName): ParseCondition {
  if (isBinary(node)) {
    if (node.operator === 'AND' || node.operator === 'OR') {
      const operator = node.operator;
      const operands: ParseCondition[] = [];
      for (const side of [node.left, node.right]) {
        const child = normalizeCondition(side, section);
        // Flatten left-associative chains: a OR b OR c
        if (child.kind === 'logical' && child.operator === operator) {
          operands.push(...child.operands);
        } else {
          operands.push(child);
        }
      }
      return { kind: 'logical', operator, operands };
    }

    if (RELATIONAL_OPERATORS.has(node.operator)) {
      return {
        kind: 'comparison',
        operator: node.operator,
        left: normalizeTerm(node.left, section),
        right: normalizeTerm(node.right, section),
      };
    }

    throw new StrategySyntaxError(
      `Expected a comparison in ${section} section but found operator "${node.operator}"`,
      node.operator,
      null
    );
  }

  if (isIdentifier(node)) {
    const name = node.name.toLowerCase();
    if (name === 'true' || name === 'false') {
      return { kind: 'constant', value: name === 'true' };
    }
  }

  if (isLiteral(node) && typeof node.value === 'boolean') {
    return { kind: 'constant', value: node.value };
  }

  const token = describeNode(node);
  throw new StrategySyntaxError(
    `Expected a comparison in ${section} section but found ${token}`,
    token,
    null
  );
}

function normalizeTerm(node: jsep.Expression, section: SectionName): ParseTerm {
  if (isLiteral(node)) {
    if (typeof node.value === 'number') {
      return numberTerm(node.value, node.raw);
    }
    if (typeof node.value === 'boolean') {
      return { kind: 'boolean', value: node.value };
    }
    throw new StrategySyntaxError(
      `Unsupported literal ${node.raw} in ${section} section`,
      node.raw,
      null
    );
  }

  if (isIdentifier(node)) {
    return { kind: 'identifier', name: node.name.toLowerCase() };
  }

  if (isCall(node)) {
    if (!isIdentifier(node.callee)) {
      const token = describeNode(node.callee);
      throw new StrategySyntaxError(
        `Indicator calls must name an indicator, found ${token}`,
        token,
        null
      );
    }
    const callee = node.callee.name.toLowerCase();
    if (node.arguments.length === 0) {
      throw new StrategySyntaxError(
        `Indicator call ${callee}() requires at least one argument`,
        `${callee}()`,
        null
      );
    }
    return {
      kind: 'call',
      callee,
      args: node.arguments.map((arg) => normalizeTerm(arg, section)),
    };
  }

  if (isBinary(node)) {
    if (LOGICAL_OPERATORS.has(node.operator) || RELATIONAL_OPERATORS.has(node.operator)) {
      throw new StrategySyntaxError(
        `Operator "${node.operator}" cannot be used inside a value in ${section} section`,
        node.operator,
        null
      );
    }
    return {
      kind: 'arithmetic',
      operator: node.operator,
      left: normalizeTerm(node.left, section),
      right: normalizeTerm(node.right, section),
    };
  }

  if (isUnary(node) && (node.operator === '-' || node.operator === '+')) {
    const arg = node.argument;
    if (isLiteral(arg) && typeof arg.value === 'number') {
      const value = node.operator === '-' ? -arg.value : arg.value;
      return numberTerm(value, `${node.operator}${arg.raw}`);
    }
  }

  const token = describeNode(node);
  throw new StrategySyntaxError(`Unsupported expression ${token} in ${section} section`, token, null);
}

/** Whole values (20, 20.0) materialize as integers; lookback periods depend on it */
function numberTerm(value: number, raw: string): ParseTerm {
  return { kind: 'number', value, raw, integer: Number.isInteger(value) };
}

function describeNode(node: jsep.Expression): string {
  if (isIdentifier(node)) return `"${node.name}"`;
  if (isLiteral(node)) return node.raw;
  if (isUnary(node)) return `unary "${node.operator}"`;
  if (isCall(node)) return 'a call expression';
  if (isBinary(node)) return `operator "${node.operator}"`;
  if (node.type === 'Compound') return 'several expressions (missing AND/OR?)';
  return node.type;
}
