/**
 * Indicator cache: one entry per distinct indicator call, keyed canonically
 */
import { ConditionNode, IndicatorNode, Strategy, ValueNode } from '../spec/types';
import { isIndicatorName } from '../features/registry';
import { StrategyRuntimeError } from '../compiler/errors';

/**
 * Canonical form of a value node: sma(close,20), prev(sma(close,20),1), (close-open).
 * Equal keys mean equal computations.
 */
export function canonicalKey(node: ValueNode): string {
  switch (node.type) {
    case 'literal':
      return String(node.value);
    case 'field':
      return node.name;
    case 'indicator':
      return `${node.name}(${node.args.map(canonicalKey).join(',')})`;
    case 'arithmetic':
      return `(${canonicalKey(node.left)}${node.operator}${canonicalKey(node.right)})`;
  }
}

export class IndicatorCache {
  private entries: Map<string, IndicatorNode> = new Map();

  static fromStrategy(strategy: Strategy): IndicatorCache {
    const cache = new IndicatorCache();
    cache.collect(strategy.entry);
    cache.collect(strategy.exit);
    return cache;
  }

  /**
   * Register every indicator reachable from a condition, nested ones included
   */
  collect(node: ConditionNode): void {
    switch (node.type) {
      case 'literal':
        return;
      case 'combinator':
        node.children.forEach((child) => this.collect(child));
        return;
      case 'comparison':
        this.collectValue(node.left);
        this.collectValue(node.right);
        return;
    }
  }

  private collectValue(node: ValueNode): void {
    if (node.type === 'indicator') {
      this.register(node);
      node.args.forEach((arg) => this.collectValue(arg));
    } else if (node.type === 'arithmetic') {
      this.collectValue(node.left);
      this.collectValue(node.right);
    }
  }

  register(node: IndicatorNode): string {
    // ASTs from the builder never get here with a bad name; hand-made ones can
    if (!isIndicatorName(node.name)) {
      throw new StrategyRuntimeError(`Unknown indicator: ${String(node.name)}`, String(node.name));
    }
    const key = canonicalKey(node);
    if (!this.entries.has(key)) {
      this.entries.set(key, node);
    }
    return key;
  }

  get(key: string): IndicatorNode | undefined {
    return this.entries.get(key);
  }

  has(key: string): boolean {
    return this.entries.has(key);
  }

  get size(): number {
    return this.entries.size;
  }

  /** Keys in lexicographic order; materialization follows this order */
  keys(): string[] {
    return Array.from(this.entries.keys()).sort();
  }
}
