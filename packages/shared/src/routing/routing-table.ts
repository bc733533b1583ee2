import type { RoutingRule } from '../config/routing-config.js';

/**
 * Read-only lookup of routing rules by event type. Built once at startup and
 * shared by reference between concurrent handler invocations.
 */
export class RoutingTable {
  private readonly rules: ReadonlyMap<string, Readonly<RoutingRule>>;

  public constructor(rules: readonly RoutingRule[]) {
    const entries = new Map<string, Readonly<RoutingRule>>();

    for (const rule of rules) {
      if (entries.has(rule.eventType)) {
        throw new Error(`Duplicate routing rule for event type '${rule.eventType}'`);
      }

      entries.set(
        rule.eventType,
        Object.freeze({ ...rule, headers: Object.freeze({ ...rule.headers }) }),
      );
    }

    this.rules = entries;
  }

  public resolve(eventType: string): Readonly<RoutingRule> | undefined {
    return this.rules.get(eventType);
  }

  /** Distinct queue names, in the order they first appear in the config. */
  public topics(): string[] {
    const topics: string[] = [];

    for (const rule of this.rules.values()) {
      if (!topics.includes(rule.queueName)) {
        topics.push(rule.queueName);
      }
    }

    return topics;
  }

  public get size(): number {
    return this.rules.size;
  }
}
