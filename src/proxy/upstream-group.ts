import type { SelectionStrategyName, UpstreamTarget } from "./types.js";

/** Picks the target for the next request out of a non-empty list. */
export interface SelectionStrategy {
  select(targets: readonly UpstreamTarget[]): UpstreamTarget;
}

/** Cycles through targets in declaration order. */
export class RoundRobinStrategy implements SelectionStrategy {
  private cursor = 0;

  select(targets: readonly UpstreamTarget[]): UpstreamTarget {
    const target = targets[this.cursor % targets.length];
    this.cursor = (this.cursor + 1) % targets.length;
    return target;
  }
}

/** Uniform random choice. `random` is injectable for tests. */
export class RandomStrategy implements SelectionStrategy {
  constructor(private readonly random: () => number = Math.random) {}

  select(targets: readonly UpstreamTarget[]): UpstreamTarget {
    const index = Math.min(Math.floor(this.random() * targets.length), targets.length - 1);
    return targets[index];
  }
}

export function createStrategy(name: SelectionStrategyName): SelectionStrategy {
  switch (name) {
    case "round-robin":
      return new RoundRobinStrategy();
    case "random":
      return new RandomStrategy();
  }
}

/** One or more interchangeable upstream targets behind a selection strategy. */
export class UpstreamGroup {
  private readonly targets: readonly UpstreamTarget[];

  constructor(
    targets: readonly UpstreamTarget[],
    private readonly strategy: SelectionStrategy = new RoundRobinStrategy(),
  ) {
    if (targets.length === 0) {
      throw new Error("Upstream group requires at least one target");
    }
    this.targets = [...targets];
  }

  pick(): UpstreamTarget {
    return this.strategy.select(this.targets);
  }
}
