export type ResourceType = "water" | "fuel" | "tools";

export const RESOURCE_TYPES: readonly ResourceType[] = ["water", "fuel", "tools"];

/** Quantities a task draws from each pool. Missing entries mean zero. */
export type ResourceRequirements = Partial<Record<ResourceType, number>>;

export const DEFAULT_RESOURCE_CAPACITY: Readonly<Record<ResourceType, number>> = {
  water: 1000,
  fuel: 500,
  tools: 5,
};

/**
 * Depletable pool. Consumption is all-or-nothing and replenishment never
 * exceeds {@link maxCapacity}.
 */
export class Resource {
  private remaining: number;

  constructor(
    public readonly type: ResourceType,
    public readonly maxCapacity: number,
    available: number = maxCapacity,
  ) {
    if (!Number.isFinite(maxCapacity) || maxCapacity <= 0) {
      throw new RangeError(`capacity of ${type} must be a positive number, received ${maxCapacity}`);
    }
    this.remaining = Math.min(maxCapacity, Math.max(0, available));
  }

  get available(): number {
    return this.remaining;
  }

  get consumed(): number {
    return this.maxCapacity - this.remaining;
  }

  /** Fraction of the capacity already drawn, in `[0, 1]`. */
  get utilization(): number {
    return this.consumed / this.maxCapacity;
  }

  canConsume(amount: number): boolean {
    return amount >= 0 && this.remaining >= amount;
  }

  /** Debits {@link amount} when enough remains; otherwise leaves the pool untouched. */
  consume(amount: number): boolean {
    if (!this.canConsume(amount)) {
      return false;
    }
    this.remaining -= amount;
    return true;
  }

  replenish(amount: number): void {
    if (!Number.isFinite(amount) || amount < 0) {
      throw new RangeError(`replenish amount must be a non-negative number, received ${amount}`);
    }
    this.remaining = Math.min(this.maxCapacity, this.remaining + amount);
  }
}
