/**
 * Tracks the contiguous acknowledged prefix of a fixed item order.
 *
 * Items may settle out of order (batch successes land before sequential
 * retries); the cursor only moves past an item once everything before it
 * has settled too.
 */
export class AcknowledgementCursor {
  private readonly order: readonly string[];
  private readonly settled = new Set<string>();
  private position = 0;

  constructor(order: readonly string[]) {
    this.order = order;
  }

  /** Mark an item settled. Returns the IDs the prefix advanced over, in order. */
  acknowledge(itemId: string): string[] {
    this.settled.add(itemId);
    const advanced: string[] = [];
    for (let next = this.order[this.position]; next !== undefined && this.settled.has(next); next = this.order[this.position]) {
      advanced.push(next);
      this.settled.delete(next);
      this.position++;
    }
    return advanced;
  }

  /** Last item of the acknowledged prefix, if any */
  get lastAcknowledged(): string | undefined {
    return this.position > 0 ? this.order[this.position - 1] : undefined;
  }

  get acknowledgedCount(): number {
    return this.position;
  }

  get done(): boolean {
    return this.position >= this.order.length;
  }
}
