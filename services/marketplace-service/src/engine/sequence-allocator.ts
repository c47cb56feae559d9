export type SequenceName = "listing" | "order";

export interface SequenceSource {
  currentSequence(name: SequenceName): number;
}

/**
 * Hands out ids above the last committed value. Allocations stay staged with
 * the unit of work that made them, so an aborted request does not burn ids.
 */
export class SequenceAllocator {
  private readonly staged = new Map<SequenceName, number>();

  constructor(private readonly source: SequenceSource) {}

  next(name: SequenceName): number {
    const current = this.staged.get(name) ?? this.source.currentSequence(name);
    const next = current + 1;
    this.staged.set(name, next);
    return next;
  }

  stagedValues(): Partial<Record<SequenceName, number>> {
    const values: Partial<Record<SequenceName, number>> = {};
    for (const [name, value] of this.staged) values[name] = value;
    return values;
  }
}
