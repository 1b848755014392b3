/**
 * Holds frames that finish out of order and releases them strictly by
 * ascending index, starting at 0.
 */
export class FrameReorderBuffer<TFrame extends object> {
  private readonly pending = new Map<number, TFrame>();

  private nextIndex = 0;

  public constructor(private readonly total: number) {}

  public push(index: number, frame: TFrame): TFrame[] {
    if (!Number.isInteger(index) || index < 0 || index >= this.total) {
      throw new RangeError(`Frame index ${index} is outside [0, ${this.total - 1}]`);
    }

    if (index < this.nextIndex || this.pending.has(index)) {
      throw new RangeError(`Frame ${index} was already received`);
    }

    this.pending.set(index, frame);

    const ready: TFrame[] = [];
    let next = this.pending.get(this.nextIndex);
    while (next) {
      ready.push(next);
      this.pending.delete(this.nextIndex);
      this.nextIndex += 1;
      next = this.pending.get(this.nextIndex);
    }

    return ready;
  }

  public get emitted(): number {
    return this.nextIndex;
  }

  public get buffered(): number {
    return this.pending.size;
  }

  public get complete(): boolean {
    return this.nextIndex === this.total;
  }
}
