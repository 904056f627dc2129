export const RECENT_AUTOFILLED_CAPACITY = 3;

/** Signatures of the most recently filled forms, newest first. */
export class RecentSignatures {
  private entries: string[] = [];

  constructor(private readonly capacity: number = RECENT_AUTOFILLED_CAPACITY) {}

  push(signature: string): void {
    this.entries.unshift(signature);
    if (this.entries.length > this.capacity) {
      this.entries.splice(this.capacity);
    }
  }

  contains(signature: string): boolean {
    return this.entries.slice(0, this.capacity).includes(signature);
  }

  toArray(): string[] {
    return [...this.entries];
  }
}
