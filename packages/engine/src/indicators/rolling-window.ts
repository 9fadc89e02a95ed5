/**
 * Rolling Window
 *
 * Fixed-capacity ring buffer that keeps a running sum and sum of squares,
 * so mean and standard deviation over the last N values are O(1).
 */

import { requirePositiveInt } from './guards.js';

export class RollingWindow {
  private readonly buffer: number[] = [];
  /** Slot holding the oldest value once the buffer is full */
  private head = 0;
  private total = 0;
  private totalSq = 0;

  constructor(readonly size: number) {
    requirePositiveInt('Window size', size);
  }

  /**
   * Add a value, evicting the oldest one when full
   */
  update(value: number): void {
    if (this.buffer.length < this.size) {
      this.buffer.push(value);
    } else {
      const oldest = this.buffer[this.head] ?? 0;
      this.total -= oldest;
      this.totalSq -= oldest * oldest;
      this.buffer[this.head] = value;
      this.head = (this.head + 1) % this.size;
    }

    this.total += value;
    this.totalSq += value * value;
  }

  get length(): number {
    return this.buffer.length;
  }

  isFull(): boolean {
    return this.buffer.length === this.size;
  }

  sum(): number {
    return this.total;
  }

  mean(): number {
    if (this.buffer.length === 0) return 0;
    return this.total / this.buffer.length;
  }

  /**
   * Population standard deviation; 0 with fewer than two values
   */
  std(): number {
    const n = this.buffer.length;
    if (n < 2) return 0;

    const mean = this.total / n;
    // Floating-point drift can push this slightly below zero
    const variance = Math.max(this.totalSq / n - mean * mean, 0);
    return Math.sqrt(variance);
  }

  max(): number {
    if (this.buffer.length === 0) return 0;
    let result = -Infinity;
    for (const value of this.buffer) {
      if (value > result) result = value;
    }
    return result;
  }

  min(): number {
    if (this.buffer.length === 0) return 0;
    let result = Infinity;
    for (const value of this.buffer) {
      if (value < result) result = value;
    }
    return result;
  }

  /**
   * Value `lag` steps before the newest (0 is the newest), or null when the
   * window holds fewer than `lag + 1` values
   */
  at(lag: number): number | null {
    const n = this.buffer.length;
    if (lag < 0 || lag >= n) return null;
    const newest = this.isFull() ? (this.head + this.size - 1) % this.size : n - 1;
    return this.buffer[(newest - lag + this.size) % this.size] ?? null;
  }

  /**
   * Copy of the contents, oldest first
   */
  values(): number[] {
    if (!this.isFull()) return [...this.buffer];
    return [...this.buffer.slice(this.head), ...this.buffer.slice(0, this.head)];
  }
}
