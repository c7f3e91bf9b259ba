// src/utils/rollingWindow.ts

/** Fixed-size ring of outcomes (0 = success, 1 = failure) with a running failure count. */
export class RollingWindow {
  private readonly size: number;
  private readonly buf: Uint8Array;
  private next = 0;
  private stored = 0;
  private failed = 0;

  constructor(size: number) {
    if (!Number.isInteger(size) || size <= 0) throw new Error(`window size must be a positive integer (got ${size})`);
    this.size = size;
    this.buf = new Uint8Array(size);
  }

  push(value: 0 | 1): void {
    if (this.stored === this.size) this.failed -= this.buf[this.next];
    else this.stored += 1;

    this.buf[this.next] = value;
    this.failed += value;
    this.next = (this.next + 1) % this.size;
  }

  count(): number {
    return this.stored;
  }

  failures(): number {
    return this.failed;
  }

  failureRate(): number {
    return this.stored === 0 ? 0 : this.failed / this.stored;
  }

  reset(): void {
    this.buf.fill(0);
    this.next = 0;
    this.stored = 0;
    this.failed = 0;
  }
}
