/**
 * 16-bit information serial number. Starts at 1, wraps from 0xFFFF to 1 and
 * never yields 0.
 */
export class SerialCounter {
  private value = 1;

  /**
   * Returns the current serial and advances the counter.
   */
  next(): number {
    const serial = this.value;
    this.value = (this.value + 1) & 0xffff;
    if (this.value === 0) {
      this.value = 1;
    }
    return serial;
  }

  peek(): number {
    return this.value;
  }

  reset(): void {
    this.value = 1;
  }
}
