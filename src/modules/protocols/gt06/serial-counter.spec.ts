import { SerialCounter } from './serial-counter';

describe('SerialCounter', () => {
  it('starts at 1 and increments after each use', () => {
    const counter = new SerialCounter();
    expect(counter.next()).toBe(1);
    expect(counter.next()).toBe(2);
    expect(counter.peek()).toBe(3);
  });

  it('wraps from 0xFFFF to 1, never 0', () => {
    const counter = new SerialCounter();
    const seen = new Set<number>();
    for (let i = 0; i < 0x10000; i++) {
      seen.add(counter.next());
    }
    expect(seen.has(0)).toBe(false);
    expect(seen.size).toBe(0xffff);
    expect(counter.peek()).toBe(2);
  });

  it('resets to 1', () => {
    const counter = new SerialCounter();
    counter.next();
    counter.next();
    counter.reset();
    expect(counter.next()).toBe(1);
  });
});
