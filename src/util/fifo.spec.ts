/**
 * @file Tests for Fifo
 */
import { Fifo } from "./fifo";

describe("util/fifo", () => {
  it("pops in insertion order and reports length", () => {
    const q = new Fifo<number>([1, 2]);
    q.push(3);
    expect(q.length).toBe(3);
    expect(q.peek()).toBe(1);
    expect(q.shift()).toBe(1);
    expect(q.shift()).toBe(2);
    q.push(4);
    expect(q.toArray()).toEqual([3, 4]);
    expect(q.shift()).toBe(3);
    expect(q.shift()).toBe(4);
    expect(q.shift()).toBeUndefined();
    expect(q.length).toBe(0);
  });

  it("keeps order across compaction", () => {
    const q = new Fifo<number>();
    for (let i = 0; i < 5000; i++) {
      q.push(i);
    }
    for (let i = 0; i < 3000; i++) {
      expect(q.shift()).toBe(i);
    }
    q.push(5000);
    expect(q.length).toBe(2001);
    expect(q.peek()).toBe(3000);
    expect([...q].slice(-2)).toEqual([4999, 5000]);
  });
});
